import { promises as fs } from 'node:fs';
import { Command } from 'commander';
import { Ajv } from 'ajv';
import { ConfigError } from './errors.js';
import type { Credentials, ExportConfig } from './types.js';

type CliOptions = {
  cookie?: string;
  token?: string;
  baseUrl?: string;
  folder?: string;
  classes?: string;
  out?: string;
  delay?: string;
  timeout?: string;
};

export interface LoadedConfig {
  config: ExportConfig;
  credentials: Credentials;
}

const DEFAULTS_URL = new URL('../config/export.defaults.json', import.meta.url);
const SCHEMA_URL = new URL('../config/schemas/export.defaults.schema.json', import.meta.url);

function toInt(name: string, v: string): number {
  const n = Number(v);
  if (!Number.isInteger(n)) throw new ConfigError(`--${name} erwartet eine ganze Zahl, erhalten: ${v}`);
  return n;
}

/**
 * Reads config/export.defaults.json and applies overrides.
 * Precedence: CLI flags > environment > defaults file.
 */
export async function loadConfig(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): Promise<LoadedConfig> {
  const [defaultsRaw, schemaRaw] = await Promise.all([
    fs.readFile(DEFAULTS_URL, 'utf-8'),
    fs.readFile(SCHEMA_URL, 'utf-8')
  ]);
  const schema = JSON.parse(schemaRaw);
  const candidate = JSON.parse(defaultsRaw);

  const program = new Command();
  program
    .allowUnknownOption(true)
    .option('--cookie <cookie>', 'Session-Cookie aus dem Browser')
    .option('--token <token>', 'CSRF-Token aus dem Browser')
    .option('--base-url <url>', 'Origin des CMS-Backends')
    .option('--folder <id>', 'Ordner-ID der Termine')
    .option('--classes <tour,event>', 'Klassen-IDs, kommagetrennt (Tour, Termin)')
    .option('--out <dir>', 'Ausgabeverzeichnis')
    .option('--delay <ms>', 'Pause zwischen Detailabrufen')
    .option('--timeout <ms>', 'Timeout je Anfrage');
  program.parse(argv, { from: 'user' });
  const opts = program.opts<CliOptions>();

  if (env.CMS_BASE_URL) candidate.baseUrl = env.CMS_BASE_URL;
  if (env.EXPORT_OUT_DIR) candidate.outDir = env.EXPORT_OUT_DIR;

  if (opts.baseUrl) candidate.baseUrl = opts.baseUrl;
  if (opts.folder) candidate.folderId = opts.folder;
  if (opts.classes) {
    const [tour, event] = opts.classes.split(',').map((c) => c.trim());
    if (!tour || !event) throw new ConfigError('--classes erwartet zwei IDs, z. B. "5,9"');
    candidate.classes = { tour, event };
  }
  if (opts.out) candidate.outDir = opts.out;
  if (opts.delay) candidate.delayMs = toInt('delay', opts.delay);
  if (opts.timeout) candidate.timeoutMs = toInt('timeout', opts.timeout);

  const ajv = new Ajv({ allErrors: true });
  const validate = ajv.compile<ExportConfig>(schema);
  if (!validate(candidate)) {
    throw new ConfigError('Ungültige Konfiguration: ' + ajv.errorsText(validate.errors));
  }
  const config = { ...candidate, baseUrl: candidate.baseUrl.replace(/\/+$/, '') };

  const cookie = (opts.cookie || env.CMS_COOKIE || '').trim();
  const token = (opts.token || env.CMS_CSRF_TOKEN || '').trim();
  if (!cookie || !token) {
    throw new ConfigError('Cookie und CSRF-Token fehlen (--cookie/--token oder CMS_COOKIE/CMS_CSRF_TOKEN)');
  }

  return { config, credentials: { cookie, token } };
}
