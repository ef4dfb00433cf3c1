/**
 * Gruppentermine-Export
 *  - prüft die Sitzung (Cookie + CSRF-Token aus dem Browser)
 *  - listet veröffentlichte Touren und Termine im Terminordner
 *  - lädt jedes Objekt einzeln, normalisiert es und schreibt den Bericht
 *
 * Aufruf: tsx scripts/export.ts --cookie "PHPSESSID=..." --token "..."
 */

import { pathToFileURL } from 'node:url';
import { config as loadEnv } from 'dotenv';
import { BackendClient } from '../core/client.js';
import { loadConfig } from '../core/config.js';
import { runExport } from '../core/engine.js';
import { ConfigError, ConnectivityError } from '../core/errors.js';
import { createLogger, type Logger } from '../core/log.js';
import { buildReport, type ReportFiles } from './build-report.js';

export function remediation(baseUrl: string): string {
  return [
    'Die Verbindung zum Backend konnte nicht hergestellt werden.',
    'Cookie und CSRF-Token sind vermutlich abgelaufen. So erhalten Sie neue Werte:',
    `  1. ${baseUrl}/admin im Browser öffnen und anmelden.`,
    '  2. Entwicklerwerkzeuge öffnen (F12), Reiter "Netzwerk".',
    '  3. Eine beliebige Anfrage an /admin/ auswählen.',
    '  4. Aus den Anfrage-Headern den Wert von "Cookie" und von "X-pimcore-csrf-token" kopieren.',
    '  5. Erneut starten: --cookie "<Cookie>" --token "<Token>" (oder CMS_COOKIE/CMS_CSRF_TOKEN in .env).'
  ].join('\n');
}

export async function main(argv: string[] = process.argv.slice(2), log: Logger = createLogger()): Promise<ReportFiles> {
  const { config, credentials } = await loadConfig(argv);
  const client = new BackendClient(credentials, { ...config, log });
  const result = await runExport(client, config, log);
  const files = await buildReport(result, config.outDir);
  log({ level: 'info', module: 'export', msg: `${result.stats.exported} Termine exportiert (${result.stats.skipped} übersprungen)` });
  return files;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  loadEnv();
  main()
    .then((files) => {
      console.log('✅ Fertig. Bericht:', files.html);
    })
    .catch((e) => {
      if (e instanceof ConnectivityError) {
        console.error(remediation(e.baseUrl));
      } else if (e instanceof ConfigError) {
        console.error(e.message);
      } else {
        console.error(e);
      }
      process.exit(1);
    });
}
