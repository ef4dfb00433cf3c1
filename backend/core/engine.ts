import type { BackendClient } from './client.js';
import { ConnectivityError, ExportError, TransportError } from './errors.js';
import type { Logger } from './log.js';
import { normalizeEvent } from './normalize.js';
import type { ExportConfig, ExportResult, RawEventListing, ReportColumn, ReportRecord } from './types.js';

export const REPORT_COLUMNS: ReportColumn[] = [
  'Gruppe',
  'Titel',
  'Termin_Start',
  'Termin_Ende',
  'Tourenleitung',
  'Veranstaltungsort',
  'Treffpunkt',
  'Beschreibung',
  'ID'
];

export type ExportClient = Pick<BackendClient, 'probe' | 'listAll' | 'fetchEventDetail'>;

function sleep(ms: number) { return new Promise(r => setTimeout(r, ms)); }

function describe(e: unknown): string {
  if (e instanceof TransportError) return `${e.code}: ${e.message} (${e.url})`;
  if (e instanceof ExportError) return `${e.code}: ${e.message}`;
  return e instanceof Error ? `${e.name}: ${e.message}` : String(e);
}

/** Ascending by start; rows without a start come first. Stable. */
export function sortByStart(records: ReportRecord[]): ReportRecord[] {
  return [...records].sort((a, b) => {
    const x = a.Termin_Start ?? '';
    const y = b.Termin_Start ?? '';
    return x < y ? -1 : x > y ? 1 : 0;
  });
}

/**
 * Probe, list both classes, fetch and normalise every published object one
 * after another. Only a failed probe aborts; any error for one class or one
 * object is logged and that class or object skipped.
 */
export async function runExport(
  client: ExportClient,
  config: Pick<ExportConfig, 'baseUrl' | 'folderId' | 'classes' | 'delayMs'>,
  log: Logger
): Promise<ExportResult> {
  const start = new Date();

  if (!(await client.probe())) {
    throw new ConnectivityError(config.baseUrl);
  }
  log({ level: 'info', module: 'engine', msg: 'Verbindung zum Backend steht' });

  const listings: RawEventListing[] = [];
  for (const [name, classId] of Object.entries(config.classes)) {
    try {
      const rows = await client.listAll(config.folderId, classId);
      log({ level: 'info', module: 'engine', msg: `${rows.length} veröffentlichte Objekte in Klasse ${name} (${classId})` });
      listings.push(...rows);
    } catch (e) {
      log({ level: 'warn', module: 'engine', msg: `Klasse ${name} (${classId}) übersprungen: ${describe(e)}` });
    }
  }

  const records: ReportRecord[] = [];
  for (let i = 0; i < listings.length; i++) {
    if (i > 0 && config.delayMs > 0) await sleep(config.delayMs);
    const id = String(listings[i].id);
    const t0 = Date.now();
    try {
      const detail = await client.fetchEventDetail(id);
      if (!detail) {
        log({ level: 'warn', module: 'engine', id, msg: 'Antwort ohne Daten, übersprungen' });
        continue;
      }
      records.push(normalizeEvent(id, detail));
      log({ level: 'debug', module: 'engine', id, msg: `${i + 1}/${listings.length}`, elapsed: Date.now() - t0 });
    } catch (e) {
      log({ level: 'warn', module: 'engine', id, msg: `übersprungen: ${describe(e)}` });
    }
  }

  return {
    meta: {
      startedAt: start.toISOString(),
      finishedAt: new Date().toISOString(),
      baseUrl: config.baseUrl,
      folderId: config.folderId
    },
    stats: { listed: listings.length, exported: records.length, skipped: listings.length - records.length },
    columns: REPORT_COLUMNS,
    records: sortByStart(records)
  };
}
