export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEvent {
  level: LogLevel;
  module?: string;
  id?: string;
  msg: string;
  elapsed?: number;
}

export interface Credentials {
  /** Session cookie, copied as-is from the browser ("PHPSESSID=..."). */
  cookie: string;
  /** Anti-forgery token of the same session. */
  token: string;
}

export interface ClassIds {
  tour: string;
  event: string;
}

export interface ExportConfig {
  baseUrl: string;
  folderId: string;
  classes: ClassIds;
  probe: { id: string; type: 'document' | 'object' };
  csrfHeader: string;
  pageLimit: number;
  delayMs: number;
  timeoutMs: number;
  outDir: string;
}

/** One row of the grid listing. */
export interface RawEventListing {
  id: string | number;
  fullpath: string;
  type: string;
  subtype: string;
  classname: string;
  filename: string;
  creationDate: number;
  modificationDate: number;
  published: boolean;
}

export interface DateRange {
  dateStart?: unknown;
  dateEnd?: unknown;
}

/**
 * Object detail as delivered by the backend. Nothing about its shape is
 * checked on receipt, so every field is `unknown` until the normaliser
 * narrows it. Fields read: assignedGroups[].fullpath, title,
 * leaders[].fullpath, locations.name, meetingPoint, description,
 * dates.data[].dateStart/dateEnd.
 */
export interface RawEventDetail {
  assignedGroups?: unknown;
  title?: unknown;
  leaders?: unknown;
  locations?: unknown;
  meetingPoint?: unknown;
  description?: unknown;
  dates?: unknown;
  [key: string]: unknown;
}

export interface ReportRecord {
  ID: string;
  Gruppe?: string;
  Titel?: string;
  Termin_Start?: string;
  Termin_Ende?: string;
  Tourenleitung?: string;
  Veranstaltungsort?: string;
  Treffpunkt?: string;
  Beschreibung?: string;
  Beschreibung_HTML?: string;
}

export type ReportColumn = Exclude<keyof ReportRecord, 'Beschreibung_HTML'>;

export interface ExportResult {
  meta: { startedAt: string; finishedAt: string; baseUrl: string; folderId: string };
  stats: { listed: number; exported: number; skipped: number };
  columns: ReportColumn[];
  records: ReportRecord[];
}
