import dayjs from 'dayjs';
import { strip } from './sanitize.js';
import type { DateRange, RawEventDetail, ReportRecord } from './types.js';

const DATE_ONLY = 'YYYY-MM-DD';
const DATE_TIME = 'YYYY-MM-DD HH:mm';

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function text(v: unknown): string | undefined {
  return typeof v === 'string' ? v : undefined;
}

function lastSegment(ref: unknown): string | undefined {
  if (!isRecord(ref) || typeof ref.fullpath !== 'string') return undefined;
  return ref.fullpath.split('/').pop();
}

function firstRange(detail: RawEventDetail): DateRange | undefined {
  const data = isRecord(detail.dates) ? detail.dates.data : undefined;
  if (!Array.isArray(data)) return undefined;
  const first: unknown = data[0];
  return isRecord(first) ? first : undefined;
}

function isEpoch(v: unknown): v is number {
  return typeof v === 'number' && Number.isFinite(v);
}

/**
 * Formats start/end in the machine's local timezone. A start at local
 * midnight marks an all-day event: both values are then date-only.
 * The same instant therefore renders differently on hosts in other zones.
 */
export function formatRange(range: DateRange): Pick<ReportRecord, 'Termin_Start' | 'Termin_Ende'> {
  if (!isEpoch(range.dateStart)) return {};
  const start = dayjs.unix(range.dateStart);
  const allDay = start.hour() === 0 && start.minute() === 0 && start.second() === 0;
  const fmt = allDay ? DATE_ONLY : DATE_TIME;
  const out: Pick<ReportRecord, 'Termin_Start' | 'Termin_Ende'> = { Termin_Start: start.format(fmt) };
  if (isEpoch(range.dateEnd)) out.Termin_Ende = dayjs.unix(range.dateEnd).format(fmt);
  return out;
}

/**
 * Maps one object detail to a flat report row. Pure. Fields of an
 * unexpected type count as missing.
 */
export function normalizeEvent(id: string | number, detail: RawEventDetail): ReportRecord {
  const record: ReportRecord = { ID: String(id) };

  const groups: unknown[] = Array.isArray(detail.assignedGroups) ? detail.assignedGroups : [];
  const group = lastSegment(groups[0]);
  if (group !== undefined) record.Gruppe = group;

  record.Titel = text(detail.title);

  const range = firstRange(detail);
  if (range) Object.assign(record, formatRange(range));

  const leaders = (Array.isArray(detail.leaders) ? detail.leaders : [])
    .map(lastSegment)
    .filter((name): name is string => name !== undefined);
  if (leaders.length) record.Tourenleitung = leaders.join('; ');

  record.Veranstaltungsort = isRecord(detail.locations) ? text(detail.locations.name) : undefined;
  record.Treffpunkt = strip(text(detail.meetingPoint));
  record.Beschreibung = strip(text(detail.description));
  record.Beschreibung_HTML = text(detail.description);
  return record;
}
