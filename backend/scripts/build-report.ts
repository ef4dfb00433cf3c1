/**
 * Schreibt den Export als HTML-Tabelle (nunjucks) und als JSON mit gleichem,
 * zeitgestempeltem Dateinamen nach <outDir>/.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import dayjs from 'dayjs';
import nunjucks from 'nunjucks';
import type { ExportResult, ReportColumn } from '../core/types.js';

const TEMPLATE_DIR = fileURLToPath(new URL('../reports/templates', import.meta.url));

export const COLUMN_LABELS: Record<ReportColumn, string> = {
  ID: 'ID',
  Gruppe: 'Gruppe',
  Titel: 'Titel',
  Termin_Start: 'Beginn',
  Termin_Ende: 'Ende',
  Tourenleitung: 'Tourenleitung',
  Veranstaltungsort: 'Veranstaltungsort',
  Treffpunkt: 'Treffpunkt',
  Beschreibung: 'Beschreibung'
};

export interface ReportFiles {
  html: string;
  json: string;
}

export function reportBasename(now: Date): string {
  return `gruppentermine_${dayjs(now).format('YYYY-MM-DD_HH-mm-ss')}`;
}

export function renderReport(result: ExportResult, now: Date): string {
  const env = nunjucks.configure(TEMPLATE_DIR, { autoescape: true });
  return env.render('gruppentermine.njk', {
    ...result,
    labels: COLUMN_LABELS,
    generatedAt: dayjs(now).format('YYYY-MM-DD HH:mm')
  });
}

export async function buildReport(result: ExportResult, outDir: string, now = new Date()): Promise<ReportFiles> {
  await fs.mkdir(outDir, { recursive: true });
  const base = path.join(outDir, reportBasename(now));
  const files = { html: `${base}.html`, json: `${base}.json` };
  await fs.writeFile(files.html, renderReport(result, now), 'utf-8');
  await fs.writeFile(files.json, JSON.stringify(result, null, 2), 'utf-8');
  return files;
}
