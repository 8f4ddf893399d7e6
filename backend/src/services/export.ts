/**
 * @fileoverview CSV export of district results.
 *
 * One row per district: District, then a Street/Count pair per ranked
 * position, then Total POIs, Total Streets, Status and Notes. Positions a
 * district has no street for are left empty.
 */

import type { DistrictResult } from '../types.js';

/**
 * Quotes a value if it contains a comma, quote or line break.
 */
export function escapeCsv(value: string | number | null | undefined): string {
  if (value === undefined || value === null) return '';
  const str = String(value);
  if (/[",\r\n]/.test(str)) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

export function csvHeader(topN: number): string[] {
  const header = ['District'];
  for (let i = 1; i <= topN; i++) {
    header.push(`Street ${i}`, `Count ${i}`);
  }
  header.push('Total POIs', 'Total Streets', 'Status', 'Notes');
  return header;
}

function toRow(result: DistrictResult, topN: number): Array<string | number | null> {
  const row: Array<string | number | null> = [result.district];
  for (let i = 0; i < topN; i++) {
    const entry = result.success ? result.top_streets[i] : undefined;
    row.push(entry?.name ?? null, entry?.count ?? null);
  }
  row.push(
    result.total_pois,
    result.total_streets,
    result.success ? 'Success' : 'Error',
    result.error
  );
  return row;
}

/**
 * Builds the export table, `\n`-terminated lines, header first.
 */
export function formatResultsCsv(results: readonly DistrictResult[], topN: number): string {
  const lines = [csvHeader(topN).map(escapeCsv).join(',')];
  for (const result of results) {
    lines.push(toRow(result, topN).map(escapeCsv).join(','));
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Download name such as `street-ranking_20240131_154500.csv` (local time).
 */
export function exportFilename(at: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const date = `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}`;
  const time = `${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`;
  return `street-ranking_${date}_${time}.csv`;
}
