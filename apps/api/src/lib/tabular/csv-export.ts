import * as XLSX from 'xlsx';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

export type CsvRow = Readonly<Record<string, string | number | null>>;

/** yyyyMMddHHmmss in UTC */
export function fileTimestamp(at: Date): string {
  return at.toISOString().replace(/[-:T]/g, '').slice(0, 14);
}

/** Writes `{prefix}_{timestamp}.csv` under `dir` and returns its path. */
export async function writeCsvExport(
  dir: string,
  prefix: string,
  rows: readonly CsvRow[],
  at = new Date()
): Promise<string> {
  await mkdir(dir, { recursive: true });
  const path = join(dir, `${prefix.replace(/[^A-Za-z0-9_-]+/g, '_')}_${fileTimestamp(at)}.csv`);
  const sheet = XLSX.utils.json_to_sheet([...rows]);
  await writeFile(path, XLSX.utils.sheet_to_csv(sheet), 'utf8');
  return path;
}
