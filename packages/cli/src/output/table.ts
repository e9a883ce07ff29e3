/**
 * Table output format - human-readable terminal output
 */

export type TableRow = Record<string, unknown>;

const MAX_CELL_WIDTH = 80;

/**
 * Render rows as an aligned table. Columns default to the keys of the
 * first row.
 */
export function formatTable(rows: readonly TableRow[], columns?: readonly string[]): string {
  const first = rows[0];
  if (!first) {
    return 'No results.\n';
  }

  const keys = columns ?? Object.keys(first);
  const cells = rows.map((row) => keys.map((k) => formatCellValue(row[k])));
  const widths = keys.map((k, i) => Math.max(k.length, ...cells.map((r) => (r[i] ?? '').length)));

  const lines: string[] = [];
  lines.push(keys.map((k, i) => k.padEnd(widths[i] ?? 0)).join('  ').trimEnd());
  lines.push(widths.map((w) => '─'.repeat(w)).join('──'));
  for (const row of cells) {
    lines.push(row.map((c, i) => c.padEnd(widths[i] ?? 0)).join('  ').trimEnd());
  }

  return lines.join('\n') + '\n';
}

/**
 * Render an object as aligned `key  value` lines
 */
export function formatKeyValue(entries: ReadonlyArray<readonly [string, unknown]>): string {
  if (entries.length === 0) {return 'No data.\n';}
  const maxKeyLen = Math.max(...entries.map(([k]) => k.length));
  return entries.map(([k, v]) => `${k.padEnd(maxKeyLen)}  ${formatValue(v)}`).join('\n') + '\n';
}

/**
 * Format a cell value for table display. Numbers keep at most three
 * decimals; long strings are truncated.
 */
export function formatCellValue(v: unknown): string {
  if (v === null || v === undefined) {return '';}
  if (typeof v === 'number') {return Number.isInteger(v) ? String(v) : String(Math.round(v * 1000) / 1000);}
  if (Array.isArray(v)) {return v.map(String).join(', ');}
  if (typeof v === 'object') {return JSON.stringify(v);}
  const s = String(v);
  if (s.length > MAX_CELL_WIDTH) {return s.slice(0, MAX_CELL_WIDTH - 3) + '...';}
  return s;
}

function formatValue(v: unknown): string {
  if (v === null || v === undefined) {return '—';}
  if (typeof v === 'object') {return JSON.stringify(v);}
  return String(v);
}
