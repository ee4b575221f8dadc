/**
 * Terminal output helpers for the CLI.
 */

const NUMERIC = /^-?\d+(\.\d+)?(ms|s)?$/;

/**
 * Render rows under a header, numeric cells right-aligned, columns
 * separated by │ and the header underlined with ─┼─.
 */
export function renderTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((header, col) =>
    rows.reduce((width, row) => Math.max(width, (row[col] ?? '').length), header.length),
  );
  const line = (cells: string[], isHeader: boolean) =>
    widths
      .map((width, col) => {
        const cell = cells[col] ?? '';
        return ` ${!isHeader && NUMERIC.test(cell) ? cell.padStart(width) : cell.padEnd(width)} `;
      })
      .join('│');

  return [line(headers, true), widths.map((w) => '─'.repeat(w + 2)).join('┼'), ...rows.map((r) => line(r, false))];
}

export function printTable(headers: string[], rows: string[][]): void {
  for (const text of renderTable(headers, rows)) console.log(text);
}

/**
 * Print JSON to stdout (pretty if tty, compact otherwise).
 */
export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, process.stdout.isTTY ? 2 : 0));
}

/** Metric score with four decimals */
export function formatScore(score: number): string {
  return score.toFixed(4);
}

/** Elapsed time of a run: "-" before it starts, "running" until it ends */
export function formatDuration(startedAt?: string, endedAt?: string): string {
  if (!startedAt) return '-';
  if (!endedAt) return 'running';
  const seconds = (Date.parse(endedAt) - Date.parse(startedAt)) / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  return `${Math.floor(seconds / 60)}m${Math.floor(seconds % 60)}s`;
}

/** Cut to `max` characters, ending in "…" when shortened */
export function truncate(text: string, max: number): string {
  return text.length <= max ? text : `${text.slice(0, max - 1)}…`;
}
