/**
 * Column-aligned table output for CLI commands
 */

export type LineWriter = (line: string) => void;

export function printTable(headers: string[], rows: string[][], write: LineWriter = console.log): void {
  if (rows.length === 0) {
    write("No data to display");
    return;
  }

  const allRows = [headers, ...rows];
  const colWidths = headers.map((_, colIndex) => {
    return Math.max(...allRows.map((row) => stripAnsi(row[colIndex] ?? "").length));
  });

  write(headers.map((header, i) => header.padEnd(colWidths[i])).join(" │ ").trimEnd());
  write(colWidths.map((width) => "─".repeat(width)).join("─┼─"));

  for (const row of rows) {
    write(
      headers
        .map((_, i) => (row[i] ?? "").padEnd(colWidths[i]))
        .join(" │ ")
        .trimEnd()
    );
  }
}

/**
 * Strip ANSI escape codes from string for length calculation
 */
function stripAnsi(str: string): string {
  return str.replace(/\u001b\[[0-9;]*m/g, "");
}
