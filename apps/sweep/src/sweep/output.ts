import type { SweepResult } from "./runSweep";

function csvCell(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function csvNumber(x: number): string {
  return Number.isFinite(x) ? String(x) : "";
}

/** One row per swept value; empty cells where a point could not be priced. */
export function toCsv(result: SweepResult): string {
  const header = [result.parameter, ...result.series.map((s) => s.label)].map(csvCell).join(",");
  const rows = result.xs.map((x, i) =>
    [csvNumber(x), ...result.series.map((s) => csvNumber(s.prices[i]))].join(",")
  );
  return [header, ...rows].join("\n") + "\n";
}

export function formatTable(result: SweepResult, digits = 6): string {
  const labels = [result.parameter, ...result.series.map((s) => s.label)];
  const body = result.xs.map((x, i) => [
    Number.isInteger(x) ? String(x) : x.toFixed(digits),
    ...result.series.map((s) => (Number.isFinite(s.prices[i]) ? s.prices[i].toFixed(digits) : "-")),
  ]);
  const widths = labels.map((l, c) => Math.max(l.length, ...body.map((r) => r[c].length)));
  const line = (cells: string[]) => cells.map((cell, c) => cell.padStart(widths[c])).join("  ");

  return [
    `${result.name} (${result.instrument})`,
    line(labels),
    widths.map((w) => "-".repeat(w)).join("  "),
    ...body.map(line),
  ].join("\n");
}
