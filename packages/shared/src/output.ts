import chalk from "chalk";

export type Cell = string | number | boolean | undefined | null;

export function formatTable(headers: string[], rows: Cell[][]): string[] {
  const widths = headers.map((h, i) =>
    Math.max(
      h.length,
      ...rows.map((r) => String(r[i] ?? "").length)
    )
  );

  const lines = [
    headers.map((h, i) => chalk.bold(h.padEnd(widths[i] ?? 0))).join("  "),
    widths.map((w) => "─".repeat(w)).join("  "),
  ];
  for (const row of rows) {
    lines.push(
      row.map((cell, i) => String(cell ?? "").padEnd(widths[i] ?? 0)).join("  ")
    );
  }
  return lines;
}

export function table(headers: string[], rows: Cell[][]): void {
  for (const line of formatTable(headers, rows)) {
    console.log(line);
  }
}

export function heading(text: string): void {
  console.log(chalk.bold.cyan(text));
}

export function subheading(text: string): void {
  console.log(chalk.bold(text));
}

export function success(text: string): void {
  console.log(chalk.green(text));
}

export function warn(text: string): void {
  console.error(chalk.yellow(`Warning: ${text}`));
}

export function error(text: string): void {
  console.error(chalk.red(`Error: ${text}`));
}

export function info(text: string): void {
  console.log(chalk.dim(text));
}

export function json(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function blank(): void {
  console.log();
}

export function debugEnabled(): boolean {
  const flag = process.env.PULSE_DEBUG;
  return flag !== undefined && flag !== "" && flag !== "0";
}

/** Diagnostics go to stderr so `--json` output stays parseable. */
export function debug(text: string): void {
  if (!debugEnabled()) return;
  console.error(chalk.dim(`[debug] ${text}`));
}
