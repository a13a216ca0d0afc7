/**
 * Terminal formatting shared by the CLI commands.
 */

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
};

export type Color = keyof typeof COLORS;

const useColors = process.stdout.isTTY === true && !process.env.NO_COLOR;

export function c(color: Color, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

export function rule(char = "─", width = 60): string {
  return char.repeat(width);
}

/**
 * Render rows as left-aligned columns padded to the widest cell.
 */
export function formatTable(
  header: readonly string[],
  rows: readonly (readonly string[])[]
): string[] {
  const widths = header.map((title, col) =>
    Math.max(title.length, ...rows.map((row) => (row[col] ?? "").length))
  );
  const render = (cells: readonly string[]): string =>
    cells
      .map((cell, col) => cell.padEnd(widths[col] ?? cell.length))
      .join("  ")
      .trimEnd();

  return [render(header), render(widths.map((w) => "-".repeat(w))), ...rows.map(render)];
}
