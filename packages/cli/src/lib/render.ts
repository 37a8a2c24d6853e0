/**
 * How commands print documents, names and status lines
 */

type Color = "red" | "green" | "yellow";

const ANSI: Record<Color, string> = {
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
};

/**
 * Print a document, a result set or constraint records
 * Pretty-printed unless `raw` asks for one line per value
 */
export function printJson(data: unknown, options?: { raw?: boolean }): void {
  console.log(options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2));
}

/**
 * Print collection or constraint names, one per line
 */
export function printLines(lines: readonly string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}

/**
 * Print a human-readable outcome ("Created collection users") unless --quiet was given
 */
export function printStatus(message: string, options: { quiet?: boolean }): void {
  if (options.quiet) return;
  console.log(message);
}

/**
 * Wrap text in an ANSI color when the stream is a terminal
 */
export function colorize(
  text: string,
  color: Color,
  stream: NodeJS.WriteStream = process.stdout
): string {
  return stream.isTTY ? `${ANSI[color]}${text}\x1b[0m` : text;
}
