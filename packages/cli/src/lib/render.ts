/**
 * Output rendering helpers
 */

type Color = "red" | "green" | "yellow";

const CODES: Record<Color, string> = {
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
};

const RESET = "\x1b[0m";

/**
 * Serialize data as JSON, indented unless raw
 */
export function renderJson(data: unknown, options?: { raw?: boolean }): string {
  return options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(
  text: string,
  color: Color,
  stream: NodeJS.WriteStream = process.stdout
): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }
  return `${CODES[color]}${text}${RESET}`;
}
