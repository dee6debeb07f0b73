/**
 * Output stream helpers for CLI
 */

export type Writer = (text: string) => void;

export function writeStdout(text: string): void {
  process.stdout.write(text);
}

export function writeStderr(text: string): void {
  process.stderr.write(text);
}
