/**
 * Telemetry and observability helpers
 */

import { writeStderr, type Writer } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

export interface TelemetryOptions {
  verbose: boolean;
  write?: Writer;
}

/**
 * Emit a metric line to stderr in verbose mode
 */
export function emitMetric(key: string, fields: Record<string, unknown>, options: TelemetryOptions): void {
  if (!options.verbose) {
    return;
  }

  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  (options.write ?? writeStderr)(parts.join(" ") + "\n");
}

/**
 * Wrap an async function with timing metrics
 */
export async function withTiming<T>(
  label: string,
  fn: () => Promise<T>,
  options: TelemetryOptions
): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    emitMetric(label, { duration_ms: Date.now() - start, success }, options);
  }
}
