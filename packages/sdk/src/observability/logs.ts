/**
 * Debug diagnostics for parameter parsing and collection scans
 *
 * Silent unless TODOQUERY_DEBUG is set to something other than "" or "0".
 * Lines go to stderr: stdout carries command output and protocol frames.
 */

export interface DebugFields {
  /** Request parameter that triggered the line */
  parameter?: string;
  /** Offending or ignored value */
  value?: string;
  collection?: string;
  file?: string;
  message?: string;
}

const FIELD_ORDER: readonly (keyof DebugFields)[] = ["parameter", "value", "collection", "file", "message"];

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const flag = env.TODOQUERY_DEBUG;
  return flag !== undefined && flag !== "" && flag !== "0";
}

/**
 * Render one diagnostic line: `<iso time> debug <event> key="value" ...`
 */
export function formatDebugLine(event: string, fields: DebugFields, now: Date = new Date()): string {
  const parts = [now.toISOString(), "debug", event];
  for (const key of FIELD_ORDER) {
    const value = fields[key];
    if (value !== undefined) {
      parts.push(`${key}=${JSON.stringify(value)}`);
    }
  }
  return parts.join(" ");
}

export function logDebug(event: string, fields: DebugFields = {}): void {
  if (isDebugEnabled()) {
    console.error(formatDebugLine(event, fields));
  }
}
