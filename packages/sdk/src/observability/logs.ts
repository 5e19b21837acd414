/**
 * Diagnostic output for index builds, mutations and integrity checks
 *
 * One line per event: `fmindex <level> <event> key=value ...`, fields in a
 * fixed order. Debug lines print only when FMINDEX_DEBUG is set.
 */

export type LogLevel = "debug" | "warn" | "error";

/**
 * Fields an index event may carry
 */
export interface IndexLogFields {
  /** Index name from the options */
  index?: string;
  generation?: number;
  /** Characters including the sentinel */
  size?: number;
  alphabetSize?: number;
  /** Position of an inserted or deleted character */
  offset?: number;
  durationMs?: number;
  /** Rejected argument name */
  argument?: string;
  reason?: string;
}

const FIELD_ORDER: ReadonlyArray<keyof IndexLogFields> = [
  "index",
  "generation",
  "size",
  "alphabetSize",
  "offset",
  "durationMs",
  "argument",
  "reason",
];

function formatValue(key: keyof IndexLogFields, value: string | number): string {
  if (key === "durationMs" && typeof value === "number") {
    return value.toFixed(2);
  }
  const text = String(value);
  return /[\s"=]/.test(text) ? JSON.stringify(text) : text;
}

/**
 * Render one event as a log line
 */
export function formatLogLine(level: LogLevel, event: string, fields: IndexLogFields = {}): string {
  const parts = [`fmindex ${level} ${event}`];
  for (const key of FIELD_ORDER) {
    const value = fields[key];
    if (value !== undefined) {
      parts.push(`${key}=${formatValue(key, value)}`);
    }
  }
  return parts.join(" ");
}

class IndexLogger {
  #enabled = true;

  debug(event: string, fields?: IndexLogFields): void {
    if (process.env.FMINDEX_DEBUG) {
      this.#write("debug", event, fields);
    }
  }

  warn(event: string, fields?: IndexLogFields): void {
    this.#write("warn", event, fields);
  }

  error(event: string, fields?: IndexLogFields): void {
    this.#write("error", event, fields);
  }

  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  #write(level: LogLevel, event: string, fields?: IndexLogFields): void {
    if (!this.#enabled) return;

    const line = formatLogLine(level, event, fields);
    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.debug(line);
    }
  }
}

/**
 * Global logger instance
 */
export const logger = new IndexLogger();
