/**
 * Driver metrics, written to stderr in verbose mode
 */

import { isVerbose } from "./env.js";
import type { Output } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Emit a metric line if ARGSPEC_CLI_DEBUG=1
 * @example "metric cli.parse status=ok"
 */
export function emitMetric(output: Output, key: string, fields: Record<string, unknown>): void {
  if (!isVerbose()) {
    return;
  }

  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  output.stderr(parts.join(" ") + "\n");
}

/**
 * Run a command action and report its duration and outcome
 */
export async function withTiming<T>(
  output: Output,
  label: string,
  fn: () => Promise<T>
): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    emitMetric(output, label, {
      duration_ms: Date.now() - start,
      success,
    });
  }
}
