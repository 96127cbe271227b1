/**
 * Telemetry and observability helpers
 * Metrics go to stderr as `metric <label> key=value ...` when GRAVEYARD_CLI_DEBUG=1
 */

import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

export interface MetricSink {
  env?: NodeJS.ProcessEnv;
  write?: (content: string) => void;
}

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Emit a metric if metrics are enabled
 */
export function emitMetric(key: string, fields: Record<string, unknown>, sink: MetricSink = {}): void {
  if (!isVerbose(sink.env)) {
    return;
  }

  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  (sink.write ?? writeStderr)(parts.join(" ") + "\n");
}

/**
 * Wrap an async function with timing metrics
 */
export async function withTiming<T>(
  label: string,
  fn: () => Promise<T>,
  sink: MetricSink = {}
): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    const duration = Date.now() - start;
    emitMetric(label, { duration_ms: duration, success }, sink);
  }
}
