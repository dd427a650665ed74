/**
 * Structured JSON log line for log aggregators
 */
export function logEvent(event: string, extra?: Record<string, unknown>): void {
  console.log(
    JSON.stringify({
      event,
      ...extra,
      timestamp: new Date().toISOString(),
    })
  );
}
