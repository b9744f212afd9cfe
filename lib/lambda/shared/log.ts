/**
 * Structured summary line: one JSON object per event so CloudWatch Logs
 * Insights can filter on `event`.
 */
export function logEvent(event: string, fields: Record<string, unknown> = {}): void {
  console.log(JSON.stringify({ event, ...fields }));
}
