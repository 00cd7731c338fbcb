type AuditEvent = {
  ts?: string;
  level: "info" | "warn" | "error";
  event: string;
  route?: string;
  requestId?: string;
  status?: number;
  durationMs?: number;
  detail?: string;
};

export function logAudit(event: AuditEvent): void {
  const line = JSON.stringify({ ...event, ts: event.ts || new Date().toISOString() });
  if (event.level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

export function auditApiCall(route: string, status: number, durationMs: number, requestId?: string): void {
  logAudit({
    level: status >= 500 ? "error" : status >= 400 ? "warn" : "info",
    event: "api_call",
    route,
    requestId,
    status,
    durationMs,
  });
}
