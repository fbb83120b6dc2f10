import { ConfigurationError, DeliveryFailedError } from "../errors.js";
import { STATUSES, STATUS_LABELS } from "../report/statusReport.js";
import type { DeliveryAttempt, DocumentStatus } from "../types.js";

function brief(text: string, max = 160): string {
  const t = text.replace(/\s+/g, " ").trim();
  if (t.length <= max) return t;
  return `${t.slice(0, max)}…`;
}

export function formatAttempt(a: DeliveryAttempt): string {
  if (a.ok) return `OK   ${a.server} #${a.attempt}`;
  return `FAIL ${a.server} #${a.attempt} [${a.stage ?? "unknown"}] ${brief(a.error ?? "")}`;
}

export function printStatusCounts(counts: Record<DocumentStatus, number>, skipped: number): void {
  const parts = STATUSES.map((s) => `${STATUS_LABELS[s]} ${counts[s]}`);
  console.log(`证件统计 : ${parts.join(" / ")}${skipped ? ` (跳过 ${skipped} 行)` : ""}`);
}

export function printDelivery(history: readonly DeliveryAttempt[]): void {
  for (const a of history) console.log(`SMTP ${formatAttempt(a)}`);
}

export function printError(context: string, err: unknown): void {
  if (err instanceof ConfigurationError) {
    console.log(`ERR ${context} : 配置错误`);
    for (const issue of err.issues) console.log(`  - ${issue}`);
    return;
  }
  if (err instanceof DeliveryFailedError) {
    console.log(`ERR ${context} : ${err.message}`);
    printDelivery(err.history);
    return;
  }
  const msg = err instanceof Error ? err.message : String(err);
  console.log(`ERR ${context} : ${msg}`);
}
