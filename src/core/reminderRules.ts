import type { DocumentRecord, ReminderBatch } from "../types.js";

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Records due today, soonest first; ties by person then document type. */
export function selectReminderBatch(records: readonly DocumentRecord[]): ReminderBatch {
  return records
    .filter((r) => r.needsReminder)
    .sort(
      (a, b) =>
        a.daysLeft - b.daysLeft ||
        compareText(a.personName, b.personName) ||
        compareText(a.documentType, b.documentType)
    );
}

export type BatchSummary = {
  totalCount: number;
  byDaysLeft: Record<string, number>;
  byPerson: Record<string, number>;
  byDocumentType: Record<string, number>;
};

function bump(map: Record<string, number>, key: string): void {
  map[key] = (map[key] ?? 0) + 1;
}

export function summarizeBatch(batch: ReminderBatch): BatchSummary {
  const summary: BatchSummary = { totalCount: batch.length, byDaysLeft: {}, byPerson: {}, byDocumentType: {} };
  for (const r of batch) {
    bump(summary.byDaysLeft, daysLeftLabel(r.daysLeft));
    bump(summary.byPerson, r.personName);
    bump(summary.byDocumentType, r.documentType);
  }
  return summary;
}

export function daysLeftLabel(daysLeft: number): string {
  if (daysLeft < 0) return `已过期 ${Math.abs(daysLeft)} 天`;
  if (daysLeft === 0) return "今天到期";
  if (daysLeft === 1) return "明天到期";
  return `${daysLeft} 天后到期`;
}

export function urgencyColor(daysLeft: number): string {
  if (daysLeft <= 1) return "#dc3545";
  if (daysLeft <= 7) return "#fd7e14";
  if (daysLeft <= 30) return "#ffc107";
  return "#28a745";
}
