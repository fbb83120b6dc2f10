import type {
  CalendarDate,
  DocumentRecord,
  DocumentStatus,
  EvaluationContext,
  RawDocumentRow,
  RemarkState,
  SkippedRow
} from "../types.js";
import { compileDateFormat, daysBetween, parseDate } from "./dateFormat.js";

export const REMARK_PROCESSED = "已办理";
export const REMARK_IN_PROGRESS = "办理中";

export type BuildOutcome =
  | { kind: "record"; record: DocumentRecord; warnings: string[] }
  | { kind: "skipped"; skip: SkippedRow };

export function remarkStateOf(remarks: string): RemarkState {
  const r = remarks.trim();
  if (r === REMARK_PROCESSED) return "processed";
  if (r === REMARK_IN_PROGRESS) return "in_progress";
  return "none";
}

export function statusFor(daysLeft: number, threshold: number): DocumentStatus {
  if (daysLeft < 0) return "expired";
  if (daysLeft <= threshold) return "expiring_soon";
  return "valid";
}

export function needsReminderFor(daysLeft: number, offsets: readonly number[], remarkState: RemarkState): boolean {
  if (remarkState === "processed") return false;
  if (daysLeft < 0) return false;
  return offsets.includes(daysLeft);
}

function skipped(row: number, reason: string, raw?: string): BuildOutcome {
  return { kind: "skipped", skip: { row, reason, raw } };
}

export function buildDocumentRecord(input: RawDocumentRow, ctx: EvaluationContext): BuildOutcome {
  const personName = input.personName.trim();
  const documentType = input.documentType.trim();
  if (!personName) return skipped(input.row, "姓名(person_name)为空");
  if (!documentType) return skipped(input.row, "证件类型(document_type)为空");

  const format = compileDateFormat(ctx.dateFormat);
  const expiry = parseDate(input.expiryDate, format, input.row);
  if (!expiry.ok) {
    const reason = expiry.error.kind === "empty" ? "到期日期(expiry_date)为空" : `到期日期无效：${expiry.error.message}`;
    return skipped(input.row, reason, expiry.error.raw);
  }

  const warnings: string[] = [];
  let startDate: CalendarDate | undefined;
  if (input.startDate.trim()) {
    const start = parseDate(input.startDate, format, input.row);
    if (start.ok) {
      startDate = start.value;
    } else if (start.error.kind === "format") {
      return skipped(input.row, `开始日期无法识别：${start.error.message}`, start.error.raw);
    } else {
      warnings.push(`开始日期无效，已忽略：${start.error.message}`);
    }
  }
  if (startDate && daysBetween(startDate, expiry.value) <= 0) {
    warnings.push("开始日期不早于到期日期");
  }

  const remarks = input.remarks.trim();
  const remarkState = remarkStateOf(remarks);
  const daysLeft = daysBetween(ctx.referenceDate, expiry.value);

  const record: DocumentRecord = Object.freeze({
    row: input.row,
    personName,
    documentType,
    startDate,
    expiryDate: expiry.value,
    remarks,
    remarkState,
    daysLeft,
    status: statusFor(daysLeft, ctx.threshold),
    needsReminder: needsReminderFor(daysLeft, ctx.offsets, remarkState)
  });
  return { kind: "record", record, warnings };
}
