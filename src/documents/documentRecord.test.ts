import test from "node:test";
import assert from "node:assert/strict";
import type { EvaluationContext, RawDocumentRow } from "../types.js";
import { buildDocumentRecord, statusFor } from "./documentRecord.js";

const ctx: EvaluationContext = {
  referenceDate: { year: 2025, month: 6, day: 1 },
  threshold: 30,
  offsets: [60, 30, 10, 7, 1],
  dateFormat: "YYYY-MM-DD"
};

function row(partial: Partial<RawDocumentRow>): RawDocumentRow {
  return { row: 2, personName: "张三", documentType: "护照", startDate: "", expiryDate: "", remarks: "", ...partial };
}

function build(partial: Partial<RawDocumentRow>) {
  const out = buildDocumentRecord(row(partial), ctx);
  if (out.kind !== "record") throw new Error(`expected a record, got ${out.skip.reason}`);
  return out;
}

test("exact offsets trigger reminders; other days do not", () => {
  const cases: [string, number, boolean, string][] = [
    ["2025-07-31", 60, true, "valid"],
    ["2025-07-01", 30, true, "expiring_soon"],
    ["2025-06-03", 2, false, "expiring_soon"],
    ["2025-06-02", 1, true, "expiring_soon"],
    ["2025-06-01", 0, false, "expiring_soon"],
    ["2025-05-27", -5, false, "expired"]
  ];
  for (const [expiryDate, daysLeft, needsReminder, status] of cases) {
    const { record } = build({ expiryDate });
    assert.equal(record.daysLeft, daysLeft, expiryDate);
    assert.equal(record.needsReminder, needsReminder, expiryDate);
    assert.equal(record.status, status, expiryDate);
  }
});

test("processed remark suppresses the reminder; in-progress keeps it", () => {
  assert.equal(build({ expiryDate: "2025-07-01", remarks: " 已办理 " }).record.needsReminder, false);
  const inProgress = build({ expiryDate: "2025-07-01", remarks: "办理中" }).record;
  assert.equal(inProgress.needsReminder, true);
  assert.equal(inProgress.remarkState, "in_progress");
});

test("records are frozen and trimmed", () => {
  const { record } = build({ personName: "  李四 ", documentType: " 签证", expiryDate: "2025-07-01" });
  assert.equal(record.personName, "李四");
  assert.equal(record.documentType, "签证");
  assert.equal(Object.isFrozen(record), true);
});

test("rows without a name, type or valid expiry date are skipped", () => {
  const reasons = [
    row({ personName: " ", expiryDate: "2025-07-01" }),
    row({ documentType: "", expiryDate: "2025-07-01" }),
    row({ expiryDate: "" }),
    row({ expiryDate: "9999-99-99" })
  ].map((r) => {
    const out = buildDocumentRecord(r, ctx);
    return out.kind === "skipped" ? out.skip.reason : "record";
  });
  assert.deepEqual(reasons, [
    "姓名(person_name)为空",
    "证件类型(document_type)为空",
    "到期日期(expiry_date)为空",
    '到期日期无效：日期 "9999-99-99" 的月份 99 无效'
  ]);
});

test("start date with an unreadable layout skips the row", () => {
  const out = buildDocumentRecord(row({ startDate: "2025/01/01", expiryDate: "2025-07-01" }), ctx);
  assert.equal(out.kind, "skipped");
  if (out.kind === "skipped") assert.equal(out.skip.raw, "2025/01/01");
});

test("calendar-invalid start date is dropped with a warning", () => {
  const out = build({ startDate: "2025-02-30", expiryDate: "2025-07-01" });
  assert.equal(out.record.startDate, undefined);
  assert.deepEqual(out.warnings, ['开始日期无效，已忽略：日期 "2025-02-30" 的日 30 无效']);
});

test("start date on or after expiry warns and keeps the record", () => {
  const out = build({ startDate: "2025-07-01", expiryDate: "2025-07-01" });
  assert.deepEqual(out.record.startDate, { year: 2025, month: 7, day: 1 });
  assert.deepEqual(out.warnings, ["开始日期不早于到期日期"]);
});

test("status partition is exhaustive and exclusive", () => {
  for (let d = -3; d <= 35; d++) {
    const s = statusFor(d, 30);
    const expected = d < 0 ? "expired" : d <= 30 ? "expiring_soon" : "valid";
    assert.equal(s, expected, String(d));
  }
  assert.equal(statusFor(0, 0), "expiring_soon");
  assert.equal(statusFor(1, 0), "valid");
});
