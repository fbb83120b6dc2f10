import fs from "node:fs";
import type { CalendarDate } from "../types.js";
import { renderCsv } from "../utils/csv.js";
import { atomicWriteText } from "../utils/fs.js";
import { addDays, formatDate } from "./dateFormat.js";

type SampleEntry = {
  personName: string;
  documentType: string;
  startOffset: number;
  expiryOffset: number;
  remarks: string;
};

const SAMPLE_ENTRIES: readonly SampleEntry[] = [
  { personName: "张三", documentType: "身份证", startOffset: -3650, expiryOffset: 365, remarks: "研发部" },
  { personName: "李四", documentType: "护照", startOffset: -1825, expiryOffset: 30, remarks: "市场部" },
  { personName: "王五", documentType: "驾驶证", startOffset: -2190, expiryOffset: 7, remarks: "行政部" },
  { personName: "赵六", documentType: "工作许可证", startOffset: -365, expiryOffset: -5, remarks: "办理中" },
  { personName: "钱七", documentType: "健康证", startOffset: -300, expiryOffset: 60, remarks: "食堂" }
];

export const SAMPLE_COLUMNS = ["person_name", "document_type", "start_date", "expiry_date", "remarks"] as const;

/** Sample rows dated relative to `today`, written in the configured input format. */
export function renderSampleCsv(today: CalendarDate, dateFormat: string): string {
  return renderCsv(
    SAMPLE_COLUMNS,
    SAMPLE_ENTRIES.map((e) => [
      e.personName,
      e.documentType,
      formatDate(addDays(today, e.startOffset), dateFormat),
      formatDate(addDays(today, e.expiryOffset), dateFormat),
      e.remarks
    ])
  );
}

export function writeSampleCsv(
  filePath: string,
  today: CalendarDate,
  dateFormat: string,
  opts: { overwrite?: boolean } = {}
): { written: boolean; rows: number } {
  if (!opts.overwrite && fs.existsSync(filePath)) return { written: false, rows: 0 };
  atomicWriteText(filePath, renderSampleCsv(today, dateFormat));
  return { written: true, rows: SAMPLE_ENTRIES.length };
}
