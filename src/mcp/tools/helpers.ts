import type { AppConfig } from "../../config.js";
import { evaluateDocuments, parseDocumentCsv, type LoadedDocuments } from "../../documents/csvLoader.js";
import { calendarDateOf, parseDate } from "../../documents/dateFormat.js";
import { ConfigurationError } from "../../errors.js";
import type { CalendarDate, EvaluationContext } from "../../types.js";
import { errorMessage } from "../../utils/async.js";
import { readTextIfExists } from "../../utils/fs.js";

export type DocumentSnapshot = { ctx: EvaluationContext; loaded: LoadedDocuments };

/** Tool-side load: reads the data file fresh on each call and never logs, since stdout carries the protocol. */
export function readSnapshot(config: AppConfig, referenceDate: CalendarDate): DocumentSnapshot {
  const text = readTextIfExists(config.dataFile);
  if (text === null) throw new ConfigurationError(`data_file: 数据文件不存在 ${config.dataFile}`);
  const ctx: EvaluationContext = {
    referenceDate,
    threshold: config.report.threshold,
    offsets: config.reminder.offsets,
    dateFormat: config.dateFormat
  };
  return { ctx, loaded: evaluateDocuments(parseDocumentCsv(text, config.dataFile), ctx) };
}

/** `YYYY-MM-DD`, or today when empty. */
export function referenceDateOf(raw: string | undefined, now: Date): CalendarDate {
  const s = (raw ?? "").trim();
  if (!s) return calendarDateOf(now);
  const parsed = parseDate(s, "YYYY-MM-DD");
  if (!parsed.ok) throw new ConfigurationError(`date: ${parsed.error.message}`);
  return parsed.value;
}

export function textResult(text: string) {
  return { content: [{ type: "text" as const, text }] };
}

export function errorResult(err: unknown) {
  const text = err instanceof ConfigurationError ? err.issues.join("\n") : errorMessage(err);
  return { content: [{ type: "text" as const, text: `错误：${text}` }], isError: true };
}
