import fs from "node:fs";
import { ConfigurationError } from "../errors.js";
import { documentsLogger, type Logger } from "../logger.js";
import type { DocumentRecord, EvaluationContext, RawDocumentRow, SkippedRow } from "../types.js";
import { parseCsv } from "../utils/csv.js";
import { buildDocumentRecord } from "./documentRecord.js";

export const REQUIRED_COLUMNS = ["person_name", "document_type", "expiry_date"] as const;
export const OPTIONAL_COLUMNS = ["start_date", "remarks"] as const;

export type LoadedDocuments = {
  records: DocumentRecord[];
  skipped: SkippedRow[];
  warnings: { row: number; message: string }[];
};

export function parseDocumentCsv(text: string, source = "CSV"): RawDocumentRow[] {
  const lines = parseCsv(text);
  const head = lines[0];
  if (!head) throw new ConfigurationError(`${source}: 文件为空或缺少表头`);

  const header = head.cells.map((c) => c.trim());
  const missing = REQUIRED_COLUMNS.filter((c) => !header.includes(c));
  if (missing.length) throw new ConfigurationError(`${source}: 缺少必需列 ${missing.join(", ")}`);

  const col = (name: string) => header.indexOf(name);
  const iName = col("person_name");
  const iType = col("document_type");
  const iStart = col("start_date");
  const iExpiry = col("expiry_date");
  const iRemarks = col("remarks");
  const cell = (cells: string[], i: number) => (i >= 0 ? cells[i] ?? "" : "");

  return lines.slice(1).map((l) => ({
    row: l.line,
    personName: cell(l.cells, iName),
    documentType: cell(l.cells, iType),
    startDate: cell(l.cells, iStart),
    expiryDate: cell(l.cells, iExpiry),
    remarks: cell(l.cells, iRemarks)
  }));
}

export function evaluateDocuments(rows: readonly RawDocumentRow[], ctx: EvaluationContext): LoadedDocuments {
  const out: LoadedDocuments = { records: [], skipped: [], warnings: [] };
  for (const row of rows) {
    const built = buildDocumentRecord(row, ctx);
    if (built.kind === "skipped") {
      out.skipped.push(built.skip);
      continue;
    }
    out.records.push(built.record);
    for (const message of built.warnings) out.warnings.push({ row: row.row, message });
  }
  return out;
}

export function loadDocuments(filePath: string, ctx: EvaluationContext, log: Logger = documentsLogger): LoadedDocuments {
  if (!fs.existsSync(filePath)) throw new ConfigurationError(`data_file: 数据文件不存在 ${filePath}`);
  const text = fs.readFileSync(filePath, "utf8");
  const loaded = evaluateDocuments(parseDocumentCsv(text, filePath), ctx);

  for (const s of loaded.skipped) log.warn({ row: s.row, raw: s.raw, reason: s.reason }, "Row skipped");
  for (const w of loaded.warnings) log.warn({ row: w.row, reason: w.message }, "Row warning");
  log.info(
    { filePath, records: loaded.records.length, skipped: loaded.skipped.length },
    "Documents loaded"
  );
  return loaded;
}
