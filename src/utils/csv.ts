export type CsvLine = {
  /** 1-based line number where the record starts. */
  line: number;
  cells: string[];
};

export function csvEscape(value: unknown): string {
  const s = String(value ?? "");
  if (!/[,"\r\n]/.test(s)) return s;
  return `"${s.replace(/"/g, '""')}"`;
}

export function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * RFC 4180 style: quoted fields may contain commas, newlines and doubled quotes.
 * Records made only of whitespace are dropped; line numbers keep counting.
 */
export function parseCsv(text: string): CsvLine[] {
  const src = stripBom(text);
  const out: CsvLine[] = [];
  let cells: string[] = [];
  let cur = "";
  let inQuotes = false;
  let line = 1;
  let startLine = 1;

  const endRecord = () => {
    cells.push(cur);
    if (cells.some((c) => c.trim() !== "")) out.push({ line: startLine, cells });
    cells = [];
    cur = "";
  };

  for (let i = 0; i < src.length; i++) {
    const ch = src[i];
    if (inQuotes) {
      if (ch === '"') {
        if (src[i + 1] === '"') {
          cur += '"';
          i++;
          continue;
        }
        inQuotes = false;
        continue;
      }
      if (ch === "\n") line++;
      cur += ch;
      continue;
    }
    if (ch === '"') {
      inQuotes = true;
      continue;
    }
    if (ch === ",") {
      cells.push(cur);
      cur = "";
      continue;
    }
    if (ch === "\r") continue;
    if (ch === "\n") {
      endRecord();
      line++;
      startLine = line;
      continue;
    }
    cur += ch;
  }
  if (cur !== "" || cells.length) endRecord();
  return out;
}

export function renderCsv(header: readonly string[], rows: readonly (readonly unknown[])[]): string {
  const lines = [header.map(csvEscape).join(",")];
  for (const r of rows) lines.push(r.map(csvEscape).join(","));
  return lines.join("\n") + "\n";
}
