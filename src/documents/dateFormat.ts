import { ConfigurationError } from "../errors.js";
import type { CalendarDate } from "../types.js";

export const MIN_YEAR = 1900;
export const MAX_YEAR = 2100;

const MS_PER_DAY = 86_400_000;

export type DateErrorKind = "empty" | "format" | "calendar" | "range";

export type DateError = {
  kind: DateErrorKind;
  raw: string;
  row?: number;
  message: string;
};

export type DateResult = { ok: true; value: CalendarDate } | { ok: false; error: DateError };

type Token = "YYYY" | "MM" | "DD";

type Piece = { kind: "token"; token: Token } | { kind: "literal"; text: string };

export type CompiledDateFormat = {
  pattern: string;
  regex: RegExp;
  order: Token[];
};

const TOKENS: readonly Token[] = ["YYYY", "MM", "DD"];

const compiled = new Map<string, CompiledDateFormat>();

function tokenize(pattern: string): Piece[] {
  const out: Piece[] = [];
  let literal = "";
  let i = 0;
  while (i < pattern.length) {
    const rest = pattern.slice(i);
    const token = TOKENS.find((t) => rest.startsWith(t));
    if (!token) {
      literal += pattern[i];
      i++;
      continue;
    }
    if (literal) {
      out.push({ kind: "literal", text: literal });
      literal = "";
    }
    out.push({ kind: "token", token });
    i += token.length;
  }
  if (literal) out.push({ kind: "literal", text: literal });
  return out;
}

function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function pad(n: number, width: number): string {
  return String(n).padStart(width, "0");
}

/**
 * Compile a pattern such as `DD/MM/YYYY` or `YYYYMMDD`.
 * MM and DD take one or two digits between literals, exactly two next to another token.
 */
export function compileDateFormat(pattern: string): CompiledDateFormat {
  const hit = compiled.get(pattern);
  if (hit) return hit;

  const pieces = tokenize(pattern);
  const order = pieces.flatMap((p) => (p.kind === "token" ? [p.token] : []));
  const missing = TOKENS.filter((t) => !order.includes(t));
  if (missing.length || order.length !== TOKENS.length) {
    throw new ConfigurationError(`日期格式 "${pattern}" 必须且只能包含 YYYY、MM、DD 各一次`);
  }

  let source = "^";
  pieces.forEach((p, i) => {
    if (p.kind === "literal") {
      source += escapeRegex(p.text);
      return;
    }
    if (p.token === "YYYY") {
      source += "(\\d{4})";
      return;
    }
    const adjacent = pieces[i - 1]?.kind === "token" || pieces[i + 1]?.kind === "token";
    source += adjacent ? "(\\d{2})" : "(\\d{1,2})";
  });
  source += "$";

  const out: CompiledDateFormat = { pattern, regex: new RegExp(source), order };
  compiled.set(pattern, out);
  return out;
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function fail(kind: DateErrorKind, raw: string, row: number | undefined, message: string): DateResult {
  return { ok: false, error: { kind, raw, row, message } };
}

export function parseDate(raw: string, format: string | CompiledDateFormat, row?: number): DateResult {
  const s = String(raw ?? "").trim();
  if (!s) return fail("empty", s, row, "日期为空");

  let fmt: CompiledDateFormat;
  try {
    fmt = typeof format === "string" ? compileDateFormat(format) : format;
  } catch (err) {
    return fail("format", s, row, err instanceof ConfigurationError ? err.issues.join("; ") : String(err));
  }

  const m = fmt.regex.exec(s);
  if (!m) return fail("format", s, row, `日期 "${s}" 不符合格式 ${fmt.pattern}`);

  const parts: Record<Token, number> = { YYYY: 0, MM: 0, DD: 0 };
  fmt.order.forEach((token, i) => {
    parts[token] = Number(m[i + 1]);
  });
  const year = parts.YYYY;
  const month = parts.MM;
  const day = parts.DD;

  if (month < 1 || month > 12) return fail("calendar", s, row, `日期 "${s}" 的月份 ${month} 无效`);
  if (day < 1 || day > daysInMonth(year, month)) return fail("calendar", s, row, `日期 "${s}" 的日 ${day} 无效`);
  if (year < MIN_YEAR || year > MAX_YEAR) {
    return fail("range", s, row, `日期 "${s}" 的年份 ${year} 超出 ${MIN_YEAR}-${MAX_YEAR}`);
  }

  return { ok: true, value: { year, month, day } };
}

export function formatDate(date: CalendarDate, pattern = "YYYY-MM-DD"): string {
  return tokenize(pattern)
    .map((p) => {
      if (p.kind === "literal") return p.text;
      if (p.token === "YYYY") return pad(date.year, 4);
      if (p.token === "MM") return pad(date.month, 2);
      return pad(date.day, 2);
    })
    .join("");
}

export function isoDate(date: CalendarDate): string {
  return formatDate(date, "YYYY-MM-DD");
}

function toEpochDay(d: CalendarDate): number {
  return Math.round(Date.UTC(d.year, d.month - 1, d.day) / MS_PER_DAY);
}

/** Whole calendar days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: CalendarDate, to: CalendarDate): number {
  return toEpochDay(to) - toEpochDay(from);
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  const d = new Date(Date.UTC(date.year, date.month - 1, date.day) + days * MS_PER_DAY);
  return { year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate() };
}

/** Local calendar date of an instant. */
export function calendarDateOf(at: Date): CalendarDate {
  return { year: at.getFullYear(), month: at.getMonth() + 1, day: at.getDate() };
}
