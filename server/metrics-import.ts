import { XMLParser } from "fast-xml-parser";
import { isValidDateString } from "../lib/dates";
import { parseCSV } from "../lib/csv";
import { MAX_STORED_INT, type HealthStore, type NewHealthMetric } from "./types/health";

export type ImportFormat = "csv" | "json" | "xml";

export const IMPORT_FORMATS: readonly ImportFormat[] = ["csv", "json", "xml"];

export interface MetricRowInput {
  date: string;
  steps: number;
  calories: number;
}

export interface ImportResult {
  status: "ok";
  format: ImportFormat;
  person: string;
  rowsImported: number;
  dateRange: { start: string; end: string } | null;
}

export interface ImportPreview {
  format: ImportFormat;
  rowCount: number;
  rows: MetricRowInput[];
}

export class MetricsImportError extends Error {
  constructor(
    public readonly format: ImportFormat,
    message: string,
  ) {
    super(`${format.toUpperCase()} import failed: ${message}`);
    this.name = "MetricsImportError";
  }
}

const HEADER_ALIASES: Record<string, string> = {
  date: "date",
  day: "date",
  steps: "steps",
  step_count: "steps",
  stepcount: "steps",
  "step count": "steps",
  calories: "calories",
  calorie_count: "calories",
  kcal: "calories",
};

const REQUIRED_FIELDS = ["date", "steps", "calories"] as const;
type RequiredField = (typeof REQUIRED_FIELDS)[number];

const PREVIEW_ROWS = 5;

function normalizeHeader(raw: string): string {
  const cleaned = raw.toLowerCase().replace(/[^a-z0-9_ ]/g, "").trim();
  return HEADER_ALIASES[cleaned] || cleaned;
}

export function normalizeDate(value: unknown): string | null {
  if (typeof value === "number") {
    if (!Number.isFinite(value)) return null;
    const d = new Date(value);
    return isNaN(d.getTime()) ? null : d.toISOString().slice(0, 10);
  }
  if (typeof value !== "string") return null;
  const s = value.trim();
  const slashed = s.match(/^(\d{4})\/(\d{2})\/(\d{2})$/);
  const candidate = slashed ? `${slashed[1]}-${slashed[2]}-${slashed[3]}` : s.slice(0, 10);
  if (!isValidDateString(candidate)) return null;
  if (!slashed && s.length > 10 && !/^[T ]/.test(s.slice(10))) return null;
  return candidate;
}

function parseCount(value: unknown): number | null {
  let n: number;
  if (typeof value === "number") {
    n = value;
  } else if (typeof value === "string" && value.trim() !== "") {
    n = Number(value.trim());
  } else {
    return null;
  }
  if (!Number.isFinite(n) || n < 0) return null;
  const count = Math.trunc(n);
  return count <= MAX_STORED_INT ? count : null;
}

/** Every format rejects a file that carries no data rows. */
function requireRows(format: ImportFormat, rows: unknown[]): void {
  if (rows.length === 0) {
    throw new MetricsImportError(format, "file contains no rows");
  }
}

function isMissing(value: unknown): boolean {
  return value == null || (typeof value === "string" && value.trim() === "");
}

/** Validates one raw row; any problem rejects the whole file. */
function validateRow(
  format: ImportFormat,
  raw: Partial<Record<RequiredField, unknown>>,
  rowNumber: number,
): MetricRowInput {
  const missing = REQUIRED_FIELDS.filter((f) => isMissing(raw[f]));
  if (missing.length > 0) {
    throw new MetricsImportError(format, `row ${rowNumber} is missing ${missing.join(", ")}`);
  }
  const date = normalizeDate(raw.date);
  if (!date) {
    throw new MetricsImportError(format, `row ${rowNumber} has an invalid date "${String(raw.date)}"`);
  }
  const steps = parseCount(raw.steps);
  if (steps == null) {
    throw new MetricsImportError(format, `row ${rowNumber} has invalid steps "${String(raw.steps)}"`);
  }
  const calories = parseCount(raw.calories);
  if (calories == null) {
    throw new MetricsImportError(format, `row ${rowNumber} has invalid calories "${String(raw.calories)}"`);
  }
  return { date, steps, calories };
}

export function parseMetricsCSV(text: string): MetricRowInput[] {
  const clean = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const rows = parseCSV(clean);
  if (rows.length === 0) {
    throw new MetricsImportError("csv", "file is empty");
  }

  const headers = rows[0].map(normalizeHeader);
  const missingCols = REQUIRED_FIELDS.filter((f) => !headers.includes(f));
  if (missingCols.length > 0) {
    throw new MetricsImportError("csv", `header is missing column(s): ${missingCols.join(", ")}`);
  }
  const colMap: Record<string, number> = {};
  headers.forEach((h, i) => {
    if (!(h in colMap)) colMap[h] = i;
  });

  const body = rows.slice(1);
  requireRows("csv", body);
  return body.map((row, i) =>
    validateRow(
      "csv",
      {
        date: row[colMap.date],
        steps: row[colMap.steps],
        calories: row[colMap.calories],
      },
      i + 1,
    ),
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseMetricsJSON(text: string): MetricRowInput[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new MetricsImportError("json", err instanceof Error ? err.message : "malformed JSON");
  }
  if (!Array.isArray(parsed)) {
    throw new MetricsImportError("json", "top-level value must be an array of objects with date, steps, calories");
  }
  requireRows("json", parsed);
  return parsed.map((item: unknown, i) => {
    if (!isRecord(item)) {
      throw new MetricsImportError("json", `row ${i + 1} is not an object`);
    }
    return validateRow("json", { date: item.date, steps: item.steps, calories: item.calories }, i + 1);
  });
}

const xmlParser = new XMLParser({
  parseTagValue: false,
  ignoreAttributes: true,
  trimValues: true,
  isArray: (name) => name === "row",
});

function collectRows(node: unknown, out: unknown[]): void {
  if (Array.isArray(node)) {
    for (const child of node) collectRows(child, out);
    return;
  }
  if (!isRecord(node)) return;
  for (const [key, value] of Object.entries(node)) {
    if (key === "row" && Array.isArray(value)) {
      out.push(...value);
    } else {
      collectRows(value, out);
    }
  }
}

export function parseMetricsXML(text: string): MetricRowInput[] {
  let doc: unknown;
  try {
    doc = xmlParser.parse(text, true);
  } catch (err) {
    throw new MetricsImportError("xml", err instanceof Error ? err.message : "malformed XML");
  }
  const rawRows: unknown[] = [];
  collectRows(doc, rawRows);
  requireRows("xml", rawRows);
  return rawRows.map((row, i) => {
    const fields = isRecord(row) ? row : {};
    return validateRow("xml", { date: fields.date, steps: fields.steps, calories: fields.calories }, i + 1);
  });
}

export function detectFormat(filename: string | undefined, explicit?: string): ImportFormat | null {
  const candidate = (explicit || filename?.split(".").pop() || "").toLowerCase();
  return IMPORT_FORMATS.find((f) => f === candidate) ?? null;
}

export function parseMetricsFile(format: ImportFormat, text: string): MetricRowInput[] {
  switch (format) {
    case "csv":
      return parseMetricsCSV(text);
    case "json":
      return parseMetricsJSON(text);
    case "xml":
      return parseMetricsXML(text);
  }
}

export function previewMetricsFile(format: ImportFormat, text: string): ImportPreview {
  const rows = parseMetricsFile(format, text);
  return { format, rowCount: rows.length, rows: rows.slice(0, PREVIEW_ROWS) };
}

export async function importMetricsFile(
  store: HealthStore,
  format: ImportFormat,
  text: string,
  person: string,
): Promise<ImportResult> {
  const rows = parseMetricsFile(format, text);
  const records: NewHealthMetric[] = rows.map((r) => ({ person, ...r }));
  const rowsImported = await store.addMetrics(records);

  let start: string | null = null;
  let end: string | null = null;
  for (const r of rows) {
    if (!start || r.date < start) start = r.date;
    if (!end || r.date > end) end = r.date;
  }

  console.log(`[import] ${format}: ${rowsImported} row(s) for ${person}`);
  return {
    status: "ok",
    format,
    person,
    rowsImported,
    dateRange: start && end ? { start, end } : null,
  };
}
