// ─── Panel Loader: CSV → normalized, sorted (agency, sku, date) panel ───────

import { readFile } from "fs/promises";
import Papa from "papaparse";
import { format, isValid, parseISO } from "date-fns";
import { ParseError, SchemaError } from "./errors";
import { getLogger } from "./logger";
import {
  DATE_COLUMN,
  KEY_COLUMNS,
  TARGET_COLUMN,
  type PanelInfo,
  type PanelRecord,
  type PanelSchema,
  type RawRow,
} from "./types";

const log = getLogger("panel-loader");

// Index and bookkeeping columns carried by exported datasets
export const BOOKKEEPING_COLUMNS = ["", "Unnamed: 0", "timeseries"];

// ═══════════════════════════════════════════════════════════════════════════════
// Parsing
// ═══════════════════════════════════════════════════════════════════════════════

export function parsePanelCsv(text: string): RawRow[] {
  const parsed = Papa.parse<RawRow>(text, { header: true, skipEmptyLines: true });
  if (parsed.errors.length) {
    const first = parsed.errors[0];
    throw new ParseError(`CSV row ${first.row ?? "?"}: ${first.message}`);
  }
  return parsed.data;
}

export async function loadPanelCsv(path: string): Promise<RawRow[]> {
  const text = await readFile(path, "utf-8");
  const rows = parsePanelCsv(text);
  log.info("Loaded CSV", { path, rows: rows.length });
  return rows;
}

export function parseDate(raw: string | undefined): Date {
  const value = (raw ?? "").trim();
  // Accept a trailing time component ("2017-01-01 00:00:00")
  const date = parseISO(value.replace(" ", "T"));
  if (!value || !isValid(date)) throw new ParseError(`Malformed date "${value}"`);
  return date;
}

export function formatDate(date: Date): string {
  return format(date, "yyyy-MM-dd");
}

function parseNumber(raw: string | undefined, column: string): number | null {
  const value = (raw ?? "").trim();
  if (value === "" || value.toLowerCase() === "nan") return null;
  const n = Number(value);
  if (!Number.isFinite(n)) throw new ParseError(`Column ${column}: "${value}" is not a number`);
  return n;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Schema (fixed once, at training time)
// ═══════════════════════════════════════════════════════════════════════════════

export function inferSchema(rows: RawRow[], exogenousColumns: string[]): PanelSchema {
  const present = new Set(rows.flatMap((r) => Object.keys(r)));
  const reserved = new Set<string>([...KEY_COLUMNS, DATE_COLUMN, TARGET_COLUMN, ...BOOKKEEPING_COLUMNS]);
  const ignoredColumns = [...present].filter((c) => !reserved.has(c) && !exogenousColumns.includes(c)).sort();
  if (ignoredColumns.length) log.info("Ignoring undeclared columns", { columns: ignoredColumns });

  const kept: string[] = [];
  const droppedConstantColumns: string[] = [];
  for (const col of exogenousColumns) {
    const distinct = new Set(rows.map((r) => (r[col] ?? "").trim()));
    if (distinct.size <= 1) droppedConstantColumns.push(col);
    else kept.push(col);
  }

  if (droppedConstantColumns.length) {
    log.info("Dropping constant columns", { columns: droppedConstantColumns });
  }
  return { exogenousColumns: kept, droppedConstantColumns, ignoredColumns };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Normalization
// ═══════════════════════════════════════════════════════════════════════════════

export function compareRecords(a: PanelRecord, b: PanelRecord): number {
  if (a.agency !== b.agency) return a.agency < b.agency ? -1 : 1;
  if (a.sku !== b.sku) return a.sku < b.sku ? -1 : 1;
  return a.date.getTime() - b.date.getTime();
}

export function sortPanel(panel: readonly PanelRecord[]): PanelRecord[] {
  return [...panel].sort(compareRecords);
}

export function entityId(r: { agency: string; sku: string }): string {
  return JSON.stringify([r.agency, r.sku]);
}

export function assertSorted(panel: readonly PanelRecord[]): void {
  for (let i = 1; i < panel.length; i++) {
    if (compareRecords(panel[i - 1], panel[i]) >= 0) {
      throw new SchemaError(
        `Panel is not strictly ordered by (agency, sku, date) at row ${i}: ` +
          `${entityId(panel[i])} ${formatDate(panel[i].date)}`,
      );
    }
  }
}

export function assertUnique(panel: readonly PanelRecord[]): void {
  const seen = new Set<string>();
  let duplicates = 0;
  for (const r of panel) {
    const key = `${entityId(r)}@${r.date.getTime()}`;
    if (seen.has(key)) duplicates++;
    else seen.add(key);
  }
  if (duplicates > 0) throw new SchemaError(`Found ${duplicates} duplicated (agency, sku, date) rows.`);
}

export interface NormalizeOptions {
  requireTarget: boolean;
}

export function normalizePanel(
  rows: RawRow[],
  schema: PanelSchema,
  { requireTarget }: NormalizeOptions,
): PanelRecord[] {
  let missingTarget = 0;
  const panel = rows.map((r, i): PanelRecord => {
    const agency = (r.agency ?? "").trim();
    const sku = (r.sku ?? "").trim();
    if (!agency || !sku) throw new SchemaError(`Row ${i + 1} is missing agency or sku`);

    const volume = parseNumber(r[TARGET_COLUMN], TARGET_COLUMN);
    if (volume === null) missingTarget++;

    const exogenous: Record<string, number | null> = {};
    for (const col of schema.exogenousColumns) exogenous[col] = parseNumber(r[col], col);

    return { agency, sku, date: parseDate(r[DATE_COLUMN]), volume, exogenous };
  });

  if (requireTarget && missingTarget > 0) {
    throw new SchemaError(`Found ${missingTarget} missing values in target.`);
  }
  assertUnique(panel);
  return sortPanel(panel);
}

export function describePanel(panel: readonly PanelRecord[], schema: PanelSchema): PanelInfo {
  let min: Date | null = null;
  let max: Date | null = null;
  for (const r of panel) {
    if (!min || r.date < min) min = r.date;
    if (!max || r.date > max) max = r.date;
  }
  return {
    rowCount: panel.length,
    columnCount: KEY_COLUMNS.length + 2 + schema.exogenousColumns.length,
    dateRange: min && max ? { min: formatDate(min), max: formatDate(max) } : null,
    agencyCount: new Set(panel.map((r) => r.agency)).size,
    skuCount: new Set(panel.map((r) => r.sku)).size,
  };
}
