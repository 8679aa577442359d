// ─── Categorical Encoder: identifier ⇄ dense integer code ───────────────────

import { UnseenEntityError } from "./errors";
import type { EncoderTable, EntityEncoders, KeyColumn, PanelRecord, UnseenEntityPolicy } from "./types";

export const UNKNOWN_CODE = -1;

/** Codes follow the sorted order of the distinct identifiers. */
export function fitEncoder(values: Iterable<string>): EncoderTable {
  const sorted = [...new Set(values)].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  return Object.freeze({
    values: Object.freeze(sorted),
    codes: new Map(sorted.map((v, i) => [v, i])),
  });
}

export function encode(table: EncoderTable, column: KeyColumn, value: string, policy: UnseenEntityPolicy): number {
  const code = table.codes.get(value);
  if (code !== undefined) return code;
  if (policy === "unknown") return UNKNOWN_CODE;
  throw new UnseenEntityError(column, value);
}

export function decode(table: EncoderTable, column: KeyColumn, code: number): string {
  const value = Number.isInteger(code) && code >= 0 ? table.values[code] : undefined;
  if (value === undefined) throw new UnseenEntityError(column, `code ${code}`);
  return value;
}

export function fitEntityEncoders(panel: readonly PanelRecord[]): EntityEncoders {
  return Object.freeze({
    agency: fitEncoder(panel.map((r) => r.agency)),
    sku: fitEncoder(panel.map((r) => r.sku)),
  });
}

export function encodersToJSON(encoders: EntityEncoders): { agency: string[]; sku: string[] } {
  return { agency: [...encoders.agency.values], sku: [...encoders.sku.values] };
}

export function encodersFromJSON(json: { agency: string[]; sku: string[] }): EntityEncoders {
  return Object.freeze({ agency: fitEncoder(json.agency), sku: fitEncoder(json.sku) });
}
