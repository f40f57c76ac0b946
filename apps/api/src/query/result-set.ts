import type { RawField, RawResult } from '../db';

export type Cell =
  | { kind: 'null' }
  | { kind: 'text'; value: string }
  | { kind: 'integer'; value: bigint }
  | { kind: 'float'; value: number }
  | { kind: 'decimal'; value: string }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'date'; value: string }
  | { kind: 'timestamp'; value: string };

export type ResultSet = {
  columns: string[];
  rows: Cell[][];
};

export type JsonCell = string | number | boolean | null;

const OID = {
  bool: 16,
  int8: 20,
  int2: 21,
  int4: 23,
  float4: 700,
  float8: 701,
  numeric: 1700,
  date: 1082,
  time: 1083,
  timestamp: 1114,
  timestamptz: 1184,
  timetz: 1266,
} as const;

const INTEGER_OIDS: ReadonlySet<number> = new Set([OID.int2, OID.int4, OID.int8]);
const TIME_OIDS: ReadonlySet<number> = new Set([OID.time, OID.timestamp, OID.timestamptz, OID.timetz]);

function asText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (Buffer.isBuffer(value)) return `\\x${value.toString('hex')}`;
  return String(value);
}

function asBoolean(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (value === 't' || value === 'true') return true;
  if (value === 'f' || value === 'false') return false;
  return undefined;
}

/**
 * Tags a column value using its type OID. Values arrive as the server's text
 * (see `SERVER_TEXT_TYPES`); numbers and booleans are read from that text and
 * everything else keeps it verbatim.
 */
export function toCell(value: unknown, field: RawField): Cell {
  if (value === null || value === undefined) return { kind: 'null' };
  const oid = field.dataTypeID;

  if (INTEGER_OIDS.has(oid) && (typeof value === 'number' || typeof value === 'string')) {
    return { kind: 'integer', value: BigInt(value) };
  }
  if (oid === OID.float4 || oid === OID.float8) {
    if (typeof value === 'number') return { kind: 'float', value };
    if (typeof value === 'string') return { kind: 'float', value: Number(value) };
  }
  if (oid === OID.bool) {
    const flag = asBoolean(value);
    if (flag !== undefined) return { kind: 'boolean', value: flag };
  }
  if (oid === OID.numeric && typeof value === 'string') return { kind: 'decimal', value };
  if (oid === OID.date && typeof value === 'string') return { kind: 'date', value };
  if (TIME_OIDS.has(oid) && typeof value === 'string') return { kind: 'timestamp', value };
  return { kind: 'text', value: asText(value) };
}

export function toResultSet(raw: RawResult): ResultSet {
  return {
    columns: raw.fields.map((f) => f.name),
    rows: raw.rows.map((row) => raw.fields.map((field, i) => toCell(row[i], field))),
  };
}

/** The one string form of a cell, shared by the table view and every export. */
export function formatCell(cell: Cell): string {
  switch (cell.kind) {
    case 'null':
      return '';
    case 'integer':
    case 'float':
      return String(cell.value);
    case 'boolean':
      return cell.value ? 'true' : 'false';
    default:
      return cell.value;
  }
}

/** Native spreadsheet/JSON number for a cell, when it has an exact one. */
export function numericValue(cell: Cell): number | undefined {
  if (cell.kind === 'integer') {
    const n = Number(cell.value);
    return Number.isSafeInteger(n) ? n : undefined;
  }
  if (cell.kind === 'float' && Number.isFinite(cell.value)) return cell.value;
  return undefined;
}

export function toJsonCell(cell: Cell): JsonCell {
  if (cell.kind === 'null') return null;
  if (cell.kind === 'boolean') return cell.value;
  return numericValue(cell) ?? formatCell(cell);
}
