import { Data, Either } from "effect";
import { isJsonObject } from "./api/types.ts";
import type { JsonObject, JsonValue } from "./api/types.ts";

export type CellValue = JsonValue | Date;

export type Row = Readonly<Record<string, CellValue>>;

// Every row holds a cell for every column, null where the source had none
export interface Table {
  readonly columns: ReadonlyArray<string>;
  readonly rows: ReadonlyArray<Row>;
}

export type ColumnType = "int" | "float" | "string" | "datetime";

export type DateUnit = "s" | "ms";

export interface CoerceOptions {
  // Epoch unit for numeric datetime cells; without it, strings are parsed by `Date`
  readonly dateUnit?: DateUnit;
}

export interface CoercionFailure {
  readonly column: string;
  readonly type: ColumnType;
  readonly reason: string;
}

export interface Coerced {
  readonly table: Table;
  readonly failures: ReadonlyArray<CoercionFailure>;
}

export class MissingColumnError extends Data.TaggedError("MissingColumnError")<{
  message: string;
  column: string;
}> {}

const missingColumn = (column: string) =>
  new MissingColumnError({ message: `Missing column: ${column}`, column });

export const emptyTable: Table = { columns: [], rows: [] };

// ── Construction ─────────────────────────────────────────────────────────────

const unionKeys = (records: ReadonlyArray<Readonly<Record<string, unknown>>>): string[] => {
  const keys = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) keys.add(key);
  }
  return [...keys];
};

const fillRow = (columns: ReadonlyArray<string>, source: Row): Row => {
  const row: Record<string, CellValue> = {};
  for (const column of columns) {
    row[column] = Object.hasOwn(source, column) ? source[column] : null;
  }
  return row;
};

export const fromRecords = (records: ReadonlyArray<Row>): Table => {
  const columns = unionKeys(records);
  return { columns, rows: records.map((record) => fillRow(columns, record)) };
};

// Nested objects become dotted keys (`image.url`); arrays are kept as values
export const flattenRecord = (record: JsonObject, prefix = ""): Record<string, JsonValue> => {
  const flat: Record<string, JsonValue> = {};
  for (const [key, value] of Object.entries(record)) {
    const name = prefix ? `${prefix}.${key}` : key;
    if (isJsonObject(value)) {
      Object.assign(flat, flattenRecord(value, name));
    } else {
      flat[name] = value;
    }
  }
  return flat;
};

export const flattenColumn = (
  table: Table,
  column: string,
): Either.Either<Table, MissingColumnError> => {
  if (!table.columns.includes(column)) return Either.left(missingColumn(column));

  const expanded = table.rows.map((row) => {
    const cell = row[column];
    return isJsonObject(cell) ? flattenRecord(cell) : {};
  });
  const kept = table.columns.filter((c) => c !== column);
  const columns = [...new Set([...kept, ...unionKeys(expanded)])];

  const rows = table.rows.map((row, i) => fillRow(columns, { ...row, ...expanded[i] }));
  return Either.right({ columns, rows });
};

// ── Coercion ─────────────────────────────────────────────────────────────────

type Converter = (value: CellValue) => Either.Either<CellValue, string>;

const describe = (value: CellValue): string =>
  value instanceof Date ? value.toISOString() : JSON.stringify(value);

const cannot = (value: CellValue, type: ColumnType) =>
  Either.left(`cannot convert ${describe(value)} to ${type}`);

const toInt: Converter = (value) => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Either.right(Math.trunc(value)) : cannot(value, "int");
  }
  if (typeof value === "boolean") return Either.right(value ? 1 : 0);
  if (typeof value === "string" && /^\s*[+-]?\d+\s*$/.test(value)) {
    return Either.right(Number.parseInt(value, 10));
  }
  return cannot(value, "int");
};

const toFloat: Converter = (value) => {
  if (typeof value === "number") return Either.right(value);
  if (typeof value === "boolean") return Either.right(value ? 1 : 0);
  if (value === null) return Either.right(Number.NaN);
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isNaN(parsed) ? cannot(value, "float") : Either.right(parsed);
  }
  return cannot(value, "float");
};

const toText: Converter = (value) => {
  if (value === null || typeof value === "string") return Either.right(value);
  if (value instanceof Date) return Either.right(value.toISOString());
  if (typeof value === "number" || typeof value === "boolean") return Either.right(String(value));
  return Either.right(JSON.stringify(value));
};

const validDate = (date: Date, value: CellValue) =>
  Number.isNaN(date.getTime()) ? cannot(value, "datetime") : Either.right(date);

const UNIT_MS: Record<DateUnit, number> = { s: 1000, ms: 1 };

const toDatetime =
  (unit: DateUnit | undefined): Converter =>
  (value) => {
    if (value === null || value instanceof Date) return Either.right(value);
    if (unit === undefined) {
      return typeof value === "string"
        ? validDate(new Date(value), value)
        : cannot(value, "datetime");
    }
    const offset =
      typeof value === "number" ? value : typeof value === "string" ? Number(value) : Number.NaN;
    if (typeof value === "string" && value.trim() === "") return cannot(value, "datetime");
    return Number.isFinite(offset)
      ? validDate(new Date(offset * UNIT_MS[unit]), value)
      : cannot(value, "datetime");
  };

const converterFor = (type: ColumnType, options: CoerceOptions): Converter => {
  switch (type) {
    case "int":
      return toInt;
    case "float":
      return toFloat;
    case "string":
      return toText;
    case "datetime":
      return toDatetime(options.dateUnit);
  }
};

// A column with any unconvertible cell is left as it was and reported in
// `failures`. A listed column the table lacks fails the whole call.
export const coerceColumns = (
  table: Table,
  types: Readonly<Record<string, ColumnType>>,
  options: CoerceOptions = {},
): Either.Either<Coerced, MissingColumnError> => {
  let rows: ReadonlyArray<Row> = table.rows;
  const failures: CoercionFailure[] = [];

  for (const [column, type] of Object.entries(types)) {
    if (!table.columns.includes(column)) return Either.left(missingColumn(column));

    const convert = converterFor(type, options);
    const converted = Either.all(rows.map((row) => convert(row[column])));

    if (Either.isLeft(converted)) {
      failures.push({ column, type, reason: converted.left });
      continue;
    }
    const values = converted.right;
    rows = rows.map((row, i) => ({ ...row, [column]: values[i] }));
  }

  return Either.right({ table: { columns: table.columns, rows }, failures });
};

// ── Ordering ─────────────────────────────────────────────────────────────────

const compareCells = (a: CellValue, b: CellValue): number => {
  if (a === null || b === null) return a === b ? 0 : a === null ? 1 : -1;
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
  const left = describeSortKey(a);
  const right = describeSortKey(b);
  return left < right ? -1 : left > right ? 1 : 0;
};

const describeSortKey = (value: CellValue): string =>
  typeof value === "string" ? value : describe(value);

// Stable ascending sort; nulls last
export const sortRows = (table: Table, column: string): Table => ({
  columns: table.columns,
  rows: [...table.rows].sort((a, b) => compareCells(a[column], b[column])),
});

// ── Rendering ────────────────────────────────────────────────────────────────

const csvCell = (value: CellValue): string => {
  if (value === null) return "";
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "number") return Number.isNaN(value) ? "" : String(value);
  if (typeof value === "boolean") return String(value);
  const text = typeof value === "string" ? value : JSON.stringify(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

export const toCSV = (table: Table): string => {
  const lines: string[] = [table.columns.map(csvCell).join(",")];
  for (const row of table.rows) {
    lines.push(table.columns.map((column) => csvCell(row[column])).join(","));
  }
  return lines.join("\n");
};
