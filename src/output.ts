import { Data, Effect, Option } from "effect";
import * as fs from "node:fs";
import * as path from "node:path";
import { toCSV } from "./table.ts";
import type { Table } from "./table.ts";

export class ExportWriteError extends Data.TaggedError("ExportWriteError")<{
  message: string;
  path: string;
  cause?: unknown;
}> {}

export type OutputFormat = "json" | "csv";

export const parseFormat = (format: string): Option.Option<OutputFormat> => {
  const normalized = format.toLowerCase();
  return normalized === "json" || normalized === "csv" ? Option.some(normalized) : Option.none();
};

export const renderTable = (table: Table, format: OutputFormat): string =>
  format === "csv" ? toCSV(table) : JSON.stringify(table.rows, null, 2);

export const writeFile = (filePath: string, content: string) =>
  Effect.try({
    try: () => {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, content);
    },
    catch: (cause) =>
      new ExportWriteError({
        message: `Could not write ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`,
        path: filePath,
        cause,
      }),
  });
