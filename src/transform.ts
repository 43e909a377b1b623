import { Data, Effect, Either, Option } from "effect";
import { isJsonArray, isJsonObject } from "./api/types.ts";
import type { JsonObject, JsonValue } from "./api/types.ts";
import {
  coerceColumns,
  emptyTable,
  flattenColumn,
  flattenRecord,
  fromRecords,
  sortRows,
} from "./table.ts";
import type { ColumnType, CoercionFailure, MissingColumnError, Table } from "./table.ts";

// ── Overview extracts ────────────────────────────────────────────────────────

export class OverviewFieldError extends Data.TaggedError("OverviewFieldError")<{
  message: string;
  path: string;
}> {}

export type ExtractError = OverviewFieldError | MissingColumnError;

export interface ExtractResult {
  readonly table: Table;
  readonly failures: ReadonlyArray<CoercionFailure>;
}

export interface OverviewTables {
  readonly personalRecords: Table;
  readonly streaks: Table;
  readonly achievements: Table;
  readonly workoutCounts: Table;
}

export type OverviewExtract = keyof OverviewTables;

export type OverviewExtracts = {
  readonly [K in OverviewExtract]: Either.Either<ExtractResult, ExtractError>;
};

const PERSONAL_RECORD_TYPES: Record<string, ColumnType> = {
  slug: "int",
  value: "int",
  raw_value: "float",
  workout_date: "datetime",
};

const STREAK_TYPES: Record<string, ColumnType> = {
  start_date_of_current_weekly: "datetime",
  start_date_of_current_daily: "datetime",
};

type PathSegment = string | number;

const formatPath = (path: ReadonlyArray<PathSegment>): string =>
  path
    .map((segment, i) =>
      typeof segment === "number" ? `[${segment}]` : i === 0 ? segment : `.${segment}`,
    )
    .join("");

const fieldError = (path: ReadonlyArray<PathSegment>, problem: string) =>
  new OverviewFieldError({ message: `${problem}: ${formatPath(path)}`, path: formatPath(path) });

const step = (value: JsonValue, segment: PathSegment): Option.Option<JsonValue> => {
  if (typeof segment === "number") {
    return isJsonArray(value) && segment < value.length
      ? Option.some(value[segment])
      : Option.none();
  }
  return isJsonObject(value) && Object.hasOwn(value, segment)
    ? Option.some(value[segment])
    : Option.none();
};

const valueAt = (
  document: JsonValue,
  path: ReadonlyArray<PathSegment>,
): Either.Either<JsonValue, OverviewFieldError> => {
  let current = document;
  for (const [i, segment] of path.entries()) {
    const next = step(current, segment);
    if (Option.isNone(next)) {
      return Either.left(fieldError(path.slice(0, i + 1), "Missing field"));
    }
    current = next.value;
  }
  return Either.right(current);
};

const recordAt = (
  document: JsonValue,
  path: ReadonlyArray<PathSegment>,
): Either.Either<JsonObject, OverviewFieldError> =>
  Either.flatMap(
    valueAt(document, path),
    (value): Either.Either<JsonObject, OverviewFieldError> =>
      isJsonObject(value)
        ? Either.right(value)
        : Either.left(fieldError(path, "Expected an object")),
  );

const recordsAt = (
  document: JsonValue,
  path: ReadonlyArray<PathSegment>,
): Either.Either<ReadonlyArray<JsonObject>, OverviewFieldError> =>
  Either.flatMap(
    valueAt(document, path),
    (value): Either.Either<ReadonlyArray<JsonObject>, OverviewFieldError> => {
      if (!isJsonArray(value)) return Either.left(fieldError(path, "Expected a list of records"));
      const records = value.filter(isJsonObject);
      return records.length === value.length
        ? Either.right(records)
        : Either.left(fieldError(path, "Expected a list of records"));
    },
  );

const personalRecords = (document: JsonValue) =>
  Either.gen(function* () {
    const records = yield* recordsAt(document, ["personal_records", 0, "records"]);
    const { table, failures } = yield* coerceColumns(fromRecords(records), PERSONAL_RECORD_TYPES);
    return { table: sortRows(table, "slug"), failures };
  });

const streaks = (document: JsonValue) =>
  Either.gen(function* () {
    const record = yield* recordAt(document, ["streaks"]);
    return yield* coerceColumns(fromRecords([record]), STREAK_TYPES, { dateUnit: "s" });
  });

const achievements = (document: JsonValue) =>
  Either.gen(function* () {
    const records = yield* recordsAt(document, ["achievement_counts", "achievements"]);
    const table = yield* flattenColumn(fromRecords(records), "template");
    return { table, failures: [] };
  });

const workoutCounts = (document: JsonValue) =>
  Either.map(recordsAt(document, ["workout_counts", "workouts"]), (records) => ({
    table: fromRecords(records),
    failures: [],
  }));

// A missing or malformed section only fails its own extract
export const extractUserOverview = (document: JsonValue): OverviewExtracts => ({
  personalRecords: personalRecords(document),
  streaks: streaks(document),
  achievements: achievements(document),
  workoutCounts: workoutCounts(document),
});

const EMPTY_TABLES: OverviewTables = {
  personalRecords: emptyTable,
  streaks: emptyTable,
  achievements: emptyTable,
  workoutCounts: emptyTable,
};

export const logCoercionFailures = (failures: ReadonlyArray<CoercionFailure>) =>
  Effect.forEach(
    failures,
    ({ column, type, reason }) =>
      Effect.logWarning(`Error converting column ${column} to ${type}: ${reason}`),
    { discard: true },
  );

// All-or-nothing: if any extract cannot be built, all four come back empty
export const cleanUserOverview = (document: JsonValue): Effect.Effect<OverviewTables> =>
  Effect.gen(function* () {
    const extracts = extractUserOverview(document);
    const results = Either.all(extracts);

    if (Either.isLeft(results)) {
      yield* Effect.logError(`Error processing user overview data: ${results.left.message}`);
      return EMPTY_TABLES;
    }

    const { personalRecords, streaks, achievements, workoutCounts } = results.right;
    yield* logCoercionFailures([...personalRecords.failures, ...streaks.failures]);

    return {
      personalRecords: personalRecords.table,
      streaks: streaks.table,
      achievements: achievements.table,
      workoutCounts: workoutCounts.table,
    };
  });

// ── Workouts ─────────────────────────────────────────────────────────────────

export const workoutsTable = (workouts: ReadonlyArray<JsonObject>): Table =>
  fromRecords(workouts.map((workout) => flattenRecord(workout)));

export const workoutStartDate = (workout: JsonObject): Option.Option<Date> => {
  const seconds = workout.start_time ?? workout.created_at;
  return typeof seconds === "number" ? Option.some(new Date(seconds * 1000)) : Option.none();
};

export const filterByDateRange = (
  workouts: ReadonlyArray<JsonObject>,
  from: Date,
  to: Date,
): JsonObject[] =>
  workouts.filter((w) =>
    Option.match(workoutStartDate(w), {
      onNone: () => false,
      onSome: (d) => d >= from && d <= to,
    }),
  );
