import { expect, test, describe } from "vitest";
import { Effect, Either, Option } from "effect";
import type { JsonObject } from "./api/types.ts";
import { emptyTable } from "./table.ts";
import {
  cleanUserOverview,
  extractUserOverview,
  filterByDateRange,
  workoutStartDate,
  workoutsTable,
} from "./transform.ts";

// ── helpers ───────────────────────────────────────────────────────────────────

const makeOverview = (overrides: JsonObject = {}): JsonObject => ({
  personal_records: [
    {
      name: "Cycling",
      slug: "cycling",
      records: [
        {
          name: "20 min",
          slug: "20",
          value: "310",
          raw_value: "310.4",
          unit: "kj",
          workout_date: "2024-03-01T07:30:00Z",
        },
        {
          name: "5 min",
          slug: 5,
          value: 95,
          raw_value: 95,
          unit: "kj",
          workout_date: "2023-11-15",
        },
      ],
    },
  ],
  streaks: {
    current_weekly: 4,
    best_weekly: 12,
    start_date_of_current_weekly: 1704067200,
    current_daily: 2,
    start_date_of_current_daily: 1709251200,
  },
  achievement_counts: {
    total_count: 3,
    achievements: [
      {
        count: 3,
        template: { name: "First Ride", slug: "first_ride", image_url: "first.png" },
      },
    ],
  },
  workout_counts: {
    total_workouts: 120,
    workouts: [
      { name: "Cycling", slug: "cycling", count: 100 },
      { name: "Yoga", slug: "yoga", count: 20 },
    ],
  },
  ...overrides,
});

const without = (document: JsonObject, key: string): JsonObject =>
  Object.fromEntries(Object.entries(document).filter(([k]) => k !== key));

const EMPTY = {
  personalRecords: emptyTable,
  streaks: emptyTable,
  achievements: emptyTable,
  workoutCounts: emptyTable,
};

// ── cleanUserOverview ─────────────────────────────────────────────────────────

describe("cleanUserOverview", () => {
  test("shapes personal records with typed columns sorted by slug", () => {
    const { personalRecords } = Effect.runSync(cleanUserOverview(makeOverview()));

    expect(personalRecords.columns).toEqual([
      "name",
      "slug",
      "value",
      "raw_value",
      "unit",
      "workout_date",
    ]);
    expect(personalRecords.rows).toEqual([
      {
        name: "5 min",
        slug: 5,
        value: 95,
        raw_value: 95,
        unit: "kj",
        workout_date: new Date("2023-11-15T00:00:00Z"),
      },
      {
        name: "20 min",
        slug: 20,
        value: 310,
        raw_value: 310.4,
        unit: "kj",
        workout_date: new Date("2024-03-01T07:30:00Z"),
      },
    ]);
  });

  test("wraps streaks into a single row with epoch-second dates", () => {
    const { streaks } = Effect.runSync(cleanUserOverview(makeOverview()));

    expect(streaks.rows).toEqual([
      {
        current_weekly: 4,
        best_weekly: 12,
        start_date_of_current_weekly: new Date("2024-01-01T00:00:00Z"),
        current_daily: 2,
        start_date_of_current_daily: new Date("2024-03-01T00:00:00Z"),
      },
    ]);
  });

  test("flattens the achievement template into sibling columns", () => {
    const { achievements } = Effect.runSync(cleanUserOverview(makeOverview()));

    expect(achievements.columns).toEqual(["count", "name", "slug", "image_url"]);
    expect(achievements.rows).toEqual([
      { count: 3, name: "First Ride", slug: "first_ride", image_url: "first.png" },
    ]);
  });

  test("flattens a template holding only a name", () => {
    const document = makeOverview({
      achievement_counts: { achievements: [{ template: { name: "First Ride" }, count: 3 }] },
    });

    const { achievements } = Effect.runSync(cleanUserOverview(document));

    expect(achievements.columns).toEqual(["count", "name"]);
    expect(achievements.rows).toEqual([{ count: 3, name: "First Ride" }]);
  });

  test("passes workout counts through unchanged", () => {
    const { workoutCounts } = Effect.runSync(cleanUserOverview(makeOverview()));

    expect(workoutCounts.rows).toEqual([
      { name: "Cycling", slug: "cycling", count: 100 },
      { name: "Yoga", slug: "yoga", count: 20 },
    ]);
  });

  test("returns four empty tables when streaks is missing", () => {
    const tables = Effect.runSync(cleanUserOverview(without(makeOverview(), "streaks")));

    expect(tables).toEqual(EMPTY);
  });

  test("returns four empty tables when a nested field is missing", () => {
    const document = makeOverview({ workout_counts: { total_workouts: 0 } });

    expect(Effect.runSync(cleanUserOverview(document))).toEqual(EMPTY);
  });

  test("returns four empty tables when personal records are empty", () => {
    const document = makeOverview({ personal_records: [] });

    expect(Effect.runSync(cleanUserOverview(document))).toEqual(EMPTY);
  });

  test("keeps the other columns when one column fails to convert", () => {
    const document = makeOverview({
      personal_records: [
        { records: [{ slug: "3", value: "12", raw_value: "n/a", workout_date: "2024-01-02" }] },
      ],
    });

    const { personalRecords } = Effect.runSync(cleanUserOverview(document));

    expect(personalRecords.rows).toEqual([
      { slug: 3, value: 12, raw_value: "n/a", workout_date: new Date("2024-01-02T00:00:00Z") },
    ]);
  });
});

// ── extractUserOverview ───────────────────────────────────────────────────────

describe("extractUserOverview", () => {
  test("fails only the extract whose section is missing", () => {
    const extracts = extractUserOverview(without(makeOverview(), "streaks"));

    expect(Either.isRight(extracts.personalRecords)).toBe(true);
    expect(Either.isRight(extracts.achievements)).toBe(true);
    expect(Either.isRight(extracts.workoutCounts)).toBe(true);
    expect(Either.getLeft(extracts.streaks).pipe(Option.map((e) => e.message))).toEqual(
      Option.some("Missing field: streaks"),
    );
  });

  test("names the missing path", () => {
    const extracts = extractUserOverview(makeOverview({ personal_records: [] }));

    expect(Either.getLeft(extracts.personalRecords).pipe(Option.map((e) => e.message))).toEqual(
      Option.some("Missing field: personal_records[0]"),
    );
  });

  test("reports a section of the wrong shape", () => {
    const extracts = extractUserOverview(makeOverview({ workout_counts: { workouts: "none" } }));

    expect(Either.getLeft(extracts.workoutCounts).pipe(Option.map((e) => e.message))).toEqual(
      Option.some("Expected a list of records: workout_counts.workouts"),
    );
  });

  test("collects coercion failures alongside the table", () => {
    const document = makeOverview({
      streaks: { start_date_of_current_weekly: "soon", start_date_of_current_daily: 1704067200 },
    });

    const streaks = Either.getOrThrow(extractUserOverview(document).streaks);

    expect(streaks.failures).toEqual([
      {
        column: "start_date_of_current_weekly",
        type: "datetime",
        reason: 'cannot convert "soon" to datetime',
      },
    ]);
    expect(streaks.table.rows).toEqual([
      {
        start_date_of_current_weekly: "soon",
        start_date_of_current_daily: new Date("2024-01-01T00:00:00Z"),
      },
    ]);
  });

  test("an empty achievements list has no template column to flatten", () => {
    const extracts = extractUserOverview(makeOverview({ achievement_counts: { achievements: [] } }));

    expect(Either.getLeft(extracts.achievements).pipe(Option.map((e) => e._tag))).toEqual(
      Option.some("MissingColumnError"),
    );
  });
});

// ── workouts ──────────────────────────────────────────────────────────────────

describe("workoutsTable", () => {
  test("flattens nested workout fields into dotted columns", () => {
    const table = workoutsTable([
      { id: "w1", ride: { title: "Climb", instructor: { name: "Sam" } }, created_at: 1 },
      { id: "w2", created_at: 2 },
    ]);

    expect(table.columns).toEqual(["id", "ride.title", "ride.instructor.name", "created_at"]);
    expect(table.rows[1]).toEqual({
      id: "w2",
      "ride.title": null,
      "ride.instructor.name": null,
      created_at: 2,
    });
  });
});

describe("workoutStartDate", () => {
  test("prefers start_time over created_at", () => {
    expect(workoutStartDate({ start_time: 1704067200, created_at: 0 })).toEqual(
      Option.some(new Date("2024-01-01T00:00:00Z")),
    );
  });

  test("is none without a numeric timestamp", () => {
    expect(Option.isNone(workoutStartDate({ start_time: "yesterday" }))).toBe(true);
  });
});

describe("filterByDateRange", () => {
  const from = new Date("2024-01-01T00:00:00Z");
  const to = new Date("2024-01-31T23:59:59Z");

  test("keeps workouts within range", () => {
    expect(filterByDateRange([{ id: "a", start_time: 1704800000 }], from, to)).toHaveLength(1);
  });

  test("includes workouts exactly on the boundary dates", () => {
    const atStart = { id: "a", start_time: from.getTime() / 1000 };
    const atEnd = { id: "b", start_time: to.getTime() / 1000 };
    expect(filterByDateRange([atStart, atEnd], from, to)).toHaveLength(2);
  });

  test("excludes workouts outside the range or without a timestamp", () => {
    const workouts: JsonObject[] = [
      { id: "before", start_time: 1703980800 },
      { id: "after", created_at: 1706745600 },
      { id: "none" },
    ];
    expect(filterByDateRange(workouts, from, to)).toEqual([]);
  });
});
