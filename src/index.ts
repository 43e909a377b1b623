#!/usr/bin/env node
import { Args, Command, Options } from "@effect/cli";
import { NodeContext, NodeHttpClient, NodeRuntime } from "@effect/platform-node";
import { Console, Effect, Either, Layer, Logger, Option } from "effect";
import * as path from "node:path";
import { PelotonClient, makePelotonClientLive, orAbsent } from "./api/client.ts";
import { PELOTON_API_DEFAULT } from "./api/constants.ts";
import { PASSWORD_ENV, USERNAME_ENV, resolveCredentials } from "./credentials.ts";
import { parseFormat, renderTable, writeFile } from "./output.ts";
import { toCSV } from "./table.ts";
import {
  extractUserOverview,
  filterByDateRange,
  logCoercionFailures,
  workoutsTable,
} from "./transform.ts";
import type { OverviewExtract } from "./transform.ts";

// ── CLI options ──────────────────────────────────────────────────────────────

const usernameOption = Options.text("username").pipe(
  Options.withAlias("u"),
  Options.withDescription(`Peloton username or email (or set ${USERNAME_ENV[0]})`),
  Options.optional,
);

const passwordOption = Options.text("password").pipe(
  Options.withAlias("p"),
  Options.withDescription(`Peloton password (or set ${PASSWORD_ENV[0]}, will prompt if omitted)`),
  Options.optional,
);

const formatOption = Options.text("format").pipe(
  Options.withDescription("Output format: json or csv"),
  Options.withDefault("json"),
);

const fromOption = Options.text("from").pipe(
  Options.withDescription("Only export workouts started on or after this ISO date"),
  Options.optional,
);

const toOption = Options.text("to").pipe(
  Options.withDescription("Only export workouts started on or before this ISO date (inclusive)"),
  Options.optional,
);

// ── Output helpers ───────────────────────────────────────────────────────────

const EXTRACT_FILES: Record<OverviewExtract, string> = {
  personalRecords: "personal-records",
  streaks: "streaks",
  achievements: "achievements",
  workoutCounts: "workout-counts",
};

const isExtract = (name: string): name is OverviewExtract => Object.hasOwn(EXTRACT_FILES, name);

const endOfDay = (iso: string) => {
  const d = new Date(iso);
  d.setUTCHours(23, 59, 59, 999);
  return d;
};

// ── Export command ───────────────────────────────────────────────────────────

const exportCommand = Command.make(
  "export",
  {
    username: usernameOption,
    password: passwordOption,
    output: Options.directory("output").pipe(
      Options.withAlias("o"),
      Options.withDescription("Directory to write the exported files to"),
      Options.withDefault("exports"),
    ),
    format: formatOption,
    from: fromOption,
    to: toOption,
  },
  ({ username, password, output, format, from, to }) =>
    Effect.gen(function* () {
      const client = yield* PelotonClient;

      const outputFormat = parseFormat(format);
      if (Option.isNone(outputFormat)) {
        yield* Console.error(`Invalid format: ${format}. Must be 'json' or 'csv'`);
        return;
      }
      const ext = outputFormat.value;

      const credentials = yield* resolveCredentials(username, password);
      if (Option.isNone(credentials)) return;

      yield* Console.log("Logging in to Peloton...");
      const userId = yield* client.login(credentials.value);

      const overview = yield* orAbsent(client.fetchUserOverview(userId));
      if (Option.isSome(overview)) {
        const extracts = extractUserOverview(overview.value);
        for (const name of Object.keys(EXTRACT_FILES).filter(isExtract)) {
          const extract = extracts[name];
          if (Either.isLeft(extract)) {
            yield* Console.error(`Skipping ${EXTRACT_FILES[name]}: ${extract.left.message}`);
            continue;
          }
          yield* logCoercionFailures(extract.right.failures);
          const filePath = path.join(output, `${EXTRACT_FILES[name]}.${ext}`);
          yield* writeFile(filePath, renderTable(extract.right.table, ext));
          yield* Console.log(`Saved ${extract.right.table.rows.length} rows to: ${filePath}`);
        }
      }

      const workouts = yield* orAbsent(client.fetchAllWorkouts(userId));
      if (Option.isSome(workouts)) {
        const selected =
          Option.isSome(from) || Option.isSome(to)
            ? filterByDateRange(
                workouts.value,
                Option.match(from, { onNone: () => new Date(0), onSome: (d) => new Date(d) }),
                Option.match(to, { onNone: () => new Date(), onSome: endOfDay }),
              )
            : workouts.value;

        const filePath = path.join(output, `workouts.${ext}`);
        const content =
          ext === "csv" ? toCSV(workoutsTable(selected)) : JSON.stringify(selected, null, 2);
        yield* writeFile(filePath, content);
        yield* Console.log(`\nExported ${selected.length} workouts to: ${filePath}`);
      }
    }).pipe(
      Effect.catchTags({
        PelotonAuthError: (e) =>
          Console.error(`\nLogin failed: ${e.message}\n\nCheck your username and password.`),
        PelotonTransportError: (e) => Console.error(`\nLogin failed: ${e.message}`),
        PelotonDecodeError: (e) => Console.error(`\nLogin failed: ${e.message}`),
        ExportWriteError: (e) => Console.error(`\nExport failed: ${e.message}`),
      }),
    ),
);

// ── Workout detail command ───────────────────────────────────────────────────

const workoutCommand = Command.make(
  "workout",
  {
    workoutId: Args.text({ name: "workout-id" }).pipe(
      Args.withDescription("Identifier of the workout to fetch"),
    ),
    username: usernameOption,
    password: passwordOption,
    output: Options.file("output").pipe(
      Options.withAlias("o"),
      Options.withDescription("Write the workout JSON to this file instead of stdout"),
      Options.optional,
    ),
  },
  ({ workoutId, username, password, output }) =>
    Effect.gen(function* () {
      const client = yield* PelotonClient;

      const credentials = yield* resolveCredentials(username, password);
      if (Option.isNone(credentials)) return;

      yield* client.login(credentials.value);
      const detail = yield* client.fetchWorkoutDetail(workoutId);
      const content = JSON.stringify(detail, null, 2);

      if (Option.isSome(output)) {
        yield* writeFile(output.value, content);
        yield* Console.log(`Saved to: ${output.value}`);
      } else {
        yield* Console.log(content);
      }
    }).pipe(
      Effect.catchTags({
        PelotonAuthError: (e) => Console.error(`\nLogin failed: ${e.message}`),
        PelotonStatusError: (e) => Console.error(`\nFetch failed: ${e.message}`),
        PelotonTransportError: (e) => Console.error(`\nFetch failed: ${e.message}`),
        PelotonDecodeError: (e) => Console.error(`\nFetch failed: ${e.message}`),
        ExportWriteError: (e) => Console.error(`\nExport failed: ${e.message}`),
      }),
    ),
);

// ── Login test command ───────────────────────────────────────────────────────

const loginCommand = Command.make(
  "login",
  { username: usernameOption, password: passwordOption },
  ({ username, password }) =>
    Effect.gen(function* () {
      const client = yield* PelotonClient;

      const credentials = yield* resolveCredentials(username, password);
      if (Option.isNone(credentials)) return;

      yield* Console.log("Testing authentication...");

      const userId = yield* client.login(credentials.value);

      yield* Console.log("Login successful!");
      yield* Console.log(`User ID: ${userId}`);
    }).pipe(
      Effect.catchTags({
        PelotonAuthError: (e) => Console.error(`\nLogin failed: ${e.message}`),
        PelotonTransportError: (e) => Console.error(`\nLogin failed: ${e.message}`),
        PelotonDecodeError: (e) => Console.error(`\nLogin failed: ${e.message}`),
      }),
    ),
);

// ── Main command + CLI ───────────────────────────────────────────────────────

const mainCommand = Command.make("peloton-export").pipe(
  Command.withDescription("Export your profile overview and workout history from Peloton"),
  Command.withSubcommands([exportCommand, workoutCommand, loginCommand]),
);

const cli = Command.run(mainCommand, {
  name: "peloton-export",
  version: "1.0.0",
});

const baseUrl = process.env.PELOTON_API ?? PELOTON_API_DEFAULT;

const MainLayer = makePelotonClientLive(baseUrl).pipe(Layer.provide(NodeHttpClient.layer));

cli(process.argv).pipe(
  Effect.provide(MainLayer),
  Effect.provide(Logger.pretty),
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
