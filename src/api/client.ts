import { Chunk, Context, Data, Effect, Either, Layer, Option, Ref, Stream } from "effect";
import { Cookies, HttpClient, HttpClientRequest } from "@effect/platform";
import type { HttpClientResponse } from "@effect/platform";
import {
  DEFAULT_HEADERS,
  PELOTON_API_DEFAULT,
  PLATFORM_HEADERS,
  WORKOUTS_PAGE_SIZE,
} from "./constants.ts";
import { isJsonArray, isJsonObject } from "./types.ts";
import type { Credentials, JsonObject, WorkoutPage } from "./types.ts";

// ── Error types ──────────────────────────────────────────────────────────────

export class PelotonAuthError extends Data.TaggedError("PelotonAuthError")<{
  message: string;
  status?: number;
}> {}

export class PelotonStatusError extends Data.TaggedError("PelotonStatusError")<{
  message: string;
  context: string;
  status: number;
  detail: string;
}> {}

export class PelotonTransportError extends Data.TaggedError("PelotonTransportError")<{
  message: string;
  context: string;
  cause?: unknown;
}> {}

export class PelotonDecodeError extends Data.TaggedError("PelotonDecodeError")<{
  message: string;
  context: string;
  cause?: unknown;
}> {}

export type PelotonRequestError = PelotonStatusError | PelotonTransportError | PelotonDecodeError;

export type PelotonError = PelotonAuthError | PelotonRequestError;

// ── Service interface ────────────────────────────────────────────────────────

export class PelotonClient extends Context.Tag("PelotonClient")<
  PelotonClient,
  {
    readonly login: (
      credentials: Credentials,
    ) => Effect.Effect<string, PelotonAuthError | PelotonTransportError | PelotonDecodeError>;
    readonly fetchUserOverview: (userId: string) => Effect.Effect<JsonObject, PelotonRequestError>;
    readonly fetchWorkoutDetail: (
      workoutId: string,
    ) => Effect.Effect<JsonObject, PelotonRequestError>;
    // Pages in request order; pages fetched before a failure are still emitted
    readonly workoutPages: (userId: string) => Stream.Stream<WorkoutPage, PelotonRequestError>;
    // Every workout record, or a failure if any single page fails
    readonly fetchAllWorkouts: (
      userId: string,
    ) => Effect.Effect<ReadonlyArray<JsonObject>, PelotonRequestError>;
  }
>() {}

// ── Response parsing helpers ─────────────────────────────────────────────────

const NO_DETAIL = "No detailed error message provided.";

const parseJson = Option.liftThrowable((text: string): unknown => JSON.parse(text));

const nonEmptyString = (value: unknown): Option.Option<string> =>
  typeof value === "string" && value.length > 0 ? Option.some(value) : Option.none();

// `message` or `error` of a JSON error body, otherwise the raw text
export const errorDetail = (text: string): string =>
  parseJson(text).pipe(
    Option.map((json) =>
      isJsonObject(json)
        ? nonEmptyString(json.message).pipe(
            Option.orElse(() => nonEmptyString(json.error)),
            Option.getOrElse(() => NO_DETAIL),
          )
        : text,
    ),
    Option.getOrElse(() => text),
  );

export const parseUserId = (json: unknown): Option.Option<string> => {
  if (!isJsonObject(json)) return Option.none();
  const userId = json.user_id;
  if (typeof userId === "number") return Option.some(String(userId));
  return nonEmptyString(userId);
};

export function parseWorkoutPage(json: unknown, page: number): Either.Either<WorkoutPage, string> {
  if (!isJsonObject(json)) return Either.left("response is not a JSON object");

  const pageCount = json.page_count;
  if (typeof pageCount !== "number" || !Number.isInteger(pageCount) || pageCount < 0) {
    return Either.left("missing or invalid page_count");
  }

  const data = json.data;
  if (!isJsonArray(data)) return Either.left("missing data array");

  const records: JsonObject[] = [];
  for (const record of data) {
    if (!isJsonObject(record)) return Either.left("data contains a non-object record");
    records.push(record);
  }

  return Either.right({ page, pageCount, data: records });
}

// Logs the failure and yields an absent result
export const orAbsent = <A, R>(
  self: Effect.Effect<A, PelotonError, R>,
): Effect.Effect<Option.Option<A>, never, R> =>
  self.pipe(
    Effect.tapError((error) =>
      Effect.logError(error.message).pipe(Effect.annotateLogs("kind", error._tag)),
    ),
    Effect.option,
  );

// ── Live implementation ──────────────────────────────────────────────────────

interface PageCursor {
  readonly page: number;
  readonly pageCount: Option.Option<number>;
}

const firstPage: PageCursor = { page: 0, pageCount: Option.none() };

const isSuccess = (status: number) => status >= 200 && status < 300;

export const makePelotonClientLive = (
  baseUrl: string = PELOTON_API_DEFAULT,
): Layer.Layer<PelotonClient, never, HttpClient.HttpClient> =>
  Layer.effect(
    PelotonClient,
    Effect.gen(function* () {
      // The cookie jar is the session: everything issued through this client
      // carries the cookies set by the login response. Each request runs in its
      // own scope, closed once the body has been read.
      const cookies = yield* Ref.make(Cookies.empty);
      const httpClient = (yield* HttpClient.HttpClient).pipe(HttpClient.withCookiesRef(cookies));

      const url = (path: string) => new URL(path, baseUrl).toString();

      const send = (request: HttpClientRequest.HttpClientRequest, context: string) =>
        httpClient.execute(request).pipe(
          Effect.mapError(
            (cause) =>
              new PelotonTransportError({
                message: `Error during ${context}: ${cause.message}`,
                context,
                cause,
              }),
          ),
        );

      const readBody = (response: HttpClientResponse.HttpClientResponse, context: string) =>
        response.text.pipe(
          Effect.mapError(
            (cause) =>
              new PelotonTransportError({
                message: `Error reading response during ${context}: ${cause.message}`,
                context,
                cause,
              }),
          ),
        );

      const decodeJson = (text: string, context: string) =>
        Effect.try({
          try: (): unknown => JSON.parse(text),
          catch: (cause) =>
            new PelotonDecodeError({
              message: `Error decoding JSON response during ${context}`,
              context,
              cause,
            }),
        });

      const requestJson = (request: HttpClientRequest.HttpClientRequest, context: string) =>
        Effect.gen(function* () {
          const response = yield* send(request, context);
          const text = yield* readBody(response, context);

          if (!isSuccess(response.status)) {
            const detail = errorDetail(text);
            return yield* Effect.fail(
              new PelotonStatusError({
                message: `Error during ${context}: ${response.status} - ${detail}`,
                context,
                status: response.status,
                detail,
              }),
            );
          }

          return yield* decodeJson(text, context);
        }).pipe(Effect.scoped);

      const requestObject = (request: HttpClientRequest.HttpClientRequest, context: string) =>
        requestJson(request, context).pipe(
          Effect.filterOrFail(
            isJsonObject,
            () =>
              new PelotonDecodeError({
                message: `Unexpected response shape during ${context}: expected a JSON object`,
                context,
              }),
          ),
        );

      const get = (path: string) =>
        HttpClientRequest.get(url(path)).pipe(
          HttpClientRequest.setHeaders(DEFAULT_HEADERS),
          HttpClientRequest.setHeaders(PLATFORM_HEADERS),
        );

      const login = (credentials: Credentials) =>
        Effect.gen(function* () {
          if (!credentials.usernameOrEmail || !credentials.password) {
            return yield* Effect.fail(
              new PelotonAuthError({
                message: "Peloton username and password must be provided",
              }),
            );
          }

          const context = "authentication";
          const response = yield* send(
            HttpClientRequest.post(url("auth/login")).pipe(
              HttpClientRequest.setHeaders(DEFAULT_HEADERS),
              HttpClientRequest.bodyUnsafeJson({
                username_or_email: credentials.usernameOrEmail,
                password: credentials.password,
              }),
            ),
            context,
          );
          const text = yield* readBody(response, context);

          if (!isSuccess(response.status)) {
            return yield* Effect.fail(
              new PelotonAuthError({
                message: `Authentication failed: ${response.status} - ${errorDetail(text)}`,
                status: response.status,
              }),
            );
          }

          const json = yield* decodeJson(text, context);
          const userId = parseUserId(json);
          if (Option.isNone(userId)) {
            return yield* Effect.fail(
              new PelotonDecodeError({ message: "Login response has no user_id", context }),
            );
          }

          return userId.value;
        }).pipe(Effect.scoped);

      const fetchUserOverview = (userId: string) =>
        requestObject(
          get(`api/user/${encodeURIComponent(userId)}/overview`),
          "user overview retrieval",
        );

      const fetchWorkoutDetail = (workoutId: string) =>
        requestObject(
          get(`api/workout/${encodeURIComponent(workoutId)}`),
          "workout detail retrieval",
        );

      const fetchWorkoutPage = (userId: string, page: number) => {
        const context = `workouts page ${page} retrieval`;
        return requestJson(
          get(`api/user/${encodeURIComponent(userId)}/workouts`).pipe(
            HttpClientRequest.setUrlParams({ limit: String(WORKOUTS_PAGE_SIZE), page: String(page) }),
          ),
          context,
        ).pipe(
          Effect.flatMap(
            (json): Effect.Effect<WorkoutPage, PelotonDecodeError> =>
              Either.match(parseWorkoutPage(json, page), {
                onLeft: (reason) =>
                  Effect.fail(
                    new PelotonDecodeError({
                      message: `Unexpected response shape during ${context}: ${reason}`,
                      context,
                    }),
                  ),
                onRight: (result) => Effect.succeed(result),
              }),
          ),
        );
      };

      // page_count is taken from page 0; later pages are fetched one at a time.
      const workoutPages = (userId: string): Stream.Stream<WorkoutPage, PelotonRequestError> =>
        Stream.paginateEffect(firstPage, (cursor: PageCursor) =>
          fetchWorkoutPage(userId, cursor.page).pipe(
            Effect.map((result) => {
              const pageCount = Option.getOrElse(cursor.pageCount, () => result.pageCount);
              const next = cursor.page + 1;
              const nextCursor: Option.Option<PageCursor> =
                next < pageCount
                  ? Option.some({ page: next, pageCount: Option.some(pageCount) })
                  : Option.none();
              return [result, nextCursor] as const;
            }),
          ),
        );

      const fetchAllWorkouts = (userId: string) =>
        workoutPages(userId).pipe(
          Stream.mapConcat((page) => page.data),
          Stream.runCollect,
          Effect.map(Chunk.toReadonlyArray),
        );

      return { login, fetchUserOverview, fetchWorkoutDetail, workoutPages, fetchAllWorkouts };
    }),
  );
