// Credentials
export interface Credentials {
  usernameOrEmail: string;
  password: string;
}

// JSON as returned by the API; nothing beyond this is enforced at the boundary
export type JsonPrimitive = string | number | boolean | null;
export type JsonArray = ReadonlyArray<JsonValue>;
export interface JsonObject {
  readonly [key: string]: JsonValue;
}
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

export const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const isJsonArray = (value: unknown): value is JsonArray => Array.isArray(value);

// One page of the workouts list
export interface WorkoutPage {
  page: number;
  pageCount: number;
  data: ReadonlyArray<JsonObject>;
}
