import { Config, Console, Effect, Option } from "effect";
import type { ConfigError } from "effect";
import type { Credentials } from "./api/types.ts";

// ── Password prompt ──────────────────────────────────────────────────────────

export type PromptInput = NodeJS.ReadableStream & {
  readonly isTTY?: boolean;
  setRawMode?: (mode: boolean) => void;
};

// Reads until a newline or the end of input; pasted and piped input arrive
// as whole chunks, so every character of a chunk is handled.
export const promptPassword = (
  prompt: string,
  input: PromptInput = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Promise<string> =>
  new Promise((resolve) => {
    output.write(prompt);
    if (input.isTTY) input.setRawMode?.(true);

    let password = "";
    input.resume();
    input.setEncoding("utf8");

    const finish = () => {
      input.removeListener("data", onData);
      input.removeListener("end", finish);
      if (input.isTTY) input.setRawMode?.(false);
      input.pause();
      output.write("\n");
      resolve(password);
    };

    const onData = (chunk: string | Buffer) => {
      for (const char of String(chunk)) {
        const code = char.charCodeAt(0);
        if (code === 13 || code === 10) {
          finish();
          return;
        } else if (code === 3) {
          process.exit(1);
        } else if (code === 127 || code === 8) {
          password = password.slice(0, -1);
        } else {
          password += char;
        }
      }
    };

    input.on("data", onData);
    input.on("end", finish);
  });

// ── Environment ──────────────────────────────────────────────────────────────

// The lowercase names are the ones older setups export
export const USERNAME_ENV = ["PELOTON_USERNAME", "peloton_user_name"] as const;
export const PASSWORD_ENV = ["PELOTON_PASSWORD", "peloton_password"] as const;

const envOption = ([name, legacyName]: readonly [string, string]) =>
  Config.option(Config.string(name).pipe(Config.orElse(() => Config.string(legacyName))));

// Explicit options win over the environment
const fromEnv = (
  opt: Option.Option<string>,
  names: readonly [string, string],
): Effect.Effect<Option.Option<string>, ConfigError.ConfigError> =>
  Option.isSome(opt) ? Effect.succeed(opt) : envOption(names);

export const resolveCredentials = (
  username: Option.Option<string>,
  password: Option.Option<string>,
  prompt: (label: string) => Promise<string> = (label) => promptPassword(label),
): Effect.Effect<Option.Option<Credentials>, ConfigError.ConfigError> =>
  Effect.gen(function* () {
    const actualUsername = yield* fromEnv(username, USERNAME_ENV);
    if (Option.isNone(actualUsername)) {
      yield* Console.error(`Username required: use --username or set ${USERNAME_ENV[0]}`);
      return Option.none();
    }

    const envPassword = yield* fromEnv(password, PASSWORD_ENV);
    const actualPassword = Option.isSome(envPassword)
      ? envPassword.value
      : yield* Effect.promise(() => prompt("Password: "));

    return Option.some({ usernameOrEmail: actualUsername.value, password: actualPassword });
  });
