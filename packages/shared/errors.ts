// Fatal setup errors. Anything thrown as one of these aborts the run
// before the first message goes out.

export class ConfigError extends Error {
  name = "ConfigError";
}

export class InputError extends Error {
  name = "InputError";
}

export function isFatal(err: unknown): err is ConfigError | InputError {
  return err instanceof ConfigError || err instanceof InputError;
}
