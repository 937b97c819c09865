/** Message of a caught value, whether or not it is an Error. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

export class ConfigError extends Error {
  readonly key: string;

  constructor(key: string, message: string) {
    super(`Invalid configuration for ${key}: ${message}`);
    this.name = "ConfigError";
    this.key = key;
  }
}
