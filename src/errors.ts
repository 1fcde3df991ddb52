/** An annotation or configuration value that is not understood. */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly value: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/** The active environment cannot load what the generated code asks for. */
export class UnsupportedFeatureError extends Error {
  constructor(
    message: string,
    readonly request: string,
  ) {
    super(message);
    this.name = "UnsupportedFeatureError";
  }
}
