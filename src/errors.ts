/**
 * Error handling for track configuration
 *
 * Every failure raised while classifying, validating or serving tracks is a
 * subclass of {@link TracksmithError}, so callers can branch on `instanceof`
 * or on the stable `code` string.
 */

/**
 * Base error class for all tracksmith errors
 */
export class TracksmithError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: string
  ) {
    super(message);
    this.name = "TracksmithError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Neither the declared type nor the declared/guessed format selects a track variant
 */
export class UnknownTrackTypeError extends TracksmithError {
  constructor(
    public readonly declaredType: string | undefined,
    public readonly format: string | undefined
  ) {
    super(
      `Unknown track type, got type=${describe(declaredType)} format=${describe(format)}`,
      "UNKNOWN_TRACK_TYPE",
      "Set an explicit `type` or a `format` such as bam, vcf, bed or bigWig"
    );
    this.name = "UnknownTrackTypeError";
  }
}

/**
 * A track or configuration value does not satisfy its schema
 */
export class SchemaViolationError extends TracksmithError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly trackType?: string,
    context?: string
  ) {
    super(`${path}: ${message}`, "SCHEMA_VIOLATION", context);
    this.name = "SchemaViolationError";
  }

  override toString(): string {
    let msg = super.toString();
    if (this.trackType !== undefined) {
      msg += `\nTrack type: ${this.trackType}`;
    }
    return msg;
  }
}

/**
 * A local track resource is missing or is not a regular file
 */
export class FileNotFoundError extends TracksmithError {
  constructor(
    public readonly filePath: string,
    public readonly systemError?: unknown
  ) {
    super(`No such file: ${filePath}`, "FILE_NOT_FOUND", systemContext(systemError));
    this.name = "FileNotFoundError";
  }

  static fromSystemError(filePath: string, systemError: unknown): FileNotFoundError {
    return new FileNotFoundError(filePath, systemError);
  }
}

/**
 * The resource provider could not issue a servable URL
 */
export class ResourceProviderError extends TracksmithError {
  constructor(
    message: string,
    public readonly filePath?: string,
    public readonly systemError?: unknown
  ) {
    super(message, "RESOURCE_PROVIDER_FAILURE", systemContext(systemError));
    this.name = "ResourceProviderError";
  }

  static fromSystemError(filePath: string, systemError: unknown): ResourceProviderError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    return new ResourceProviderError(
      `Could not create a resource for ${filePath}: ${errorMessage}`,
      filePath,
      systemError
    );
  }
}

/**
 * Invalid options passed to a builder, session or provider
 */
export class ConfigurationError extends TracksmithError {
  constructor(
    message: string,
    public readonly option: string,
    context?: string
  ) {
    super(message, "CONFIGURATION_ERROR", context);
    this.name = "ConfigurationError";
  }
}

function describe(value: string | undefined): string {
  return value === undefined ? "unset" : JSON.stringify(value);
}

function systemContext(systemError: unknown): string | undefined {
  if (systemError === undefined) return undefined;
  const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
  return `System error: ${errorMessage}`;
}
