/**
 * Thrown when the source file handed to the generator does not exist.
 */
export class SourceFileNotFoundError extends Error {
  public constructor(public readonly filePath: string) {
    super(`File not found: ${filePath}`);
    this.name = "SourceFileNotFoundError";
  }
}

/**
 * Thrown when source text cannot be turned into a syntax tree.
 */
export class SourceParseError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "SourceParseError";
  }
}

export class ConfigurationError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
