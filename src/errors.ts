/**
 * Typed error classes.
 *
 * ConfigurationError: invalid submission or catalogue entry; a Run is never started
 * InvariantError: the engine broke one of its own rules (e.g. status resurrection)
 * ArtifactParseError: a worker's text could not be read as the artifact its phase expects
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}

export class ArtifactParseError extends Error {
  constructor(
    message: string,
    public readonly rawText: string,
  ) {
    super(message);
    this.name = "ArtifactParseError";
  }
}
