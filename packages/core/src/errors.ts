/**
 * Engine error types.
 *
 * Structured errors for attribute scanning, configuration and pipeline
 * preconditions. Only AttributesNotFoundError is expected during normal
 * traversal; the passes catch it at the scan site.
 */

export class AttributesNotFoundError extends Error {
  public readonly index: number;

  constructor(index: number, reason = 'Attributes not found') {
    super(`${reason} at index ${index}`);
    this.name = 'AttributesNotFoundError';
    this.index = index;
  }
}

export class UninitializedStateError extends Error {
  public readonly operation: string;

  constructor(operation: string) {
    super(`Pipeline context has no tool version; cannot run ${operation}. Pass a version to createPipelineContext().`);
    this.name = 'UninitializedStateError';
    this.operation = operation;
  }
}

export class UnsupportedVersionError extends Error {
  public readonly version: string;

  constructor(version: string) {
    super(`Unsupported tool version: ${version}`);
    this.name = 'UnsupportedVersionError';
    this.version = version;
  }
}

export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(what: string, issues: string[]) {
    super(`Invalid ${what}: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
