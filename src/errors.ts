export class UnknownMetricError extends Error {
  readonly metric: string;

  constructor(metric: string) {
    super(`Unknown metric "${metric}"`);
    this.name = 'UnknownMetricError';
    this.metric = metric;
  }
}

export class RegistryConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RegistryConfigurationError';
  }
}

export class ExpositionConflictError extends Error {
  readonly exposedName: string;

  constructor(exposedName: string, detail: string) {
    super(`Conflicting exposition metadata for ${exposedName}: ${detail}`);
    this.name = 'ExpositionConflictError';
    this.exposedName = exposedName;
  }
}

export class FieldCountMismatchError extends Error {
  readonly expected: number;
  readonly actual: number;
  readonly row: number;

  constructor(expected: number, actual: number, row: number) {
    super(`Row ${row} has ${actual} fields, expected ${expected}`);
    this.name = 'FieldCountMismatchError';
    this.expected = expected;
    this.actual = actual;
    this.row = row;
  }
}

export class SmiQueryError extends Error {
  readonly exitCode: number | string | null;

  constructor(message: string, options: { cause?: unknown; exitCode?: number | string | null } = {}) {
    super(message, { cause: options.cause });
    this.name = 'SmiQueryError';
    this.exitCode = options.exitCode ?? null;
  }
}

export class ConfigValidationError extends Error {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(errors.join('; '));
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}
