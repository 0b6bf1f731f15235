export class DimensionStoreError extends Error {
  readonly code = 'STORE_FAILED';

  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'DimensionStoreError';
  }
}

export class ValidationError extends Error {
  readonly code = 'VALIDATION_FAILED';

  constructor(
    message: string,
    public readonly field?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class UnknownDimensionError extends Error {
  readonly code = 'UNKNOWN_DIMENSION';

  constructor(public readonly dimensionId: string) {
    super(`Unknown dimension: ${dimensionId}`);
    this.name = 'UnknownDimensionError';
  }
}

export class NaturalKeyNotFoundError extends Error {
  readonly code = 'NOT_FOUND';

  constructor(
    public readonly dimensionId: string,
    public readonly naturalKey: string,
    public readonly asOfDate?: string,
  ) {
    super(
      asOfDate
        ? `No version of ${dimensionId}/${naturalKey} is effective on ${asOfDate}`
        : `Natural key not found: ${dimensionId}/${naturalKey}`,
    );
    this.name = 'NaturalKeyNotFoundError';
  }
}

export class InvalidAsOfDateError extends Error {
  readonly code = 'INVALID_AS_OF_DATE';

  constructor(
    public readonly dimensionId: string,
    public readonly naturalKey: string,
    public readonly asOfDate: string,
    public readonly currentEffectiveFrom: string,
  ) {
    super(
      `As-of date ${asOfDate} for ${dimensionId}/${naturalKey} precedes the current version's effective_from ${currentEffectiveFrom}`,
    );
    this.name = 'InvalidAsOfDateError';
  }
}

export class AmbiguousCurrentVersionError extends Error {
  readonly code = 'AMBIGUOUS_CURRENT_VERSION';

  constructor(
    public readonly dimensionId: string,
    public readonly naturalKey: string,
    public readonly surrogateKeys: number[],
  ) {
    super(
      `Natural key ${dimensionId}/${naturalKey} has ${surrogateKeys.length} current versions (surrogate keys ${surrogateKeys.join(', ')})`,
    );
    this.name = 'AmbiguousCurrentVersionError';
  }
}

export class ConcurrentModificationError extends Error {
  readonly code = 'CONCURRENT_MODIFICATION';

  constructor(
    public readonly dimensionId: string,
    public readonly naturalKey: string,
    public readonly expectedSurrogateKey: number | null,
  ) {
    super(
      expectedSurrogateKey === null
        ? `Concurrent modification on ${dimensionId}/${naturalKey}: a current version appeared during the write`
        : `Concurrent modification on ${dimensionId}/${naturalKey}: version ${expectedSurrogateKey} is no longer current`,
    );
    this.name = 'ConcurrentModificationError';
  }
}

export type DimensionErrorCode =
  | DimensionStoreError['code']
  | ValidationError['code']
  | UnknownDimensionError['code']
  | NaturalKeyNotFoundError['code']
  | InvalidAsOfDateError['code']
  | AmbiguousCurrentVersionError['code']
  | ConcurrentModificationError['code'];

export type DimensionError =
  | DimensionStoreError
  | ValidationError
  | UnknownDimensionError
  | NaturalKeyNotFoundError
  | InvalidAsOfDateError
  | AmbiguousCurrentVersionError
  | ConcurrentModificationError;

export function isDimensionError(error: unknown): error is DimensionError {
  return (
    error instanceof DimensionStoreError ||
    error instanceof ValidationError ||
    error instanceof UnknownDimensionError ||
    error instanceof NaturalKeyNotFoundError ||
    error instanceof InvalidAsOfDateError ||
    error instanceof AmbiguousCurrentVersionError ||
    error instanceof ConcurrentModificationError
  );
}
