export class ExtractionFailedError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = "ExtractionFailedError";
  }
}

export class IndexNotFoundError extends Error {
  constructor(public readonly location: string) {
    super(`No index found at ${location}`);
    this.name = "IndexNotFoundError";
  }
}

export class IndexCorruptError extends Error {
  constructor(
    message: string,
    public readonly location: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = "IndexCorruptError";
  }
}

export class IndexWriteError extends Error {
  constructor(
    message: string,
    public readonly location: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = "IndexWriteError";
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function errorMessage(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}

export function isErrnoException(
  value: unknown,
): value is NodeJS.ErrnoException {
  return value instanceof Error && "code" in value;
}
