export class GzipStaticError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends GzipStaticError {}

export class NoCompressorFoundError extends GzipStaticError {
  readonly candidates: readonly string[];

  constructor(candidates: readonly string[]) {
    const tried = candidates.length > 0 ? candidates.map((c) => `"${c}"`).join(", ") : "(none)";
    super(`No compressor found, tried: ${tried}`);
    this.candidates = candidates;
  }
}

export class TraversalError extends GzipStaticError {
  readonly path: string;

  constructor(dir: string, cause: unknown) {
    super(`Cannot traverse ${dir}: ${describeError(cause)}`, { cause });
    this.path = dir;
  }
}

export class CompressionFailedError extends GzipStaticError {
  readonly file: string;
  readonly exitStatus: number | null;
  readonly signal: string | null;

  constructor(file: string, exitStatus: number | null, signal: string | null, cause?: unknown) {
    let reason: string;
    if (cause !== undefined) {
      reason = describeError(cause);
    } else if (signal !== null) {
      reason = `killed by ${signal}`;
    } else {
      reason = `exit status ${exitStatus ?? "unknown"}`;
    }
    super(`Compression failed for ${file}: ${reason}`, { cause });
    this.file = file;
    this.exitStatus = exitStatus;
    this.signal = signal;
  }
}

export class TimestampError extends GzipStaticError {
  readonly file: string;

  constructor(file: string, cause: unknown) {
    super(`Could not set modification time on ${file}: ${describeError(cause)}`, { cause });
    this.file = file;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
