import type { SourceKind } from './types/table';

export class FormatError extends Error {
  readonly kind: SourceKind;
  readonly source: string;

  constructor(kind: SourceKind, source: string, detail: string, options?: { cause?: unknown }) {
    super(`${kind} source "${source}" is malformed: ${detail}`, options);
    this.name = 'FormatError';
    this.kind = kind;
    this.source = source;
  }
}

export class ConnectivityError extends Error {
  readonly dialect: string;

  constructor(dialect: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`could not read from ${dialect} database: ${detail}`, { cause });
    this.name = 'ConnectivityError';
    this.dialect = dialect;
  }
}

export const describeError = (err: unknown) => (err instanceof Error ? err.message : String(err));
