/**
 * Typed errors raised by the search core.
 *
 * - QuerySyntaxError: malformed query text, annotated with the offending position
 * - ConfigurationError: invalid synonym classes or engine configuration
 * - IngestError: a malformed document payload; the corpus is left untouched
 * - InvalidArgumentError: invalid search options
 * - IndexCorruptionError: a broken index invariant; not recoverable
 * - SearchCancelledError: the caller aborted a running search
 */

export const ErrorCode = {
  QUERY_SYNTAX: "QUERY_SYNTAX",
  CONFIGURATION: "CONFIGURATION",
  INGEST: "INGEST",
  INVALID_ARGUMENT: "INVALID_ARGUMENT",
  INDEX_CORRUPTION: "INDEX_CORRUPTION",
  SEARCH_CANCELLED: "SEARCH_CANCELLED",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface Issue {
  path: string;
  message: string;
}

export class SearchCoreError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = "SearchCoreError";
    this.code = code;
    this.details = details;
  }

  /** Structured form for the logger's `err` serializer. */
  toLogContext(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
    };
  }
}

export class QuerySyntaxError extends SearchCoreError {
  /** 0-based character offset into `query`. */
  readonly position: number;
  readonly query: string;

  constructor(message: string, query: string, position: number) {
    super(`${message} at position ${position}`, ErrorCode.QUERY_SYNTAX, { query, position });
    this.name = "QuerySyntaxError";
    this.query = query;
    this.position = position;
  }
}

export class ConfigurationError extends SearchCoreError {
  readonly issues: Issue[];

  constructor(message: string, issues: Issue[] = []) {
    super(message, ErrorCode.CONFIGURATION, issues.length ? { issues } : undefined);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export class IngestError extends SearchCoreError {
  readonly documentId?: string;
  readonly issues: Issue[];

  constructor(message: string, documentId: string | undefined, issues: Issue[] = []) {
    super(message, ErrorCode.INGEST, { documentId, issues });
    this.name = "IngestError";
    this.documentId = documentId;
    this.issues = issues;
  }
}

export class InvalidArgumentError extends SearchCoreError {
  readonly issues: Issue[];

  constructor(message: string, issues: Issue[] = []) {
    super(message, ErrorCode.INVALID_ARGUMENT, issues.length ? { issues } : undefined);
    this.name = "InvalidArgumentError";
    this.issues = issues;
  }
}

export class IndexCorruptionError extends SearchCoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.INDEX_CORRUPTION, details);
    this.name = "IndexCorruptionError";
  }
}

export class SearchCancelledError extends SearchCoreError {
  constructor(reason?: unknown) {
    super("search cancelled", ErrorCode.SEARCH_CANCELLED, reason === undefined ? undefined : { reason: String(reason) });
    this.name = "SearchCancelledError";
  }
}

/** Converts zod-style issue paths into `$.a.b` form. */
export function toIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): Issue[] {
  return issues.map((i) => ({
    path: ["$", ...i.path.map((p) => (typeof p === "number" ? `[${p}]` : p))].join(".").replace(/\.\[/g, "["),
    message: i.message,
  }));
}
