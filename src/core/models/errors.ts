/**
 * Error taxonomy
 */

import type { AttemptCounters } from './types.js';

export type OracleFailureKind = 'transport' | 'policy' | 'empty';

/** The oracle could not produce text (transport failure, policy block, empty output) */
export class OracleError extends Error {
  readonly kind: OracleFailureKind;

  constructor(message: string, kind: OracleFailureKind = 'transport', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OracleError';
    this.kind = kind;
  }
}

/** The oracle answered with no text; callers may retry in another transmission mode */
export class EmptyOracleResponseError extends OracleError {
  constructor(message = 'Oracle returned an empty response') {
    super(message, 'empty');
    this.name = 'EmptyOracleResponseError';
  }
}

/** Generated code kept failing after every error-driven retry */
export class ExecutionExhaustedError extends Error {
  readonly trace: string;
  readonly counters: AttemptCounters;
  readonly code: string;

  constructor(message: string, params: { trace: string; counters: AttemptCounters; code: string }) {
    super(message);
    this.name = 'ExecutionExhaustedError';
    this.trace = params.trace;
    this.counters = params.counters;
    this.code = params.code;
  }
}

/** A format-specific parser could not open the document */
export class UnreadableDocumentError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UnreadableDocumentError';
    this.path = path;
  }
}

export type DocumentNotFoundReason = 'missing_path' | 'no_input' | 'missing_last_file';

/** No usable target document could be resolved for a request */
export class DocumentNotFoundError extends Error {
  readonly reason: DocumentNotFoundReason;
  readonly path?: string;

  constructor(reason: DocumentNotFoundReason, message: string, path?: string) {
    super(message);
    this.name = 'DocumentNotFoundError';
    this.reason = reason;
    this.path = path;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
