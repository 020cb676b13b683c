/**
 * Error taxonomy shared by every layer.
 *
 * None of these may escape into the observed pipeline: adapters catch them
 * at their transport boundary and log.
 */

export type PipelineErrorCode =
  | 'VALIDATION_ERROR'
  | 'TRANSPORT_ERROR'
  | 'WATCH_SOURCE_UNAVAILABLE'
  | 'CONFIG_ERROR';

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/** Malformed event payload: rejected, never stored. */
export class ValidationError extends PipelineError {
  readonly code = 'VALIDATION_ERROR' as const;
  readonly issues: readonly ValidationIssue[];

  constructor(message: string, issues: readonly ValidationIssue[] = []) {
    super(message);
    this.issues = issues;
  }
}

/** A single producer or consumer connection failed. */
export class TransportError extends PipelineError {
  readonly code = 'TRANSPORT_ERROR' as const;
  readonly connection: string;

  constructor(connection: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.connection = connection;
  }
}

/** Progress log missing, truncated mid-read or unreadable. */
export class WatchSourceUnavailable extends PipelineError {
  readonly code = 'WATCH_SOURCE_UNAVAILABLE' as const;
  readonly path: string;

  constructor(path: string, options?: ErrorOptions) {
    super(`Watch source unavailable: ${path}`, options);
    this.path = path;
  }
}

export class ConfigError extends PipelineError {
  readonly code = 'CONFIG_ERROR' as const;
  readonly issues: readonly ValidationIssue[];

  constructor(issues: readonly ValidationIssue[]) {
    super(`Invalid configuration: ${issues.map((i) => `${i.path} ${i.message}`).join('; ')}`);
    this.issues = issues;
  }
}
