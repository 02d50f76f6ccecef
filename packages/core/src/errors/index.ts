/**
 * Custom Error Classes
 */

import type { JobState } from '../types/job.js';

/**
 * Base error class for all tinythis errors
 */
export class TinythisError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TinythisError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid user input: unsupported extension, missing file, empty file list
 */
export class ValidationError extends TinythisError {
  constructor(field: string, message: string, details: Record<string, unknown> = {}) {
    super(
      `${message}: ${field}`,
      'VALIDATION_ERROR',
      { field, message, ...details }
    );
    this.name = 'ValidationError';
  }
}

/**
 * A required external resource (the encoder) could not be found
 */
export class ResourceUnavailableError extends TinythisError {
  constructor(resource: string, hint?: string) {
    super(
      hint ? `${resource} not available; ${hint}` : `${resource} not available`,
      'RESOURCE_UNAVAILABLE',
      { resource }
    );
    this.name = 'ResourceUnavailableError';
  }
}

/**
 * Encoder exited unsuccessfully, or exited cleanly without producing output
 */
export class ExecutionError extends TinythisError {
  public readonly exitCode: number | null;
  public readonly stderr: string;

  constructor(
    message: string,
    command: string,
    exitCode: number | null,
    stderr: string
  ) {
    super(
      message,
      'EXECUTION_ERROR',
      { command, exitCode, stderr: stderr.substring(0, 4000) }
    );
    this.name = 'ExecutionError';
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/**
 * User-initiated cancellation. Reported separately from failures.
 */
export class CancellationError extends TinythisError {
  constructor(jobId: string) {
    super(`Job ${jobId} was cancelled`, 'CANCELLED', { jobId });
    this.name = 'CancellationError';
  }
}

/**
 * Output location problems: unwritable directory, name suffixes exhausted
 */
export class FilesystemError extends TinythisError {
  constructor(path: string, message: string, cause?: string) {
    super(
      cause ? `${message}: ${path} (${cause})` : `${message}: ${path}`,
      'FILESYSTEM_ERROR',
      { path, cause }
    );
    this.name = 'FilesystemError';
  }
}

/**
 * State transition error for invalid state changes
 */
export class StateTransitionError extends TinythisError {
  constructor(
    jobId: string,
    fromState: JobState,
    toState: JobState,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      { jobId, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * Queue operation not allowed for the targeted job
 */
export class QueueError extends TinythisError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'QUEUE_ERROR', details);
    this.name = 'QueueError';
  }
}

/**
 * Normalize anything thrown into a TinythisError
 */
export function toTinythisError(error: unknown): TinythisError {
  if (error instanceof TinythisError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new TinythisError(message, 'INTERNAL_ERROR');
}
