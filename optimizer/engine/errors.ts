/**
 * Error taxonomy for the optimization loop.
 *
 * Prunable errors end one trial and the study moves on. Fatal errors abort
 * the study. CacheCorruptionError is only ever logged.
 */

import type { TrialError } from '../../src/types/common.js';

export type ErrorKind =
  | 'ProvisioningError'
  | 'ConfigApplyError'
  | 'NotReadyError'
  | 'BenchmarkExecutionError'
  | 'ParseError'
  | 'CacheCorruptionError'
  | 'InvalidParameterSpaceError'
  | 'StudyStorageError';

export abstract class OptimizerError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly prunable: boolean;

  constructor(message: string, public readonly cause?: Error) {
    super(message);
  }
}

/**
 * The broker could not produce a reachable deployment
 */
export class ProvisioningError extends OptimizerError {
  readonly kind = 'ProvisioningError';
  readonly prunable = true;

  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'ProvisioningError';
  }
}

export class ConfigApplyError extends OptimizerError {
  readonly kind = 'ConfigApplyError';
  readonly prunable = true;

  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'ConfigApplyError';
  }
}

export class NotReadyError extends OptimizerError {
  readonly kind = 'NotReadyError';
  readonly prunable = true;

  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'NotReadyError';
  }
}

/**
 * Non-zero exit, timeout or unusable result from the benchmark tool
 */
export class BenchmarkExecutionError extends OptimizerError {
  readonly kind = 'BenchmarkExecutionError';
  readonly prunable = true;

  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'BenchmarkExecutionError';
  }
}

export class ParseError extends OptimizerError {
  readonly kind = 'ParseError';
  readonly prunable = true;

  constructor(message: string, public readonly snippet: string, cause?: Error) {
    super(message, cause);
    this.name = 'ParseError';
  }
}

export class CacheCorruptionError extends OptimizerError {
  readonly kind = 'CacheCorruptionError';
  readonly prunable = false;

  constructor(message: string, public readonly line: number, cause?: Error) {
    super(message, cause);
    this.name = 'CacheCorruptionError';
  }
}

export class InvalidParameterSpaceError extends OptimizerError {
  readonly kind = 'InvalidParameterSpaceError';
  readonly prunable = false;

  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'InvalidParameterSpaceError';
  }
}

export class StudyStorageError extends OptimizerError {
  readonly kind = 'StudyStorageError';
  readonly prunable = false;

  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'StudyStorageError';
  }
}

export function isPrunable(error: unknown): error is OptimizerError {
  return error instanceof OptimizerError && error.prunable;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Flattens any thrown value into the shape stored on a TrialResult
 */
export function describeError(error: unknown): TrialError {
  if (error instanceof ParseError) {
    return { kind: error.kind, message: error.message, snippet: error.snippet };
  }
  if (error instanceof OptimizerError) {
    return { kind: error.kind, message: error.message };
  }
  if (error instanceof Error) {
    return { kind: error.name || 'Error', message: error.message };
  }
  return { kind: 'Error', message: String(error) };
}
