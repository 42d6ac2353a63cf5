/**
 * Error taxonomy for the signer, dispatcher and operations.
 * Errors are values here, returned inside results rather than thrown.
 */

import type { JsonValue } from './ghost.types.js';

export interface InvalidCredentialFormatError {
  kind: 'InvalidCredentialFormat';
  message: string;
}

export interface SigningError {
  kind: 'SigningError';
  message: string;
}

export interface UnsupportedMethodError {
  kind: 'UnsupportedMethod';
  message: string;
  method: string;
}

export interface HttpStatusError {
  kind: 'HttpStatusError';
  message: string;
  statusCode: number;
  url: string;
  headers: Record<string, string>;
  responseText: string;
}

export interface TransportError {
  kind: 'TransportError';
  message: string;
}

export interface ResponseShapeError {
  kind: 'ResponseShapeError';
  message: string;
  response: JsonValue | string;
}

export type GhostApiError =
  | InvalidCredentialFormatError
  | SigningError
  | UnsupportedMethodError
  | HttpStatusError
  | TransportError
  | ResponseShapeError;

export type Result<T, E = GhostApiError> =
  | { success: true; data: T }
  | { success: false; error: E };

export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

export function fail<E>(error: E): { success: false; error: E } {
  return { success: false, error };
}

/**
 * Thrown at startup when the environment cannot produce a usable config
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
