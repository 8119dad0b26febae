import { ZodError } from 'zod';
import { fromZodError } from 'zod-validation-error';
import type { DestinationKind, TranscriptionProvider } from '../types';

export interface AppError extends Error {
  statusCode?: number;
  isOperational?: boolean;
}

/** Malformed or unroutable webhook. Nothing is persisted. */
export class ValidationError extends Error implements AppError {
  statusCode = 400;
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class AuthenticationError extends Error implements AppError {
  statusCode = 401;
  isOperational = true;
  constructor(message = 'Invalid webhook signature') {
    super(message);
    this.name = 'AuthenticationError';
  }
}

export class NotFoundError extends Error implements AppError {
  statusCode = 404;
  isOperational = true;
  constructor(resource: string) {
    super(`${resource} not found`);
    this.name = 'NotFoundError';
  }
}

/** Transcript source unavailable. Persisted as `failed`. */
export class ProviderFetchError extends Error implements AppError {
  statusCode = 502;
  isOperational = true;
  provider: TranscriptionProvider;
  constructor(provider: TranscriptionProvider, message: string) {
    super(message);
    this.name = 'ProviderFetchError';
    this.provider = provider;
  }
}

/** LLM call failed or returned something we could not parse. Persisted as `failed_partial`. */
export class ExtractionError extends Error implements AppError {
  statusCode = 502;
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = 'ExtractionError';
  }
}

export class DispatchError extends Error implements AppError {
  statusCode = 502;
  isOperational = true;
  destination: DestinationKind;
  constructor(destination: DestinationKind, message: string) {
    super(`${destination} error: ${message}`);
    this.name = 'DispatchError';
    this.destination = destination;
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return fromZodError(error).message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return 'An unexpected error occurred';
}

export function getErrorStatusCode(error: unknown): number {
  if (error instanceof ZodError) {
    return 400;
  }
  if (error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return 500;
}
