/**
 * Error Handling & User Messaging System
 *
 * Maps internal errors to user-friendly messages and HTTP status codes.
 * Provider names and raw upstream text never leave the server.
 */

import type { Request, Response, NextFunction } from "express";

export enum ErrorCode {
  // Upload Errors
  INVALID_IMAGE = 'INVALID_IMAGE',
  IMAGE_TOO_LARGE = 'IMAGE_TOO_LARGE',
  UNSUPPORTED_FORMAT = 'UNSUPPORTED_FORMAT',
  NOT_A_DOG = 'NOT_A_DOG',

  // Analysis Service Errors
  CLASSIFIER_UNAVAILABLE = 'CLASSIFIER_UNAVAILABLE',
  IDENTIFIER_UNAVAILABLE = 'IDENTIFIER_UNAVAILABLE',
  IDENTIFIER_BLOCKED = 'IDENTIFIER_BLOCKED',
  IDENTIFIER_QUOTA = 'IDENTIFIER_QUOTA',
  IDENTIFIER_TIMEOUT = 'IDENTIFIER_TIMEOUT',
  IDENTIFIER_UNPARSEABLE = 'IDENTIFIER_UNPARSEABLE',
  ANALYSIS_UNAVAILABLE = 'ANALYSIS_UNAVAILABLE',
  IMAGE_GENERATION_FAILED = 'IMAGE_GENERATION_FAILED',
  SIMULATION_TIMEOUT = 'SIMULATION_TIMEOUT',
  SIMULATION_SUPERSEDED = 'SIMULATION_SUPERSEDED',

  // Storage Errors
  STORAGE_FAILED = 'STORAGE_FAILED',
  DATABASE_QUERY_FAILED = 'DATABASE_QUERY_FAILED',

  // Validation Errors
  INVALID_INPUT = 'INVALID_INPUT',
  SCAN_NOT_FOUND = 'SCAN_NOT_FOUND',
  CORRECTION_NOT_FOUND = 'CORRECTION_NOT_FOUND',

  // Auth Errors
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',

  // Generic
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export interface UserMessage {
  title: string;
  message: string;
  action?: string; // What user should do
  retryAfterSeconds?: number;
}

/**
 * Map error codes to user-friendly messages
 */
const USER_MESSAGES: Record<ErrorCode, UserMessage> = {
  [ErrorCode.INVALID_IMAGE]: {
    title: 'Invalid image',
    message: 'The uploaded file could not be read as an image.',
    action: 'Please upload a JPEG, PNG, WEBP, GIF, AVIF, BMP or SVG photo.',
  },
  [ErrorCode.IMAGE_TOO_LARGE]: {
    title: 'Image too large',
    message: 'The image must not be larger than 10MB.',
    action: 'Please resize the photo and try again.',
  },
  [ErrorCode.UNSUPPORTED_FORMAT]: {
    title: 'Unsupported format',
    message: 'The image must be a file of type: jpeg, png, jpg, gif, svg, webp, avif, bmp.',
    action: 'Please convert the photo and try again.',
  },
  [ErrorCode.NOT_A_DOG]: {
    title: 'No dog detected',
    message: 'We couldn\'t find a dog in this photo.',
    action: 'Please upload a clear photo of a dog.',
  },

  [ErrorCode.CLASSIFIER_UNAVAILABLE]: {
    title: 'Breed scanner is busy',
    message: 'Our quick breed scanner is temporarily unavailable.',
    action: 'We\'ll use a detailed analysis instead.',
    retryAfterSeconds: 60,
  },
  [ErrorCode.IDENTIFIER_UNAVAILABLE]: {
    title: 'Breed analysis temporarily down',
    message: 'Our breed analysis service is unavailable.',
    action: 'Please try again in a few minutes.',
    retryAfterSeconds: 300,
  },
  [ErrorCode.IDENTIFIER_BLOCKED]: {
    title: 'Photo could not be analyzed',
    message: 'This photo could not be analyzed.',
    action: 'Please try a different photo of your dog.',
  },
  [ErrorCode.IDENTIFIER_QUOTA]: {
    title: 'Breed analysis is busy',
    message: 'Our breed analysis service is handling a lot of requests.',
    action: 'Please try again in a minute.',
    retryAfterSeconds: 60,
  },
  [ErrorCode.IDENTIFIER_TIMEOUT]: {
    title: 'Breed analysis is slow',
    message: 'Breed analysis is taking longer than usual.',
    action: 'Please try again in a moment.',
    retryAfterSeconds: 30,
  },
  [ErrorCode.IDENTIFIER_UNPARSEABLE]: {
    title: 'Breed analysis failed',
    message: 'We couldn\'t make sense of the analysis for this photo.',
    action: 'Please try again or use a different photo.',
    retryAfterSeconds: 10,
  },
  [ErrorCode.ANALYSIS_UNAVAILABLE]: {
    title: 'Analysis unavailable',
    message: 'Breed analysis is temporarily unavailable.',
    action: 'Please try again in a few minutes.',
    retryAfterSeconds: 300,
  },
  [ErrorCode.IMAGE_GENERATION_FAILED]: {
    title: 'Age simulation failed',
    message: 'We couldn\'t generate the age simulation images.',
    action: 'You can regenerate the simulation from the results page.',
    retryAfterSeconds: 60,
  },
  [ErrorCode.SIMULATION_TIMEOUT]: {
    title: 'Age simulation timed out',
    message: 'The age simulation took too long to finish.',
    action: 'You can regenerate the simulation from the results page.',
  },
  [ErrorCode.SIMULATION_SUPERSEDED]: {
    title: 'Age simulation restarted',
    message: 'A newer age simulation request replaced this one.',
    action: 'Wait for the new simulation to finish.',
  },

  [ErrorCode.STORAGE_FAILED]: {
    title: 'Storage issue',
    message: 'We couldn\'t save or load an image right now.',
    action: 'Please try again.',
    retryAfterSeconds: 10,
  },
  [ErrorCode.DATABASE_QUERY_FAILED]: {
    title: 'Data access failed',
    message: 'We couldn\'t retrieve the data you requested.',
    action: 'Please try again.',
    retryAfterSeconds: 10,
  },

  [ErrorCode.INVALID_INPUT]: {
    title: 'Invalid input',
    message: 'The information you provided isn\'t valid.',
    action: 'Please check your input and try again.',
  },
  [ErrorCode.SCAN_NOT_FOUND]: {
    title: 'Scan not found',
    message: 'We couldn\'t find that scan.',
    action: 'Double-check the link or upload a new photo.',
  },
  [ErrorCode.CORRECTION_NOT_FOUND]: {
    title: 'Correction not found',
    message: 'We couldn\'t find that correction.',
  },

  [ErrorCode.UNAUTHORIZED]: {
    title: 'Please log in',
    message: 'You need to log in to do this.',
    action: 'Log in and try again.',
  },
  [ErrorCode.FORBIDDEN]: {
    title: 'Access denied',
    message: 'You don\'t have permission to do this.',
  },

  [ErrorCode.INTERNAL_ERROR]: {
    title: 'Something went wrong',
    message: 'We\'re experiencing a temporary issue.',
    action: 'Please try again in a moment.',
    retryAfterSeconds: 10,
  },
};

/**
 * Map error codes to HTTP status codes and retry behavior
 */
const ERROR_PROPERTIES: Record<ErrorCode, { statusCode: number; isRetryable: boolean }> = {
  [ErrorCode.INVALID_IMAGE]: { statusCode: 400, isRetryable: false },
  [ErrorCode.IMAGE_TOO_LARGE]: { statusCode: 413, isRetryable: false },
  [ErrorCode.UNSUPPORTED_FORMAT]: { statusCode: 415, isRetryable: false },
  [ErrorCode.NOT_A_DOG]: { statusCode: 422, isRetryable: false },
  [ErrorCode.CLASSIFIER_UNAVAILABLE]: { statusCode: 503, isRetryable: true },
  [ErrorCode.IDENTIFIER_UNAVAILABLE]: { statusCode: 503, isRetryable: true },
  [ErrorCode.IDENTIFIER_BLOCKED]: { statusCode: 422, isRetryable: false },
  [ErrorCode.IDENTIFIER_QUOTA]: { statusCode: 429, isRetryable: true },
  [ErrorCode.IDENTIFIER_TIMEOUT]: { statusCode: 504, isRetryable: true },
  [ErrorCode.IDENTIFIER_UNPARSEABLE]: { statusCode: 502, isRetryable: true },
  [ErrorCode.ANALYSIS_UNAVAILABLE]: { statusCode: 503, isRetryable: true },
  [ErrorCode.IMAGE_GENERATION_FAILED]: { statusCode: 503, isRetryable: true },
  [ErrorCode.SIMULATION_TIMEOUT]: { statusCode: 504, isRetryable: true },
  [ErrorCode.SIMULATION_SUPERSEDED]: { statusCode: 409, isRetryable: false },
  [ErrorCode.STORAGE_FAILED]: { statusCode: 503, isRetryable: true },
  [ErrorCode.DATABASE_QUERY_FAILED]: { statusCode: 500, isRetryable: true },
  [ErrorCode.INVALID_INPUT]: { statusCode: 400, isRetryable: false },
  [ErrorCode.SCAN_NOT_FOUND]: { statusCode: 404, isRetryable: false },
  [ErrorCode.CORRECTION_NOT_FOUND]: { statusCode: 404, isRetryable: false },
  [ErrorCode.UNAUTHORIZED]: { statusCode: 401, isRetryable: false },
  [ErrorCode.FORBIDDEN]: { statusCode: 403, isRetryable: false },
  [ErrorCode.INTERNAL_ERROR]: { statusCode: 500, isRetryable: true },
};

export type ErrorContext = Record<string, string | number | boolean | null | undefined>;

/**
 * Application error with proper context
 */
export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    public originalError?: Error,
    public context?: ErrorContext,
    // Replaces the stock message; only ever set from our own text
    public detail?: string,
  ) {
    super(detail ?? USER_MESSAGES[code].message);
    this.name = 'AppError';
  }

  getUserMessage(): UserMessage {
    return { ...USER_MESSAGES[this.code], message: this.message };
  }

  getStatusCode(): number {
    return ERROR_PROPERTIES[this.code].statusCode;
  }

  isRetryable(): boolean {
    return ERROR_PROPERTIES[this.code].isRetryable;
  }

  toJSON() {
    const userMessage = USER_MESSAGES[this.code];
    return {
      code: this.code,
      title: userMessage.title,
      message: this.message,
      action: userMessage.action,
      retryAfterSeconds: userMessage.retryAfterSeconds,
      statusCode: this.getStatusCode(),
      isRetryable: this.isRetryable(),
    };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, public field = 'image', code: ErrorCode = ErrorCode.INVALID_IMAGE) {
    super(code, undefined, { field }, message);
    this.name = 'ValidationError';
  }
}

export class NotADogError extends AppError {
  constructor() {
    super(ErrorCode.NOT_A_DOG);
    this.name = 'NotADogError';
  }
}

export type ExternalService = 'classifier' | 'identifier' | 'image_generation';
export type ExternalFailureKind = 'unavailable' | 'blocked' | 'quota' | 'network' | 'timeout';

const IDENTIFIER_CODES: Record<ExternalFailureKind, ErrorCode> = {
  unavailable: ErrorCode.IDENTIFIER_UNAVAILABLE,
  network: ErrorCode.IDENTIFIER_UNAVAILABLE,
  blocked: ErrorCode.IDENTIFIER_BLOCKED,
  quota: ErrorCode.IDENTIFIER_QUOTA,
  timeout: ErrorCode.IDENTIFIER_TIMEOUT,
};

function codeForService(service: ExternalService, kind: ExternalFailureKind): ErrorCode {
  switch (service) {
    case 'classifier':
      return ErrorCode.CLASSIFIER_UNAVAILABLE;
    case 'identifier':
      return IDENTIFIER_CODES[kind];
    case 'image_generation':
      return ErrorCode.IMAGE_GENERATION_FAILED;
  }
}

export class ExternalServiceError extends AppError {
  constructor(
    public service: ExternalService,
    public kind: ExternalFailureKind,
    originalError?: Error,
  ) {
    super(codeForService(service, kind), originalError, { service, kind });
    this.name = 'ExternalServiceError';
  }

  isRetryable(): boolean {
    return this.kind !== 'blocked';
  }
}

export class ParseError extends AppError {
  constructor(public service: ExternalService, reason: string) {
    super(ErrorCode.IDENTIFIER_UNPARSEABLE, new Error(reason), { service });
    this.name = 'ParseError';
  }
}

export class StorageError extends AppError {
  constructor(public operation: string, originalError?: Error) {
    super(ErrorCode.STORAGE_FAILED, originalError, { operation });
    this.name = 'StorageError';
  }
}

export class JobTimeoutError extends AppError {
  constructor(public timeoutMs: number) {
    super(ErrorCode.SIMULATION_TIMEOUT, new Error(`Operation timed out after ${timeoutMs}ms`), { timeoutMs });
    this.name = 'JobTimeoutError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Infer what kind of upstream failure an error is from its status or message
 */
export function classifyFailure(error: unknown): ExternalFailureKind {
  if (error instanceof ExternalServiceError) return error.kind;

  const status = typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
    ? error.status
    : undefined;
  const name = error instanceof Error ? error.name : '';
  const message = errorMessage(error).toLowerCase();

  if (status === 429 || message.includes('rate limit') || message.includes('quota')) return 'quota';
  if (status === 408 || status === 504 || name === 'TimeoutError' || name === 'AbortError' || message.includes('timed out') || message.includes('timeout')) {
    return 'timeout';
  }
  if (message.includes('safety') || message.includes('blocked') || message.includes('content policy')) return 'blocked';
  if (message.includes('fetch failed') || message.includes('econnrefused') || message.includes('enotfound') || message.includes('connection error')) {
    return 'network';
  }
  return 'unavailable';
}

/**
 * Helper to convert any error to AppError
 */
export function toAppError(error: unknown, defaultCode = ErrorCode.INTERNAL_ERROR): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof Error) {
    // body-parser rejects oversized uploads before they reach a route
    if ('type' in error && error.type === 'entity.too.large') {
      return new AppError(ErrorCode.IMAGE_TOO_LARGE, error);
    }
    if ('type' in error && error.type === 'entity.parse.failed') {
      return new AppError(ErrorCode.INVALID_INPUT, error);
    }
    if (error.message.includes('database') || error.message.includes('relation')) {
      return new AppError(ErrorCode.DATABASE_QUERY_FAILED, error);
    }
    return new AppError(defaultCode, error);
  }

  return new AppError(defaultCode, new Error(String(error)));
}

/**
 * Express error middleware, registered after every route
 */
export function errorMiddleware(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  const appError = toAppError(err);
  if (appError.getStatusCode() >= 500) {
    console.error(`[Error] ${appError.code}:`, appError.originalError?.message ?? appError.message);
  }
  res.status(appError.getStatusCode()).json(appError.toJSON());
}
