/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 * Two kinds of errors reach the edges of the app:
 *
 *   1. Operational errors — expected problems like "run not found", a run
 *      already in progress, or a collector failure (see CollectorError.ts).
 *      They carry the HTTP status the API should answer with.
 *
 *   2. Programmer errors — unexpected bugs. These get a generic 500 and are
 *      logged for debugging.
 *
 * `isOperational` tells the two apart for the global error handler
 * (errorHandler.ts), and the CLI uses the same split to pick an exit code.
 *
 * `Object.setPrototypeOf(this, new.target.prototype)` keeps `instanceof`
 * working for every subclass regardless of compilation target.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode = 500, isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier: string) {
    super(`${resource} not found: ${identifier}`, 404);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}
