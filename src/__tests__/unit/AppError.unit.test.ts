/**
 * Unit Tests — AppError Hierarchy
 *
 * Status codes, isOperational and instanceof are what the error handler
 * and the CLI branch on; a broken prototype chain would turn 404s into 500s.
 */
import { AppError, ConflictError, NotFoundError, ValidationError } from '@shared/errors/AppError';

describe('AppError', () => {
  it('should set message and default statusCode to 500', () => {
    const error = new AppError('something broke');

    expect(error.message).toBe('something broke');
    expect(error.statusCode).toBe(500);
    expect(error.isOperational).toBe(true);
  });

  it('should accept a custom statusCode', () => {
    const error = new AppError('rate limited', 429);

    expect(error.statusCode).toBe(429);
    expect(error.isOperational).toBe(true);
  });

  it('should allow marking an error as non-operational', () => {
    const error = new AppError('fatal crash', 500, false);

    expect(error.isOperational).toBe(false);
  });

  it('should be an instance of both Error and AppError', () => {
    const error = new AppError('test');

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(AppError);
  });

  it('should capture a stack trace', () => {
    const error = new AppError('traced');

    expect(error.stack).toBeDefined();
    expect(error.stack).toContain('AppError');
  });

  it('should use the subclass name as the error name', () => {
    expect(new ConflictError('busy').name).toBe('ConflictError');
  });
});

describe('NotFoundError', () => {
  it('should set statusCode to 404 and format the message', () => {
    const error = new NotFoundError('Run', 'run-0001');

    expect(error.message).toBe('Run not found: run-0001');
    expect(error.statusCode).toBe(404);
    expect(error.isOperational).toBe(true);
  });

  it('should be an instance of both AppError and NotFoundError', () => {
    const error = new NotFoundError('Run', 'abc');

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(AppError);
    expect(error).toBeInstanceOf(NotFoundError);
  });
});

describe('ValidationError', () => {
  it('should set statusCode to 400', () => {
    const error = new ValidationError('lookbackMinutes: Too small: expected number to be >0');

    expect(error.message).toBe('lookbackMinutes: Too small: expected number to be >0');
    expect(error.statusCode).toBe(400);
    expect(error.isOperational).toBe(true);
  });

  it('should be an instance of AppError', () => {
    const error = new ValidationError('bad input');

    expect(error).toBeInstanceOf(AppError);
  });
});

describe('ConflictError', () => {
  it('should set statusCode to 409', () => {
    const error = new ConflictError('A collection run is already in progress');

    expect(error.message).toBe('A collection run is already in progress');
    expect(error.statusCode).toBe(409);
    expect(error.isOperational).toBe(true);
  });

  it('should be an instance of AppError', () => {
    const error = new ConflictError('duplicate');

    expect(error).toBeInstanceOf(AppError);
  });
});
