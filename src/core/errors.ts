import type { ZodError } from 'zod';

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'ValidationError';
  }

  static fromZod(context: string, err: ZodError): ValidationError {
    const issues = err.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    return new ValidationError(`${context}: ${issues.join('; ')}`, issues);
  }
}

export class ConcurrencyError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
  ) {
    super(message);
    this.name = 'ConcurrencyError';
  }
}
