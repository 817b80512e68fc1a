import type { ZodIssue } from 'zod';

export class IncorrectDataReturnedError extends Error {
  constructor(
    message: string,
    public readonly page: number,
    public readonly issues: readonly ZodIssue[] = [],
  ) {
    super(message);
    this.name = 'IncorrectDataReturnedError';
  }
}

export class IllegalStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IllegalStateError';
  }
}
