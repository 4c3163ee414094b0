/**
 * Application error carrying an HTTP-style status and a stable code,
 * so callers of the engine can map failures without string matching.
 */
export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code: string = 'INTERNAL_ERROR',
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(entity: 'Item' | 'Category', id: string) {
    super(404, `${entity} not found: ${id}`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ArithmeticError extends AppError {
  constructor(message: string) {
    super(422, message, 'ARITHMETIC_ERROR');
    this.name = 'ArithmeticError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
