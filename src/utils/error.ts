export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly is_operational: boolean,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export enum HASH_MAP_ERROR {
  INVALID_KEY = "INVALID_KEY",
  INVALID_OPTION = "INVALID_OPTION",
}

export class HashMapError extends AppError {
  constructor(
    public readonly category: HASH_MAP_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, true, context);
  }
}

export function is_hash_map_error(error: unknown): error is HashMapError {
  return error instanceof HashMapError;
}
