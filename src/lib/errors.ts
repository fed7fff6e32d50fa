export enum ErrorCode {
  NOT_FOUND = 'NOT_FOUND',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
}

const STATUS_MAP: Record<ErrorCode, number> = {
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.SERVICE_UNAVAILABLE]: 503,
};

export class AppError extends Error {
  public status: number;

  constructor(
    public code: ErrorCode,
    message: string,
    status?: number,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    this.status = status ?? STATUS_MAP[code];
  }
}

export function notFound(message = 'Not found', details?: unknown): AppError {
  return new AppError(ErrorCode.NOT_FOUND, message, 404, details);
}

export function serviceUnavailable(message = 'Server is shutting down', details?: unknown): AppError {
  return new AppError(ErrorCode.SERVICE_UNAVAILABLE, message, 503, details);
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}
