export enum ErrorCode {
  INTERNAL = 'INTERNAL',
  NOT_FOUND = 'NOT_FOUND',
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',
  VALIDATION = 'VALIDATION',
  RATE_LIMITED = 'RATE_LIMITED',
  CONFLICT = 'CONFLICT',
  BAD_REQUEST = 'BAD_REQUEST',
}

const HTTP_STATUS_MAP: Record<ErrorCode, number> = {
  [ErrorCode.INTERNAL]: 500,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.FORBIDDEN]: 403,
  [ErrorCode.VALIDATION]: 422,
  [ErrorCode.RATE_LIMITED]: 429,
  [ErrorCode.CONFLICT]: 409,
  [ErrorCode.BAD_REQUEST]: 400,
};

/**
 * Application close codes (4000-4999). Admission failures close the socket with
 * one of these before any room logic runs, so clients can tell "retry later"
 * (4005) from "log in again" (4002) from "no access to this room" (4003).
 */
const WS_CLOSE_MAP: Record<ErrorCode, number> = {
  [ErrorCode.INTERNAL]: 4000,
  [ErrorCode.NOT_FOUND]: 4001,
  [ErrorCode.UNAUTHORIZED]: 4002,
  [ErrorCode.FORBIDDEN]: 4003,
  [ErrorCode.VALIDATION]: 4004,
  [ErrorCode.RATE_LIMITED]: 4005,
  [ErrorCode.CONFLICT]: 4006,
  [ErrorCode.BAD_REQUEST]: 4007,
};

// RFC 6455 caps the close reason at 123 bytes.
const MAX_CLOSE_REASON_BYTES = 123;

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly httpStatus: number;
  public readonly wsCloseCode: number;
  public readonly safeMeta: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, safeMeta: Record<string, unknown> = {}) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.httpStatus = HTTP_STATUS_MAP[code];
    this.wsCloseCode = WS_CLOSE_MAP[code];
    this.safeMeta = safeMeta;
  }

  static rateLimited(retryAfterSeconds: number): AppError {
    return new AppError(ErrorCode.RATE_LIMITED, 'Rate limit exceeded, retry later', {
      retryAfter: retryAfterSeconds,
    });
  }

  static unauthorized(): AppError {
    return new AppError(ErrorCode.UNAUTHORIZED, 'Session expired or invalid');
  }

  static roomAccessDenied(roomId: string): AppError {
    return new AppError(ErrorCode.FORBIDDEN, 'Access to room denied', { roomId });
  }

  get closeReason(): string {
    const encoded = Buffer.from(this.message, 'utf-8');
    if (encoded.length <= MAX_CLOSE_REASON_BYTES) return this.message;
    return encoded.subarray(0, MAX_CLOSE_REASON_BYTES).toString('utf-8').replace(/�+$/, '');
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      ...this.safeMeta,
    };
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}
