export type KismetClientErrorCode =
  | 'HTTP_ERROR'
  | 'TIMEOUT'
  | 'ABORTED'
  | 'NETWORK_ERROR'
  | 'INVALID_JSON'
  | 'INVALID_RESPONSE';

export class KismetClientError extends Error {
  readonly statusCode: number;
  readonly code: KismetClientErrorCode;
  readonly details: unknown;

  constructor(
    message: string,
    options: { statusCode: number; code: KismetClientErrorCode; details?: unknown }
  ) {
    super(message);
    this.name = 'KismetClientError';
    this.statusCode = options.statusCode;
    this.code = options.code;
    this.details = options.details;
  }
}
