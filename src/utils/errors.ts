export class GatewayError extends Error {
  readonly status: number;
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, status: number, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'GatewayError';
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

export class NotFoundError extends GatewayError {
  constructor(message = 'Not found', details?: Record<string, unknown>) {
    super(message, 404, 'not_found', details);
    this.name = 'NotFoundError';
  }
}

export class SymbolNotFoundError extends GatewayError {
  readonly symbol: string;

  constructor(symbol: string) {
    super(`Symbol not found: ${symbol}`, 404, 'symbol_not_found', { symbol });
    this.name = 'SymbolNotFoundError';
    this.symbol = symbol;
  }
}

export class OrderNotUpdatableError extends GatewayError {
  constructor(id: number, status: string) {
    super(`Order ${id} is ${status}; only queued orders can be changed`, 400, 'order_not_updatable', {
      id,
      status,
    });
    this.name = 'OrderNotUpdatableError';
  }
}

export class LeverageLimitError extends GatewayError {
  constructor(leverage: number, maxLeverage: number) {
    super(`Leverage ${leverage}x exceeds the maximum of ${maxLeverage}x`, 400, 'leverage_exceeds_limit', {
      leverage,
      maxLeverage,
    });
    this.name = 'LeverageLimitError';
  }
}

/** Network failure, timeout or non-2xx answer from the exchange. */
export class UpstreamError extends GatewayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 502, 'upstream_error', details);
    this.name = 'UpstreamError';
  }
}

export class CredentialsMissingError extends GatewayError {
  constructor() {
    super('Exchange API credentials are not configured', 503, 'credentials_missing');
    this.name = 'CredentialsMissingError';
  }
}

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
