export type EngineErrorCode =
  | "CONNECTION"
  | "NOT_CONNECTED"
  | "INSUFFICIENT_MARGIN"
  | "ORDER_NOT_FOUND"
  | "POSITION_NOT_FOUND"
  | "INVALID_ORDER_REQUEST"
  | "INVALID_INSTRUMENT_DATA"
  | "SIZING_REJECTED"
  | "VENUE_REJECTION"
  | "CONFIG";

export class EngineError extends Error {
  constructor(
    readonly code: EngineErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConnectionError extends EngineError {
  constructor(message = "Broker is not connected", options?: { cause?: unknown }) {
    super("CONNECTION", message, options);
  }
}

export class NotConnectedError extends ConnectionError {
  constructor(operation: string) {
    super(`Broker is not connected (${operation})`);
  }
}

export class InsufficientMarginError extends EngineError {
  constructor(
    readonly symbol: string,
    readonly required: number,
    readonly available: number
  ) {
    super(
      "INSUFFICIENT_MARGIN",
      `Margin required ${required.toFixed(2)} exceeds free margin ${available.toFixed(2)} for ${symbol}`
    );
  }
}

export class OrderNotFoundError extends EngineError {
  constructor(readonly orderId: string) {
    super("ORDER_NOT_FOUND", `Order ${orderId} not found`);
  }
}

export class PositionNotFoundError extends EngineError {
  constructor(readonly symbol: string) {
    super("POSITION_NOT_FOUND", `No open position for ${symbol}`);
  }
}

export class InvalidOrderRequestError extends EngineError {
  constructor(message: string) {
    super("INVALID_ORDER_REQUEST", message);
  }
}

export class InvalidInstrumentDataError extends EngineError {
  constructor(
    readonly symbol: string,
    detail: string
  ) {
    super("INVALID_INSTRUMENT_DATA", `Invalid instrument data for ${symbol}: ${detail}`);
  }
}

export class SizingRejectedError extends EngineError {
  constructor(
    readonly symbol: string,
    reason: string
  ) {
    super("SIZING_REJECTED", `Sizing rejected for ${symbol}: ${reason}`);
  }
}

export class VenueRejectionError extends EngineError {
  constructor(
    readonly orderId: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super("VENUE_REJECTION", `Order ${orderId} rejected: ${reason}`, options);
  }
}

export class ConfigError extends EngineError {
  constructor(readonly issues: string[]) {
    super("CONFIG", `Invalid configuration: ${issues.join("; ")}`);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
