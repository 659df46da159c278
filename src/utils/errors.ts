import { MAX_QUANTITY } from '../constants';

/**
 * Domain errors surfaced to API callers.
 *
 * Every error carries the HTTP status, a stable machine-readable code and the
 * details a client needs to correct its request. The error middleware turns
 * them into the standard response envelope.
 */
export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, statusCode: number, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

export class InsufficientStockError extends AppError {
  readonly available: number;

  constructor(productId: number, available: number, requested: number) {
    super(
      `Insufficient stock for product ${productId}: ${available} available, ${requested} requested`,
      400,
      'INSUFFICIENT_STOCK',
      { product_id: productId, available, requested }
    );
    this.available = available;
  }
}

export class InvalidQuantityError extends AppError {
  constructor(quantity: number) {
    super(`Quantity must be a positive integer up to ${MAX_QUANTITY}`, 400, 'INVALID_QUANTITY', {
      quantity,
      max_quantity: MAX_QUANTITY,
    });
  }
}

export class StockLimitExceededError extends AppError {
  constructor(productId: number, stockQty: number, added: number) {
    super(
      `Adding ${added} units to product ${productId} would exceed the stock limit of ${MAX_QUANTITY}`,
      400,
      'STOCK_LIMIT_EXCEEDED',
      { product_id: productId, stock_qty: stockQty, requested: added, max_stock_qty: MAX_QUANTITY }
    );
  }
}

export class DriverUnavailableError extends AppError {
  constructor(driverId: number) {
    super(`Driver ${driverId} is not available for assignment`, 400, 'DRIVER_UNAVAILABLE', {
      driver_id: driverId,
    });
  }
}

export class InvalidAddressError extends AppError {
  constructor(message: string, allowedAddresses: string[]) {
    super(message, 400, 'INVALID_ADDRESS', { allowed_addresses: allowedAddresses });
  }
}

export class InvalidTransitionError extends AppError {
  readonly from: string;
  readonly to: string;
  readonly allowed: readonly string[];

  constructor(from: string, to: string, allowed: readonly string[]) {
    const targets = allowed.length > 0 ? allowed.join(', ') : 'none';
    super(
      `Invalid status transition from ${from} to ${to}. Allowed: ${targets}`,
      400,
      'INVALID_TRANSITION',
      { from, to, allowed: [...allowed] }
    );
    this.from = from;
    this.to = to;
    this.allowed = allowed;
  }
}

export class GpsAccuracyTooLowError extends AppError {
  constructor(accuracy: number, maxAccuracy: number) {
    super(`GPS accuracy must be at most ${maxAccuracy} meters`, 400, 'GPS_ACCURACY_TOO_LOW', {
      location_accuracy_m: accuracy,
      max_accuracy_m: maxAccuracy,
    });
  }
}

export class IncompleteLocationError extends AppError {
  constructor() {
    super('Latitude and longitude must be provided together', 400, 'INCOMPLETE_LOCATION');
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string = 'Authentication required') {
    super(message, 401, 'UNAUTHORIZED');
  }
}

export class PermissionDeniedError extends AppError {
  constructor(message: string = 'You do not have permission to perform this action') {
    super(message, 403, 'PERMISSION_DENIED');
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: number) {
    super(`${resource} ${id} not found`, 404, 'NOT_FOUND', { resource, id });
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 409, 'CONFLICT', details);
  }
}
