/**
 * Typed failures raised by the pool kernel and the services around it.
 * Every failure carries a stable `code`, the HTTP status the server answers with
 * and free-form metadata describing the offending values.
 */

export enum KernelErrorCode {
  // Numeric safety
  DOMAIN_ERROR = "domain_error",
  NON_POSITIVE_DOMAIN = "non_positive_domain",

  // Pricing and swaps
  ZERO_LIQUIDITY = "zero_liquidity",
  INFEASIBLE_OUTPUT = "infeasible_output",
  LIMIT_NOT_ABOVE_CURRENT = "limit_not_above_current",
  SLIPPAGE_EXCEEDED = "slippage_exceeded",

  // Liquidity solver
  SOLVER_DID_NOT_CONVERGE = "solver_did_not_converge",

  // Requests and custody
  INVALID_REQUEST = "invalid_request",
  INSUFFICIENT_BALANCE = "insufficient_balance",
  POOL_NOT_FOUND = "pool_not_found",
}

export class KernelError extends Error {
  public readonly code: KernelErrorCode;
  public readonly statusCode: number;
  public readonly metadata: Record<string, unknown>;

  constructor(
    message: string,
    code: KernelErrorCode,
    options: {
      statusCode?: number;
      cause?: Error;
      metadata?: Record<string, unknown>;
    } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = options.statusCode ?? 422;
    this.metadata = options.metadata ?? {};

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      statusCode: this.statusCode,
      metadata: this.metadata,
    };
  }
}

/** exp/ln argument outside the representable range. */
export class DomainError extends KernelError {
  constructor(operation: "exp" | "ln", argument: string, metadata?: Record<string, unknown>) {
    super(`${operation} argument out of range: ${argument}`, KernelErrorCode.DOMAIN_ERROR, {
      metadata: { ...metadata, operation, argument },
    });
  }
}

/** A guarded inner term (the argument of a later ln) is not strictly positive. */
export class NonPositiveDomainError extends KernelError {
  constructor(term: string, value: string, metadata?: Record<string, unknown>) {
    super(`${term} must be strictly positive, got ${value}`, KernelErrorCode.NON_POSITIVE_DOMAIN, {
      metadata: { ...metadata, term, value },
    });
  }
}

export class ZeroLiquidityError extends KernelError {
  constructor(metadata?: Record<string, unknown>) {
    super("Pool size S(q) is zero", KernelErrorCode.ZERO_LIQUIDITY, {
      statusCode: 409,
      metadata,
    });
  }
}

export class InfeasibleOutputError extends KernelError {
  constructor(target: string, asymptote: string, metadata?: Record<string, unknown>) {
    super(
      `Output ${target} is at or beyond the reachable asymptote ${asymptote}`,
      KernelErrorCode.INFEASIBLE_OUTPUT,
      { metadata: { ...metadata, target, asymptote } }
    );
  }
}

export class LimitNotAboveCurrentError extends KernelError {
  constructor(limitRatio: string, currentRatio: string, metadata?: Record<string, unknown>) {
    super(
      `Limit ratio ${limitRatio} is not above the current ratio ${currentRatio}`,
      KernelErrorCode.LIMIT_NOT_ABOVE_CURRENT,
      { metadata: { ...metadata, limitRatio, currentRatio } }
    );
  }
}

export class SlippageExceededError extends KernelError {
  constructor(field: string, actual: string, minimum: string, metadata?: Record<string, unknown>) {
    super(`${field} ${actual} is below the minimum ${minimum}`, KernelErrorCode.SLIPPAGE_EXCEEDED, {
      metadata: { ...metadata, field, actual, minimum },
    });
  }
}

export class SolverDidNotConvergeError extends KernelError {
  constructor(iterations: number, reason: string, metadata?: Record<string, unknown>) {
    super(
      `Single-asset solver did not converge after ${iterations} iterations: ${reason}`,
      KernelErrorCode.SOLVER_DID_NOT_CONVERGE,
      { statusCode: 500, metadata: { ...metadata, iterations, reason } }
    );
  }
}

export class InvalidRequestError extends KernelError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message, KernelErrorCode.INVALID_REQUEST, { statusCode: 400, metadata });
  }
}

export class InsufficientBalanceError extends KernelError {
  constructor(account: string, asset: string, required: string, available: string) {
    super(
      `Account ${account} holds ${available} ${asset}, needs ${required}`,
      KernelErrorCode.INSUFFICIENT_BALANCE,
      { statusCode: 400, metadata: { account, asset, required, available } }
    );
  }
}

export class PoolNotFoundError extends KernelError {
  constructor(poolId: string) {
    super(`Pool not found: ${poolId}`, KernelErrorCode.POOL_NOT_FOUND, {
      statusCode: 404,
      metadata: { poolId },
    });
  }
}

export function isKernelError(error: unknown): error is KernelError {
  return error instanceof KernelError;
}
