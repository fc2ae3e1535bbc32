/**
 * Router Errors - user-facing, recoverable failures raised while turning
 * command text into addresses and routes.
 */

export type RouterErrorKind = 'ParseError' | 'InvalidPrefixError' | 'InvalidMetricError';

export class RouterError extends Error {
  readonly kind: RouterErrorKind;

  constructor(kind: RouterErrorKind, message: string) {
    super(message);
    this.kind = kind;
    this.name = kind;
  }
}

export class ParseError extends RouterError {
  constructor(message: string) {
    super('ParseError', message);
  }
}

export class InvalidPrefixError extends RouterError {
  constructor(prefix: string) {
    super('InvalidPrefixError', `Invalid prefix length: ${prefix}. Allowed range: 0-32.`);
  }
}

export class InvalidMetricError extends RouterError {
  constructor(metric: number) {
    super('InvalidMetricError', `Invalid metric: ${metric}. Metric must be a non-negative safe integer.`);
  }
}
