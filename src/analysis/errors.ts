export class InvalidDateRangeError extends Error {
  readonly name = 'InvalidDateRangeError';
}

export class InvalidArgumentError extends Error {
  readonly name = 'InvalidArgumentError';
}
