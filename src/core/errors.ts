/** Raised for numerically invalid input, such as a zero-height aspect ratio. */
export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DomainError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly key: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ConversionError extends Error {
  constructor(
    message: string,
    readonly stage: 'rendering' | 'writing',
    readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'ConversionError';
  }
}
