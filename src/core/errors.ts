export class ChronicleError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'ChronicleError';
  }
}

export class ConfigError extends ChronicleError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

/**
 * Raised when a recorder is constructed with options the schema rejects,
 * such as an unknown diff mode.
 */
export class InvalidConfigurationError extends ChronicleError {
  constructor(message: string, public readonly issues: string[] = [], cause?: Error) {
    super(message, 'INVALID_CONFIGURATION', cause);
    this.name = 'InvalidConfigurationError';
  }
}

export class InvalidArgumentError extends ChronicleError {
  constructor(message: string, public readonly argument: string) {
    super(message, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
  }
}
