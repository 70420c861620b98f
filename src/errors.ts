/** Raised when a persisted bank exists but cannot be read back as memory items. */
export class BankCorruptionError extends Error {
  readonly path: string;
  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`Memory bank at ${path} is unreadable: ${message}`, options);
    this.name = 'BankCorruptionError';
    this.path = path;
  }
}

/** Raised when a memory item violates its invariants. */
export class InvalidMemoryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidMemoryError';
  }
}

/** Raised when configuration cannot be parsed or validated. */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/** Raised when a problem dataset is missing or malformed. */
export class DatasetError extends Error {
  readonly path: string;
  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`Dataset ${path}: ${message}`, options);
    this.name = 'DatasetError';
    this.path = path;
  }
}

/** Raised when the model server cannot be reached or rejects a request. */
export class LlmConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LlmConnectionError';
  }
}
