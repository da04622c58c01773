export class BrokerControlError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// Access file is not well-formed structured data
export class ParseError extends BrokerControlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PARSE_ERROR', message, options);
  }
}

export class ConfigError extends BrokerControlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_ERROR', message, options);
  }
}

export class InitError extends BrokerControlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INIT_ERROR', message, options);
  }
}

export class BindError extends BrokerControlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('BIND_ERROR', message, options);
  }
}

export class ShutdownError extends BrokerControlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SHUTDOWN_ERROR', message, options);
  }
}

export class TlsMaterialError extends BrokerControlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TLS_MATERIAL_ERROR', message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
