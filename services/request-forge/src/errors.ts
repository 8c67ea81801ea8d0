export class RequestForgeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RequestForgeError";
  }
}

export class RandomSourceError extends RequestForgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RandomSourceError";
  }
}

export class UnsupportedMethodError extends RequestForgeError {
  public readonly method: string;

  constructor(method: string) {
    super(`Method ${method} cannot be injected into a Fastify app`);
    this.name = "UnsupportedMethodError";
    this.method = method;
  }
}

export class ConfigError extends RequestForgeError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
