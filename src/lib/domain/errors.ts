export class PacketFilterError extends Error {
  constructor(
    message: string,
    readonly command: readonly string[],
    readonly stderr?: string,
  ) {
    super(message);
    this.name = "PacketFilterError";
  }
}

export class LeaseTableUnavailableError extends Error {
  constructor(
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(`Lease table not readable: ${path}`, options);
    this.name = "LeaseTableUnavailableError";
  }
}

export class ConfigError extends Error {
  constructor(
    readonly variable: string,
    message: string,
  ) {
    super(`${variable}: ${message}`);
    this.name = "ConfigError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
