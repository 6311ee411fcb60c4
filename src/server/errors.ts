export class SqlDirectoryError extends Error {
  constructor(public readonly directory: string, reason: string) {
    super(`SQL directory ${reason}: ${directory}`);
    this.name = 'SqlDirectoryError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
