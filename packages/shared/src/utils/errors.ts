export class InsightsError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InsightsError';
  }
}

export class ConfigError extends InsightsError {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigError';
  }
}

export class ValidationError extends InsightsError {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class AuthenticationError extends InsightsError {
  constructor(public readonly username: string) {
    super(`Invalid password for user "${username}"`);
    this.name = 'AuthenticationError';
  }
}

export class UserExistsError extends InsightsError {
  constructor(public readonly username: string) {
    super(`User "${username}" already exists`);
    this.name = 'UserExistsError';
  }
}
