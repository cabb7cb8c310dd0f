export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, public issues: Record<string, string[] | undefined> = {}) {
    super(message, 'CONFIGURATION_ERROR', 500);
    this.name = 'ConfigurationError';
  }
}

export class PolicyCatalogError extends AppError {
  constructor(message: string, public patternName?: string) {
    super(message, 'POLICY_CATALOG_ERROR', 500);
    this.name = 'PolicyCatalogError';
  }
}

export class BackendError extends AppError {
  constructor(message: string, public backend?: string) {
    super(message, 'BACKEND_ERROR', 502);
    this.name = 'BackendError';
  }
}

export class TimeoutError extends AppError {
  constructor(message: string = 'Operation timed out') {
    super(message, 'TIMEOUT', 504);
    this.name = 'TimeoutError';
  }
}
