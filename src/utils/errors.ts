// Value-class failures: the message is returned to the caller as-is
export class ValuationInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValuationInputError';
  }
}

export class DataUnavailableError extends ValuationInputError {
  constructor(message: string) {
    super(message);
    this.name = 'DataUnavailableError';
  }
}

export class FinancialsUnavailableError extends ValuationInputError {
  constructor(message: string) {
    super(message);
    this.name = 'FinancialsUnavailableError';
  }
}

export class MissingApiKeyError extends ValuationInputError {
  constructor(keyName: string) {
    super(`${keyName} is missing. Add it to the .env file.`);
    this.name = 'MissingApiKeyError';
  }
}

export class ComputationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ComputationError';
  }
}

export class InvalidTimeFrameError extends Error {
  constructor(timeFrame: string) {
    super(`Invalid time frame selected: ${timeFrame}. Please use 3m, 6m, 1y, or 5y.`);
    this.name = 'InvalidTimeFrameError';
  }
}

export class NoOptionsDataError extends Error {
  constructor() {
    super('No options data available');
    this.name = 'NoOptionsDataError';
  }
}

export class ProviderRequestError extends Error {
  readonly provider: string;
  readonly status?: number;

  constructor(provider: string, message: string, status?: number) {
    super(message);
    this.name = 'ProviderRequestError';
    this.provider = provider;
    this.status = status;
  }
}
