export class UpstreamError extends Error {
  constructor(
    public readonly service: string,
    message: string
  ) {
    super(`${service}: ${message}`);
    this.name = 'UpstreamError';
  }
}

export class SearchPayloadError extends Error {
  constructor(message: string, public readonly rawText?: string) {
    super(message);
    this.name = 'SearchPayloadError';
  }
}

export class StoreUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StoreUnavailableError';
  }
}
