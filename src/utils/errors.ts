type QaseApiErrorOpts = {
  status: number;
  method: string;
  endpoint: string;
  body: unknown;
  cause?: Error;
};

/**
 * Thrown for any non-2xx response, and for 2xx responses whose envelope
 * carries `status: false`.
 */
export class QaseApiError extends Error {
  readonly status: number;
  readonly method: string;
  readonly endpoint: string;
  readonly body: unknown;

  constructor({ status, method, endpoint, body, cause }: QaseApiErrorOpts) {
    const detail = typeof body === 'string' ? body : JSON.stringify(body);
    super(`Qase API error: ${status} ${method} ${endpoint} - ${detail}`, { cause });
    this.name = 'QaseApiError';
    this.status = status;
    this.method = method;
    this.endpoint = endpoint;
    this.body = body;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Whether the API rejected the payload because a step has no action.
   * Qase answers 422 with `errors: { "steps.0.action": ["Action field is required"] }`.
   */
  isMissingStepAction(): boolean {
    if (this.status !== 422 || typeof this.body !== 'object' || this.body === null) {
      return false;
    }
    const errors = 'errors' in this.body ? this.body.errors : undefined;
    if (typeof errors !== 'object' || errors === null) {
      return false;
    }
    return Object.values(errors).some((value) => {
      const messages = Array.isArray(value) ? value : [value];
      return messages.some((message) => String(message).includes('Action field is required'));
    });
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Error.captureStackTrace(this, this.constructor);
  }
}
