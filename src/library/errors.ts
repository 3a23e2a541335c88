export class DDNSError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The public address probe could not be carried out (timeout, unreachable or
 * failing resolver).
 */
export class ResolutionFailureError extends DDNSError {
  constructor(
    readonly hostname: string,
    readonly server: string,
    options?: ErrorOptions,
  ) {
    super(`failed to query ${hostname} against ${server}`, options);
  }
}

export class NoAddressFoundError extends DDNSError {
  constructor(readonly hostname: string) {
    super(`no ipv4 address found for ${hostname}`);
  }
}

export class InvalidAddressError extends DDNSError {
  constructor(readonly value: string) {
    super(`invalid ipv4 address ${JSON.stringify(value)}`);
  }
}

/**
 * The record was read but carries no usable value.
 */
export class InvalidRecordResponseError extends DDNSError {
  constructor(readonly url: string) {
    super(`invalid record response from ${url}`);
  }
}

export class UnexpectedStatusError extends DDNSError {
  constructor(
    readonly status: number,
    readonly body = '',
  ) {
    super(
      body
        ? `unexpected response status code [${status}]: ${body}`
        : `unexpected response status code [${status}]`,
    );
  }
}

export class ConfigError extends DDNSError {
  constructor(
    message: string,
    readonly missing: string[] = [],
  ) {
    super(message);
  }
}
