// convert any error to DnsError (preserves DnsError subclasses)
export function toDnsError(error: unknown): DnsError {
  // already a DnsError, return as-is
  if (error instanceof DnsError) {
    return error;
  }

  // extract message from Error or convert unknown to string
  const message =
    error instanceof Error ? error.message : String(error) || 'An unknown error occurred';

  // create DnsError instance
  const codedError = new (class extends DnsError {})(message);

  // if it's an Error, preserve the original error properties
  if (error instanceof Error) {
    codedError.name = error.name;
    codedError.stack = error.stack;
  } else {
    codedError.name = 'DnsError';
  }

  return codedError;
}

// base error class for custom errors with codes
// matches Node.js SystemError structure
export class DnsError extends Error {
  public code: number;
  public errno: number;
  public syscall: string;

  constructor(message: string) {
    super(message);
    this.name = 'DnsError';

    // SystemError-like properties
    // code: numeric error code (set by subclass property initializer or defaults to -1)
    // errno: numeric error code (always equals code)
    // syscall: always 'rootwalk' for resolver operations
    this.code = -1;
    this.errno = -1;
    this.syscall = 'rootwalk';

    Object.setPrototypeOf(this, new.target.prototype);

    // Maintain proper stack trace (Node.js only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// base class for failures of a single nameserver attempt
export class TransportError extends DnsError {
  constructor(message: string) {
    super(message);
    this.name = 'TransportError';
  }
}

// query timeout error
export class TimeoutError extends TransportError {
  public code = 408; // Request Timeout

  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
    // ensure errno matches code
    this.errno = this.code;
  }
}

// connection error
export class ConnectionError extends TransportError {
  public code = 503; // Service Unavailable

  constructor(message: string) {
    super(message);
    this.name = 'ConnectionError';
    this.errno = this.code;
  }
}

// response from a nameserver that cannot be used, e.g. SERVFAIL or REFUSED
export class InvalidResponseError extends DnsError {
  public code = 502; // Bad Gateway

  constructor(message: string) {
    super(message);
    this.name = 'InvalidResponseError';
    this.errno = this.code;
  }
}

// DNS parsing error for undecodable packets
export class ParsingError extends DnsError {
  public code = 422; // Unprocessable Entity

  constructor(message: string) {
    super(message);
    this.name = 'ParsingError';
    this.errno = this.code;
  }
}

// DNS configuration error
export class ConfigurationError extends DnsError {
  public code = 500; // Internal Server Error

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.errno = this.code;
  }
}

// every nameserver of a cycle failed
export class ExhaustedNameserversError extends DnsError {
  public code = 504; // Gateway Timeout

  constructor(message: string) {
    super(message);
    this.name = 'ExhaustedNameserversError';
    this.errno = this.code;
  }
}

// a referral left no nameserver address to continue with
export class GluelessDelegationError extends DnsError {
  public code = 424; // Failed Dependency

  constructor(message: string) {
    super(message);
    this.name = 'GluelessDelegationError';
    this.errno = this.code;
  }
}

// referral, glue or alias limits exceeded, or a name revisited
export class ResolutionLoopError extends DnsError {
  public code = 508; // Loop Detected

  constructor(message: string) {
    super(message);
    this.name = 'ResolutionLoopError';
    this.errno = this.code;
  }
}
