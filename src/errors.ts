// convert any error to GnsError (preserves GnsError subclasses)
export function toGnsError(error: unknown): GnsError {
  // already a GnsError, return as-is
  if (error instanceof GnsError) {
    return error;
  }

  // extract message from Error or convert unknown to string
  const message =
    error instanceof Error ? error.message : String(error) || 'An unknown error occurred';

  // wrap anything else as a failure of an external service
  const codedError = new ServiceError(message);

  // if it's an Error, preserve the original error properties
  if (error instanceof Error) {
    codedError.stack = error.stack;
  }

  return codedError;
}

// base error class for custom errors with codes
// matches Node.js SystemError structure
export class GnsError extends Error {
  public code: number;
  public errno: number;
  public syscall: string;

  constructor(message: string) {
    super(message);
    this.name = 'GnsError';

    // code: numeric error code (set by subclass property initializer or defaults to -1)
    // errno: numeric error code (always equals code)
    // syscall: always 'gns-resolver' for resolver operations
    this.code = -1;
    this.errno = -1;
    this.syscall = 'gns-resolver';

    Object.setPrototypeOf(this, new.target.prototype);

    // Maintain proper stack trace (Node.js only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// name that cannot be resolved as given, e.g. a broken zkey
export class MalformedNameError extends GnsError {
  public code = 400; // Bad Request

  constructor(message: string) {
    super(message);
    this.name = 'MalformedNameError';
    this.errno = this.code;
  }
}

// record data that does not match its type
export class MalformedRecordError extends GnsError {
  public code = 422; // Unprocessable Entity

  constructor(message: string) {
    super(message);
    this.name = 'MalformedRecordError';
    this.errno = this.code;
  }
}

// block that the namestore could not decrypt or verify
export class MalformedBlockError extends GnsError {
  public code = 422; // Unprocessable Entity

  constructor(message: string) {
    super(message);
    this.name = 'MalformedBlockError';
    this.errno = this.code;
  }
}

// DNS reply that could not be decoded
export class MalformedResponseError extends GnsError {
  public code = 502; // Bad Gateway

  constructor(message: string) {
    super(message);
    this.name = 'MalformedResponseError';
    this.errno = this.code;
  }
}

// delegation produced a DNS name above the wire limit
export class NameTooLongError extends GnsError {
  public code = 414; // URI Too Long

  constructor(message: string) {
    super(message);
    this.name = 'NameTooLongError';
    this.errno = this.code;
  }
}

// too many hops, most likely a delegation or CNAME cycle
export class RecursionLimitError extends GnsError {
  public code = 508; // Loop Detected

  constructor(message: string) {
    super(message);
    this.name = 'RecursionLimitError';
    this.errno = this.code;
  }
}

// intermediate label without PKEY, GNS2DNS or CNAME
export class NoDelegationError extends GnsError {
  public code = 404; // Not Found

  constructor(message: string) {
    super(message);
    this.name = 'NoDelegationError';
    this.errno = this.code;
  }
}

// GNS2DNS delegation without an A/AAAA record for the nameserver
export class MissingGlueError extends GnsError {
  public code = 424; // Failed Dependency

  constructor(message: string) {
    super(message);
    this.name = 'MissingGlueError';
    this.errno = this.code;
  }
}

// lookup finished without a single record
export class NoRecordsError extends GnsError {
  public code = 404; // Not Found

  constructor(message: string) {
    super(message);
    this.name = 'NoRecordsError';
    this.errno = this.code;
  }
}

// nothing usable in the namestore and the DHT may not be asked
export class CacheMissError extends GnsError {
  public code = 404; // Not Found

  constructor(message: string) {
    super(message);
    this.name = 'CacheMissError';
    this.errno = this.code;
  }
}

// evicted from the DHT admission heap by a newer lookup
export class BackgroundQueryLimitError extends GnsError {
  public code = 429; // Too Many Requests

  constructor(message: string) {
    super(message);
    this.name = 'BackgroundQueryLimitError';
    this.errno = this.code;
  }
}

// DHT or DNS lookup took longer than configured
export class TimeoutError extends GnsError {
  public code = 408; // Request Timeout

  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
    this.errno = this.code;
  }
}

// an external service failed or is not configured
export class ServiceError extends GnsError {
  public code = 503; // Service Unavailable

  constructor(message: string) {
    super(message);
    this.name = 'ServiceError';
    this.errno = this.code;
  }
}

// resolver shut down while the lookup was active
export class ShutdownError extends GnsError {
  public code = 410; // Gone

  constructor(message: string) {
    super(message);
    this.name = 'ShutdownError';
    this.errno = this.code;
  }
}

// AbortSignal cancellation error
export class AbortError extends GnsError {
  public code = 499; // Client Closed Request

  constructor(message: string) {
    super(message);
    this.name = 'AbortError';
    this.errno = this.code;
  }
}

// invalid resolver configuration
export class ConfigurationError extends GnsError {
  public code = 500; // Internal Server Error

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.errno = this.code;
  }
}

// internal state that should be impossible, thrown as an assertion
export class InvariantError extends GnsError {
  public code = 500; // Internal Server Error

  constructor(message: string) {
    super(message);
    this.name = 'InvariantError';
    this.errno = this.code;
  }
}
