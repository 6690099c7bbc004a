export class SyncMapError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SyncMapError';
  }
}

/**
 * Absent or unrecognized format identifier, or a value of the wrong kind
 */
export class InvalidArgumentError extends SyncMapError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export class FragmentTypeError extends InvalidArgumentError {
  constructor() {
    super('fragment is not an instance of SyncMapFragment');
    this.name = 'FragmentTypeError';
  }
}

/**
 * Input path unreadable or output path unwritable
 */
export class PermissionError extends SyncMapError {
  constructor(message: string, public readonly path: string) {
    super(message);
    this.name = 'PermissionError';
  }
}

/**
 * A codec requires parameters that the caller did not supply
 */
export class MissingParameterError extends SyncMapError {
  constructor(public readonly format: string, public readonly parameters: string[]) {
    super(`Format '${format}' requires parameter(s): ${parameters.join(', ')}`);
    this.name = 'MissingParameterError';
  }
}

export class SyncMapParseError extends SyncMapError {
  constructor(message: string, public readonly format: string) {
    super(`[${format} parse error] ${message}`);
    this.name = 'SyncMapParseError';
  }
}
