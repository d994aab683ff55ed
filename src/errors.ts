/**
 * Error hierarchy for structconf.
 */

export interface ErrorOptions {
  cause?: Error;
}

export class ConfigurationError extends Error {
  readonly code: string;
  readonly details: Record<string, unknown>;
  override readonly cause?: Error;
  readonly timestamp: string;

  constructor(code: string, message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = 'ConfigurationError';
    this.code = code;
    this.details = details ?? {};
    this.cause = cause;
    this.timestamp = new Date().toISOString();
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    const obj: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    };
    if (Object.keys(this.details).length > 0) {
      obj.details = this.details;
    }
    if (this.cause !== undefined) {
      obj.cause = String(this.cause);
    }
    obj.timestamp = this.timestamp;
    return obj;
  }
}

/** Raised when a configuration is used in a lifecycle phase that doesn't allow it. */
export class InitialisationError extends ConfigurationError {
  constructor(message: string, options?: ErrorOptions) {
    super('NOT_INITIALISED', message, {}, options?.cause);
    this.name = 'InitialisationError';
  }
}

/** Raised when an operation needs an integrity-checked configuration but it is mid-transaction. */
export class IntermediateStateError extends ConfigurationError {
  constructor(options?: ErrorOptions) {
    super('INTERMEDIATE_STATE', 'Attempted to use a configuration in an intermediate state', {}, options?.cause);
    this.name = 'IntermediateStateError';
  }
}

export class ReadOnlyModificationError extends ConfigurationError {
  constructor(name?: string, options?: ErrorOptions) {
    super(
      'READ_ONLY_MODIFICATION',
      name === undefined
        ? 'Attempted to modify a finalised configuration'
        : `Attempted to modify '${name}' of a finalised configuration`,
      name === undefined ? {} : { name },
      options?.cause,
    );
    this.name = 'ReadOnlyModificationError';
  }
}

export class AbsentError extends ConfigurationError {
  constructor(name: string, options?: ErrorOptions) {
    super('ABSENT_VALUE', `Configuration element ${name} is absent`, { name }, options?.cause);
    this.name = 'AbsentError';
  }

  get elementName(): string {
    return this.details['name'] as string;
  }
}

export class ClearRequiredValueError extends ConfigurationError {
  constructor(name: string, options?: ErrorOptions) {
    super('CLEAR_REQUIRED_VALUE', `Attempted to clear non-optional element '${name}'`, { name }, options?.cause);
    this.name = 'ClearRequiredValueError';
  }
}

/**
 * Raised when a dotted name passes through an element that is not a
 * sub-configuration.
 */
export class NotNavigableError extends ConfigurationError {
  constructor(fullName: string, problemElement: string, options?: ErrorOptions) {
    super(
      'NOT_NAVIGABLE',
      `${problemElement} is not a sub-configuration, and therefore can't have sub-members (in ${fullName})`,
      { fullName, problemElement },
      options?.cause,
    );
    this.name = 'NotNavigableError';
  }

  get fullName(): string {
    return this.details['fullName'] as string;
  }

  get problemElement(): string {
    return this.details['problemElement'] as string;
  }
}

/**
 * Raised when a name doesn't match a registered element. `elementName` is the
 * path up to the unknown segment; `fullName` is the whole path requested.
 */
export class NoSuchElementError extends ConfigurationError {
  constructor(name: string, fullName: string = name, options?: ErrorOptions) {
    super(
      'NO_SUCH_ELEMENT',
      name === fullName ? `No configuration element named ${name}` : `No configuration element named ${name} (in ${fullName})`,
      { name, fullName },
      options?.cause,
    );
    this.name = 'NoSuchElementError';
  }

  get elementName(): string {
    return this.details['name'] as string;
  }

  get fullName(): string {
    return this.details['fullName'] as string;
  }
}

export class IntegrityError extends ConfigurationError {
  constructor(reason: string, options?: ErrorOptions) {
    super('INTEGRITY_VIOLATION', `Configuration integrity violated: ${reason}`, { reason }, options?.cause);
    this.name = 'IntegrityError';
  }

  get reason(): string {
    return this.details['reason'] as string;
  }
}

export class MissingDefaultError extends ConfigurationError {
  constructor(configurationType: string, name: string, options?: ErrorOptions) {
    super(
      'MISSING_DEFAULT',
      `Configuration element '${name}' of ${configurationType} has no default initialiser and wasn't set explicitly`,
      { configurationType, name },
      options?.cause,
    );
    this.name = 'MissingDefaultError';
  }
}

export class DuplicateElementError extends ConfigurationError {
  constructor(name: string, options?: ErrorOptions) {
    super('DUPLICATE_ELEMENT', `Configuration element '${name}' is already registered`, { name }, options?.cause);
    this.name = 'DuplicateElementError';
  }
}

export class InvalidValueError extends ConfigurationError {
  constructor(name: string, message: string, options?: ErrorOptions) {
    super('INVALID_VALUE', `Invalid value for '${name}': ${message}`, { name }, options?.cause);
    this.name = 'InvalidValueError';
  }
}

export class UnrelatedConfigurationsError extends ConfigurationError {
  constructor(first: string, second: string, options?: ErrorOptions) {
    super(
      'UNRELATED_CONFIGURATIONS',
      `Can only share elements between configurations with a linear inheritance relationship (${first}, ${second})`,
      { first, second },
      options?.cause,
    );
    this.name = 'UnrelatedConfigurationsError';
  }
}

export class ConfigurableNotRegisteredError extends ConfigurationError {
  constructor(name: string, options?: ErrorOptions) {
    super('CONFIGURABLE_NOT_REGISTERED', `${name} is not registered with a configuration type`, { name }, options?.cause);
    this.name = 'ConfigurableNotRegisteredError';
  }
}

export class VisitationError extends ConfigurationError {
  constructor(message: string, options?: ErrorOptions) {
    super('VISITATION_ERROR', message, {}, options?.cause);
    this.name = 'VisitationError';
  }
}

export class SerializationError extends ConfigurationError {
  constructor(message: string, errors?: Array<Record<string, unknown>>, options?: ErrorOptions) {
    super('SERIALIZATION_ERROR', message, { errors: errors ?? [] }, options?.cause);
    this.name = 'SerializationError';
  }
}

export const ErrorCodes = Object.freeze({
  NOT_INITIALISED: 'NOT_INITIALISED',
  INTERMEDIATE_STATE: 'INTERMEDIATE_STATE',
  READ_ONLY_MODIFICATION: 'READ_ONLY_MODIFICATION',
  ABSENT_VALUE: 'ABSENT_VALUE',
  CLEAR_REQUIRED_VALUE: 'CLEAR_REQUIRED_VALUE',
  NOT_NAVIGABLE: 'NOT_NAVIGABLE',
  NO_SUCH_ELEMENT: 'NO_SUCH_ELEMENT',
  INTEGRITY_VIOLATION: 'INTEGRITY_VIOLATION',
  MISSING_DEFAULT: 'MISSING_DEFAULT',
  DUPLICATE_ELEMENT: 'DUPLICATE_ELEMENT',
  INVALID_VALUE: 'INVALID_VALUE',
  UNRELATED_CONFIGURATIONS: 'UNRELATED_CONFIGURATIONS',
  CONFIGURABLE_NOT_REGISTERED: 'CONFIGURABLE_NOT_REGISTERED',
  VISITATION_ERROR: 'VISITATION_ERROR',
  SERIALIZATION_ERROR: 'SERIALIZATION_ERROR',
} as const);

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
