/**
 * Base classes for domain errors. The HTTP layer maps each family to a status.
 */

export class DomainError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Missing, or owned by someone else
export class NotFoundError extends DomainError {}

export class ConflictError extends DomainError {}

// A request refers to a related resource the caller cannot use
export class InvalidReferenceError extends DomainError {
  constructor(
    readonly code: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}
