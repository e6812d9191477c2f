export type ErrorDetails = Record<string, unknown>;

export interface CmsErrorOptions {
  details?: ErrorDetails;
  userMessage?: string;
}

/**
 * Base for every error the services raise on purpose. `details` is diagnostic
 * context for the log and never reaches a client; `userMessage` replaces the
 * message in the outward error record.
 */
export class CmsError extends Error {
  readonly details: ErrorDetails;
  readonly userMessage?: string;

  constructor(message: string, options: CmsErrorOptions = {}) {
    super(message);
    this.name = new.target.name;
    this.details = options.details ?? {};
    this.userMessage = options.userMessage;
  }
}

export class ValidationError extends CmsError {}

export class AuthenticationError extends CmsError {}

export class AuthorizationError extends CmsError {}

export class BusinessLogicError extends CmsError {}

export class SecurityException extends CmsError {}

export class DatabaseError extends CmsError {}

/** The store rejected a slug through its unique constraint; assignment may retry. */
export class SlugConflictError extends DatabaseError {
  constructor(
    readonly entityType: string,
    readonly slug: string
  ) {
    super(`${entityType} slug already exists`, { details: { entityType, slug } });
  }
}
