import { HttpError } from "../http/httpError";
import { DocumentType, Language } from "./model";

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, message);
    this.name = "NotFound";
  }
}

export class InvalidTransitionError extends HttpError {
  constructor(message: string) {
    super(409, message);
    this.name = "InvalidTransition";
  }
}

export class MissingRequiredFieldError extends HttpError {
  constructor(readonly field: string, message = `Field "${field}" is required for this decision.`) {
    super(400, message);
    this.name = "MissingRequiredField";
  }
}

export class ConcurrentModificationError extends HttpError {
  constructor(applicationId: number) {
    super(409, `Application ${applicationId} was modified by another decision. Reload and try again.`);
    this.name = "ConcurrentModification";
  }
}

export class ForbiddenError extends HttpError {
  constructor(message: string) {
    super(403, message);
    this.name = "Forbidden";
  }
}

export class DocumentGenerationError extends HttpError {
  constructor(
    readonly documentType: DocumentType,
    readonly language: Language | undefined,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(500, message);
    this.name = "DocumentGenerationFailure";
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class RandomSourceError extends HttpError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(500, message);
    this.name = "RandomSourceFailure";
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}
