export interface ValidationIssue {
  path: string;
  message: string;
}

/** Raised by the ranking engine when the keyword set is not a list of strings. */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export class RequestValidationError extends Error {
  constructor(public readonly details: ValidationIssue[]) {
    super("Invalid request body");
    this.name = "RequestValidationError";
  }
}

export class StoreUnavailableError extends Error {
  constructor() {
    super("Candidate store is not configured.");
    this.name = "StoreUnavailableError";
  }
}

export class SupabaseRequestError extends Error {
  constructor(
    operation: string,
    public readonly status: number,
    public readonly body: string,
  ) {
    super(`Supabase ${operation} failed: HTTP ${status} - ${body}`);
    this.name = "SupabaseRequestError";
  }
}
