import type { ZodIssue } from "zod";

export class ResearchError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500
  ) {
    super(message);
    this.name = "ResearchError";
  }
}

/** First iteration came back empty: nothing to build a report from. */
export class NoSourcesError extends ResearchError {
  constructor(message: string = "No relevant sources found") {
    super(message, 400);
    this.name = "NoSourcesError";
  }
}

export class SearchFailedError extends ResearchError {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    super(message, 500);
    this.name = "SearchFailedError";
  }
}

export class RequestValidationError extends ResearchError {
  constructor(public readonly issues: ZodIssue[]) {
    super("Invalid research request", 422);
    this.name = "RequestValidationError";
  }
}

export class PayloadTooLargeError extends ResearchError {
  constructor(public readonly limit: number) {
    super("Request body too large", 413);
    this.name = "PayloadTooLargeError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
