import type { OperationStatus } from "./schema.js";

export class FeederError extends Error {
  readonly status: OperationStatus;

  constructor(message: string, status: OperationStatus = "failed") {
    super(message);
    this.name = "FeederError";
    this.status = status;
  }
}

// Raised for transport and cloud-side failures of the feeder API.
export class FeederApiError extends FeederError {
  readonly msgType?: number;

  constructor(message: string, status: OperationStatus = "failed", msgType?: number) {
    super(message, status);
    this.name = "FeederApiError";
    this.msgType = msgType;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorStatus(error: unknown): OperationStatus {
  return error instanceof FeederError ? error.status : "failed";
}
