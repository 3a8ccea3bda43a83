import { ErrorClass } from "../types";

export type ArchiveErrorCode =
  | "policy_rejection"
  | "transient_network"
  | "network"
  | "http_client"
  | "verification"
  | "configuration"
  | "cancelled";

export abstract class ArchiveError extends Error {
  abstract readonly code: ArchiveErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class PolicyRejectionError extends ArchiveError {
  readonly code = "policy_rejection";

  constructor(
    readonly reason: string,
    readonly url: string,
  ) {
    super(`${reason}: ${url}`);
  }
}

export class TransientNetworkError extends ArchiveError {
  readonly code = "transient_network";

  constructor(
    message: string,
    readonly statusCode?: number,
  ) {
    super(message);
  }
}

/** A socket-level failure that retrying will not fix (DNS, TLS, refused protocol). */
export class NetworkError extends ArchiveError {
  readonly code = "network";

  constructor(
    message: string,
    readonly causeCode?: string,
  ) {
    super(message);
  }
}

export class HttpClientError extends ArchiveError {
  readonly code = "http_client";

  constructor(
    readonly statusCode: number,
    message = `HTTP ${statusCode}`,
  ) {
    super(message);
  }
}

export class VerificationError extends ArchiveError {
  readonly code = "verification";

  constructor(
    readonly reason: string,
    readonly checksum: string,
    readonly bytes: number,
  ) {
    super(reason);
  }
}

export class ConfigurationError extends ArchiveError {
  readonly code = "configuration";
}

export class CancelledError extends ArchiveError {
  readonly code = "cancelled";

  constructor(message = "cancelled") {
    super(message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toErrorClass(error: unknown): ErrorClass {
  if (error instanceof ArchiveError && error.code !== "configuration") {
    return error.code;
  }
  return "internal";
}

/** The cancellation cause carried by an aborted run signal. */
export function cancellationOf(signal: AbortSignal): CancelledError {
  const reason: unknown = signal.reason;
  if (reason instanceof CancelledError) {
    return reason;
  }
  return new CancelledError(reason instanceof Error ? reason.message : "cancelled");
}
