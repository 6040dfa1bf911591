/**
 * Error taxonomy for the build pipeline.
 *
 * Every failure the pipeline can report is one of these classes. Errors are
 * never recovered locally: they travel unchanged to the CLI entrypoint, which
 * renders `message` as a single fatal line.
 */

export type ErrorKind =
  | "detection"
  | "target-discovery"
  | "transport"
  | "process"
  | "configuration"
  | "usage";

export abstract class NbError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ---------------------------------------------------------------------------
// Detection
// ---------------------------------------------------------------------------

export class SdkNotDetectedError extends NbError {
  readonly kind = "detection";

  constructor(readonly rootPath: string) {
    super(`no compatible SDKs for source directory '${rootPath}'`);
  }
}

/** A marker probe failed for a reason other than the marker being absent. */
export class DetectionError extends NbError {
  readonly kind = "detection";

  constructor(
    readonly sdk: string,
    readonly path: string,
    cause: unknown,
  ) {
    super(`detect ${sdk} SDK: ${path}: ${describeCause(cause)}`, { cause });
  }
}

// ---------------------------------------------------------------------------
// Target discovery
// ---------------------------------------------------------------------------

export class TargetDiscoveryError extends NbError {
  readonly kind = "target-discovery";

  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(`detect build target: ${path}: ${describeCause(cause)}`, { cause });
  }
}

export class EmptyFilenameError extends NbError {
  readonly kind = "target-discovery";

  constructor(readonly path: string) {
    super(`detect build target: target name in ${path} is empty or not valid text`);
  }
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

/**
 * HTTP failure during token acquisition. Carries the endpoint and, once a
 * response was received, its status code and raw body.
 */
export class TransportError extends NbError {
  readonly kind = "transport";

  constructor(
    readonly endpoint: string,
    readonly reason: string,
    readonly status?: number,
    readonly body?: string,
    options?: { cause?: unknown },
  ) {
    super(formatTransportMessage(endpoint, reason, status, body), options);
  }
}

function formatTransportMessage(
  endpoint: string,
  reason: string,
  status: number | undefined,
  body: string | undefined,
): string {
  let message = `${endpoint}: ${reason}`;
  if (status !== undefined) {
    message += `; code: ${status}`;
  }
  if (body !== undefined) {
    message += `, body: ${body}`;
  }
  return message;
}

// ---------------------------------------------------------------------------
// External processes
// ---------------------------------------------------------------------------

/** Non-zero exit, or failure to start, of an external command. */
export class ProcessError extends NbError {
  readonly kind = "process";

  constructor(
    readonly command: string,
    readonly operation: string,
    readonly exitCode: number | undefined,
    options?: { cause?: unknown },
  ) {
    super(
      exitCode === undefined
        ? `${command} ${operation} could not be started: ${describeCause(options?.cause)}`
        : `${command} ${operation} failed with exit code ${exitCode}`,
      options,
    );
  }
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export class ConfigurationError extends NbError {
  readonly kind = "configuration";
}

export class InvalidImageReferenceError extends NbError {
  readonly kind = "configuration";

  constructor(readonly field: string) {
    super(`docker image name could not be generated: '${field}' is empty`);
  }
}

export class UsageError extends NbError {
  readonly kind = "usage";
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
