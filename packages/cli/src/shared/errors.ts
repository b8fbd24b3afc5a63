// shared/errors.ts — Fatal error types surfaced by the resolve/connect pipeline.
// Every class here ends the invocation with a non-zero exit; none is retried.

/** Base class so the entry point can tell our errors from unexpected throws. */
export class Ec2HopError extends Error {
  readonly exitCode: number;

  constructor(message: string, options?: { cause?: unknown; exitCode?: number }) {
    super(message, {
      cause: options?.cause,
    });
    this.name = "Ec2HopError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/** Bad invocation: wrong argument count, unknown flag, flag missing its value. */
export class UsageError extends Ec2HopError {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/** The inventory returned no instance for the lookup key. */
export class NoMatchError extends Ec2HopError {
  readonly lookup: string;

  constructor(lookup: string) {
    super(`Found no instance '${lookup}'`);
    this.name = "NoMatchError";
    this.lookup = lookup;
  }
}

/** A record from the inventory lacks a field resolution depends on. */
export class DataIntegrityError extends Ec2HopError {
  constructor(message: string) {
    super(message);
    this.name = "DataIntegrityError";
  }
}

/** The answer to the selection prompt was not a number, or out of range. */
export class InvalidSelectionError extends Ec2HopError {
  readonly input: string;

  constructor(message: string, input: string) {
    super(message);
    this.name = "InvalidSelectionError";
    this.input = input;
  }
}

/** The EC2 API call failed (credentials, network, throttling, bad filter). */
export class ProviderError extends Ec2HopError {
  readonly code: string | undefined;

  constructor(message: string, options?: { code?: string; cause?: unknown }) {
    super(options?.code ? `${options.code}: ${message}` : message, {
      cause: options?.cause,
    });
    this.name = "ProviderError";
    this.code = options?.code;
  }
}

/** ssh could not be found, could not start, or exited non-zero. */
export class LaunchError extends Ec2HopError {
  constructor(message: string, options?: { cause?: unknown; exitCode?: number }) {
    super(message, options);
    this.name = "LaunchError";
  }
}
