export class DistError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DistError";
  }
}

export class UnsupportedPlatformError extends DistError {
  constructor(message: string) {
    super(message);
    this.name = "UnsupportedPlatformError";
  }
}

export class ToolchainFailureError extends DistError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ToolchainFailureError";
  }
}

/**
 * The toolchain wrote something that does not follow its output contract, so
 * there is no artifact path we can trust.
 */
export class ProtocolViolationError extends DistError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProtocolViolationError";
  }
}

export class SigningFailureError extends DistError {
  constructor(bundle: string, exitCode: number) {
    super(`Failed to sign ${bundle} (exit code ${exitCode})`);
    this.name = "SigningFailureError";
  }
}

export class ConfigInvalidError extends DistError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigInvalidError";
  }
}
