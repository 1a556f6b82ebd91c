/**
 * Errors raised while the process is being assembled. None of them is
 * recovered: the entry point logs the message and exits non-zero before
 * any socket accepts traffic.
 */
export class StartupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StartupError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Missing credential, missing binary, invalid or unreadable settings. */
export class ConfigurationError extends StartupError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/** A configured component name has nothing registered under it. */
export class ResolutionError extends StartupError {
  public readonly role: string;
  public readonly moduleName: string;

  constructor(role: string, moduleName: string, message?: string) {
    super(
      message ??
        `Could not resolve ${role} "${moduleName}": no such module is registered`,
    );
    this.name = "ResolutionError";
    this.role = role;
    this.moduleName = moduleName;
  }
}

/** The listening socket or inherited descriptor could not be acquired. */
export class BindingError extends StartupError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BindingError";
  }
}
