export type RenderErrorCode =
  | 'UNKNOWN_FORMAT'
  | 'BACKEND_FAILURE'
  | 'DESTINATION_WRITE_FAILURE'
  | 'TEMPLATE_ERROR'
  | 'TOOLCHAIN_UNAVAILABLE'
  | 'INVALID_CONFIG';

export class RenderError extends Error {
  readonly code: RenderErrorCode;

  constructor(code: RenderErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RenderError';
    this.code = code;
  }
}

export class UnknownFormatError extends RenderError {
  readonly format: string;
  readonly available: string[];

  constructor(format: string, available: string[]) {
    const choices = available.length > 0 ? available.join(', ') : '(none registered)';
    super('UNKNOWN_FORMAT', `Unknown output format "${format}". Available formats: ${choices}`);
    this.name = 'UnknownFormatError';
    this.format = format;
    this.available = available;
  }
}

/** A native backend was present but its conversion failed. Never used for absence. */
export class BackendFailureError extends RenderError {
  readonly backend: string;

  constructor(backend: string, cause: Error) {
    super('BACKEND_FAILURE', `PDF backend "${backend}" failed: ${cause.message}`, { cause });
    this.name = 'BackendFailureError';
    this.backend = backend;
  }
}

/** An external toolchain a format depends on is not installed. */
export class ToolchainUnavailableError extends RenderError {
  readonly toolchain: string;

  constructor(toolchain: string, hint: string) {
    super('TOOLCHAIN_UNAVAILABLE', `The "${toolchain}" executable was not found on PATH. ${hint}`);
    this.name = 'ToolchainUnavailableError';
    this.toolchain = toolchain;
  }
}

export class DestinationWriteError extends RenderError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('DESTINATION_WRITE_FAILURE', `Could not write output to ${path}: ${reason}`, { cause });
    this.name = 'DestinationWriteError';
    this.path = path;
  }
}

export class TemplateError extends RenderError {
  readonly theme: string;

  constructor(theme: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('TEMPLATE_ERROR', `Template "${theme}" could not be rendered: ${reason}`, { cause });
    this.name = 'TemplateError';
    this.theme = theme;
  }
}

export class InvalidConfigError extends RenderError {
  readonly issues: Record<string, string[]>;

  constructor(issues: Record<string, string[]>) {
    const detail = Object.entries(issues)
      .map(([field, messages]) => `${field}: ${messages.join('; ')}`)
      .join(', ');
    super('INVALID_CONFIG', `Invalid rendering config (${detail})`);
    this.name = 'InvalidConfigError';
    this.issues = issues;
  }
}
