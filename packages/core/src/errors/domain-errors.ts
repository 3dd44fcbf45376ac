export type DomainErrorCode =
  | "VALIDATION"
  | "INVALID_COLOR_FORMAT"
  | "INVALID_ALIGNMENT"
  | "MISSING_CONFIGURATION"
  | "FONT_UNREADABLE"
  | "RASTERIZER";

export class DomainError extends Error {
  /** Failures raised while cleaning up after this error. */
  readonly suppressed: unknown[] = [];

  constructor(
    message: string,
    public readonly code: DomainErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "DomainError";
  }
}

export class ValidationError extends DomainError {
  constructor(message = "Invalid configuration.") {
    super(message, "VALIDATION");
  }
}

export class InvalidColorFormatError extends DomainError {
  constructor(
    message = 'Wrong color format; color can be defined as "#RGB", "#RRGGBB", [R, G, B] or [R, G, B, A].'
  ) {
    super(message, "INVALID_COLOR_FORMAT");
  }
}

export class InvalidAlignmentError extends DomainError {
  constructor(value: string) {
    super(
      `Unknown alignment "${value}"; expected left, right, center or justify.`,
      "INVALID_ALIGNMENT"
    );
  }
}

export class MissingConfigurationError extends DomainError {
  constructor(message = "Image text is not fully configured.") {
    super(message, "MISSING_CONFIGURATION");
  }
}

export class FontUnreadableError extends DomainError {
  constructor(
    public readonly fontPath: string,
    options?: { cause?: unknown }
  ) {
    super(`Font not found or is not readable (${fontPath}).`, "FONT_UNREADABLE", options);
  }
}

export class RasterizerError extends DomainError {
  constructor(message = "Rasterizer call failed.", options?: { cause?: unknown }) {
    super(message, "RASTERIZER", options);
  }
}

export const toRasterizerError = (error: unknown, action: string): DomainError => {
  if (error instanceof DomainError) {
    return error;
  }

  const reason = error instanceof Error ? error.message : String(error);
  return new RasterizerError(`Rasterizer failed to ${action}: ${reason}`, { cause: error });
};
