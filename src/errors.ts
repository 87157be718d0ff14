/**
 * Failure taxonomy for the extraction pipeline.
 *
 * A single error type carries a tagged `detail`, so callers switch on
 * `error.kind` instead of walking a class hierarchy.
 */

export type ValidationErrorKind =
  | "MissingInput"
  | "BlankSchema"
  | "EmptyImage"
  | "BlankText"
  | "EmptyInput";

export type ExtractionErrorKind =
  | "NoStructureFound"
  | "UnbalancedStructure"
  | "InvalidJson";

/** Which external capability failed */
export type UpstreamStage = "recognition" | "extraction";

export type ParserErrorDetail =
  | { kind: ValidationErrorKind }
  | { kind: "NoStructureFound" | "UnbalancedStructure"; preview: string }
  | { kind: "InvalidJson"; parserMessage: string; candidate: string }
  | { kind: "Upstream"; stage: UpstreamStage };

export type ParserErrorKind = ParserErrorDetail["kind"];

export type ErrorCategory = "validation" | "extraction" | "upstream";

const PREVIEW_LENGTH = 200;

export class ParserError extends Error {
  readonly detail: ParserErrorDetail;
  readonly kind: ParserErrorKind;

  constructor(
    detail: ParserErrorDetail,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ParserError";
    this.detail = detail;
    this.kind = detail.kind;
  }

  get category(): ErrorCategory {
    return errorCategory(this.detail.kind);
  }
}

export function errorCategory(kind: ParserErrorKind): ErrorCategory {
  switch (kind) {
    case "MissingInput":
    case "BlankSchema":
    case "EmptyImage":
    case "BlankText":
    case "EmptyInput":
      return "validation";
    case "NoStructureFound":
    case "UnbalancedStructure":
    case "InvalidJson":
      return "extraction";
    case "Upstream":
      return "upstream";
  }
}

/**
 * Narrows an unknown thrown value to a ParserError, optionally of one kind.
 */
export function isParserError(
  error: unknown,
  kind?: ParserErrorKind,
): error is ParserError {
  return (
    error instanceof ParserError && (kind === undefined || error.kind === kind)
  );
}

/**
 * First 200 characters of the input, with an ellipsis when truncated.
 */
export function previewOf(text: string): string {
  return text.length > PREVIEW_LENGTH
    ? `${text.slice(0, PREVIEW_LENGTH)}...`
    : text;
}

export function isBlank(value: string | null | undefined): boolean {
  return value == null || value.trim().length === 0;
}

// ============================================================================
// Factories
// ============================================================================

export function missingInput(): ParserError {
  return new ParserError(
    { kind: "MissingInput" },
    "At least one of image or text must be provided",
  );
}

export function blankSchema(): ParserError {
  return new ParserError({ kind: "BlankSchema" }, "schema must not be blank");
}

export function emptyImage(): ParserError {
  return new ParserError({ kind: "EmptyImage" }, "image must not be empty");
}

export function blankText(): ParserError {
  return new ParserError({ kind: "BlankText" }, "text must not be blank");
}

export function emptyInput(): ParserError {
  return new ParserError(
    { kind: "EmptyInput" },
    "Response is null or blank",
  );
}

export function noStructureFound(text: string): ParserError {
  const preview = previewOf(text);
  return new ParserError(
    { kind: "NoStructureFound", preview },
    `No JSON structure found in response. Preview: ${preview}`,
  );
}

export function unbalancedStructure(text: string): ParserError {
  const preview = previewOf(text);
  return new ParserError(
    { kind: "UnbalancedStructure", preview },
    `Unbalanced JSON structure. Preview: ${preview}`,
  );
}

export function invalidJson(
  parserMessage: string,
  candidate: string,
  cause?: unknown,
): ParserError {
  return new ParserError(
    { kind: "InvalidJson", parserMessage, candidate },
    `Invalid JSON: ${parserMessage}\nExtracted: ${candidate}`,
    { cause },
  );
}

export function upstreamFailure(
  stage: UpstreamStage,
  cause: unknown,
): ParserError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  const label = stage === "recognition" ? "OCR" : "Extraction";
  return new ParserError(
    { kind: "Upstream", stage },
    `${label} failed: ${reason}`,
    { cause },
  );
}
