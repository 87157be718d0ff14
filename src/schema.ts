import { blankSchema, isBlank } from "./errors.js";

/**
 * Opaque extraction instructions for the model. The text is neither parsed
 * nor validated beyond being non-blank.
 */
export class ExtractionSchema {
  private constructor(readonly raw: string) {}

  /**
   * @throws ParserError `BlankSchema` for blank input
   */
  static fromString(raw: string): ExtractionSchema {
    if (isBlank(raw)) {
      throw blankSchema();
    }
    return new ExtractionSchema(raw);
  }

  equals(other: ExtractionSchema): boolean {
    return this.raw === other.raw;
  }

  toString(): string {
    return this.raw;
  }
}
