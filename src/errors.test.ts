import { describe, it, expect } from "vitest";
import {
  ParserError,
  errorCategory,
  isParserError,
  previewOf,
  upstreamFailure,
  missingInput,
  invalidJson,
} from "./errors.js";

describe("errors", () => {
  describe("errorCategory", () => {
    it("should group kinds into validation, extraction and upstream", () => {
      expect(errorCategory("MissingInput")).toBe("validation");
      expect(errorCategory("BlankSchema")).toBe("validation");
      expect(errorCategory("EmptyImage")).toBe("validation");
      expect(errorCategory("BlankText")).toBe("validation");
      expect(errorCategory("EmptyInput")).toBe("validation");
      expect(errorCategory("NoStructureFound")).toBe("extraction");
      expect(errorCategory("UnbalancedStructure")).toBe("extraction");
      expect(errorCategory("InvalidJson")).toBe("extraction");
      expect(errorCategory("Upstream")).toBe("upstream");
    });
  });

  describe("isParserError", () => {
    it("should narrow by kind", () => {
      const error: unknown = missingInput();

      expect(isParserError(error)).toBe(true);
      expect(isParserError(error, "MissingInput")).toBe(true);
      expect(isParserError(error, "BlankText")).toBe(false);
      expect(isParserError(new Error("plain"))).toBe(false);
    });
  });

  describe("previewOf", () => {
    it("should keep short text intact", () => {
      expect(previewOf("short")).toBe("short");
      expect(previewOf("y".repeat(200))).toBe("y".repeat(200));
    });

    it("should truncate long text with an ellipsis", () => {
      expect(previewOf("z".repeat(201))).toBe(`${"z".repeat(200)}...`);
    });
  });

  describe("upstreamFailure", () => {
    it("should label the stage and keep the cause", () => {
      const cause = new Error("timeout");
      const error = upstreamFailure("recognition", cause);

      expect(error).toBeInstanceOf(ParserError);
      expect(error.name).toBe("ParserError");
      expect(error.message).toBe("OCR failed: timeout");
      expect(error.cause).toBe(cause);
      expect(error.category).toBe("upstream");
      expect(error.detail).toEqual({ kind: "Upstream", stage: "recognition" });
    });

    it("should describe non-Error causes", () => {
      expect(upstreamFailure("extraction", "aborted").message).toBe(
        "Extraction failed: aborted",
      );
    });
  });

  it("should carry parser diagnostics on InvalidJson", () => {
    const error = invalidJson("Unexpected token", "{bad}");

    expect(error.message).toBe("Invalid JSON: Unexpected token\nExtracted: {bad}");
    expect(error.detail).toEqual({
      kind: "InvalidJson",
      parserMessage: "Unexpected token",
      candidate: "{bad}",
    });
  });
});
