/**
 * Validation Suite: text-normalizer
 */

import { describe, it, expect } from "vitest";
import {
  NORMALIZATION_PASSES,
  normalizeText,
  stripBold,
  stripCodeFences,
  stripHeaders,
  stripItalic,
  unwrapInlineCode,
  unwrapLinks,
} from "./text-normalizer.js";

describe("normalizeText", () => {
  it("should strip bold markers", () => {
    expect(normalizeText("**bold**")).toBe("bold");
  });

  it("should strip header markers", () => {
    expect(normalizeText("## Header\nBody")).toBe("Header\nBody");
  });

  it("should unwrap inline code", () => {
    expect(normalizeText("`code`")).toBe("code");
  });

  it("should strip tagged code fences", () => {
    expect(normalizeText("```text\nX\n```")).toBe("X");
  });

  it("should unwrap links", () => {
    expect(normalizeText("See [the docs](https://example.com) now")).toBe(
      "See the docs now",
    );
  });

  it("should strip italic markers", () => {
    expect(normalizeText("*italic* and _under_")).toBe("italic and under");
  });

  it("should normalize a typical OCR response", () => {
    const raw = [
      "```markdown",
      "# ACME Corp",
      "**Invoice** INV-2024-001",
      "Date: `2024-03-15`",
      "Total: *500.00 EUR*",
      "```",
    ].join("\n");

    expect(normalizeText(raw)).toBe(
      [
        "ACME Corp",
        "Invoice INV-2024-001",
        "Date: 2024-03-15",
        "Total: 500.00 EUR",
      ].join("\n"),
    );
  });

  it("should treat null and undefined as empty", () => {
    expect(normalizeText(null)).toBe("");
    expect(normalizeText(undefined)).toBe("");
    expect(normalizeText("")).toBe("");
  });

  it("should trim the result", () => {
    expect(normalizeText("  \n padded \n ")).toBe("padded");
  });

  it("should leave plain text untouched", () => {
    expect(normalizeText("Total 500.00 EUR\nDue 2024-04-15")).toBe(
      "Total 500.00 EUR\nDue 2024-04-15",
    );
  });
});

describe("normalization passes", () => {
  it("should run in a fixed order", () => {
    expect(NORMALIZATION_PASSES).toEqual([
      stripCodeFences,
      stripBold,
      stripItalic,
      stripHeaders,
      unwrapLinks,
      unwrapInlineCode,
    ]);
  });

  it("stripCodeFences keeps the enclosed text", () => {
    expect(stripCodeFences("```json\n{}\n```")).toBe("{}\n");
  });

  it("stripBold removes both marker styles", () => {
    expect(stripBold("**a** and __b__")).toBe("a and b");
  });

  it("stripItalic leaves double markers alone", () => {
    expect(stripItalic("**a** *b*")).toBe("**a** b");
  });

  it("stripHeaders only removes one to six hashes followed by whitespace", () => {
    expect(stripHeaders("# A\n###### B\n####### C\n#tag")).toBe(
      "A\nB\n####### C\n#tag",
    );
  });

  it("unwrapLinks keeps the label", () => {
    expect(unwrapLinks("[label](target) [x](y)")).toBe("label x");
  });

  it("unwrapInlineCode keeps the code text", () => {
    expect(unwrapInlineCode("run `npm test` then `ls`")).toBe(
      "run npm test then ls",
    );
  });
});
