/**
 * Strips markdown decoration that vision models add to OCR output,
 * keeping the underlying text.
 */

export type NormalizationPass = (text: string) => string;

export const stripCodeFences: NormalizationPass = (text) =>
  text.replace(/```[a-z]*\n?|```/g, "");

export const stripBold: NormalizationPass = (text) =>
  text.replace(/\*\*|__/g, "");

export const stripItalic: NormalizationPass = (text) =>
  text.replace(/(?<!\*)\*(?!\*)|(?<!_)_(?!_)/g, "");

export const stripHeaders: NormalizationPass = (text) =>
  text.replace(/^#{1,6}\s+/gm, "");

export const unwrapLinks: NormalizationPass = (text) =>
  text.replace(/\[([^\]]+)\]\([^)]+\)/g, "$1");

export const unwrapInlineCode: NormalizationPass = (text) =>
  text.replace(/`([^`]+)`/g, "$1");

/** Applied in order; each pass sees the output of the previous one. */
export const NORMALIZATION_PASSES: readonly NormalizationPass[] = [
  stripCodeFences,
  stripBold,
  stripItalic,
  stripHeaders,
  unwrapLinks,
  unwrapInlineCode,
];

export function normalizeText(raw: string | null | undefined): string {
  if (!raw) {
    return "";
  }
  return NORMALIZATION_PASSES.reduce((text, pass) => pass(text), raw).trim();
}
