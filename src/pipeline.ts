/**
 * Extraction Pipeline
 *
 * Picks the one text stream to extract from and runs it through the
 * generation capability:
 * - image present → recognition → normalization → extraction
 * - text only → extraction
 * - both → the image wins and the text is ignored
 */

import {
  blankSchema,
  blankText,
  emptyImage,
  isBlank,
  missingInput,
  ParserError,
  upstreamFailure,
  type UpstreamStage,
} from "./errors.js";
import { normalizeText } from "./parsing/text-normalizer.js";
import {
  extractJson,
  type StructuredValue,
} from "./parsing/response-extractor.js";

/** Converts image bytes into raw text (vision OCR) */
export type RecognizeText = (image: Uint8Array) => Promise<string>;

/** Turns text plus an opaque schema into a raw model response */
export type GenerateStructured = (
  text: string,
  schema: string,
) => Promise<string>;

export interface ExtractionCapabilities {
  recognize: RecognizeText;
  generate: GenerateStructured;
}

export interface ExtractionRequest {
  image?: Uint8Array | null;
  text?: string | null;
  /** Passed through untouched to prompt construction */
  schema: string;
}

export class ExtractionPipeline {
  constructor(private readonly capabilities: ExtractionCapabilities) {}

  async extract(request: ExtractionRequest): Promise<StructuredValue> {
    const { image, text, schema } = request;

    if (image == null && text == null) {
      throw missingInput();
    }
    if (isBlank(schema)) {
      throw blankSchema();
    }

    const textToExtract =
      image != null
        ? await this.recognize(image)
        : this.providedText(text);

    const started = Date.now();
    const response = await runStage("extraction", () =>
      this.capabilities.generate(textToExtract, schema),
    );
    console.log(
      `[Pipeline] Extraction returned ${response.length} chars in ${Date.now() - started}ms`,
    );

    return extractJson(response);
  }

  private async recognize(image: Uint8Array): Promise<string> {
    if (image.length === 0) {
      throw emptyImage();
    }

    const started = Date.now();
    const raw = await runStage("recognition", () =>
      this.capabilities.recognize(image),
    );
    const normalized = normalizeText(raw);
    console.log(
      `[Pipeline] Recognized ${normalized.length} chars from ${image.length} byte image in ${Date.now() - started}ms`,
    );
    return normalized;
  }

  private providedText(text: string | null | undefined): string {
    if (text == null || isBlank(text)) {
      throw blankText();
    }
    console.log(`[Pipeline] Using provided text (${text.length} chars)`);
    return text;
  }
}

async function runStage(
  stage: UpstreamStage,
  call: () => Promise<string>,
): Promise<string> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof ParserError) {
      throw error;
    }
    console.error(`[Pipeline] ${stage} stage failed:`, error);
    throw upstreamFailure(stage, error);
  }
}
