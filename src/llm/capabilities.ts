/**
 * Binds an LLMClient to the two capabilities the extraction pipeline consumes.
 */

import { fileTypeFromBuffer } from "file-type";
import type { LLMClient } from "./index.js";
import type { ChatRequestOptions } from "./types.js";
import type { GenerateStructured, RecognizeText } from "../pipeline.js";
import { OCR_SYSTEM_PROMPT } from "./prompts/ocr.js";
import {
  EXTRACTION_SYSTEM_PROMPT,
  buildExtractionPrompt,
} from "./prompts/extraction.js";
import { DEFAULT_IMAGE_MIME_TYPE, isImage } from "../utils/mime-types.js";

/**
 * Sniffs the image format from magic bytes; unknown or non-image data is
 * sent as PNG and left to the model to reject.
 */
export async function detectImageMimeType(image: Uint8Array): Promise<string> {
  const detected = await fileTypeFromBuffer(image);
  if (detected && isImage(detected.mime)) {
    return detected.mime;
  }
  return DEFAULT_IMAGE_MIME_TYPE;
}

export function createRecognizer(
  client: LLMClient,
  options: ChatRequestOptions = {},
): RecognizeText {
  const model = options.model || client.visionModel;
  return async (image) => {
    const mimeType = await detectImageMimeType(image);
    const response = await client.vision(OCR_SYSTEM_PROMPT, image, mimeType, {
      ...options,
      model,
    });
    return response.content;
  };
}

export function createGenerator(
  client: LLMClient,
  options: ChatRequestOptions = {},
): GenerateStructured {
  const model = options.model || client.textModel;
  return async (text, schema) => {
    const response = await client.chat(
      EXTRACTION_SYSTEM_PROMPT,
      buildExtractionPrompt(schema, text),
      { ...options, model },
    );
    return response.content;
  };
}
