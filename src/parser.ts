/**
 * Document parser facade: the entry point library callers use.
 *
 * ```ts
 * const parser = createDocumentParser();
 * const invoice = await parser.parseImage(imageBytes, schemaJson);
 * ```
 */

import { LLMClient } from "./llm/index.js";
import type { LLMConfig } from "./llm/types.js";
import { createGenerator, createRecognizer } from "./llm/capabilities.js";
import { ExtractionPipeline, type ExtractionRequest } from "./pipeline.js";
import type { StructuredValue } from "./parsing/response-extractor.js";
import { ExtractionSchema } from "./schema.js";

export type SchemaInput = string | ExtractionSchema;

export interface DocumentParser {
  parse(request: ExtractionRequest): Promise<StructuredValue>;
  parseImage(image: Uint8Array, schema: SchemaInput): Promise<StructuredValue>;
  parseText(text: string, schema: SchemaInput): Promise<StructuredValue>;
}

export class DefaultDocumentParser implements DocumentParser {
  constructor(private readonly pipeline: ExtractionPipeline) {}

  parse(request: ExtractionRequest): Promise<StructuredValue> {
    return this.pipeline.extract(request);
  }

  parseImage(image: Uint8Array, schema: SchemaInput): Promise<StructuredValue> {
    return this.pipeline.extract({ image, schema: schemaText(schema) });
  }

  parseText(text: string, schema: SchemaInput): Promise<StructuredValue> {
    return this.pipeline.extract({ text, schema: schemaText(schema) });
  }
}

function schemaText(schema: SchemaInput): string {
  return typeof schema === "string" ? schema : schema.raw;
}

/**
 * Wires an LLMClient, its capabilities and the pipeline from configuration
 * (environment defaults merged with `config`).
 */
export function createDocumentParser(
  config?: Partial<LLMConfig>,
): DefaultDocumentParser {
  const client = new LLMClient(config);
  const pipeline = new ExtractionPipeline({
    recognize: createRecognizer(client),
    generate: createGenerator(client),
  });
  return new DefaultDocumentParser(pipeline);
}
