/**
 * Prompts for schema-driven extraction from plain text.
 * The schema is inserted verbatim; it is never parsed here.
 */

export const EXTRACTION_SYSTEM_PROMPT = `
You are a data extraction engine. Your output must be ONLY a JSON object, nothing else.

Rules:
- Output MUST start with { and end with }
- Use exactly the field names from the schema
- If a value is not found, use null
- Do NOT guess or invent values
- Dates must use ISO-8601 format (YYYY-MM-DD)
- Numbers must be numeric, without currency symbols
- Do NOT include explanations, comments or markdown
`.trim();

export function buildExtractionPrompt(schema: string, text: string): string {
  return `Schema:
${schema}

Text:
${text}

Respond with JSON only:`;
}
