/**
 * HTTP surface for the document parser: health check and parse endpoint.
 */

import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import { z } from "zod";
import type { DocumentParser } from "./parser.js";
import { isParserError, type ErrorCategory } from "./errors.js";
import type { StructuredValue } from "./parsing/response-extractor.js";

const DEFAULT_BODY_LIMIT = "25mb";

/** Base64-encoded image bytes; line breaks from wrapped encoders are dropped */
const base64Image = z
  .string()
  .transform((value) => value.replace(/\s+/g, ""))
  .pipe(z.string().base64("image must be base64"));

const parseRequestSchema = z.object({
  image: base64Image.nullish(),
  text: z.string().nullish(),
  schema: z.string(),
});

/** Shape of the errors thrown by express.json() */
const bodyParserErrorSchema = z.object({
  type: z.string(),
  status: z.number(),
  message: z.string(),
});

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
  validation: 400,
  extraction: 422,
  upstream: 502,
};

export type ParseReply =
  | { status: 200; body: { result: StructuredValue } }
  | { status: number; body: { error: string; message: string } };

/**
 * Runs one parse request body through the parser and maps failures to
 * HTTP status codes.
 */
export async function handleParseRequest(
  parser: DocumentParser,
  body: unknown,
): Promise<ParseReply> {
  const parsed = parseRequestSchema.safeParse(body);
  if (!parsed.success) {
    return {
      status: 400,
      body: { error: "InvalidRequest", message: parsed.error.issues[0].message },
    };
  }

  const { image, text, schema } = parsed.data;

  try {
    const result = await parser.parse({
      image: image == null ? undefined : Buffer.from(image, "base64"),
      text,
      schema,
    });
    return { status: 200, body: { result } };
  } catch (error) {
    if (isParserError(error)) {
      console.warn(`[Server] Parse failed (${error.kind}): ${error.message}`);
      return {
        status: STATUS_BY_CATEGORY[error.category],
        body: { error: error.kind, message: error.message },
      };
    }
    const message = error instanceof Error ? error.message : String(error);
    console.error("[Server] Unexpected parse failure:", error);
    return { status: 500, body: { error: "InternalError", message } };
  }
}

export interface AppOptions {
  /** Largest accepted request body, in express.json() notation */
  bodyLimit?: string;
}

export function createApp(
  parser: DocumentParser,
  version: string,
  options: AppOptions = {},
): Express {
  const app = express();
  app.use(express.json({ limit: options.bodyLimit ?? DEFAULT_BODY_LIMIT }));

  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      version,
      status: "healthy",
      timestamp: new Date().toISOString(),
    });
  });

  app.post("/parse", async (req: Request, res: Response) => {
    const reply = await handleParseRequest(parser, req.body);
    res.status(reply.status).json(reply.body);
  });

  app.use(
    (error: unknown, _req: Request, res: Response, _next: NextFunction) => {
      const bodyError = bodyParserErrorSchema.safeParse(error);
      if (bodyError.success) {
        const { type, status, message } = bodyError.data;
        console.warn(`[Server] Rejected request body (${type}): ${message}`);
        res.status(status).json({ error: "InvalidRequest", message });
        return;
      }

      console.error("[Server] Unhandled request error:", error);
      const message = error instanceof Error ? error.message : String(error);
      res.status(500).json({ error: "InternalError", message });
    },
  );

  return app;
}
