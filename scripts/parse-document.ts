/**
 * Local Parsing Utility
 * Runs a single image or text file through the document parser against a
 * schema file and prints the extracted JSON.
 */
import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import dotenv from "dotenv";
import { createDocumentParser } from "../src/parser.js";
import { isParserError } from "../src/errors.js";
import { imageMimeTypeForPath } from "../src/utils/mime-types.js";

dotenv.config({ path: fileURLToPath(new URL("../.env.local", import.meta.url)) });

async function main() {
  const args = process.argv.slice(2);
  if (args.length < 2) {
    console.log(
      "Usage: npx tsx scripts/parse-document.ts <schema_file> <input_file>",
    );
    process.exit(1);
  }

  const [schemaPath, inputPath] = args;
  const schema = await readFile(schemaPath, "utf-8");
  const parser = createDocumentParser();

  console.log(`Schema: ${schemaPath}`);
  console.log(`Input: ${inputPath}`);

  const result = imageMimeTypeForPath(inputPath)
    ? await parser.parseImage(await readFile(inputPath), schema)
    : await parser.parseText(await readFile(inputPath, "utf-8"), schema);

  console.log(JSON.stringify(result, null, 2));
}

main().catch((error: unknown) => {
  if (isParserError(error)) {
    console.error(`Parsing failed (${error.kind}): ${error.message}`);
  } else {
    console.error("Unexpected error:", error);
  }
  process.exit(1);
});
