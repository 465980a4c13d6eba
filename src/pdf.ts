/**
 * PDF text extraction for lecture slide decks.
 */

import { readFile } from "node:fs/promises";
import { PDFParse } from "pdf-parse";
import { type Result, ok, fail, errorMessage } from "./result.ts";

/**
 * Extract the text of every page, each page followed by a newline.
 * Pages without a text layer contribute an empty line.
 */
export async function extractPDFText(filePath: string): Promise<Result<string>> {
  try {
    const buffer = await readFile(filePath);
    const parser = new PDFParse({ data: buffer });
    try {
      const data = await parser.getText();
      return ok(data.pages.map((page) => `${page.text}\n`).join(""));
    } finally {
      await parser.destroy();
    }
  } catch (err) {
    return fail(`Unable to read PDF file: ${errorMessage(err)}`);
  }
}
