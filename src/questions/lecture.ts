/**
 * Single-lecture pipeline: extract, generate, write `<stem>.json`.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import type { CompletionClient } from "../llm/provider.ts";
import type { Logger } from "../log.ts";
import { extractPDFText } from "../pdf.ts";
import { type Result, errorMessage } from "../result.ts";
import { generateQuestions } from "./generator.ts";

export interface LectureJob {
  pdfPath: string;
  numQuestions: number;
  template: string;
  outputDir: string;
  model: string;
}

export interface LectureDeps {
  client: CompletionClient;
  log: Logger;
  /** Text extractor; defaults to the PDF extractor */
  extract?: (path: string) => Promise<Result<string>>;
}

/** File name stem: "slices/Lecture 01.pdf" → "Lecture 01" */
export function fileStem(path: string): string {
  return basename(path, extname(path));
}

/**
 * Process one lecture. Returns false on any failure after reporting it;
 * never throws, so the batch can move on.
 */
export async function processLecture(job: LectureJob, deps: LectureDeps): Promise<boolean> {
  const { client, log } = deps;
  const extract = deps.extract ?? extractPDFText;

  log.info(`Processing: ${job.pdfPath}`);

  const text = await extract(job.pdfPath);
  if (!text.ok) log.error(text.error);
  if (!text.ok || !text.value) {
    log.error(`Unable to extract PDF content: ${job.pdfPath}`);
    return false;
  }
  log.info(`Extracted ${text.value.length} characters of text content`);

  log.info(`Generating ${job.numQuestions} questions...`);
  const questions = await generateQuestions(
    client,
    {
      lectureText: text.value,
      numQuestions: job.numQuestions,
      template: job.template,
      model: job.model,
    },
    log,
  );
  if (!questions.ok) {
    log.error(questions.error);
    log.error(`Failed to generate questions: ${job.pdfPath}`);
    return false;
  }

  const outputPath = join(job.outputDir, `${fileStem(job.pdfPath)}.json`);
  try {
    await mkdir(job.outputDir, { recursive: true });
    await writeFile(outputPath, JSON.stringify(questions.value, null, 2) + "\n", "utf-8");
  } catch (err) {
    log.error(`Unable to write ${outputPath}: ${errorMessage(err)}`);
    return false;
  }

  log.success(`Saved questions to: ${outputPath}`);
  return true;
}
