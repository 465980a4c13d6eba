/**
 * Question generation over a directory of lecture PDFs.
 *
 * Configuration problems end the run with exit code 1 before anything is
 * written. Per-lecture failures are counted and the batch carries on.
 */

import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import { type ModelCatalog, type QuizConfig, describeModel, resolveApiKey } from "./config.ts";
import { OpenAICompletionClient } from "./llm/openai.ts";
import type { CompletionClient } from "./llm/provider.ts";
import type { Logger } from "./log.ts";
import { loadPromptTemplate } from "./prompt.ts";
import { processLecture } from "./questions/lecture.ts";
import { type Result, ok, fail } from "./result.ts";

const LECTURE_EXTENSION = ".pdf";

export interface GenerateOptions {
  numQuestions: number;
  apiKey?: string;
  slicesDir: string;
  outputDir: string;
  promptFile: string;
  /** Process only this file name inside slicesDir */
  lecture?: string;
  model: string;
}

export interface GenerateDeps {
  models: ModelCatalog;
  config: QuizConfig;
  log: Logger;
  createClient?: (apiKey: string) => CompletionClient;
  extract?: (path: string) => Promise<Result<string>>;
}

/**
 * Pick the lectures to process: the named file, or every PDF in the
 * directory sorted by name.
 */
export async function selectLectures(slicesDir: string, lecture?: string): Promise<Result<string[]>> {
  if (!(await isDirectory(slicesDir))) {
    return fail(`slices directory does not exist: ${slicesDir}`);
  }

  if (lecture) {
    const pdfPath = join(slicesDir, lecture);
    if (!(await isFile(pdfPath))) {
      return fail(`File does not exist: ${pdfPath}`);
    }
    return ok([pdfPath]);
  }

  const entries = await readdir(slicesDir, { withFileTypes: true });
  const names = entries
    .filter((e) => e.isFile() && e.name.endsWith(LECTURE_EXTENSION))
    .map((e) => e.name)
    .sort();

  if (names.length === 0) {
    return fail(`No PDF files found in ${slicesDir} directory`);
  }
  return ok(names.map((name) => join(slicesDir, name)));
}

/**
 * Run the generation pipeline. Resolves to the process exit code.
 */
export async function runGenerate(options: GenerateOptions, deps: GenerateDeps): Promise<number> {
  const { log } = deps;

  const apiKey = resolveApiKey(options.apiKey, deps.config);
  if (!apiKey) {
    log.error(
      "Please provide an OpenAI API key (via --api-key, the OPENAI_API_KEY environment variable, or the config file)",
    );
    return 1;
  }

  const template = await loadPromptTemplate(options.promptFile);
  if (!template.ok || !template.value) {
    if (!template.ok) log.error(template.error);
    log.error(`Unable to load prompt file: ${options.promptFile}`);
    return 1;
  }

  const selection = await selectLectures(options.slicesDir, options.lecture);
  if (!selection.ok) {
    log.error(selection.error);
    return 1;
  }
  const pdfFiles = selection.value;

  log.info(`Found ${pdfFiles.length} PDF files`);
  log.info(`Each lecture will generate ${options.numQuestions} questions`);
  log.info(`${describeModel(deps.models, options.model)}\n`);

  const createClient = deps.createClient ?? ((key: string) => new OpenAICompletionClient(key));
  const client = createClient(apiKey);

  let succeeded = 0;
  for (const pdfPath of pdfFiles) {
    const done = await processLecture(
      {
        pdfPath,
        numQuestions: options.numQuestions,
        template: template.value,
        outputDir: options.outputDir,
        model: options.model,
      },
      { client, log, extract: deps.extract },
    );
    if (done) succeeded++;
    log.info("");
  }

  log.success(`Complete! Successfully processed ${succeeded}/${pdfFiles.length} files`);
  return 0;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}
