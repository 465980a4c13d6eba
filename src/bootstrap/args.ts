import yargs from "yargs";
import {
  DEFAULT_MODEL,
  DEFAULT_NUM_QUESTIONS,
  DEFAULT_PROMPT_FILE,
  DEFAULT_QUESTIONS_DIR,
  DEFAULT_SLICES_DIR,
  DEFAULT_TXT_DIR,
  MODEL_IDS,
} from "../config.ts";
import type { GenerateOptions } from "../batch.ts";
import type { ExportOptions } from "../export/index.ts";

/**
 * Options for `generate`; `args` excludes the node binary, script and command name.
 * Invalid flags reject with the yargs message instead of exiting.
 */
export async function parseGenerateArgs(args: string[]): Promise<GenerateOptions> {
  const parsed = await yargs(args)
    .scriptName("lecture-quiz generate")
    .option("num-questions", {
      type: "number",
      default: DEFAULT_NUM_QUESTIONS,
      describe: "Number of questions to generate per lecture",
    })
    .option("api-key", {
      type: "string",
      describe: "OpenAI API key (defaults to OPENAI_API_KEY, then the config file)",
    })
    .option("slices-dir", {
      type: "string",
      default: DEFAULT_SLICES_DIR,
      describe: "Directory containing lecture PDFs",
    })
    .option("output-dir", {
      type: "string",
      default: DEFAULT_QUESTIONS_DIR,
      describe: "Output directory for JSON question sets",
    })
    .option("prompt-file", {
      type: "string",
      default: DEFAULT_PROMPT_FILE,
      describe: "Prompt template file with a {num_questions} placeholder",
    })
    .option("lecture", {
      type: "string",
      describe: "Process only this file in the slices directory (e.g. Lecture.01.Introduction.pdf)",
    })
    .option("model", {
      choices: MODEL_IDS,
      default: DEFAULT_MODEL,
      describe: "Model to use",
    })
    .check((argv) => {
      if (!Number.isInteger(argv["num-questions"]) || argv["num-questions"] < 1) {
        return `--num-questions must be a positive integer, got ${argv["num-questions"]}`;
      }
      return true;
    })
    .strict()
    .fail(false)
    .help()
    .parse();

  return {
    numQuestions: parsed.numQuestions,
    apiKey: parsed.apiKey,
    slicesDir: parsed.slicesDir,
    outputDir: parsed.outputDir,
    promptFile: parsed.promptFile,
    lecture: parsed.lecture,
    model: parsed.model,
  };
}

/** Options for `export`. */
export async function parseExportArgs(args: string[]): Promise<ExportOptions> {
  const parsed = await yargs(args)
    .scriptName("lecture-quiz export")
    .option("questions-dir", {
      type: "string",
      default: DEFAULT_QUESTIONS_DIR,
      describe: "Directory containing JSON question sets",
    })
    .option("output-dir", {
      type: "string",
      default: DEFAULT_TXT_DIR,
      describe: "Output directory for the text files",
    })
    .strict()
    .fail(false)
    .help()
    .parse();

  return {
    questionsDir: parsed.questionsDir,
    outputDir: parsed.outputDir,
  };
}
