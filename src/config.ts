/**
 * Configuration: supported models, CLI defaults, and the saved credential.
 *
 * The OpenAI key can live in ~/.lecture-quiz/config.json. A key passed on the
 * command line or set in OPENAI_API_KEY takes precedence.
 */

import { homedir } from "node:os";
import { join } from "node:path";
import { readFile } from "node:fs/promises";
import { z } from "zod";
import { errorMessage } from "./result.ts";
import type { Logger } from "./log.ts";

const CONFIG_DIR = join(homedir(), ".lecture-quiz");
export const CONFIG_PATH = join(CONFIG_DIR, "config.json");

// --- Models ---

export interface ModelDescriptor {
  name: string;
  /** Context window label, display only */
  context: string;
  description: string;
}

export const MODEL_IDS = ["gpt-5", "gpt-4o", "gpt-4-turbo", "gpt-4o-mini"] as const;

export type ModelId = (typeof MODEL_IDS)[number];

export type ModelCatalog = Readonly<Record<string, ModelDescriptor>>;

export const MODEL_CATALOG: ModelCatalog = Object.freeze({
  "gpt-5": {
    name: "gpt-5",
    context: "200k+ tokens",
    description: "Latest model with enhanced reasoning and multimodal processing",
  },
  "gpt-4o": {
    name: "gpt-4o",
    context: "128k tokens",
    description: "Balanced performance and cost",
  },
  "gpt-4-turbo": {
    name: "gpt-4-turbo",
    context: "128k tokens",
    description: "High-performance model",
  },
  "gpt-4o-mini": {
    name: "gpt-4o-mini",
    context: "128k tokens",
    description: "More economical option",
  },
} satisfies Record<ModelId, ModelDescriptor>);

export const DEFAULT_MODEL: ModelId = "gpt-5";

/**
 * One console line naming the model, with its catalog details when known.
 */
export function describeModel(models: ModelCatalog, id: string): string {
  const info = models[id];
  if (!info) return `Using model: ${id}`;
  return `Using model: ${info.name} - ${info.description} (Context: ${info.context})`;
}

// --- CLI defaults ---

export const DEFAULT_NUM_QUESTIONS = 20;
export const DEFAULT_SLICES_DIR = "slices";
export const DEFAULT_QUESTIONS_DIR = "questions";
export const DEFAULT_PROMPT_FILE = "scripts/prompt.txt";
export const DEFAULT_TXT_DIR = "questions_txt";

// --- Saved config ---

export const QuizConfigSchema = z.object({
  openaiApiKey: z.string().optional(),
});

export type QuizConfig = z.infer<typeof QuizConfigSchema>;

/**
 * Load the saved config. A missing file is an empty config; an unreadable or
 * invalid one is reported and ignored.
 */
export async function loadConfig(log: Logger, path = CONFIG_PATH): Promise<QuizConfig> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return {};
    log.warn(`Unable to read config file ${path}: ${errorMessage(err)}`);
    return {};
  }

  try {
    const parsed = QuizConfigSchema.safeParse(JSON.parse(raw));
    if (parsed.success) return parsed.data;
    log.warn(`Ignoring invalid config file ${path}: ${parsed.error.issues[0]?.message ?? "invalid shape"}`);
  } catch (err) {
    log.warn(`Ignoring invalid config file ${path}: ${errorMessage(err)}`);
  }
  return {};
}

/**
 * Resolve the OpenAI key.
 * Priority: explicit flag > OPENAI_API_KEY > saved config. Empty strings count as unset.
 */
export function resolveApiKey(flag: string | undefined, config: QuizConfig): string | undefined {
  return [flag, process.env.OPENAI_API_KEY, config.openaiApiKey].find(
    (key): key is string => typeof key === "string" && key.length > 0,
  );
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
