/**
 * Exam question generation: one completion call per lecture.
 */

import type { CompletionClient } from "../llm/provider.ts";
import type { Logger } from "../log.ts";
import { buildPrompt, SYSTEM_PROMPT } from "../prompt.ts";
import { type Result, fail, errorMessage } from "../result.ts";
import { type QuestionSet, decodeJson, normalizeQuestionSet } from "./schema.ts";

/** Sampling temperature for generation; high for varied questions. */
export const GENERATION_TEMPERATURE = 1;

/** Characters of an unparseable response included in the diagnostic. */
const PREVIEW_CHARS = 500;

export interface GenerationRequest {
  lectureText: string;
  numQuestions: number;
  template: string;
  model: string;
}

/**
 * Ask the model for a question set. Best effort, once: every fault comes
 * back as a failure result.
 */
export async function generateQuestions(
  client: CompletionClient,
  request: GenerationRequest,
  log: Logger,
): Promise<Result<QuestionSet>> {
  const prompt = buildPrompt(request.template, request.numQuestions, request.lectureText);

  let text: string;
  try {
    text = await client.complete({
      model: request.model,
      system: SYSTEM_PROMPT,
      user: prompt,
      temperature: GENERATION_TEMPERATURE,
      json: true,
    });
  } catch (err) {
    return fail(`OpenAI API request failed: ${errorMessage(err)}`);
  }

  const decoded = decodeJson(text);
  if (!decoded.ok) {
    return fail(`${decoded.error}\nReturned content: ${text.slice(0, PREVIEW_CHARS)}...`);
  }

  return normalizeQuestionSet(decoded.value, log);
}
