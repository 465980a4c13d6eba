/**
 * Prompt template loading and rendering.
 *
 * Templates carry a `{num_questions}` token. Literal braces are written
 * doubled (`{{`, `}}`) so a template can show the model an example JSON shape.
 */

import { readFile } from "node:fs/promises";
import { type Result, ok, fail, errorMessage } from "./result.ts";

export const NUM_QUESTIONS_TOKEN = "{num_questions}";

export const SYSTEM_PROMPT =
  "You are a helpful teaching assistant that generates exam questions based on lecture content. " +
  "Always respond with valid JSON containing a 'questions' array.";

export async function loadPromptTemplate(path: string): Promise<Result<string>> {
  try {
    return ok(await readFile(path, "utf-8"));
  } catch (err) {
    return fail(`Unable to read prompt file: ${errorMessage(err)}`);
  }
}

/**
 * Substitute the question count. A template without the token is returned
 * with only its doubled braces collapsed.
 */
export function renderPrompt(template: string, numQuestions: number): string {
  return template.replace(/\{\{|\}\}|\{num_questions\}/g, (match) => {
    if (match === "{{") return "{";
    if (match === "}}") return "}";
    return String(numQuestions);
  });
}

/** Rendered template, a blank line, then the lecture text. */
export function buildPrompt(template: string, numQuestions: number, lectureText: string): string {
  return `${renderPrompt(template, numQuestions)}\n\n${lectureText}`;
}
