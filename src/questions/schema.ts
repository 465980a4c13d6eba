/**
 * Question set shapes and JSON decoding.
 *
 * Text is first decoded into a tagged union (object or sequence); shape
 * checks then switch on the tag.
 */

import { type Result, ok, fail, errorMessage } from "../result.ts";
import type { Logger } from "../log.ts";

export interface ExamQuestion {
  question: string;
  answer: string;
}

/**
 * A lecture's question set as persisted. `questions` is kept as the model
 * returned it; the aggregator skips a non-list and filters malformed entries
 * on export.
 */
export type QuestionSet = Record<string, unknown> & { questions: unknown };

export interface FlattenedRecord extends ExamQuestion {
  /** Stem of the JSON file the record was read from */
  source: string;
}

export type DecodedJson =
  | { kind: "object"; value: Record<string, unknown> }
  | { kind: "sequence"; value: unknown[] };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function hasQuestions(value: Record<string, unknown>): value is QuestionSet {
  return "questions" in value;
}

/**
 * Parse JSON text into an object or a sequence. Scalars are failures.
 */
export function decodeJson(text: string): Result<DecodedJson> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    return fail(`Invalid JSON: ${errorMessage(err)}`);
  }

  if (Array.isArray(parsed)) return ok({ kind: "sequence", value: parsed });
  if (isRecord(parsed)) return ok({ kind: "object", value: parsed });
  return fail(`Expected a JSON object or array, got ${parsed === null ? "null" : typeof parsed}`);
}

/**
 * Bring a decoded model response into the QuestionSet shape.
 *
 * - any object with a `questions` key passes through with every key kept
 * - a bare array is wrapped as `{questions: [...]}`
 * - any other object is rejected
 */
export function normalizeQuestionSet(decoded: DecodedJson, log: Logger): Result<QuestionSet> {
  switch (decoded.kind) {
    case "sequence":
      log.warn("Returned JSON is a bare array, wrapping it in a 'questions' field");
      return ok({ questions: decoded.value });

    case "object": {
      if (!hasQuestions(decoded.value)) {
        log.warn("Returned JSON format is incorrect, missing 'questions' field");
        return fail("Response has no 'questions' field");
      }
      return ok(decoded.value);
    }
  }
}
