/**
 * Flatten every saved question set in a directory into one ordered list.
 */

import { readdir, readFile } from "node:fs/promises";
import { basename, join } from "node:path";
import type { Logger } from "../log.ts";
import { type Result, ok, fail, errorMessage } from "../result.ts";
import { type FlattenedRecord, decodeJson, isRecord } from "../questions/schema.ts";

const QUESTION_SET_EXTENSION = ".json";

/**
 * Load records from all `.json` files, in file-name order then in-file order.
 *
 * Files that cannot be read or parsed, or that lack a `questions` list, are
 * reported and skipped whole. Entries without both `question` and `answer`
 * are dropped on their own.
 */
export async function loadAllQuestions(questionsDir: string, log: Logger): Promise<Result<FlattenedRecord[]>> {
  const files = await listQuestionSets(questionsDir);
  if (files.length === 0) {
    return fail(`No JSON files found in ${questionsDir} directory`);
  }

  log.info(`Found ${files.length} JSON files`);

  const records: FlattenedRecord[] = [];
  for (const file of files) {
    const path = join(questionsDir, file);

    let text: string;
    try {
      text = await readFile(path, "utf-8");
    } catch (err) {
      log.error(`Unable to read ${path}: ${errorMessage(err)}`);
      continue;
    }

    const decoded = decodeJson(text);
    if (!decoded.ok) {
      log.error(`Unable to parse ${path}: ${decoded.error}`);
      continue;
    }

    const doc = decoded.value;
    if (doc.kind !== "object" || !("questions" in doc.value)) {
      log.warn(`No 'questions' field found in ${path}`);
      continue;
    }

    const entries = doc.value.questions;
    if (!Array.isArray(entries)) {
      log.warn(`'questions' field in ${path} is not a list`);
      continue;
    }

    const source = basename(file, QUESTION_SET_EXTENSION);
    for (const entry of entries) {
      if (!isRecord(entry) || !("question" in entry) || !("answer" in entry)) continue;
      records.push({
        question: asText(entry.question),
        answer: asText(entry.answer),
        source,
      });
    }
  }

  log.info(`Loaded ${records.length} questions in total`);
  return ok(records);
}

async function listQuestionSets(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((e) => e.isFile() && e.name.endsWith(QUESTION_SET_EXTENSION))
      .map((e) => e.name)
      .sort();
  } catch {
    // Missing directory reads as empty
    return [];
  }
}

function asText(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}
