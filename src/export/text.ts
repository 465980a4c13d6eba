/**
 * Plain-text study sheets.
 *
 * Three files share one numbering, assigned by position in the record list:
 * questions only, answers only, and each question followed by its answer.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { FlattenedRecord } from "../questions/schema.ts";
import { type Result, ok, fail, errorMessage } from "../result.ts";

export const QUESTIONS_FILE = "questions.txt";
export const ANSWERS_FILE = "answers.txt";
export const COMBINED_FILE = "questions_and_answers.txt";

export interface ExportedFiles {
  questions: string;
  answers: string;
  combined: string;
}

export interface StudySheets {
  questions: string;
  answers: string;
  combined: string;
}

export function renderStudySheets(records: readonly FlattenedRecord[]): StudySheets {
  let questions = "";
  let answers = "";
  let combined = "";

  records.forEach((record, i) => {
    const n = i + 1;
    questions += `${n}. ${record.question}\n\n`;
    answers += `${n}. ${record.answer}\n\n`;
    combined += `${n}. ${record.question}\nA: ${record.answer}\n\n`;
  });

  return { questions, answers, combined };
}

/** Write the three sheets into outputDir, replacing existing files. */
export async function writeTextFiles(
  records: readonly FlattenedRecord[],
  outputDir: string,
): Promise<Result<ExportedFiles>> {
  const sheets = renderStudySheets(records);
  const paths: ExportedFiles = {
    questions: join(outputDir, QUESTIONS_FILE),
    answers: join(outputDir, ANSWERS_FILE),
    combined: join(outputDir, COMBINED_FILE),
  };

  try {
    await mkdir(outputDir, { recursive: true });
    await writeFile(paths.questions, sheets.questions, "utf-8");
    await writeFile(paths.answers, sheets.answers, "utf-8");
    await writeFile(paths.combined, sheets.combined, "utf-8");
  } catch (err) {
    return fail(`Unable to write text files to ${outputDir}: ${errorMessage(err)}`);
  }

  return ok(paths);
}
