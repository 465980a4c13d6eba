/**
 * Export pipeline: saved question sets → text study sheets.
 */

import type { Logger } from "../log.ts";
import { loadAllQuestions } from "./aggregate.ts";
import { writeTextFiles } from "./text.ts";

export { loadAllQuestions } from "./aggregate.ts";
export { writeTextFiles, renderStudySheets, type ExportedFiles } from "./text.ts";

export interface ExportOptions {
  questionsDir: string;
  outputDir: string;
}

/**
 * Run the export. Nothing to export is reported but is not an error exit.
 */
export async function runExport(options: ExportOptions, log: Logger): Promise<number> {
  const loaded = await loadAllQuestions(options.questionsDir, log);
  if (!loaded.ok) log.error(loaded.error);
  if (!loaded.ok || loaded.value.length === 0) {
    log.error("No questions loaded");
    return 0;
  }

  const written = await writeTextFiles(loaded.value, options.outputDir);
  if (!written.ok) {
    log.error(written.error);
    return 1;
  }

  log.info("\nGenerated files:");
  log.info(`  - ${written.value.questions}`);
  log.info(`  - ${written.value.answers}`);
  log.info(`  - ${written.value.combined}`);
  log.success(`\nComplete! Processed ${loaded.value.length} questions in total`);
  return 0;
}
