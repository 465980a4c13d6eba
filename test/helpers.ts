/**
 * Shared test fixtures.
 */

import type { Logger } from "../src/log.ts";

export type LogLevel = "info" | "success" | "warn" | "error";

export interface MemoryLogger extends Logger {
  entries: Array<{ level: LogLevel; message: string }>;
  messages(level: LogLevel): string[];
}

/** Logger that records messages instead of printing them. */
export function createMemoryLogger(): MemoryLogger {
  const entries: MemoryLogger["entries"] = [];
  const record = (level: LogLevel) => (message: string) => {
    entries.push({ level, message });
  };
  return {
    entries,
    messages: (level) => entries.filter((e) => e.level === level).map((e) => e.message),
    info: record("info"),
    success: record("success"),
    warn: record("warn"),
    error: record("error"),
  };
}

/** A model response holding the given question/answer pairs. */
export function questionSetJson(pairs: Array<[string, string]>): string {
  return JSON.stringify({
    questions: pairs.map(([question, answer]) => ({ question, answer })),
  });
}

/**
 * A PDF with one line of Helvetica text per page. Texts must be plain
 * ASCII without parentheses or backslashes.
 */
export function minimalPdf(pageTexts: string[]): Buffer {
  const objects = [
    "<< /Type /Catalog /Pages 2 0 R >>",
    `<< /Type /Pages /Kids [${pageTexts.map((_, i) => `${4 + 2 * i} 0 R`).join(" ")}] /Count ${pageTexts.length} >>`,
    "<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>",
  ];
  pageTexts.forEach((text, i) => {
    const content = `BT /F1 24 Tf 72 720 Td (${text}) Tj ET`;
    objects.push(
      `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] ` +
        `/Resources << /Font << /F1 3 0 R >> >> /Contents ${5 + 2 * i} 0 R >>`,
      `<< /Length ${content.length} >>\nstream\n${content}\nendstream`,
    );
  });

  let pdf = "%PDF-1.4\n";
  const offsets: number[] = [];
  objects.forEach((body, i) => {
    offsets.push(pdf.length);
    pdf += `${i + 1} 0 obj\n${body}\nendobj\n`;
  });
  const xrefOffset = pdf.length;
  pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) {
    pdf += `${String(offset).padStart(10, "0")} 00000 n \n`;
  }
  pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;
  return Buffer.from(pdf, "latin1");
}
