/**
 * Tests for the single-lecture pipeline. Extraction is stubbed; the
 * completion endpoint is the mock client.
 */

import { test, expect, describe, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readFile, writeFile, readdir } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { MockCompletionClient } from "../src/llm/mock.ts";
import { fileStem, processLecture, type LectureJob } from "../src/questions/lecture.ts";
import { ok, fail } from "../src/result.ts";
import { createMemoryLogger, questionSetJson } from "./helpers.ts";

const extractOk = async () => ok("Lecture text\n");

describe("fileStem", () => {
  test("drops directory and extension", () => {
    expect(fileStem("slices/Lecture.01.Intro.pdf")).toBe("Lecture.01.Intro");
  });
});

describe("processLecture", () => {
  let tmpDir: string;
  let job: LectureJob;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "lecture-quiz-lecture-"));
    job = {
      pdfPath: join(tmpDir, "slices", "Week 1.pdf"),
      numQuestions: 2,
      template: "Write {num_questions} questions.",
      outputDir: join(tmpDir, "out", "questions"),
      model: "gpt-4o-mini",
    };
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  test("writes a pretty-printed question set named after the lecture", async () => {
    const client = new MockCompletionClient([questionSetJson([["Qué es?", "Une réponse"]])]);
    const log = createMemoryLogger();

    const done = await processLecture(job, { client, log, extract: extractOk });

    expect(done).toBe(true);
    const written = await readFile(join(job.outputDir, "Week 1.json"), "utf-8");
    expect(written).toBe(
      '{\n  "questions": [\n    {\n      "question": "Qué es?",\n      "answer": "Une réponse"\n    }\n  ]\n}\n',
    );
    expect(log.messages("success")).toEqual([`Saved questions to: ${join(job.outputDir, "Week 1.json")}`]);
  });

  test("overwrites an existing file without merging", async () => {
    const client = new MockCompletionClient([
      questionSetJson([["Old 1", "a"], ["Old 2", "b"]]),
      questionSetJson([["New", "c"]]),
    ]);
    const deps = { client, log: createMemoryLogger(), extract: extractOk };

    expect(await processLecture(job, deps)).toBe(true);
    expect(await processLecture(job, deps)).toBe(true);

    const saved = JSON.parse(await readFile(join(job.outputDir, "Week 1.json"), "utf-8"));
    expect(saved).toEqual({ questions: [{ question: "New", answer: "c" }] });
  });

  test("skips generation when extraction fails", async () => {
    const client = new MockCompletionClient([questionSetJson([["Q", "A"]])]);
    const log = createMemoryLogger();

    const done = await processLecture(job, {
      client,
      log,
      extract: async () => fail("Unable to read PDF file: bad XRef entry"),
    });

    expect(done).toBe(false);
    expect(client.calls).toHaveLength(0);
    expect(log.messages("error")).toEqual([
      "Unable to read PDF file: bad XRef entry",
      `Unable to extract PDF content: ${job.pdfPath}`,
    ]);
  });

  test("treats empty extracted text as a failure", async () => {
    const client = new MockCompletionClient();
    const done = await processLecture(job, { client, log: createMemoryLogger(), extract: async () => ok("") });
    expect(done).toBe(false);
    expect(client.calls).toHaveLength(0);
  });

  test("writes nothing when generation fails", async () => {
    const client = new MockCompletionClient(['{"foo": 1}']);
    const log = createMemoryLogger();

    const done = await processLecture(job, { client, log, extract: extractOk });

    expect(done).toBe(false);
    expect(log.messages("error")).toEqual([
      "Response has no 'questions' field",
      `Failed to generate questions: ${job.pdfPath}`,
    ]);
    await expect(readdir(job.outputDir)).rejects.toThrow();
  });

  test("reports an unwritable output directory", async () => {
    const blocker = join(tmpDir, "blocker");
    await writeFile(blocker, "not a directory");
    const client = new MockCompletionClient([questionSetJson([["Q", "A"]])]);
    const log = createMemoryLogger();

    const done = await processLecture({ ...job, outputDir: join(blocker, "questions") }, { client, log, extract: extractOk });

    expect(done).toBe(false);
    expect(log.messages("error")[0]).toMatch(/^Unable to write /);
  });
});
