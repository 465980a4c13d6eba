/**
 * Mock completion client for testing.
 *
 * Returns queued responses in order and records every request for
 * assertions. A queued Error is thrown instead of returned, to simulate a
 * transport fault.
 */

import type { CompletionClient, CompletionRequest } from "./provider.ts";

export type MockResponse = string | Error;

export class MockCompletionClient implements CompletionClient {
  /** Queue of responses. Shifts one per complete() call. */
  private responses: MockResponse[];
  /** All requests passed to complete() */
  readonly calls: CompletionRequest[] = [];

  constructor(responses: MockResponse[] = []) {
    this.responses = [...responses];
  }

  /** Add more responses to the queue */
  enqueue(...responses: MockResponse[]) {
    this.responses.push(...responses);
  }

  /** Get the last request made */
  get lastCall(): CompletionRequest | undefined {
    return this.calls[this.calls.length - 1];
  }

  async complete(request: CompletionRequest): Promise<string> {
    this.calls.push({ ...request });

    const response = this.responses.shift();
    if (response === undefined) {
      throw new Error("No more mock responses");
    }
    if (response instanceof Error) throw response;
    return response;
  }
}
