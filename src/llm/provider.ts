/**
 * Completion endpoint abstraction.
 *
 * One request in, the raw response text out. Clients throw on transport
 * faults; callers turn that into a per-lecture failure.
 */

export interface CompletionRequest {
  model: string;
  /** Fixed instruction sent with the system role */
  system: string;
  /** Rendered prompt sent with the user role */
  user: string;
  temperature: number;
  /** Ask the endpoint for a JSON object response */
  json: boolean;
}

export interface CompletionClient {
  complete(request: CompletionRequest): Promise<string>;
}
