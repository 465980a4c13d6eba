/**
 * OpenAI completion client.
 */

import OpenAI from "openai";
import type { CompletionClient, CompletionRequest } from "./provider.ts";

export class OpenAICompletionClient implements CompletionClient {
  private client: OpenAI;

  constructor(apiKey: string) {
    this.client = new OpenAI({ apiKey });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [
      { role: "system", content: request.system },
      { role: "user", content: request.user },
    ];

    const response = await this.client.chat.completions.create({
      model: request.model,
      messages,
      temperature: request.temperature,
      ...(request.json ? { response_format: { type: "json_object" as const } } : {}),
    });

    const content = response.choices[0]?.message.content;
    if (!content) {
      throw new Error("OpenAI returned an empty response");
    }
    return content;
  }
}
