import Anthropic from "@anthropic-ai/sdk";
import type { AnthropicSettings } from "../config/index.js";
import { SummarizationError, describeError } from "../errors.js";

export const SUMMARY_INSTRUCTION = "You are a helpful assistant that summarizes articles.";
export const SUMMARY_TEMPERATURE = 0.7;

export interface SummaryRequest {
  instruction: string;
  text: string;
  maxTokens: number;
  temperature: number;
}

/** Text in, text out. */
export interface SummaryModel {
  complete(request: SummaryRequest): Promise<string>;
}

export class AnthropicSummaryModel implements SummaryModel {
  private readonly client: Anthropic;

  constructor(private readonly settings: AnthropicSettings) {
    this.client = new Anthropic({
      apiKey: settings.apiKey,
      timeout: settings.timeoutMs,
      maxRetries: 0,
    });
  }

  async complete(request: SummaryRequest): Promise<string> {
    const response = await this.client.messages
      .create({
        model: this.settings.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        system: request.instruction,
        messages: [
          {
            role: "user",
            content: `Summarize the following article:\n\n${request.text}`,
          },
        ],
      })
      .catch((error: unknown) => {
        throw new SummarizationError(`Summary request failed: ${describeError(error)}`, {
          cause: error,
        });
      });

    const text = response.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("");

    if (!text.trim()) {
      throw new SummarizationError(
        `Summary response had no text (stop reason: ${response.stop_reason ?? "unknown"})`
      );
    }

    return text;
  }
}
