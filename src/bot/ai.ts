/**
 * Gemini client adapter
 * One prompt in, one generated text out. Failures come back as values.
 */

import {
  GoogleGenerativeAI,
  GoogleGenerativeAIResponseError,
} from "@google/generative-ai";
import { errorMessage } from "./logger.js";

/**
 * Minimal model surface used by the adapter
 */
export interface TextModel {
  generateContent(prompt: string): Promise<{ response: { text(): string } }>;
}

export type GenerateFailureReason = "request_failed" | "bad_response";

export type GenerateResult =
  | { ok: true; text: string }
  | { ok: false; reason: GenerateFailureReason; message: string };

export interface GeminiConfig {
  apiKey: string;
  model: string;
}

function classify(error: unknown): GenerateFailureReason {
  return error instanceof GoogleGenerativeAIResponseError ? "bad_response" : "request_failed";
}

export class GeminiClient {
  constructor(private readonly model: TextModel) {}

  /**
   * Generate a completion for the prompt. Single attempt, no timeout.
   */
  async generate(prompt: string): Promise<GenerateResult> {
    let response: { text(): string };
    try {
      ({ response } = await this.model.generateContent(prompt));
    } catch (error) {
      return { ok: false, reason: classify(error), message: errorMessage(error) };
    }

    // text() throws when the candidate was blocked or carries no parts
    try {
      return { ok: true, text: response.text() };
    } catch (error) {
      return { ok: false, reason: "bad_response", message: errorMessage(error) };
    }
  }
}

/**
 * Create a GeminiClient bound to the configured model
 */
export function createGeminiClient(config: GeminiConfig): GeminiClient {
  const genAI = new GoogleGenerativeAI(config.apiKey);
  return new GeminiClient(genAI.getGenerativeModel({ model: config.model }));
}
