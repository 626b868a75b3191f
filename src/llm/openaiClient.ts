import OpenAI from "openai";
import { config } from "../config";
import { GenerationUnavailableError, statusOf, toGenerationError } from "./generationError";

const isNotFoundError = (error: unknown): boolean => {
  if (statusOf(error) === 404) return true;
  const message = error instanceof Error ? error.message : String(error);
  return /not found/i.test(message);
};

const isModelUnknownError = (error: unknown): boolean => {
  const message = error instanceof Error ? error.message : String(error);
  return /unknown model|invalid model|model .* does not exist|no such model|unsupported model/i.test(message);
};

const isModelsListUnsupportedError = (error: unknown): boolean => {
  const status = statusOf(error);
  if (status === 404 || status === 405 || status === 501) return true;
  const message = error instanceof Error ? error.message : String(error);
  return /models?.*(not found|unsupported)|unsupported.*models?/i.test(message);
};

export class OpenAiClient {
  private readonly client: OpenAI;
  private modelValidationPromise?: Promise<void>;

  constructor(private readonly model = config.model) {
    this.client = new OpenAI({
      apiKey: config.openaiApiKey,
      baseURL: config.openaiBaseUrl
    });
  }

  getModel(): string {
    return this.model;
  }

  private unknownModelError(error: unknown): Error {
    const originalMessage = error instanceof Error ? error.message : String(error);
    return new Error(
      [
        `Configured model "${this.model}" is not available on ${config.openaiBaseUrl}.`,
        "Set OPENAI_MODEL to a provider-supported model and restart.",
        `Original error: ${originalMessage}`
      ].join(" ")
    );
  }

  private async validateWithModelsList(): Promise<void> {
    const response = await this.client.models.list();
    const modelIds = response.data.map((item) => item.id.trim()).filter(Boolean);

    if (modelIds.length === 0 || modelIds.includes(this.model)) {
      return;
    }

    const sample = modelIds.slice(0, 8).join(", ");
    throw new Error(`Configured model "${this.model}" is not in provider model list. Available models (sample): ${sample}`);
  }

  private async probeModel(): Promise<void> {
    try {
      await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: "user", content: "ping" }],
        max_tokens: 1,
        temperature: 0
      });
    } catch (error: unknown) {
      if (isModelUnknownError(error)) {
        throw this.unknownModelError(error);
      }
      throw error;
    }
  }

  private async runModelValidation(): Promise<void> {
    try {
      await this.validateWithModelsList();
      return;
    } catch (error: unknown) {
      if (isModelUnknownError(error)) {
        throw this.unknownModelError(error);
      }
      if (!isModelsListUnsupportedError(error)) {
        throw error;
      }
    }

    await this.probeModel();
  }

  async assertModelAvailable(): Promise<void> {
    if (!this.modelValidationPromise) {
      this.modelValidationPromise = this.runModelValidation();
    }
    return this.modelValidationPromise;
  }

  private async generateWithChat(prompt: string, system: string, maxOutputTokens: number): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      max_tokens: maxOutputTokens,
      messages: [
        { role: "system", content: system },
        { role: "user", content: prompt }
      ]
    });

    const text = response.choices[0]?.message?.content?.trim();
    if (!text) {
      throw new GenerationUnavailableError("empty_output", "LLM returned empty output.");
    }
    return text;
  }

  private async generateWithResponses(prompt: string, system: string, maxOutputTokens: number): Promise<string> {
    const response = await this.client.responses.create({
      model: this.model,
      instructions: system,
      input: prompt,
      max_output_tokens: maxOutputTokens
    });

    const text = response.output_text.trim();
    if (!text) {
      throw new GenerationUnavailableError("empty_output", "LLM returned empty output.");
    }
    return text;
  }

  /**
   * Single prompt/response call. Every provider failure surfaces as a `GenerationUnavailableError`.
   */
  async generate(prompt: string, system: string, maxOutputTokens: number): Promise<string> {
    try {
      try {
        return await this.generateWithChat(prompt, system, maxOutputTokens);
      } catch (error: unknown) {
        if (!isNotFoundError(error)) {
          throw error;
        }
      }

      return await this.generateWithResponses(prompt, system, maxOutputTokens);
    } catch (error: unknown) {
      throw toGenerationError(error);
    }
  }
}
