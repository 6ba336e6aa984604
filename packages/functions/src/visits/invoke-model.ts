/**
 * Text generation via Bedrock InvokeModel (Amazon Titan Text)
 *
 * The pipelines only see the TextGenerator interface; tests substitute a fake.
 */

import { BedrockRuntimeClient, InvokeModelCommand } from "@aws-sdk/client-bedrock-runtime";

export const DEFAULT_MODEL_ID = "amazon.titan-text-express-v1";

export interface GenerationOptions {
  /** Upper bound on reply length in tokens */
  maxOutputTokens: number;
  /** Sampling temperature, 0 = deterministic */
  temperature: number;
}

export interface TextGenerator {
  generate(prompt: string, options: GenerationOptions): Promise<string>;
}

export class ModelInvocationError extends Error {
  readonly modelId: string;

  constructor(message: string, modelId: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ModelInvocationError";
    this.modelId = modelId;
  }
}

export interface BedrockGeneratorOptions {
  /** Abort a model call after this many milliseconds */
  timeoutMs?: number;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Pull `results[0].outputText` out of a Titan response body
 */
export function readOutputText(body: unknown): string | null {
  if (!isObject(body) || !Array.isArray(body.results)) return null;
  const first: unknown = body.results[0];
  if (!isObject(first) || typeof first.outputText !== "string") return null;
  return first.outputText;
}

/**
 * Bedrock-backed TextGenerator for Titan Text models
 */
export function createBedrockTextGenerator(
  client: BedrockRuntimeClient,
  modelId: string,
  options: BedrockGeneratorOptions = {}
): TextGenerator {
  return {
    async generate(prompt, { maxOutputTokens, temperature }) {
      const response = await client.send(
        new InvokeModelCommand({
          modelId,
          contentType: "application/json",
          accept: "application/json",
          body: JSON.stringify({
            inputText: prompt,
            textGenerationConfig: {
              maxTokenCount: maxOutputTokens,
              temperature,
            },
          }),
        }),
        options.timeoutMs ? { abortSignal: AbortSignal.timeout(options.timeoutMs) } : {}
      );

      let body: unknown;
      try {
        body = JSON.parse(new TextDecoder().decode(response.body));
      } catch (error) {
        throw new ModelInvocationError("Model response body is not JSON", modelId, { cause: error });
      }

      const outputText = readOutputText(body);
      if (outputText === null) {
        throw new ModelInvocationError("Model response has no results[0].outputText", modelId);
      }
      return outputText;
    },
  };
}
