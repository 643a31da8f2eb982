import { generateText, type LanguageModel } from "ai";
import { createModel } from "./model-factory";
import type { ModelConfig } from "./types";

export interface JudgmentRequest {
  system: string;
  prompt: string;
}

/**
 * The external judgment capability: a prompt in, a text completion out.
 * Anything that throws here is treated as a transport failure.
 */
export interface JudgmentClient {
  /** Model identifier for logging/reporting */
  readonly name: string;
  complete(request: JudgmentRequest): Promise<string>;
}

/**
 * Judgment client backed by the AI SDK.
 * Retries are disabled at the SDK level; the oracle owns the retry budget.
 */
export class AiSdkJudgmentClient implements JudgmentClient {
  constructor(
    private readonly model: LanguageModel,
    readonly name: string,
    private readonly timeoutMs: number,
  ) {}

  async complete(request: JudgmentRequest): Promise<string> {
    const { text } = await generateText({
      model: this.model,
      system: request.system,
      prompt: request.prompt,
      temperature: 0,
      maxRetries: 0,
      abortSignal: AbortSignal.timeout(this.timeoutMs),
    });
    return text;
  }
}

export function createJudgmentClient(config: ModelConfig, timeoutMs: number): JudgmentClient {
  const model = createModel(config);
  return new AiSdkJudgmentClient(model, `${config.provider}/${config.modelName}`, timeoutMs);
}
