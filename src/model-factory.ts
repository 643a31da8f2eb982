import { createAnthropic } from "@ai-sdk/anthropic";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { createOpenAI } from "@ai-sdk/openai";
import type { LanguageModel } from "ai";
import { ConfigurationError } from "./errors";
import type { ModelConfig } from "./types";

const modelMap = new Map<string, LanguageModel>();

/**
 * Provider configuration mapping.
 * Maps provider names to a factory that turns a model name into a model.
 */
interface ProviderConfig {
  createFn: (options: { apiKey: string; baseURL?: string }) => (modelName: string) => LanguageModel;
  packageName: string;
}

const PROVIDER_CONFIGS: Record<string, ProviderConfig> = {
  openai: {
    createFn: (options) => {
      const provider = createOpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });
      return (modelName) => provider(modelName);
    },
    packageName: "@ai-sdk/openai",
  },
  anthropic: {
    createFn: (options) => {
      const provider = createAnthropic({ apiKey: options.apiKey });
      return (modelName) => provider(modelName);
    },
    packageName: "@ai-sdk/anthropic",
  },
  gemini: {
    createFn: (options) => {
      const provider = createGoogleGenerativeAI({ apiKey: options.apiKey });
      return (modelName) => provider(modelName);
    },
    packageName: "@ai-sdk/google",
  },
  // Qwen models through DashScope's OpenAI-compatible endpoint
  dashscope: {
    createFn: (options) => {
      const provider = createOpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseURL,
        compatibility: "compatible",
      });
      return (modelName) => provider(modelName);
    },
    packageName: "@ai-sdk/openai",
  },
  "openai-compatible": {
    createFn: (options) => {
      if (!options.baseURL) {
        throw new ConfigurationError(
          "OPENAI_COMPATIBLE_BASE_URL environment variable is required for openai-compatible provider",
        );
      }
      const provider = createOpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseURL,
        compatibility: "compatible",
      });
      return (modelName) => provider(modelName);
    },
    packageName: "@ai-sdk/openai",
  },
  ollama: {
    createFn: (options) => {
      const provider = createOpenAI({
        apiKey: options.apiKey || "ollama", // Ollama doesn't require real API keys
        baseURL: options.baseURL,
        compatibility: "compatible",
      });
      return (modelName) => provider(modelName);
    },
    packageName: "@ai-sdk/openai",
  },
};

export function isSupportedProvider(provider: string): boolean {
  return provider.toLowerCase() in PROVIDER_CONFIGS;
}

export function supportedProviders(): string[] {
  return Object.keys(PROVIDER_CONFIGS);
}

/**
 * Creates the language model for a configuration.
 * Caches model instances to avoid recreating them.
 */
export function createModel(config: ModelConfig): LanguageModel {
  const key = `${config.provider}-${config.modelName}-${config.baseURL || ""}`;
  const cached = modelMap.get(key);
  if (cached) {
    return cached;
  }

  const providerConfig = PROVIDER_CONFIGS[config.provider.toLowerCase()];

  if (!providerConfig) {
    throw new ConfigurationError(
      `Unsupported MODEL_PROVIDER: ${config.provider}. ` +
        `Supported providers: ${supportedProviders().join(", ")}`,
    );
  }

  const factory = providerConfig.createFn({ apiKey: config.apiKey, baseURL: config.baseURL });
  const model = factory(config.modelName);

  modelMap.set(key, model);
  return model;
}

export function clearModelCache(): void {
  modelMap.clear();
}
