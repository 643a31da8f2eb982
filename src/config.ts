import {
  API_KEY_ENV,
  DEFAULT_BASE_URLS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_PROVIDER,
  DEFAULT_RETRY_BASE_MS,
  DEFAULT_TIMEOUT_MS,
  MODEL_TIERS,
  TIER_MODELS,
  type ModelTier,
} from "./constants";
import { ConfigurationError } from "./errors";
import { isSupportedProvider, supportedProviders } from "./model-factory";
import type { ModelConfig, ParsedArgs, ReportFormat, ScanConfig } from "./types";

export const USAGE =
  "Usage: npd-scan <file-or-directory> [--output-dir <dir>] [--format json|markdown|html|all] " +
  "[--max-retries <n>] [--timeout <ms>] [--debug]";

const ALL_FORMATS: ReportFormat[] = ["json", "markdown", "html"];

const VALUE_FLAGS = {
  "--output-dir": "outputDir",
  "--format": "format",
  "--max-retries": "maxRetries",
  "--timeout": "timeout",
} as const;

type ValueFlag = keyof typeof VALUE_FLAGS;

function isValueFlag(arg: string): arg is ValueFlag {
  return arg in VALUE_FLAGS;
}

/**
 * Parses command-line arguments (without the node and script entries).
 * @throws ConfigurationError on a missing target, unknown flag or missing value.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const parsed: Omit<ParsedArgs, "target"> = { debug: false };
  let target = "";

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--debug") {
      parsed.debug = true;
    } else if (isValueFlag(arg)) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new ConfigurationError(`Missing value for ${arg}\n${USAGE}`);
      }
      parsed[VALUE_FLAGS[arg]] = value;
      i++;
    } else if (arg.startsWith("--")) {
      throw new ConfigurationError(`Unknown option: ${arg}\n${USAGE}`);
    } else if (!target) {
      target = arg;
    } else {
      throw new ConfigurationError(`Unexpected argument: ${arg}\n${USAGE}`);
    }
  }

  if (!target) {
    throw new ConfigurationError(`Missing scan target\n${USAGE}`);
  }

  return { target, ...parsed };
}

function isModelTier(value: string): value is ModelTier {
  return MODEL_TIERS.some((tier) => tier === value);
}

function resolveModelName(provider: string, env: NodeJS.ProcessEnv): string {
  const explicit = env.MODEL_NAME?.trim();
  if (explicit) {
    return explicit;
  }

  const tier = (env.MODEL_TIER || "best").trim().toLowerCase();
  if (!isModelTier(tier)) {
    throw new ConfigurationError(
      `Invalid MODEL_TIER: ${tier}. Expected one of ${MODEL_TIERS.join(", ")}`,
    );
  }

  const tiers = TIER_MODELS[provider];
  if (!tiers) {
    throw new ConfigurationError(`MODEL_NAME is required for provider ${provider}`);
  }
  return tiers[tier];
}

function resolveBaseURL(provider: string, env: NodeJS.ProcessEnv): string | undefined {
  switch (provider) {
    case "dashscope":
      return env.DASHSCOPE_BASE_URL || DEFAULT_BASE_URLS.dashscope;
    case "ollama":
      return env.OLLAMA_BASE_URL || DEFAULT_BASE_URLS.ollama;
    case "openai-compatible":
      if (!env.OPENAI_COMPATIBLE_BASE_URL) {
        throw new ConfigurationError(
          "OPENAI_COMPATIBLE_BASE_URL is required for openai-compatible provider",
        );
      }
      return env.OPENAI_COMPATIBLE_BASE_URL;
    default:
      return undefined;
  }
}

/**
 * Resolves provider, model and credential from the environment.
 * @throws ConfigurationError when the provider is unknown or its key is missing.
 */
export function getModelConfig(env: NodeJS.ProcessEnv = process.env): ModelConfig {
  let provider = (env.MODEL_PROVIDER || DEFAULT_PROVIDER).trim().toLowerCase();
  if (provider === "google") {
    provider = "gemini";
  }

  if (!isSupportedProvider(provider)) {
    throw new ConfigurationError(
      `Unsupported MODEL_PROVIDER: ${provider}. Supported providers: ${supportedProviders().join(", ")}`,
    );
  }

  const modelName = resolveModelName(provider, env);

  // Providers without an entry (ollama) run without a key
  const keyEnv = API_KEY_ENV[provider];
  const apiKey = keyEnv ? env[keyEnv]?.trim() : env.OLLAMA_API_KEY?.trim();
  if (keyEnv && !apiKey) {
    throw new ConfigurationError(`${keyEnv} is required when using ${provider} provider`);
  }

  const baseURL = resolveBaseURL(provider, env);

  return {
    provider,
    modelName,
    apiKey: apiKey ?? "",
    ...(baseURL ? { baseURL } : {}),
  };
}

function parseFormats(value: string | undefined): ReportFormat[] {
  const format = (value ?? "all").trim().toLowerCase();
  if (format === "all") {
    return [...ALL_FORMATS];
  }
  const match = ALL_FORMATS.find((candidate) => candidate === format);
  if (!match) {
    throw new ConfigurationError(
      `Invalid --format: ${value}. Expected json, markdown, html or all`,
    );
  }
  return [match];
}

function parseInteger(value: string | undefined, name: string, fallback: number, min: number): number {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ConfigurationError(`Invalid ${name}: ${value}. Expected an integer >= ${min}`);
  }
  return parsed;
}

/**
 * Builds the scan configuration from arguments, falling back to the
 * environment and then to defaults.
 */
export function getScanConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): ScanConfig {
  const args = parseArgs(argv);
  const debugEnv = env.DEBUG?.trim().toLowerCase();

  return {
    target: args.target,
    outputDir: args.outputDir ?? DEFAULT_OUTPUT_DIR,
    formats: parseFormats(args.format),
    maxRetries: parseInteger(
      args.maxRetries ?? env.NPD_MAX_RETRIES,
      "max retries",
      DEFAULT_MAX_RETRIES,
      1,
    ),
    timeoutMs: parseInteger(args.timeout ?? env.NPD_TIMEOUT_MS, "timeout", DEFAULT_TIMEOUT_MS, 1),
    retryBaseMs: parseInteger(env.NPD_RETRY_BASE_MS, "NPD_RETRY_BASE_MS", DEFAULT_RETRY_BASE_MS, 0),
    debug: args.debug || debugEnv === "true" || debugEnv === "1",
  };
}
