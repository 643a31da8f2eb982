/**
 * Scanner identifiers and constants
 */
export const TOOL_NAME = "npd-scan" as const;
export const TOOL_VERSION = "0.1.0" as const;

export const SOURCE_EXTENSIONS: readonly string[] = [".py"];

/**
 * Per-directory ignore file, read from the root of a scanned directory.
 */
export const IGNORE_FILE = ".npdignore";

/**
 * Default ignore patterns applied when a directory is expanded.
 * Users can add their own in a .npdignore file.
 */
export const DEFAULT_IGNORE_PATTERNS = [
  // VCS and tooling
  ".git/",
  ".hg/",
  ".idea/",
  ".vscode/",

  // Python caches and environments
  "__pycache__/",
  "*.pyc",
  ".pytest_cache/",
  ".mypy_cache/",
  ".tox/",
  ".nox/",
  "venv/",
  ".venv/",
  "env/",
  "virtualenv/",
  "site-packages/",
  "*.egg-info/",

  // Build outputs and dependencies
  "build/",
  "dist/",
  "node_modules/",
];

export const DEFAULT_PROVIDER = "dashscope";
export const DEFAULT_OUTPUT_DIR = "npd-report";
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_TIMEOUT_MS = 60_000;
export const DEFAULT_RETRY_BASE_MS = 1000;

export type ModelTier = "fast" | "balanced" | "best";

export const MODEL_TIERS: readonly ModelTier[] = ["fast", "balanced", "best"];

/**
 * Model names per provider and tier. Trades cost and latency against
 * judgment accuracy; MODEL_NAME overrides the lookup.
 */
export const TIER_MODELS: Record<string, Record<ModelTier, string>> = {
  dashscope: {
    fast: "qwen-turbo",
    balanced: "qwen-plus",
    best: "qwen-max",
  },
  openai: {
    fast: "gpt-4o-mini",
    balanced: "gpt-4.1-mini",
    best: "gpt-4.1",
  },
  anthropic: {
    fast: "claude-3-5-haiku-latest",
    balanced: "claude-3-7-sonnet-latest",
    best: "claude-sonnet-4-0",
  },
  gemini: {
    fast: "gemini-2.0-flash",
    balanced: "gemini-2.5-flash",
    best: "gemini-2.5-pro",
  },
};

export const API_KEY_ENV: Record<string, string> = {
  dashscope: "DASHSCOPE_API_KEY",
  openai: "OPENAI_API_KEY",
  "openai-compatible": "OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
  gemini: "GEMINI_API_KEY",
};

export const DEFAULT_BASE_URLS: Record<string, string> = {
  dashscope: "https://dashscope.aliyuncs.com/compatible-mode/v1",
  ollama: "http://localhost:11434/v1",
};
