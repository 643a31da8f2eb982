import { APICallError } from "ai";
import { setTimeout } from "node:timers/promises";
import type { JudgmentClient, JudgmentRequest } from "./ai-client";
import { debugLog, debugWarn } from "./debug";
import { DEFAULT_MAX_RETRIES, DEFAULT_RETRY_BASE_MS } from "./constants";
import { SchemaError, TransportError } from "./errors";
import { buildJudgmentRequest } from "./judgment-prompt";
import { parseJudgmentResponse, type ParsedJudgment } from "./response-parser";
import type {
  CandidatePair,
  Confidence,
  FailedVerdict,
  FunctionUnit,
  Severity,
  Verdict,
} from "./types";

export interface OracleOptions {
  /** Total judgment requests allowed per pair. */
  maxRetries?: number;
  /** Back-off base; the wait before attempt n+1 is base * 2^n. */
  retryBaseMs?: number;
  sleep?: (ms: number) => Promise<unknown>;
}

/**
 * Maps a confidence to a severity when the model did not give one.
 */
export function deriveSeverity(confidence: Confidence): Severity {
  if (typeof confidence === "number") {
    if (confidence >= 0.8) return "high";
    if (confidence >= 0.5) return "medium";
    return "low";
  }
  return confidence;
}

/**
 * Decides, through the external judgment capability, whether a candidate
 * pair is a reachable and unguarded null dereference.
 *
 * Always resolves to exactly one verdict: transport failures end in
 * `Error`, responses that never match the schema end in `Inconclusive`.
 * Verdicts are not repeatable across calls; nothing here caches them.
 */
export class PathFeasibilityOracle {
  private readonly maxRetries: number;
  private readonly retryBaseMs: number;
  private readonly sleep: (ms: number) => Promise<unknown>;

  constructor(
    private readonly client: JudgmentClient,
    options: OracleOptions = {},
  ) {
    this.maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.retryBaseMs = options.retryBaseMs ?? DEFAULT_RETRY_BASE_MS;
    this.sleep = options.sleep ?? ((ms: number) => setTimeout(ms));
  }

  get modelName(): string {
    return this.client.name;
  }

  async judge(pair: CandidatePair, unit: FunctionUnit): Promise<Verdict> {
    const request = buildJudgmentRequest(pair, unit);
    const label = `${unit.name}:${pair.variable}@${pair.source.line}->${pair.sink.line}`;

    let lastFailure: TransportError | SchemaError | null = null;
    let attempt = 0;
    while (attempt < this.maxRetries) {
      attempt++;
      try {
        const text = await this.send(request);
        const judgment = parseJudgmentResponse(text);
        debugLog(`[${label}] vulnerable=${judgment.vulnerable} after ${attempt} attempt(s)`);
        return toVerdict(pair, judgment, attempt);
      } catch (error: unknown) {
        if (!(error instanceof TransportError) && !(error instanceof SchemaError)) {
          throw error;
        }
        lastFailure = error;
        if (error instanceof TransportError && !error.retryable) {
          debugWarn(`[${label}] Non-retryable transport failure: ${error.message}`);
          break;
        }
        if (attempt < this.maxRetries) {
          const wait = this.retryBaseMs * Math.pow(2, attempt);
          debugWarn(`[${label}] Attempt ${attempt} failed (${error.message}). Retrying in ${wait}ms...`);
          if (wait > 0) {
            await this.sleep(wait);
          }
        }
      }
    }

    return toFailedVerdict(pair, lastFailure, attempt);
  }

  private async send(request: JudgmentRequest): Promise<string> {
    try {
      return await this.client.complete(request);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      const retryable = APICallError.isInstance(error) ? error.isRetryable : true;
      throw new TransportError(message, retryable, error);
    }
  }
}

function toVerdict(pair: CandidatePair, judgment: ParsedJudgment, attempts: number): Verdict {
  if (judgment.vulnerable) {
    const confidence = judgment.confidence ?? "medium";
    return {
      pair,
      attempts,
      status: "Confirmed",
      isVulnerable: true,
      confidence,
      severity: judgment.severity ?? deriveSeverity(confidence),
      triggeringCondition: judgment.condition,
      explanation: judgment.explanation,
    };
  }
  return {
    pair,
    attempts,
    status: "Rejected",
    isVulnerable: false,
    confidence: judgment.confidence,
    severity: null,
    triggeringCondition: judgment.condition,
    explanation: judgment.explanation,
  };
}

function toFailedVerdict(
  pair: CandidatePair,
  failure: TransportError | SchemaError | null,
  attempts: number,
): FailedVerdict {
  const status = failure instanceof SchemaError ? "Inconclusive" : "Error";
  const error = failure?.message ?? "No judgment attempt was made";
  return {
    pair,
    attempts,
    status,
    isVulnerable: false,
    confidence: null,
    severity: null,
    triggeringCondition: "",
    explanation: error,
    error,
  };
}
