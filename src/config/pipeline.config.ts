// src/config/pipeline.config.ts
import type { SourceType } from '../context/context.types';
import { AccessLevel, isAccessLevel } from '../shared/types';

export const PIPELINE_CONFIG = 'PIPELINE_CONFIG';

export type TokenizerMode = 'estimate' | 'tiktoken';

export interface PackingLimits {
  maxTokens: number;
  maxChunks: number;
  minChunkTokens: number;
  maxChunkTokens: number;
}

export interface ResolverConfig {
  followUpOverlapThreshold: number;
  summaryTurns: number;
  summaryMaxWords: number;
  rewriteMaxChars: number;
  historyWindow: number;
}

export interface GuardrailThresholds {
  minConfidence: number;
  highConfidence: number;
  minOverallQuality: number;
  maxHallucination: number;
}

export interface PipelineConfig {
  packing: PackingLimits;
  priorities: Record<SourceType, number>;
  tokenizer: TokenizerMode;
  resolver: ResolverConfig;
  guardrails: GuardrailThresholds;
  retrieval: { topK: number; timeoutMs: number };
  generation: { timeoutMs: number };
  caseLockCache: { maxEntries: number; ttlMs: number };
  /** level applied to every request; callers cannot choose their own */
  defaultAccessLevel: AccessLevel;
}

export const DEFAULT_PRIORITIES: Readonly<Record<SourceType, number>> = {
  statute: 10,
  constitutional_article: 9,
  case_law: 8,
  judgment: 7,
  order: 6,
  legal_principle: 5,
  procedural_guidance: 4,
  case_metadata: 3,
  document_text: 2,
  general: 1,
};

type Env = Record<string, string | undefined>;

function num(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid numeric value for ${key}: "${raw}"`);
  }
  return value;
}

function accessLevel(env: Env, key: string, fallback: AccessLevel): AccessLevel {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  if (!isAccessLevel(raw)) {
    throw new Error(`Invalid access level for ${key}: "${raw}"`);
  }
  return raw;
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (value && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Builds the immutable pipeline configuration. Unset variables fall back to
 * the defaults; malformed numbers fail fast at startup.
 */
export function loadPipelineConfig(
  env: Env = process.env,
): Readonly<PipelineConfig> {
  const tokenizer: TokenizerMode =
    env.TOKENIZER === 'tiktoken' ? 'tiktoken' : 'estimate';

  const config: PipelineConfig = {
    packing: {
      maxTokens: num(env, 'CONTEXT_MAX_TOKENS', 2000),
      maxChunks: num(env, 'CONTEXT_MAX_CHUNKS', 12),
      minChunkTokens: num(env, 'CONTEXT_MIN_CHUNK_TOKENS', 10),
      maxChunkTokens: num(env, 'CONTEXT_MAX_CHUNK_TOKENS', 400),
    },
    priorities: { ...DEFAULT_PRIORITIES },
    tokenizer,
    resolver: {
      followUpOverlapThreshold: num(env, 'FOLLOW_UP_OVERLAP_THRESHOLD', 0.25),
      summaryTurns: num(env, 'SUMMARY_TURNS', 5),
      summaryMaxWords: num(env, 'SUMMARY_MAX_WORDS', 150),
      rewriteMaxChars: num(env, 'REWRITE_MAX_CHARS', 350),
      historyWindow: num(env, 'HISTORY_WINDOW', 10),
    },
    guardrails: {
      minConfidence: num(env, 'GUARDRAIL_MIN_CONFIDENCE', 0.3),
      highConfidence: num(env, 'GUARDRAIL_HIGH_CONFIDENCE', 0.8),
      minOverallQuality: num(env, 'GUARDRAIL_MIN_OVERALL_QUALITY', 0.5),
      maxHallucination: num(env, 'GUARDRAIL_MAX_HALLUCINATION', 0.7),
    },
    retrieval: {
      topK: num(env, 'RETRIEVAL_TOP_K', 10),
      timeoutMs: num(env, 'RETRIEVER_TIMEOUT_MS', 15_000),
    },
    generation: {
      timeoutMs: num(env, 'GENERATOR_TIMEOUT_MS', 60_000),
    },
    caseLockCache: {
      maxEntries: num(env, 'CASE_LOCK_CACHE_MAX', 1000),
      ttlMs: num(env, 'CASE_LOCK_CACHE_TTL_MS', 30 * 60 * 1000),
    },
    defaultAccessLevel: accessLevel(env, 'DEFAULT_ACCESS_LEVEL', 'public'),
  };

  return deepFreeze(config);
}
