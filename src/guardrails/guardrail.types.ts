// src/guardrails/guardrail.types.ts
import type { SourceReference } from '../context/context.types';
import type { AccessLevel } from '../shared/types';

export const RISK_LEVELS = ['low', 'medium', 'high', 'critical'] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];

export function maxRisk(a: RiskLevel, b: RiskLevel): RiskLevel {
  return RISK_LEVELS.indexOf(a) >= RISK_LEVELS.indexOf(b) ? a : b;
}

/** Each score in [0, 1]. */
export interface QualityMetrics {
  relevance: number;
  completeness: number;
  accuracy: number;
  citationQuality: number;
  legalAccuracy: number;
  overall: number;
}

export interface HallucinationReport {
  /** clamped to [0, 1] */
  score: number;
  isHighRisk: boolean;
  indicators: string[];
}

export interface GuardrailVerdict {
  allowed: boolean;
  riskLevel: RiskLevel;
  confidenceThreshold: number;
  accessLevelRequired: AccessLevel | null;
  warnings: string[];
  errors: string[];
  riskFactors: string[];
  safeResponse?: string;
  /** response checks only */
  quality?: QualityMetrics;
  hallucination?: HallucinationReport;
}

export interface ResponseCheckInput {
  query: string;
  answer: string;
  sources: readonly SourceReference[];
  /** passage text the answer was generated from */
  contextTexts?: readonly string[];
  confidence: number;
  accessLevel: AccessLevel;
}
