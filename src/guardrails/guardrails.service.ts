// src/guardrails/guardrails.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';

import { PIPELINE_CONFIG, PipelineConfig } from '../config/pipeline.config';
import { LEGAL_DISCLAIMER } from '../shared/disclaimer';
import { ACCESS_LEVELS, AccessLevel } from '../shared/types';
import { GUARDRAIL_LEXICON } from './guardrail-lexicon';
import {
  GuardrailVerdict,
  maxRisk,
  ResponseCheckInput,
  RiskLevel,
} from './guardrail.types';
import { detectHallucination } from './hallucination-detector';
import { scoreQuality } from './quality-scorer';

const MAX_QUERY_CHARS = 1000;
const MIN_QUERY_CHARS = 10;
// below this the answer is flagged and the risk raised to at least medium
const QUALITY_WARNING_LEVEL = 0.6;
const CRITICAL_CONFIDENCE = 0.95;

function hasAccess(actual: AccessLevel, required: AccessLevel): boolean {
  return ACCESS_LEVELS.indexOf(actual) >= ACCESS_LEVELS.indexOf(required);
}

@Injectable()
export class GuardrailsService {
  private readonly logger = new Logger(GuardrailsService.name);
  private readonly lexicon = GUARDRAIL_LEXICON;

  constructor(@Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig) {}

  confidenceThreshold(risk: RiskLevel): number {
    const { minConfidence, highConfidence } = this.config.guardrails;
    switch (risk) {
      case 'low':
        return minConfidence;
      case 'medium':
        return (minConfidence + highConfidence) / 2;
      case 'high':
        return highConfidence;
      case 'critical':
        return CRITICAL_CONFIDENCE;
    }
  }

  /** Runs before retrieval. Errors always deny; warnings never do. */
  checkQuery(query: string, accessLevel: AccessLevel = 'public'): GuardrailVerdict {
    const warnings: string[] = [];
    const errors: string[] = [];
    const riskFactors: string[] = [];
    let riskLevel: RiskLevel = 'low';
    let accessLevelRequired: AccessLevel | null = null;

    for (const { term, pattern } of this.lexicon.highRiskTopics) {
      if (pattern.test(query)) {
        riskLevel = maxRisk(riskLevel, 'high');
        accessLevelRequired = 'lawyer';
        warnings.push(`Query contains high-risk topic: ${term}`);
        riskFactors.push(`high_risk_topic_${term}`);
      }
    }

    if (this.lexicon.piiPatterns.some((p) => p.test(query))) {
      riskLevel = maxRisk(riskLevel, 'medium');
      warnings.push('Query may contain personal information');
      riskFactors.push('potential_pii');
    }

    if (this.lexicon.inappropriatePatterns.some(({ pattern }) => pattern.test(query))) {
      riskLevel = maxRisk(riskLevel, 'high');
      errors.push('Query contains inappropriate content');
      riskFactors.push('inappropriate_content');
    }

    if (query.length > MAX_QUERY_CHARS) {
      warnings.push('Query is unusually long');
    } else if (query.length < MIN_QUERY_CHARS) {
      warnings.push('Query is very short and may be unclear');
    }

    if (this.lexicon.legalAdviceRequestPhrases.some(({ pattern }) => pattern.test(query))) {
      warnings.push('Query appears to request legal advice');
    }

    if (accessLevelRequired && !hasAccess(accessLevel, accessLevelRequired)) {
      errors.push(`High-risk query requires ${accessLevelRequired} access level`);
    }

    if (errors.length) {
      this.logger.debug(`Query denied (${riskLevel}): ${errors.join('; ')}`);
    }

    return {
      allowed: errors.length === 0,
      riskLevel,
      confidenceThreshold: this.confidenceThreshold(riskLevel),
      accessLevelRequired,
      warnings,
      errors,
      riskFactors,
    };
  }

  /**
   * Runs on the fully assembled answer. A denied answer carries the reasons
   * in `errors` and a safe replacement text.
   */
  checkResponse(input: ResponseCheckInput): GuardrailVerdict {
    const queryVerdict = this.checkQuery(input.query, input.accessLevel);
    if (!queryVerdict.allowed) return queryVerdict;

    const { minOverallQuality, maxHallucination } = this.config.guardrails;
    const quality = scoreQuality(input.answer, input.sources, this.lexicon);
    const hallucination = detectHallucination(
      input.answer,
      input.sources,
      this.lexicon,
      input.contextTexts,
    );

    const warnings = [...queryVerdict.warnings];
    const errors: string[] = [];
    const threshold = queryVerdict.confidenceThreshold;

    if (input.confidence < threshold) {
      errors.push(
        `Confidence score ${input.confidence.toFixed(2)} below required threshold ${threshold.toFixed(2)}`,
      );
    }

    if (quality.overall < QUALITY_WARNING_LEVEL) {
      warnings.push(
        `Response quality ${quality.overall.toFixed(2)} below ${QUALITY_WARNING_LEVEL.toFixed(2)}`,
      );
    }
    if (quality.overall < minOverallQuality) {
      errors.push('Response quality too low');
    }

    if (hallucination.isHighRisk) {
      warnings.push(...hallucination.indicators);
    }
    if (hallucination.score > maxHallucination) {
      errors.push('High risk of hallucination detected');
    }

    let riskLevel = queryVerdict.riskLevel;
    if (hallucination.isHighRisk) {
      riskLevel = maxRisk(riskLevel, 'high');
    } else if (quality.overall < QUALITY_WARNING_LEVEL) {
      riskLevel = maxRisk(riskLevel, 'medium');
    }

    const allowed = errors.length === 0;
    if (!allowed) {
      this.logger.debug(`Response denied (${riskLevel}): ${errors.join('; ')}`);
    }

    return {
      allowed,
      riskLevel,
      confidenceThreshold: threshold,
      accessLevelRequired: queryVerdict.accessLevelRequired,
      warnings,
      errors,
      riskFactors: queryVerdict.riskFactors,
      safeResponse: allowed ? undefined : this.safeResponse(input.sources.length),
      quality,
      hallucination,
    };
  }

  safeResponse(sourceCount: number): string {
    const body =
      sourceCount > 0
        ? `I understand you are asking about a legal matter. I found ${sourceCount} relevant legal ` +
          'document(s) that may help your research, but I cannot give a reliable answer to this ' +
          'question. A qualified legal professional can advise you on your situation.'
        : 'I understand you are asking about a legal matter. I could not find specific information ' +
          'about your question in the available legal sources. A qualified legal professional can ' +
          'advise you on your situation.';
    return `${body}\n\n${LEGAL_DISCLAIMER}`;
  }
}
