// src/conversation/case-resolver.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';

import { PIPELINE_CONFIG, PipelineConfig } from '../config/pipeline.config';
import { RETRIEVER, Retriever } from '../retrieval/retriever.types';
import { errorMessage, withTimeout } from '../shared/errors';
import { Ok, Result, safeAsync } from '../shared/result';
import { buildActiveCase, caseLabel } from './active-case';
import { CaseReference, extractCaseReference } from './case-reference';
import { summarizeConversation } from './conversation-summarizer';
import {
  ActiveCaseContext,
  CaseResolution,
  CaseResolutionInput,
  ConversationTurnRecord,
  FollowUpIndicator,
} from './conversation.types';
import { detectFollowUpIndicators, hasPronounReference } from './follow-up-detector';
import { normalizeQuery, rewriteQuery } from './query-rewriter';
import { classifyTopic } from './topic-classifier';

const PROCEDURAL_RE =
  /\bhow (?:do|does|can|should|would|to)\b|\bwhat (?:is|are) the (?:procedure|process|steps)\b|\b(?:procedure|process) (?:for|to|of)\b|\bsteps? (?:to|for)\b/i;
const OPINION_RE =
  /\bwhat do you think\b|\bdo you (?:think|believe|feel)\b|\b(?:in )?your (?:opinion|view)\b/i;

const STOPWORDS = new Set([
  'the', 'and', 'for', 'with', 'this', 'that', 'what', 'which', 'who', 'whom', 'was',
  'were', 'are', 'has', 'have', 'had', 'does', 'did', 'can', 'could', 'should', 'would',
  'will', 'about', 'from', 'into', 'there', 'their', 'they', 'them', 'its', 'case',
  'please', 'tell', 'more', 'any', 'also', 'than', 'then', 'how', 'why', 'when', 'where',
]);

function contentTokens(text: string): Set<string> {
  return new Set(
    (text.toLowerCase().match(/[a-z0-9]+/g) ?? []).filter(
      (t) => t.length >= 3 && !STOPWORDS.has(t),
    ),
  );
}

/** Share of the current query's content words that also occur in the previous one. */
export function tokenOverlap(current: string, previous: string): number {
  const a = contentTokens(current);
  if (!a.size) return 0;
  const b = contentTokens(previous);
  let shared = 0;
  for (const token of a) if (b.has(token)) shared += 1;
  return shared / a.size;
}

export function isProceduralQuery(query: string): boolean {
  return PROCEDURAL_RE.test(query);
}

export function isGeneralOpinionQuery(query: string): boolean {
  return OPINION_RE.test(query);
}

interface Common {
  shortSummary: string;
  isProcedural: boolean;
  isGeneralOpinion: boolean;
  followUpIndicators: FollowUpIndicator[];
}

@Injectable()
export class CaseResolverService {
  private readonly logger = new Logger(CaseResolverService.name);

  constructor(
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
    @Inject(RETRIEVER) private readonly retriever: Retriever,
  ) {}

  /**
   * Decides the case lock for this turn and produces the standalone query.
   * Never throws: a failed exact lookup counts as an unresolved reference.
   */
  async resolve(input: CaseResolutionInput): Promise<CaseResolution> {
    const { resolver } = this.config;
    const query = normalizeQuery(input.query);
    const activeCase = input.activeCase;
    const previous = input.recentTurns[input.recentTurns.length - 1] ?? null;

    const common: Common = {
      shortSummary: summarizeConversation(input.recentTurns, activeCase, {
        maxTurns: resolver.summaryTurns,
        maxWords: resolver.summaryMaxWords,
      }),
      isProcedural: isProceduralQuery(query),
      isGeneralOpinion: isGeneralOpinionQuery(query),
      followUpIndicators: detectFollowUpIndicators(query),
    };

    // procedural and opinion questions never inherit a lock
    if (common.isProcedural || common.isGeneralOpinion) {
      return {
        ...common,
        lockState: { kind: 'unlocked' },
        standaloneQuery: normalizeQuery(query, resolver.rewriteMaxChars),
        topic: null,
        explicitReference: null,
        resolvedCase: null,
        activeCaseAction: 'keep',
        reason: common.isProcedural ? 'procedural_override' : 'opinion_override',
      };
    }

    const reference = extractCaseReference(query);
    if (reference) {
      return this.resolveExplicit(query, reference, previous, common);
    }

    const topic = classifyTopic(query, activeCase?.caseNumber ?? null);

    if (topic === 'new') {
      return {
        ...common,
        lockState: { kind: 'unlocked' },
        standaloneQuery: normalizeQuery(query, resolver.rewriteMaxChars),
        topic,
        explicitReference: null,
        resolvedCase: null,
        activeCaseAction: activeCase ? 'clear' : 'keep',
        reason: 'topic_shift',
      };
    }

    if (activeCase) {
      return {
        ...common,
        lockState: { kind: 'locked', caseId: activeCase.caseId },
        standaloneQuery: this.rewrite(query, caseLabel(activeCase), common.shortSummary, previous),
        topic,
        explicitReference: null,
        resolvedCase: activeCase,
        activeCaseAction: 'keep',
        reason: 'same_topic',
      };
    }

    const inherited = this.previousCase(query, previous);
    if (inherited) {
      return {
        ...common,
        lockState: { kind: 'locked', caseId: inherited.caseId },
        standaloneQuery: this.rewrite(query, caseLabel(inherited), common.shortSummary, previous),
        topic,
        explicitReference: null,
        resolvedCase: inherited,
        activeCaseAction: 'set',
        reason: 'follow_up_of_previous_case',
      };
    }

    return {
      ...common,
      lockState: { kind: 'unlocked' },
      standaloneQuery: this.rewrite(query, null, common.shortSummary, previous),
      topic,
      explicitReference: null,
      resolvedCase: null,
      activeCaseAction: 'keep',
      reason: 'no_case_context',
    };
  }

  private async resolveExplicit(
    query: string,
    reference: CaseReference,
    previous: ConversationTurnRecord | null,
    common: Common,
  ): Promise<CaseResolution> {
    const lookup = await this.lookupCase(reference);

    if (lookup.ok && lookup.value) {
      const resolvedCase = lookup.value;
      return {
        ...common,
        lockState: { kind: 'locked', caseId: resolvedCase.caseId },
        standaloneQuery: this.rewrite(query, caseLabel(resolvedCase), common.shortSummary, previous),
        topic: null,
        explicitReference: reference.value,
        resolvedCase,
        activeCaseAction: 'set',
        reason: 'explicit_reference_resolved',
      };
    }

    if (!lookup.ok) {
      this.logger.warn(`Exact case lookup failed for "${reference.value}": ${errorMessage(lookup.error)}`);
    }

    // an explicit but unknown reference must not keep an old lock
    return {
      ...common,
      lockState: { kind: 'unlocked' },
      standaloneQuery: this.rewrite(query, null, '', previous),
      topic: null,
      explicitReference: reference.value,
      resolvedCase: null,
      activeCaseAction: 'clear',
      reason: 'explicit_reference_unresolved',
    };
  }

  private async lookupCase(
    reference: CaseReference,
  ): Promise<Result<ActiveCaseContext | null, Error>> {
    const found = await safeAsync(() =>
      withTimeout(
        this.retriever.findExactCase(reference.value),
        this.config.retrieval.timeoutMs,
        'retriever.findExactCase',
      ),
    );
    if (!found.ok) return found;
    return Ok(found.value.length ? buildActiveCase(found.value, reference) : null);
  }

  /**
   * The previous turn's case, when that turn named a case explicitly and the
   * current query reads as its follow-up.
   */
  private previousCase(
    query: string,
    previous: ConversationTurnRecord | null,
  ): ActiveCaseContext | null {
    if (!previous?.resolvedCaseId) return null;

    const previousReference = extractCaseReference(previous.query);
    if (!previousReference) return null;

    const related =
      hasPronounReference(query) ||
      tokenOverlap(query, previous.query) >= this.config.resolver.followUpOverlapThreshold;
    if (!related) return null;

    return {
      caseId: previous.resolvedCaseId,
      caseNumber: previousReference.kind === 'number' ? previousReference.value : undefined,
      caseTitle: previousReference.kind === 'title' ? previousReference.value : undefined,
      advocatesPetitioner: [],
      advocatesRespondent: [],
      sources: previous.sources,
    };
  }

  private rewrite(
    query: string,
    caseReference: string | null,
    shortSummary: string,
    previous: ConversationTurnRecord | null,
  ): string {
    return rewriteQuery({
      query,
      caseReference,
      shortSummary,
      previousQuery: previous?.query ?? null,
      maxChars: this.config.resolver.rewriteMaxChars,
    });
  }
}
