// src/pipeline/pipeline-orchestrator.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';

import { GENERATOR, Generator, GenerationResult } from '../ai/generator.types';
import { PIPELINE_CONFIG, PipelineConfig } from '../config/pipeline.config';
import { ContextPackerService } from '../context/context-packer.service';
import {
  RawPassage,
  SourceReference,
  SourceType,
  toSourceReference,
} from '../context/context.types';
import { TOKEN_COUNTER, TokenCounter } from '../context/token-counter';
import { passageToSource } from '../conversation/active-case';
import { CaseResolverService } from '../conversation/case-resolver.service';
import { ConversationState, ConversationStoreService } from '../conversation/conversation-store.service';
import type { CaseResolution } from '../conversation/conversation.types';
import type { GuardrailVerdict } from '../guardrails/guardrail.types';
import { GuardrailsService } from '../guardrails/guardrails.service';
import { PromptTemplateService } from '../prompts/prompt-template.service';
import type { FormattedPrompt, PromptContext, PromptHistoryTurn } from '../prompts/prompt.types';
import { RETRIEVER, RetrievalFilters, Retriever } from '../retrieval/retriever.types';
import {
  errorMessage,
  errorStack,
  PipelineError,
  PipelineStatus,
  UpstreamTimeoutError,
  withTimeout,
} from '../shared/errors';
import { safeAsync } from '../shared/result';
import { LOGGER_SERVICE, LoggerService } from '../shared/types';
import { postProcessAnswer } from './answer-post-processor';
import { formatCitations } from './citation-formatter';
import type {
  AskRequest,
  GuardrailSummary,
  PipelineMetadata,
  PipelineResult,
  PipelineStreamEvent,
} from './pipeline.types';

export const PIPELINE_MESSAGES = {
  emptyQuestion: 'Please enter a question.',
  noResults:
    "I couldn't find relevant legal information to answer your question. Please try rephrasing it or consult a qualified legal professional.",
  contextError:
    'I could not retrieve the legal documents needed for this question. Please try again shortly.',
  generationError:
    'I encountered an error generating the answer. Please try again or consult a legal professional.',
  unexpectedError:
    'I encountered an unexpected error while processing your question. Please try again or consult a legal professional.',
  responseBlocked:
    'I cannot provide a response to this question. Please consult a qualified legal professional.',
  aborted: 'The request was cancelled before an answer was produced.',
} as const;

/** State of one request as it moves through the stages. */
interface Run {
  request: AskRequest;
  question: string;
  startedAt: number;
  sessionId: string;
  metadata: PipelineMetadata;
}

interface Prepared {
  state: ConversationState;
  resolution: CaseResolution;
  prompt: FormattedPrompt;
  sources: SourceReference[];
  /** passage text shown to the model, for the response guardrail */
  contextTexts: string[];
}

interface PackedPassages {
  context: PromptContext;
  sources: SourceReference[];
  contextTexts: string[];
}

type Preparation =
  | { kind: 'terminal'; result: PipelineResult }
  | { kind: 'ready'; prepared: Prepared };

interface Generated {
  text: string;
  confidence: number;
  tokensUsed: number;
}

interface Outcome {
  status: PipelineStatus;
  answer: string;
  confidence?: number;
  sources?: SourceReference[];
  reason?: string;
}

function summarizeVerdict(stage: GuardrailSummary['stage'], verdict: GuardrailVerdict): GuardrailSummary {
  return {
    stage,
    allowed: verdict.allowed,
    riskLevel: verdict.riskLevel,
    warnings: verdict.warnings,
    errors: verdict.errors,
    qualityOverall: verdict.quality?.overall,
    hallucinationScore: verdict.hallucination?.score,
  };
}

function toHistory(state: ConversationState): PromptHistoryTurn[] {
  return state.recentTurns.map((turn) => ({ query: turn.query, answer: turn.answer }));
}

/**
 * Runs one question through resolution, retrieval, packing, generation and
 * the guardrails. This is the only place where exceptions become user-facing
 * text: every entry point returns a well-formed result.
 */
@Injectable()
export class PipelineOrchestratorService {
  private readonly logger = new Logger(PipelineOrchestratorService.name);

  constructor(
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
    @Inject(RETRIEVER) private readonly retriever: Retriever,
    @Inject(GENERATOR) private readonly generator: Generator,
    @Inject(TOKEN_COUNTER) private readonly tokenCounter: TokenCounter,
    @Inject(LOGGER_SERVICE) private readonly appLogger: LoggerService,
    private readonly store: ConversationStoreService,
    private readonly resolver: CaseResolverService,
    private readonly guardrails: GuardrailsService,
    private readonly packer: ContextPackerService,
    private readonly prompts: PromptTemplateService,
  ) {}

  async answer(request: AskRequest): Promise<PipelineResult> {
    const run = this.startRun(request);
    try {
      const preparation = await this.prepare(run);
      if (preparation.kind === 'terminal') return preparation.result;

      const generated = await this.generate(run, preparation.prepared);
      return await this.complete(run, preparation.prepared, generated);
    } catch (e) {
      return this.failure(run, e);
    }
  }

  /**
   * Streams answer text as it is generated, then one final result. The
   * guardrails run once on the assembled text, so a streamed answer may still
   * end in a blocked result. An aborted exchange is not stored.
   */
  async *answerStream(request: AskRequest, signal?: AbortSignal): AsyncGenerator<PipelineStreamEvent> {
    const run = this.startRun(request);
    try {
      if (signal?.aborted) {
        yield { type: 'final', result: this.aborted(run) };
        return;
      }

      const preparation = await this.prepare(run);
      if (preparation.kind === 'terminal') {
        yield { type: 'final', result: preparation.result };
        return;
      }
      const { prepared } = preparation;

      const timeoutMs = this.config.generation.timeoutMs;
      const controller = new AbortController();
      const forwardAbort = () => controller.abort();
      signal?.addEventListener('abort', forwardAbort, { once: true });
      const deadline = { expired: false };
      const timer = setTimeout(() => {
        deadline.expired = true;
        controller.abort();
      }, timeoutMs);

      const started = Date.now();
      let generated: Generated | null = null;
      try {
        const stream = this.generator.generateStream(
          prepared.prompt.systemPrompt,
          prepared.prompt.userPrompt,
          controller.signal,
        );
        for await (const event of stream) {
          if (signal?.aborted) break;

          if (event.type === 'content') {
            yield { type: 'content', text: event.text };
          } else if (event.type === 'complete') {
            generated = { text: event.text, confidence: event.confidence, tokensUsed: event.tokensUsed };
            break;
          } else {
            const cause = deadline.expired
              ? new UpstreamTimeoutError('generator.generateStream', timeoutMs)
              : new Error(event.error);
            throw new PipelineError(
              'generation_error',
              PIPELINE_MESSAGES.generationError,
              cause.message,
              cause,
            );
          }
        }
      } finally {
        clearTimeout(timer);
        signal?.removeEventListener('abort', forwardAbort);
      }
      run.metadata.timings.generationMs = Date.now() - started;

      if (signal?.aborted) {
        yield { type: 'final', result: this.aborted(run) };
        return;
      }
      if (!generated || !generated.text.trim()) {
        throw new PipelineError(
          'generation_error',
          PIPELINE_MESSAGES.generationError,
          'stream ended without an answer',
        );
      }

      yield { type: 'final', result: await this.complete(run, prepared, generated) };
    } catch (e) {
      yield { type: 'final', result: this.failure(run, e) };
    }
  }

  private startRun(request: AskRequest): Run {
    return {
      request,
      question: (request.question ?? '').trim(),
      startedAt: Date.now(),
      sessionId: request.sessionId ?? '',
      metadata: { timings: { totalMs: 0 } },
    };
  }

  /** Everything up to the prompt. Early exits come back as terminal results. */
  private async prepare(run: Run): Promise<Preparation> {
    const { request, question, metadata } = run;
    if (!question) {
      const result = this.buildResult(run, {
        status: 'error',
        answer: PIPELINE_MESSAGES.emptyQuestion,
        reason: 'empty_question',
      });
      return { kind: 'terminal', result };
    }

    const state = await this.store.loadState(
      request.sessionId,
      request.userId,
      question,
      this.config.resolver.historyWindow,
    );
    run.sessionId = state.session.sessionId;
    metadata.degradedStore = state.degraded;

    const resolution = await this.resolver.resolve({
      query: question,
      activeCase: state.activeCase,
      recentTurns: state.recentTurns,
    });
    metadata.standaloneQuery = resolution.standaloneQuery;
    metadata.caseLock = resolution.lockState;
    metadata.resolutionReason = resolution.reason;
    metadata.followUpIndicators = resolution.followUpIndicators;

    const queryVerdict = this.guardrails.checkQuery(question, request.accessLevel);
    if (!queryVerdict.allowed) {
      metadata.guardrail = summarizeVerdict('query', queryVerdict);
      const result = await this.finish(run, resolution, {
        status: 'blocked',
        answer: this.guardrails.safeResponse(0),
        reason: 'query_blocked',
      });
      return { kind: 'terminal', result };
    }

    const retrievalStarted = Date.now();
    const passages = await this.retrieve(run, resolution, request.filters);
    metadata.timings.retrievalMs = Date.now() - retrievalStarted;
    metadata.retrievalResults = passages.length;

    if (!passages.length) {
      const result = await this.finish(run, resolution, {
        status: 'no_results',
        answer: PIPELINE_MESSAGES.noResults,
        reason: 'no_passages',
      });
      return { kind: 'terminal', result };
    }

    const packed = this.packContext(run, passages);
    if (!packed) {
      const result = await this.finish(run, resolution, {
        status: 'no_results',
        answer: PIPELINE_MESSAGES.noResults,
        reason: 'no_usable_passages',
      });
      return { kind: 'terminal', result };
    }
    metadata.contextChunks = packed.context.chunkCount;
    metadata.contextTokens = packed.context.tokenCount;

    const history = toHistory(state);
    const classification = this.prompts.classifyQuery(
      question,
      resolution.lockState.kind === 'locked',
    );
    const template = this.prompts.selectTemplate(classification.queryType, classification.domain, history);
    const prompt = this.prompts.formatPrompt(
      template,
      classification,
      resolution.standaloneQuery,
      packed.context,
      history,
    );
    metadata.queryType = classification.queryType;
    metadata.legalDomain = classification.domain;
    metadata.templateUsed = prompt.templateName;
    metadata.prompt = prompt.contextMetadata;

    return {
      kind: 'ready',
      prepared: {
        state,
        resolution,
        prompt,
        sources: packed.sources,
        contextTexts: packed.contextTexts,
      },
    };
  }

  /** Locked case first; a case with no stored passages falls back to search. */
  private async retrieve(
    run: Run,
    resolution: CaseResolution,
    filters?: RetrievalFilters,
  ): Promise<RawPassage[]> {
    const { topK, timeoutMs } = this.config.retrieval;
    try {
      if (resolution.lockState.kind === 'locked') {
        const byCase = await withTimeout(
          this.retriever.getByCaseId(resolution.lockState.caseId),
          timeoutMs,
          'retriever.getByCaseId',
        );
        if (byCase.length) {
          run.metadata.retrievedVia = 'case';
          return byCase;
        }
      }

      run.metadata.retrievedVia = 'search';
      return await withTimeout(
        this.retriever.search(resolution.standaloneQuery, topK, filters),
        timeoutMs,
        'retriever.search',
      );
    } catch (e) {
      throw new PipelineError('context_error', PIPELINE_MESSAGES.contextError, errorMessage(e), e);
    }
  }

  /**
   * Packed context and the sources it cites, or null when no passage is
   * usable. A packer failure degrades to the single best passage.
   */
  private packContext(
    run: Run,
    passages: readonly RawPassage[],
  ): PackedPassages | null {
    const packed = this.packer.packPassages(passages);

    if (packed.status === 'success') {
      if (!packed.chunkCount) return null;
      run.metadata.packing = packed.metadata;
      return {
        context: packed,
        sources: packed.chunks.map(toSourceReference),
        contextTexts: packed.chunks.map((chunk) => chunk.text),
      };
    }

    this.logger.warn(`Context packing failed (${packed.error ?? 'unknown error'}), using a single passage`);
    run.metadata.fallbackContext = true;
    return this.singlePassageContext(passages);
  }

  private singlePassageContext(
    passages: readonly RawPassage[],
  ): PackedPassages | null {
    const best = passages.reduce((a, b) => (b.score > a.score ? b : a));
    const text = this.tokenCounter.truncate(best.text.trim(), this.config.packing.maxChunkTokens);
    if (!text) return null;

    const source = passageToSource(best);
    const sourceDistribution: Partial<Record<SourceType, number>> = {};
    sourceDistribution[source.sourceType] = 1;

    return {
      context: {
        contextText: `[1] ${text}`,
        chunkCount: 1,
        tokenCount: this.tokenCounter.count(text),
        sourceDistribution,
      },
      sources: [source],
      contextTexts: [text],
    };
  }

  private async generate(run: Run, prepared: Prepared): Promise<Generated> {
    const started = Date.now();
    let result: GenerationResult;
    try {
      result = await withTimeout(
        this.generator.generate(prepared.prompt.systemPrompt, prepared.prompt.userPrompt),
        this.config.generation.timeoutMs,
        'generator.generate',
      );
    } catch (e) {
      throw new PipelineError('generation_error', PIPELINE_MESSAGES.generationError, errorMessage(e), e);
    } finally {
      run.metadata.timings.generationMs = Date.now() - started;
    }

    if (result.status !== 'success' || !result.text.trim()) {
      throw new PipelineError(
        'generation_error',
        PIPELINE_MESSAGES.generationError,
        result.error ?? 'empty answer',
      );
    }
    return { text: result.text, confidence: result.confidence, tokensUsed: result.tokensUsed };
  }

  /** Post-processing, the response guardrail and persistence. */
  private async complete(run: Run, prepared: Prepared, generated: Generated): Promise<PipelineResult> {
    run.metadata.tokensUsed = generated.tokensUsed;

    const processed = postProcessAnswer(generated.text);
    if (!processed.ok) {
      this.logger.warn(`Post-processing skipped: ${processed.error.message}`);
    }
    const answer = processed.ok ? processed.value : generated.text;

    const verdict = this.guardrails.checkResponse({
      query: run.question,
      answer,
      sources: prepared.sources,
      contextTexts: prepared.contextTexts,
      confidence: generated.confidence,
      accessLevel: run.request.accessLevel,
    });
    run.metadata.guardrail = summarizeVerdict('response', verdict);

    if (!verdict.allowed) {
      return this.finish(run, prepared.resolution, {
        status: 'blocked',
        answer: verdict.safeResponse ?? PIPELINE_MESSAGES.responseBlocked,
        reason: 'response_blocked',
      });
    }

    return this.finish(run, prepared.resolution, {
      status: 'success',
      answer,
      confidence: generated.confidence,
      sources: prepared.sources,
    });
  }

  /** Builds the result for a finished exchange and stores it. */
  private async finish(run: Run, resolution: CaseResolution, outcome: Outcome): Promise<PipelineResult> {
    const result = this.buildResult(run, outcome);
    await this.persist(run, resolution, outcome, result);
    return result;
  }

  private buildResult(run: Run, outcome: Outcome): PipelineResult {
    if (outcome.reason) run.metadata.reason = outcome.reason;
    run.metadata.timings.totalMs = Date.now() - run.startedAt;

    return {
      answer: outcome.answer,
      confidence: outcome.status === 'success' ? (outcome.confidence ?? 0) : 0,
      sources: formatCitations(outcome.sources ?? []),
      status: outcome.status,
      sessionId: run.sessionId,
      metadata: run.metadata,
    };
  }

  /** Store failures are logged and never change the answer. */
  private async persist(
    run: Run,
    resolution: CaseResolution,
    outcome: Outcome,
    result: PipelineResult,
  ): Promise<void> {
    const saved = await safeAsync(async () => {
      await this.store.recordTurn({
        sessionId: run.sessionId,
        query: run.question,
        standaloneQuery: resolution.standaloneQuery,
        answer: result.answer,
        status: result.status,
        confidence: result.confidence,
        sources: outcome.sources ?? [],
        resolvedCaseId: resolution.lockState.kind === 'locked' ? resolution.lockState.caseId : null,
      });

      if (resolution.activeCaseAction === 'set' && resolution.resolvedCase) {
        await this.store.setActiveCase(run.sessionId, resolution.resolvedCase);
      } else if (resolution.activeCaseAction === 'clear') {
        await this.store.clearActiveCase(run.sessionId);
      }
    });

    if (!saved.ok) {
      this.logger.warn(`Could not store turn for session ${run.sessionId}: ${saved.error.message}`);
    }
  }

  private aborted(run: Run): PipelineResult {
    this.logger.debug(`Request for session ${run.sessionId || '(new)'} aborted by the caller`);
    return this.buildResult(run, {
      status: 'error',
      answer: PIPELINE_MESSAGES.aborted,
      reason: 'aborted',
    });
  }

  /** Converts any stage failure into a terminal result; nothing is stored. */
  private failure(run: Run, e: unknown): PipelineResult {
    if (e instanceof PipelineError) {
      void this.appLogger.warn(`[pipeline] ${e.status} session=${run.sessionId || '(new)'}: ${e.message}`);
      return this.buildResult(run, {
        status: e.status,
        answer: e.userMessage,
        reason: e.cause instanceof UpstreamTimeoutError ? 'timeout' : e.status,
      });
    }

    void this.appLogger.error(
      `[pipeline] unexpected failure session=${run.sessionId || '(new)'}: ${errorMessage(e)}`,
      errorStack(e),
    );
    return this.buildResult(run, {
      status: 'error',
      answer: PIPELINE_MESSAGES.unexpectedError,
      reason: 'unexpected_error',
    });
  }
}
