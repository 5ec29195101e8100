// src/prompts/prompt-template.service.ts
import { Injectable, Logger } from '@nestjs/common';

import { isSourceType } from '../context/context.types';
import { extractCaseReference } from '../conversation/case-reference';
import { isProceduralQuery } from '../conversation/case-resolver.service';
import { Term, toTerm } from '../guardrails/guardrail-lexicon';
import raw from './prompt-templates.json';
import {
  FormattedPrompt,
  LEGAL_DOMAINS,
  LegalDomain,
  PromptContext,
  PromptHistoryTurn,
  PromptTemplate,
  QUERY_TYPES,
  QueryClassification,
  QueryType,
} from './prompt.types';

const HISTORY_TURNS = 3;
const HISTORY_ANSWER_CHARS = 150;
const NO_CONTEXT_TEXT = 'No relevant documents were retrieved.';

const LAW_RESEARCH_RE = /\b(?:law|laws|section|act|statute|ordinance|article|rule)\b/i;

const DOMAIN_QUERY_TYPE: Partial<Record<LegalDomain, QueryType>> = {
  constitutional: 'constitutional_question',
  criminal: 'criminal_law',
  civil: 'civil_law',
  family: 'family_law',
  procedural: 'procedural_guidance',
};

function isQueryType(value: string): value is QueryType {
  return (QUERY_TYPES as readonly string[]).includes(value);
}

function isLegalDomain(value: string): value is LegalDomain {
  return (LEGAL_DOMAINS as readonly string[]).includes(value);
}

function checked<T extends string>(
  values: string[],
  guard: (v: string) => v is T,
  owner: string,
): T[] {
  return values.map((v) => {
    if (!guard(v)) throw new Error(`Unknown value "${v}" in prompt template ${owner}`);
    return v;
  });
}

export function loadTemplates(source: typeof raw): PromptTemplate[] {
  return source.templates.map((t) => ({
    key: t.key,
    name: t.name,
    queryTypes: checked(t.queryTypes, isQueryType, t.key),
    domains: checked(t.domains, isLegalDomain, t.key),
    focus: t.focus,
    instructions: t.instructions,
  }));
}

function loadDomainIndicators(source: typeof raw): [LegalDomain, Term[]][] {
  return Object.entries(source.domainIndicators).map(([domain, terms]) => {
    if (!isLegalDomain(domain)) throw new Error(`Unknown legal domain "${domain}"`);
    return [domain, terms.map(toTerm)];
  });
}

const DOMAIN_INDICATORS = loadDomainIndicators(raw);

/**
 * Domain with the most indicator hits across `texts`; null when nothing
 * matches. Ties go to the domain listed first.
 */
export function detectDomain(
  texts: readonly string[],
  indicators: readonly [LegalDomain, Term[]][] = DOMAIN_INDICATORS,
): LegalDomain | null {
  let best: LegalDomain | null = null;
  let bestCount = 0;

  for (const [domain, terms] of indicators) {
    let count = 0;
    for (const text of texts) {
      for (const term of terms) if (term.pattern.test(text)) count += 1;
    }
    if (count > bestCount) {
      best = domain;
      bestCount = count;
    }
  }
  return best;
}

/** "Previous Qn/An" lines for the last three exchanges, long answers cut short. */
export function formatConversationContext(history: readonly PromptHistoryTurn[]): string {
  if (!history.length) return '';

  const lines = ['CONVERSATION CONTEXT:'];
  history.slice(-HISTORY_TURNS).forEach((turn, i) => {
    const answer =
      turn.answer.length > HISTORY_ANSWER_CHARS
        ? `${turn.answer.slice(0, HISTORY_ANSWER_CHARS)}...`
        : turn.answer;
    lines.push(`Previous Q${i + 1}: ${turn.query}`);
    lines.push(`Previous A${i + 1}: ${answer}`);
  });
  return lines.join('\n');
}

@Injectable()
export class PromptTemplateService {
  private readonly logger = new Logger(PromptTemplateService.name);
  private readonly templates = loadTemplates(raw);
  private readonly baseSystemPrompt = raw.baseSystemPrompt.join('\n');

  /**
   * Coarse keyword classification. A question about a locked case, or one
   * naming a case, is a case inquiry whatever its domain.
   */
  classifyQuery(query: string, aboutLockedCase = false): QueryClassification {
    const domain = detectDomain([query]) ?? 'general';

    let queryType: QueryType;
    if (aboutLockedCase || extractCaseReference(query)) queryType = 'case_inquiry';
    else if (isProceduralQuery(query)) queryType = 'procedural_guidance';
    else queryType = DOMAIN_QUERY_TYPE[domain] ?? (LAW_RESEARCH_RE.test(query) ? 'law_research' : 'general_legal');

    return { queryType, domain };
  }

  /**
   * Exact (query type, domain) match first, then any template for the query
   * type, then the general one. A domain that dominates the recent questions
   * wins when its template serves the query type.
   */
  selectTemplate(
    queryType: QueryType,
    domain: LegalDomain,
    history: readonly PromptHistoryTurn[] = [],
  ): PromptTemplate {
    const byType = this.templates.filter((t) => t.queryTypes.includes(queryType));
    const exact = byType.find((t) => t.domains.includes(domain));
    const generalFirst = [...byType].sort(
      (a, b) => Number(b.domains.includes('general')) - Number(a.domains.includes('general')),
    );

    let selected = exact ?? generalFirst[0] ?? this.template('general');

    const historyDomain = history.length ? detectDomain(history.map((t) => t.query)) : null;
    if (historyDomain) {
      const domainTemplate = this.templates.find((t) => t.key === historyDomain);
      if (domainTemplate?.queryTypes.includes(queryType)) selected = domainTemplate;
    }

    this.logger.debug(`Selected template '${selected.name}' for ${queryType} in ${domain}`);
    return selected;
  }

  formatPrompt(
    template: PromptTemplate,
    classification: QueryClassification,
    query: string,
    context: PromptContext,
    history: readonly PromptHistoryTurn[] = [],
  ): FormattedPrompt {
    const systemParts = [this.baseSystemPrompt, template.focus];
    const conversation = formatConversationContext(history);
    if (conversation) systemParts.push(conversation);

    const instructions = template.instructions.map((line, i) => `${i + 1}. ${line}`).join('\n');
    const userPrompt = [
      `Question: ${query}`,
      `Retrieved Legal Context:\n${context.contextText.trim() || NO_CONTEXT_TEXT}`,
      `Answer the question from the retrieved context above. In your answer:\n${instructions}`,
      'Answer:',
    ].join('\n\n');

    const sourceTypes = Object.keys(context.sourceDistribution)
      .filter(isSourceType)
      .filter((type) => (context.sourceDistribution[type] ?? 0) > 0);

    return {
      systemPrompt: systemParts.join('\n\n'),
      userPrompt,
      templateName: template.name,
      queryType: classification.queryType,
      domain: classification.domain,
      contextMetadata: {
        chunkCount: context.chunkCount,
        totalTokens: context.tokenCount,
        sourceTypes,
        conversationTurns: history.length,
      },
    };
  }

  private template(key: string): PromptTemplate {
    const found = this.templates.find((t) => t.key === key);
    if (!found) throw new Error(`Prompt template "${key}" is not defined`);
    return found;
  }
}
