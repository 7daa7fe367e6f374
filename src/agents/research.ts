import { z } from 'zod';
import type { ArticleStore } from '../db/store';
import { GenerationError, StoreUnavailableError, ValidationError, errorMessage } from '../errors';
import { buildPlanningPrompt, buildSynthesisPrompt } from '../prompts/research-prompt';
import type { ResearchTool } from '../tools';
import { debugLogger } from '../utils/debug-logger';
import { sanitizeForLog } from '../utils/sanitize';
import type { LlmClient } from './llm';

export const MAX_PLAN_STEPS = 6;
export const SYNTHESIS_FALLBACK = 'Unable to synthesize a final answer from the research results.';

const HOUR_MS = 60 * 60 * 1000;
const UNIT_MS: Record<string, number> = {
  hour: HOUR_MS,
  day: 24 * HOUR_MS,
  week: 7 * 24 * HOUR_MS,
  month: 30 * 24 * HOUR_MS,
};

/** Keys a planner may use for the parameter the tools call by another name */
const PARAM_ALIASES: Record<string, string> = {
  start: 'startDate',
  end: 'endDate',
  type: 'kind',
  summaryType: 'kind',
  hours: 'hoursBack',
  id: 'articleId',
  sources: 'sourceTypes',
};

export interface PlanStep {
  step: number;
  tool: string;
  description: string;
  params: Record<string, unknown>;
}

export interface ResearchPlan {
  query: string;
  steps: PlanStep[];
  rationale: string | null;
  /** 'heuristic' when the model gave no usable plan */
  source: 'llm' | 'heuristic';
}

export type StepStatus = 'success' | 'error';

export interface StepResult {
  step: number;
  tool: string;
  description: string;
  status: StepStatus;
  params: Record<string, unknown>;
  result: unknown;
  error: string | null;
  completedAt: Date;
}

export interface PlanExecution {
  steps: StepResult[];
  completedSteps: number;
  totalSteps: number;
  /** Articles found by the last step that found any */
  articleIds: string[];
}

export interface ResearchReport {
  query: string;
  plan: ResearchPlan;
  execution: PlanExecution;
  answer: string;
  answerGenerated: boolean;
  completedAt: Date;
}

export interface ResearchSettings {
  timeoutMs: number;
  temperature: number;
  now?: () => Date;
}

const ModelPlanSchema = z.object({
  steps: z.array(
    z.object({
      tool_name: z.string().optional(),
      tool: z.string().optional(),
      description: z.string().optional(),
      parameters: z.record(z.unknown()).optional(),
      params: z.record(z.unknown()).optional(),
    })
  ),
  rationale: z.string().optional(),
});

const ToolOutputSchema = z.object({
  summary: z.string().optional(),
  articleIds: z.array(z.string()).optional(),
});

function camelCase(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_, char: string) => char.toUpperCase());
}

/**
 * Resolve "now", "5 days ago" and "48_hours_ago" against the clock;
 * anything else is returned unchanged.
 */
export function resolveRelativeTime(value: string, now: Date): string {
  const text = value.trim().toLowerCase();
  if (text === 'now') {
    return now.toISOString();
  }

  const match = text.match(/^(\d+)[\s_]*(hour|day|week|month)s?[\s_]*ago$/);
  if (match) {
    return new Date(now.getTime() - parseInt(match[1], 10) * UNIT_MS[match[2]]).toISOString();
  }
  return value;
}

/**
 * Bring planner parameters to the names and shapes the tools take.
 * Placeholders that point at earlier steps are dropped; the executor
 * fills those in.
 */
export function normalizeParams(raw: Record<string, unknown>, now: Date): Record<string, unknown> {
  const params: Record<string, unknown> = {};
  const pairIds: unknown[] = [];

  for (const [rawKey, value] of Object.entries(raw)) {
    if (typeof value === 'string' && value.toLowerCase().includes('results_from_step')) continue;

    const camel = camelCase(rawKey);
    if (/^(article1Id|article2Id|id1|id2)$/.test(camel)) {
      pairIds.push(value);
      continue;
    }

    const key = PARAM_ALIASES[camel] ?? camel;
    params[key] =
      (key === 'startDate' || key === 'endDate') && typeof value === 'string' ? resolveRelativeTime(value, now) : value;
  }

  if (pairIds.length > 0 && params.articleIds === undefined) {
    params.articleIds = pairIds;
  }
  return params;
}

/**
 * Extract the JSON plan from a model reply, fenced or bare
 */
export function parsePlanReply(text: string): z.infer<typeof ModelPlanSchema> | null {
  const fenced = text.match(/```(?:json)?\s*(\{[\s\S]*?\})\s*```/);
  const bare = fenced ? null : text.match(/\{[\s\S]*"steps"[\s\S]*\}/);
  const json = fenced ? fenced[1] : bare?.[0];
  if (!json) return null;

  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (error) {
    debugLogger.warn('RESEARCH_PLAN', 'Plan reply is not valid JSON', { error: errorMessage(error) });
    return null;
  }
  const parsed = ModelPlanSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

function hasWord(text: string, words: readonly string[]): boolean {
  return words.some((word) => new RegExp(`\\b${word}\\b`).test(text));
}

/**
 * Plan-and-execute research over the stored articles. A plan is a list of
 * tool calls; steps run in order and a step that needs articles and names
 * none receives those found by the most recent step that found any.
 */
export class ResearchAgent {
  private readonly now: () => Date;

  constructor(
    private readonly store: ArticleStore,
    private readonly llm: LlmClient,
    private readonly tools: ReadonlyMap<string, ResearchTool>,
    private readonly settings: ResearchSettings
  ) {
    this.now = settings.now ?? (() => new Date());
  }

  async createPlan(query: string): Promise<ResearchPlan> {
    const trimmed = query.trim();
    if (!trimmed) {
      throw new ValidationError('Research query must not be empty');
    }

    const stepId = debugLogger.stepStart('RESEARCH_PLAN', 'Planning research', {
      query: sanitizeForLog(trimmed).substring(0, 100),
    });

    let reply: string | null = null;
    try {
      reply = await this.llm.generate(buildPlanningPrompt(trimmed, [...this.tools.values()], MAX_PLAN_STEPS), {
        temperature: 0,
        maxTokens: 1000,
        timeoutMs: this.settings.timeoutMs,
        tags: ['research', 'plan'],
      });
    } catch (error) {
      if (!(error instanceof GenerationError)) throw error;
      debugLogger.warn('RESEARCH_PLAN', 'Planner unavailable, using keyword plan', { error: error.message });
    }

    const modelPlan = reply === null ? null : parsePlanReply(reply);
    const now = this.now();
    const steps = (modelPlan?.steps ?? []).slice(0, MAX_PLAN_STEPS).map((step, i) => ({
      step: i + 1,
      tool: step.tool_name ?? step.tool ?? 'search_articles',
      description: step.description ?? '',
      params: normalizeParams(step.parameters ?? step.params ?? {}, now),
    }));

    const plan: ResearchPlan =
      steps.length > 0
        ? { query: trimmed, steps, rationale: modelPlan?.rationale ?? null, source: 'llm' }
        : { query: trimmed, steps: await this.heuristicPlan(trimmed), rationale: null, source: 'heuristic' };

    debugLogger.stepFinish(stepId, { source: plan.source, steps: plan.steps.map((step) => step.tool) });
    return plan;
  }

  /**
   * Keyword-driven plan: one retrieval step chosen by the query's time
   * phrasing, then analysis steps for the intents the query mentions.
   */
  async heuristicPlan(query: string): Promise<PlanStep[]> {
    const text = query.toLowerCase();
    const now = this.now();
    const steps: Array<Omit<PlanStep, 'step'>> = [];

    const range = text.match(/\b(past|last)\s+(\d+)\s+(hour|day|week|month)s?\b/);
    if (range) {
      const amount = parseInt(range[2], 10);
      const unit = range[3];
      steps.push({
        tool: 'get_by_timerange',
        description: `Get articles from the past ${amount} ${unit}${amount === 1 ? '' : 's'}`,
        params: {
          startDate: new Date(now.getTime() - amount * UNIT_MS[unit]).toISOString(),
          endDate: now.toISOString(),
          limit: 50,
        },
      });
    } else if (hasWord(text, ['trending', 'recent', 'latest', 'this week', 'this month'])) {
      steps.push({
        tool: 'get_trending',
        description: 'Analyze trending topics from recent articles',
        params: { hoursBack: hasWord(text, ['week']) ? 168 : 720 },
      });
    } else {
      steps.push({
        tool: 'search_articles',
        description: `Search for articles about: ${query}`,
        params: { query, limit: 10 },
      });
    }

    const sources = (await this.store.listSources()).filter((source) => text.includes(source.toLowerCase()));
    if (sources.length > 0) {
      steps.push({
        tool: 'filter_by_source',
        description: `Filter to ${sources.join(', ')}`,
        params: { sourceTypes: sources },
      });
    }

    if (hasWord(text, ['perspectives?', 'viewpoints?', 'political', 'compare sources', 'different views'])) {
      steps.push({
        tool: 'analyze_perspectives',
        description: 'Analyze different perspectives in the articles found',
        params: { focus: query },
      });
    }

    if (hasWord(text, ['bias', 'biased', 'leaning', 'partisan'])) {
      steps.push({ tool: 'categorize_bias', description: 'Sort the articles by political leaning', params: {} });
    }

    if (hasWord(text, ['compare', 'difference', 'differences', 'versus', 'vs'])) {
      steps.push({ tool: 'compare_articles', description: 'Compare two of the articles found', params: {} });
    }

    if (hasWord(text, ['summarize', 'summarise', 'summary', 'summaries', 'key points'])) {
      steps.push({
        tool: 'generate_summary',
        description: 'Summarize the most relevant article',
        params: { kind: 'comprehensive' },
      });
    }

    if (hasWord(text, ['topics', 'themes', 'what are', 'top'])) {
      steps.push({ tool: 'extract_topics', description: 'Extract key topics and themes', params: {} });
    }

    if (steps.length === 1) {
      steps.push({ tool: 'analyze_perspectives', description: 'Analyze the articles found', params: { focus: query } });
    }

    return steps.slice(0, MAX_PLAN_STEPS).map((step, i) => ({ step: i + 1, ...step }));
  }

  async executePlan(plan: Pick<ResearchPlan, 'steps'>): Promise<PlanExecution> {
    const stepId = debugLogger.stepStart('RESEARCH_EXECUTE', `Executing ${plan.steps.length} steps`);
    const now = this.now();
    const results: StepResult[] = [];
    let articleIds: string[] = [];

    for (const step of plan.steps) {
      const tool = this.tools.get(step.tool);
      const params = normalizeParams(step.params, now);
      const base = { step: step.step, tool: step.tool, description: step.description };

      if (!tool) {
        results.push({
          ...base,
          status: 'error',
          params,
          result: null,
          error: `Unknown tool: ${step.tool}`,
          completedAt: new Date(),
        });
        continue;
      }

      if (tool.consumes?.param === 'articleIds' && params.articleIds === undefined && articleIds.length > 0) {
        params.articleIds = articleIds.slice(0, tool.consumes.max);
      }
      if (tool.consumes?.param === 'articleId' && params.articleId === undefined && articleIds.length > 0) {
        params.articleId = articleIds[0];
      }

      try {
        const output = await tool.run(params);
        const result: unknown = typeof output === 'string' ? JSON.parse(output) : output;
        const found = ToolOutputSchema.safeParse(result);
        if (found.success && found.data.articleIds) {
          articleIds = found.data.articleIds;
        }
        results.push({ ...base, status: 'success', params, result, error: null, completedAt: new Date() });
      } catch (error) {
        if (error instanceof StoreUnavailableError) {
          debugLogger.stepError(stepId, 'RESEARCH_EXECUTE', 'Store lost during research', error);
          throw error;
        }
        debugLogger.warn('RESEARCH_EXECUTE', `Step ${step.step} (${step.tool}) failed`, { error: describe(error) });
        results.push({ ...base, status: 'error', params, result: null, error: describe(error), completedAt: new Date() });
      }
    }

    const completedSteps = results.filter((result) => result.status === 'success').length;
    debugLogger.stepFinish(stepId, { completedSteps, totalSteps: plan.steps.length });
    return { steps: results, completedSteps, totalSteps: plan.steps.length, articleIds };
  }

  /**
   * Answer the query from the successful steps. Falls back to a fixed
   * message when nothing succeeded or the model fails.
   */
  async synthesize(query: string, execution: PlanExecution): Promise<{ answer: string; answerGenerated: boolean }> {
    const findings = execution.steps.flatMap((step) => {
      if (step.status !== 'success') return [];
      const output = ToolOutputSchema.safeParse(step.result);
      return output.success && output.data.summary ? [`[${step.tool}] ${output.data.summary}`] : [];
    });

    if (findings.length === 0) {
      return { answer: SYNTHESIS_FALLBACK, answerGenerated: false };
    }

    try {
      const answer = await this.llm.generate(buildSynthesisPrompt(query, findings), {
        temperature: this.settings.temperature,
        maxTokens: 1500,
        timeoutMs: this.settings.timeoutMs,
        tags: ['research', 'synthesis'],
      });
      return { answer, answerGenerated: true };
    } catch (error) {
      if (!(error instanceof GenerationError)) throw error;
      debugLogger.warn('RESEARCH_SYNTHESIS', 'Synthesis failed', { error: error.message });
      return { answer: SYNTHESIS_FALLBACK, answerGenerated: false };
    }
  }

  async research(query: string): Promise<ResearchReport> {
    const plan = await this.createPlan(query);
    const execution = await this.executePlan(plan);
    const { answer, answerGenerated } = await this.synthesize(plan.query, execution);
    return { query: plan.query, plan, execution, answer, answerGenerated, completedAt: new Date() };
  }
}

function describe(error: unknown): string {
  if (error instanceof z.ZodError) {
    return error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
  }
  return errorMessage(error);
}
