import type { LlmClient } from '../agents/llm';
import type { SummarizationCache } from '../agents/summarizer';
import type { ArticleStore } from '../db/store';
import type { RetrievalEngine } from '../search';
import {
  createAnalyzePerspectivesTool,
  createCategorizeBiasTool,
  createCompareArticlesTool,
  createGenerateSummaryTool,
  createTrendingTool,
} from './analysisTools';
import {
  createArticleDetailsTool,
  createExtractTopicsTool,
  createFilterBySourceTool,
  createSearchArticlesTool,
  createTimeRangeTool,
} from './articleTools';

export interface ResearchToolDeps {
  store: ArticleStore;
  retrieval: RetrievalEngine;
  summarizer: SummarizationCache;
  llm: LlmClient;
  settings: { timeoutMs: number; temperature: number };
  now: () => Date;
}

/**
 * Which earlier result a tool receives when its plan step leaves it out
 */
export type ToolInput = { param: 'articleIds'; max: number } | { param: 'articleId' } | null;

/**
 * A research tool as the executor sees it. `run` validates the parameters
 * against the tool's schema and returns the tool's JSON output.
 */
export interface ResearchTool {
  name: string;
  description: string;
  consumes: ToolInput;
  run(params: Record<string, unknown>): Promise<unknown>;
}

interface InvokableTool<Input> {
  name: string;
  description: string;
  schema: { parse(value: unknown): Input };
  invoke(input: Input): Promise<unknown>;
}

function bind<Input>(tool: InvokableTool<Input>, consumes: ToolInput): ResearchTool {
  return {
    name: tool.name,
    description: tool.description,
    consumes,
    run: (params) => tool.invoke(tool.schema.parse(params)),
  };
}

/**
 * Every tool the research planner may schedule, keyed by name
 */
export function createResearchTools(deps: ResearchToolDeps): Map<string, ResearchTool> {
  const tools = [
    bind(createSearchArticlesTool(deps), null),
    bind(createArticleDetailsTool(deps), { param: 'articleId' }),
    bind(createFilterBySourceTool(deps), { param: 'articleIds', max: 50 }),
    bind(createGenerateSummaryTool(deps), { param: 'articleId' }),
    bind(createAnalyzePerspectivesTool(deps), { param: 'articleIds', max: 5 }),
    bind(createCompareArticlesTool(deps), { param: 'articleIds', max: 2 }),
    bind(createExtractTopicsTool(deps), { param: 'articleIds', max: 50 }),
    bind(createTrendingTool(deps), null),
    bind(createCategorizeBiasTool(deps), { param: 'articleIds', max: 20 }),
    bind(createTimeRangeTool(deps), null),
  ];
  return new Map(tools.map((tool) => [tool.name, tool]));
}
