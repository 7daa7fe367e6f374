import { ChatOpenAI } from '@langchain/openai';
import { Embeddings } from '@langchain/core/embeddings';
import type { AIMessageChunk } from '@langchain/core/messages';
import { CallbackHandler } from '@langfuse/langchain';
import { z } from 'zod';
import type { AppConfig } from '../config';
import { EmbeddingError, GenerationError, errorMessage } from '../errors';
import { chunkArray, raceAbort, withTimeout } from '../utils/concurrency';
import { debugLogger } from '../utils/debug-logger';

const EMBEDDING_BATCH_SIZE = 100;
const EMBEDDING_MAX_LENGTH = 8000;
const APP_TITLE = 'News Digest';

/**
 * Default max tokens for generated text
 */
export const DEFAULT_MAX_TOKENS = 1024;

export interface GenerateOptions {
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  /** Langfuse tags for this call */
  tags?: string[];
}

/**
 * Text generation boundary. Implementations throw GenerationError on any
 * failure, including timeouts and empty output.
 */
export interface LlmClient {
  readonly model: string;
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

export interface EmbedOptions {
  /** Give up as soon as this aborts */
  signal?: AbortSignal;
}

/**
 * Embedding boundary. Implementations throw EmbeddingError on any failure,
 * including their own timeout and an aborted signal.
 */
export interface EmbeddingClient {
  readonly model: string;
  embed(text: string, options?: EmbedOptions): Promise<number[]>;
  embedBatch(texts: readonly string[], options?: EmbedOptions): Promise<number[][]>;
}

type LlmSettings = AppConfig['llm'];
type TracingSettings = AppConfig['tracing'];

/**
 * Create a LangFuse callback handler for tracing LLM calls, or null when
 * tracing is not configured. Credentials are picked up by the span
 * processor registered in instrumentation.ts.
 */
export function createLangfuseHandler(
  tracing: TracingSettings,
  options: { sessionId?: string; tags?: string[]; model: string }
): CallbackHandler | null {
  if (!tracing.publicKey || !tracing.secretKey) {
    return null;
  }

  return new CallbackHandler({
    sessionId: options.sessionId,
    tags: options.tags ?? ['news-digest'],
    traceMetadata: { model: options.model },
  });
}

function messageText(message: AIMessageChunk): string {
  const { content } = message;
  if (typeof content === 'string') {
    return content;
  }
  return content
    .map((part) => ('text' in part && typeof part.text === 'string' ? part.text : ''))
    .join('');
}

/**
 * ChatOpenAI pointed at an OpenAI-compatible endpoint (OpenRouter by default)
 */
export class LangChainLlmClient implements LlmClient {
  readonly model: string;

  constructor(
    private readonly settings: LlmSettings,
    private readonly tracing: TracingSettings
  ) {
    this.model = settings.model;
  }

  private createChatModel(options: GenerateOptions): ChatOpenAI {
    return new ChatOpenAI({
      model: this.settings.model,
      apiKey: this.settings.apiKey,
      configuration: {
        baseURL: this.settings.baseUrl,
        defaultHeaders: {
          'HTTP-Referer': this.settings.appUrl,
          'X-Title': APP_TITLE,
        },
      },
      temperature: options.temperature ?? this.settings.temperature,
      maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      streaming: false,
      maxRetries: 1,
    });
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const timeoutMs = options.timeoutMs ?? this.settings.timeoutMs;
    const stepId = debugLogger.stepStart('LLM', 'Generate', {
      model: this.model,
      promptLength: prompt.length,
      timeoutMs,
    });

    const llm = this.createChatModel(options);
    const handler = createLangfuseHandler(this.tracing, { tags: options.tags, model: this.model });
    const controller = new AbortController();

    try {
      const response = await withTimeout(
        llm.invoke(prompt, {
          callbacks: handler ? [handler] : undefined,
          signal: controller.signal,
        }),
        timeoutMs,
        `LLM call timed out after ${timeoutMs}ms`
      );

      const text = messageText(response).trim();
      if (!text) {
        throw new Error('Empty response from LLM');
      }

      debugLogger.stepFinish(stepId, { responseLength: text.length });
      return text;
    } catch (error) {
      controller.abort();
      debugLogger.stepError(stepId, 'LLM', 'Generation failed', error);
      throw new GenerationError(`LLM generation failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}

const EmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int(),
    })
  ),
  model: z.string().optional(),
});

export interface OpenRouterEmbeddingsOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  appUrl: string;
  /** Per-request timeout; the request is aborted when it passes */
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

/**
 * Custom Embeddings class for OpenRouter's OpenAI-compatible /embeddings endpoint
 */
export class OpenRouterEmbeddings extends Embeddings {
  readonly model: string;
  private readonly apiKey: string;
  private readonly baseURL: string;
  private readonly appUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OpenRouterEmbeddingsOptions) {
    super({});
    this.model = options.model;
    this.apiKey = options.apiKey;
    this.baseURL = options.baseUrl;
    this.appUrl = options.appUrl;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async embedDocuments(documents: string[]): Promise<number[][]> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let body: unknown;
    try {
      const response = await this.fetchImpl(`${this.baseURL}/embeddings`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
          'HTTP-Referer': this.appUrl,
          'X-Title': APP_TITLE,
        },
        body: JSON.stringify({
          model: this.model,
          input: documents,
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new Error(`OpenRouter embedding error: ${response.status} ${response.statusText}`);
      }
      body = await response.json();
    } catch (error) {
      if (controller.signal.aborted) {
        throw new Error(`Embedding request timed out after ${this.timeoutMs}ms`, { cause: error });
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }

    const parsed = EmbeddingResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error(`Malformed embedding response: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`);
    }
    if (parsed.data.data.length !== documents.length) {
      throw new Error(`Expected ${documents.length} embeddings, received ${parsed.data.data.length}`);
    }

    return [...parsed.data.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }

  async embedQuery(query: string): Promise<number[]> {
    const [embedding] = await this.embedDocuments([query]);
    return embedding;
  }
}

/**
 * EmbeddingClient over any LangChain Embeddings implementation. Inputs are
 * truncated and sent in batches; each batch is bounded by `timeoutMs`.
 */
export class LangChainEmbeddingClient implements EmbeddingClient {
  constructor(
    private readonly embeddings: Embeddings,
    readonly model: string,
    private readonly timeoutMs: number
  ) {}

  async embed(text: string, options: EmbedOptions = {}): Promise<number[]> {
    const [embedding] = await this.embedBatch([text], options);
    return embedding;
  }

  async embedBatch(texts: readonly string[], options: EmbedOptions = {}): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const stepId = debugLogger.stepStart('EMBED', `Embedding ${texts.length} texts`, { model: this.model });
    const truncated = texts.map((text) =>
      text.length > EMBEDDING_MAX_LENGTH ? text.substring(0, EMBEDDING_MAX_LENGTH) : text
    );

    try {
      const all: number[][] = [];
      for (const batch of chunkArray(truncated, EMBEDDING_BATCH_SIZE)) {
        const request = withTimeout(
          this.embeddings.embedDocuments(batch),
          this.timeoutMs,
          `Embedding timed out after ${this.timeoutMs}ms`
        );
        all.push(...(await raceAbort(request, options.signal, 'Embedding abandoned: caller aborted')));
      }

      if (all.some((vector) => vector.length === 0)) {
        throw new Error('Provider returned an empty embedding');
      }

      debugLogger.stepFinish(stepId, { dimensions: all[0]?.length ?? 0 });
      return all;
    } catch (error) {
      debugLogger.stepError(stepId, 'EMBED', 'Embedding failed', error);
      throw new EmbeddingError(`Embedding failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}

export function createLlmClient(config: Readonly<AppConfig>): LlmClient {
  return new LangChainLlmClient(config.llm, config.tracing);
}

export function createEmbeddingClient(config: Readonly<AppConfig>): EmbeddingClient {
  const embeddings = new OpenRouterEmbeddings({
    apiKey: config.llm.apiKey,
    baseUrl: config.llm.baseUrl,
    model: config.llm.embeddingModel,
    appUrl: config.llm.appUrl,
    timeoutMs: config.llm.embeddingTimeoutMs,
  });
  return new LangChainEmbeddingClient(embeddings, config.llm.embeddingModel, config.llm.embeddingTimeoutMs);
}
