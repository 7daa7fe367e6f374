import { describe, it, expect } from 'vitest';
import { EmbeddingError } from '../../errors';
import { LangChainEmbeddingClient, OpenRouterEmbeddings, createLangfuseHandler } from '../llm';

function embeddingsWith(
  fetchImpl: typeof fetch,
  timeouts: { request: number; batch: number } = { request: 5000, batch: 5000 }
): LangChainEmbeddingClient {
  const embeddings = new OpenRouterEmbeddings({
    apiKey: 'test-secret',
    baseUrl: 'https://llm.example.com/v1',
    model: 'test-embedding',
    appUrl: 'http://localhost:3001',
    timeoutMs: timeouts.request,
    fetchImpl,
  });
  return new LangChainEmbeddingClient(embeddings, 'test-embedding', timeouts.batch);
}

/** A fetch that never answers, but rejects once its request signal aborts. */
const hangingFetch: typeof fetch = (_input, init) =>
  new Promise<Response>((_, reject) => {
    init?.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });

describe('LangChainEmbeddingClient over OpenRouterEmbeddings', () => {
  it('posts the batch and restores input order from the response indices', async () => {
    const requests: Array<{ url: string; body: string; auth: string | null }> = [];
    const fetchImpl: typeof fetch = async (input, init) => {
      requests.push({
        url: typeof input === 'string' ? input : input instanceof URL ? input.href : input.url,
        body: String(init?.body),
        auth: new Headers(init?.headers).get('Authorization'),
      });
      return new Response(
        JSON.stringify({
          data: [
            { embedding: [0, 1], index: 1 },
            { embedding: [1, 0], index: 0 },
          ],
        }),
        { status: 200 }
      );
    };

    const vectors = await embeddingsWith(fetchImpl).embedBatch(['first', 'second']);

    expect(vectors).toEqual([
      [1, 0],
      [0, 1],
    ]);
    expect(requests).toEqual([
      {
        url: 'https://llm.example.com/v1/embeddings',
        body: JSON.stringify({ model: 'test-embedding', input: ['first', 'second'] }),
        auth: 'Bearer test-secret',
      },
    ]);
  });

  it('truncates very long inputs', async () => {
    let sent = '';
    const fetchImpl: typeof fetch = async (_input, init) => {
      sent = String(init?.body);
      return new Response(JSON.stringify({ data: [{ embedding: [1], index: 0 }] }), { status: 200 });
    };

    await embeddingsWith(fetchImpl).embed('x'.repeat(9000));

    expect(sent).toBe(JSON.stringify({ model: 'test-embedding', input: ['x'.repeat(8000)] }));
  });

  it('wraps provider errors in EmbeddingError', async () => {
    const fetchImpl: typeof fetch = async () => new Response('quota exceeded', { status: 429 });

    await expect(embeddingsWith(fetchImpl).embed('text')).rejects.toBeInstanceOf(EmbeddingError);
  });

  it('rejects a response with the wrong number of vectors', async () => {
    const fetchImpl: typeof fetch = async () =>
      new Response(JSON.stringify({ data: [{ embedding: [1, 0], index: 0 }] }), { status: 200 });

    await expect(embeddingsWith(fetchImpl).embedBatch(['a', 'b'])).rejects.toThrow(
      'Embedding failed: Expected 2 embeddings, received 1'
    );
  });

  it('skips the request for an empty batch', async () => {
    let called = false;
    const fetchImpl: typeof fetch = async () => {
      called = true;
      return new Response('{}', { status: 200 });
    };

    expect(await embeddingsWith(fetchImpl).embedBatch([])).toEqual([]);
    expect(called).toBe(false);
  });

  it('aborts the HTTP request when it outlives the request timeout', async () => {
    const client = embeddingsWith(hangingFetch, { request: 30, batch: 5000 });

    await expect(client.embed('text')).rejects.toThrow('Embedding failed: Embedding request timed out after 30ms');
  });

  it('gives up on a batch that outlives the client timeout', async () => {
    const client = embeddingsWith(() => new Promise<Response>(() => undefined), { request: 5000, batch: 30 });

    await expect(client.embedBatch(['a'])).rejects.toThrow('Embedding failed: Embedding timed out after 30ms');
  });

  it('stops waiting once the caller signal aborts', async () => {
    const client = embeddingsWith(hangingFetch, { request: 200, batch: 5000 });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    const pending = client.embed('text', { signal: controller.signal });

    await expect(pending).rejects.toBeInstanceOf(EmbeddingError);
    await expect(pending).rejects.toThrow('Embedding failed: Embedding abandoned: caller aborted');
  });
});

describe('createLangfuseHandler', () => {
  it('returns null without credentials', () => {
    expect(
      createLangfuseHandler({ publicKey: null, secretKey: null, host: 'https://langfuse.example.com' }, { model: 'm' })
    ).toBeNull();
  });
});
