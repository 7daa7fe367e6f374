import dotenv from 'dotenv';
import path from 'path';

// Load env vars before anything else
dotenv.config();
dotenv.config({ path: path.resolve(__dirname, '../.env'), override: true });

import { LangfuseSpanProcessor } from '@langfuse/otel';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import { setLangfuseTracerProvider } from '@langfuse/tracing';

/**
 * Langfuse tracing over OpenTelemetry. The CallbackHandler attached to LLM
 * calls creates spans through @langfuse/tracing; they are only exported
 * when this provider, with the Langfuse span processor, is registered.
 * Without keys nothing is registered and handlers are never created.
 */
const tracingEnabled = Boolean(process.env.LANGFUSE_PUBLIC_KEY && process.env.LANGFUSE_SECRET_KEY);

export const spanProcessor = tracingEnabled
  ? new LangfuseSpanProcessor({
      publicKey: process.env.LANGFUSE_PUBLIC_KEY,
      secretKey: process.env.LANGFUSE_SECRET_KEY,
      baseUrl: process.env.LANGFUSE_HOST || 'https://us.cloud.langfuse.com',
    })
  : null;

if (spanProcessor) {
  // Isolated from any global OTel setup
  setLangfuseTracerProvider(new NodeTracerProvider({ spanProcessors: [spanProcessor] }));
  console.log('LangFuse: TracerProvider initialized with LangfuseSpanProcessor');
}

export async function flushTraces(): Promise<void> {
  if (!spanProcessor) return;
  try {
    await spanProcessor.forceFlush();
  } catch (error) {
    console.warn('Failed to flush LangFuse traces:', error);
  }
}
