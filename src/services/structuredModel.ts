import {
  APICallError,
  NoObjectGeneratedError,
  TypeValidationError,
  streamObject,
  type LanguageModel,
} from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import type { z } from 'zod';
import { AuthenticationError, SchemaViolationError, UpstreamError, isAbortError } from '../utils/errors';

export type StructuredStreamEvent =
  | { type: 'text'; delta: string }
  | { type: 'object'; value: unknown }
  | { type: 'complete'; value: unknown };

export interface StructuredStreamRequest<T> {
  prompt: string;
  schema: z.ZodType<T>;
  signal: AbortSignal;
}

/**
 * Anything that can stream progressively-complete objects for a schema.
 * `object` events carry partial values; a single `complete` event carries the
 * finished value and is always last.
 */
export interface StructuredStreamModel {
  streamStructured<T>(request: StructuredStreamRequest<T>): AsyncIterable<StructuredStreamEvent>;
}

export type StructuredModelFactory = (apiKey: string, modelId: string) => StructuredStreamModel;

// Translate provider errors into the app's error kinds. Unknown errors pass
// through unchanged.
const toProviderError = (error: unknown): unknown => {
  if (isAbortError(error)) {
    return error;
  }
  if (APICallError.isInstance(error)) {
    const status = error.statusCode;
    if (status === 401 || status === 403) {
      return new AuthenticationError(`The model provider rejected the API key (HTTP ${status})`, { cause: error });
    }
    const reason = status === 429 ? 'rate limited' : error.message;
    return new UpstreamError(
      status ? `Model request failed (HTTP ${status}): ${reason}` : `Model request failed: ${reason}`,
      { cause: error, status },
    );
  }
  if (TypeValidationError.isInstance(error)) {
    return new SchemaViolationError(`Model output does not match the email schema: ${error.message}`, { cause: error });
  }
  if (NoObjectGeneratedError.isInstance(error)) {
    if (TypeValidationError.isInstance(error.cause)) {
      return new SchemaViolationError('Model output does not match the email schema', { cause: error });
    }
    return new UpstreamError('The model response was not valid JSON', { cause: error });
  }
  return error;
};

const isJson = (text: string): boolean => {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
};

/** Adapts any AI SDK language model to StructuredStreamModel via streamObject. */
export const createAiSdkModel = (model: LanguageModel): StructuredStreamModel => ({
  async *streamStructured<T>({
    prompt,
    schema,
    signal,
  }: StructuredStreamRequest<T>): AsyncGenerator<StructuredStreamEvent, void, undefined> {
    const result = streamObject({
      model,
      schema,
      prompt,
      mode: 'json',
      abortSignal: signal,
      // one attempt per submission
      maxRetries: 0,
    });

    let text = '';
    let finishReason: string | undefined;

    try {
      for await (const part of result.fullStream) {
        switch (part.type) {
          case 'text-delta':
            text += part.textDelta;
            yield { type: 'text', delta: part.textDelta };
            break;
          case 'object':
            yield { type: 'object', value: part.object };
            break;
          case 'finish':
            finishReason = part.finishReason;
            break;
          case 'error':
            throw part.error;
          default:
            break;
        }
      }
      // A cut-off response still parses after repair, so only a clean stop counts as complete.
      if (finishReason !== 'stop') {
        throw new UpstreamError(`The model response was cut off (${finishReason ?? 'no finish reason'})`);
      }
      if (!isJson(text)) {
        throw new UpstreamError('The model response was not valid JSON');
      }
      // Resolves once the full text has been parsed and validated.
      yield { type: 'complete', value: await result.object };
    } catch (error) {
      throw toProviderError(error);
    }
  },
});

export const createOpenAiModel: StructuredModelFactory = (apiKey, modelId) => {
  const openai = createOpenAI({ apiKey });
  return createAiSdkModel(openai(modelId));
};
