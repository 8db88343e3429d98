import {
  emailCollectionSchema,
  emailJsonSchema,
  freezeCollection,
  mergeCollections,
  parsePartialCollection,
  sameCollection,
  type EmailCollection,
  type EmailSnapshot,
} from '../types/email';
import { createOpenAiModel, type StructuredModelFactory } from '../services/structuredModel';
import { DEFAULT_TIMEOUT_MS } from './config';
import { AuthenticationError, UpstreamError, toExtractionError } from './errors';
import { logger } from './logger';

export interface ExtractionOptions {
  apiKey?: string;
  modelId: string;
  timeoutMs?: number;
  signal?: AbortSignal;
  createModel?: StructuredModelFactory;
}

export const buildExtractionPrompt = (text: string): string =>
  `Parse the following text into an array of email objects.

Return only valid JSON matching this schema:
${JSON.stringify(emailJsonSchema(), null, 2)}

Text to parse:
${text}`;

const snapshot = (emails: EmailCollection, rawText: string, done: boolean): EmailSnapshot =>
  Object.freeze({ emails: freezeCollection(emails), rawText, done });

const abortError = (): DOMException => new DOMException('The extraction was cancelled', 'AbortError');

/**
 * Streams EmailCollection snapshots for `text`. Each snapshot only adds to the
 * previous one; the last one has `done: true` and is the authoritative result.
 *
 * Throws AuthenticationError before any model call when no key is configured,
 * UpstreamError when the call fails or times out, and SchemaViolationError
 * when the model emits values of the wrong type.
 */
export async function* extractEmails(
  text: string,
  options: ExtractionOptions,
): AsyncGenerator<EmailSnapshot, void, undefined> {
  const apiKey = options.apiKey?.trim();
  if (!apiKey) {
    throw new AuthenticationError('No API key configured. Set VITE_OPENAI_API_KEY and reload the app.');
  }

  if (text.trim() === '') {
    logger.info('Empty input, skipping model call');
    yield snapshot([], '', true);
    return;
  }

  const { signal } = options;
  if (signal?.aborted) {
    throw abortError();
  }

  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = () => controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });

  // Caller cancellation wins over the timeout; both stop the stream.
  const checkStopped = () => {
    if (signal?.aborted) throw abortError();
    if (timedOut) throw new UpstreamError(`The model did not finish within ${timeoutMs} ms`);
  };

  logger.info(`Extracting emails from ${text.length} characters with ${options.modelId}`);

  let rawText = '';

  try {
    const model = (options.createModel ?? createOpenAiModel)(apiKey, options.modelId);
    const events = model.streamStructured({
      prompt: buildExtractionPrompt(text),
      schema: emailCollectionSchema,
      signal: controller.signal,
    });

    let emails: EmailCollection = [];
    let snapshots = 0;

    for await (const event of events) {
      checkStopped();
      if (event.type === 'text') {
        rawText += event.delta;
        continue;
      }

      const next = mergeCollections(emails, parsePartialCollection(event.value));

      if (event.type === 'complete') {
        logger.info(`Extraction finished with ${next.length} email(s) after ${snapshots} partial snapshot(s)`);
        yield snapshot(next, rawText, true);
        return;
      }

      if (!sameCollection(emails, next)) {
        emails = next;
        snapshots += 1;
        yield snapshot(emails, rawText, false);
      }
    }

    checkStopped();
    throw new UpstreamError('The model stream ended before the response was complete');
  } catch (error) {
    if (signal?.aborted) throw abortError();
    const failure = timedOut
      ? new UpstreamError(`The model did not finish within ${timeoutMs} ms`, { cause: error })
      : toExtractionError(error);
    failure.rawText = rawText;
    throw failure;
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
  }
}
