import { vi } from 'vitest';
import type { EmailRecord } from '../types/email';
import type {
  StructuredModelFactory,
  StructuredStreamEvent,
  StructuredStreamModel,
  StructuredStreamRequest,
} from '../services/structuredModel';

// A step is either an event to emit or a pause the stream waits on.
export type ScriptStep = StructuredStreamEvent | (() => Promise<void>);

export const text = (delta: string): StructuredStreamEvent => ({ type: 'text', delta });

export const partial = (emails: unknown[]): StructuredStreamEvent => ({ type: 'object', value: { emails } });

export const complete = (emails: EmailRecord[]): StructuredStreamEvent => ({ type: 'complete', value: { emails } });

export const deferred = () => {
  let release: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, release };
};

const abortError = () => new DOMException('Aborted', 'AbortError');

const untilAborted = (pause: Promise<void>, signal: AbortSignal) =>
  new Promise<void>((resolve, reject) => {
    if (signal.aborted) {
      reject(abortError());
      return;
    }
    const onAbort = () => reject(abortError());
    signal.addEventListener('abort', onAbort, { once: true });
    pause.then(
      () => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });

/** In-process stand-in for the model provider that replays a fixed script. */
export const createScriptedModel = (script: ScriptStep[]) => {
  const prompts: string[] = [];

  const model: StructuredStreamModel = {
    async *streamStructured<T>({
      prompt,
      signal,
    }: StructuredStreamRequest<T>): AsyncGenerator<StructuredStreamEvent, void, undefined> {
      prompts.push(prompt);
      for (const step of script) {
        if (typeof step === 'function') {
          await untilAborted(step(), signal);
          continue;
        }
        if (signal.aborted) throw abortError();
        yield step;
      }
    },
  };

  const factory = vi.fn<StructuredModelFactory>(() => model);

  return { model, factory, prompts };
};
