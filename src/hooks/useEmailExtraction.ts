import { useCallback, useEffect, useRef, useState } from 'react';
import type { EmailCollection } from '../types/email';
import type { StructuredModelFactory } from '../services/structuredModel';
import { extractEmails } from '../utils/emailExtractor';
import { type ExtractionError, describeExtractionError, isAbortError, toExtractionError } from '../utils/errors';
import { logger } from '../utils/logger';

export type ExtractionStatus = 'idle' | 'streaming' | 'done' | 'error';

export interface ExtractionState {
  status: ExtractionStatus;
  emails: EmailCollection;
  rawText: string;
  error: ExtractionError | null;
  requestId: number;
}

export interface UseEmailExtractionOptions {
  apiKey?: string;
  modelId: string;
  timeoutMs?: number;
  createModel?: StructuredModelFactory;
}

const initialState: ExtractionState = {
  status: 'idle',
  emails: [],
  rawText: '',
  error: null,
  requestId: 0,
};

/**
 * Runs one extraction at a time. A new submission aborts the previous one,
 * and snapshots that still arrive from it are dropped.
 */
export const useEmailExtraction = (options: UseEmailExtractionOptions) => {
  const [state, setState] = useState<ExtractionState>(initialState);
  const optionsRef = useRef(options);
  const requestRef = useRef<{ id: number; controller: AbortController } | null>(null);
  const nextIdRef = useRef(0);

  optionsRef.current = options;

  // Abort whatever is in flight when the component goes away
  useEffect(() => () => requestRef.current?.controller.abort(), []);

  const submit = useCallback(async (text: string) => {
    requestRef.current?.controller.abort();

    const controller = new AbortController();
    nextIdRef.current += 1;
    const id = nextIdRef.current;
    requestRef.current = { id, controller };
    const isCurrent = () => requestRef.current?.id === id;

    setState({ ...initialState, status: 'streaming', requestId: id });

    try {
      for await (const snapshot of extractEmails(text, { ...optionsRef.current, signal: controller.signal })) {
        if (!isCurrent()) {
          logger.debug(`Dropping snapshot from superseded request ${id}`);
          return;
        }
        setState((prev) =>
          prev.requestId === id
            ? {
                ...prev,
                emails: snapshot.emails,
                rawText: snapshot.rawText,
                status: snapshot.done ? 'done' : 'streaming',
              }
            : prev,
        );
      }
    } catch (error) {
      if (!isCurrent()) {
        if (!isAbortError(error)) {
          logger.debug(`Ignoring failure from superseded request ${id}`);
        }
        return;
      }
      const failure = toExtractionError(error);
      logger.error(`${describeExtractionError(failure)}: ${failure.message}`);
      // Keep whatever was rendered so far; export stays disabled.
      setState((prev) =>
        prev.requestId === id
          ? { ...prev, status: 'error', error: failure, rawText: failure.rawText || prev.rawText }
          : prev,
      );
    }
  }, []);

  const reset = useCallback(() => {
    requestRef.current?.controller.abort();
    requestRef.current = null;
    setState(initialState);
  }, []);

  return { state, submit, reset };
};
