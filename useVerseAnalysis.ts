import { useCallback, useRef, useState } from 'react';
import { describeAnalysisError } from './errors';
import { analyzeVerse, type TransportOptions } from './groq';
import type { LoadingState } from './types';

export function useVerseAnalysis(credential: string | undefined, options: TransportOptions = {}) {
  const [state, setState] = useState<LoadingState>({ status: 'idle' });
  const [lastReference, setLastReference] = useState<string | null>(null);
  // One query at a time; calls made while one is pending are dropped.
  const pending = useRef(false);
  const optionsRef = useRef(options);
  optionsRef.current = options;

  const run = useCallback(async (reference: string) => {
    pending.current = true;
    setLastReference(reference);
    setState({ status: 'loading' });

    try {
      const analysis = await analyzeVerse(reference, credential, optionsRef.current);
      setState({ status: 'success', analysis });
    } catch (err) {
      console.error("Verse analysis failed:", err);
      setState({ status: 'error', message: describeAnalysisError(err) });
    } finally {
      pending.current = false;
    }
  }, [credential]);

  const analyze = useCallback(async (input: string) => {
    const reference = input.trim();
    if (!reference || pending.current) return;
    await run(reference);
  }, [run]);

  const retry = useCallback(async () => {
    if (lastReference === null || pending.current) return;
    await run(lastReference);
  }, [lastReference, run]);

  return { state, analyze, retry, loading: state.status === 'loading' };
}
