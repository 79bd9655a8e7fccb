import { submitPost } from '../api';
import type { Dispatch, Effect, SubmitResult } from '../types';

export interface EffectRunnerDeps {
  submitPost: (content: string) => Promise<void>;
  /** Diagnostic sink for decode errors */
  logError: (message: string) => void;
  /** Diagnostic sink for failed submissions */
  logWarning: (message: string) => void;
}

export type EffectRunner = (effect: Effect, dispatch: Dispatch) => Promise<void>;

const describeError = (err: unknown): string => (err instanceof Error ? err.message : String(err));

export const defaultEffectDeps: EffectRunnerDeps = {
  submitPost,
  logError: (message) => console.error(`[Feeds] ${message}`),
  logWarning: (message) => console.warn(`[Posts] ${message}`),
};

export const createEffectRunner = (deps: EffectRunnerDeps = defaultEffectDeps): EffectRunner =>
  async (effect, dispatch) => {
    switch (effect.type) {
      case 'SEND_POST': {
        let result: SubmitResult;
        try {
          await deps.submitPost(effect.content);
          result = { ok: true };
        } catch (err) {
          const error = describeError(err);
          deps.logWarning(`Failed to submit post: ${error}`);
          result = { ok: false, error };
        }
        // exactly once per request, whatever the outcome
        dispatch({ type: 'SUBMIT_COMPLETED', result });
        return;
      }

      case 'LOG_ERROR':
        deps.logError(effect.message);
        return;
    }
  };
