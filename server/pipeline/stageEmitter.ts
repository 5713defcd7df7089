import type { StageEvent, StageName, StageStatus } from '../../shared/types';

export type StageEventSender = (event: StageEvent) => void;

const nowIso = () => new Date().toISOString();

/** Binds stage events to one submission; a throwing listener never breaks ingestion. */
export const makeStageEmitter = (submissionId: string, send: StageEventSender | undefined, onListenerError: (error: unknown) => void) => {
  const emit = (stage: StageName, status: StageStatus, payload?: { message?: string; data?: unknown }) => {
    if (!send) return;
    try {
      send({
        submissionId,
        stage,
        status,
        message: payload?.message,
        data: payload?.data,
        ts: nowIso(),
      });
    } catch (error) {
      onListenerError(error);
    }
  };

  return {
    start: (stage: StageName, payload?: { message?: string; data?: unknown }) => emit(stage, 'start', payload),
    success: (stage: StageName, payload?: { message?: string; data?: unknown }) => emit(stage, 'success', payload),
    failure: (stage: StageName, error: unknown, data?: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      emit(stage, 'failure', { message, data: data ?? { error: message } });
    },
  };
};
