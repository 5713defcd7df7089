import { GoogleGenAI } from '@google/genai';
import type { AppConfig } from '../../shared/config';
import type { Logger } from '../obs/logger';
import { abortable, sleep } from '../utils/async';
import { Semaphore } from '../utils/concurrency';

export interface GenerateOptions {
  responseMimeType?: string;
  signal?: AbortSignal;
}

/** The one capability the advanced categorizer needs from a model provider. */
export interface TextGenerator {
  readonly model: string;
  generate: (prompt: string, options?: GenerateOptions) => Promise<string>;
}

type KeyState = {
  client: GoogleGenAI;
  requestTimestamps: number[];
  gate: Semaphore;
};

const WINDOW_MS = 60_000;
const stateByApiKey = new Map<string, KeyState>();

const getStateForApiKey = (apiKey: string): KeyState => {
  const existing = stateByApiKey.get(apiKey);
  if (existing) return existing;
  const created: KeyState = {
    client: new GoogleGenAI({ apiKey }),
    requestTimestamps: [],
    gate: new Semaphore(1),
  };
  stateByApiKey.set(apiKey, created);
  return created;
};

const statusOf = (error: unknown): number | null => {
  if (typeof error !== 'object' || error === null || !('status' in error)) return null;
  return typeof error.status === 'number' ? error.status : null;
};

export const isTransientError = (error: unknown): boolean => {
  const status = statusOf(error);
  if (status === 429 || status === 503) {
    return true;
  }
  const message = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();
  return /quota|unavailable|overload|temporar/.test(message);
};

/** Waits until the sliding one-minute window has room, then reserves a slot. */
const reserveSlot = async (state: KeyState, rpm: number, signal?: AbortSignal): Promise<void> => {
  for (;;) {
    const waitMs = await state.gate.run(async () => {
      const now = Date.now();
      while (state.requestTimestamps.length > 0 && now - state.requestTimestamps[0] > WINDOW_MS) {
        state.requestTimestamps.shift();
      }
      if (state.requestTimestamps.length < rpm) {
        state.requestTimestamps.push(now);
        return 0;
      }
      return Math.max(0, state.requestTimestamps[0] + WINDOW_MS - now);
    }, signal);
    if (waitMs <= 0) return;
    await sleep(waitMs, signal);
  }
};

export const createGeminiTextGenerator = (settings: AppConfig['advanced'], logger: Logger): TextGenerator => {
  const apiKey = settings.apiKey;
  if (!apiKey) {
    throw new Error('GEMINI_API_KEY missing');
  }
  const state = getStateForApiKey(apiKey);
  const log = logger.child({ component: 'genai', model: settings.model });

  const generate = async (prompt: string, options: GenerateOptions = {}): Promise<string> => {
    let attempt = 0;
    for (;;) {
      attempt += 1;
      try {
        await reserveSlot(state, settings.requestsPerMinute, options.signal);
        const request = state.client.models.generateContent({
          model: settings.model,
          contents: [{ role: 'user', parts: [{ text: prompt }] }],
          config: {
            temperature: settings.temperature,
            maxOutputTokens: settings.maxOutputTokens,
            responseMimeType: options.responseMimeType,
            abortSignal: options.signal,
          },
        });
        const response = options.signal ? await abortable(request, options.signal) : await request;
        const text = response.text;
        if (!text || !text.trim()) {
          throw new Error('Empty response from model');
        }
        return text;
      } catch (error) {
        if (options.signal?.aborted || !isTransientError(error) || attempt >= settings.maxAttempts) {
          throw error;
        }
        const backoffMs = Math.min(10_000, 500 * 2 ** attempt);
        log.warn('Transient model error, retrying', {
          attempt,
          backoffMs,
          status: statusOf(error),
          error: error instanceof Error ? error.message : String(error),
        });
        await sleep(backoffMs, options.signal);
      }
    }
  };

  return { model: settings.model, generate };
};
