import { z } from 'zod';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
}

export const ChatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        role: z.string().optional(),
        content: z.string(),
      }),
    }),
  ),
});

export const DEFAULT_ENDPOINT = 'https://api.openai.com/v1/chat/completions';
export const DEFAULT_MODEL = 'gpt-4';
export const DEFAULT_TIMEOUT_MS = 60_000;
export const API_KEY_ENV = 'OPENAI_API_KEY';

export interface CompletionConfig {
  /** Bearer credential. Blank counts as missing. */
  apiKey?: string;
  model: string;
  endpoint: string;
  timeoutMs: number;
  /** Name of the variable the key comes from, for error messages. */
  apiKeyVariable?: string;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/** Anything that turns a prompt into a reply; the analyzer only needs this. */
export interface Completer {
  complete(prompt: string): Promise<string>;
}
