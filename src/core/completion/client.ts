import { SYSTEM_INSTRUCTION } from '../../templates/analysis-prompt.js';
import type { Logger } from '../../utils/logger.js';
import { DecodeError, MissingCredentialError, TransportError, UpstreamError, describeError } from '../errors.js';
import {
  API_KEY_ENV,
  ChatResponseSchema,
  type ChatRequest,
  type Completer,
  type CompletionConfig,
  type FetchLike,
} from './types.js';

/**
 * Single-shot chat-completion client. One request per `complete` call,
 * no retries, no streaming.
 */
export class CompletionClient implements Completer {
  constructor(
    private readonly config: CompletionConfig,
    private readonly fetchImpl: FetchLike = (url, init) => fetch(url, init),
    private readonly logger?: Logger,
  ) {}

  buildRequest(prompt: string): ChatRequest {
    return {
      model: this.config.model,
      messages: [
        { role: 'system', content: SYSTEM_INSTRUCTION },
        { role: 'user', content: prompt },
      ],
    };
  }

  async complete(prompt: string): Promise<string> {
    const apiKey = this.config.apiKey?.trim();
    if (!apiKey) throw new MissingCredentialError(this.config.apiKeyVariable ?? API_KEY_ENV);

    const { endpoint, timeoutMs } = this.config;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    const started = Date.now();

    let status: number;
    let ok: boolean;
    let body: string;
    try {
      const response = await this.fetchImpl(endpoint, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(this.buildRequest(prompt)),
        signal: controller.signal,
      });
      status = response.status;
      ok = response.ok;
      body = await response.text();
    } catch (err) {
      if (controller.signal.aborted) {
        throw new TransportError(`Request to ${endpoint} timed out after ${timeoutMs}ms`, { cause: err });
      }
      throw new TransportError(`Request to ${endpoint} failed: ${describeError(err)}`, { cause: err });
    } finally {
      clearTimeout(timeout);
    }

    this.logger?.debug('completion response', { status, ms: Date.now() - started, bytes: body.length });

    if (!ok) throw new UpstreamError(status, body);
    return decodeChatResponse(body);
  }
}

/**
 * Extract the first choice's message content from a raw response body.
 */
export function decodeChatResponse(raw: string): string {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new DecodeError(`Response body is not valid JSON: ${describeError(err)}`, { cause: err });
  }

  const parsed = ChatResponseSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new DecodeError(`Unexpected response shape${where}: ${issue?.message ?? 'invalid'}`, { cause: parsed.error });
  }

  const [first] = parsed.data.choices;
  if (!first) throw new DecodeError('Response contained no choices');
  return first.message.content;
}
