import { logger } from '../shared/logger.js';
import { DrafterError } from '../shared/errors.js';
import type { Config } from '../shared/config.js';

export interface LlmMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LlmResponse {
  content: string;
  model: string;
  token_count: number;
}

// OpenAI-compatible chat completions response shape (partial)
interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: string | null } }>;
  model?: string;
  usage?: { total_tokens?: number };
}

// OpenAI-compatible /models response shape (partial)
interface ModelListResponse {
  data?: Array<{ id?: string }>;
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isChatCompletionResponse(value: unknown): value is ChatCompletionResponse {
  return isJsonObject(value);
}

function isModelListResponse(value: unknown): value is ModelListResponse {
  return isJsonObject(value) && (value['data'] === undefined || Array.isArray(value['data']));
}

export interface AvailabilityStatus {
  ok: boolean;
  message: string;
}

/**
 * Minimal client for any OpenAI-compatible chat completions endpoint
 * (Ollama's /v1, OpenAI, vLLM, ...).
 */
export class LlmClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly timeoutMs: number;
  private readonly maxConcurrent: number;
  private activeRequests = 0;

  constructor(config: Config['drafting']) {
    this.baseUrl = config.base_url;
    this.apiKey = config.api_key;
    this.model = config.model;
    this.maxTokens = config.max_tokens;
    this.temperature = config.temperature;
    this.timeoutMs = config.timeout_ms;
    this.maxConcurrent = config.max_concurrent;
  }

  async chat(messages: LlmMessage[]): Promise<LlmResponse> {
    while (this.activeRequests >= this.maxConcurrent) {
      await new Promise((resolve) => setTimeout(resolve, 100));
    }

    this.activeRequests++;
    try {
      return await this.doRequest(messages);
    } finally {
      this.activeRequests--;
    }
  }

  private async doRequest(messages: LlmMessage[]): Promise<LlmResponse> {
    const url = `${this.baseUrl.replace(/\/+$/, '')}/chat/completions`;

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) headers['Authorization'] = `Bearer ${this.apiKey}`;

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          model: this.model,
          messages,
          max_tokens: this.maxTokens,
          temperature: this.temperature,
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      if (err instanceof Error && err.name === 'TimeoutError') {
        throw new DrafterError(`LLM request timed out after ${this.timeoutMs}ms`, { url });
      }
      throw new DrafterError(`LLM request failed: ${err instanceof Error ? err.message : String(err)}`, {
        url,
        model: this.model,
      });
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new DrafterError(`LLM API error: ${response.status} ${response.statusText}`, {
        status: response.status,
        body: text.slice(0, 500),
        url,
      });
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch {
      throw new DrafterError('LLM response is not valid JSON', { url });
    }

    if (!isChatCompletionResponse(data)) {
      throw new DrafterError('LLM response has an unexpected shape', { url });
    }

    const content = data.choices?.[0]?.message?.content;
    if (!content) {
      throw new DrafterError('LLM returned empty content', { response: JSON.stringify(data).slice(0, 200) });
    }

    const tokenCount = data.usage?.total_tokens ?? 0;
    logger.debug({ model: data.model ?? this.model, tokens: tokenCount }, 'LLM call completed');

    return {
      content,
      model: data.model ?? this.model,
      token_count: tokenCount,
    };
  }

  isConfigured(): boolean {
    return this.baseUrl.length > 0 && this.model.length > 0;
  }

  /**
   * Check that the endpoint answers GET /models and lists the configured model.
   */
  async checkAvailable(): Promise<AvailabilityStatus> {
    if (!this.isConfigured()) {
      return { ok: false, message: 'Card drafter is not configured (drafting.base_url / drafting.model)' };
    }

    const url = `${this.baseUrl.replace(/\/+$/, '')}/models`;
    const headers: Record<string, string> = {};
    if (this.apiKey) headers['Authorization'] = `Bearer ${this.apiKey}`;

    try {
      const response = await fetch(url, { headers, signal: AbortSignal.timeout(5000) });
      if (!response.ok) {
        return { ok: false, message: `LLM API error: ${response.status} ${response.statusText}` };
      }
      const data: unknown = await response.json();
      const ids = isModelListResponse(data) ? (data.data ?? []).map((m) => m.id ?? '') : [];
      if (ids.some((id) => id === this.model || id.startsWith(`${this.model}:`))) {
        return { ok: true, message: `LLM reachable with model ${this.model}` };
      }
      return { ok: false, message: `LLM reachable but model '${this.model}' not found. Available: ${ids.join(', ')}` };
    } catch (err) {
      return { ok: false, message: `LLM not reachable at ${this.baseUrl}: ${err instanceof Error ? err.message : String(err)}` };
    }
  }
}
