import Anthropic from '@anthropic-ai/sdk';
import {
  ConfigError,
  type ChatMessage,
  type ModelRequest,
  type ModelResponse,
  type ProviderCapabilities,
  type ProviderConfig,
  type StopReason,
} from '@patchfix/shared';
import type { ProviderAdapter } from '../adapter';
import { BaseProviderAdapter, type APIErrorLike, type ErrorTypeConfig } from '../base-adapter';
import { executeProviderRequest } from '../common';
import type { AdapterContext } from '../types';

const DEFAULT_MAX_TOKENS = 8192;

export class AnthropicAdapter extends BaseProviderAdapter implements ProviderAdapter {
  private readonly client: Anthropic;
  private readonly model: string;

  protected readonly errorConfig: ErrorTypeConfig = {
    isAPIError: (error: unknown): error is APIErrorLike => error instanceof Anthropic.APIError,
    isTimeoutError: (error: unknown) => error instanceof Anthropic.APIConnectionTimeoutError,
    retryAfter: (error: unknown) => {
      if (!(error instanceof Anthropic.APIError)) return undefined;
      const header = error.headers?.['retry-after'];
      const seconds = header ? Number(header) : NaN;
      return Number.isFinite(seconds) ? seconds : undefined;
    },
  };

  constructor(private readonly config: ProviderConfig) {
    super();
    const apiKey = config.api_key || (config.api_key_env && process.env[config.api_key_env]);
    if (!apiKey) {
      throw new ConfigError(
        `Missing API Key for Anthropic provider. Checked config.api_key and env var ${config.api_key_env}`,
      );
    }
    this.model = config.model;
    this.client = new Anthropic({
      apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      maxRetries: 0,
    });
  }

  id(): string {
    return 'anthropic';
  }

  capabilities(): ProviderCapabilities {
    return {
      supportsStreaming: false,
      maxContextTokens: 200_000,
      maxOutputTokens: 128_000,
      pricing: this.config.pricing,
    };
  }

  async generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    return executeProviderRequest(ctx, 'anthropic', this.model, async (signal) => {
      try {
        const { system, messages } = mapMessages(req.messages);

        const response = await this.client.messages.create(
          {
            model: this.model,
            max_tokens: req.maxTokens ?? DEFAULT_MAX_TOKENS,
            system,
            messages,
            temperature: req.temperature,
          },
          { signal },
        );

        const text = response.content
          .filter((b): b is Anthropic.TextBlock => b.type === 'text')
          .map((b) => b.text)
          .join('');

        return {
          text,
          usage: {
            inputTokens: response.usage.input_tokens,
            outputTokens: response.usage.output_tokens,
            totalTokens: response.usage.input_tokens + response.usage.output_tokens,
          },
          stopReason: mapStopReason(response.stop_reason),
          raw: response,
        };
      } catch (error) {
        throw this.mapError(error);
      }
    });
  }
}

function mapMessages(messages: ChatMessage[]): {
  system?: string;
  messages: Anthropic.MessageParam[];
} {
  let system: string | undefined;
  const mapped: Anthropic.MessageParam[] = [];

  for (const m of messages) {
    if (m.role === 'system') {
      system = system ? `${system}\n${m.content}` : m.content;
    } else {
      mapped.push({ role: m.role, content: m.content });
    }
  }

  return { system, messages: mapped };
}

function mapStopReason(reason: string | null): StopReason {
  if (reason === 'max_tokens') return 'length';
  if (reason === 'end_turn' || reason === 'stop_sequence') return 'stop';
  return 'other';
}
