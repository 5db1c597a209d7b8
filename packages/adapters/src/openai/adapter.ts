import OpenAI, { APIConnectionTimeoutError, APIError } from 'openai';
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

export class OpenAIAdapter extends BaseProviderAdapter implements ProviderAdapter {
  private readonly client: OpenAI;
  private readonly model: string;

  protected readonly errorConfig: ErrorTypeConfig = {
    isAPIError: (error: unknown): error is APIErrorLike => error instanceof APIError,
    isTimeoutError: (error: unknown) => error instanceof APIConnectionTimeoutError,
  };

  constructor(private readonly config: ProviderConfig) {
    super();
    const apiKey = config.api_key || (config.api_key_env && process.env[config.api_key_env]);
    if (!apiKey) {
      throw new ConfigError(
        `Missing API Key for OpenAI provider. Checked config.api_key and env var ${config.api_key_env}`,
      );
    }
    this.model = config.model;
    this.client = new OpenAI({
      apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      maxRetries: 0,
    });
  }

  id(): string {
    return 'openai';
  }

  capabilities(): ProviderCapabilities {
    return {
      supportsStreaming: false,
      pricing: this.config.pricing,
    };
  }

  async generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    return executeProviderRequest(ctx, 'openai', this.model, async (signal) => {
      try {
        const completion = await this.client.chat.completions.create(
          {
            model: this.model,
            messages: req.messages.map(mapMessage),
            max_tokens: req.maxTokens,
            temperature: req.temperature ?? 0,
          },
          { signal },
        );

        const choice = completion.choices[0];
        const usage = completion.usage
          ? {
              inputTokens: completion.usage.prompt_tokens,
              outputTokens: completion.usage.completion_tokens,
              totalTokens: completion.usage.total_tokens,
            }
          : undefined;

        return {
          text: choice?.message.content ?? undefined,
          usage,
          stopReason: mapFinishReason(choice?.finish_reason),
          raw: completion,
        };
      } catch (error) {
        throw this.mapError(error);
      }
    });
  }
}

function mapMessage(m: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (m.role) {
    case 'system':
      return { role: 'system', content: m.content };
    case 'assistant':
      return { role: 'assistant', content: m.content };
    case 'user':
      return { role: 'user', content: m.content };
  }
}

function mapFinishReason(reason: string | null | undefined): StopReason {
  if (reason === 'length') return 'length';
  if (reason === 'stop') return 'stop';
  return 'other';
}
