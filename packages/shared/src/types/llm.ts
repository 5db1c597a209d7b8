/**
 * A message in a conversation with a text-generation provider.
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Request payload for generating a model response.
 *
 * @example
 * ```typescript
 * const request: ModelRequest = {
 *   messages: [{ role: 'user', content: prompt }],
 *   maxTokens: 16384,
 *   temperature: 0,
 * };
 * ```
 */
export interface ModelRequest {
  messages: ChatMessage[];
  /** Maximum tokens to generate in the response */
  maxTokens?: number;
  /** Sampling temperature (0-2, higher = more random) */
  temperature?: number;
  /** Additional metadata to pass through */
  metadata?: Record<string, unknown>;
}

/**
 * Token usage statistics from a model response.
 */
export interface Usage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

/**
 * Why the provider stopped generating. `length` means the output hit the
 * token ceiling.
 */
export type StopReason = 'stop' | 'length' | 'other';

export interface ModelResponse {
  text?: string;
  usage?: Usage;
  stopReason?: StopReason;
  /** Raw provider-specific response data */
  raw?: unknown;
}

/**
 * Events emitted during streaming responses.
 */
/**
 * Describes what a provider adapter can do.
 */
export interface ProviderCapabilities {
  supportsStreaming: boolean;
  /** Maximum context window size in tokens */
  maxContextTokens?: number;
  /** Largest output the provider accepts for `maxTokens` */
  maxOutputTokens?: number;
  /** Pricing information per million tokens */
  pricing?: {
    inputPerMTokUsd?: number;
    outputPerMTokUsd?: number;
  };
  /** Provider-specific config keys the adapter reads */
  configFields?: string[];
}

export interface ConfigValidationIssue {
  field: string;
  message: string;
  code: 'MISSING_REQUIRED' | 'INVALID_VALUE' | 'UNKNOWN_FIELD';
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: ConfigValidationIssue[];
  warnings: ConfigValidationIssue[];
}
