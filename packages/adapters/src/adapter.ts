import type {
  ModelRequest,
  ModelResponse,
  ProviderCapabilities,
} from '@patchfix/shared';
import type { AdapterContext } from './types';

/**
 * A text-generation provider.
 *
 * @example
 * ```typescript
 * class MyAdapter implements ProviderAdapter {
 *   id() { return 'my-adapter'; }
 *   capabilities() { return { supportsStreaming: false }; }
 *   async generate(req, ctx) { return { text: 'response', stopReason: 'stop' }; }
 * }
 * ```
 */
export interface ProviderAdapter {
  /** Unique identifier for this adapter instance. */
  id(): string;
  capabilities(): ProviderCapabilities;
  /**
   * Generate one complete response. Adapters report `stopReason: 'length'`
   * when the output hit `req.maxTokens`.
   */
  generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse>;
}
