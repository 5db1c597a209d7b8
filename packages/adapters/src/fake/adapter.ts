import type {
  ModelRequest,
  ModelResponse,
  ProviderCapabilities,
  ProviderConfig,
} from '@patchfix/shared';
import type { ProviderAdapter } from '../adapter';
import type { AdapterContext } from '../types';

export type FakeResponse = string | ModelResponse;

const FENCED_DIFF_RE = /```(?:diff|patch)?\n([\s\S]*?)```/;

/**
 * Offline provider. Plays back scripted responses in order, taken from the
 * constructor or from a `responses` list in the provider config. Once the
 * script runs out it echoes the first fenced diff of the last user message.
 */
export class FakeAdapter implements ProviderAdapter {
  readonly requests: ModelRequest[] = [];
  private readonly script: FakeResponse[];

  constructor(
    private readonly config: ProviderConfig,
    script?: FakeResponse[],
  ) {
    this.script = [...(script ?? scriptFromConfig(config))];
  }

  id(): string {
    return 'fake';
  }

  capabilities(): ProviderCapabilities {
    return { supportsStreaming: false, pricing: this.config.pricing, configFields: ['responses'] };
  }

  async generate(request: ModelRequest, context: AdapterContext): Promise<ModelResponse> {
    const respond = async () => this.respond(request);
    return context.throttle ? context.throttle(respond) : respond();
  }

  private respond(request: ModelRequest): ModelResponse {
    this.requests.push(request);

    const next = this.script.shift();
    if (next !== undefined) {
      return typeof next === 'string' ? { text: next, stopReason: 'stop' } : next;
    }

    const lastUser = [...request.messages].reverse().find((m) => m.role === 'user');
    const match = lastUser ? FENCED_DIFF_RE.exec(lastUser.content) : null;
    return { text: match ? match[1] : '', stopReason: 'stop' };
  }
}

function scriptFromConfig(config: ProviderConfig): string[] {
  const raw: unknown = config.responses;
  if (!Array.isArray(raw)) return [];
  return raw.filter((r): r is string => typeof r === 'string');
}
