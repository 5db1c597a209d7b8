import type { AdapterContext, ProviderAdapter } from '@patchfix/adapters';
import {
  FixGenerationError,
  MalformedPatchError,
  type GeneratorConfig,
  type Logger,
  type ModelRequest,
  type ModelResponse,
  type ParsedPatch,
  type PatchContext,
  type Usage,
} from '@patchfix/shared';
import { ensureTrailingNewline } from '@patchfix/repo';
import type { CostTracker } from '../cost/tracker';
import { FIX_SYSTEM_PROMPT, renderFixPrompt } from '../prompt';
import type { IntervalGate } from '../rate/interval-gate';
import { outputBudget } from './budget';
import { extractCandidatePatch } from './extract';
import { preserveMetadata, type PreservedPatch } from './metadata';

export interface FixCandidate {
  /** Complete replacement patch, metadata header included */
  patchText: string;
  usage?: Usage;
  costUsd?: number;
  /** Output budget the candidate was requested with */
  maxTokens?: number;
}

/**
 * Produces a candidate patch from a reconciliation context. Any failure
 * surfaces as FixGenerationError, which spends one attempt.
 */
export interface FixGenerator {
  generate(context: PatchContext, signal?: AbortSignal): Promise<FixCandidate>;
  /** Output budget that `generate` would request for this patch */
  budgetFor?(patch: ParsedPatch): number;
}

export interface ProviderFixGeneratorOptions {
  adapter: ProviderAdapter;
  /** Key of the provider in config, used for pricing */
  providerId: string;
  gate: IntervalGate;
  config: Pick<GeneratorConfig, 'timeoutMs' | 'minOutputTokens' | 'maxOutputTokens' | 'temperature'>;
  logger: Logger;
  runId: string;
  repoRoot?: string;
  costTracker?: CostTracker;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Fix generator backed by a text-generation provider.
 */
export class ProviderFixGenerator implements FixGenerator {
  constructor(private readonly options: ProviderFixGeneratorOptions) {}

  budgetFor(patch: ParsedPatch): number {
    const { config, adapter } = this.options;
    return outputBudget(patch, {
      minOutputTokens: config.minOutputTokens,
      maxOutputTokens: config.maxOutputTokens,
      providerMaxOutputTokens: adapter.capabilities().maxOutputTokens,
    });
  }

  async generate(context: PatchContext, signal?: AbortSignal): Promise<FixCandidate> {
    const { adapter, gate, config, logger } = this.options;
    const maxTokens = this.budgetFor(context.patch);
    const request: ModelRequest = {
      messages: [
        { role: 'system', content: FIX_SYSTEM_PROMPT },
        { role: 'user', content: renderFixPrompt(context) },
      ],
      maxTokens,
      temperature: config.temperature,
    };
    const adapterContext: AdapterContext = {
      runId: this.options.runId,
      logger,
      repoRoot: this.options.repoRoot,
      abortSignal: signal,
      timeoutMs: config.timeoutMs,
      // Each provider call, retries included, waits its turn at the gate.
      throttle: (call) => gate.run(call, signal),
    };

    const response: ModelResponse = await adapter
      .generate(request, adapterContext)
      .catch((error: unknown) => {
        if (signal?.aborted) throw error;
        throw new FixGenerationError(`Provider ${adapter.id()} failed: ${errorMessage(error)}`, {
          cause: error,
        });
      });

    const costUsd =
      response.usage && this.options.costTracker
        ? this.options.costTracker.recordUsage(this.options.providerId, response.usage) ?? undefined
        : undefined;

    const outputTokens = response.usage?.outputTokens;
    if (response.stopReason === 'length' || (outputTokens !== undefined && outputTokens >= maxTokens)) {
      throw new FixGenerationError(
        `Response truncated at ${outputTokens ?? maxTokens} tokens (limit ${maxTokens})`,
        { details: { maxTokens, outputTokens } },
      );
    }

    const extracted = extractCandidatePatch(response.text);
    if (extracted === null) {
      throw new FixGenerationError('No patch found in provider response');
    }

    let preserved: PreservedPatch;
    try {
      preserved = preserveMetadata(context.patch, extracted);
    } catch (error) {
      if (error instanceof MalformedPatchError) {
        throw new FixGenerationError(`Candidate is not a valid patch: ${error.message}`, { cause: error });
      }
      throw error;
    }

    if (preserved.parsed.files.length < context.patch.files.length) {
      throw new FixGenerationError(
        `Candidate covers ${preserved.parsed.files.length} of ${context.patch.files.length} files; output was likely cut off`,
      );
    }
    if (preserved.restored) {
      await logger.warn('Candidate metadata header differed from the original; restored it');
    }

    return {
      patchText: ensureTrailingNewline(preserved.text),
      usage: response.usage,
      costUsd,
      maxTokens,
    };
  }
}
