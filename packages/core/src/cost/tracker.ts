import type { Config, ProviderConfig, Usage } from '@patchfix/shared';

export interface ProviderUsageStats {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  estimatedCostUsd: number | null;
}

export interface CostSummary {
  providers: Record<string, ProviderUsageStats>;
  total: ProviderUsageStats;
}

export type Pricing = NonNullable<ProviderConfig['pricing']>;

/**
 * USD cost of one response, or null when no price is configured.
 */
export function costOf(usage: Usage, pricing: Pricing | undefined): number | null {
  if (!pricing) return null;
  const input = usage.inputTokens ?? 0;
  const output = usage.outputTokens ?? 0;

  let cost = 0;
  let hasPricing = false;
  if (pricing.inputPerMTokUsd !== undefined) {
    cost += (input / 1_000_000) * pricing.inputPerMTokUsd;
    hasPricing = true;
  }
  if (pricing.outputPerMTokUsd !== undefined) {
    cost += (output / 1_000_000) * pricing.outputPerMTokUsd;
    hasPricing = true;
  }
  return hasPricing ? cost : null;
}

/**
 * Accumulates token usage and estimated cost per provider over a run.
 */
export class CostTracker {
  private usageMap = new Map<string, ProviderUsageStats>();

  constructor(private readonly config: Pick<Config, 'providers'>) {}

  /**
   * Records one response and returns its cost, when priced.
   */
  recordUsage(providerId: string, usage: Usage): number | null {
    const stats = this.getProviderStats(providerId);

    const input = usage.inputTokens ?? 0;
    const output = usage.outputTokens ?? 0;
    stats.inputTokens += input;
    stats.outputTokens += output;
    stats.totalTokens += usage.totalTokens ?? input + output;

    const cost = costOf(usage, this.config.providers?.[providerId]?.pricing);
    if (cost !== null) {
      stats.estimatedCostUsd = (stats.estimatedCostUsd ?? 0) + cost;
    }
    return cost;
  }

  private getProviderStats(providerId: string): ProviderUsageStats {
    let stats = this.usageMap.get(providerId);
    if (!stats) {
      stats = { inputTokens: 0, outputTokens: 0, totalTokens: 0, estimatedCostUsd: null };
      this.usageMap.set(providerId, stats);
    }
    return stats;
  }

  getSummary(): CostSummary {
    const total: ProviderUsageStats = {
      inputTokens: 0,
      outputTokens: 0,
      totalTokens: 0,
      estimatedCostUsd: null,
    };
    const providers: Record<string, ProviderUsageStats> = {};

    for (const [id, stats] of this.usageMap.entries()) {
      providers[id] = { ...stats };
      total.inputTokens += stats.inputTokens;
      total.outputTokens += stats.outputTokens;
      total.totalTokens += stats.totalTokens;
      if (stats.estimatedCostUsd !== null) {
        total.estimatedCostUsd = (total.estimatedCostUsd ?? 0) + stats.estimatedCostUsd;
      }
    }

    return { providers, total };
  }
}
