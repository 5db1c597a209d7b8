import type { ParsedPatch } from '@patchfix/shared';

export interface OutputBudgetOptions {
  minOutputTokens: number;
  maxOutputTokens: number;
  /** Ceiling the provider itself accepts */
  providerMaxOutputTokens?: number;
}

/** Added per file entry on top of the size-based estimate */
export const TOKENS_PER_FILE = 512;

/**
 * Output tokens to request for a corrected patch: two thirds of the patch's
 * byte length plus a fixed allowance per file, clamped to the configured
 * bounds and to what the provider accepts.
 */
export function outputBudget(patch: ParsedPatch, options: OutputBudgetOptions): number {
  const bytes = Buffer.byteLength(patch.text, 'utf8');
  const estimate = Math.floor(bytes / 3) * 2 + patch.files.length * TOKENS_PER_FILE;
  const clamped = Math.min(options.maxOutputTokens, Math.max(options.minOutputTokens, estimate));
  return options.providerMaxOutputTokens === undefined
    ? clamped
    : Math.min(clamped, options.providerMaxOutputTokens);
}
