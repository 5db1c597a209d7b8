import {
  capturePristine,
  parsePatch,
  touchedPaths,
  type ApplicationEngine,
  type WorkingTreeReverter,
} from '@patchfix/repo';
import type { OutcomeMap, PatchContext } from '@patchfix/shared';
import type { ContextBuilder } from '../context';
import { complexityScore, type ComplexityScore } from './complexity';

export interface InspectDeps {
  engine: ApplicationEngine;
  reverter: WorkingTreeReverter;
  contextBuilder: ContextBuilder;
}

export interface InspectReport {
  outcomes: OutcomeMap;
  complexity: ComplexityScore;
  /** The context the first attempt would see */
  context: PatchContext;
  /** Raw output of the apply facility */
  output: string;
}

/**
 * Applies a patch once, reverts, and reports what a reconciliation would
 * start from. The tree is left as it was found.
 */
export async function inspectPatch(
  deps: InspectDeps,
  repoRoot: string,
  patchText: string,
): Promise<InspectReport> {
  const patch = parsePatch(patchText);
  const snapshot = await capturePristine(repoRoot, touchedPaths(patch));

  const result = await deps.engine
    .run(repoRoot, patch, snapshot)
    .finally(() => deps.reverter.revert(repoRoot, snapshot));

  return {
    outcomes: result.outcomes,
    complexity: complexityScore(result.outcomes),
    context: deps.contextBuilder.build({
      attempt: 1,
      patch,
      outcomes: result.outcomes,
      snapshot: result.snapshot,
    }),
    output: result.output,
  };
}
