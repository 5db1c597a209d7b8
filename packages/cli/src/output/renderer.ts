import pc from 'picocolors';
import Table from 'cli-table3';
import type { ComplexityScore, CostSummary, SeriesEntry, SeriesReport } from '@patchfix/core';
import { AppError, AttemptsExhaustedError, type FileOutcome, type OutcomeMap } from '@patchfix/shared';

export interface ErrorOutput {
  code: string;
  message: string;
  details?: Record<string, unknown> | string;
  /** Failure signal of the last attempt, when the budget ran out */
  lastFailureSignal?: string;
  /** Final candidate patch, kept for inspection */
  lastCandidate?: string;
}

export interface PatchOutput {
  name: string;
  status: SeriesEntry['status'];
  attempts?: number;
  outputPath?: string;
  costUsd?: number;
  error?: ErrorOutput;
}

export interface FixOutput {
  status: 'SUCCESS' | 'FAILURE';
  runId: string;
  repoRoot: string;
  patches: PatchOutput[];
  cost: CostSummary;
}

export interface FileOutcomeOutput {
  path: string;
  outcome: FileOutcome['kind'];
  offsetLines?: number;
  rejectedHunks?: number;
  diagnostics?: string[];
}

export interface InspectOutput {
  patch: string;
  files: FileOutcomeOutput[];
  complexity: ComplexityScore;
  /** Prompt the first attempt would send, when requested */
  prompt?: string;
}

export function errorOutput(error: unknown): ErrorOutput {
  if (error instanceof AttemptsExhaustedError) {
    return {
      code: error.code,
      message: error.message,
      lastFailureSignal: error.lastFailureSignal,
      lastCandidate: error.lastCandidate,
    };
  }
  if (error instanceof AppError) {
    return { code: error.code, message: error.message, details: error.details };
  }
  return { code: 'UnknownError', message: error instanceof Error ? error.message : String(error) };
}

export function toFixOutput(
  report: SeriesReport,
  meta: { runId: string; repoRoot: string; cost: CostSummary },
): FixOutput {
  const patches = report.entries.map((entry): PatchOutput => {
    switch (entry.status) {
      case 'success':
      case 'no-change':
        return {
          name: entry.name,
          status: entry.status,
          attempts: entry.attempts,
          outputPath: entry.outputPath,
          costUsd: entry.costUsd,
        };
      case 'failed':
        return { name: entry.name, status: entry.status, error: errorOutput(entry.error) };
      case 'skipped':
        return { name: entry.name, status: entry.status };
    }
  });
  return { status: report.succeeded ? 'SUCCESS' : 'FAILURE', ...meta, patches };
}

export function toInspectOutput(patch: string, outcomes: OutcomeMap, complexity: ComplexityScore): InspectOutput {
  const files = [...outcomes].map(([path, outcome]): FileOutcomeOutput => {
    switch (outcome.kind) {
      case 'applied-clean':
        return { path, outcome: outcome.kind };
      case 'applied-with-offset':
        return { path, outcome: outcome.kind, offsetLines: outcome.offsetLines };
      case 'rejected':
        return {
          path,
          outcome: outcome.kind,
          rejectedHunks: outcome.rejectedFragments.length,
          diagnostics: outcome.diagnostics,
        };
    }
  });
  return { patch, files, complexity };
}

function describeEntry(entry: PatchOutput): string {
  switch (entry.status) {
    case 'success': {
      const target = entry.outputPath ? ` -> ${entry.outputPath}` : '';
      return `${pc.green('✔')} ${entry.name}: corrected after ${entry.attempts ?? 0} attempt(s)${target}`;
    }
    case 'no-change': {
      const target = entry.outputPath ? ` -> ${entry.outputPath}` : '';
      return `${pc.green('✔')} ${entry.name}: applies cleanly${target}`;
    }
    case 'failed':
      return `${pc.red('✖')} ${entry.name}: ${entry.error?.message ?? 'failed'}`;
    case 'skipped':
      return `${pc.gray('-')} ${entry.name}: skipped`;
  }
}

function outcomeDetail(file: FileOutcomeOutput): string {
  if (file.outcome === 'applied-with-offset') return `offset ${file.offsetLines ?? 0} lines`;
  if (file.outcome === 'rejected') return `${file.rejectedHunks ?? 0} hunk(s) rejected`;
  return '';
}

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  renderFix(data: FixOutput): void {
    if (this.isJson) {
      console.log(JSON.stringify(data, null, 2));
      return;
    }

    if (data.status === 'SUCCESS') {
      console.log(`\n${pc.green('✅ All patches reconciled.')}`);
    } else {
      console.log(`\n${pc.red('❌ Reconciliation stopped.')}`);
    }

    console.log(pc.bold('\nPatches:'));
    for (const entry of data.patches) {
      console.log(`  ${describeEntry(entry)}`);
    }

    const failed = data.patches.find((p) => p.status === 'failed');
    if (failed?.error?.lastFailureSignal) {
      console.log(pc.bold('\nLast failure:'));
      for (const line of failed.error.lastFailureSignal.split('\n')) {
        console.log(`  ${line}`);
      }
    }
    if (failed?.error?.lastCandidate) {
      console.log(pc.bold('\nLast candidate:'));
      console.log(failed.error.lastCandidate.trimEnd());
    }

    this.renderCost(data.cost);

    if (data.status === 'FAILURE') {
      console.log(pc.bold('\nNext steps:'));
      console.log(`  - Raise the attempt budget with the ${pc.cyan('--max-attempts')} flag.`);
      console.log(`  - See what the generator is given with ${pc.cyan(`patchfix inspect ${failed?.name ?? '<patch>'}`)}.`);
    }
  }

  renderInspect(data: InspectOutput): void {
    if (this.isJson) {
      console.log(JSON.stringify(data, null, 2));
      return;
    }

    const table = new Table({ head: ['File', 'Outcome', 'Detail'] });
    for (const file of data.files) {
      table.push([file.path, file.outcome, outcomeDetail(file)]);
    }
    console.log(table.toString());

    const { score, rejectedFiles, failedHunks } = data.complexity;
    console.log(`Complexity: ${score} (${rejectedFiles} rejected file(s), ${failedHunks} failed hunk(s))`);

    for (const file of data.files) {
      for (const diagnostic of file.diagnostics ?? []) {
        console.log(pc.gray(`  ${file.path}: ${diagnostic}`));
      }
    }

    if (data.prompt !== undefined) {
      console.log(pc.bold('\nPrompt:'));
      console.log(data.prompt);
    }
  }

  private renderCost(cost: CostSummary): void {
    const { total } = cost;
    if (total.totalTokens === 0 && total.estimatedCostUsd === null) return;
    console.log(pc.bold('\nCost:'));
    const costStr = typeof total.estimatedCostUsd === 'number' ? ` ($${total.estimatedCostUsd.toFixed(4)})` : '';
    console.log(`  - Total: ${total.totalTokens} tokens${costStr}`);
  }

  log(message: string): void {
    if (this.isJson) {
      // JSON mode should not have logs
    } else {
      console.log(pc.gray(message));
    }
  }

  error(error: unknown, verbose = false): void {
    if (this.isJson) {
      console.log(JSON.stringify({ error: errorOutput(error) }));
      return;
    }
    console.error(pc.red(`❌ Error: ${error instanceof Error ? error.message : String(error)}`));
    if (error instanceof AppError && error.details) {
      console.error(
        `  Details: ${typeof error.details === 'string' ? error.details : JSON.stringify(error.details, null, 2)}`,
      );
    }
    if (verbose && error instanceof Error && error.stack) {
      console.error(`\nStack Trace:\n${error.stack}`);
    } else {
      console.error(`\nFor more details, run with the --verbose flag.`);
    }
  }
}
