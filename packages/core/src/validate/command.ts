import { execa } from 'execa';
import type { Logger, ValidationCommand } from '@patchfix/shared';
import type { ValidationInput, ValidationResult, Validator } from './types';

/** Lines of command output kept in a diagnostic */
const OUTPUT_TAIL_LINES = 200;

export interface CommandValidatorOptions {
  /** Default per-command timeout */
  timeoutMs: number;
  logger?: Logger;
}

function tail(output: string, lines: number): string {
  const all = output.trimEnd().split('\n');
  return all.slice(Math.max(0, all.length - lines)).join('\n');
}

/**
 * Runs the configured shell commands in the checkout, in order. The first
 * command that fails or times out fails validation, with the tail of its
 * output as the diagnostic.
 */
export class CommandValidator implements Validator {
  readonly name = 'command';

  constructor(
    private readonly commands: ValidationCommand[],
    private readonly options: CommandValidatorOptions,
  ) {}

  async validate({ repoRoot, signal }: ValidationInput): Promise<ValidationResult> {
    for (const cmd of this.commands) {
      const timeout = cmd.timeoutMs ?? this.options.timeoutMs;
      await this.options.logger?.debug(`validation: running ${cmd.name}: ${cmd.command}`);

      const result = await execa(cmd.command, {
        shell: true,
        cwd: repoRoot,
        timeout,
        reject: false,
        all: true,
        signal,
      });

      if (!result.failed) continue;

      const reason = result.timedOut
        ? `timed out after ${timeout}ms`
        : `exited with code ${result.exitCode}`;
      const output = tail(result.all ?? '', OUTPUT_TAIL_LINES);
      return {
        passed: false,
        validator: `${this.name}:${cmd.name}`,
        diagnostic: output === '' ? `${cmd.name} ${reason}` : `${cmd.name} ${reason}:\n${output}`,
      };
    }

    return { passed: true, validator: this.name };
  }
}
