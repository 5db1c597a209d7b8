import type { Logger, ValidationConfig } from '@patchfix/shared';
import { CommandValidator } from './command';
import { FileCoverageValidator, MetadataValidator, SemanticDriftValidator } from './structural';
import type { ValidationInput, ValidationResult, Validator } from './types';

/**
 * Runs validators in order and stops at the first failure.
 */
export class CompositeValidator implements Validator {
  readonly name = 'composite';

  constructor(readonly validators: readonly Validator[]) {}

  async validate(input: ValidationInput): Promise<ValidationResult> {
    for (const validator of this.validators) {
      const result = await validator.validate(input);
      if (!result.passed) return result;
    }
    return { passed: true, validator: this.name };
  }
}

const TRUTHY = new Set(['1', 'true', 'yes']);

/**
 * Command validation is skipped by flag, by config, or by
 * PATCHFIX_SKIP_VALIDATION in the environment.
 */
export function shouldSkipCommandValidation(
  flag: boolean | undefined,
  config: Pick<ValidationConfig, 'skip'>,
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  const fromEnv = env.PATCHFIX_SKIP_VALIDATION;
  return flag === true || config.skip || (fromEnv !== undefined && TRUTHY.has(fromEnv.toLowerCase()));
}

/**
 * Structural checks always run; configured commands run unless skipped.
 */
export function buildValidator(
  config: ValidationConfig,
  options: { skipCommands: boolean; logger?: Logger },
): CompositeValidator {
  const validators: Validator[] = [
    new MetadataValidator(),
    new FileCoverageValidator(),
    new SemanticDriftValidator(config.maxDriftRatio),
  ];
  if (!options.skipCommands && config.commands.length > 0) {
    validators.push(
      new CommandValidator(config.commands, { timeoutMs: config.timeoutMs, logger: options.logger }),
    );
  }
  return new CompositeValidator(validators);
}
