import { countChangedLines } from '@patchfix/repo';
import type { ValidationInput, ValidationResult, Validator } from './types';

/**
 * Fails when the candidate changes more than `maxDriftRatio` times as many
 * lines as the original patch.
 */
export class SemanticDriftValidator implements Validator {
  readonly name = 'semantic-drift';

  constructor(private readonly maxDriftRatio: number) {}

  async validate({ original, candidate }: ValidationInput): Promise<ValidationResult> {
    const before = countChangedLines(original);
    const after = countChangedLines(candidate);
    if (after <= before * this.maxDriftRatio) {
      return { passed: true, validator: this.name };
    }
    return {
      passed: false,
      validator: this.name,
      diagnostic: `Candidate changes ${after} lines, more than ${this.maxDriftRatio}x the ${before} changed by the original patch. Keep the change to what the original does.`,
    };
  }
}

/**
 * Fails when the candidate's metadata header is not byte-identical to the
 * original's.
 */
export class MetadataValidator implements Validator {
  readonly name = 'metadata';

  async validate({ original, candidate }: ValidationInput): Promise<ValidationResult> {
    if (candidate.metadata.headerText === original.metadata.headerText) {
      return { passed: true, validator: this.name };
    }
    return {
      passed: false,
      validator: this.name,
      diagnostic: 'Candidate metadata header differs from the original patch header',
    };
  }
}

/**
 * Fails when a file of the original patch is missing from the candidate.
 */
export class FileCoverageValidator implements Validator {
  readonly name = 'file-coverage';

  async validate({ original, candidate }: ValidationInput): Promise<ValidationResult> {
    const present = new Set(candidate.files.map((f) => f.path));
    const missing = original.files.map((f) => f.path).filter((p) => !present.has(p));
    if (missing.length === 0) {
      return { passed: true, validator: this.name };
    }
    return {
      passed: false,
      validator: this.name,
      diagnostic: `Candidate is missing file(s) from the original patch: ${missing.join(', ')}`,
    };
  }
}
