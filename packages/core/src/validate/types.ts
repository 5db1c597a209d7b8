import type { ParsedPatch } from '@patchfix/shared';

export interface ValidationInput {
  repoRoot: string;
  /** The patch being reconciled, as supplied */
  original: ParsedPatch;
  /** Candidate that applied cleanly and is still on the working tree */
  candidate: ParsedPatch;
  signal?: AbortSignal;
}

export interface ValidationResult {
  passed: boolean;
  /** Name of the validator that produced the verdict */
  validator: string;
  /** Why validation failed; becomes the next attempt's failure signal */
  diagnostic?: string;
}

export interface Validator {
  readonly name: string;
  validate(input: ValidationInput): Promise<ValidationResult>;
}
