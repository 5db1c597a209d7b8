import type { ConfigValidationIssue, ConfigValidationResult, ProviderCapabilities } from '../types/llm';
import type { ProviderConfig } from './schema';

/**
 * Keys of ProviderConfigSchema. Anything else is reported as a possible typo
 * unless the adapter lists it in `configFields`.
 */
const KNOWN_PROVIDER_CONFIG_FIELDS = new Set([
  'type',
  'model',
  'api_key_env',
  'api_key',
  'baseUrl',
  'timeoutMs',
  'pricing',
]);

/**
 * Checks a provider entry against what its adapter declares.
 */
export function validateProviderConfig(
  config: ProviderConfig,
  capabilities: ProviderCapabilities,
  providerId: string,
): ConfigValidationResult {
  const errors: ConfigValidationIssue[] = [];
  const warnings: ConfigValidationIssue[] = [];

  if (!config.model) {
    errors.push({
      field: 'model',
      message: `Provider '${providerId}' requires a model to be specified`,
      code: 'MISSING_REQUIRED',
    });
  }

  if (config.timeoutMs !== undefined && config.timeoutMs <= 0) {
    errors.push({
      field: 'timeoutMs',
      message: `Provider '${providerId}' has a non-positive timeoutMs`,
      code: 'INVALID_VALUE',
    });
  }

  const known = new Set([...KNOWN_PROVIDER_CONFIG_FIELDS, ...(capabilities.configFields ?? [])]);
  for (const field of Object.keys(config)) {
    if (!known.has(field)) {
      warnings.push({
        field,
        message: `Provider '${providerId}' has unknown config field '${field}'; this may be a typo or unsupported option`,
        code: 'UNKNOWN_FIELD',
      });
    }
  }

  return { valid: errors.length === 0, errors, warnings };
}

export function formatValidationResult(result: ConfigValidationResult): string {
  const lines: string[] = [];

  if (result.errors.length > 0) {
    lines.push('Configuration errors:');
    for (const error of result.errors) {
      lines.push(`  - [${error.field}] ${error.message}`);
    }
  }

  if (result.warnings.length > 0) {
    lines.push('Configuration warnings:');
    for (const warning of result.warnings) {
      lines.push(`  - [${warning.field}] ${warning.message}`);
    }
  }

  return lines.join('\n');
}
