import { atomicWrite, type Logger, type ParsedPatch } from '@patchfix/shared';
import { ensureTrailingNewline } from '@patchfix/repo';
import { preserveMetadata } from '../generator/metadata';

/**
 * Persists corrected patches. The written text always ends with a newline
 * and carries the original metadata header byte-for-byte.
 */
export class PatchWriter {
  constructor(private readonly logger?: Logger) {}

  async write(destination: string, patchText: string, original: ParsedPatch): Promise<string> {
    const preserved = preserveMetadata(original, patchText);
    if (preserved.restored) {
      await this.logger?.warn(`Restored the original metadata header in ${destination}`);
    }
    const text = ensureTrailingNewline(preserved.text);
    await atomicWrite(destination, text);
    return text;
  }
}
