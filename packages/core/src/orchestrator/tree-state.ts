import { PatchOpError } from '@patchfix/shared';

/**
 * Tracks whether the working tree may hold applied changes. Reading context
 * or applying anything requires a pristine tree.
 */
export class TreeState {
  private dirty = false;

  get isDirty(): boolean {
    return this.dirty;
  }

  markDirty(): void {
    this.dirty = true;
  }

  markPristine(): void {
    this.dirty = false;
  }

  assertPristine(action: string): void {
    if (this.dirty) {
      throw new PatchOpError(`Working tree is not pristine; refusing to ${action}`);
    }
  }
}
