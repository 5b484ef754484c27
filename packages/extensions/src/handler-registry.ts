/**
 * Handler Registry - global extensions plus a stack of local scopes
 */

import type { TypeCheckingHooks } from "./hooks.js";

/**
 * Owns the global extension list and the local scope stack.
 *
 * Insertion order is priority order: globals first (earliest added first),
 * then the extensions of the innermost local scope. Scopes below the top of
 * the stack stay inert until the scopes above them are popped.
 */
export class HandlerRegistry<T = TypeCheckingHooks> {
  private readonly globals: T[] = [];
  private readonly localStack: (readonly T[])[] = [];

  /**
   * Append a global extension. Duplicates are kept and dispatched twice.
   */
  addGlobal(extension: T): void {
    this.globals.push(extension);
  }

  /**
   * Remove the first matching global extension, if any
   */
  removeGlobal(extension: T): void {
    const index = this.globals.indexOf(extension);
    if (index >= 0) {
      this.globals.splice(index, 1);
    }
  }

  /**
   * Activate a local scope. The caller keeps ownership of the list.
   */
  pushLocal(extensions: readonly T[]): void {
    this.localStack.push(extensions);
  }

  popLocal(): void {
    if (this.localStack.length === 0) {
      throw new Error("ICE: popLocal called with no active local scope");
    }
    this.localStack.pop();
  }

  get globalExtensions(): readonly T[] {
    return [...this.globals];
  }

  get localDepth(): number {
    return this.localStack.length;
  }

  /**
   * Dispatch order for one hook invocation.
   *
   * Globals are read by index against the live list, so extensions appended
   * while the traversal is in progress are visited before it moves on to the
   * local scope. Already visited entries are never revisited. The local scope
   * is fixed when traversal starts.
   */
  *currentView(): Generator<T, void, undefined> {
    const local = this.localStack[this.localStack.length - 1] ?? [];

    for (let index = 0; index < this.globals.length; index++) {
      const extension = this.globals[index];
      if (extension !== undefined) {
        yield extension;
      }
    }

    for (let index = 0; index < local.length; index++) {
      const extension = local[index];
      if (extension !== undefined) {
        yield extension;
      }
    }
  }
}
