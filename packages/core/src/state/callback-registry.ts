/**
 * After-Commit Callback Registry
 *
 * @module state/callback-registry
 *
 * @remarks
 * FIFO queue of deferred callbacks for one connection. Every entry is bound to the
 * id of the outermost scope that was open when it was registered.
 */

import type { AfterCommitCallback, CallbackEntry } from '../types.js';

export class AfterCommitCallbackRegistry {
  #entries: CallbackEntry[] = [];

  register(callback: AfterCommitCallback, scopeId: string, robust = false): CallbackEntry {
    const entry: CallbackEntry = { callback, scopeId, robust };
    this.#entries.push(entry);
    return entry;
  }

  get size(): number {
    return this.#entries.length;
  }

  isEmpty(): boolean {
    return this.#entries.length === 0;
  }

  entries(): readonly CallbackEntry[] {
    return [...this.#entries];
  }

  /**
   * Remove and return the entries bound to `scopeId`, in registration order
   */
  take(scopeId: string): CallbackEntry[] {
    const taken = this.#entries.filter((entry) => entry.scopeId === scopeId);
    this.#entries = this.#entries.filter((entry) => entry.scopeId !== scopeId);
    return taken;
  }

  /**
   * Remove and return every entry, in registration order
   */
  takeAll(): CallbackEntry[] {
    const taken = this.#entries;
    this.#entries = [];
    return taken;
  }

  /**
   * Drop the entries bound to `scopeId`
   *
   * @returns Number of entries dropped
   */
  discard(scopeId: string): number {
    return this.take(scopeId).length;
  }

  /**
   * Move the entries bound to `fromScopeId` onto `toScopeId`, keeping their order
   *
   * @returns Number of entries moved
   */
  rebind(fromScopeId: string, toScopeId: string): number {
    let moved = 0;
    for (const entry of this.#entries) {
      if (entry.scopeId === fromScopeId) {
        entry.scopeId = toScopeId;
        moved += 1;
      }
    }
    return moved;
  }

  clear(): void {
    this.#entries = [];
  }
}
