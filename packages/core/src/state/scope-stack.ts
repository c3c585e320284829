/**
 * Transaction Scope Stack
 *
 * @module state/scope-stack
 *
 * @remarks
 * Plain data structure: it never throws. Scope operations pair every `push` with a
 * `pop` on all of their exit paths.
 */

import type { ScopeFrame, ScopeKind } from '../types.js';
import { generateScopeId } from '../utils/id-generator.js';

export class TransactionScopeStack {
  #frames: ScopeFrame[] = [];

  /** Whether any frame is open */
  isOpen(): boolean {
    return this.#frames.length > 0;
  }

  depth(): number {
    return this.#frames.length;
  }

  push(kind: ScopeKind, savepointName?: string): ScopeFrame {
    const frame: ScopeFrame = {
      id: generateScopeId(),
      kind,
      depth: this.#frames.length + 1,
      ...(savepointName === undefined ? {} : { savepointName }),
    };
    this.#frames.push(frame);
    return frame;
  }

  pop(): ScopeFrame | undefined {
    return this.#frames.pop();
  }

  peek(): ScopeFrame | undefined {
    return this.#frames[this.#frames.length - 1];
  }

  /** Bottom-most root frame: the scope after-commit callbacks bind to */
  outermostRoot(): ScopeFrame | undefined {
    return this.#frames.find((frame) => frame.kind === 'root');
  }

  frames(): readonly ScopeFrame[] {
    return [...this.#frames];
  }

  reset(): void {
    this.#frames = [];
  }
}
