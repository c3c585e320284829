import { describe, expect, it } from 'vitest';
import { SAVEPOINT_PREFIX } from '../../src/constants.js';
import { TransactionScopeStack } from '../../src/state/scope-stack.js';
import { generateSavepointName } from '../../src/utils/id-generator.js';

describe('TransactionScopeStack', () => {
  it('should start empty', () => {
    const stack = new TransactionScopeStack();

    expect(stack.isOpen()).toBe(false);
    expect(stack.depth()).toBe(0);
    expect(stack.peek()).toBeUndefined();
    expect(stack.outermostRoot()).toBeUndefined();
  });

  it('should assign strictly increasing depths', () => {
    const stack = new TransactionScopeStack();

    const root = stack.push('root');
    const savepoint = stack.push('savepoint', 'sp_one');

    expect(root.depth).toBe(1);
    expect(savepoint.depth).toBe(2);
    expect(stack.depth()).toBe(2);
    expect(stack.peek()).toBe(savepoint);
  });

  it('should give every frame a unique id', () => {
    const stack = new TransactionScopeStack();

    const ids = new Set([stack.push('root').id, stack.push('savepoint').id, stack.push('savepoint').id]);

    expect(ids.size).toBe(3);
  });

  it('should only set savepointName when one is given', () => {
    const stack = new TransactionScopeStack();

    const root = stack.push('root');
    const savepoint = stack.push('savepoint', 'sp_one');

    expect('savepointName' in root).toBe(false);
    expect(savepoint.savepointName).toBe('sp_one');
  });

  it('should pop frames in reverse order', () => {
    const stack = new TransactionScopeStack();
    const root = stack.push('root');
    const savepoint = stack.push('savepoint');

    expect(stack.pop()).toBe(savepoint);
    expect(stack.pop()).toBe(root);
    expect(stack.pop()).toBeUndefined();
    expect(stack.isOpen()).toBe(false);
  });

  it('should report the bottom-most root frame', () => {
    const stack = new TransactionScopeStack();
    const root = stack.push('root');
    stack.push('savepoint');
    stack.push('savepoint');

    expect(stack.outermostRoot()).toBe(root);
  });

  it('should return a copy of its frames', () => {
    const stack = new TransactionScopeStack();
    stack.push('root');

    const frames = stack.frames();
    stack.push('savepoint');

    expect(frames).toHaveLength(1);
    expect(stack.frames()).toHaveLength(2);
  });

  it('should drop every frame on reset', () => {
    const stack = new TransactionScopeStack();
    stack.push('root');
    stack.push('savepoint');

    stack.reset();

    expect(stack.depth()).toBe(0);
  });
});

describe('generateSavepointName', () => {
  it('should produce unquoted SQL identifiers', () => {
    const name = generateSavepointName();

    expect(name.startsWith(SAVEPOINT_PREFIX)).toBe(true);
    expect(name).toMatch(/^[a-z_][a-z0-9_]*$/);
  });
});
