import { describe, it, expect, vi } from 'vitest';
import { SyncContext } from './SyncContext';

describe('SyncContext', () => {
  it('should run a push with the pending flag set', () => {
    const context = new SyncContext();
    let pendingInside = false;

    const ran = context.run(() => {
      pendingInside = context.isPending();
    });

    expect(ran).toBe(true);
    expect(pendingInside).toBe(true);
    expect(context.isPending()).toBe(false);
    expect(context.getPushCount()).toBe(1);
  });

  it('should skip a nested push', () => {
    const context = new SyncContext();
    const nested = vi.fn();
    let nestedResult = true;

    context.run(() => {
      nestedResult = context.run(nested);
    });

    expect(nestedResult).toBe(false);
    expect(nested).not.toHaveBeenCalled();
    expect(context.getPushCount()).toBe(1);
  });

  it('should clear the flag when a push throws', () => {
    const context = new SyncContext();

    expect(() =>
      context.run(() => {
        throw new Error('push failed');
      })
    ).toThrow('push failed');

    expect(context.isPending()).toBe(false);
    expect(context.getPushCount()).toBe(0);
  });
});
