import { describe, test, expect, vi, afterEach } from 'vitest';
import { SystemScheduler } from './system';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('SystemScheduler', () => {
  test('orders by order, then by registration', () => {
    const scheduler = new SystemScheduler();
    const calls: string[] = [];
    scheduler.add(() => calls.push('b'), { order: 0 });
    scheduler.add(() => calls.push('late'), { order: 10 });
    scheduler.add(() => calls.push('early'), { order: -10 });
    scheduler.add(() => calls.push('c'), { order: 0 });

    scheduler.runPhase('update');

    expect(calls).toEqual(['early', 'b', 'c', 'late']);
  });

  test('runAll walks every phase once', () => {
    const scheduler = new SystemScheduler();
    const calls: string[] = [];
    scheduler.add(() => calls.push('last'), { phase: 'last' });
    scheduler.add(() => calls.push('first'), { phase: 'first' });
    scheduler.add(() => calls.push('save'), { phase: 'save' });
    scheduler.add(() => calls.push('load'), { phase: 'load' });

    scheduler.runAll();

    expect(calls).toEqual(['load', 'first', 'last', 'save']);
  });

  test('runIf gates a system', () => {
    const scheduler = new SystemScheduler();
    let enabled = false;
    const fn = vi.fn();
    scheduler.add(fn, { runIf: () => enabled });

    scheduler.runPhase('update');
    enabled = true;
    scheduler.runPhase('update');

    expect(fn).toHaveBeenCalledTimes(1);
  });

  test('removal function unregisters the system', () => {
    const scheduler = new SystemScheduler();
    const fn = vi.fn();
    const remove = scheduler.add(fn);
    remove();
    scheduler.runAll();
    expect(fn).not.toHaveBeenCalled();
  });

  test('logs and rethrows system errors', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const scheduler = new SystemScheduler();
    const after = vi.fn();
    scheduler.add(() => {
      throw new Error('boom');
    }, { phase: 'postLoad' });
    scheduler.add(after, { phase: 'postLoad' });

    expect(() => scheduler.runPhase('postLoad')).toThrow('boom');
    expect(after).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith(`Error in system during 'postLoad' phase:`, expect.any(Error));
  });

  test('rejects async systems', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const scheduler = new SystemScheduler();
    scheduler.add(async () => {});
    expect(() => scheduler.runPhase('update')).toThrow(/System returned a Promise/);
  });
});
