import { describe, test, expect, vi, afterEach } from 'vitest';
import { RequestSlot, describeRequest } from './request';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('RequestSlot', () => {
  test('holds one request until taken', () => {
    const slot = new RequestSlot();
    slot.save('a.json');

    expect(slot.shouldSave()).toBe(true);
    expect(slot.shouldLoad()).toBe(false);
    expect(slot.take()).toEqual({ kind: 'save', path: 'a.json', mode: 'filtered' });
    expect(slot.take()).toBeNull();
    expect(slot.shouldSave()).toBe(false);
  });

  test('dump is a save of everything', () => {
    const slot = new RequestSlot();
    slot.dump('all.json');
    expect(slot.peek()).toEqual({ kind: 'save', path: 'all.json', mode: 'dump' });
  });

  test('last write wins, with a warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const slot = new RequestSlot();
    slot.save('a.json');
    slot.load('b.json');

    expect(warn).toHaveBeenCalledWith(`[requests] load 'b.json' replaces pending save 'a.json'`);
    expect(slot.shouldLoad()).toBe(true);
    expect(slot.shouldSave()).toBe(false);
  });

  test('no warning for the first request', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const slot = new RequestSlot();
    slot.load('b.json');
    expect(warn).not.toHaveBeenCalled();
  });

  test('clear drops the pending request', () => {
    const slot = new RequestSlot();
    slot.load('b.json');
    slot.clear();
    expect(slot.peek()).toBeNull();
  });

  test('describeRequest', () => {
    expect(describeRequest({ kind: 'load', path: 'x' })).toBe(`load 'x'`);
    expect(describeRequest({ kind: 'save', path: 'x', mode: 'filtered' })).toBe(`save 'x'`);
    expect(describeRequest({ kind: 'save', path: 'x', mode: 'dump' })).toBe(`dump 'x'`);
  });
});
