import { describe, it, expect } from 'vitest';
import { just, nothing, isJust, isNothing, fromMaybe, mapMaybe } from '../../../src/maybe/maybe.js';

describe('Maybe', () => {
  it('should wrap a value in Just', () => {
    const m = just(3);
    expect(m.kind).toBe('just');
    expect(m.value).toBe(3);
    expect(isJust(m)).toBe(true);
    expect(isNothing(m)).toBe(false);
  });

  it('should carry no value in Nothing', () => {
    const m = nothing();
    expect(m).toEqual({ kind: 'nothing' });
    expect(isNothing(m)).toBe(true);
  });

  it('should keep falsy values present', () => {
    expect(fromMaybe(just(0), 99)).toBe(0);
    expect(fromMaybe(just(null), 99)).toBeNull();
  });

  it('should fall back for Nothing in fromMaybe', () => {
    expect(fromMaybe(nothing(), 'fallback')).toBe('fallback');
  });

  it('should transform Just and pass Nothing through in mapMaybe', () => {
    expect(mapMaybe(just(2), (x) => x * 10)).toEqual({ kind: 'just', value: 20 });
    expect(mapMaybe(nothing(), (x: number) => x * 10)).toEqual({ kind: 'nothing' });
  });

  it('should freeze constructed values', () => {
    expect(Object.isFrozen(just({ a: 1 }))).toBe(true);
    expect(Object.isFrozen(nothing())).toBe(true);
  });
});
