/**
 * Optional value: either `Just(value)` or `Nothing`.
 *
 * A plain discriminated union. Narrow with `isJust` / `isNothing` or on
 * `kind` directly.
 */

export type Just<T> = { readonly kind: 'just'; readonly value: T };
export type Nothing = { readonly kind: 'nothing' };
export type Maybe<T> = Just<T> | Nothing;

const NOTHING: Nothing = Object.freeze({ kind: 'nothing' as const });

export function just<T>(value: T): Just<T> {
  return Object.freeze({ kind: 'just' as const, value });
}

export function nothing(): Nothing {
  return NOTHING;
}

export function isJust<T>(m: Maybe<T>): m is Just<T> {
  return m.kind === 'just';
}

export function isNothing<T>(m: Maybe<T>): m is Nothing {
  return m.kind === 'nothing';
}

/** Unwrap, or return `fallback` for `Nothing`. */
export function fromMaybe<T, F>(m: Maybe<T>, fallback: F): T | F {
  return isJust(m) ? m.value : fallback;
}

export function mapMaybe<T, U>(m: Maybe<T>, fn: (value: T) => U): Maybe<U> {
  return isJust(m) ? just(fn(m.value)) : m;
}
