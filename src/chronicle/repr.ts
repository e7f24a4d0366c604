import { inspect } from 'node:util';

export type AnyFunction = (...args: never[]) => unknown;

export const DEFAULT_REPR_LIMIT = 2000;
export const TRUNCATION_MARKER = ' ... [truncated]';

/**
 * Single-line rendering of any value, cut at `limit` code points.
 * Values whose rendering throws (hostile getters, revoked proxies) render
 * as `<unreprable: ...>` instead.
 */
export function safeRepr(value: unknown, limit: number = DEFAULT_REPR_LIMIT): string {
  let text: string;
  try {
    text = inspect(value, { depth: 6, breakLength: Infinity, compact: true });
  } catch (err) {
    text = `<unreprable: ${describeThrown(err)}>`;
  }
  if (text.length <= limit) return text;

  const chars = Array.from(text);
  if (chars.length > limit) {
    return chars.slice(0, limit).join('') + TRUNCATION_MARKER;
  }
  return text;
}

/**
 * `"<Kind>: <text>"` for anything a function may throw. Total: a throwing
 * `name` or `message` getter yields `<unprintable>` for that part.
 */
export function describeThrown(thrown: unknown): string {
  if (thrown instanceof Error) {
    return `${readPrintable(() => thrown.name)}: ${readPrintable(() => thrown.message)}`;
  }
  return `NonErrorThrown: ${readPrintable(() => thrown)}`;
}

function readPrintable(read: () => unknown): string {
  try {
    return String(read());
  } catch {
    return '<unprintable>';
  }
}

export interface ParameterInfo {
  name: string;
  rest: boolean;
  defaultText?: string;
}

const SIMPLE_ARROW = /^(?:async\s+)?([A-Za-z_$][\w$]*)\s*=>/;

/**
 * Best-effort parameter list read from a function's source text.
 * Returns null for native functions, classes, or source it cannot split.
 */
export function readParameters(fn: AnyFunction): ParameterInfo[] | null {
  let source: string;
  try {
    source = Function.prototype.toString.call(fn);
  } catch {
    return null;
  }
  if (source.includes('[native code]') || /^class\b/.test(source)) {
    return null;
  }
  source = source.replace(/\/\*[\s\S]*?\*\//g, '').replace(/\/\/[^\n]*/g, '').trim();

  const arrow = SIMPLE_ARROW.exec(source);
  if (arrow) {
    return [{ name: arrow[1], rest: false }];
  }

  const open = source.indexOf('(');
  if (open === -1) return null;
  const close = findClosing(source, open);
  if (close === -1) return null;

  const inner = source.slice(open + 1, close).trim();
  if (inner === '') return [];

  return splitTopLevel(inner, ',')
    .map((piece) => piece.trim())
    .filter((piece) => piece.length > 0)
    .map((piece) => {
      const [head, ...tail] = splitTopLevel(piece, '=', 2);
      const rest = head.trim().startsWith('...');
      const name = rest ? head.trim().slice(3).trim() : head.trim();
      return tail.length > 0
        ? { name, rest, defaultText: tail.join('=').trim() }
        : { name, rest };
    });
}

/**
 * `label(name=value, ...)` for a call, matching arguments to parameter
 * names and showing unsupplied defaults by their source text. Falls back
 * to the bare label when the parameters cannot be read or more arguments
 * were given than the function declares.
 */
export function renderCall(
  label: string,
  fn: AnyFunction,
  args: readonly unknown[],
  limit: number = DEFAULT_REPR_LIMIT,
): string {
  const params = readParameters(fn);
  if (!params) return label;

  const hasRest = params.some((p) => p.rest);
  if (!hasRest && args.length > params.length) return label;

  const parts: string[] = [];
  params.forEach((param, i) => {
    if (param.rest) {
      parts.push(`${param.name}=${safeRepr(args.slice(i), limit)}`);
    } else if (i < args.length) {
      parts.push(`${param.name}=${safeRepr(args[i], limit)}`);
    } else if (param.defaultText !== undefined) {
      parts.push(`${param.name}=${param.defaultText}`);
    }
  });
  return `${label}(${parts.join(', ')})`;
}

function findClosing(source: string, open: number): number {
  let depth = 0;
  let quote: string | null = null;
  for (let i = open; i < source.length; i++) {
    const ch = source[i];
    if (quote) {
      if (ch === '\\') i++;
      else if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'" || ch === '`') quote = ch;
    else if (ch === '(' || ch === '[' || ch === '{') depth++;
    else if (ch === ')' || ch === ']' || ch === '}') {
      depth--;
      if (depth === 0) return ch === ')' ? i : -1;
    }
  }
  return -1;
}

function splitTopLevel(text: string, separator: string, maxParts: number = Infinity): string[] {
  const parts: string[] = [];
  let depth = 0;
  let quote: string | null = null;
  let start = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === '\\') i++;
      else if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'" || ch === '`') quote = ch;
    else if (ch === '(' || ch === '[' || ch === '{') depth++;
    else if (ch === ')' || ch === ']' || ch === '}') depth--;
    else if (ch === separator && depth === 0 && parts.length < maxParts - 1) {
      // `=>` inside a default value is not an assignment
      if (separator === '=' && (text[i + 1] === '>' || text[i + 1] === '=' || text[i - 1] === '=')) continue;
      parts.push(text.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(text.slice(start));
  return parts;
}
