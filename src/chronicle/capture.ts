import { format } from 'node:util';

export type Settled<R> =
  | { readonly ok: true; readonly value: R }
  | { readonly ok: false; readonly error: unknown };

export interface Captured<R> {
  result: Settled<R>;
  /** Warning texts, in emission order */
  diagnostics: string[];
  /** Everything written to stdout during the call */
  output: string;
}

type WriteCallback = (err?: Error | null) => void;

function isWriteCallback(value: unknown): value is WriteCallback {
  return typeof value === 'function';
}

/**
 * Run `fn` with diagnostics and stdout redirected into buffers.
 *
 * Diagnostics are `process.emitWarning` and `console.warn`; stdout is
 * `process.stdout.write` plus `console.log`, `console.info` and
 * `console.debug`. Nothing reaches the real streams, and every hook is
 * restored on both exit paths. A throw from `fn` is returned as a
 * settled failure, never rethrown.
 */
export function captureCall<R>(fn: () => R): Captured<R> {
  const diagnostics: string[] = [];
  let output = '';

  const stdout = process.stdout;
  const original = {
    emitWarning: process.emitWarning,
    write: stdout.write,
    warn: console.warn,
    log: console.log,
    info: console.info,
    debug: console.debug,
  };

  const toStdout = (...data: unknown[]): void => {
    output += format(...data) + '\n';
  };

  process.emitWarning = (warning: string | Error, ..._rest: unknown[]): void => {
    diagnostics.push(typeof warning === 'string' ? warning : warning.message);
  };
  console.warn = (...data: unknown[]): void => {
    diagnostics.push(format(...data));
  };
  stdout.write = (chunk: string | Uint8Array, ...rest: unknown[]): boolean => {
    output += typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8');
    rest.find(isWriteCallback)?.();
    return true;
  };
  console.log = toStdout;
  console.info = toStdout;
  console.debug = toStdout;

  let result: Settled<R>;
  try {
    result = { ok: true, value: fn() };
  } catch (error) {
    result = { ok: false, error };
  } finally {
    process.emitWarning = original.emitWarning;
    stdout.write = original.write;
    console.warn = original.warn;
    console.log = original.log;
    console.info = original.info;
    console.debug = original.debug;
  }

  return { result, diagnostics, output };
}
