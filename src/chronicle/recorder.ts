/**
 * Execution Recorder. Wraps a function so every call returns a Chronicle
 * instead of a bare value.
 *
 * @example
 * ```typescript
 * const rSqrt = record(Math.sqrt);
 * const rHalf = record((x: number) => x / 2, { diff: 'summary' });
 * const out = rSqrt(16).bind(rHalf);
 * unveil(out, 'value'); // 2
 * ```
 */

import { getConfig } from '../core/config.js';
import { InvalidConfigurationError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import {
  RecorderOptionsSchema,
  type DiffResult,
  type LogRow,
  type RecorderOptions,
  type ResolvedRecorderOptions,
} from '../core/types.js';
import { just, nothing } from '../maybe/maybe.js';
import { Stopwatch, formatTimestamp } from '../utils/timer.js';
import { captureCall } from './capture.js';
import { Chronicle, formatLogLine, type Recorder } from './chronicle.js';
import { summarizeDiff, unifiedDiff } from './diff.js';
import { describeThrown, renderCall, safeRepr } from './repr.js';

export const ANONYMOUS_LABEL = '<anonymous>';
export const NO_OUTPUT = '<no-output>';

export interface RecordedCallable<A extends unknown[], R> extends Recorder<A, R> {
  readonly options: ResolvedRecorderOptions<R>;
  readonly fn: (...args: A) => R;
}

/**
 * Throws `InvalidConfigurationError` listing every rejected option.
 */
export function validateRecorderOptions(options: RecorderOptions<never>): void {
  const parsed = RecorderOptionsSchema.safeParse(options);
  if (parsed.success) return;

  const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`);
  throw new InvalidConfigurationError(
    `Invalid recorder options: ${issues.join('; ')}`,
    issues,
    parsed.error,
  );
}

/**
 * A returned promise is recorded as the value without being awaited. Its
 * later rejection is logged here so it never surfaces as unhandled.
 */
function watchRejection(pending: Promise<unknown>, label: string): void {
  void pending.then(undefined, (err: unknown) => {
    getLogger().warn({ label, error: describeThrown(err) }, 'Recorded promise rejected after the call returned');
  });
}

export class RecordedFunction<A extends unknown[], R> {
  readonly options: ResolvedRecorderOptions<R>;

  constructor(
    readonly fn: (...args: A) => R,
    options: RecorderOptions<R> = {},
  ) {
    validateRecorderOptions(options);

    const defaults = getConfig().recorder;
    this.options = Object.freeze({
      strictness: options.strictness ?? defaults.strictness,
      inspector: options.inspector,
      diff: options.diff ?? defaults.diff,
      label: options.label || fn.name || ANONYMOUS_LABEL,
      reprLimit: options.reprLimit ?? defaults.reprLimit,
    });
  }

  get label(): string {
    return this.options.label;
  }

  /**
   * Invoke the wrapped function once and record the outcome. Never throws
   * on account of the wrapped function or the inspector.
   */
  call(...args: A): Chronicle<R> {
    const { strictness, inspector, diff, label, reprLimit } = this.options;

    const startedAt = formatTimestamp();
    const stopwatch = new Stopwatch();
    const inputRepr = safeRepr({ args }, reprLimit);

    const { result, diagnostics, output } = captureCall(() => this.fn(...args));
    if (result.ok && result.value instanceof Promise) {
      watchRejection(result.value, label);
    }

    let ok = result.ok;
    let message: string | null = result.ok ? null : describeThrown(result.error);

    if (ok && strictness >= 2 && diagnostics.length > 0) {
      ok = false;
      message = `Warning: ${diagnostics[0]}`;
    }
    if (ok && strictness >= 3 && output.trim() !== '') {
      ok = false;
      message = `Message: ${output.trim()}`;
    }

    const runTime = stopwatch.stop();
    const endedAt = formatTimestamp();

    let inspectorResult: unknown = null;
    if (ok && result.ok && inspector) {
      try {
        inspectorResult = inspector(result.value);
      } catch (err) {
        inspectorResult = `<inspector error: ${describeThrown(err)}>`;
      }
    }

    let diffResult: DiffResult | null = null;
    if (diff !== 'none') {
      const outputRepr = ok && result.ok ? safeRepr(result.value, reprLimit) : NO_OUTPUT;
      diffResult = diff === 'summary'
        ? summarizeDiff(inputRepr, outputRepr)
        : unifiedDiff(inputRepr, outputRepr);
    }

    const row: LogRow = {
      opsNumber: 1,
      outcome: ok ? 'success' : 'failure',
      functionLabel: ok ? label : renderCall(label, this.fn, args, reprLimit),
      message,
      startTime: startedAt,
      endTime: endedAt,
      runTime,
      inspectorResult,
      diffResult,
      priorOutcome: null,
    };

    getLogger().debug({ label, outcome: row.outcome, runTime, message }, 'Recorded call');

    return new Chronicle<R>(
      ok && result.ok ? just(result.value) : nothing(),
      [row],
      [formatLogLine(ok, label, startedAt, runTime)],
    );
  }

  /**
   * The callable form handed out by `record()`.
   */
  toCallable(): RecordedCallable<A, R> {
    return Object.assign((...args: A) => this.call(...args), {
      label: this.options.label,
      options: this.options,
      fn: this.fn,
    });
  }
}

/**
 * Wrap `fn` so each call returns a Chronicle.
 *
 * Also usable as a factory: `record({ strictness: 2 })` returns a wrapper
 * still waiting for the function.
 *
 * strictness: 1 = errors only, 2 = errors + warnings, 3 = errors + warnings + printed output
 *
 * Async functions are not awaited: the returned promise is the recorded
 * value and the step succeeds. A later rejection is logged at `warn` and
 * is never left unhandled; it still reaches whoever awaits the value.
 */
export function record<A extends unknown[], R>(
  fn: (...args: A) => R,
  options?: RecorderOptions<R>,
): RecordedCallable<A, R>;
export function record(
  options: RecorderOptions,
): <A extends unknown[], R>(fn: (...args: A) => R) => RecordedCallable<A, R>;
export function record<A extends unknown[], R>(
  fnOrOptions: ((...args: A) => R) | RecorderOptions,
  options: RecorderOptions<R> = {},
): RecordedCallable<A, R> | (<B extends unknown[], S>(fn: (...args: B) => S) => RecordedCallable<B, S>) {
  if (typeof fnOrOptions === 'function') {
    return new RecordedFunction(fnOrOptions, options).toCallable();
  }
  const factoryOptions = fnOrOptions;
  validateRecorderOptions(factoryOptions);
  return <B extends unknown[], S>(fn: (...args: B) => S) =>
    new RecordedFunction<B, S>(fn, factoryOptions).toCallable();
}

/**
 * Compose two recorders into one: calling the result runs `first` and
 * binds `second` onto it. `a.bind(b).bind(c)` and `a.bind(andThen(b, c))`
 * yield the same rows, lines and value whenever `a` succeeds.
 */
export function andThen<A extends unknown[], M, R>(
  first: Recorder<A, M>,
  second: Recorder<[M], R>,
): Recorder<A, R> {
  return Object.assign((...args: A) => first(...args).bind(second), {
    label: `${first.label} >> ${second.label}`,
  });
}
