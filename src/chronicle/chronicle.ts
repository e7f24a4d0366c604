/**
 * Chronicle: a Maybe value plus the execution log that produced it.
 *
 * A chronicle is created by one recorded call (one row) or by `bind`,
 * which runs the next recorder on the carried value and appends its rows,
 * renumbered to continue the chain. Once a step fails the value is
 * `Nothing`, and every later `bind` appends a short-circuit row without
 * running anything.
 */

import { inspect } from 'node:util';
import { getLogger } from '../core/logger.js';
import { InvalidArgumentError } from '../core/errors.js';
import type { LogRow, Outcome } from '../core/types.js';
import { isJust, just, nothing, type Maybe } from '../maybe/maybe.js';
import { formatSeconds, formatTimestamp } from '../utils/timer.js';
import { safeRepr } from './repr.js';

export const SHORT_CIRCUIT_MESSAGE = 'Short-circuited due to Nothing';

const RULE = '---------------';

/**
 * Anything callable that yields a Chronicle and carries a display label.
 */
export interface Recorder<A extends unknown[], R> {
  (...args: A): Chronicle<R>;
  readonly label: string;
}

export function formatLogLine(ok: boolean, label: string, startedAt: string, elapsedSeconds: number): string {
  return `${ok ? 'OK' : 'NOK'} \`${label}\` at ${startedAt} (${formatSeconds(elapsedSeconds)})`;
}

export class Chronicle<T> {
  readonly value: Maybe<T>;
  readonly rows: readonly LogRow[];
  readonly lines: readonly string[];

  constructor(value: Maybe<T>, rows: readonly LogRow[] = [], lines: readonly string[] = []) {
    if (rows.length !== lines.length) {
      throw new InvalidArgumentError(
        `Chronicle needs one line per row (got ${rows.length} rows, ${lines.length} lines)`,
        'lines',
      );
    }
    this.value = value;
    this.rows = Object.freeze(rows.map((row) => Object.freeze({ ...row })));
    this.lines = Object.freeze([...lines]);
  }

  /**
   * A successful chronicle with an empty log, to start a chain from a
   * plain value.
   */
  static of<T>(value: T): Chronicle<T> {
    return new Chronicle(just(value));
  }

  isSuccess(): boolean {
    return isJust(this.value);
  }

  readLog(): string[] {
    return [...this.lines];
  }

  /**
   * Run `next` on the carried value (followed by `extra`) and append its
   * log, or append a short-circuit row when the value is `Nothing`.
   */
  bind<R, E extends unknown[]>(next: Recorder<[T, ...E], R>, ...extra: E): Chronicle<R> {
    const nextOps = this.rows.length + 1;
    const last = this.rows.length > 0 ? this.rows[this.rows.length - 1] : undefined;

    if (!isJust(this.value)) {
      const now = formatTimestamp();
      const row: LogRow = {
        opsNumber: nextOps,
        outcome: 'failure',
        functionLabel: next.label,
        message: SHORT_CIRCUIT_MESSAGE,
        startTime: now,
        endTime: now,
        runTime: 0,
        inspectorResult: null,
        diffResult: null,
        priorOutcome: last?.outcome ?? null,
      };
      getLogger().debug({ label: next.label, opsNumber: nextOps }, 'Step short-circuited');
      return new Chronicle<R>(
        nothing(),
        [...this.rows, row],
        [...this.lines, formatLogLine(false, next.label, now, 0)],
      );
    }

    const following = next(this.value.value, ...extra);

    let prior: Outcome | null = last?.outcome ?? null;
    const renumbered = following.rows.map((row, i) => {
      const merged: LogRow = { ...row, opsNumber: nextOps + i, priorOutcome: prior };
      prior = row.outcome;
      return merged;
    });

    return new Chronicle<R>(
      following.value,
      [...this.rows, ...renumbered],
      [...this.lines, ...following.lines],
    );
  }

  toString(): string {
    const header = this.isSuccess() ? 'Success:' : 'Failure:';
    const body = isJust(this.value) ? `Just(${safeRepr(this.value.value)})` : 'Nothing';
    return [
      header,
      RULE,
      body,
      '',
      RULE,
      'This is an object of type `Chronicle`.',
      'Retrieve the value of this object with unveil(c, "value").',
      'To read the log of this object, call readLog(c).',
      '',
    ].join('\n');
  }

  [inspect.custom](): string {
    return this.toString();
  }
}
