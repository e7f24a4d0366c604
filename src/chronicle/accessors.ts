import { z } from 'zod';
import { InvalidArgumentError } from '../core/errors.js';
import type { DiffResult, LogRow } from '../core/types.js';
import { fromMaybe } from '../maybe/maybe.js';
import { SHORT_CIRCUIT_MESSAGE, type Chronicle } from './chronicle.js';

export const UnveilSelectorSchema = z.enum(['value', 'rows', 'log_df', 'lines']);
export type UnveilSelector = z.infer<typeof UnveilSelectorSchema>;

export interface InspectorView {
  opsNumber: number;
  functionLabel: string;
  inspectorResult: unknown;
}

export interface DiffView {
  opsNumber: number;
  functionLabel: string;
  diffResult: DiffResult | null;
}

export interface ChronicleSummary {
  steps: number;
  succeeded: number;
  failed: number;
  shortCircuited: number;
  /** Seconds */
  totalRunTime: number;
}

/**
 * unveil(c, 'value') -> the carried value, or null for Nothing
 * unveil(c, 'rows')  -> detailed log rows ('log_df' is an alias)
 * unveil(c, 'lines') -> printable log lines
 */
export function unveil<T>(c: Chronicle<T>, what?: 'value'): T | null;
export function unveil<T>(c: Chronicle<T>, what: 'rows' | 'log_df'): readonly LogRow[];
export function unveil<T>(c: Chronicle<T>, what: 'lines'): string[];
export function unveil<T>(c: Chronicle<T>, what: string): T | null | readonly LogRow[] | string[];
export function unveil<T>(c: Chronicle<T>, what: string = 'value'): T | null | readonly LogRow[] | string[] {
  const selector = UnveilSelectorSchema.safeParse(what);
  if (!selector.success) {
    throw new InvalidArgumentError(
      `what must be one of: ${UnveilSelectorSchema.options.map((o) => `"${o}"`).join(', ')} (got "${what}")`,
      'what',
    );
  }

  switch (selector.data) {
    case 'value':
      return fromMaybe(c.value, null);
    case 'rows':
    case 'log_df':
      return c.rows;
    case 'lines':
      return c.readLog();
  }
}

export function readLog<T>(c: Chronicle<T>): string[] {
  return c.readLog();
}

/**
 * Compact view of inspector results across steps
 */
export function checkInspectors<T>(c: Chronicle<T>): InspectorView[] {
  return c.rows.map((row) => ({
    opsNumber: row.opsNumber,
    functionLabel: row.functionLabel,
    inspectorResult: row.inspectorResult,
  }));
}

/**
 * Diff recorded at each step
 */
export function checkDiffs<T>(c: Chronicle<T>): DiffView[] {
  return c.rows.map((row) => ({
    opsNumber: row.opsNumber,
    functionLabel: row.functionLabel,
    diffResult: row.diffResult,
  }));
}

export function summarize<T>(c: Chronicle<T>): ChronicleSummary {
  let succeeded = 0;
  let shortCircuited = 0;
  let totalRunTime = 0;
  for (const row of c.rows) {
    if (row.outcome === 'success') succeeded++;
    if (row.message === SHORT_CIRCUIT_MESSAGE) shortCircuited++;
    totalRunTime += row.runTime;
  }
  return {
    steps: c.rows.length,
    succeeded,
    failed: c.rows.length - succeeded,
    shortCircuited,
    totalRunTime,
  };
}
