import { z } from 'zod';

// ===== Recorder =====

export const DiffModeSchema = z.enum(['none', 'summary', 'full']);
export type DiffMode = z.infer<typeof DiffModeSchema>;

export const StrictnessSchema = z.union([z.literal(1), z.literal(2), z.literal(3)]);
export type Strictness = z.infer<typeof StrictnessSchema>;

export const ReprLimitSchema = z.number().int().positive();

export type Outcome = 'success' | 'failure';

export type Inspector<R> = (value: R) => unknown;

/**
 * Options accepted by `record()`. Fields left out fall back to the
 * process-wide configuration at construction time.
 */
export interface RecorderOptions<R = unknown> {
  /** 1 = errors only, 2 = errors + warnings, 3 = errors + warnings + printed output */
  strictness?: Strictness;
  inspector?: Inspector<R>;
  diff?: DiffMode;
  label?: string;
  reprLimit?: number;
}

export const RecorderOptionsSchema = z.object({
  strictness: StrictnessSchema.optional(),
  inspector: z.custom<Inspector<never>>((v) => typeof v === 'function', 'inspector must be a function').optional(),
  diff: DiffModeSchema.optional(),
  label: z.string().optional(),
  reprLimit: ReprLimitSchema.optional(),
});

export interface ResolvedRecorderOptions<R> {
  readonly strictness: Strictness;
  readonly inspector?: Inspector<R>;
  readonly diff: DiffMode;
  readonly label: string;
  readonly reprLimit: number;
}

// ===== Log =====

export type DiffResult = string | string[];

export interface LogRow {
  opsNumber: number;
  outcome: Outcome;
  functionLabel: string;
  message: string | null;
  startTime: string;
  endTime: string;
  /** Seconds, from the monotonic clock */
  runTime: number;
  inspectorResult: unknown;
  diffResult: DiffResult | null;
  priorOutcome: Outcome | null;
}

// ===== Configuration =====

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const ChronicleConfigSchema = z.object({
  recorder: z.object({
    strictness: StrictnessSchema.default(1),
    diff: DiffModeSchema.default('none'),
    reprLimit: ReprLimitSchema.default(2000),
  }).default({}),
  logging: z.object({
    level: LogLevelSchema.default('info'),
    pretty: z.boolean().default(false),
  }).default({}),
});

export type ChronicleConfig = z.infer<typeof ChronicleConfigSchema>;
