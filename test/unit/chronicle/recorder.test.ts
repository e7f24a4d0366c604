import { describe, it, expect, afterEach, vi } from 'vitest';
import { record, RecordedFunction, andThen, ANONYMOUS_LABEL } from '../../../src/chronicle/recorder.js';
import { unveil } from '../../../src/chronicle/accessors.js';
import { InvalidConfigurationError } from '../../../src/core/errors.js';
import { ChronicleConfigSchema } from '../../../src/core/types.js';
import { resetConfig, setConfig } from '../../../src/core/config.js';
import { getLogger } from '../../../src/core/logger.js';

const LINE = /^OK `sqrt` at \d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} \(\d+\.\d{3}s\)$/;

function noisy(x: number): number {
  console.warn('heads up');
  return x;
}

function chatty(x: number): number {
  console.log('  printed  ');
  return x;
}

function blank(x: number): number {
  console.log('   ');
  return x;
}

const identity = <T>(x: T): T => x;
const invert = (x: bigint): bigint => 1n / x;

function withUnreadableMessage<E extends Error>(err: E): E {
  Object.defineProperty(err, 'message', {
    get() {
      throw new Error('message getter');
    },
  });
  return err;
}

describe('record', () => {
  afterEach(() => {
    resetConfig();
  });

  describe('successful calls', () => {
    it('should wrap the return value and write one row', () => {
      const out = record(Math.sqrt)(9);
      expect(unveil(out, 'value')).toBe(3);
      expect(out.isSuccess()).toBe(true);
      expect(out.rows).toHaveLength(1);

      const row = out.rows[0];
      expect(row.opsNumber).toBe(1);
      expect(row.outcome).toBe('success');
      expect(row.functionLabel).toBe('sqrt');
      expect(row.message).toBeNull();
      expect(row.priorOutcome).toBeNull();
      expect(row.inspectorResult).toBeNull();
      expect(row.diffResult).toBeNull();
      expect(row.runTime).toBeGreaterThanOrEqual(0);
      expect(row.startTime).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
    });

    it('should write one display line per call', () => {
      const out = record(Math.sqrt)(16);
      expect(out.lines).toHaveLength(1);
      expect(out.lines[0]).toMatch(LINE);
    });
  });

  describe('failing calls', () => {
    it('should record a throw as a failure with kind and text', () => {
      const out = record(invert)(0n);
      expect(unveil(out, 'value')).toBeNull();
      expect(out.isSuccess()).toBe(false);
      expect(out.rows[0].outcome).toBe('failure');
      expect(out.rows[0].message).toBe('RangeError: Division by zero');
      expect(out.lines[0].startsWith('NOK `invert` at ')).toBe(true);
    });

    it('should render the bound call as the label of a failed row', () => {
      const out = record(invert)(0n);
      expect(out.rows[0].functionLabel).toBe('invert(x=0n)');
    });

    it('should contain non-Error throws', () => {
      const out = record((): number => {
        throw 'plain string';
      })();
      expect(out.rows[0].message).toBe('NonErrorThrown: plain string');
    });

    it('should record errors whose message getter throws', () => {
      const out = record((): number => {
        throw withUnreadableMessage(new TypeError('hidden'));
      })();
      expect(out.isSuccess()).toBe(false);
      expect(out.rows[0].message).toBe('TypeError: <unprintable>');
    });
  });

  describe('strictness', () => {
    it('should ignore warnings and printed output at level 1', () => {
      expect(record(noisy)(1).isSuccess()).toBe(true);
      expect(record(chatty)(1).isSuccess()).toBe(true);
    });

    it('should fail on the first warning at level 2', () => {
      const out = record(noisy, { strictness: 2 })(1);
      expect(out.isSuccess()).toBe(false);
      expect(out.rows[0].message).toBe('Warning: heads up');
      expect(out.rows[0].functionLabel).toBe('noisy(x=1)');
    });

    it('should still allow printed output at level 2', () => {
      expect(record(chatty, { strictness: 2 })(1).isSuccess()).toBe(true);
    });

    it('should fail on trimmed printed output at level 3', () => {
      const out = record(chatty, { strictness: 3 })(1);
      expect(out.isSuccess()).toBe(false);
      expect(out.rows[0].message).toBe('Message: printed');
    });

    it('should ignore whitespace-only output at level 3', () => {
      expect(record(blank, { strictness: 3 })(1).isSuccess()).toBe(true);
    });

    it('should report the warning before the printed output', () => {
      const both = (x: number): number => {
        console.log('said something');
        console.warn('first warning');
        console.warn('second warning');
        return x;
      };
      expect(record(both, { strictness: 3 })(1).rows[0].message).toBe('Warning: first warning');
    });

    it('should keep the thrown error message over policy messages', () => {
      const warnsThenThrows = (): number => {
        console.warn('ignored');
        throw new TypeError('real cause');
      };
      expect(record(warnsThenThrows, { strictness: 3 })().rows[0].message).toBe('TypeError: real cause');
    });
  });

  describe('inspector', () => {
    it('should record the inspector result and a summary diff', () => {
      const out = record(identity, {
        inspector: (x) => ['len', String(x).length],
        diff: 'summary',
      })({ a: 1 });
      const row = out.rows[0];
      expect(row.inspectorResult).toEqual(['len', 15]);
      expect(typeof row.diffResult).toBe('string');
      expect(row.diffResult).toBe('Found differences: 0 insertions, 14 deletions, 8 matches (char units)');
    });

    it('should contain inspector errors without failing the step', () => {
      const out = record(identity, {
        inspector: () => {
          throw new Error('bad inspector');
        },
      })(5);
      expect(out.isSuccess()).toBe(true);
      expect(unveil(out, 'value')).toBe(5);
      expect(out.rows[0].inspectorResult).toBe('<inspector error: Error: bad inspector>');
    });

    it('should contain inspector errors whose message getter throws', () => {
      const out = record(identity, {
        inspector: () => {
          throw withUnreadableMessage(new RangeError('hidden'));
        },
      })(5);
      expect(out.isSuccess()).toBe(true);
      expect(out.rows[0].inspectorResult).toBe('<inspector error: RangeError: <unprintable>>');
    });

    it('should not run on failed steps', () => {
      let calls = 0;
      const out = record(invert, {
        inspector: () => {
          calls++;
          return 'seen';
        },
      })(0n);
      expect(calls).toBe(0);
      expect(out.rows[0].inspectorResult).toBeNull();
    });
  });

  describe('diff', () => {
    it('should produce unified diff lines in full mode', () => {
      const out = record(identity, { diff: 'full' })(1);
      expect(out.rows[0].diffResult).toEqual([
        '--- input',
        '+++ output',
        '@@ -1 +1 @@',
        '-{ args: [ 1 ] }',
        '+1',
      ]);
    });

    it('should diff against a placeholder when the step failed', () => {
      const out = record(invert, { diff: 'full' })(0n);
      expect(out.rows[0].diffResult).toEqual([
        '--- input',
        '+++ output',
        '@@ -1 +1 @@',
        '-{ args: [ 0n ] }',
        '+<no-output>',
      ]);
    });

    it('should truncate renderings at the configured limit', () => {
      const out = record(identity, { diff: 'full', reprLimit: 10 })('x');
      expect(out.rows[0].diffResult).toEqual([
        '--- input',
        '+++ output',
        '@@ -1 +1 @@',
        "-{ args: [  ... [truncated]",
        "+'x'",
      ]);
    });
  });

  describe('configuration', () => {
    it('should label by function name, custom label, or placeholder', () => {
      expect(record(noisy).label).toBe('noisy');
      expect(record(noisy, { label: 'loud' }).label).toBe('loud');
      expect(record((x: number) => x).label).toBe(ANONYMOUS_LABEL);
    });

    it('should expose frozen resolved options and the wrapped function', () => {
      const r = record(noisy, { strictness: 2 });
      expect(r.fn).toBe(noisy);
      expect(r.options).toEqual({
        strictness: 2,
        inspector: undefined,
        diff: 'none',
        label: 'noisy',
        reprLimit: 2000,
      });
      expect(Object.isFrozen(r.options)).toBe(true);
    });

    it('should reject an unknown diff mode at construction', () => {
      // @ts-expect-error diff mode outside the accepted set
      expect(() => record(noisy, { diff: 'sideways' })).toThrow(InvalidConfigurationError);
    });

    it('should reject a non-positive repr limit', () => {
      try {
        record(noisy, { reprLimit: 0 });
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(InvalidConfigurationError);
        if (err instanceof InvalidConfigurationError) {
          expect(err.code).toBe('INVALID_CONFIGURATION');
          expect(err.issues).toHaveLength(1);
          expect(err.issues[0].startsWith('reprLimit: ')).toBe(true);
        }
      }
    });

    it('should treat an empty label as absent', () => {
      expect(record(noisy, { label: '' }).label).toBe('noisy');
      expect(record((x: number) => x, { label: '' }).label).toBe(ANONYMOUS_LABEL);
    });

    it('should fall back to the process-wide configuration', () => {
      setConfig(ChronicleConfigSchema.parse({ recorder: { strictness: 2, diff: 'summary' } }));
      const r = record(noisy);
      expect(r.options.strictness).toBe(2);
      expect(r.options.diff).toBe('summary');
      expect(r(1).isSuccess()).toBe(false);
    });

    it('should let explicit options win over the configuration', () => {
      setConfig(ChronicleConfigSchema.parse({ recorder: { strictness: 3 } }));
      expect(record(noisy, { strictness: 1 })(1).isSuccess()).toBe(true);
    });
  });

  describe('async functions', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should record the returned promise and log its later rejection', async () => {
      const warn = vi.spyOn(getLogger(), 'warn');
      const late = async (): Promise<number> => {
        throw new Error('late');
      };

      const out = record(late)();
      expect(out.isSuccess()).toBe(true);
      const pending = unveil(out, 'value');
      expect(pending).toBeInstanceOf(Promise);

      await new Promise((resolve) => setImmediate(resolve));
      expect(warn).toHaveBeenCalledWith(
        { label: 'late', error: 'Error: late' },
        'Recorded promise rejected after the call returned',
      );
      await expect(pending).rejects.toThrow('late');
    });
  });

  describe('factory form', () => {
    it('should return a wrapper awaiting the function', () => {
      const strict = record({ strictness: 2, label: 'strict-noisy' });
      const r = strict(noisy);
      expect(r.label).toBe('strict-noisy');
      expect(r(1).rows[0].message).toBe('Warning: heads up');
    });

    it('should validate the configuration before a function is given', () => {
      expect(() => record({ reprLimit: -5 })).toThrow(InvalidConfigurationError);
    });
  });

  describe('RecordedFunction', () => {
    it('should be usable directly', () => {
      const rf = new RecordedFunction((a: number, b: number) => a + b, { label: 'add' });
      expect(rf.label).toBe('add');
      expect(unveil(rf.call(2, 3), 'value')).toBe(5);
    });
  });

  describe('andThen', () => {
    it('should label the composite by both parts', () => {
      const inc = (x: number): number => x + 1;
      const composite = andThen(record(inc), record(Math.sqrt));
      expect(composite.label).toBe('inc >> sqrt');
      expect(unveil(composite(8), 'value')).toBe(3);
    });
  });
});
