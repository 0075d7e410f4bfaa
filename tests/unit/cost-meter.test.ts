import { CostMeter } from '../../src/budget/cost-meter';
import { costOfUsage, estimateCost } from '../../src/budget/pricing';
import { FakeClock } from '../helpers/fake-provider';

const DAY_MS = 86_400_000;

describe('CostMeter', () => {
  let clock: FakeClock;
  let meter: CostMeter;

  beforeEach(() => {
    clock = new FakeClock(Date.UTC(2026, 0, 15, 23, 59, 0));
    meter = new CostMeter(1, clock.now);
  });

  describe('canAdmit', () => {
    it('should admit an estimate that lands exactly on the limit', () => {
      meter.record(0.5);
      expect(meter.canAdmit(0.5)).toBe(true);
      expect(meter.canAdmit(0.51)).toBe(false);
    });

    it('should reject negative or non-finite estimates', () => {
      expect(() => meter.canAdmit(-1)).toThrow(RangeError);
      expect(() => meter.canAdmit(Number.NaN)).toThrow(RangeError);
    });

    it('should not change state', () => {
      meter.canAdmit(0.25);
      expect(meter.snapshot()).toMatchObject({ spent: 0, reserved: 0, remaining: 1 });
    });
  });

  describe('record', () => {
    it('should only ever increase spend within a window', () => {
      const seen: number[] = [];
      for (const cost of [0.1, 0, 0.25, 0.4]) {
        meter.record(cost);
        seen.push(meter.snapshot().spent);
      }
      expect(seen).toEqual([...seen].sort((a, b) => a - b));
      expect(meter.snapshot().spent).toBeCloseTo(0.75);
    });

    it('should accept an actual cost that overshoots the limit', () => {
      meter.record(1.5);
      expect(meter.snapshot()).toMatchObject({ spent: 1.5, remaining: 0 });
      expect(meter.canAdmit(0)).toBe(false);
    });
  });

  describe('daily window', () => {
    it('should reset spend at the start of the next UTC day', () => {
      meter.record(1);
      expect(meter.canAdmit(0.1)).toBe(false);

      clock.advance(60_000);

      expect(meter.canAdmit(0.1)).toBe(true);
      expect(meter.snapshot()).toMatchObject({ spent: 0, windowStart: Date.UTC(2026, 0, 16) });
    });

    it('should keep spend within the same UTC day', () => {
      meter.record(0.4);
      clock.advance(30_000);
      expect(meter.snapshot().spent).toBe(0.4);
    });
  });

  describe('reserve', () => {
    it('should hold the estimate until the call settles', () => {
      const first = meter.reserve(0.6);
      expect(first).not.toBeNull();
      expect(meter.reserve(0.6)).toBeNull();
      expect(meter.snapshot()).toMatchObject({ reserved: 0.6 });

      first?.commit(0.2);
      expect(meter.snapshot()).toMatchObject({ spent: 0.2, reserved: 0 });
    });

    it('should return the hold on release without spending', () => {
      const reservation = meter.reserve(0.6);
      reservation?.release();
      expect(meter.snapshot()).toMatchObject({ spent: 0, reserved: 0, remaining: 1 });
    });

    it('should settle a reservation only once', () => {
      const reservation = meter.reserve(0.3);
      reservation?.commit(0.3);
      reservation?.commit(0.3);
      reservation?.release();
      expect(meter.snapshot()).toMatchObject({ spent: 0.3, reserved: 0 });
    });

    it('should not let a hold from yesterday reduce today\'s reservations', () => {
      const yesterday = meter.reserve(0.5);
      clock.advance(DAY_MS);
      const today = meter.reserve(0.25);

      yesterday?.release();
      expect(meter.snapshot().reserved).toBe(0.25);
      today?.commit(0.25);
      expect(meter.snapshot()).toMatchObject({ spent: 0.25, reserved: 0 });
    });
  });

  it('should reject an invalid limit', () => {
    expect(() => new CostMeter(-5)).toThrow(RangeError);
  });
});

describe('pricing', () => {
  it('should price tokens per thousand with overrides', () => {
    expect(estimateCost('openai', 2000, { openai: 0.01 })).toBe(0.02);
    expect(estimateCost('ollama', 5000)).toBe(0);
  });

  it('should price reported usage by total tokens', () => {
    expect(costOfUsage('gemini', { promptTokens: 1500, completionTokens: 500, totalTokens: 2000 })).toBe(0.002);
  });
});
