import { describe, it, expect } from 'vitest';
import { generatePositions, stepPosition, FLAT } from '../../src/signals/positions';
import { ConfigError } from '../../src/errors';
import type { PairThresholds } from '../../src/types/pairs';

const thresholds: PairThresholds = {
  zIn: 2,
  zOut: 0.5,
  stop: 3.5,
  confirmDelta: 0,
};

describe('generatePositions', () => {
  it('should enter one bar after the threshold cross, never on the crossing bar', () => {
    const { yPos, steps } = generatePositions([0, 1, 2.5, 0.3], 1.5, thresholds);

    expect(steps[2].state).toEqual({ kind: 'PENDING_SHORT', zCross: 2.5 });
    expect(yPos[2]).toBe(0);
    expect(yPos[3]).toBe(-1);
    expect(yPos).toEqual([0, 0, 0, -1]);
  });

  it('should go long the spread after a cross below -zIn', () => {
    const { yPos, steps } = generatePositions([0, -2.5, -1], 1, thresholds);

    expect(steps[1].state).toEqual({ kind: 'PENDING_LONG', zCross: -2.5 });
    expect(yPos).toEqual([0, 0, 1]);
    expect(steps[2].state.kind).toBe('LONG');
  });

  it('should keep xPos equal to beta times yPos', () => {
    const beta = 1.5;
    const { yPos, xPos } = generatePositions([0, 2.5, 2.2, 2.1, 0.2, -2.4, -2.2, 0], beta, thresholds);

    expect(yPos).toEqual([0, 0, -1, -1, 0, 0, 1, 0]);
    yPos.forEach((y, t) => expect(xPos[t]).toBe(beta * y));
  });

  it('should exit when |z| falls to zOut', () => {
    const { yPos, steps } = generatePositions([0, 2.5, 2.2, 0.4], 1, thresholds);

    expect(yPos).toEqual([0, 0, -1, 0]);
    expect(steps[3].event).toBe('exit');
    expect(steps[3].state).toEqual({ kind: 'FLAT' });
  });

  it('should stop out when |z| reaches the stop threshold', () => {
    const { yPos, steps } = generatePositions([0, 2.5, 2.2, 3.5, 2.2], 1, thresholds);

    expect(yPos).toEqual([0, 0, -1, 0, 0]);
    expect(steps[3].event).toBe('stop');
    // back to flat with no cross remembered: the next bar watches for a new cross
    expect(steps[4].state).toEqual({ kind: 'PENDING_SHORT', zCross: 2.2 });
  });

  it('should flag take-profit separately from the ordinary exit', () => {
    const withTp = { ...thresholds, tpThreshold: 0.3 };

    const tp = generatePositions([0, 2.5, 2.2, 0.1], 1, withTp);
    expect(tp.yPos[3]).toBe(0);
    expect(tp.steps[3].event).toBe('take_profit');

    const exit = generatePositions([0, 2.5, 2.2, 0.4], 1, withTp);
    expect(exit.yPos[3]).toBe(0);
    expect(exit.steps[3].event).toBe('exit');
  });

  it('should hold an open position through a missing z-score', () => {
    const { yPos, steps } = generatePositions([0, 2.5, 2.2, null, 2.1], 1, thresholds);

    expect(yPos).toEqual([0, 0, -1, -1, -1]);
    expect(steps[3].event).toBe('gap');
    expect(steps[3].state.kind).toBe('SHORT');
  });

  it('should stay flat through a missing z-score when not positioned', () => {
    const { yPos } = generatePositions([null, null, 0.5, null], 1, thresholds);

    expect(yPos).toEqual([0, 0, 0, 0]);
  });

  it('should remember a pending cross across a gap', () => {
    const { yPos, steps } = generatePositions([0, 2.5, null, 2.4], 1, thresholds);

    expect(steps[2].state).toEqual({ kind: 'PENDING_SHORT', zCross: 2.5 });
    expect(yPos).toEqual([0, 0, 0, -1]);
  });

  it('should wait for the reversal margin when confirmation is on', () => {
    const confirm = { ...thresholds, confirmDelta: 0.5 };

    // short: enter once z <= max(2, 2.8 - 0.5) = 2.3
    const short = generatePositions([0, 2.8, 3.0, 2.4, 2.2], 1, confirm);
    expect(short.yPos).toEqual([0, 0, 0, 0, -1]);
    expect(short.steps[3].state).toEqual({ kind: 'PENDING_SHORT', zCross: 2.8 });

    // long: enter once z >= min(-2, -2.2 + 0.5) = -2
    const long = generatePositions([0, -2.2, -2.1, -1.9], 1, confirm);
    expect(long.yPos).toEqual([0, 0, 0, 1]);
  });

  it('should never let the confirmation target sit inside the entry band', () => {
    const confirm = { ...thresholds, confirmDelta: 1 };

    // 2.1 - 1 = 1.1, but the target is clamped to zIn = 2
    const { yPos } = generatePositions([0, 2.1, 2.0], 1, confirm);
    expect(yPos).toEqual([0, 0, -1]);
  });

  it('should be deterministic', () => {
    const z = [null, 0, 2.3, 2.1, -0.2, -2.6, null, -1.2, 0.1];
    expect(generatePositions(z, 0.8, thresholds)).toEqual(generatePositions(z, 0.8, thresholds));
  });

  it('should reject invalid thresholds', () => {
    expect(() => generatePositions([0], 1, { ...thresholds, zIn: 0 })).toThrow(ConfigError);
    expect(() => generatePositions([0], 1, { ...thresholds, zOut: 2 })).toThrow(ConfigError);
    expect(() => generatePositions([0], 1, { ...thresholds, zOut: -0.1 })).toThrow(ConfigError);
    expect(() => generatePositions([0], 1, { ...thresholds, stop: 2 })).toThrow(ConfigError);
    expect(() => generatePositions([0], 1, { ...thresholds, tpThreshold: 0.6 })).toThrow(ConfigError);
    expect(() => generatePositions([0], 1, { ...thresholds, tpThreshold: -0.1 })).toThrow(ConfigError);
    expect(() => generatePositions([0], 1, { ...thresholds, confirmDelta: -1 })).toThrow(ConfigError);
    expect(() => generatePositions([0], Number.NaN, thresholds)).toThrow(ConfigError);
  });
});

describe('stepPosition', () => {
  it('should give the stop priority over take-profit and exit', () => {
    // thresholds where one z satisfies stop, take-profit and exit at once
    const overlapping: PairThresholds = {
      zIn: 2,
      zOut: 5,
      stop: 3,
      tpThreshold: 5,
      confirmDelta: 0,
    };

    const fromShort = stepPosition({ kind: 'SHORT' }, 4, overlapping);
    expect(fromShort.event).toBe('stop');
    expect(fromShort.state).toEqual({ kind: 'FLAT' });
    expect(fromShort.signal).toBe(0);

    const fromLong = stepPosition({ kind: 'LONG' }, -4, overlapping);
    expect(fromLong.event).toBe('stop');
  });

  it('should hold when no exit rule fires', () => {
    const step = stepPosition({ kind: 'LONG' }, -1.2, thresholds);

    expect(step.event).toBe('hold');
    expect(step.signal).toBe(1);
  });

  it('should not enter from flat on the crossing bar', () => {
    const step = stepPosition(FLAT, 3, thresholds);

    expect(step.signal).toBe(0);
    expect(step.state).toEqual({ kind: 'PENDING_SHORT', zCross: 3 });
  });

  it('should enter the bar after the cross whatever z is when confirmation is off', () => {
    const step = stepPosition({ kind: 'PENDING_SHORT', zCross: 2.5 }, 0.3, thresholds);

    expect(step.event).toBe('entry');
    expect(step.signal).toBe(-1);
  });
});
