import type {
  PairThresholds,
  PositionSignal,
  PositionState,
  PositionStep,
  PositionTrajectory,
} from '../types/pairs';
import { validateThresholds } from '../config/params';
import { ConfigError } from '../errors';

export const FLAT: PositionState = Object.freeze({ kind: 'FLAT' });

export function signalOf(state: PositionState): PositionSignal {
  switch (state.kind) {
    case 'LONG':
      return 1;
    case 'SHORT':
      return -1;
    case 'FLAT':
    case 'PENDING_LONG':
    case 'PENDING_SHORT':
      return 0;
  }
}

/**
 * One step of the position state machine. Total over every state, and the
 * only place entry, confirmation, stop, take-profit and exit are decided.
 *
 * Rules, in priority order:
 * - `null` z: nothing changes; an open position is held through the gap
 * - in a position: stop (|z| >= stop), then take-profit (|z| < tp), then exit (|z| <= zOut)
 * - flat: a cross of +/-zIn moves to pending, never straight into a position
 * - pending: enter on the next bar, or once z has come back by `confirmDelta`
 */
export function stepPosition(
  state: PositionState,
  z: number | null,
  thresholds: PairThresholds
): PositionStep {
  if (z === null || Number.isNaN(z)) {
    return { state, signal: signalOf(state), event: 'gap' };
  }

  const { zIn, zOut, stop, tpThreshold, confirmDelta } = thresholds;
  const absZ = Math.abs(z);

  switch (state.kind) {
    case 'LONG':
    case 'SHORT': {
      if (absZ >= stop) {
        return { state: FLAT, signal: 0, event: 'stop' };
      }
      if (tpThreshold !== undefined && absZ < tpThreshold) {
        return { state: FLAT, signal: 0, event: 'take_profit' };
      }
      if (absZ <= zOut) {
        return { state: FLAT, signal: 0, event: 'exit' };
      }
      return { state, signal: signalOf(state), event: 'hold' };
    }

    case 'FLAT': {
      if (z >= zIn) {
        return { state: { kind: 'PENDING_SHORT', zCross: z }, signal: 0, event: 'cross' };
      }
      if (z <= -zIn) {
        return { state: { kind: 'PENDING_LONG', zCross: z }, signal: 0, event: 'cross' };
      }
      return { state: FLAT, signal: 0, event: 'none' };
    }

    case 'PENDING_SHORT': {
      if (confirmDelta <= 0 || z <= Math.max(zIn, state.zCross - confirmDelta)) {
        return { state: { kind: 'SHORT' }, signal: -1, event: 'entry' };
      }
      return { state, signal: 0, event: 'none' };
    }

    case 'PENDING_LONG': {
      if (confirmDelta <= 0 || z >= Math.min(-zIn, state.zCross + confirmDelta)) {
        return { state: { kind: 'LONG' }, signal: 1, event: 'entry' };
      }
      return { state, signal: 0, event: 'none' };
    }
  }
}

/**
 * Scan a z-score series into a position trajectory. `yPos` is the spread
 * position (+1 long B / short beta*A, -1 the reverse); `xPos = beta * yPos`.
 */
export function generatePositions(
  z: readonly (number | null)[],
  beta: number,
  thresholds: PairThresholds
): PositionTrajectory {
  validateThresholds(thresholds);
  if (!Number.isFinite(beta)) {
    throw new ConfigError('beta must be a finite number', { beta });
  }

  const steps: PositionStep[] = [];
  let state = FLAT;
  for (const value of z) {
    const step = stepPosition(state, value, thresholds);
    steps.push(step);
    state = step.state;
  }

  const yPos = steps.map((s) => s.signal);
  const xPos = yPos.map((y) => beta * y);

  return { yPos, xPos, steps };
}
