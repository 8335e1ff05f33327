// A single observation of a price series, keyed by ISO date (YYYY-MM-DD).
export interface PricePoint {
  date: string;
  price: number;
}

export type PriceSeries = PricePoint[];

/** Aligned pair handed to the backtest: same dates, in order, no gaps. */
export interface AlignedPair {
  dates: string[];
  a: number[];
  b: number[];
}

// Thresholds that drive the position state machine.
export interface PairThresholds {
  zIn: number;
  zOut: number;
  stop: number;
  tpThreshold?: number; // take-profit on |z|; absent = disabled
  confirmDelta: number; // reversal required after the cross; 0 = enter next bar
}

export interface BacktestParams extends PairThresholds {
  lookback: number;
  costBps: number; // charged on traded notional of both legs combined
}

export type PositionState =
  | { kind: 'FLAT' }
  | { kind: 'PENDING_LONG'; zCross: number }
  | { kind: 'PENDING_SHORT'; zCross: number }
  | { kind: 'LONG' }
  | { kind: 'SHORT' };

export type PositionSignal = -1 | 0 | 1;

export type TransitionEvent =
  | 'none'
  | 'gap'
  | 'cross'
  | 'entry'
  | 'hold'
  | 'stop'
  | 'take_profit'
  | 'exit';

export interface PositionStep {
  state: PositionState;
  signal: PositionSignal;
  event: TransitionEvent;
}

export interface PositionTrajectory {
  yPos: number[];
  xPos: number[];
  steps: PositionStep[];
}

export interface BacktestRow {
  date: string;
  ret: number;
  grossReturn: number;
  cost: number;
  equity: number;
  z: number | null;
  yPos: number;
  xPos: number;
  turnover: number;
}

export interface BacktestResult {
  beta: number;
  params: BacktestParams;
  rows: BacktestRow[];
}
