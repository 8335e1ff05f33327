export interface PerformanceMetrics {
  annReturn: number;
  annVol: number;
  sharpe: number;
  maxDrawdown: number;
}

export type TradeMarkerKind = 'entry' | 'exit' | 'flip';

export interface TradeMarker {
  index: number;
  z: number | null;
  kind: TradeMarkerKind;
}

export interface RoundTrip {
  side: 'long' | 'short';
  entryIndex: number;
  exitIndex: number;
  entryDate: string;
  exitDate: string;
  holdingDays: number;
  return: number;
  open: boolean; // still held on the last row
}

export interface AdfResult {
  statistic: number;
  pValue: number;
  usedLag: number;
  nobs: number;
  criticalValues: { '1%': number; '5%': number; '10%': number };
  stationaryAt5: boolean;
}

export interface PairDiagnostics {
  beta: number;
  adf: AdfResult;
  halfLife: number;
}
