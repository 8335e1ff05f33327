import type { BacktestResult } from '../types/pairs';

export const CSV_HEADER = 'date,ret,equity,z,yPos,xPos,turnover';

export function formatResultCsv(result: BacktestResult): string {
  const lines = result.rows.map((row) =>
    [
      row.date,
      row.ret,
      row.equity,
      row.z === null ? '' : row.z,
      row.yPos,
      row.xPos,
      row.turnover,
    ].join(',')
  );
  return [CSV_HEADER, ...lines].join('\n') + '\n';
}
