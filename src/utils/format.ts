export function pickNumber(input: unknown): number | null {
  if (input === null || input === undefined || input === '') return null;
  const num = Number(input);
  if (!Number.isFinite(num)) return null;
  return num;
}

// Yahoo returns either plain numbers (formatted=false) or { raw, fmt } pairs
export function readRaw(input: unknown): number | null {
  if (typeof input === 'object' && input !== null && 'raw' in input) {
    return pickNumber(input.raw);
  }
  return pickNumber(input);
}

export function formatFinancialNumber(value: number | null): string {
  if (value === null || !Number.isFinite(value)) return 'N/A';
  const abs = Math.abs(value);
  if (abs >= 1e9) return `$${(value / 1e9).toFixed(2)}B`;
  if (abs >= 1e6) return `$${(value / 1e6).toFixed(2)}M`;
  if (abs >= 1e3) return `$${(value / 1e3).toFixed(2)}K`;
  return `$${value.toFixed(2)}`;
}

export function formatPercent(fraction: number): string {
  return `${(fraction * 100).toFixed(2)}%`;
}

export function formatBillions(value: number): string {
  return `$${(value / 1e9).toFixed(2)}B`;
}
