// Round-half-to-even on the scaled value, the way tabular libraries round.
export function roundHalfEven(value: number, decimals = 2): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const diff = scaled - floor;

  let rounded: number;
  if (diff > 0.5) rounded = floor + 1;
  else if (diff < 0.5) rounded = floor;
  else rounded = floor % 2 === 0 ? floor : floor + 1;

  return rounded / factor;
}

export function sum(values: readonly (number | null)[]): number {
  let total = 0;
  for (const v of values) {
    if (v !== null) total += v;
  }
  return total;
}
