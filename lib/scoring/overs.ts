// Cricket overs notation: the digit after the point counts balls, not tenths.

export function oversToBalls(overs: number | null | undefined): number {
  if (overs == null || !Number.isFinite(overs) || overs <= 0) return 0;
  const whole = Math.trunc(overs);
  const part = Math.round((overs - whole) * 10);
  return whole * 6 + part;
}

export function ballsToOvers(balls: number): number {
  if (!Number.isFinite(balls) || balls <= 0) return 0;
  const whole = Math.floor(balls / 6);
  return whole + (balls % 6) / 10;
}
