// src/utils/precision.ts

export const PERCENT_DIGITS = 2;
export const SCORE_DIGITS = 3;
export const MAX_SCORE = 3;

export const roundTo = (value: number, digits: number): number => Number(value.toFixed(digits));

export const percentToScore = (percent: number): number => roundTo((percent * MAX_SCORE) / 100, SCORE_DIGITS);

export const scoreToPercent = (score: number): number => roundTo((score / MAX_SCORE) * 100, PERCENT_DIGITS);

// Numeric-aware ordering so "CO2" sorts before "CO10"
export const compareIds = (a: string, b: string): number =>
  a.localeCompare(b, "en", { numeric: true, sensitivity: "base" }) || (a < b ? -1 : a > b ? 1 : 0);
