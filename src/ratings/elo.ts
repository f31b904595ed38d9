// src/ratings/elo.ts
// Logistic expectation curve and the helpers built on it.
import type { RoundingMode } from './types';

// ---------------------------------------
// Expected score
// ---------------------------------------
export function expectedScore(rA: number, rB: number): number {
  // 1 / (1 + 10^((Rb - Ra)/400))
  return 1 / (1 + Math.pow(10, (rB - rA) / 400));
}

/**
 * Rating at which `fraction` would be the expected score against an
 * opponent rated `avgOpponent`. Clamped to `avgOpponent ± spread`, which is
 * also what a 0% or 100% score yields.
 */
export function performanceRating(
  avgOpponent: number,
  fraction: number,
  spread: number
): number {
  if (fraction <= 0) return avgOpponent - spread;
  if (fraction >= 1) return avgOpponent + spread;
  const diff = 400 * Math.log10(fraction / (1 - fraction));
  return avgOpponent + Math.max(-spread, Math.min(spread, diff));
}

// ---------------------------------------
// Rounding
// ---------------------------------------
function roundHalfEven(x: number): number {
  const f = Math.floor(x);
  const frac = x - f;
  if (frac > 0.5) return f + 1;
  if (frac < 0.5) return f;
  return f % 2 === 0 ? f : f + 1;
}

export function roundRating(x: number, mode: RoundingMode): number {
  switch (mode) {
    case 'half-even':
      return roundHalfEven(x);
    case 'half-up':
      return Math.floor(x + 0.5);
    default: {
      const _exhaustive: never = mode;
      return _exhaustive;
    }
  }
}
