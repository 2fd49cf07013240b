export const SCORE_MIN = 1.0;
export const SCORE_MAX = 10.0;

/** Clamp to the 1–10 scale and round to one decimal */
export function normalizeScore(score: number): number {
  const clamped = Math.min(SCORE_MAX, Math.max(SCORE_MIN, score));
  return Math.round(clamped * 10) / 10;
}
