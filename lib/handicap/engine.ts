import type { HandicapScope, MultiplierSnapshot, ScoreDistribution } from "@/lib/domain/types";
import type { RuleSet } from "@/lib/rules/schemas";
import { round2 } from "@/lib/season/totals";

export type PlayerPoints = { key: string; points: number };

type Bounds = RuleSet["multiplier"];

function clamp(v: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, v));
}

function median(sorted: readonly number[]): number {
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

// Zero scores carry no signal and stay out of the distribution.
export function scoreDistribution(points: readonly number[]): ScoreDistribution | null {
  const sorted = points.filter((p) => Number.isFinite(p) && p !== 0).sort((a, b) => a - b);
  if (sorted.length === 0) return null;
  return {
    count: sorted.length,
    min: sorted[0],
    median: median(sorted),
    max: sorted[sorted.length - 1],
  };
}

// Piecewise linear: max at the scope minimum, neutral at the median, min at
// the scope maximum. Unrounded.
export function targetMultiplier(points: number, dist: ScoreDistribution | null, bounds: Bounds): number {
  if (!dist || points === 0 || !Number.isFinite(points)) return bounds.neutral;
  if (points <= dist.median) {
    const span = dist.median - dist.min;
    if (span <= 0) return bounds.neutral;
    const t = clamp((points - dist.min) / span, 0, 1);
    return bounds.max + (bounds.neutral - bounds.max) * t;
  }
  const span = dist.max - dist.median;
  if (span <= 0) return bounds.neutral;
  const t = clamp((points - dist.median) / span, 0, 1);
  return bounds.neutral + (bounds.min - bounds.neutral) * t;
}

/**
 * One drift step toward the target: `round2(previous * (1 - d) + target * d)`,
 * clamped to the bounds.
 *
 * When that rounds back to the previous value short of the rounded target,
 * the result moves one cent toward the target instead, so it can differ from
 * the plain rounded blend by 0.01.
 */
export function blendMultiplier(previous: number, target: number, bounds: Bounds): number {
  const d = bounds.driftRate;
  let next = round2(previous * (1 - d) + target * d);
  const goal = round2(target);
  if (next === round2(previous) && next !== goal) {
    next = round2(next + (goal > next ? 0.01 : -0.01));
  }
  return clamp(next, bounds.min, bounds.max);
}

export function adjust(
  scope: HandicapScope,
  players: readonly PlayerPoints[],
  previous: Readonly<Record<string, number>>,
  rules: RuleSet,
  now: Date = new Date()
): MultiplierSnapshot {
  const bounds = rules.multiplier;
  const distribution = scoreDistribution(players.map((p) => p.points));
  const multipliers: Record<string, number> = {};
  const targets: Record<string, number> = {};
  for (const p of players) {
    const target = targetMultiplier(p.points, distribution, bounds);
    targets[p.key] = target;
    multipliers[p.key] = blendMultiplier(previous[p.key] ?? bounds.neutral, target, bounds);
  }
  return { scope, computed_at: now.toISOString(), multipliers, targets, distribution };
}
