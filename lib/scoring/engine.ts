import type {
  BattingLine,
  BattingPoints,
  BowlingLine,
  BowlingPoints,
  FieldingLine,
  FieldingPoints,
  PerformanceRecord,
  ScoreBreakdown,
} from "@/lib/domain/types";
import type { RuleSet } from "@/lib/rules/schemas";
import { oversToBalls } from "./overs";

// Absent, NaN and negative counts all score as zero.
export function count(v: number | null | undefined): number {
  return typeof v === "number" && Number.isFinite(v) && v > 0 ? v : 0;
}

export function scoreBatting(line: BattingLine | null | undefined, rules: RuleSet): BattingPoints {
  const r = rules.batting;
  const runs = count(line?.runs);
  const balls = count(line?.balls_faced);
  const base = runs * r.pointsPerRun;

  let srMultiplier = 1;
  if (balls > 0 && runs > 0) {
    const strikeRate = (runs / balls) * 100;
    srMultiplier = strikeRate / 100;
  }
  const run_points = base * srMultiplier;

  // Independent milestones: a century also earns the fifty bonus.
  const fifty_bonus = runs >= 50 ? r.fiftyBonus : 0;
  const century_bonus = runs >= 100 ? r.centuryBonus : 0;
  const duck_penalty = line?.dismissed === true && runs === 0 && balls >= 1 ? r.duckPenalty : 0;

  return {
    run_points,
    strike_rate_multiplier: srMultiplier,
    fifty_bonus,
    century_bonus,
    duck_penalty,
    total: run_points + fifty_bonus + century_bonus + duck_penalty,
  };
}

export function scoreBowling(line: BowlingLine | null | undefined, rules: RuleSet): BowlingPoints {
  const r = rules.bowling;
  const wickets = count(line?.wickets);
  const overs = oversToBalls(line?.overs) / 6;
  const conceded = count(line?.runs_conceded);
  const base = wickets * r.pointsPerWicket;

  let erMultiplier = 1;
  if (overs > 0 && wickets > 0) {
    const economy = conceded / overs;
    erMultiplier = economy === 0 ? r.maxEconomyMultiplier : r.economyBaseline / economy;
  }
  const wicket_points = base * erMultiplier;
  const maiden_points = count(line?.maidens) * r.pointsPerMaiden;
  const five_wicket_bonus = wickets >= 5 ? r.fiveWicketBonus : 0;

  return {
    wicket_points,
    economy_multiplier: erMultiplier,
    maiden_points,
    five_wicket_bonus,
    total: wicket_points + maiden_points + five_wicket_bonus,
  };
}

export function scoreFielding(
  line: FieldingLine | null | undefined,
  rules: RuleSet,
  isWicketKeeper = false
): FieldingPoints {
  const r = rules.fielding;
  const catchValue = r.pointsPerCatch * (isWicketKeeper ? r.wicketKeeperCatchMultiplier : 1);
  const catch_points = count(line?.catches) * catchValue;
  const stumping_points = count(line?.stumpings) * r.pointsPerStumping;
  const run_out_points = count(line?.run_outs) * r.pointsPerRunOut;
  return {
    catch_points,
    stumping_points,
    run_out_points,
    total: catch_points + stumping_points + run_out_points,
  };
}

export function tierMultiplier(tier: string | null | undefined, rules: RuleSet): number {
  if (!tier) return 1;
  return rules.tierMultipliers[tier] ?? 1;
}

// Pure: same record + rules always gives the same breakdown.
// Only the grand total is floored; component totals may be negative.
export function scorePerformance(record: PerformanceRecord, rules: RuleSet): ScoreBreakdown {
  const batting = scoreBatting(record.batting, rules);
  const bowling = scoreBowling(record.bowling, rules);
  const fielding = scoreFielding(record.fielding, rules, record.is_wicket_keeper === true);
  const tier_multiplier = tierMultiplier(record.tier, rules);

  const raw = (batting.total + bowling.total + fielding.total) * tier_multiplier;
  return {
    batting,
    bowling,
    fielding,
    bonuses:
      batting.fifty_bonus + batting.century_bonus + batting.duck_penalty + bowling.five_wicket_bonus,
    tier_multiplier,
    grand_total: Math.max(0, raw),
  };
}
