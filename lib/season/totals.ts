import type {
  HistoryEntry,
  PerformanceRecord,
  ScoreBreakdown,
  SeasonAverages,
  SeasonTotals,
} from "@/lib/domain/types";
import { count } from "@/lib/scoring/engine";
import { oversToBalls } from "@/lib/scoring/overs";

export const NO_TIER = "unrated";

export function emptyTotals(): SeasonTotals {
  return {
    fantasy_points: 0,
    batting: {
      innings: 0,
      runs: 0,
      balls_faced: 0,
      fours: 0,
      sixes: 0,
      dismissals: 0,
      fifties: 0,
      centuries: 0,
      ducks: 0,
      highest_score: 0,
    },
    bowling: {
      innings: 0,
      wickets: 0,
      balls: 0,
      maidens: 0,
      runs_conceded: 0,
      five_wicket_hauls: 0,
      best_figures: null,
    },
    fielding: { catches: 0, stumpings: 0, run_outs: 0 },
    matches_by_tier: {},
  };
}

export function emptyAverages(): SeasonAverages {
  return { batting_average: 0, strike_rate: 0, bowling_average: 0, economy_rate: 0, points_per_match: 0 };
}

// Folds one scored performance into `totals` in place. Incremental updates and
// replays both go through here so they agree exactly.
export function foldPerformance(totals: SeasonTotals, record: PerformanceRecord, score: ScoreBreakdown): void {
  totals.fantasy_points += score.grand_total;

  const tier = record.tier?.trim() || NO_TIER;
  totals.matches_by_tier[tier] = (totals.matches_by_tier[tier] ?? 0) + 1;

  const bat = record.batting;
  if (bat) {
    const t = totals.batting;
    const runs = count(bat.runs);
    const balls = count(bat.balls_faced);
    t.innings += 1;
    t.runs += runs;
    t.balls_faced += balls;
    t.fours += count(bat.fours);
    t.sixes += count(bat.sixes);
    if (bat.dismissed === true) t.dismissals += 1;
    if (runs >= 100) t.centuries += 1;
    else if (runs >= 50) t.fifties += 1;
    if (bat.dismissed === true && runs === 0 && balls >= 1) t.ducks += 1;
    if (runs > t.highest_score) t.highest_score = runs;
  }

  const bowl = record.bowling;
  if (bowl) {
    const t = totals.bowling;
    const wickets = count(bowl.wickets);
    const conceded = count(bowl.runs_conceded);
    t.innings += 1;
    t.wickets += wickets;
    t.balls += oversToBalls(bowl.overs);
    t.maidens += count(bowl.maidens);
    t.runs_conceded += conceded;
    if (wickets >= 5) t.five_wicket_hauls += 1;
    const best = t.best_figures;
    if (!best || wickets > best.wickets || (wickets === best.wickets && conceded < best.runs)) {
      t.best_figures = { wickets, runs: conceded };
    }
  }

  const field = record.fielding;
  if (field) {
    totals.fielding.catches += count(field.catches);
    totals.fielding.stumpings += count(field.stumpings);
    totals.fielding.run_outs += count(field.run_outs);
  }
}

export function replayTotals(history: readonly HistoryEntry[]): SeasonTotals {
  const totals = emptyTotals();
  for (const entry of history) foldPerformance(totals, entry.performance, entry.score);
  return totals;
}

export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

// One not-out in every five innings, whatever was recorded.
export function estimatedDismissals(batting: SeasonTotals["batting"]): number {
  return Math.max(1, batting.innings - Math.floor(batting.innings / 5));
}

export function computeAverages(totals: SeasonTotals, matchesPlayed: number): SeasonAverages {
  const bat = totals.batting;
  const bowl = totals.bowling;
  return {
    batting_average: bat.innings > 0 ? round2(bat.runs / estimatedDismissals(bat)) : 0,
    strike_rate: bat.balls_faced > 0 ? round2((bat.runs / bat.balls_faced) * 100) : 0,
    bowling_average: bowl.wickets > 0 ? round2(bowl.runs_conceded / bowl.wickets) : 0,
    economy_rate: bowl.balls > 0 ? round2(bowl.runs_conceded / (bowl.balls / 6)) : 0,
    points_per_match: matchesPlayed > 0 ? round2(totals.fantasy_points / matchesPlayed) : 0,
  };
}
