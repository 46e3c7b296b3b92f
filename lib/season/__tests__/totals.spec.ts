import { describe, it, expect } from "vitest";
import { DEFAULT_RULES } from "@/lib/rules/config";
import { scorePerformance } from "@/lib/scoring/engine";
import type { HistoryEntry, PerformanceRecord } from "@/lib/domain/types";
import {
  computeAverages,
  emptyTotals,
  estimatedDismissals,
  foldPerformance,
  replayTotals,
} from "@/lib/season/totals";

const base = { player_name: "Jan de Vries", club: "VRA" };

const records: PerformanceRecord[] = [
  {
    ...base,
    match_id: "m1",
    tier: "tier1",
    batting: { runs: 75, balls_faced: 50, fours: 8, sixes: 2, dismissed: true },
    bowling: { wickets: 2, overs: 4, runs_conceded: 24 },
  },
  { ...base, match_id: "m2", tier: "tier1", batting: { runs: 120, balls_faced: 80, dismissed: false } },
  {
    ...base,
    match_id: "m3",
    batting: { runs: 0, balls_faced: 2, dismissed: true },
    bowling: { wickets: 5, overs: 10, runs_conceded: 30, maidens: 1 },
    fielding: { catches: 1 },
  },
];

const history: HistoryEntry[] = records.map((performance) => ({
  performance,
  score: scorePerformance(performance, DEFAULT_RULES),
}));

describe("season totals", () => {
  it("folds counts and milestones", () => {
    const t = replayTotals(history);
    expect(t.fantasy_points).toBe(482.5);
    expect(t.batting).toEqual({
      innings: 3,
      runs: 195,
      balls_faced: 132,
      fours: 8,
      sixes: 2,
      dismissals: 2,
      fifties: 1,
      centuries: 1,
      ducks: 1,
      highest_score: 120,
    });
    expect(t.bowling).toEqual({
      innings: 2,
      wickets: 7,
      balls: 84,
      maidens: 1,
      runs_conceded: 54,
      five_wicket_hauls: 1,
      best_figures: { wickets: 5, runs: 30 },
    });
    expect(t.fielding).toEqual({ catches: 1, stumpings: 0, run_outs: 0 });
    expect(t.matches_by_tier).toEqual({ tier1: 2, unrated: 1 });
  });

  it("agrees with an incremental fold", () => {
    const t = emptyTotals();
    for (const h of history) foldPerformance(t, h.performance, h.score);
    expect(t).toEqual(replayTotals(history));
  });

  it("computes rounded averages", () => {
    expect(computeAverages(replayTotals(history), 3)).toEqual({
      batting_average: 65,
      strike_rate: 147.73,
      bowling_average: 7.71,
      economy_rate: 3.86,
      points_per_match: 160.83,
    });
  });

  it("returns zeros for empty denominators", () => {
    expect(computeAverages(emptyTotals(), 0)).toEqual({
      batting_average: 0,
      strike_rate: 0,
      bowling_average: 0,
      economy_rate: 0,
      points_per_match: 0,
    });
  });

  it("prefers fewer runs when best figures tie on wickets", () => {
    const t = emptyTotals();
    const score = scorePerformance({ ...base, match_id: "x" }, DEFAULT_RULES);
    foldPerformance(t, { ...base, match_id: "a", bowling: { wickets: 3, overs: 4, runs_conceded: 20 } }, score);
    foldPerformance(t, { ...base, match_id: "b", bowling: { wickets: 3, overs: 4, runs_conceded: 15 } }, score);
    foldPerformance(t, { ...base, match_id: "c", bowling: { wickets: 2, overs: 4, runs_conceded: 5 } }, score);
    expect(t.bowling.best_figures).toEqual({ wickets: 3, runs: 15 });
  });

  it("estimates dismissals from innings alone", () => {
    const bat = emptyTotals().batting;
    expect(estimatedDismissals(bat)).toBe(1);
    expect(estimatedDismissals({ ...bat, innings: 5 })).toBe(4);
    expect(estimatedDismissals({ ...bat, innings: 1 })).toBe(1);
    expect(estimatedDismissals({ ...bat, innings: 5, dismissals: 2 })).toBe(4);
  });

  it("does not jump when a not-out run ends in a duck", () => {
    const t = emptyTotals();
    const score = scorePerformance({ ...base, match_id: "x" }, DEFAULT_RULES);
    for (const id of ["n1", "n2", "n3", "n4", "n5"]) {
      foldPerformance(t, { ...base, match_id: id, batting: { runs: 40, balls_faced: 30, dismissed: false } }, score);
    }
    expect(computeAverages(t, 5).batting_average).toBe(50);
    foldPerformance(t, { ...base, match_id: "d", batting: { runs: 0, balls_faced: 1, dismissed: true } }, score);
    expect(computeAverages(t, 6).batting_average).toBe(40);
  });
});
