import { z } from "zod";
import type { CanonicalPlayer, HistoryEntry, SeasonScope } from "@/lib/domain/types";
import { formatIssues } from "@/lib/ingest/parse";
import { PerformanceRecordSchema } from "@/lib/ingest/schemas";
import { computeAverages, replayTotals, round2 } from "./totals";

export type LeaderboardKey =
  | "fantasy_points"
  | "points_per_match"
  | "runs"
  | "wickets"
  | "catches"
  | "batting_average"
  | "strike_rate";

export type LeaderboardRow = {
  rank: number;
  key: string;
  display_name: string;
  club: string;
  value: number;
  matches_played: number;
};

const METRICS: Record<LeaderboardKey, (p: CanonicalPlayer) => number> = {
  fantasy_points: (p) => p.totals.fantasy_points,
  points_per_match: (p) => p.averages.points_per_match,
  runs: (p) => p.totals.batting.runs,
  wickets: (p) => p.totals.bowling.wickets,
  catches: (p) => p.totals.fielding.catches,
  batting_average: (p) => p.averages.batting_average,
  strike_rate: (p) => p.averages.strike_rate,
};

// Descending by metric; ties keep registration order. Players without a match are left out.
export function topPlayers(players: readonly CanonicalPlayer[], sortBy: LeaderboardKey, limit = 10): LeaderboardRow[] {
  const metric = METRICS[sortBy];
  return players
    .filter((p) => p.matches_played > 0)
    .map((p) => ({ p, value: metric(p) }))
    .sort((a, b) => b.value - a.value || a.p.registered_seq - b.p.registered_seq)
    .slice(0, Math.max(0, limit))
    .map(({ p, value }, i) => ({
      rank: i + 1,
      key: p.key,
      display_name: p.display_name,
      club: p.club,
      value,
      matches_played: p.matches_played,
    }));
}

export type SeasonSummary = {
  players: number;
  active_players: number;
  matches: number;
  performances: number;
  total_points: number;
  total_runs: number;
  total_wickets: number;
  clubs: string[];
  top_scorer: LeaderboardRow | null;
};

export function seasonSummary(players: readonly CanonicalPlayer[]): SeasonSummary {
  const matches = new Set<string>();
  const clubs = new Set<string>();
  let performances = 0;
  let points = 0;
  let runs = 0;
  let wickets = 0;
  for (const p of players) {
    clubs.add(p.club);
    for (const id of p.processed_matches) matches.add(id);
    performances += p.history.length;
    points += p.totals.fantasy_points;
    runs += p.totals.batting.runs;
    wickets += p.totals.bowling.wickets;
  }
  return {
    players: players.length,
    active_players: players.filter((p) => p.matches_played > 0).length,
    matches: matches.size,
    performances,
    total_points: round2(points),
    total_runs: runs,
    total_wickets: wickets,
    clubs: [...clubs].sort(),
    top_scorer: topPlayers(players, "fantasy_points", 1)[0] ?? null,
  };
}

// ---- export / import ----

const num = z.number().finite();

const ScoreBreakdownSchema = z.object({
  batting: z.object({
    run_points: num,
    strike_rate_multiplier: num,
    fifty_bonus: num,
    century_bonus: num,
    duck_penalty: num,
    total: num,
  }),
  bowling: z.object({
    wicket_points: num,
    economy_multiplier: num,
    maiden_points: num,
    five_wicket_bonus: num,
    total: num,
  }),
  fielding: z.object({
    catch_points: num,
    stumping_points: num,
    run_out_points: num,
    total: num,
  }),
  bonuses: num,
  tier_multiplier: num,
  grand_total: num.nonnegative(),
});

const ExportedPlayerSchema = z
  .object({
    key: z.string().min(1),
    display_name: z.string().trim().min(1),
    club: z.string().trim().min(1),
    external_id: z.string().min(1).nullable(),
    provenance: z.enum(["name_only", "id_confirmed"]),
    registered_seq: z.number().int().nonnegative(),
    multiplier: num.positive(),
    first_seen: z.string(),
    last_updated: z.string(),
    history: z.array(z.object({ performance: PerformanceRecordSchema, score: ScoreBreakdownSchema })),
  })
  .superRefine((p, ctx) => {
    const seen = new Set<string>();
    p.history.forEach((h, i) => {
      if (seen.has(h.performance.match_id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["history", i, "performance", "match_id"],
          message: `duplicate match ${h.performance.match_id}`,
        });
      }
      seen.add(h.performance.match_id);
    });
  });

export const SeasonExportSchema = z
  .object({
    version: z.literal(1),
    season: z.string().min(1),
    exported_at: z.string(),
    players: z.array(ExportedPlayerSchema),
  })
  .superRefine((s, ctx) => {
    const keys = new Set<string>();
    s.players.forEach((p, i) => {
      if (keys.has(p.key)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["players", i, "key"], message: `duplicate key ${p.key}` });
      }
      keys.add(p.key);
    });
  });

export type SeasonExport = {
  version: 1;
  season: string;
  exported_at: string;
  players: (Omit<CanonicalPlayer, "processed_matches"> & { processed_matches: string[] })[];
};

export function toSeasonExport(scope: SeasonScope, players: readonly CanonicalPlayer[], now: Date): SeasonExport {
  return {
    version: 1,
    season: scope.season,
    exported_at: now.toISOString(),
    players: players.map((p) => ({ ...structuredClone(p), processed_matches: [...p.processed_matches] })),
  };
}

// Totals, averages and processed matches are rebuilt from history, never trusted.
export function fromSeasonExport(payload: unknown): { season: string; players: CanonicalPlayer[] } {
  const parsed = SeasonExportSchema.safeParse(payload);
  if (!parsed.success) {
    throw new Error(
      "Invalid season export: " + formatIssues(parsed.error)
    );
  }
  const players = parsed.data.players.map((p): CanonicalPlayer => {
    const history: HistoryEntry[] = p.history;
    const totals = replayTotals(history);
    return {
      key: p.key,
      display_name: p.display_name,
      club: p.club,
      external_id: p.external_id,
      provenance: p.provenance,
      registered_seq: p.registered_seq,
      processed_matches: new Set(history.map((h) => h.performance.match_id)),
      history,
      totals,
      averages: computeAverages(totals, history.length),
      matches_played: history.length,
      multiplier: p.multiplier,
      first_seen: p.first_seen,
      last_updated: p.last_updated,
    };
  });
  return { season: parsed.data.season, players };
}
