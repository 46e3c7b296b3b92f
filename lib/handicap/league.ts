import type { CanonicalPlayer } from "@/lib/domain/types";
import type { RuleSet } from "@/lib/rules/schemas";
import { scorePerformance } from "@/lib/scoring/engine";
import type { PlayerPoints } from "./engine";

export type LeagueDefinition = {
  league_id: string;
  roster: string[];
  rules?: RuleSet; // league scoring; season scores are reused when absent
  since?: string; // ISO date; earlier matches and undated ones do not count
};

function counts(matchDate: string | null | undefined, since: string | undefined): boolean {
  if (!since) return true;
  return !!matchDate && matchDate >= since;
}

// Roster members only, in roster order. Unknown keys score zero.
export function leagueSeasonPoints(players: readonly CanonicalPlayer[], league: LeagueDefinition): PlayerPoints[] {
  const byKey = new Map(players.map((p) => [p.key, p]));
  const seen = new Set<string>();
  const out: PlayerPoints[] = [];
  for (const key of league.roster) {
    if (seen.has(key)) continue;
    seen.add(key);
    const p = byKey.get(key);
    if (!p) {
      out.push({ key, points: 0 });
      continue;
    }
    if (!league.rules && !league.since) {
      out.push({ key, points: p.totals.fantasy_points });
      continue;
    }
    let points = 0;
    for (const h of p.history) {
      if (!counts(h.performance.match_date, league.since)) continue;
      points += league.rules ? scorePerformance(h.performance, league.rules).grand_total : h.score.grand_total;
    }
    out.push({ key, points });
  }
  return out;
}
