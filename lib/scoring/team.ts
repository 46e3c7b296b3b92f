import type { MultiplierSnapshot } from "@/lib/domain/types";
import type { RuleSet } from "@/lib/rules/schemas";

export type TeamRole = "captain" | "vice_captain" | "player";

export type TeamSelection = {
  player_key: string;
  role?: TeamRole;
};

export type TeamPlayerPoints = {
  player_key: string;
  role: TeamRole;
  base_points: number;
  multiplier: number;
  leadership: number;
  points: number;
};

export type TeamScore = {
  total: number;
  players: TeamPlayerPoints[];
};

export function applyPlayerMultiplier(points: number, multiplier: number): number {
  return points * multiplier;
}

export function leadershipMultiplier(role: TeamRole | undefined, rules: RuleSet): number {
  switch (role) {
    case "captain":
      return rules.leadership.captain;
    case "vice_captain":
      return rules.leadership.viceCaptain;
    default:
      return 1;
  }
}

// base points × player multiplier × leadership; players missing from the
// snapshot play at the neutral multiplier.
export function scoreTeam(
  selection: TeamSelection[],
  basePoints: Record<string, number>,
  snapshot: Pick<MultiplierSnapshot, "multipliers"> | null,
  rules: RuleSet
): TeamScore {
  const players: TeamPlayerPoints[] = selection.map((s) => {
    const role = s.role ?? "player";
    const base_points = basePoints[s.player_key] ?? 0;
    const multiplier = snapshot?.multipliers[s.player_key] ?? rules.multiplier.neutral;
    const leadership = leadershipMultiplier(role, rules);
    return {
      player_key: s.player_key,
      role,
      base_points,
      multiplier,
      leadership,
      points: applyPlayerMultiplier(base_points, multiplier) * leadership,
    };
  });
  return {
    total: players.reduce((sum, p) => sum + p.points, 0),
    players,
  };
}
