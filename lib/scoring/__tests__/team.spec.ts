import { describe, it, expect } from "vitest";
import { DEFAULT_RULES } from "@/lib/rules/config";
import { applyPlayerMultiplier, leadershipMultiplier, scoreTeam } from "@/lib/scoring/team";

describe("team scoring", () => {
  it("maps roles to leadership multipliers", () => {
    expect(leadershipMultiplier("captain", DEFAULT_RULES)).toBe(2);
    expect(leadershipMultiplier("vice_captain", DEFAULT_RULES)).toBe(1.5);
    expect(leadershipMultiplier("player", DEFAULT_RULES)).toBe(1);
    expect(leadershipMultiplier(undefined, DEFAULT_RULES)).toBe(1);
  });

  it("applies the player multiplier", () => {
    expect(applyPlayerMultiplier(40, 0.5)).toBe(20);
  });

  it("combines base points, snapshot multipliers and roles", () => {
    const res = scoreTeam(
      [
        { player_key: "a", role: "captain" },
        { player_key: "b", role: "vice_captain" },
        { player_key: "c" },
      ],
      { a: 10, b: 20, c: 5 },
      { multipliers: { a: 1.5, b: 0.8 } },
      DEFAULT_RULES
    );
    expect(res.players[0].points).toBe(30);
    expect(res.players[1].points).toBeCloseTo(24, 10);
    expect(res.players[2].points).toBe(5);
    expect(res.players[2].multiplier).toBe(1);
    expect(res.players[2].role).toBe("player");
    expect(res.total).toBeCloseTo(59, 10);
  });

  it("plays everyone at neutral without a snapshot", () => {
    const res = scoreTeam([{ player_key: "x" }, { player_key: "missing" }], { x: 12 }, null, DEFAULT_RULES);
    expect(res.total).toBe(12);
    expect(res.players[1].base_points).toBe(0);
  });
});
