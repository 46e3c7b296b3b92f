import type { ScoreBreakdown } from "@/lib/domain/types";

const fmt = (n: number) => n.toFixed(1);
const signed = (n: number) => (n >= 0 ? `+${fmt(n)}` : fmt(n));

export function formatPointsSummary(b: ScoreBreakdown, playerName?: string): string {
  const lines: string[] = [];
  if (playerName) {
    lines.push(`Fantasy Points for ${playerName}`);
    lines.push("=".repeat(50));
  }

  if (b.batting.total !== 0) {
    lines.push("BATTING:");
    lines.push(`  Run Points: ${fmt(b.batting.run_points)} (SR x${b.batting.strike_rate_multiplier.toFixed(2)})`);
    if (b.batting.fifty_bonus) lines.push(`  Fifty Bonus: ${signed(b.batting.fifty_bonus)}`);
    if (b.batting.century_bonus) lines.push(`  Century Bonus: ${signed(b.batting.century_bonus)}`);
    if (b.batting.duck_penalty) lines.push(`  Duck Penalty: ${signed(b.batting.duck_penalty)}`);
    lines.push(`  Batting Total: ${fmt(b.batting.total)}`);
  }

  if (b.bowling.total !== 0) {
    lines.push("BOWLING:");
    lines.push(`  Wicket Points: ${fmt(b.bowling.wicket_points)} (ER x${b.bowling.economy_multiplier.toFixed(2)})`);
    if (b.bowling.maiden_points) lines.push(`  Maidens: ${signed(b.bowling.maiden_points)}`);
    if (b.bowling.five_wicket_bonus) lines.push(`  5-Wicket Bonus: ${signed(b.bowling.five_wicket_bonus)}`);
    lines.push(`  Bowling Total: ${fmt(b.bowling.total)}`);
  }

  if (b.fielding.total !== 0) {
    lines.push("FIELDING:");
    if (b.fielding.catch_points) lines.push(`  Catches: ${signed(b.fielding.catch_points)}`);
    if (b.fielding.run_out_points) lines.push(`  Run Outs: ${signed(b.fielding.run_out_points)}`);
    if (b.fielding.stumping_points) lines.push(`  Stumpings: ${signed(b.fielding.stumping_points)}`);
    lines.push(`  Fielding Total: ${fmt(b.fielding.total)}`);
  }

  if (b.tier_multiplier !== 1) lines.push(`Tier Multiplier: x${b.tier_multiplier.toFixed(2)}`);
  lines.push("=".repeat(50));
  lines.push(`GRAND TOTAL: ${b.grand_total.toFixed(2)} points`);
  return lines.join("\n");
}
