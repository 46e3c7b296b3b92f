// Competition names seen on Dutch scorecards, mapped to rating tiers

export const TIER_ALIASES: Record<string, string> = {
  topklasse: "tier1",
  hoofdklasse: "tier1",
  "eerste klasse": "tier2",
  "tweede klasse": "tier2",
  "derde klasse": "tier3",
  "vierde klasse": "tier3",
  zami: "social",
  zomi: "social",
  recreanten: "social",
  vriendschappelijk: "social",
  jeugd: "youth",
  junior: "youth",
  u19: "youth",
  u17: "youth",
  u15: "youth",
  u13: "youth",
  u11: "youth",
  dames: "ladies",
  vrouwen: "ladies",
  women: "ladies",
};

// Unknown competitions pass through lower-cased so custom tier tables still apply.
export function normalizeTier(tier: string | null | undefined): string | null {
  if (!tier) return null;
  const t = tier.trim().toLowerCase().replace(/\s+/g, " ");
  if (!t) return null;
  if (TIER_ALIASES[t]) return TIER_ALIASES[t];
  const hit = Object.keys(TIER_ALIASES).find((k) => t.includes(k));
  return hit ? TIER_ALIASES[hit] : t;
}
