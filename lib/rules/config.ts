import { RuleSetSchema, type RuleSet } from "@/lib/rules/schemas";

export const DEFAULT_RULES: RuleSet = {
  batting: {
    pointsPerRun: 1,
    fiftyBonus: 8,
    centuryBonus: 16,
    duckPenalty: -2,
  },
  bowling: {
    pointsPerWicket: 12,
    pointsPerMaiden: 4,
    fiveWicketBonus: 8,
    economyBaseline: 6,
    maxEconomyMultiplier: 6,
  },
  fielding: {
    pointsPerCatch: 4,
    pointsPerStumping: 6,
    pointsPerRunOut: 6,
    wicketKeeperCatchMultiplier: 2,
  },
  tierMultipliers: {},
  multiplier: {
    min: 0.69,
    neutral: 1,
    max: 5,
    driftRate: 0.15,
  },
  leadership: {
    captain: 2,
    viceCaptain: 1.5,
  },
  identity: {
    similarityThreshold: 0.85,
    minContainmentLength: 3,
    maxAbbreviationLength: 3,
  },
};

// Merge overrides section by section onto the defaults, validate, then freeze.
// Accepts unknown so a parsed JSON/YAML config can be passed straight through.
export function resolveRuleSet(overrides: unknown = {}): Readonly<RuleSet> {
  const merged = mergeSections(DEFAULT_RULES, overrides);
  const parsed = RuleSetSchema.safeParse(merged);
  if (!parsed.success) {
    throw new Error(
      "Invalid rule set: " +
        parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")
    );
  }
  return deepFreeze(parsed.data);
}

function mergeSections(base: RuleSet, overrides: unknown): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  if (!isPlainObject(overrides)) return out;
  for (const [section, value] of Object.entries(overrides)) {
    const current = out[section];
    out[section] = isPlainObject(current) && isPlainObject(value) ? { ...current, ...value } : value;
  }
  return out;
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (isPlainObject(value)) {
    for (const inner of Object.values(value)) deepFreeze(inner);
    Object.freeze(value);
  }
  return value;
}
