export type * from "./domain/types";

export { DEFAULT_RULES, resolveRuleSet } from "./rules/config";
export { RuleSetSchema, type RuleSet, type RuleSetOverrides } from "./rules/schemas";

export { scorePerformance, scoreBatting, scoreBowling, scoreFielding, tierMultiplier } from "./scoring/engine";
export { oversToBalls, ballsToOvers } from "./scoring/overs";
export { formatPointsSummary } from "./scoring/format";
export {
  applyPlayerMultiplier,
  leadershipMultiplier,
  scoreTeam,
  type TeamRole,
  type TeamSelection,
  type TeamScore,
} from "./scoring/team";

export { normalizeName, normalizeClub } from "./identity/normalize";
export { levenshteinRatio, diceRatio, type SimilarityStrategy } from "./identity/similarity";
export { ratioRule, containmentRule, abbreviationRule, DEFAULT_MATCH_RULES, type MatchRule } from "./identity/rules";
export { promoteProvenance } from "./identity/provenance";
export { IdentityResolver, type ClubRegistry, type Resolution } from "./identity/resolver";

export { SeasonAggregator, type BatchOptions, type BatchReport, type PlayerSeed } from "./season/aggregator";
export { createMemoryRepository, type PlayerRepository } from "./season/repository";
export { KeyedMutex, ScopeGate } from "./season/locks";
export { replayTotals, computeAverages } from "./season/totals";
export { topPlayers, seasonSummary, type LeaderboardKey, type SeasonExport } from "./season/views";

export { adjust, targetMultiplier, blendMultiplier, scoreDistribution, type PlayerPoints } from "./handicap/engine";
export { leagueSeasonPoints, type LeagueDefinition } from "./handicap/league";
export { runGlobalPass, runLeaguePass } from "./handicap/pass";
export { createMultiplierStore, type MultiplierStore } from "./state/multiplier-store";

export { parseScorecardCsv } from "./ingest/adapter";
export { PerformanceRecordSchema } from "./ingest/schemas";

export { createLogger } from "./log";
