import { z } from "zod";

// Helpers
const toStr = z
  .string()
  .transform((s) => s.trim())
  .pipe(z.string().min(1));

const optStr = z
  .union([z.string(), z.null(), z.undefined()])
  .transform((v) => {
    if (v === null || v === undefined) return null;
    const s = v.trim();
    return s === "" ? null : s;
  });

const count = z.number().optional();

// Performance records handed to the aggregator. Unknown keys are dropped;
// numeric fields stay loose because scoring treats bad counts as zero.
export const PerformanceRecordSchema = z.object({
  match_id: toStr,
  player_id: optStr.optional(),
  player_name: toStr,
  club: toStr,
  tier: optStr.optional(),
  match_date: optStr.optional(),
  opponent: optStr.optional(),
  is_wicket_keeper: z.boolean().optional(),
  batting: z
    .object({ runs: count, balls_faced: count, fours: count, sixes: count, dismissed: z.boolean().optional() })
    .nullable()
    .optional(),
  bowling: z
    .object({ wickets: count, overs: count, maidens: count, runs_conceded: count })
    .nullable()
    .optional(),
  fielding: z
    .object({ catches: count, stumpings: count, run_outs: count })
    .nullable()
    .optional(),
});

export type PerformanceRecordInput = z.infer<typeof PerformanceRecordSchema>;

// ---- CSV scorecard rows (one row per player per match, after aliasing) ----

const csvNum = z
  .union([z.string(), z.number(), z.null(), z.undefined()])
  .transform((v, ctx) => {
    if (v === null || v === undefined) return null;
    const s = String(v).trim();
    if (s === "" || s === "-" || s.toLowerCase() === "na") return null;
    const n = Number(s);
    if (!Number.isFinite(n) || n < 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a non-negative number, got '${s}'` });
      return z.NEVER;
    }
    return n;
  });

const csvBool = z
  .union([z.string(), z.boolean(), z.null(), z.undefined()])
  .transform((v) => {
    if (typeof v === "boolean") return v;
    const s = (v ?? "").trim().toLowerCase();
    return s === "true" || s === "yes" || s === "y" || s === "1" || s === "out";
  });

export const ScorecardRowSchema = z.object({
  match_id: toStr,
  player_id: optStr,
  player_name: toStr,
  club: toStr,
  tier: optStr,
  match_date: optStr,
  opponent: optStr,
  is_wicket_keeper: csvBool,
  runs: csvNum,
  balls_faced: csvNum,
  fours: csvNum,
  sixes: csvNum,
  dismissed: csvBool,
  wickets: csvNum,
  overs: csvNum,
  maidens: csvNum,
  runs_conceded: csvNum,
  catches: csvNum,
  stumpings: csvNum,
  run_outs: csvNum,
});

export type ScorecardRow = z.infer<typeof ScorecardRowSchema>;

export type AliasMap<T extends z.ZodRawShape> = Record<string, keyof z.infer<z.ZodObject<T>>>;

// Header aliases, lower-cased, for the common scorecard export layouts
export const SCORECARD_ALIASES: AliasMap<typeof ScorecardRowSchema.shape> = {
  match_id: "match_id",
  match: "match_id",
  matchid: "match_id",
  player_id: "player_id",
  id: "player_id",
  player_name: "player_name",
  player: "player_name",
  name: "player_name",
  club: "club",
  team: "club",
  tier: "tier",
  grade: "tier",
  competition: "tier",
  match_date: "match_date",
  date: "match_date",
  opponent: "opponent",
  vs: "opponent",
  is_wicket_keeper: "is_wicket_keeper",
  wk: "is_wicket_keeper",
  keeper: "is_wicket_keeper",
  runs: "runs",
  r: "runs",
  balls_faced: "balls_faced",
  balls: "balls_faced",
  b: "balls_faced",
  fours: "fours",
  "4s": "fours",
  sixes: "sixes",
  "6s": "sixes",
  dismissed: "dismissed",
  out: "dismissed",
  wickets: "wickets",
  w: "wickets",
  overs: "overs",
  o: "overs",
  maidens: "maidens",
  m: "maidens",
  runs_conceded: "runs_conceded",
  conceded: "runs_conceded",
  catches: "catches",
  ct: "catches",
  stumpings: "stumpings",
  st: "stumpings",
  run_outs: "run_outs",
  ro: "run_outs",
};
