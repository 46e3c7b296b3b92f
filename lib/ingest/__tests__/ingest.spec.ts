import { describe, it, expect } from "vitest";
import { DEFAULT_RULES } from "@/lib/rules/config";
import { scorePerformance } from "@/lib/scoring/engine";
import { parseScorecardCsv } from "@/lib/ingest/adapter";
import { normalizeTier } from "@/lib/ingest/aliases";
import { mapHeaders } from "@/lib/ingest/parse";
import { PerformanceRecordSchema } from "@/lib/ingest/schemas";

const header = [
  "match_id", "player", "club", "grade", "date", "R", "B", "4s", "6s", "out",
  "O", "M", "W", "conceded", "Ct", "St", "RO", "wk", "notes",
];

function row(cells: Record<string, string>): string {
  return header.map((h) => cells[h] ?? "").join(",");
}

const csv = [
  header.join(","),
  row({ match_id: "m1", player: "Jan de Vries", club: "VRA", grade: "Hoofdklasse", date: "2025-05-03", R: "50", B: "33", "4s": "6", "6s": "1", out: "yes", Ct: "1", wk: "no", notes: "hi" }),
  row({ match_id: "m1", player: "Tim Pringle", club: "VRA", grade: "Eerste Klasse", date: "2025-05-03", O: "8", M: "2", W: "3", conceded: "32" }),
  row({ match_id: "m1", club: "VRA", R: "10", B: "10" }),
  row({ match_id: "m1", player: "Scott Edwards", club: "VRA", grade: "Topklasse", R: "4", B: "6", out: "true", Ct: "2", St: "1", wk: "y" }),
  row({ match_id: "m2", player: "Bad Row", club: "VRA", R: "abc" }),
].join("\n");

describe("scorecard CSV ingest", () => {
  it("parses rows and reports the ones it drops", async () => {
    const rep = await parseScorecardCsv(csv);
    expect(rep.rowCount).toBe(5);
    expect(rep.droppedRows).toBe(2);
    expect(rep.unknownColumns).toEqual(["notes"]);
    expect(rep.errors).toEqual([
      { row: 3, message: "player_name: String must contain at least 1 character(s)" },
      { row: 5, message: "runs: expected a non-negative number, got 'abc'" },
    ]);
    expect(rep.records.map((r) => r.player_name)).toEqual(["Jan de Vries", "Tim Pringle", "Scott Edwards"]);
  });

  it("builds only the sections a row has values for", async () => {
    const [jan, tim] = (await parseScorecardCsv(csv)).records;
    expect(jan).toEqual({
      match_id: "m1",
      player_id: null,
      player_name: "Jan de Vries",
      club: "VRA",
      tier: "tier1",
      match_date: "2025-05-03",
      opponent: null,
      is_wicket_keeper: false,
      batting: { runs: 50, balls_faced: 33, fours: 6, sixes: 1, dismissed: true },
      fielding: { catches: 1 },
    });
    expect(tim.batting).toBeUndefined();
    expect(tim.bowling).toEqual({ wickets: 3, overs: 8, maidens: 2, runs_conceded: 32 });
    expect(tim.tier).toBe("tier2");
  });

  it("produces records the scoring engine accepts", async () => {
    const [jan, tim, scott] = (await parseScorecardCsv(csv)).records;
    expect(scorePerformance(jan, DEFAULT_RULES).grand_total).toBeCloseTo(87.76, 2);
    expect(scorePerformance(tim, DEFAULT_RULES).grand_total).toBe(62);
    expect(scott.is_wicket_keeper).toBe(true);
    expect(scorePerformance(scott, DEFAULT_RULES).fielding.total).toBe(22);
  });
});

describe("mapHeaders", () => {
  it("lets the first column claim a field and lists unknown headers", () => {
    const map = mapHeaders([" Player ", "name", "R", "notes"], { player: "player_name", name: "player_name", r: "runs" });
    expect([...map.columns]).toEqual([
      [" Player ", "player_name"],
      ["R", "runs"],
    ]);
    expect(map.unknown).toEqual(["notes"]);
  });
});

describe("normalizeTier", () => {
  it("maps competition names to tiers", () => {
    expect(normalizeTier("Hoofdklasse")).toBe("tier1");
    expect(normalizeTier("  Derde   Klasse ")).toBe("tier3");
    expect(normalizeTier("ZAMI B")).toBe("social");
    expect(normalizeTier("Cup")).toBe("cup");
    expect(normalizeTier("")).toBeNull();
    expect(normalizeTier(null)).toBeNull();
  });
});

describe("PerformanceRecordSchema", () => {
  it("rejects blank names and drops unknown keys", () => {
    expect(PerformanceRecordSchema.safeParse({ match_id: "m1", player_name: " ", club: "VRA" }).success).toBe(false);
    const ok = PerformanceRecordSchema.parse({ match_id: " m1 ", player_name: "Jan", club: "VRA", extra: 1 });
    expect(ok).toEqual({ match_id: "m1", player_name: "Jan", club: "VRA" });
  });
});
