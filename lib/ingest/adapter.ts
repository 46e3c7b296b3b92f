import type { PerformanceRecord } from "@/lib/domain/types";
import { createLogger } from "@/lib/log";
import { normalizeTier } from "./aliases";
import { parseCsvStream, type ParseReport } from "./parse";
import { SCORECARD_ALIASES, ScorecardRowSchema, type ScorecardRow } from "./schemas";

const log = createLogger("ingest");

export type ScorecardReport = Omit<ParseReport<ScorecardRow>, "rows"> & {
  records: PerformanceRecord[];
};

function present(...values: (number | null)[]): boolean {
  return values.some((v) => v !== null);
}

function num(v: number | null): number | undefined {
  return v === null ? undefined : v;
}

// A section only exists when one of its columns has a value: blank batting
// cells mean "did not bat", not a zero-ball innings.
export function rowToPerformance(row: ScorecardRow): PerformanceRecord {
  const record: PerformanceRecord = {
    match_id: row.match_id,
    player_id: row.player_id,
    player_name: row.player_name,
    club: row.club,
    tier: normalizeTier(row.tier),
    match_date: row.match_date,
    opponent: row.opponent,
    is_wicket_keeper: row.is_wicket_keeper,
  };
  if (present(row.runs, row.balls_faced, row.fours, row.sixes)) {
    record.batting = {
      runs: num(row.runs),
      balls_faced: num(row.balls_faced),
      fours: num(row.fours),
      sixes: num(row.sixes),
      dismissed: row.dismissed,
    };
  }
  if (present(row.wickets, row.overs, row.maidens, row.runs_conceded)) {
    record.bowling = {
      wickets: num(row.wickets),
      overs: num(row.overs),
      maidens: num(row.maidens),
      runs_conceded: num(row.runs_conceded),
    };
  }
  if (present(row.catches, row.stumpings, row.run_outs)) {
    record.fielding = {
      catches: num(row.catches),
      stumpings: num(row.stumpings),
      run_outs: num(row.run_outs),
    };
  }
  return record;
}

export async function parseScorecardCsv(text: string): Promise<ScorecardReport> {
  const rep = await parseCsvStream(text, ScorecardRowSchema, SCORECARD_ALIASES);
  if (rep.droppedRows > 0) {
    log.warn(`Dropped ${rep.droppedRows} of ${rep.rowCount} scorecard rows`);
  }
  if (rep.unknownColumns.length > 0) {
    log.debug(`Ignored columns: ${rep.unknownColumns.join(", ")}`);
  }
  const { rows, ...rest } = rep;
  return { ...rest, records: rows.map(rowToPerformance) };
}
