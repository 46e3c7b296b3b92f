// Domain models for performances, canonical players and multipliers

export type BattingLine = {
  runs?: number;
  balls_faced?: number;
  fours?: number;
  sixes?: number;
  dismissed?: boolean;
};

export type BowlingLine = {
  wickets?: number;
  overs?: number; // cricket notation: 4.2 = 4 overs + 2 balls
  maidens?: number;
  runs_conceded?: number;
};

export type FieldingLine = {
  catches?: number;
  stumpings?: number;
  run_outs?: number;
};

export type PerformanceRecord = {
  match_id: string;
  player_id?: string | null; // stable external id when the source has one
  player_name: string;
  club: string;
  tier?: string | null;
  match_date?: string | null; // ISO date if known
  opponent?: string | null;
  is_wicket_keeper?: boolean;
  batting?: BattingLine | null;
  bowling?: BowlingLine | null;
  fielding?: FieldingLine | null;
};

export type BattingPoints = {
  run_points: number;
  strike_rate_multiplier: number;
  fifty_bonus: number;
  century_bonus: number;
  duck_penalty: number;
  total: number;
};

export type BowlingPoints = {
  wicket_points: number;
  economy_multiplier: number;
  maiden_points: number;
  five_wicket_bonus: number;
  total: number;
};

export type FieldingPoints = {
  catch_points: number;
  stumping_points: number;
  run_out_points: number;
  total: number;
};

export type ScoreBreakdown = {
  batting: BattingPoints;
  bowling: BowlingPoints;
  fielding: FieldingPoints;
  bonuses: number; // milestone bonuses + penalties, already inside the component totals
  tier_multiplier: number;
  grand_total: number; // floored at 0
};

export type BowlingFigures = { wickets: number; runs: number };

export type SeasonTotals = {
  fantasy_points: number;
  batting: {
    innings: number;
    runs: number;
    balls_faced: number;
    fours: number;
    sixes: number;
    dismissals: number;
    fifties: number;
    centuries: number;
    ducks: number;
    highest_score: number;
  };
  bowling: {
    innings: number;
    wickets: number;
    balls: number;
    maidens: number;
    runs_conceded: number;
    five_wicket_hauls: number;
    best_figures: BowlingFigures | null;
  };
  fielding: {
    catches: number;
    stumpings: number;
    run_outs: number;
  };
  matches_by_tier: Record<string, number>;
};

export type SeasonAverages = {
  batting_average: number;
  strike_rate: number;
  bowling_average: number;
  economy_rate: number;
  points_per_match: number;
};

export type HistoryEntry = {
  performance: PerformanceRecord;
  score: ScoreBreakdown;
};

export type Provenance = "name_only" | "id_confirmed";

export type CanonicalPlayer = {
  key: string;
  display_name: string;
  club: string;
  external_id: string | null;
  provenance: Provenance;
  registered_seq: number; // insertion order within the season
  processed_matches: Set<string>;
  history: HistoryEntry[];
  totals: SeasonTotals;
  averages: SeasonAverages;
  matches_played: number;
  multiplier: number;
  first_seen: string;
  last_updated: string;
};

export type SeasonScope = {
  season: string;
};

export type HandicapScope =
  | { kind: "global"; season: string }
  | { kind: "league"; league_id: string; roster: string[] };

export type ScoreDistribution = {
  count: number; // non-zero scores that shaped the distribution
  min: number;
  median: number;
  max: number;
};

export type MultiplierSnapshot = {
  scope: HandicapScope;
  computed_at: string;
  multipliers: Record<string, number>;
  targets: Record<string, number>;
  distribution: ScoreDistribution | null;
};
