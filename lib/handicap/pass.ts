import type { HandicapScope, MultiplierSnapshot } from "@/lib/domain/types";
import { createLogger } from "@/lib/log";
import type { SeasonAggregator } from "@/lib/season/aggregator";
import type { MultiplierStore } from "@/lib/state/multiplier-store";
import { adjust } from "./engine";
import { leagueSeasonPoints, type LeagueDefinition } from "./league";

const log = createLogger("handicap");

// Both passes hold the aggregator's gate exclusively: ingestion waits until the
// snapshot is computed and committed.
export function runGlobalPass(
  aggregator: SeasonAggregator,
  store: MultiplierStore,
  now: Date = new Date()
): Promise<MultiplierSnapshot> {
  return aggregator.gate.exclusive(async () => {
    const players = await aggregator.repository.list();
    const scope: HandicapScope = { kind: "global", season: aggregator.scope.season };
    const previous = Object.fromEntries(players.map((p) => [p.key, p.multiplier]));
    const snapshot = adjust(
      scope,
      players.map((p) => ({ key: p.key, points: p.totals.fantasy_points })),
      previous,
      aggregator.rules,
      now
    );
    await aggregator.repository.setMultipliers(snapshot.multipliers);
    store.getState().commit(snapshot);
    log.info(`Global pass for ${scope.season}: ${players.length} players`, snapshot.distribution ?? "no scores");
    return snapshot;
  });
}

// League multipliers live only in the snapshot store; player records keep the global value.
export function runLeaguePass(
  aggregator: SeasonAggregator,
  store: MultiplierStore,
  league: LeagueDefinition,
  now: Date = new Date()
): Promise<MultiplierSnapshot> {
  return aggregator.gate.exclusive(async () => {
    const scope: HandicapScope = { kind: "league", league_id: league.league_id, roster: [...league.roster] };
    const points = leagueSeasonPoints(await aggregator.repository.list(), league);
    const previous = store.getState().latest(scope)?.multipliers ?? {};
    const snapshot = adjust(scope, points, previous, league.rules ?? aggregator.rules, now);
    store.getState().commit(snapshot);
    log.info(`League pass for ${league.league_id}: ${points.length} roster players`);
    return snapshot;
  });
}
