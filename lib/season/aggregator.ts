import type { CanonicalPlayer, PerformanceRecord, Provenance, SeasonScope } from "@/lib/domain/types";
import { mintPlayerKey } from "@/lib/identity/keys";
import { IdentityResolver } from "@/lib/identity/resolver";
import { normalizeClub } from "@/lib/identity/normalize";
import { canPromote, promoteProvenance } from "@/lib/identity/provenance";
import type { SimilarityStrategy } from "@/lib/identity/similarity";
import { formatIssues } from "@/lib/ingest/parse";
import { PerformanceRecordSchema } from "@/lib/ingest/schemas";
import { createLogger } from "@/lib/log";
import { DEFAULT_RULES } from "@/lib/rules/config";
import type { RuleSet } from "@/lib/rules/schemas";
import { scorePerformance } from "@/lib/scoring/engine";
import { KeyedMutex, ScopeGate } from "./locks";
import { createMemoryRepository, type PlayerRepository } from "./repository";
import { computeAverages, emptyAverages, emptyTotals, foldPerformance, replayTotals } from "./totals";
import {
  fromSeasonExport,
  seasonSummary,
  toSeasonExport,
  topPlayers,
  type LeaderboardKey,
  type LeaderboardRow,
  type SeasonExport,
  type SeasonSummary,
} from "./views";

const log = createLogger("season");

export const DEFAULT_BATCH_CONCURRENCY = 8;

export type AggregatorOptions = {
  rules?: RuleSet;
  repository?: PlayerRepository;
  strategy?: SimilarityStrategy;
  now?: () => Date;
};

export type PlayerSeed = {
  name: string;
  club: string;
  external_id?: string | null;
};

export type ApplyOutcome = { player: CanonicalPlayer; applied: boolean };

export type BatchOptions = {
  concurrency?: number;
  signal?: AbortSignal;
};

export type BatchReport = {
  submitted: number;
  applied: number;
  duplicates: number;
  malformed: number;
  cancelled: number;
};

export type ConsistencyIssue = { key: string; message: string };

export class SeasonAggregator {
  readonly rules: RuleSet;
  readonly repository: PlayerRepository;
  readonly gate = new ScopeGate();
  private readonly locks = new KeyedMutex();
  private readonly resolver: IdentityResolver;
  private readonly now: () => Date;

  constructor(readonly scope: SeasonScope, opts: AggregatorOptions = {}) {
    this.rules = opts.rules ?? DEFAULT_RULES;
    this.repository = opts.repository ?? createMemoryRepository(scope);
    if (this.repository.scope.season !== scope.season) {
      throw new Error(`Repository scope ${this.repository.scope.season} does not match season ${scope.season}`);
    }
    this.resolver = new IdentityResolver(this.rules.identity, { strategy: opts.strategy });
    this.now = opts.now ?? (() => new Date());
  }

  async addPerformance(record: PerformanceRecord): Promise<CanonicalPlayer> {
    return (await this.apply(record)).player;
  }

  // Same as addPerformance, but also says whether the match was new.
  async apply(record: PerformanceRecord): Promise<ApplyOutcome> {
    return this.gate.shared(async () => {
      const key = await this.identityLocked(record, () => this.resolveOrMint(record));
      return this.locks.runExclusive(`player:${key}`, () => this.foldInto(key, record));
    });
  }

  // Roster import: registers a player with no history, or returns the one it resolves to.
  async registerPlayer(seed: PlayerSeed): Promise<CanonicalPlayer> {
    const seedRecord: PerformanceRecord = {
      match_id: "",
      player_id: seed.external_id,
      player_name: seed.name,
      club: seed.club,
    };
    return this.gate.shared(async () => {
      const key = await this.identityLocked(seedRecord, () => this.resolveOrMint(seedRecord));
      const player = await this.repository.get(key);
      if (!player) throw new Error(`Registered player ${key} is missing from the repository`);
      return player;
    });
  }

  async ingestBatch(records: readonly unknown[], opts: BatchOptions = {}): Promise<BatchReport> {
    const report: BatchReport = { submitted: records.length, applied: 0, duplicates: 0, malformed: 0, cancelled: 0 };
    const valid: PerformanceRecord[] = [];
    records.forEach((raw, i) => {
      const parsed = PerformanceRecordSchema.safeParse(raw);
      if (parsed.success) {
        valid.push(parsed.data);
      } else {
        report.malformed += 1;
        log.warn(`Skipping malformed record #${i}: ${formatIssues(parsed.error)}`);
      }
    });

    const concurrency = Math.max(1, Math.floor(opts.concurrency ?? DEFAULT_BATCH_CONCURRENCY));
    let next = 0;
    const worker = async () => {
      while (next < valid.length) {
        if (opts.signal?.aborted) return;
        const record = valid[next++];
        const { applied } = await this.apply(record);
        if (applied) report.applied += 1;
        else report.duplicates += 1;
      }
    };
    await Promise.all(Array.from({ length: Math.min(concurrency, valid.length) }, () => worker()));

    report.cancelled = valid.length - next;
    if (report.cancelled > 0) log.info(`Batch aborted with ${report.cancelled} records not submitted`);
    return report;
  }

  players(): Promise<CanonicalPlayer[]> {
    return this.repository.list();
  }

  getPlayer(key: string): Promise<CanonicalPlayer | undefined> {
    return this.repository.get(key);
  }

  async topPlayers(sortBy: LeaderboardKey = "fantasy_points", limit = 10): Promise<LeaderboardRow[]> {
    return topPlayers(await this.repository.list(), sortBy, limit);
  }

  async seasonSummary(): Promise<SeasonSummary> {
    return seasonSummary(await this.repository.list());
  }

  async exportSeason(): Promise<SeasonExport> {
    return toSeasonExport(this.scope, await this.repository.list(), this.now());
  }

  // Replaces the season's players with the payload's. Runs exclusive so no fold interleaves.
  async importSeason(payload: unknown): Promise<number> {
    const { season, players } = fromSeasonExport(payload);
    if (season !== this.scope.season) {
      throw new Error(`Invalid season export: season ${season} does not match ${this.scope.season}`);
    }
    return this.gate.exclusive(async () => {
      await this.repository.clear();
      const ordered = [...players].sort((a, b) => a.registered_seq - b.registered_seq);
      for (const p of ordered) {
        await this.repository.insert({ ...p, registered_seq: await this.repository.nextSeq() });
      }
      log.info(`Imported ${ordered.length} players into season ${season}`);
      return ordered.length;
    });
  }

  // Replays every player's history and reports where stored state disagrees.
  async verifyConsistency(): Promise<ConsistencyIssue[]> {
    const issues: ConsistencyIssue[] = [];
    for (const p of await this.repository.list()) {
      const replayed = replayTotals(p.history);
      if (JSON.stringify(replayed) !== JSON.stringify(p.totals)) {
        issues.push({ key: p.key, message: "totals differ from history replay" });
      }
      if (p.matches_played !== p.history.length || p.processed_matches.size !== p.history.length) {
        issues.push({ key: p.key, message: "match counts differ from history length" });
      }
      const averages = computeAverages(replayed, p.history.length);
      if (JSON.stringify(averages) !== JSON.stringify(p.averages)) {
        issues.push({ key: p.key, message: "averages differ from recomputed values" });
      }
    }
    return issues;
  }

  // Lock order: id, club, mint, player. A stable id spans clubs, so its lock
  // is taken before the club's.
  private identityLocked<T>(record: PerformanceRecord, fn: () => Promise<T>): Promise<T> {
    const underClub = () => this.locks.runExclusive(`club:${normalizeClub(record.club)}`, fn);
    const externalId = record.player_id?.trim();
    return externalId ? this.locks.runExclusive(`id:${externalId}`, underClub) : underClub();
  }

  private async resolveOrMint(record: PerformanceRecord): Promise<string> {
    const externalId = record.player_id?.trim() || null;
    const registry = await this.repository.clubRegistry(record.club);
    const byId = externalId ? await this.repository.findByExternalId(externalId) : undefined;
    const res = this.resolver.resolve(record, registry, () => false, () => byId);

    if (res.kind === "existing") {
      if (res.promote && externalId) {
        await this.locks.runExclusive(`player:${res.key}`, () => this.promote(res.key, externalId));
      }
      return res.key;
    }

    // Keys from different clubs and ids can still collide, so the free key is
    // picked and inserted under one scope-wide lock.
    const key = await this.locks.runExclusive("mint", async () => {
      const taken = await this.repository.keys();
      const free = mintPlayerKey(record.player_name, record.club, externalId, (k) => taken.has(k));
      const seq = await this.repository.nextSeq();
      await this.repository.insert(this.newPlayer(free, record, externalId, res.provenance, seq));
      return free;
    });
    log.info(`Registered ${record.player_name.trim()} (${key}) for ${record.club.trim()}`);
    return key;
  }

  private async promote(key: string, externalId: string): Promise<void> {
    const player = await this.repository.get(key);
    if (!player || !canPromote(player.provenance)) return;
    player.provenance = promoteProvenance(player.provenance);
    player.external_id = externalId;
    player.last_updated = this.now().toISOString();
    await this.repository.save(player);
    log.info(`Confirmed ${player.display_name} (${key}) as ${externalId}`);
  }

  private async foldInto(key: string, record: PerformanceRecord): Promise<ApplyOutcome> {
    const player = await this.repository.get(key);
    if (!player) throw new Error(`Resolved player ${key} is missing from the repository`);
    if (player.processed_matches.has(record.match_id)) {
      log.debug(`Match ${record.match_id} already counted for ${player.display_name}`);
      return { player, applied: false };
    }

    const score = scorePerformance(record, this.rules);
    player.history.push({ performance: record, score });
    player.processed_matches.add(record.match_id);
    foldPerformance(player.totals, record, score);
    player.matches_played = player.history.length;
    player.averages = computeAverages(player.totals, player.matches_played);
    player.last_updated = this.now().toISOString();
    await this.repository.save(player);

    log.info(`Updated ${player.display_name}: ${score.grand_total.toFixed(2)} pts (match ${record.match_id})`);
    return { player, applied: true };
  }

  private newPlayer(
    key: string,
    record: PerformanceRecord,
    externalId: string | null,
    provenance: Provenance,
    seq: number
  ): CanonicalPlayer {
    const stamp = this.now().toISOString();
    return {
      key,
      display_name: record.player_name.trim(),
      club: record.club.trim(),
      external_id: externalId,
      provenance,
      registered_seq: seq,
      processed_matches: new Set(),
      history: [],
      totals: emptyTotals(),
      averages: emptyAverages(),
      matches_played: 0,
      multiplier: this.rules.multiplier.neutral,
      first_seen: stamp,
      last_updated: stamp,
    };
  }
}
