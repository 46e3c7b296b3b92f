import type { CanonicalPlayer, SeasonScope } from "@/lib/domain/types";
import type { ClubRegistry, RegistryEntry } from "@/lib/identity/resolver";
import { normalizeClub } from "@/lib/identity/normalize";
import { createPlayerStore, type PlayerStore } from "@/lib/state/player-store";

// Storage seam for canonical players. Implementations own copies: callers get
// detached values and must `save` to publish changes.
export interface PlayerRepository {
  readonly scope: SeasonScope;
  get(key: string): Promise<CanonicalPlayer | undefined>;
  list(): Promise<CanonicalPlayer[]>;
  keys(): Promise<Set<string>>;
  clubRegistry(club: string): Promise<ClubRegistry>;
  findByExternalId(externalId: string): Promise<RegistryEntry | undefined>;
  nextSeq(): Promise<number>;
  insert(player: CanonicalPlayer): Promise<void>;
  save(player: CanonicalPlayer): Promise<void>;
  setMultipliers(values: Record<string, number>): Promise<void>;
  clear(): Promise<void>;
}

function toEntry(p: CanonicalPlayer): RegistryEntry {
  return {
    key: p.key,
    display_name: p.display_name,
    club: p.club,
    external_id: p.external_id,
    provenance: p.provenance,
    registered_seq: p.registered_seq,
  };
}

export class MemoryPlayerRepository implements PlayerRepository {
  readonly store: PlayerStore;

  constructor(readonly scope: SeasonScope) {
    this.store = createPlayerStore(scope);
  }

  async get(key: string): Promise<CanonicalPlayer | undefined> {
    const p = this.store.getState().players[key];
    return p ? structuredClone(p) : undefined;
  }

  async list(): Promise<CanonicalPlayer[]> {
    return Object.values(this.store.getState().players)
      .sort((a, b) => a.registered_seq - b.registered_seq)
      .map((p) => structuredClone(p));
  }

  async keys(): Promise<Set<string>> {
    return new Set(Object.keys(this.store.getState().players));
  }

  async clubRegistry(club: string): Promise<ClubRegistry> {
    const wanted = normalizeClub(club);
    return Object.values(this.store.getState().players)
      .filter((p) => normalizeClub(p.club) === wanted)
      .map(toEntry);
  }

  // Earliest registration wins if an id was ever attached twice.
  async findByExternalId(externalId: string): Promise<RegistryEntry | undefined> {
    const hit = Object.values(this.store.getState().players)
      .filter((p) => p.external_id === externalId)
      .sort((a, b) => a.registered_seq - b.registered_seq)[0];
    return hit ? toEntry(hit) : undefined;
  }

  async nextSeq(): Promise<number> {
    return this.store.getState().takeSeq();
  }

  async insert(player: CanonicalPlayer): Promise<void> {
    if (this.store.getState().players[player.key]) {
      throw new Error(`Player key already registered: ${player.key}`);
    }
    this.store.getState().put(structuredClone(player));
  }

  async save(player: CanonicalPlayer): Promise<void> {
    if (!this.store.getState().players[player.key]) {
      throw new Error(`Unknown player key: ${player.key}`);
    }
    this.store.getState().put(structuredClone(player));
  }

  async setMultipliers(values: Record<string, number>): Promise<void> {
    this.store.getState().setMultipliers(values);
  }

  async clear(): Promise<void> {
    this.store.getState().reset();
  }
}

export function createMemoryRepository(scope: SeasonScope): MemoryPlayerRepository {
  return new MemoryPlayerRepository(scope);
}
