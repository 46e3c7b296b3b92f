import { createStore, type StoreApi } from "zustand/vanilla";
import type { HandicapScope, MultiplierSnapshot } from "@/lib/domain/types";

export type MultiplierState = {
  snapshots: Record<string, MultiplierSnapshot>;
  commit: (snapshot: MultiplierSnapshot) => void;
  latest: (scope: HandicapScope) => MultiplierSnapshot | null;
  reset: () => void;
};

export type MultiplierStore = StoreApi<MultiplierState>;

export function scopeId(scope: HandicapScope): string {
  return scope.kind === "global" ? `global:${scope.season}` : `league:${scope.league_id}`;
}

// Snapshots are replaced wholesale, one per scope.
export function createMultiplierStore(): MultiplierStore {
  return createStore<MultiplierState>((set, get) => ({
    snapshots: {},
    commit: (snapshot) => set((s) => ({ snapshots: { ...s.snapshots, [scopeId(snapshot.scope)]: snapshot } })),
    latest: (scope) => get().snapshots[scopeId(scope)] ?? null,
    reset: () => set({ snapshots: {} }),
  }));
}
