import { createStore, type StoreApi } from "zustand/vanilla";
import type { CanonicalPlayer, SeasonScope } from "@/lib/domain/types";

export type PlayerState = {
  scope: SeasonScope;
  players: Record<string, CanonicalPlayer>;
  nextSeq: number;
  put: (player: CanonicalPlayer) => void;
  takeSeq: () => number;
  setMultipliers: (values: Record<string, number>) => void;
  reset: () => void;
};

export type PlayerStore = StoreApi<PlayerState>;

// One store per season scope; nothing here is module-global.
export function createPlayerStore(scope: SeasonScope): PlayerStore {
  return createStore<PlayerState>((set, get) => ({
    scope,
    players: {},
    nextSeq: 0,
    put: (player) => set((s) => ({ players: { ...s.players, [player.key]: player } })),
    takeSeq: () => {
      const seq = get().nextSeq;
      set({ nextSeq: seq + 1 });
      return seq;
    },
    setMultipliers: (values) =>
      set((s) => {
        const players = { ...s.players };
        for (const [key, multiplier] of Object.entries(values)) {
          const p = players[key];
          if (p) players[key] = { ...p, multiplier };
        }
        return { players };
      }),
    reset: () => set({ players: {}, nextSeq: 0 }),
  }));
}
