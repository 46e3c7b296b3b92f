import type { Provenance } from "@/lib/domain/types";

// name_only -> id_confirmed is the only transition; nothing demotes.
const TRANSITIONS: Record<Provenance, Provenance> = {
  name_only: "id_confirmed",
  id_confirmed: "id_confirmed",
};

export function provenanceFor(externalId: string | null | undefined): Provenance {
  return externalId ? "id_confirmed" : "name_only";
}

export function promoteProvenance(current: Provenance): Provenance {
  return TRANSITIONS[current];
}

export function canPromote(current: Provenance): boolean {
  return TRANSITIONS[current] !== current;
}
