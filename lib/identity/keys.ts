import { normalizeClub, normalizeName } from "./normalize";

// FNV-1a, 32-bit
export function fnv1a(input: string): number {
  let h = 2166136261 >>> 0;
  for (let i = 0; i < input.length; i++) {
    h ^= input.charCodeAt(i);
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
}

export function baseKey(name: string, club: string, externalId?: string | null): string {
  if (externalId) return `id:${externalId}`;
  return `nm:${fnv1a(`${normalizeClub(club)}|${normalizeName(name)}`).toString(16).padStart(8, "0")}`;
}

export function mintPlayerKey(
  name: string,
  club: string,
  externalId: string | null | undefined,
  isTaken: (key: string) => boolean
): string {
  const base = baseKey(name, club, externalId);
  if (!isTaken(base)) return base;
  let n = 2;
  while (isTaken(`${base}-${n}`)) n++;
  return `${base}-${n}`;
}
