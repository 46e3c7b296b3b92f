// Name normalization for identity matching

export type NameView = {
  raw: string;
  tokens: string[]; // in written order, for positional rules
  normalized: string; // sorted tokens joined, so "de Vries, Jan" == "Jan de Vries"
};

export function nameTokens(name: string): string[] {
  return name
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "") // strip diacritics
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, "") // "J." -> "j", "O'Brien" -> "obrien"
    .split(/\s+/)
    .filter(Boolean);
}

export function normalizeName(name: string): string {
  return nameTokens(name).slice().sort().join("");
}

export function toNameView(name: string): NameView {
  const tokens = nameTokens(name);
  return { raw: name, tokens, normalized: tokens.slice().sort().join("") };
}

export function normalizeClub(club: string): string {
  return club.trim().replace(/\s+/g, " ").toUpperCase();
}
