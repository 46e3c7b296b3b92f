import { describe, it, expect } from "vitest";
import { nameTokens, normalizeClub, normalizeName, toNameView } from "@/lib/identity/normalize";
import { diceRatio, levenshtein, levenshteinRatio } from "@/lib/identity/similarity";
import { fnv1a, mintPlayerKey } from "@/lib/identity/keys";
import { canPromote, promoteProvenance, provenanceFor } from "@/lib/identity/provenance";

describe("name normalization", () => {
  it("strips punctuation and diacritics and lower-cases", () => {
    expect(nameTokens("J. de Vries")).toEqual(["j", "de", "vries"]);
    expect(nameTokens("Zoë  Ménard")).toEqual(["zoe", "menard"]);
    expect(normalizeName("O'Brien, Kevin")).toBe("kevinobrien");
  });

  it("ignores token order", () => {
    expect(normalizeName("de Vries, Jan")).toBe(normalizeName("Jan de Vries"));
    expect(normalizeName("Jan de Vries")).toBe("dejanvries");
  });

  it("keeps written order in the view tokens", () => {
    expect(toNameView("Jan de Vries")).toEqual({
      raw: "Jan de Vries",
      tokens: ["jan", "de", "vries"],
      normalized: "dejanvries",
    });
  });

  it("normalizes club names", () => {
    expect(normalizeClub("  vra   amsterdam ")).toBe("VRA AMSTERDAM");
  });
});

describe("similarity strategies", () => {
  it("computes edit distance", () => {
    expect(levenshtein("kitten", "sitting")).toBe(3);
    expect(levenshtein("", "abc")).toBe(3);
  });

  it("turns distance into a ratio", () => {
    expect(levenshteinRatio.ratio("dejanvries", "dejanvries")).toBe(1);
    expect(levenshteinRatio.ratio("dejvries", "dejanvries")).toBeCloseTo(0.8, 10);
    expect(levenshteinRatio.ratio("", "x")).toBe(0);
  });

  it("scores bigram overlap with dice", () => {
    expect(diceRatio.ratio("night", "nacht")).toBe(0.25);
    expect(diceRatio.ratio("a", "b")).toBe(0);
  });
});

describe("player keys", () => {
  it("hashes with 32-bit FNV-1a", () => {
    expect(fnv1a("")).toBe(0x811c9dc5);
    expect(fnv1a("a")).toBe(0xe40c292c);
  });

  it("prefers the external id and suffixes collisions", () => {
    expect(mintPlayerKey("Jan de Vries", "VRA", "kncb-1", () => false)).toBe("id:kncb-1");
    const taken = new Set(["id:kncb-1", "id:kncb-1-2"]);
    expect(mintPlayerKey("Jan de Vries", "VRA", "kncb-1", (k) => taken.has(k))).toBe("id:kncb-1-3");
  });

  it("derives name keys from club and normalized name", () => {
    const key = mintPlayerKey("Jan de Vries", "vra", null, () => false);
    expect(key).toMatch(/^nm:[0-9a-f]{8}$/);
    expect(mintPlayerKey("de Vries, Jan", " VRA ", null, () => false)).toBe(key);
    expect(mintPlayerKey("Jan de Vries", "HBS", null, () => false)).not.toBe(key);
  });
});

describe("provenance", () => {
  it("promotes one way only", () => {
    expect(provenanceFor(null)).toBe("name_only");
    expect(provenanceFor("kncb-1")).toBe("id_confirmed");
    expect(promoteProvenance("name_only")).toBe("id_confirmed");
    expect(promoteProvenance("id_confirmed")).toBe("id_confirmed");
    expect(canPromote("name_only")).toBe(true);
    expect(canPromote("id_confirmed")).toBe(false);
  });
});
