import { describe, it, expect } from "vitest";
import { DEFAULT_RULES } from "@/lib/rules/config";
import type { PerformanceRecord, Provenance } from "@/lib/domain/types";
import { toNameView } from "@/lib/identity/normalize";
import {
  abbreviationRule,
  containmentRule,
  firstMatchingRule,
  isAbbreviationOf,
  ratioRule,
  type MatchContext,
} from "@/lib/identity/rules";
import { baseKey } from "@/lib/identity/keys";
import { IdentityResolver, type RegistryEntry } from "@/lib/identity/resolver";
import { levenshteinRatio, type SimilarityStrategy } from "@/lib/identity/similarity";

const ctx: MatchContext = {
  strategy: levenshteinRatio,
  threshold: 0.85,
  minContainmentLength: 3,
  maxAbbreviationLength: 3,
};

const v = toNameView;

function entry(
  key: string,
  display_name: string,
  registered_seq: number,
  external_id: string | null = null,
  provenance: Provenance = external_id ? "id_confirmed" : "name_only"
): RegistryEntry {
  return { key, display_name, club: "VRA", external_id, provenance, registered_seq };
}

function record(player_name: string, player_id?: string): PerformanceRecord {
  return { match_id: "m1", player_name, player_id, club: "VRA" };
}

describe("match rules", () => {
  it("accepts close spellings by ratio", () => {
    expect(ratioRule.test(v("Jan de Vries"), v("Jan de Vriess"), ctx)).toBe(true);
    expect(ratioRule.test(v("J. de Vries"), v("Jan de Vries"), ctx)).toBe(false);
  });

  it("accepts containment of at least three characters", () => {
    expect(containmentRule.test(v("Vries"), v("Jan de Vries"), ctx)).toBe(true);
    expect(containmentRule.test(v("de"), v("Jan de Vries"), ctx)).toBe(false);
  });

  it("aligns abbreviated first names", () => {
    expect(abbreviationRule.test(v("J. de Vries"), v("Jan de Vries"), ctx)).toBe(true);
    expect(abbreviationRule.test(v("S Zulfiqar"), v("Sikander Zulfiqar"), ctx)).toBe(true);
  });

  it("collapses the surname when token counts differ", () => {
    expect(abbreviationRule.test(v("J. deVries"), v("Jan de Vries"), ctx)).toBe(true);
    expect(abbreviationRule.test(v("J. Smith"), v("Jan de Vries"), ctx)).toBe(false);
  });

  it("needs one exact token", () => {
    expect(abbreviationRule.test(v("J. V."), v("Jan Vries"), ctx)).toBe(false);
  });

  it("limits abbreviations to short prefixes", () => {
    expect(isAbbreviationOf("jan", "jansen", 3)).toBe(true);
    expect(isAbbreviationOf("jans", "jansen", 3)).toBe(false);
    expect(isAbbreviationOf("jan", "jan", 3)).toBe(false);
  });

  it("reports exact matches before any rule", () => {
    expect(firstMatchingRule(v("de Vries, Jan"), v("Jan de Vries"), ctx)).toBe("exact");
    expect(firstMatchingRule(v("J. de Vries"), v("Jan de Vries"), ctx)).toBe("abbreviation");
    expect(firstMatchingRule(v("Tim Pringle"), v("Jan de Vries"), ctx)).toBeNull();
  });
});

describe("IdentityResolver", () => {
  const resolver = new IdentityResolver(DEFAULT_RULES.identity);

  it("matches on external id first", () => {
    const res = resolver.resolve(record("Someone Else", "kncb-1"), [entry("id:kncb-1", "Jan de Vries", 0, "kncb-1")]);
    expect(res).toMatchObject({ kind: "existing", key: "id:kncb-1", via: "external_id", promote: false });
  });

  it("finds a stable id outside the club registry", () => {
    const elsewhere = entry("id:kncb-7", "Jan de Vries", 0, "kncb-7");
    const res = resolver.resolve(record("Jan de Vries", "kncb-7"), [], () => false, (id) =>
      id === "kncb-7" ? elsewhere : undefined
    );
    expect(res).toMatchObject({ kind: "existing", key: "id:kncb-7", via: "external_id" });
  });

  it("fuzzy matches within the club registry", () => {
    const res = resolver.resolve(record("J. de Vries"), [entry("p1", "Jan de Vries", 0)]);
    expect(res.kind).toBe("existing");
    if (res.kind !== "existing") return;
    expect(res.key).toBe("p1");
    expect(res.rule).toBe("abbreviation");
    expect(res.similarity).toBeCloseTo(0.8, 10);
    expect(res.promote).toBe(false);
  });

  it("never fuzzy matches a candidate with a different id", () => {
    const res = resolver.resolve(record("Jan de Vries", "kncb-2"), [entry("id:kncb-1", "Jan de Vries", 0, "kncb-1")]);
    expect(res).toEqual({ kind: "new", key: "id:kncb-2", provenance: "id_confirmed" });
  });

  it("flags promotion when an id meets a name-only player", () => {
    const res = resolver.resolve(record("Jan de Vries", "kncb-9"), [entry("p1", "Jan de Vries", 0)]);
    expect(res).toMatchObject({ kind: "existing", key: "p1", via: "name", rule: "exact", promote: true });
  });

  it("breaks ties toward the earlier registration", () => {
    const registry = [entry("late", "Jan de Vries", 5), entry("early", "Jan de Vries", 2)];
    const res = resolver.resolve(record("Jan de Vries"), registry);
    expect(res).toMatchObject({ kind: "existing", key: "early", ambiguous: true });
  });

  it("prefers the higher ratio over registration order", () => {
    const registry = [entry("a", "Jan de Vrie", 0), entry("b", "Jan de Vries", 1)];
    expect(resolver.resolveKey(record("Jan de Vriess"), registry)).toBe("b");
  });

  it("is deterministic regardless of registry order", () => {
    const registry = [entry("x", "Jan de Vries", 3), entry("y", "J de Vries", 1), entry("z", "Tim Pringle", 2)];
    const first = resolver.resolve(record("J. de Vries"), registry);
    const again = resolver.resolve(record("J. de Vries"), [...registry].reverse());
    expect(again).toEqual(first);
    expect(first).toMatchObject({ key: "y", rule: "exact" });
  });

  it("mints a name key and suffixes collisions", () => {
    const key = baseKey("Tim Pringle", "VRA", null);
    expect(resolver.resolve(record("Tim Pringle"), [])).toEqual({ kind: "new", key, provenance: "name_only" });
    expect(resolver.resolveKey(record("Tim Pringle"), [])).toBe(key);
    const res = resolver.resolve(record("Tim Pringle"), [], (k) => k === key);
    expect(res.key).toBe(`${key}-2`);
  });

  it("rejects a blank name", () => {
    expect(() => resolver.resolve(record(" ... "), [])).toThrow(TypeError);
  });

  it("takes a pluggable similarity strategy", () => {
    const always: SimilarityStrategy = { name: "always", ratio: () => 1 };
    const loose = new IdentityResolver(DEFAULT_RULES.identity, { strategy: always });
    const res = loose.resolve(record("Completely Different"), [entry("p1", "Jan de Vries", 0)]);
    expect(res).toMatchObject({ kind: "existing", key: "p1", rule: "ratio" });
  });
});
