import type { CanonicalPlayer, PerformanceRecord, Provenance } from "@/lib/domain/types";
import type { RuleSet } from "@/lib/rules/schemas";
import { createLogger } from "@/lib/log";
import { mintPlayerKey } from "./keys";
import { toNameView, type NameView } from "./normalize";
import { canPromote, provenanceFor } from "./provenance";
import { DEFAULT_MATCH_RULES, firstMatchingRule, type MatchContext, type MatchRule } from "./rules";
import { levenshteinRatio, type SimilarityStrategy } from "./similarity";

const log = createLogger("identity");

export type RegistryEntry = Pick<
  CanonicalPlayer,
  "key" | "display_name" | "club" | "external_id" | "provenance" | "registered_seq"
>;

// Known players of one club, any order; resolution sorts by registered_seq.
export type ClubRegistry = readonly RegistryEntry[];

export type Resolution =
  | {
      kind: "existing";
      key: string;
      via: "external_id" | "name";
      rule: string | null;
      similarity: number;
      promote: boolean; // attach the record's id and mark id_confirmed
      ambiguous: boolean;
    }
  | { kind: "new"; key: string; provenance: Provenance };

export type ResolverOptions = {
  strategy?: SimilarityStrategy;
  rules?: MatchRule[];
};

type Candidate = { entry: RegistryEntry; rule: string; similarity: number };

export class IdentityResolver {
  private readonly ctx: MatchContext;
  private readonly rules: MatchRule[];

  constructor(identity: RuleSet["identity"], opts: ResolverOptions = {}) {
    this.ctx = {
      strategy: opts.strategy ?? levenshteinRatio,
      threshold: identity.similarityThreshold,
      minContainmentLength: identity.minContainmentLength,
      maxAbbreviationLength: identity.maxAbbreviationLength,
    };
    this.rules = opts.rules ?? DEFAULT_MATCH_RULES;
  }

  // Precedence: external id anywhere in the scope, then fuzzy name within the
  // club, then mint. Without `findByExternalId` only the club registry is searched.
  resolve(
    record: PerformanceRecord,
    registry: ClubRegistry,
    isTaken: (key: string) => boolean = () => false,
    findByExternalId?: (id: string) => RegistryEntry | undefined
  ): Resolution {
    const view = toNameView(record.player_name ?? "");
    if (!view.normalized) {
      throw new TypeError(`Cannot resolve a performance without a player name (match ${record.match_id})`);
    }
    const externalId = record.player_id?.trim() || null;
    const ordered = [...registry].sort((a, b) => a.registered_seq - b.registered_seq);

    if (externalId) {
      const hit = findByExternalId?.(externalId) ?? ordered.find((e) => e.external_id === externalId);
      if (hit) {
        return { kind: "existing", key: hit.key, via: "external_id", rule: null, similarity: 1, promote: false, ambiguous: false };
      }
    }

    const match = this.bestNameMatch(view, ordered, externalId);
    if (match) {
      return {
        kind: "existing",
        key: match.entry.key,
        via: "name",
        rule: match.rule,
        similarity: match.similarity,
        promote: externalId !== null && canPromote(match.entry.provenance),
        ambiguous: match.ambiguous,
      };
    }

    return {
      kind: "new",
      key: mintPlayerKey(record.player_name, record.club, externalId, isTaken),
      provenance: provenanceFor(externalId),
    };
  }

  resolveKey(record: PerformanceRecord, registry: ClubRegistry): string {
    return this.resolve(record, registry).key;
  }

  // Highest ratio among accepted candidates; ties keep the earlier registration.
  private bestNameMatch(
    view: NameView,
    ordered: RegistryEntry[],
    externalId: string | null
  ): (Candidate & { ambiguous: boolean }) | null {
    let best: Candidate | null = null;
    let ambiguous = false;
    for (const entry of ordered) {
      // a different confirmed id is a different person, however alike the names
      if (externalId && entry.external_id && entry.external_id !== externalId) continue;
      const other = toNameView(entry.display_name);
      const rule = firstMatchingRule(view, other, this.ctx, this.rules);
      if (!rule) continue;
      const similarity = rule === "exact" ? 1 : this.ctx.strategy.ratio(view.normalized, other.normalized);
      if (!best || similarity > best.similarity) {
        best = { entry, rule, similarity };
        ambiguous = false;
      } else if (similarity === best.similarity) {
        ambiguous = true;
      }
    }
    if (!best) return null;
    if (ambiguous) {
      log.warn(`Ambiguous name '${view.raw}': keeping earliest candidate '${best.entry.display_name}' (${best.entry.key})`);
    } else if (best.rule !== "exact") {
      log.info(`Fuzzy matched '${view.raw}' to '${best.entry.display_name}' via ${best.rule}`);
    }
    return { ...best, ambiguous };
  }
}
