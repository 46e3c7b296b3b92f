import type { NameView } from "./normalize";
import type { SimilarityStrategy } from "./similarity";

export type MatchContext = {
  strategy: SimilarityStrategy;
  threshold: number;
  minContainmentLength: number;
  maxAbbreviationLength: number;
};

export type MatchRule = {
  name: string;
  test: (a: NameView, b: NameView, ctx: MatchContext) => boolean;
};

export const ratioRule: MatchRule = {
  name: "ratio",
  test: (a, b, ctx) => ctx.strategy.ratio(a.normalized, b.normalized) >= ctx.threshold,
};

// "devries" inside "dejanvries"
export const containmentRule: MatchRule = {
  name: "containment",
  test: (a, b, ctx) => {
    const [shorter, longer] =
      a.normalized.length <= b.normalized.length ? [a.normalized, b.normalized] : [b.normalized, a.normalized];
    return shorter.length >= ctx.minContainmentLength && longer.includes(shorter);
  },
};

export function isAbbreviationOf(short: string, long: string, maxLength: number): boolean {
  return short.length > 0 && short.length <= maxLength && short.length < long.length && long.startsWith(short);
}

// "S Zulfiqar" vs "Sikander Zulfiqar", "J. deVries" vs "Jan de Vries"
function collapseSurname(tokens: string[]): string[] {
  return tokens.length <= 2 ? tokens : [tokens[0], tokens.slice(1).join("")];
}

export const abbreviationRule: MatchRule = {
  name: "abbreviation",
  test: (a, b, ctx) => {
    let ta = a.tokens;
    let tb = b.tokens;
    if (ta.length !== tb.length) {
      ta = collapseSurname(ta);
      tb = collapseSurname(tb);
    }
    if (ta.length < 2 || ta.length !== tb.length) return false;
    let exact = 0;
    for (let i = 0; i < ta.length; i++) {
      const x = ta[i];
      const y = tb[i];
      if (x === y) {
        exact++;
        continue;
      }
      const max = ctx.maxAbbreviationLength;
      if (!isAbbreviationOf(x, y, max) && !isAbbreviationOf(y, x, max)) return false;
    }
    return exact >= 1;
  },
};

export const DEFAULT_MATCH_RULES: MatchRule[] = [ratioRule, containmentRule, abbreviationRule];

// First rule that accepts the pair, or null
export function firstMatchingRule(
  a: NameView,
  b: NameView,
  ctx: MatchContext,
  rules: MatchRule[] = DEFAULT_MATCH_RULES
): string | null {
  if (a.normalized === b.normalized) return "exact";
  for (const rule of rules) {
    if (rule.test(a, b, ctx)) return rule.name;
  }
  return null;
}
