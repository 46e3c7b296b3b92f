import { z } from "zod";

const points = z.number().finite();
const positive = z.number().finite().positive();

export const RuleSetSchema = z
  .object({
    batting: z.object({
      pointsPerRun: points,
      fiftyBonus: points,
      centuryBonus: points,
      duckPenalty: points, // negative
    }),
    bowling: z.object({
      pointsPerWicket: points,
      pointsPerMaiden: points,
      fiveWicketBonus: points,
      economyBaseline: positive, // wicket points × (baseline / economy)
      maxEconomyMultiplier: positive, // used when economy is exactly 0
    }),
    fielding: z.object({
      pointsPerCatch: points,
      pointsPerStumping: points,
      pointsPerRunOut: points,
      wicketKeeperCatchMultiplier: positive,
    }),
    tierMultipliers: z.record(z.string(), positive),
    multiplier: z.object({
      min: positive,
      neutral: positive,
      max: positive,
      driftRate: z.number().gt(0).lte(1),
    }),
    leadership: z.object({
      captain: positive,
      viceCaptain: positive,
    }),
    identity: z.object({
      similarityThreshold: z.number().gt(0).lte(1),
      minContainmentLength: z.number().int().min(1),
      maxAbbreviationLength: z.number().int().min(1),
    }),
  })
  .strict()
  .superRefine((rules, ctx) => {
    const { min, neutral, max } = rules.multiplier;
    if (!(min <= neutral && neutral <= max)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["multiplier"],
        message: `expected min <= neutral <= max, got ${min} / ${neutral} / ${max}`,
      });
    }
  });

export type RuleSet = z.infer<typeof RuleSetSchema>;

export type RuleSetOverrides = {
  [K in keyof RuleSet]?: Partial<RuleSet[K]>;
};
