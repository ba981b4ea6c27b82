import { z } from "zod";

export const MarketSchema = z.object({
  rate: z.number().gt(-1),
  up: z.number(),
  down: z.number(),
});

export const ContractSchema = z.object({
  maturity: z.number().int().positive(),
  startPrice: z.number().positive(),
  strike: z.number().positive(),
  barrier: z.number().positive(),
});

export const PricingSchema = z.object({
  bound: z.enum(["exclusive", "inclusive"]).default("exclusive"),
});

export const GuardsSchema = z.object({
  validateInputs: z.boolean().default(false),
});

export const RangeSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("linear"),
    start: z.number(),
    stop: z.number(),
    count: z.number().int().positive(),
  }),
  // stop is exclusive
  z.object({
    kind: z.literal("integer"),
    start: z.number().int(),
    stop: z.number().int(),
  }),
  z.object({
    kind: z.literal("powers"),
    base: z.number().positive(),
    startExponent: z.number().int(),
    stopExponent: z.number().int(),
  }),
  z.object({
    kind: z.literal("list"),
    values: z.array(z.number()).min(1),
  }),
]);

export const SweepParameterSchema = z.enum(["maturity", "barrier", "strike", "rate"]);

export const SeriesSchema = z.object({
  label: z.string().min(1),
  overrides: MarketSchema.merge(ContractSchema).partial().default({}),
});

export const SweepSchema = z.object({
  name: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, "sweep names are lower-case slugs"),
  instrument: z.enum(["call", "put", "upAndInCall"]),
  parameter: SweepParameterSchema,
  values: RangeSchema,
  series: z.array(SeriesSchema).min(1),
});

export const SweepConfigSchema = z.object({
  market: MarketSchema,
  contract: ContractSchema,
  pricing: PricingSchema.default({}),
  guards: GuardsSchema.default({}),
  sweeps: z.array(SweepSchema).default([]),
});

export type RangeSpec = z.infer<typeof RangeSchema>;
export type SweepParameter = z.infer<typeof SweepParameterSchema>;
export type SweepDefinition = z.infer<typeof SweepSchema>;
export type SweepConfig = z.infer<typeof SweepConfigSchema>;
