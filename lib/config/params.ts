// lib/config/params.ts
// Invocation-time parameters. Nothing here is read from disk or the environment.
import { z } from 'zod';
import { PreconditionError } from '../errors';

export const DEFAULT_FRACTIONS = [0.1, 0.3, 0.4] as const;

const SeedSchema = z.union([z.number().int(), z.string().min(1)]);
const FractionSchema = z.number().min(0).max(1);
const MaxRoundsSchema = z.union([z.number().int().positive(), z.literal(Number.POSITIVE_INFINITY)]);

export const DiffusionKindSchema = z.enum(['threshold', 'majority-vote']);

const NetworkShape = {
  n: z.number().int().positive().default(1000),
  m: z.number().int().positive().default(2),
  seed: SeedSchema.default(42),
  phi: FractionSchema.default(0.5),
  maxRounds: MaxRoundsSchema.default(50),
};

export const ScenarioParamsSchema = z
  .object({
    ...NetworkShape,
    /** null seeds exactly the influencer set, with no forced fraction */
    fraction: FractionSchema.nullable().default(0.1),
    rule: DiffusionKindSchema.default('threshold'),
    detectCycles: z.boolean().default(false),
  })
  .refine(p => p.m < p.n, { message: 'm must be smaller than n', path: ['m'] })
  .refine(p => p.maxRounds !== Number.POSITIVE_INFINITY || p.rule === 'threshold', {
    message: 'an unbounded round cap needs the threshold rule',
    path: ['maxRounds'],
  });

export const BatchParamsSchema = z
  .object({
    ...NetworkShape,
    trials: z.number().int().positive().default(200),
    fractions: z
      .array(FractionSchema)
      .min(1)
      .refine(fs => new Set(fs).size === fs.length, { message: 'fractions must be distinct' })
      .default([...DEFAULT_FRACTIONS]),
    rule: DiffusionKindSchema.default('majority-vote'),
  })
  .refine(p => p.m < p.n, { message: 'm must be smaller than n', path: ['m'] })
  .refine(p => p.maxRounds !== Number.POSITIVE_INFINITY || p.rule === 'threshold', {
    message: 'an unbounded round cap needs the threshold rule',
    path: ['maxRounds'],
  });

export type ScenarioParamsInput = z.input<typeof ScenarioParamsSchema>;
export type ScenarioParams = z.output<typeof ScenarioParamsSchema>;
export type BatchParamsInput = z.input<typeof BatchParamsSchema>;
export type BatchParams = z.output<typeof BatchParamsSchema>;

function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown, label: string): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new PreconditionError('invalid-parameter', `Invalid ${label} parameters: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
}

export function parseScenarioParams(input: ScenarioParamsInput = {}): ScenarioParams {
  return parseWith(ScenarioParamsSchema, input, 'scenario');
}

export function parseBatchParams(input: BatchParamsInput = {}): BatchParams {
  return parseWith(BatchParamsSchema, input, 'batch');
}
