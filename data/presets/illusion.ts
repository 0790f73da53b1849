import type { BatchParamsInput, ScenarioParamsInput } from '../../lib/config/params';

export type IllusionPreset =
  | { key: string; title: string; description: string; mode: 'scenario'; params: ScenarioParamsInput }
  | { key: string; title: string; description: string; mode: 'batch'; params: BatchParamsInput };

export const hubSeededThreshold: IllusionPreset = {
  key: 'hub-seeded-threshold',
  title: 'Hub-seeded threshold cascade',
  description: 'Exactly the influencers hold the minority opinion; blue nodes adopt red once more than half their neighbours are red.',
  mode: 'scenario',
  params: { n: 1000, m: 2, seed: 42, fraction: null, rule: 'threshold', phi: 0.5, maxRounds: 50 },
};

export const forcedFractionThreshold: IllusionPreset = {
  key: 'forced-fraction-threshold',
  title: 'Forced 30% minority, threshold adoption',
  description: 'Influencers topped up with random nodes to a 30% minority; one-way adoption at phi = 0.5.',
  mode: 'scenario',
  params: { n: 1000, m: 2, seed: 42, fraction: 0.3, rule: 'threshold', phi: 0.5 },
};

export const majorityVoteOscillation: IllusionPreset = {
  key: 'majority-vote-cycles',
  title: 'Majority vote with cycle detection',
  description: 'Reversible majority-vote dynamics on a 40% minority; halts early when the labeling starts repeating.',
  mode: 'scenario',
  params: { n: 1000, m: 2, seed: 7, fraction: 0.4, rule: 'majority-vote', maxRounds: 50, detectCycles: true },
};

export const influencerBatch: IllusionPreset = {
  key: 'influencer-batch',
  title: 'Illusion vs influencer count',
  description: '200 independent graphs; static and post-diffusion illusion grouped by influencer count for 10/30/40% minorities.',
  mode: 'batch',
  params: { trials: 200, n: 1000, m: 2, seed: 42, fractions: [0.1, 0.3, 0.4], rule: 'majority-vote', maxRounds: 50 },
};

export const allIllusionPresets: IllusionPreset[] = [
  hubSeededThreshold,
  forcedFractionThreshold,
  majorityVoteOscillation,
  influencerBatch,
];

export function findPreset(key: string): IllusionPreset | undefined {
  return allIllusionPresets.find(p => p.key === key);
}
