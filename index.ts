// Public entry for the illusion engine.
export * from './types';
export { GraphBuilder, graphFromEdges, neighbors, degreeOf, degrees, edgeList, isConnected, starGraph, cycleGraph } from './lib/graph/graph';
export { generatePreferentialAttachment } from './lib/graph/preferentialAttachment';
export { degreeThreshold, selectInfluencers } from './lib/illusion/influencers';
export { assignOpinions, influencerOpinions, labelingFromMinority, rankByDegree } from './lib/illusion/opinions';
export { detectIllusion, localMajority } from './lib/illusion/detect';
export { thresholdAdoption, majorityVote, ruleFor } from './lib/dynamics/rules';
export { simulateDiffusion, peakIllusion, finalIllusion, DEFAULT_MAX_ROUNDS } from './lib/dynamics/simulate';
export { runBatch, runTrial } from './lib/runner/experiments';
export { summarizeBatch } from './lib/runner/summary';
export { runScenario } from './lib/runner/scenario';
export { parseBatchParams, parseScenarioParams, BatchParamsSchema, ScenarioParamsSchema } from './lib/config/params';
export { createRng } from './lib/core/rng';
export { PreconditionError, isPreconditionError } from './lib/errors';
export { log } from './lib/util/logger';
export { allIllusionPresets, findPreset } from './data/presets/illusion';
