// lib/runner/scenario.ts
// One graph, one labeling, one diffusion run: everything a plot needs.
import { parseScenarioParams, type ScenarioParamsInput, type ScenarioParams } from '../config/params';
import { createRng } from '../core/rng';
import { finalIllusion, peakIllusion, simulateDiffusion, type SimulationResult } from '../dynamics/simulate';
import { ruleFor } from '../dynamics/rules';
import { generatePreferentialAttachment } from '../graph/preferentialAttachment';
import type { Graph, NodeId } from '../graph/types';
import { detectIllusion } from '../illusion/detect';
import { degreeThreshold, selectInfluencers } from '../illusion/influencers';
import { assignOpinions, influencerOpinions } from '../illusion/opinions';
import type { DegreeThreshold, IllusionResult, OpinionAssignment } from '../illusion/types';
import { log } from '../util/logger';

const runnerLog = log.withScope('runner');

export interface ScenarioResult {
  params: ScenarioParams;
  graph: Graph;
  degree: DegreeThreshold;
  influencers: ReadonlySet<NodeId>;
  assignment: OpinionAssignment;
  staticIllusion: IllusionResult;
  simulation: SimulationResult;
  peak: number;
  final: number;
}

export function runScenario(input: ScenarioParamsInput = {}): ScenarioResult {
  const params = parseScenarioParams(input);
  const graph = generatePreferentialAttachment({ n: params.n, m: params.m, seed: params.seed });
  const degree = degreeThreshold(graph);
  const influencers = selectInfluencers(graph);

  const assignment =
    params.fraction === null
      ? influencerOpinions(graph, influencers)
      : assignOpinions(graph, influencers, params.fraction, createRng(`${params.seed}:fill`));

  const staticIllusion = detectIllusion(graph, assignment.labeling);
  const simulation = simulateDiffusion(graph, assignment.labeling, ruleFor(params.rule, params.phi), {
    maxRounds: params.maxRounds,
    detectCycles: params.detectCycles,
  });

  const result: ScenarioResult = {
    params,
    graph,
    degree,
    influencers,
    assignment,
    staticIllusion,
    simulation,
    peak: peakIllusion(simulation),
    final: finalIllusion(simulation),
  };

  runnerLog.info('scenario finished', {
    fraction: params.fraction,
    influencers: influencers.size,
    globalMajority: staticIllusion.globalMajority,
    static: staticIllusion.illusioned.length,
    peak: result.peak,
    final: result.final,
    halt: simulation.halt,
  });
  return result;
}
