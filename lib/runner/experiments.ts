// lib/runner/experiments.ts
import { parseBatchParams, type BatchParams, type BatchParamsInput } from '../config/params';
import { createRng, drawSeed } from '../core/rng';
import { finalIllusion, simulateDiffusion } from '../dynamics/simulate';
import { ruleFor, type DiffusionRule } from '../dynamics/rules';
import { describeError, isPreconditionError } from '../errors';
import { generatePreferentialAttachment } from '../graph/preferentialAttachment';
import { detectIllusion } from '../illusion/detect';
import { selectInfluencers } from '../illusion/influencers';
import { assignOpinions } from '../illusion/opinions';
import { log } from '../util/logger';
import { summarizeBatch } from './summary';
import type { BatchTable, TrialFailure, TrialRecord } from './types';

const runnerLog = log.withScope('runner');

export interface TrialContext {
  trial: number;
  seed: number;
  params: BatchParams;
  rule: DiffusionRule;
}

/** One trial: a fresh graph, every fraction on it. Returns one record per fraction. */
export type TrialRunner = (ctx: TrialContext) => TrialRecord[];

export interface BatchResult {
  params: BatchParams;
  records: TrialRecord[];
  failures: TrialFailure[];
  table: BatchTable;
}

export interface BatchOptions {
  runTrial?: TrialRunner;
}

export const runTrial: TrialRunner = ({ trial, seed, params, rule }) => {
  const graph = generatePreferentialAttachment({ n: params.n, m: params.m, seed });
  const influencers = selectInfluencers(graph);

  return params.fractions.map(fraction => {
    const assignment = assignOpinions(graph, influencers, fraction, createRng(`${seed}:${fraction}`));
    const staticIllusion = detectIllusion(graph, assignment.labeling).illusioned.length;
    const sim = simulateDiffusion(graph, assignment.labeling, rule, { maxRounds: params.maxRounds });
    return Object.freeze({
      trial,
      seed,
      influencerCount: influencers.size,
      fraction,
      staticIllusion,
      finalIllusion: finalIllusion(sim),
    });
  });
};

/**
 * Independent trials over fresh graphs. A trial that throws is dropped whole
 * and reported in `failures`; the others still count.
 */
export function runBatch(input: BatchParamsInput = {}, options: BatchOptions = {}): BatchResult {
  const params = parseBatchParams(input);
  const rule = ruleFor(params.rule, params.phi);
  const run = options.runTrial ?? runTrial;
  const master = createRng(params.seed);

  const records: TrialRecord[] = [];
  const failures: TrialFailure[] = [];

  for (let trial = 0; trial < params.trials; trial++) {
    const seed = drawSeed(master);
    try {
      records.push(...run({ trial, seed, params, rule }));
    } catch (err) {
      const failure: TrialFailure = { trial, seed, error: describeError(err) };
      if (isPreconditionError(err)) failure.code = err.code;
      failures.push(failure);
      runnerLog.warn('trial failed, excluded from statistics', failure);
    }
  }

  const table = summarizeBatch(records, params.fractions);
  runnerLog.info('batch finished', {
    trials: params.trials,
    failed: failures.length,
    records: records.length,
    influencerGroups: table.rows.length,
  });
  return { params, records, failures, table };
}
