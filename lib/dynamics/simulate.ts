// lib/dynamics/simulate.ts
import { PreconditionError } from '../errors';
import type { Graph } from '../graph/types';
import { assertLabeling, countRed, detectIllusion } from '../illusion/detect';
import type { Labeling, Opinion } from '../illusion/types';
import { log } from '../util/logger';
import type { DiffusionRule } from './rules';

const dynLog = log.withScope('dynamics');

export const DEFAULT_MAX_ROUNDS = 50;
export const DEFAULT_CYCLE_WINDOW = 8;

export type HaltReason = 'converged' | 'round-cap' | 'cycle';

export interface SimulationOptions {
  /** positive integer; Infinity is accepted for monotone rules only */
  maxRounds?: number;
  /** stop on a labeling already seen within `cycleWindow` rounds */
  detectCycles?: boolean;
  cycleWindow?: number;
}

export interface SimulationResult {
  /** illusion-set size at the start of each round */
  illusionSeries: number[];
  /** red count at the start of each round */
  redSeries: number[];
  initial: Labeling;
  final: Labeling;
  rounds: number;
  halt: HaltReason;
  /** set when halt === 'cycle' */
  cyclePeriod?: number;
}

function labelingHash(labeling: Labeling): number {
  // FNV-1a over the red/blue bit string
  let h = 2166136261;
  for (const op of labeling) {
    h ^= op === 'red' ? 1 : 0;
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
}

function sameLabeling(a: Labeling, b: Labeling): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) if (a[i] !== b[i]) return false;
  return true;
}

function resolveOptions(rule: DiffusionRule, opts: SimulationOptions) {
  const maxRounds = opts.maxRounds ?? DEFAULT_MAX_ROUNDS;
  const cycleWindow = opts.cycleWindow ?? DEFAULT_CYCLE_WINDOW;
  const unbounded = maxRounds === Number.POSITIVE_INFINITY;

  if (!unbounded && (!Number.isInteger(maxRounds) || maxRounds < 1)) {
    throw new PreconditionError('invalid-parameter', `maxRounds must be a positive integer, got ${maxRounds}`, { maxRounds });
  }
  if (unbounded && !rule.monotone) {
    throw new PreconditionError('invalid-parameter', `Rule '${rule.kind}' may oscillate and needs a finite round cap`);
  }
  if (!Number.isInteger(cycleWindow) || cycleWindow < 2) {
    throw new PreconditionError('invalid-parameter', `cycleWindow must be an integer >= 2, got ${cycleWindow}`, { cycleWindow });
  }
  return { maxRounds, cycleWindow, detectCycles: opts.detectCycles ?? false };
}

/**
 * Synchronous opinion diffusion. Each round records the illusion size of the
 * current labeling, then derives the whole next labeling from that frozen
 * snapshot. Halts on a zero-change round, on the round cap, or (when enabled)
 * on a repeated labeling.
 */
export function simulateDiffusion(
  graph: Graph,
  initial: Labeling,
  rule: DiffusionRule,
  options: SimulationOptions = {}
): SimulationResult {
  assertLabeling(graph, initial);
  const { maxRounds, cycleWindow, detectCycles } = resolveOptions(rule, options);

  const illusionSeries: number[] = [];
  const redSeries: number[] = [];
  const seen = new Map<number, Array<{ round: number; labeling: Labeling }>>();

  let current: Labeling = Object.freeze(initial.slice());
  let halt: HaltReason = 'round-cap';
  let cyclePeriod: number | undefined;

  for (let round = 0; round < maxRounds; round++) {
    illusionSeries.push(detectIllusion(graph, current).illusioned.length);
    redSeries.push(countRed(current));

    const next: Opinion[] = new Array<Opinion>(graph.size);
    let changed = 0;
    for (let v = 0; v < graph.size; v++) {
      next[v] = rule.next(graph, current, v);
      if (next[v] !== current[v]) changed++;
    }

    if (changed === 0) {
      halt = 'converged';
      break;
    }

    if (detectCycles) {
      const key = labelingHash(current);
      const bucket = seen.get(key) ?? [];
      bucket.push({ round, labeling: current });
      seen.set(key, bucket);
      for (const [k, entries] of seen) {
        const kept = entries.filter(e => round - e.round < cycleWindow);
        if (kept.length) seen.set(k, kept);
        else seen.delete(k);
      }

      const hit = seen.get(labelingHash(next))?.find(e => sameLabeling(e.labeling, next));
      if (hit) {
        current = Object.freeze(next);
        halt = 'cycle';
        cyclePeriod = round + 1 - hit.round;
        break;
      }
    }

    current = Object.freeze(next);
  }

  const result: SimulationResult = {
    illusionSeries,
    redSeries,
    initial,
    final: current,
    rounds: illusionSeries.length,
    halt,
  };
  if (cyclePeriod !== undefined) result.cyclePeriod = cyclePeriod;

  dynLog.debug('diffusion finished', { rule: rule.kind, rounds: result.rounds, halt, cyclePeriod });
  return result;
}

export function peakIllusion(result: SimulationResult): number {
  return result.illusionSeries.reduce((a, b) => Math.max(a, b), 0);
}

export function finalIllusion(result: SimulationResult): number {
  return result.illusionSeries[result.illusionSeries.length - 1] ?? 0;
}
