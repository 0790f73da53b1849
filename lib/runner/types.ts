// lib/runner/types.ts
import type { PreconditionCode } from '../errors';
import type { MeanSd } from '../util/stats';

export interface TrialRecord {
  readonly trial: number;
  readonly seed: number;
  readonly influencerCount: number;
  readonly fraction: number;
  readonly staticIllusion: number;
  readonly finalIllusion: number;
}

export interface TrialFailure {
  trial: number;
  seed: number;
  error: string;
  code?: PreconditionCode;
}

export interface SummaryCell {
  fraction: number;
  samples: number;
  static: MeanSd;
  final: MeanSd;
}

export interface SummaryRow {
  influencerCount: number;
  /** one entry per requested fraction, in request order; null when no trial landed here */
  cells: Array<SummaryCell | null>;
}

export interface BatchTable {
  fractions: number[];
  rows: SummaryRow[];
}
