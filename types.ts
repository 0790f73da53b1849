// types.ts
export type { NodeId, Edge, Graph, AttachmentParams } from './lib/graph/types';
export type { Opinion, Labeling, DegreeThreshold, OpinionAssignment, IllusionResult } from './lib/illusion/types';
export type { DiffusionKind, DiffusionRule, ThresholdOptions } from './lib/dynamics/rules';
export type { HaltReason, SimulationOptions, SimulationResult } from './lib/dynamics/simulate';
export type { TrialRecord, TrialFailure, SummaryCell, SummaryRow, BatchTable } from './lib/runner/types';
export type { BatchResult, BatchOptions, TrialContext, TrialRunner } from './lib/runner/experiments';
export type { ScenarioResult } from './lib/runner/scenario';
export type { BatchParams, BatchParamsInput, ScenarioParams, ScenarioParamsInput } from './lib/config/params';
export type { Rng, Seed } from './lib/core/rng';
export type { PreconditionCode } from './lib/errors';
export type { IllusionPreset } from './data/presets/illusion';
export type { MeanSd } from './lib/util/stats';
