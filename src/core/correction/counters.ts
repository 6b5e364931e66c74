import type { AttemptCounters } from '../models/index.js';

/** Mutable per-request bookkeeping shared by both correction cycles */
export interface CorrectionTrail {
  counters: AttemptCounters;
  /** Paths of every persisted code unit, in creation order */
  codeArtifacts: string[];
}

export function createTrail(): CorrectionTrail {
  return {
    counters: { validationAttempts: 0, validatorCorrections: 0, errorRetries: 0 },
    codeArtifacts: [],
  };
}

export function totalCorrections(counters: AttemptCounters): number {
  return counters.validatorCorrections + counters.errorRetries;
}
