import { PHASE_KINDS, type PhaseKind, type StressLevel } from '../../core/types.js';
import type { PhaseDurations, RelaxationPhase } from './types.js';

export const DEFAULT_PHASE_DURATIONS: PhaseDurations = Object.freeze({
  initial: 300,
  deepening: 600,
  maintenance: 3600,
});

const PHASE_INTENSITY: Record<PhaseKind, number> = {
  initial: 1.0,
  deepening: 0.8,
  maintenance: 0.6,
};

const STRESS_INTENSITY: Record<StressLevel, number> = {
  low: 1.0,
  moderate: 0.85,
  high: 0.7,
};

export function makePhase(kind: PhaseKind, durations: PhaseDurations): RelaxationPhase {
  const phase: RelaxationPhase = { kind, duration: durations[kind] };
  return Object.freeze(phase);
}

export function phaseDuration(phase: RelaxationPhase): number {
  return phase.duration;
}

/** Next phase in order; maintenance is terminal and maps to itself. */
export function nextPhaseKind(kind: PhaseKind): PhaseKind {
  const idx = PHASE_KINDS.indexOf(kind);
  return PHASE_KINDS[Math.min(idx + 1, PHASE_KINDS.length - 1)];
}

/** Seconds from session start at which `kind` begins. */
export function phaseStart(kind: PhaseKind, durations: PhaseDurations): number {
  let start = 0;
  for (const k of PHASE_KINDS) {
    if (k === kind) return start;
    start += durations[k];
  }
  return start;
}

/**
 * Phase for a cumulative elapsed time. A boundary instant belongs to the
 * later phase; anything past initial + deepening is maintenance.
 */
export function phaseAt(elapsedSeconds: number, durations: PhaseDurations): RelaxationPhase {
  if (elapsedSeconds < durations.initial) return makePhase('initial', durations);
  if (elapsedSeconds < durations.initial + durations.deepening) return makePhase('deepening', durations);
  return makePhase('maintenance', durations);
}

export function phaseIntensity(kind: PhaseKind, stress: StressLevel): number {
  return PHASE_INTENSITY[kind] * STRESS_INTENSITY[stress];
}
