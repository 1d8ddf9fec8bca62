/**
 * Relaxation phase type definitions
 */

import type { PhaseKind, StressLevel } from '../../core/types.js';

// ==================== Phase ====================

/** Tagged phase variant. `duration` is the nominal length in seconds. */
export type RelaxationPhase =
  | { readonly kind: 'initial'; readonly duration: number }
  | { readonly kind: 'deepening'; readonly duration: number }
  | { readonly kind: 'maintenance'; readonly duration: number };

export type PhaseDurations = Readonly<Record<PhaseKind, number>>;

// ==================== Snapshot ====================

/** Result of one PhaseController tick. */
export interface PhaseSnapshot {
  readonly phase: RelaxationPhase;
  /** Stimulation intensity in (0, 1]; phase intensity times stress intensity. */
  readonly intensity: number;
  readonly stressLevel: StressLevel;
  readonly elapsedSeconds: number;
  /** Seconds spent in the current phase. */
  readonly phaseElapsedSeconds: number;
  /** The phase bucket changed on this tick. */
  readonly transitioned: boolean;
  /** Stress differs from the previous tick; intensity was re-derived out of band. */
  readonly stressChanged: boolean;
}
