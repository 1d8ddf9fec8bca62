/**
 * PhaseController - progressive relaxation state machine
 *
 * initial → deepening → maintenance, driven by elapsed session time only.
 * Maintenance is terminal until reset(). Stress never moves the phase bucket;
 * a stress change re-derives intensity on the same tick instead of waiting
 * for the next natural transition.
 */

import type { StressLevel } from '../../core/types.js';
import type { PhaseDurations, PhaseSnapshot, RelaxationPhase } from './types.js';
import { DEFAULT_PHASE_DURATIONS, phaseAt, phaseIntensity, phaseStart } from './phases.js';

export class PhaseController {
  private elapsed = 0;
  private phase: RelaxationPhase;
  private lastStress: StressLevel | null = null;

  constructor(private readonly durations: PhaseDurations = DEFAULT_PHASE_DURATIONS) {
    this.phase = phaseAt(0, durations);
  }

  // ==================== Queries ====================

  get current(): RelaxationPhase {
    return this.phase;
  }

  get elapsedSeconds(): number {
    return this.elapsed;
  }

  get lastStressLevel(): StressLevel | null {
    return this.lastStress;
  }

  // ==================== Mutations ====================

  /**
   * Advance by `deltaSeconds` and report the phase for the new cumulative time.
   * Non-finite or negative deltas advance nothing.
   */
  tick(deltaSeconds: number, stress: StressLevel): PhaseSnapshot {
    const delta = Number.isFinite(deltaSeconds) && deltaSeconds > 0 ? deltaSeconds : 0;
    this.elapsed += delta;

    const previous = this.phase;
    this.phase = phaseAt(this.elapsed, this.durations);

    const stressChanged = this.lastStress !== null && this.lastStress !== stress;
    this.lastStress = stress;

    return {
      phase: this.phase,
      intensity: phaseIntensity(this.phase.kind, stress),
      stressLevel: stress,
      elapsedSeconds: this.elapsed,
      phaseElapsedSeconds: this.elapsed - phaseStart(this.phase.kind, this.durations),
      transitioned: previous.kind !== this.phase.kind,
      stressChanged,
    };
  }

  reset(): void {
    this.elapsed = 0;
    this.phase = phaseAt(0, this.durations);
    this.lastStress = null;
  }
}
