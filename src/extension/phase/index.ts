export { PhaseController } from './PhaseController.js';
export {
  DEFAULT_PHASE_DURATIONS,
  makePhase,
  nextPhaseKind,
  phaseAt,
  phaseDuration,
  phaseIntensity,
  phaseStart,
} from './phases.js';
export type { RelaxationPhase, PhaseDurations, PhaseSnapshot } from './types.js';
