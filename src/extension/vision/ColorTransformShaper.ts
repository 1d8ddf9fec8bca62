/**
 * ColorTransformShaper - phase, breed, age and stress → visual parameter subset
 *
 * Speed, contrast and frame rate fall as the session deepens and as stress
 * rises. Motion-sensitive breeds get harder damping and a lower frame cap.
 */

import type { Config, SafetyConfig } from '../../core/config.js';
import { clamp, roundTo } from '../../core/safety.js';
import type {
  AgeGroup,
  EnergyLevel,
  PhaseKind,
  StressLevel,
  StressMetrics,
  VisualParameters,
} from '../../core/types.js';
import type { PhaseSnapshot } from '../phase/index.js';
import { ageProfile, type BreedProfile } from '../profiles/index.js';
import { coefficientsFor } from './dichromatic.js';

// ==================== Tables ====================

interface PhaseVisual {
  speed: number;
  contrast: number;
  frameFactor: number;
}

const PHASE_VISUAL: Record<PhaseKind, PhaseVisual> = {
  initial: { speed: 0.5, contrast: 0.7, frameFactor: 1.0 },
  deepening: { speed: 0.2, contrast: 0.5, frameFactor: 0.85 },
  maintenance: { speed: 0.1, contrast: 0.3, frameFactor: 0.7 },
};

interface StressVisual {
  speed: number;
  contrast: number;
  /** Scales how much of the breed's motion sensitivity is applied. */
  motion: number;
}

const STRESS_VISUAL: Record<StressLevel, StressVisual> = {
  low: { speed: 1.0, contrast: 1.0, motion: 0.5 },
  moderate: { speed: 0.75, contrast: 0.9, motion: 0.75 },
  high: { speed: 0.5, contrast: 0.8, motion: 1.0 },
};

const ENERGY_SPEED: Record<EnergyLevel, number> = {
  low: 0.9,
  medium: 1.0,
  high: 1.1,
};

const MAX_DAMPING = 0.9;

// ==================== Shaper ====================

export class ColorTransformShaper {
  constructor(
    private readonly safety: SafetyConfig,
    private readonly vision: Config['vision'],
  ) {}

  shape(phase: PhaseSnapshot, profile: BreedProfile, age: AgeGroup, stress: StressMetrics): VisualParameters {
    const base = PHASE_VISUAL[phase.phase.kind];
    const stressAdj = STRESS_VISUAL[stress.stressLevel];
    const ageAdj = ageProfile(age);
    const movement = clamp(stress.movementRate, 0, 1);

    const visualSpeed = base.speed * ageAdj.visualSpeed * ENERGY_SPEED[profile.energyLevel] * stressAdj.speed;
    const colorContrast = base.contrast * (0.75 + 0.5 * profile.contrastPreference) * stressAdj.contrast;

    const damping = clamp(profile.motionSensitivity * stressAdj.motion * (1 + 0.5 * movement), 0, MAX_DAMPING);

    const frameRate = profile.preferredFrameRate
      * base.frameFactor
      * ageAdj.frameRateBias
      * (1 - 0.5 * profile.motionSensitivity * stressAdj.motion);

    return {
      visualSpeed: clamp(roundTo(visualSpeed, 4), 0, this.safety.maxVisualSpeed),
      colorContrast: clamp(roundTo(colorContrast, 4), 0, 1),
      motionDamping: roundTo(1 - damping, 4),
      frameRateCap: clamp(roundTo(frameRate, 2), this.safety.frameRate.min, this.safety.frameRate.max),
      colorTransform: coefficientsFor(profile.colorPreference, this.vision),
    };
  }
}
