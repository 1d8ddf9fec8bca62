/**
 * AudioParameterShaper - phase, breed, age and stress → audio parameter subset
 *
 * Progressive relaxation: early engagement (faster, brighter), then deepening
 * calm, then sustained minimal stimulation. Every branch is total over its enum
 * domain; nothing here throws.
 */

import type { SafetyConfig } from '../../core/config.js';
import { HEARING_RANGE_HZ } from '../../core/config.js';
import { clamp, clampVector, roundTo } from '../../core/safety.js';
import {
  CENTER,
  type AgeGroup,
  type AudioParameters,
  type FrequencyBand,
  type PhaseKind,
  type SpatialPreference,
  type StressLevel,
  type StressMetrics,
  type ToneGenerator,
  type Vector3,
} from '../../core/types.js';
import type { PhaseSnapshot } from '../phase/index.js';
import { ageProfile, type BreedProfile } from '../profiles/index.js';
import { FREQUENCY_BANDS, PHASE_BAND_GAINS, bandsContaining } from './frequency-bands.js';

// ==================== Tables ====================

interface PhaseAudio {
  bpm: number;
  volumeDb: number;
  toneAmplitude: number;
}

const PHASE_AUDIO: Record<PhaseKind, PhaseAudio> = {
  initial: { bpm: 60, volumeDb: 60, toneAmplitude: 0.5 },
  deepening: { bpm: 55, volumeDb: 55, toneAmplitude: 0.4 },
  maintenance: { bpm: 50, volumeDb: 50, toneAmplitude: 0.3 },
};

interface StressAudio {
  bpmOffset: number;
  volumeFactor: number;
  /** Added to bands holding one of the breed's stress-response frequencies. */
  responseBoostDb: number;
}

const STRESS_AUDIO: Record<StressLevel, StressAudio> = {
  low: { bpmOffset: 0, volumeFactor: 1.0, responseBoostDb: 0 },
  moderate: { bpmOffset: -3, volumeFactor: 0.9, responseBoostDb: 2 },
  high: { bpmOffset: -6, volumeFactor: 0.8, responseBoostDb: 4 },
};

/** Share of the volume ceiling removed at volumeSensitivity = 1. */
const SENSITIVITY_ATTENUATION = 0.3;

const SPATIAL_BIAS: Record<Exclude<SpatialPreference, 'adaptive'>, Vector3> = {
  surround: { x: 0, y: 0, z: 0 },
  frontFocused: { x: 0, y: 0, z: 1 },
  sideFocused: { x: 1, y: 0, z: 0 },
  overhead: { x: 0, y: 1, z: 0 },
};

/** `adaptive` follows the subject when a location is known, else centre. */
export function resolveSpatialBias(preference: SpatialPreference, lastKnownLocation?: Vector3): Vector3 {
  if (preference === 'adaptive') {
    return lastKnownLocation ? clampVector(lastKnownLocation) : { ...CENTER };
  }
  return { ...SPATIAL_BIAS[preference] };
}

// ==================== Shaper ====================

export class AudioParameterShaper {
  constructor(private readonly safety: SafetyConfig) {}

  shape(
    phase: PhaseSnapshot,
    profile: BreedProfile,
    age: AgeGroup,
    stress: StressMetrics,
    lastKnownLocation?: Vector3,
  ): AudioParameters {
    const base = PHASE_AUDIO[phase.phase.kind];
    const stressAdj = STRESS_AUDIO[stress.stressLevel];
    const ageAdj = ageProfile(age);

    const audioBPM = clamp(
      Math.round(base.bpm + ageAdj.bpmOffset + stressAdj.bpmOffset),
      this.safety.bpm.min,
      this.safety.bpm.max,
    );

    const volume = base.volumeDb * (1 - SENSITIVITY_ATTENUATION * profile.volumeSensitivity) * stressAdj.volumeFactor;
    const volumeCeilingDb = clamp(roundTo(volume, 2), this.safety.volumeFloorDb, this.safety.volumeCeilingDb);

    return {
      audioBPM,
      volumeCeilingDb,
      frequencyBands: this.shapeBands(phase, profile, stressAdj),
      toneGenerators: this.shapeTones(base, ageAdj.audioEngagement, stressAdj, profile),
      spatialBias: resolveSpatialBias(profile.spatialPreference, lastKnownLocation),
    };
  }

  private shapeBands(phase: PhaseSnapshot, profile: BreedProfile, stressAdj: StressAudio): FrequencyBand[] {
    const gains = PHASE_BAND_GAINS[phase.phase.kind];
    const boosted = bandsContaining(profile.stressResponseFrequencies);
    const { min, max } = this.safety.bandGainDb;

    return FREQUENCY_BANDS.map((band, i) => {
      const boost = boosted.has(i) ? stressAdj.responseBoostDb : 0;
      return {
        centerHz: band.centerHz,
        bandwidthHz: band.bandwidthHz,
        gainDb: clamp(roundTo(gains[i] * phase.intensity + boost, 2), min, max),
      };
    });
  }

  private shapeTones(
    base: PhaseAudio,
    engagement: number,
    stressAdj: StressAudio,
    profile: BreedProfile,
  ): ToneGenerator[] {
    const amplitude = clamp(roundTo(base.toneAmplitude * engagement * stressAdj.volumeFactor, 3), 0, 1);
    return profile.preferredFrequencies
      .filter((hz) => hz >= HEARING_RANGE_HZ.min && hz <= HEARING_RANGE_HZ.max)
      .map((frequencyHz) => ({ frequencyHz, amplitude }));
  }
}
