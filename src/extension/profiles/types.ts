/**
 * Profile type definitions
 *
 * Breed and age characteristics consumed by the audio and visual shapers.
 */

import type {
  AgeGroup,
  BreedCategory,
  ColorPreference,
  EnergyLevel,
  SpatialPreference,
} from '../../core/types.js';

// ==================== Breed Profile ====================

/** Immutable breed record. `name` is always the canonical (lowercase) key. */
export interface BreedProfile {
  readonly name: string;
  readonly preferredFrequencies: readonly number[];
  /** (0, 1]; higher means quieter output. */
  readonly volumeSensitivity: number;
  readonly spatialPreference: SpatialPreference;
  /** Frequencies whose bands are boosted as stress rises. */
  readonly stressResponseFrequencies: readonly number[];
  readonly colorPreference: ColorPreference;
  readonly motionSensitivity: number;
  readonly contrastPreference: number;
  readonly category: BreedCategory;
  readonly energyLevel: EnergyLevel;
  readonly preferredFrameRate: number;
}

// ==================== Age Profile ====================

export interface AgeProfile {
  readonly age: AgeGroup;
  readonly visualSpeed: number;
  readonly audioEngagement: number;
  readonly frameRateBias: number;
  /** Added to the phase BPM. */
  readonly bpmOffset: number;
}
