import type { AgeGroup } from '../../core/types.js';
import type { AgeProfile } from './types.js';

export const AGE_PROFILES: Readonly<Record<AgeGroup, AgeProfile>> = Object.freeze({
  puppy: Object.freeze({ age: 'puppy', visualSpeed: 1.2, audioEngagement: 1.1, frameRateBias: 1.1, bpmOffset: 5 }),
  adult: Object.freeze({ age: 'adult', visualSpeed: 1.0, audioEngagement: 1.0, frameRateBias: 1.0, bpmOffset: 0 }),
  senior: Object.freeze({ age: 'senior', visualSpeed: 0.8, audioEngagement: 0.9, frameRateBias: 0.85, bpmOffset: -5 }),
});

export function ageProfile(age: AgeGroup): AgeProfile {
  return AGE_PROFILES[age];
}
