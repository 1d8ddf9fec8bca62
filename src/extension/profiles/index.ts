export { ProfileRegistry, ProfileRegistryBuilder, createProfileRegistry, canonicalName } from './ProfileRegistry.js';
export { AGE_PROFILES, ageProfile } from './ages.js';
export type { BreedProfile, AgeProfile } from './types.js';
