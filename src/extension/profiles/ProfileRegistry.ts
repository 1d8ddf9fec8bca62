/**
 * ProfileRegistry - immutable breed lookup with a guaranteed fallback
 *
 * Built once through ProfileRegistryBuilder, then read-only. Lookups are
 * case-insensitive and whitespace-tolerant; an unknown breed resolves to the
 * default profile instead of failing.
 */

import type { BreedCategory } from '../../core/types.js';
import type { Config } from '../../core/config.js';
import { DuplicateProfileError } from '../../core/errors.js';
import { createLogger, type Logger } from '../../core/logger.js';
import type { BreedProfile } from './types.js';

/** Lowercase, trimmed, internal whitespace collapsed to single spaces. */
export function canonicalName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, ' ');
}

function freezeProfile(profile: BreedProfile): BreedProfile {
  return Object.freeze({
    ...profile,
    name: canonicalName(profile.name),
    preferredFrequencies: Object.freeze([...profile.preferredFrequencies]),
    stressResponseFrequencies: Object.freeze([...profile.stressResponseFrequencies]),
  });
}

// ==================== Registry ====================

export class ProfileRegistry {
  private readonly log: Logger;

  /** Use ProfileRegistryBuilder or createProfileRegistry(). */
  constructor(
    private readonly profiles: ReadonlyMap<string, BreedProfile>,
    readonly defaultProfile: BreedProfile,
    logger?: Logger,
  ) {
    this.log = logger ?? createLogger('profiles');
  }

  // ==================== Queries ====================

  lookup(name: string): BreedProfile {
    const key = canonicalName(name);
    const profile = this.profiles.get(key);
    if (profile) return profile;
    if (key === this.defaultProfile.name) return this.defaultProfile;

    this.log.debug({ breed: key }, 'unknown breed, using default profile');
    return this.defaultProfile;
  }

  has(name: string): boolean {
    return this.profiles.has(canonicalName(name));
  }

  get size(): number {
    return this.profiles.size;
  }

  /** Registered breed names, sorted. The default profile is not listed. */
  list(): string[] {
    return [...this.profiles.keys()].sort();
  }

  byCategory(category: BreedCategory): string[] {
    return [...this.profiles.values()]
      .filter((p) => p.category === category)
      .map((p) => p.name)
      .sort();
  }

  /** Names that contain the input, or are contained in it. */
  suggest(input: string): string[] {
    const needle = canonicalName(input);
    if (!needle) return [];
    return this.list().filter((name) => name.includes(needle) || needle.includes(name));
  }
}

// ==================== Builder ====================

export class ProfileRegistryBuilder {
  private readonly profiles = new Map<string, BreedProfile>();

  constructor(private readonly defaultProfile: BreedProfile) {}

  /** @throws DuplicateProfileError when the canonical name is taken (the default's included). */
  register(profile: BreedProfile): this {
    const frozen = freezeProfile(profile);
    if (this.profiles.has(frozen.name) || frozen.name === canonicalName(this.defaultProfile.name)) {
      throw new DuplicateProfileError(frozen.name);
    }
    this.profiles.set(frozen.name, frozen);
    return this;
  }

  build(logger?: Logger): ProfileRegistry {
    return new ProfileRegistry(new Map(this.profiles), freezeProfile(this.defaultProfile), logger);
  }
}

export function createProfileRegistry(profiles: Config['profiles'], logger?: Logger): ProfileRegistry {
  const builder = new ProfileRegistryBuilder(profiles.defaultProfile);
  for (const profile of profiles.breeds) builder.register(profile);
  return builder.build(logger);
}
