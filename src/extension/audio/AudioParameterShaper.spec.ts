import { describe, it, expect } from 'vitest';
import { AudioParameterShaper, resolveSpatialBias } from './AudioParameterShaper.js';
import { loadConfig, parseConfig } from '../../core/config.js';
import { bandsContaining } from './frequency-bands.js';
import { PhaseController } from '../phase/index.js';
import { createProfileRegistry, type BreedProfile } from '../profiles/index.js';
import { AGE_GROUPS, STRESS_LEVELS, type StressLevel, type StressMetrics } from '../../core/types.js';

const labrador: BreedProfile = {
  name: 'labrador',
  preferredFrequencies: [220, 440, 880],
  volumeSensitivity: 0.7,
  spatialPreference: 'surround',
  stressResponseFrequencies: [250, 500],
  colorPreference: 'blueDominant',
  motionSensitivity: 0.7,
  contrastPreference: 0.8,
  category: 'companion',
  energyLevel: 'high',
  preferredFrameRate: 25,
};

const bulldog: BreedProfile = {
  ...labrador,
  name: 'bulldog',
  preferredFrequencies: [150, 300, 600],
  volumeSensitivity: 0.9,
  spatialPreference: 'sideFocused',
  stressResponseFrequencies: [100, 200, 300],
};

const stress = (stressLevel: StressLevel): StressMetrics => ({ stressLevel, movementRate: 0 });

function snapshotAt(seconds: number, level: StressLevel) {
  return new PhaseController().tick(seconds, level);
}

const safety = parseConfig().safety;

describe('AudioParameterShaper', () => {
  const shaper = new AudioParameterShaper(safety);

  it('shapes a calm adult session in the initial phase', () => {
    const audio = shaper.shape(snapshotAt(0, 'low'), labrador, 'adult', stress('low'));

    expect(audio.audioBPM).toBe(60);
    expect(audio.volumeCeilingDb).toBe(47.4);
    expect(audio.frequencyBands.map((b) => b.gainDb)).toEqual([0, 1, 2, 3, 3, 2, 1, 0, -2, -4]);
    expect(audio.toneGenerators).toEqual([
      { frequencyHz: 220, amplitude: 0.5 },
      { frequencyHz: 440, amplitude: 0.5 },
      { frequencyHz: 880, amplitude: 0.5 },
    ]);
    expect(audio.spatialBias).toEqual({ x: 0, y: 0, z: 0 });
  });

  it('slows and quietens a stressed senior bulldog and boosts its response bands', () => {
    const audio = shaper.shape(snapshotAt(0, 'high'), bulldog, 'senior', stress('high'));

    expect(audio.audioBPM).toBe(49);
    expect(audio.volumeCeilingDb).toBe(35.04);
    expect(audio.frequencyBands[1].gainDb).toBe(4.7);
    expect(audio.frequencyBands[2].gainDb).toBe(5.4);
    expect(audio.frequencyBands[3].gainDb).toBe(2.1);
    expect(audio.toneGenerators[0].amplitude).toBe(0.36);
    expect(audio.spatialBias).toEqual({ x: 1, y: 0, z: 0 });
  });

  it('lowers BPM and volume as the session deepens', () => {
    const initial = shaper.shape(snapshotAt(0, 'low'), labrador, 'adult', stress('low'));
    const deepening = shaper.shape(snapshotAt(300, 'low'), labrador, 'adult', stress('low'));
    const maintenance = shaper.shape(snapshotAt(900, 'low'), labrador, 'adult', stress('low'));

    expect(deepening.audioBPM).toBe(55);
    expect(maintenance.audioBPM).toBe(50);
    expect(deepening.volumeCeilingDb).toBeLessThan(initial.volumeCeilingDb);
    expect(maintenance.volumeCeilingDb).toBeLessThan(deepening.volumeCeilingDb);
  });

  it('never raises BPM or volume as stress rises', () => {
    const levels: StressLevel[] = ['low', 'moderate', 'high'];
    const shaped = levels.map((l) => shaper.shape(snapshotAt(0, l), labrador, 'puppy', stress(l)));

    for (let i = 1; i < shaped.length; i++) {
      expect(shaped[i].audioBPM).toBeLessThanOrEqual(shaped[i - 1].audioBPM);
      expect(shaped[i].volumeCeilingDb).toBeLessThanOrEqual(shaped[i - 1].volumeCeilingDb);
    }
  });

  it('never lowers stress-response band gain as stress rises', async () => {
    const registry = createProfileRegistry((await loadConfig()).profiles);
    const profiles = [...registry.list().map((name) => registry.lookup(name)), registry.defaultProfile];
    let compared = 0;

    for (const profile of profiles) {
      const watched = [...bandsContaining(profile.stressResponseFrequencies)];
      expect(watched.length).toBeGreaterThan(0);

      for (const age of AGE_GROUPS) {
        for (const seconds of [0, 300, 900]) {
          const gains = STRESS_LEVELS.map((level) =>
            shaper.shape(snapshotAt(seconds, level), profile, age, stress(level)).frequencyBands,
          );
          for (const i of watched) {
            for (let s = 1; s < gains.length; s++) {
              expect(gains[s][i].gainDb).toBeGreaterThanOrEqual(gains[s - 1][i].gainDb);
              compared++;
            }
          }
        }
      }
    }

    expect(compared).toBeGreaterThan(0);
  });

  it('clamps to tighter configured ranges', () => {
    const tight = parseConfig({
      safety: { volumeCeilingDb: 30, bandGainDb: { min: -12, max: 5 } },
    }).safety;
    const audio = new AudioParameterShaper(tight).shape(snapshotAt(0, 'high'), bulldog, 'senior', stress('high'));

    expect(audio.volumeCeilingDb).toBe(30);
    expect(audio.frequencyBands[2].gainDb).toBe(5);
  });

  it('skips preferred frequencies outside the hearing range', () => {
    const odd: BreedProfile = { ...labrador, preferredFrequencies: [20, 440, 90_000] };
    const audio = shaper.shape(snapshotAt(0, 'low'), odd, 'adult', stress('low'));

    expect(audio.toneGenerators.map((t) => t.frequencyHz)).toEqual([440]);
  });
});

describe('resolveSpatialBias', () => {
  it('maps fixed preferences to unit directions', () => {
    expect(resolveSpatialBias('frontFocused')).toEqual({ x: 0, y: 0, z: 1 });
    expect(resolveSpatialBias('overhead')).toEqual({ x: 0, y: 1, z: 0 });
  });

  it('follows the subject for adaptive, clamped to the unit cube', () => {
    expect(resolveSpatialBias('adaptive', { x: 2, y: -0.5, z: 0 })).toEqual({ x: 1, y: -0.5, z: 0 });
  });

  it('centres adaptive when no location is known', () => {
    expect(resolveSpatialBias('adaptive')).toEqual({ x: 0, y: 0, z: 0 });
  });
});
