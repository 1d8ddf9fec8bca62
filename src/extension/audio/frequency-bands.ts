/**
 * Fixed 10-band table spanning canine hearing (40 Hz – 65 kHz).
 *
 * Octave bands from 40 Hz; the last band stretches to the top of the range.
 * Band i covers [loHz, hiHz).
 */

import { HEARING_RANGE_HZ } from '../../core/config.js';
import type { PhaseKind } from '../../core/types.js';

export interface BandEdge {
  readonly loHz: number;
  readonly hiHz: number;
  readonly centerHz: number;
  readonly bandwidthHz: number;
}

const EDGES: ReadonlyArray<readonly [number, number]> = [
  [40, 80],
  [80, 160],
  [160, 320],
  [320, 640],
  [640, 1280],
  [1280, 2560],
  [2560, 5120],
  [5120, 10240],
  [10240, 20480],
  [20480, HEARING_RANGE_HZ.max],
];

export const BAND_COUNT = EDGES.length;

export const FREQUENCY_BANDS: readonly BandEdge[] = Object.freeze(
  EDGES.map(([loHz, hiHz]) =>
    Object.freeze({
      loHz,
      hiHz,
      centerHz: Math.round(Math.sqrt(loHz * hiHz)),
      bandwidthHz: hiHz - loHz,
    }),
  ),
);

/**
 * Base gain (dB) per band and phase, before intensity scaling.
 * Initial is brighter; later phases roll off the highs and lean on the lows.
 */
export const PHASE_BAND_GAINS: Readonly<Record<PhaseKind, readonly number[]>> = Object.freeze({
  initial: Object.freeze([0, 1, 2, 3, 3, 2, 1, 0, -2, -4]),
  deepening: Object.freeze([1, 2, 2, 1, 0, -1, -2, -4, -6, -8]),
  maintenance: Object.freeze([2, 2, 1, 0, -1, -3, -5, -7, -9, -12]),
});

/** Index of the band containing `hz`, or -1 outside the hearing range. */
export function bandIndexFor(hz: number): number {
  if (hz === HEARING_RANGE_HZ.max) return BAND_COUNT - 1;
  return FREQUENCY_BANDS.findIndex((b) => hz >= b.loHz && hz < b.hiHz);
}

/** Band indices that contain at least one of the given frequencies. */
export function bandsContaining(frequencies: readonly number[]): Set<number> {
  const hit = new Set<number>();
  for (const hz of frequencies) {
    const idx = bandIndexFor(hz);
    if (idx !== -1) hit.add(idx);
  }
  return hit;
}
