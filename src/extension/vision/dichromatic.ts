/**
 * Dichromatic colour model
 *
 * Dogs see along two opponent channels, blue-violet and yellow-green. The
 * transform folds an RGB colour onto those two channels and applies a contrast
 * curve; renderers map the result back to display RGB.
 */

import { clamp, roundTo } from '../../core/safety.js';
import type { ColorPreference, DichromaticCoefficients } from '../../core/types.js';

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

export interface DichromaticColor {
  blue: number;
  yellow: number;
}

const PREFERENCE_GAIN = 1.1;
const HIGH_CONTRAST_BOOST = 0.2;

/** Nudge the base coefficients toward a breed's colour preference. */
export function coefficientsFor(
  preference: ColorPreference,
  base: DichromaticCoefficients,
): DichromaticCoefficients {
  switch (preference) {
    case 'blueDominant':
      return { ...base, blueWeight: clamp(roundTo(base.blueWeight * PREFERENCE_GAIN, 4), 0, 1) };
    case 'yellowDominant':
      return { ...base, yellowWeight: clamp(roundTo(base.yellowWeight * PREFERENCE_GAIN, 4), 0, 1) };
    case 'highContrast':
      return { ...base, contrastExponent: roundTo(base.contrastExponent + HIGH_CONTRAST_BOOST, 4) };
    case 'balanced':
      return { ...base };
  }
}

/** Components of `rgb` are expected in [0, 1]; values outside are clamped. */
export function dichromaticTransform(rgb: Rgb, c: DichromaticCoefficients): DichromaticColor {
  const r = clamp(rgb.r, 0, 1);
  const g = clamp(rgb.g, 0, 1);
  const b = clamp(rgb.b, 0, 1);

  const blue = clamp(b * c.blueWeight, 0, 1);
  const yellow = clamp((r * c.redWeight + g * c.greenWeight) * c.yellowWeight, 0, 1);

  return {
    blue: blue ** c.contrastExponent,
    yellow: yellow ** c.contrastExponent,
  };
}

/** Yellow drives red and green, blue drives blue. */
export function toDisplayRgb(color: DichromaticColor): Rgb {
  return { r: color.yellow, g: color.yellow, b: color.blue };
}

/**
 * Apply the transform to an RGBA byte buffer. Alpha is copied unchanged.
 * @throws RangeError when the length is not a multiple of 4
 */
export function transformPixels(
  pixels: Uint8Array | Uint8ClampedArray,
  c: DichromaticCoefficients,
): Uint8ClampedArray {
  if (pixels.length % 4 !== 0) {
    throw new RangeError(`RGBA buffer length ${pixels.length} is not a multiple of 4`);
  }

  const out = new Uint8ClampedArray(pixels.length);
  for (let i = 0; i < pixels.length; i += 4) {
    const display = toDisplayRgb(
      dichromaticTransform({ r: pixels[i] / 255, g: pixels[i + 1] / 255, b: pixels[i + 2] / 255 }, c),
    );
    out[i] = Math.round(display.r * 255);
    out[i + 1] = Math.round(display.g * 255);
    out[i + 2] = Math.round(display.b * 255);
    out[i + 3] = pixels[i + 3];
  }
  return out;
}
