export { ColorTransformShaper } from './ColorTransformShaper.js';
export { coefficientsFor, dichromaticTransform, toDisplayRgb, transformPixels } from './dichromatic.js';
export type { Rgb, DichromaticColor } from './dichromatic.js';
