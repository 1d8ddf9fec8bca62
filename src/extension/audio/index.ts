export { AudioParameterShaper, resolveSpatialBias } from './AudioParameterShaper.js';
export {
  BAND_COUNT,
  FREQUENCY_BANDS,
  PHASE_BAND_GAINS,
  bandIndexFor,
  bandsContaining,
} from './frequency-bands.js';
export type { BandEdge } from './frequency-bands.js';
