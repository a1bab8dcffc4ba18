/**
 * Feature Extraction Module
 *
 * Fiber volley, fEPSP and population spike measurements per stimulus
 * intensity.
 */

// Types
export * from './types';

// Fiber Volley
export { computeFiberVolley, createFiberVolleyFeature, parseFiberVolleyParams } from './fiber-volley';

// fEPSP
export { computeEpsp, createEpspFeature, parseEpspParams, DEFAULT_FIT_DISTANCE } from './epsp';

// Population Spike
export {
  computePopSpike,
  createPopSpikeFeature,
  findSpikeApex,
  parsePopSpikeParams,
} from './pop-spike';

// Shared
export { smoothedTraces, type SmoothedTrace } from './traces';

// Registry
export { buildFeature, isFeatureName, FEATURE_NAMES } from './registry';
