/**
 * Field Potential Analysis
 *
 * Sweep transforms, averaging and fiber volley / fEPSP / population spike
 * extraction for extracellular field recordings.
 */

export * from './errors';
export * from './params';
export * from './recording';
export * from './signal-processing';
export * from './transforms';
export * from './feature-extraction';
export * from './pipeline';
export * from './io';
