/**
 * I/O Module
 */

export { buildRecordingContext, type AcquiredSweep, type LoadOptions } from './loader';
export { exportResults, serializeResults, type ResultsDocument } from './results';
