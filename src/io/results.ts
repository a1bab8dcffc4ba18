/**
 * Results Export
 *
 * Collects a finished context into a plain document for storage.
 */
import type { FeatureResults } from '../feature-extraction/types';
import { averagedRows } from '../recording/context';
import type { AveragedRow, RecordingContext, RecordingMetadata } from '../recording/types';

export interface ResultsDocument {
  sampleRateHz: number;
  metadata: RecordingMetadata;
  /** Averaged traces in tidy row form; empty before averaging */
  averaged: AveragedRow[];
  results: FeatureResults;
}

export function exportResults(context: RecordingContext): ResultsDocument {
  return {
    sampleRateHz: context.sampleRateHz,
    metadata: context.metadata,
    averaged: context.averaged === null ? [] : averagedRows(context.averaged),
    results: { ...context.results },
  };
}

/**
 * Serialize a context's results as JSON. Values that could not be measured
 * (NaN, ±Infinity) become null.
 */
export function serializeResults(context: RecordingContext, indent = 2): string {
  return JSON.stringify(
    exportResults(context),
    (_key, value: unknown) => (typeof value === 'number' && !Number.isFinite(value) ? null : value),
    indent
  );
}
