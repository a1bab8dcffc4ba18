/**
 * Analysis Pipeline
 *
 * Runs configured transforms, averaging and features over recordings.
 */
import { AnalysisError, getFailureDescription, isAnalysisError } from '../errors';
import { buildFeature } from '../feature-extraction/registry';
import type { Feature, FeatureName } from '../feature-extraction/types';
import { buildRecordingContext, type AcquiredSweep } from '../io/loader';
import { withAveraged, withMetadata, withResult } from '../recording/context';
import type { RecordingContext, RecordingMetadata } from '../recording/types';
import { averageSweeps } from '../transforms/average';
import { buildTransform } from '../transforms/registry';
import type { PipelineConfig } from './config';

/**
 * A feature that was skipped because an earlier result it needs is missing.
 */
export interface SkippedFeature {
  name: FeatureName;
  reason: string;
}

/**
 * One recording as it comes off the amplifier.
 */
export interface AcquiredRecording {
  sweeps: AcquiredSweep[];
  sampleRateHz: number;
  metadata?: RecordingMetadata;
}

function runFeature<K extends FeatureName>(context: RecordingContext, feature: Feature<K>): RecordingContext {
  return withResult(context, feature.name, feature.compute(context));
}

/**
 * Run the configured analysis on one recording.
 *
 * Every step is built before any runs, so unknown names and bad parameters
 * fail before work starts. Transforms run in order; the sweeps are averaged
 * afterwards unless a transform already did. Features then run in order, each
 * seeing the results of the ones before it. A feature whose dependency is
 * missing is logged, skipped and listed under `skippedFeatures` in the
 * metadata; any other error aborts the run.
 *
 * The resolved configuration is recorded under `pipelineConfig`.
 */
export function runContext(context: RecordingContext, config: PipelineConfig): RecordingContext {
  const transforms = config.transforms.map(buildTransform);
  const features = config.features.map((feature) => buildFeature(feature, config.smoothing));

  let current = context;
  for (const transform of transforms) {
    current = transform.apply(current);
  }

  if (current.averaged === null) {
    current = withAveraged(current, averageSweeps(current.sweeps));
  }

  const skipped: SkippedFeature[] = [];
  for (const feature of features) {
    try {
      current = runFeature(current, feature);
    } catch (error) {
      if (!isAnalysisError(error, 'missingDependency')) throw error;
      const reason = getFailureDescription(error.reason);
      console.warn(`Skipping feature '${feature.name}': ${reason}`);
      skipped.push({ name: feature.name, reason });
    }
  }

  return withMetadata(current, {
    pipelineConfig: {
      transforms: config.transforms,
      features: features.map((feature, i) => ({ ...config.features[i], smoothing: feature.smoothing })),
      smoothing: config.smoothing,
    },
    ...(skipped.length > 0 ? { skippedFeatures: skipped } : {}),
  });
}

/**
 * Load and analyze several recordings with one configuration.
 *
 * @throws AnalysisError (missingParameter) when the configuration has no
 *   `acquisition` section to map sweeps onto intensities
 */
export function runRecordings(
  recordings: readonly AcquiredRecording[],
  config: PipelineConfig
): RecordingContext[] {
  const { acquisition } = config;
  if (acquisition === undefined) {
    throw new AnalysisError({ type: 'missingParameter', component: 'pipeline config', parameter: 'acquisition' });
  }

  return recordings.map((recording) =>
    runContext(
      buildRecordingContext({
        sweeps: recording.sweeps,
        sampleRateHz: recording.sampleRateHz,
        stimIntensities: acquisition.stimIntensities,
        repetitions: acquisition.repetitions,
        metadata: recording.metadata,
      }),
      config
    )
  );
}
