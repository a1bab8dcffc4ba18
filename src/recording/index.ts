/**
 * Recording Module
 */

export * from './types';
export {
  createRecordingContext,
  withSweeps,
  withAveraged,
  withMetadata,
  withResult,
  getResult,
  groupByIntensity,
  acquisitionTime,
  sortSweeps,
  toRawSamples,
  fromRawSamples,
  averagedRows,
} from './context';
