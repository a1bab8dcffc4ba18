/**
 * Signal Processing Types
 *
 * Type definitions for filter configuration and numeric results.
 */

// ============================================================================
// SMOOTHING CONFIGURATION
// ============================================================================

export type SmoothingMethod = 'none' | 'moving_average' | 'savgol' | 'butterworth_lowpass';

/**
 * Smoothing applied to a 1-D trace before feature detection.
 */
export type SmoothingSpec =
  | { method: 'none' }
  | {
      method: 'moving_average';
      /** Number of samples averaged around each point. */
      windowSize: number;
    }
  | {
      method: 'savgol';
      /** Window length in samples. Even values are bumped to the next odd. */
      windowSize: number;
      /** Polynomial order, must be below the window length. */
      polyOrder: number;
    }
  | {
      method: 'butterworth_lowpass';
      /** Cutoff frequency (Hz). */
      cutoffHz: number;
      /** Filter order. */
      order: number;
    };

export const NO_SMOOTHING: SmoothingSpec = { method: 'none' };

/**
 * Pipeline-wide default used when a feature does not bring its own smoothing.
 */
export const DEFAULT_SMOOTHING: SmoothingSpec = {
  method: 'savgol',
  windowSize: 21,
  polyOrder: 3,
};

// ============================================================================
// FILTER TYPES
// ============================================================================

/**
 * IIR filter coefficients.
 */
export interface FilterCoefficients {
  /** Numerator (feedforward) coefficients */
  b: number[];
  /** Denominator (feedback) coefficients, a[0] normalized to 1 */
  a: number[];
}

// ============================================================================
// DETECTION AND FIT RESULTS
// ============================================================================

/**
 * Local maxima found by peak detection.
 */
export interface PeakResult {
  /** Peak indices in ascending order */
  indices: number[];
  /** Prominence of each peak, aligned with `indices` */
  prominences: number[];
}

export interface PeakOptions {
  /** Minimum prominence a peak needs to be reported. */
  prominence?: number;
}

/**
 * Least-squares straight line.
 */
export interface LinearFitResult {
  slope: number;
  intercept: number;
  /** Coefficient of determination, NaN when y has no variance */
  rSquared: number;
}
