/**
 * Component Parameters
 *
 * Validation shared by transforms and features. Shape and range problems
 * become `invalidParameter`; an absent required value becomes
 * `missingParameter`.
 */
import { z } from 'zod';
import { AnalysisError, invalidParameter } from './errors';

/** Free-form parameter record as it arrives from configuration. */
export type ComponentParams = Readonly<Record<string, unknown>>;

/** Time window [start, end] in milliseconds. */
export type WindowMs = readonly [number, number];

export const windowMsSchema = z
  .tuple([z.number().finite(), z.number().finite()])
  .refine(([start, end]) => start <= end, { message: 'window start must not exceed window end' });

/**
 * Validate a parameter record against a component's schema.
 *
 * @throws AnalysisError (invalidParameter) listing each offending field
 */
export function parseParams<S extends z.ZodTypeAny>(
  component: string,
  schema: S,
  params: ComponentParams
): z.infer<S> {
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    throw invalidParameter(component, formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Read a parameter that has no default.
 *
 * @throws AnalysisError (missingParameter) when it is absent
 */
export function requireParam<T, K extends keyof T & string>(
  component: string,
  params: T,
  key: K
): NonNullable<T[K]> {
  const value = params[key];
  if (value === undefined || value === null) {
    throw new AnalysisError({ type: 'missingParameter', component, parameter: key });
  }
  return value;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
