import { BehaviorDimension, BehaviorVector, DimensionRange, PatienceLevel } from '../types';
import { clamp } from '../utils/text';

export const BEHAVIOR_DIMENSIONS: readonly BehaviorDimension[] = [
  'patience',
  'formality',
  'enthusiasm',
  'humor',
  'expertiseConfidence',
  'verbosity'
];

export const DIMENSION_RANGES: Record<BehaviorDimension, DimensionRange> = {
  patience: { min: 0, max: 1 },
  formality: { min: 0, max: 1 },
  enthusiasm: { min: 0, max: 1 },
  humor: { min: 0, max: 1 },
  expertiseConfidence: { min: 0, max: 1 },
  verbosity: { min: 0, max: 1 }
};

export const PATIENCE_SCALE: Record<PatienceLevel, number> = {
  low: 0.25,
  moderate: 0.5,
  high: 0.75,
  'very-high': 1.0
};

export function zeroVector(): BehaviorVector {
  return { patience: 0, formality: 0, enthusiasm: 0, humor: 0, expertiseConfidence: 0, verbosity: 0 };
}

export function isZeroVector(vector: BehaviorVector): boolean {
  return BEHAVIOR_DIMENSIONS.every(dimension => vector[dimension] === 0);
}

export function clampToRange(dimension: BehaviorDimension, value: number): number {
  const range = DIMENSION_RANGES[dimension];
  return clamp(value, range.min, range.max);
}

export function effectiveVector(baseline: BehaviorVector, delta: BehaviorVector): BehaviorVector {
  const result = zeroVector();
  for (const dimension of BEHAVIOR_DIMENSIONS) {
    result[dimension] = clampToRange(dimension, baseline[dimension] + delta[dimension]);
  }
  return result;
}

// Lists every dimension that is missing, non-finite or outside its declared range
export function vectorIssues(vector: Partial<Record<BehaviorDimension, unknown>>, label: string): string[] {
  const issues: string[] = [];
  for (const dimension of BEHAVIOR_DIMENSIONS) {
    const value = vector[dimension];
    const range = DIMENSION_RANGES[dimension];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      issues.push(`${label}.${dimension} must be a finite number`);
    } else if (value < range.min || value > range.max) {
      issues.push(`${label}.${dimension}=${value} is outside [${range.min}, ${range.max}]`);
    }
  }
  return issues;
}

export function patienceLabel(value: number): PatienceLevel {
  if (value >= 0.875) return 'very-high';
  if (value >= 0.625) return 'high';
  if (value >= 0.375) return 'moderate';
  return 'low';
}
