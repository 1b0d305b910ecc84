import type { AgeGroup, PediatricTables, Tracer } from './types';

export const AGE_GROUPS: readonly AgeGroup[] = ['neonate', 'infant', 'toddler', 'child', 'adolescent'];

export const PEDIATRIC_TABLES: PediatricTables = Object.freeze({
  thresholdKg: 35.0,
  weightRangesKg: Object.freeze({
    neonate: [0.5, 5.0] as const,
    infant: [5.0, 15.0] as const,
    toddler: [15.0, 25.0] as const,
    child: [25.0, 50.0] as const,
    adolescent: [50.0, 100.0] as const,
  }),
  doseFactors: Object.freeze({ neonate: 0.02, infant: 0.05, toddler: 0.10, child: 0.15, adolescent: 0.75 }),
  scanTimeLimitsS: Object.freeze({ neonate: 30.0, infant: 60.0, toddler: 120.0, child: 180.0, adolescent: 240.0 }),
  lbmFactors: Object.freeze({ neonate: 0.85, infant: 0.80, toddler: 0.75, child: 0.70, adolescent: 0.65 }),
  snrTargets: Object.freeze({ FDG: 8.0, PSMA: 10.0 }),
  fallback: Object.freeze({ doseFactor: 1.0, scanTimeLimitS: 180.0 }),
});

// Dose factor of the 'child' group; the pediatric SNR and fast-dwell scaling are relative to it
const REFERENCE_DOSE_FACTOR = 0.15;

export function isPediatric(tables: PediatricTables, weightKg: number): boolean {
  return weightKg < tables.thresholdKg;
}

/** First age group whose inclusive weight range contains the weight, or null */
export function getAgeGroup(tables: PediatricTables, weightKg: number): AgeGroup | null {
  for (const group of AGE_GROUPS) {
    const [min, max] = tables.weightRangesKg[group];
    if (weightKg >= min && weightKg <= max) return group;
  }
  return null;
}

export function getDoseFactor(tables: PediatricTables, weightKg: number): number {
  const group = getAgeGroup(tables, weightKg);
  return group ? tables.doseFactors[group] : tables.fallback.doseFactor;
}

export function getScanTimeLimit(tables: PediatricTables, weightKg: number): number {
  const group = getAgeGroup(tables, weightKg);
  return group ? tables.scanTimeLimitsS[group] : tables.fallback.scanTimeLimitS;
}

/**
 * LBM fraction for a pediatric weight. Weights outside every age group use
 * tiers: below 10 kg 0.85, below 30 kg 0.80, otherwise 0.75.
 */
export function getLbmFactor(tables: PediatricTables, weightKg: number): number {
  const group = getAgeGroup(tables, weightKg);
  if (group) return tables.lbmFactors[group];
  if (weightKg < 10) return 0.85;
  if (weightKg < 30) return 0.80;
  return 0.75;
}

/** Age-adjusted SNR target, clamped to [5, 12] */
export function getSnrTarget(tables: PediatricTables, tracer: Tracer, weightKg: number): number {
  const base = tables.snrTargets[tracer];
  const adjusted = base * (0.8 + 0.4 * (getDoseFactor(tables, weightKg) / REFERENCE_DOSE_FACTOR));
  return Math.max(5.0, Math.min(12.0, adjusted));
}

/** Dwell scaling applied to the fast protocol for pediatric patients */
export function getFastReductionFactor(tables: PediatricTables, weightKg: number): number {
  return 0.5 + 0.3 * (getDoseFactor(tables, weightKg) / REFERENCE_DOSE_FACTOR);
}
