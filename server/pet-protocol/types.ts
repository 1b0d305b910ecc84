export type Tracer = 'FDG' | 'PSMA';

export type SexCategory = 'male' | 'female' | 'pediatric';

export type AgeGroup = 'neonate' | 'infant' | 'toddler' | 'child' | 'adolescent';

export type ReconProfileName = 'EARL' | 'OSEM_TOF' | 'HD_PET';

export interface ReconProfile {
  gain: number;
  note: string;
}

export interface DeviceProfile {
  name: string;
  /** Axial field of view (mm) */
  axialFovMm: number;
  /** Literature system sensitivity (kcps/MBq) */
  sensitivityKcpsPerMbq: Readonly<Record<Tracer, number>>;
  halfLifeMin: Readonly<Record<Tracer, number>>;
  reconProfiles: Readonly<Record<ReconProfileName, ReconProfile>>;
  /** Gain used when a profile name is not one of reconProfiles */
  fallbackReconGain: number;
  velocityBoundsMmS: readonly [min: number, max: number];
  defaultSnrTarget: Readonly<Record<Tracer, number>>;
  defaultSnrRefSite: Readonly<Record<Tracer, number>>;
}

export interface PediatricTables {
  /** Weight that separates pediatric (below) from adult (at or above) patients */
  thresholdKg: number;
  /** Inclusive [min, max] weight ranges, checked in declaration order */
  weightRangesKg: Readonly<Record<AgeGroup, readonly [min: number, max: number]>>;
  doseFactors: Readonly<Record<AgeGroup, number>>;
  scanTimeLimitsS: Readonly<Record<AgeGroup, number>>;
  lbmFactors: Readonly<Record<AgeGroup, number>>;
  snrTargets: Readonly<Record<Tracer, number>>;
  /** Values used when the weight matches no age group */
  fallback: {
    doseFactor: number;
    scanTimeLimitS: number;
  };
}

/** Patient context the solvers need for the pediatric policy */
export interface SolverPatient {
  weightKg: number;
  isPediatric: boolean;
}

export interface ProtocolSolution {
  velocityMmS: number;
  /** Dwell per bed position, re-derived from the rounded velocity */
  dwellS: number;
  /** Dwell before velocity clamping and rounding */
  requestedDwellS: number;
  scanMinutes: number;
  snrPred: number;
  /** 1 / snrPred, null when the predicted SNR is not positive */
  covPred: number | null;
}

export interface StandardSolution extends ProtocolSolution {
  converged: boolean;
}

export interface LowDoseSolution extends ProtocolSolution {
  activityMbq: number;
  converged: boolean;
}

export type FastSolution = ProtocolSolution;

export type KProvenance =
  | { kind: 'fresh-calibration' }
  | { kind: 'site-median'; n: number };
