/**
 * PET Physics Model
 *
 * Decay correction, body-composition normalization and the NEC-based SNR model
 * behind the protocol solvers.
 *
 *   NEC = A × t × S(tracer)
 *   SNR = k × √NEC × gain
 *
 * k is the site calibration constant measured from a reference scan.
 */

import { differenceInMilliseconds } from 'date-fns';
import { VISION_450, resolveReconGain } from './device-profile';
import {
  PEDIATRIC_TABLES,
  getAgeGroup,
  getDoseFactor,
  getFastReductionFactor,
  getLbmFactor,
  getScanTimeLimit,
  getSnrTarget,
  isPediatric,
} from './pediatric';
import type { AgeGroup, DeviceProfile, PediatricTables, SexCategory, Tracer } from './types';

export const NEC_EPSILON = 1e-9;

export const BMI_REFERENCE = 22.0;
export const BMI_CAP = 40.0;

const ADULT_LBM_FLOOR_KG = 30.0;

/** Case-insensitive: any label containing "PSMA" is PSMA, everything else FDG */
export function tracerKey(label: string): Tracer {
  return String(label).toUpperCase().includes('PSMA') ? 'PSMA' : 'FDG';
}

export interface CalibrationReference {
  /** Reference standard dwell per bed position (s) */
  tRefS: number;
  /** Reference activity (MBq) */
  activityRefMbq: number;
  reconGain: number;
  /** SNR the site observes on the reference scan */
  snrRefSite: number;
  tracer: Tracer;
}

export class PetPhysicsModel {
  constructor(
    readonly device: DeviceProfile = VISION_450,
    readonly pediatric: PediatricTables = PEDIATRIC_TABLES,
  ) {}

  /** System sensitivity in cps/MBq */
  getSystemSensitivity(tracer: Tracer): number {
    return this.device.sensitivityKcpsPerMbq[tracer] * 1000;
  }

  getHalfLife(tracer: Tracer): number {
    return this.device.halfLifeMin[tracer];
  }

  reconGain(profile: string, customGain?: number | null): number {
    return resolveReconGain(this.device, profile, customGain);
  }

  /** Minutes from injection to scan start; a scan start before injection counts as zero */
  decayIntervalMinutes(injectedAt: Date, scanStart: Date): number {
    return Math.max(differenceInMilliseconds(scanStart, injectedAt) / 60000, 0);
  }

  /** Injected activity minus residual, decay-corrected to scan start */
  effectiveActivity(injectedMbq: number, injectedAt: Date, scanStart: Date, tracer: Tracer, residualMbq = 0): number {
    const lambda = Math.LN2 / this.getHalfLife(tracer);
    const dtMin = this.decayIntervalMinutes(injectedAt, scanStart);
    const a0 = Math.max(injectedMbq - residualMbq, 0);
    return a0 * Math.exp(-lambda * dtMin);
  }

  isPediatric(weightKg: number): boolean {
    return isPediatric(this.pediatric, weightKg);
  }

  getAgeGroup(weightKg: number): AgeGroup | null {
    return getAgeGroup(this.pediatric, weightKg);
  }

  getPediatricDoseFactor(weightKg: number): number {
    return getDoseFactor(this.pediatric, weightKg);
  }

  getPediatricScanTimeLimit(weightKg: number): number {
    return getScanTimeLimit(this.pediatric, weightKg);
  }

  getPediatricSnrTarget(tracer: Tracer, weightKg: number): number {
    return getSnrTarget(this.pediatric, tracer, weightKg);
  }

  getPediatricFastReduction(weightKg: number): number {
    return getFastReductionFactor(this.pediatric, weightKg);
  }

  /**
   * Lean body mass (kg).
   * Pediatric weights use the age-group factor; adults use the Boer-style
   * formula (male vs. other), floored at 30 kg.
   */
  lbm(weightKg: number, heightCm: number, sex: SexCategory): number {
    if (this.isPediatric(weightKg)) {
      return weightKg * getLbmFactor(this.pediatric, weightKg);
    }
    const ratio = weightKg / heightCm;
    const lbm = sex === 'male'
      ? 1.10 * weightKg - 128 * ratio ** 2
      : 1.07 * weightKg - 148 * ratio ** 2;
    return Math.max(lbm, ADULT_LBM_FLOOR_KG);
  }

  bmi(weightKg: number, heightCm: number): number {
    const heightM = heightCm / 100;
    return weightKg / (heightM * heightM);
  }

  /**
   * Dwell penalty for BMI above the reference: (BMI / ref)^exp with
   * exp 0.6 for FDG and 0.4 for PSMA. BMI is capped first.
   */
  bmiMultiplier(bmi: number, tracer: Tracer, bmiRef = BMI_REFERENCE, bmiCap = BMI_CAP): number {
    const exponent = tracer === 'FDG' ? 0.6 : 0.4;
    const effective = Math.min(bmi, bmiCap);
    return effective <= bmiRef ? 1.0 : (effective / bmiRef) ** exponent;
  }

  calculateNec(activityMbq: number, dwellS: number, tracer: Tracer): number {
    return activityMbq * dwellS * this.getSystemSensitivity(tracer);
  }

  /** √NEC × gain, without k */
  calculateSnrFromNec(nec: number, reconGain = 1.0): number {
    return Math.sqrt(Math.max(nec, NEC_EPSILON)) * reconGain;
  }

  /** k = SNR_ref / (√NEC_ref × gain), floored at NEC_EPSILON */
  calibrateK({ tRefS, activityRefMbq, reconGain, snrRefSite, tracer }: CalibrationReference): number {
    const necRef = this.calculateNec(activityRefMbq, tRefS, tracer);
    const k = snrRefSite / (Math.sqrt(Math.max(necRef, NEC_EPSILON)) * reconGain);
    return Math.max(k, NEC_EPSILON);
  }
}
