/**
 * Protocol Solvers
 *
 * Each solver picks a dwell time per bed position, converts it to a bed
 * velocity, clamps the velocity to the device bounds, rounds it to 0.1 mm/s
 * and re-derives the dwell from the rounded velocity. Reported SNR/COV are
 * computed from that re-derived dwell so velocity and dwell always agree.
 *
 * - Standard: dwell from inverting the SNR model at the case target
 * - Low-dose: same inversion at a literature dose-per-kg activity
 * - Fast: literature reference dwell; SNR is a prediction only
 */

import type { PetPhysicsModel } from './physics-model';
import type { FastSolution, LowDoseSolution, ProtocolSolution, SolverPatient, StandardSolution, Tracer } from './types';

export const STANDARD_SNR_TOLERANCE = 0.3;

const ACTIVITY_EPSILON = 1e-6;
const DWELL_EPSILON = 1e-6;
const K_EPSILON = 1e-9;

interface SolverContext {
  k: number;
  reconGain: number;
  bmiMultiplier: number;
  scanRangeMm: number;
  tracer: Tracer;
  patient: SolverPatient;
}

export interface StandardParams extends SolverContext {
  effectiveActivityMbq: number;
  snrTarget: number;
}

export interface LowDoseParams extends SolverContext {
  /** Literature low-dose activity per kg (MBq/kg) */
  doseMbqPerKg: number;
  snrTarget: number;
}

export interface FastParams extends SolverContext {
  effectiveActivityMbq: number;
  /** Literature fast reference dwell per bed position (s) */
  fastRefDwellS: number;
}

export function roundVelocity(velocity: number): number {
  return Math.round(velocity * 10) / 10;
}

/** Dwell that reaches the target SNR at the given activity, before the BMI penalty */
function requiredDwell(model: PetPhysicsModel, activityMbq: number, snrTarget: number, k: number, reconGain: number, tracer: Tracer): number {
  const necRequired = (snrTarget / (Math.max(k, K_EPSILON) * reconGain)) ** 2;
  return necRequired / Math.max(activityMbq * model.getSystemSensitivity(tracer), ACTIVITY_EPSILON);
}

function finalize(model: PetPhysicsModel, requestedDwellS: number, activityMbq: number, ctx: SolverContext): ProtocolSolution {
  const { axialFovMm, velocityBoundsMmS } = model.device;
  const [vMin, vMax] = velocityBoundsMmS;

  const rawVelocity = axialFovMm / Math.max(requestedDwellS, DWELL_EPSILON);
  const velocityMmS = roundVelocity(Math.max(vMin, Math.min(rawVelocity, vMax)));
  const dwellS = axialFovMm / velocityMmS;

  const nec = model.calculateNec(activityMbq, dwellS, ctx.tracer);
  const snrPred = ctx.k * model.calculateSnrFromNec(nec, ctx.reconGain);

  return {
    velocityMmS,
    dwellS,
    requestedDwellS,
    scanMinutes: ctx.scanRangeMm / velocityMmS / 60.0,
    snrPred,
    covPred: snrPred > 0 ? 1.0 / snrPred : null,
  };
}

export function solveStandard(model: PetPhysicsModel, params: StandardParams): StandardSolution {
  const { effectiveActivityMbq, snrTarget, k, reconGain, tracer, bmiMultiplier, patient } = params;

  let dwell = requiredDwell(model, effectiveActivityMbq, snrTarget, k, reconGain, tracer) * bmiMultiplier;
  if (patient.isPediatric) {
    dwell = Math.min(dwell, model.getPediatricScanTimeLimit(patient.weightKg));
  }

  const solution = finalize(model, dwell, effectiveActivityMbq, params);
  return {
    ...solution,
    converged: Math.abs(solution.snrPred - snrTarget) <= STANDARD_SNR_TOLERANCE,
  };
}

export function solveLowDose(model: PetPhysicsModel, params: LowDoseParams): LowDoseSolution {
  const { doseMbqPerKg, snrTarget, k, reconGain, tracer, bmiMultiplier, patient } = params;

  const activityMbq = patient.isPediatric
    ? doseMbqPerKg * patient.weightKg * model.getPediatricDoseFactor(patient.weightKg)
    : doseMbqPerKg * patient.weightKg;

  let dwell = requiredDwell(model, activityMbq, snrTarget, k, reconGain, tracer) * bmiMultiplier;
  if (patient.isPediatric) {
    dwell = Math.min(dwell, model.getPediatricScanTimeLimit(patient.weightKg));
  }

  const solution = finalize(model, dwell, activityMbq, params);
  const [vMin] = model.device.velocityBoundsMmS;
  return {
    ...solution,
    activityMbq,
    // Converged unless the velocity saturated at the lower bound
    converged: solution.velocityMmS > vMin + 1e-6,
  };
}

export function solveFast(model: PetPhysicsModel, params: FastParams): FastSolution {
  const { effectiveActivityMbq, fastRefDwellS, bmiMultiplier, patient } = params;

  let dwell = fastRefDwellS * bmiMultiplier;
  if (patient.isPediatric) {
    dwell *= model.getPediatricFastReduction(patient.weightKg);
    dwell = Math.min(dwell, model.getPediatricScanTimeLimit(patient.weightKg) * 0.5);
  }

  return finalize(model, dwell, effectiveActivityMbq, params);
}
