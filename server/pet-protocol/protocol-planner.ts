import type { ProtocolRequest } from '@shared/schema';
import { logger } from '../logger';
import type { KFactorStore, KSummary, StoreLoadResult, StoreWriteResult } from './k-factor-store';
import { tracerKey, type PetPhysicsModel } from './physics-model';
import { solveFast, solveLowDose, solveStandard } from './protocol-solvers';
import type {
  AgeGroup,
  FastSolution,
  KProvenance,
  LowDoseSolution,
  SexCategory,
  SolverPatient,
  StandardSolution,
  Tracer,
} from './types';

// Lower bounds out-of-range inputs are clamped to
export const INPUT_FLOORS = {
  weightKg: 0.5,
  heightCm: 30.0,
  injectedMbq: 1.0,
  scanRangeMm: 50.0,
  referenceDwellS: 1.0,
} as const;

export interface ProtocolPlan {
  tracer: Tracer;
  patient: {
    weightKg: number;
    heightCm: number;
    sex: SexCategory;
    bmi: number;
    lbmKg: number;
    isPediatric: boolean;
    ageGroup: AgeGroup | null;
  };
  activity: {
    injectedMbq: number;
    residualMbq: number;
    effectiveMbq: number;
    decayIntervalMin: number;
    halfLifeMin: number;
  };
  recon: {
    profile: string;
    gain: number;
  };
  calibration: {
    k: number;
    /** k calibrated from this request's reference scan, whatever k was used */
    freshK: number;
    provenance: KProvenance;
    provenanceLabel: string;
    siteSummary: KSummary | null;
    storeStatus: StoreLoadResult['status'] | null;
    tRefStandardS: number;
    tRefFastS: number;
    snrRefSite: number;
    snrTarget: number;
  };
  bmiMultiplier: number;
  protocols: {
    standard: StandardSolution;
    lowDose: LowDoseSolution;
    fast: FastSolution;
  };
  /** Present when the request asked to record the fresh k; 'skipped' leaves the file as it was */
  kRecord: StoreWriteResult | null;
}

export function describeProvenance(provenance: KProvenance): string {
  return provenance.kind === 'site-median' ? `site median (n=${provenance.n})` : 'fresh calibration';
}

export class ProtocolPlanner {
  constructor(
    private readonly model: PetPhysicsModel,
    private readonly store: KFactorStore,
  ) {}

  plan(request: ProtocolRequest): ProtocolPlan {
    const { model } = this;
    const tracer = tracerKey(request.tracerLabel);

    const weightKg = Math.max(request.patient.weightKg, INPUT_FLOORS.weightKg);
    const heightCm = Math.max(request.patient.heightCm, INPUT_FLOORS.heightCm);
    const injectedMbq = Math.max(request.acquisition.injectedMbq, INPUT_FLOORS.injectedMbq);
    const residualMbq = Math.max(request.acquisition.residualMbq, 0);
    const scanRangeMm = Math.max(request.acquisition.scanRangeMm, INPUT_FLOORS.scanRangeMm);
    const tRefStandardS = Math.max(request.referenceDwellS.standard[tracer], INPUT_FLOORS.referenceDwellS);
    const tRefFastS = Math.max(request.referenceDwellS.fast[tracer], INPUT_FLOORS.referenceDwellS);
    const referenceDosePerKg = Math.max(request.referenceDosePerKg[tracer], 0);
    const lowDoseMbqPerKg = Math.max(request.lowDoseMbqPerKg[tracer], 0);
    const snrRefSite = Math.max(request.snrRefSite ?? model.device.defaultSnrRefSite[tracer], 0);

    const { injectedAt, scanStartAt } = request.acquisition;
    const effectiveMbq = model.effectiveActivity(injectedMbq, injectedAt, scanStartAt, tracer, residualMbq);
    const decayIntervalMin = model.decayIntervalMinutes(injectedAt, scanStartAt);

    const reconProfile = request.recon.profile;
    const gain = model.reconGain(reconProfile, request.recon.customGain);

    const bmi = model.bmi(weightKg, heightCm);
    const bmiMultiplier = model.bmiMultiplier(bmi, tracer);
    const patient: SolverPatient = { weightKg, isPediatric: model.isPediatric(weightKg) };

    const freshK = model.calibrateK({
      tRefS: tRefStandardS,
      activityRefMbq: referenceDosePerKg * weightKg,
      reconGain: gain,
      snrRefSite,
      tracer,
    });

    let k = freshK;
    let provenance: KProvenance = { kind: 'fresh-calibration' };
    let siteSummary: KSummary | null = null;
    let storeStatus: StoreLoadResult['status'] | null = null;
    if (request.useSiteK) {
      const site = this.store.getSiteSummary(tracer, reconProfile);
      storeStatus = site.load.status;
      siteSummary = site.summary;
      if (siteSummary) {
        k = siteSummary.median;
        provenance = { kind: 'site-median', n: siteSummary.n };
      }
    }

    const snrTarget = request.applyPediatricSnrTarget && patient.isPediatric
      ? model.getPediatricSnrTarget(tracer, weightKg)
      : Math.max(request.snrTarget ?? model.device.defaultSnrTarget[tracer], 0);

    const context = { k, reconGain: gain, bmiMultiplier, scanRangeMm, tracer, patient };
    const standard = solveStandard(model, { ...context, effectiveActivityMbq: effectiveMbq, snrTarget });
    const lowDose = solveLowDose(model, { ...context, doseMbqPerKg: lowDoseMbqPerKg, snrTarget });
    const fast = solveFast(model, { ...context, effectiveActivityMbq: effectiveMbq, fastRefDwellS: tRefFastS });

    let kRecord: StoreWriteResult | null = null;
    if (request.recordK) {
      kRecord = this.store.recordMeasurement(tracer, reconProfile, freshK).persistence;
    }

    logger.debug(
      `${tracer} ${weightKg}kg k=${k.toExponential(4)} (${describeProvenance(provenance)}): ` +
        `std ${standard.velocityMmS} mm/s, low-dose ${lowDose.velocityMmS} mm/s, fast ${fast.velocityMmS} mm/s`,
      'planner',
    );

    return {
      tracer,
      patient: {
        weightKg,
        heightCm,
        sex: request.patient.sex,
        bmi,
        lbmKg: model.lbm(weightKg, heightCm, request.patient.sex),
        isPediatric: patient.isPediatric,
        ageGroup: patient.isPediatric ? model.getAgeGroup(weightKg) : null,
      },
      activity: {
        injectedMbq,
        residualMbq,
        effectiveMbq,
        decayIntervalMin,
        halfLifeMin: model.getHalfLife(tracer),
      },
      recon: { profile: reconProfile, gain },
      calibration: {
        k,
        freshK,
        provenance,
        provenanceLabel: describeProvenance(provenance),
        siteSummary,
        storeStatus,
        tRefStandardS,
        tRefFastS,
        snrRefSite,
        snrTarget,
      },
      bmiMultiplier,
      protocols: { standard, lowDose, fast },
      kRecord,
    };
  }
}
