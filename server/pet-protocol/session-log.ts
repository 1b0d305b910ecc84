import { nanoid } from 'nanoid';
import type { ProtocolPlan } from './protocol-planner';

export interface SessionLogEntry {
  id: string;
  timestamp: string;
  tracer: string;
  weightKg: number;
  heightCm: number;
  sex: string;
  effectiveMbq: number;
  reconProfile: string;
  reconGain: number;
  k: number;
  kSource: string;
  stdVelocityMmS: number;
  stdDwellS: number;
  stdMinutes: number;
  stdSnr: number;
  lowDoseActivityMbq: number;
  lowDoseVelocityMmS: number;
  lowDoseMinutes: number;
  lowDoseSnr: number;
  fastVelocityMmS: number;
  fastMinutes: number;
  fastSnr: number;
}

const COLUMNS: readonly (keyof SessionLogEntry)[] = [
  'id', 'timestamp', 'tracer', 'weightKg', 'heightCm', 'sex', 'effectiveMbq',
  'reconProfile', 'reconGain', 'k', 'kSource',
  'stdVelocityMmS', 'stdDwellS', 'stdMinutes', 'stdSnr',
  'lowDoseActivityMbq', 'lowDoseVelocityMmS', 'lowDoseMinutes', 'lowDoseSnr',
  'fastVelocityMmS', 'fastMinutes', 'fastSnr',
];

function csvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Runs planned during this process. Nothing is persisted; export with toCsv().
 */
export class SessionLog {
  private readonly entries: SessionLogEntry[] = [];

  record(plan: ProtocolPlan, now: Date = new Date()): SessionLogEntry {
    const { standard, lowDose, fast } = plan.protocols;
    const entry: SessionLogEntry = {
      id: nanoid(10),
      timestamp: now.toISOString(),
      tracer: plan.tracer,
      weightKg: plan.patient.weightKg,
      heightCm: plan.patient.heightCm,
      sex: plan.patient.sex,
      effectiveMbq: plan.activity.effectiveMbq,
      reconProfile: plan.recon.profile,
      reconGain: plan.recon.gain,
      k: plan.calibration.k,
      kSource: plan.calibration.provenanceLabel,
      stdVelocityMmS: standard.velocityMmS,
      stdDwellS: standard.dwellS,
      stdMinutes: standard.scanMinutes,
      stdSnr: standard.snrPred,
      lowDoseActivityMbq: lowDose.activityMbq,
      lowDoseVelocityMmS: lowDose.velocityMmS,
      lowDoseMinutes: lowDose.scanMinutes,
      lowDoseSnr: lowDose.snrPred,
      fastVelocityMmS: fast.velocityMmS,
      fastMinutes: fast.scanMinutes,
      fastSnr: fast.snrPred,
    };
    this.entries.push(entry);
    return entry;
  }

  list(): readonly SessionLogEntry[] {
    return this.entries;
  }

  clear(): void {
    this.entries.length = 0;
  }

  toCsv(): string {
    const lines = [COLUMNS.join(',')];
    for (const entry of this.entries) {
      lines.push(COLUMNS.map((column) => csvField(entry[column])).join(','));
    }
    return lines.join('\n') + '\n';
  }
}
