/**
 * PET Physics Model Tests
 *
 * Tests for:
 * - Tracer resolution and reconstruction gain lookup
 * - Decay-corrected effective activity
 * - Lean body mass and BMI multiplier
 * - NEC / SNR model and k calibration
 */

import { PetPhysicsModel, NEC_EPSILON, tracerKey } from '../pet-protocol/physics-model';

const model = new PetPhysicsModel();

const at = (minutes: number) => new Date(Date.UTC(2026, 2, 2, 8, 0) + minutes * 60000);

describe('Tracer resolution', () => {
  it('should resolve any label containing PSMA, in any case', () => {
    expect(tracerKey('f-18 psma-1007')).toBe('PSMA');
    expect(tracerKey('F-18 PSMA-1007')).toBe('PSMA');
    expect(tracerKey('Psma')).toBe('PSMA');
  });

  it('should fall back to FDG for everything else', () => {
    expect(tracerKey('FDG')).toBe('FDG');
    expect(tracerKey('unknown')).toBe('FDG');
    expect(tracerKey('')).toBe('FDG');
  });
});

describe('Device lookups', () => {
  it('should convert sensitivity from kcps/MBq to cps/MBq', () => {
    expect(model.getSystemSensitivity('FDG')).toBeCloseTo(9100, 9);
    expect(model.getSystemSensitivity('PSMA')).toBeCloseTo(9100, 9);
  });

  it('should use the F-18 half-life for both tracers', () => {
    expect(model.getHalfLife('FDG')).toBe(109.77);
    expect(model.getHalfLife('PSMA')).toBe(109.77);
  });

  it('should resolve reconstruction gains by profile name', () => {
    expect(model.reconGain('EARL')).toBe(1.0);
    expect(model.reconGain('OSEM_TOF')).toBe(1.25);
    expect(model.reconGain('HD_PET')).toBe(1.6);
  });

  it('should fall back to 1.6 for unknown profiles', () => {
    expect(model.reconGain('MYSTERY_RECON')).toBe(1.6);
  });

  it('should prefer a positive custom gain', () => {
    expect(model.reconGain('EARL', 2.0)).toBe(2.0);
    expect(model.reconGain('EARL', 0)).toBe(1.0);
    expect(model.reconGain('EARL', -1)).toBe(1.0);
    expect(model.reconGain('EARL', null)).toBe(1.0);
  });
});

describe('Effective activity', () => {
  it('should equal injected minus residual when the scan starts at injection', () => {
    expect(model.effectiveActivity(280, at(0), at(0), 'FDG', 30)).toBe(250);
  });

  it('should clamp a scan start before injection to zero elapsed time', () => {
    expect(model.decayIntervalMinutes(at(0), at(-15))).toBe(0);
    expect(model.effectiveActivity(280, at(0), at(-15), 'FDG', 30)).toBe(250);
  });

  it('should halve the activity after one half-life', () => {
    expect(model.effectiveActivity(280, at(0), at(109.77), 'FDG')).toBeCloseTo(140, 3);
  });

  it('should decrease monotonically with elapsed time', () => {
    const values = [0, 15, 30, 60, 120, 240].map((m) => model.effectiveActivity(300, at(0), at(m), 'PSMA'));
    for (let i = 1; i < values.length; i++) {
      expect(values[i]).toBeLessThan(values[i - 1]);
    }
  });

  it('should never go negative when the residual exceeds the injected activity', () => {
    expect(model.effectiveActivity(10, at(0), at(60), 'FDG', 25)).toBe(0);
  });

  it('should report the decay interval in minutes', () => {
    expect(model.decayIntervalMinutes(at(0), at(60))).toBe(60);
    expect(model.decayIntervalMinutes(at(0), at(0.5))).toBe(0.5);
  });
});

describe('Lean body mass', () => {
  it('should use the male formula for male adults', () => {
    // 1.10 × 78 − 128 × (78/172)²
    expect(model.lbm(78, 172, 'male')).toBeCloseTo(59.4766, 3);
  });

  it('should use the female formula for every other adult category', () => {
    // 1.07 × 78 − 148 × (78/172)²
    expect(model.lbm(78, 172, 'female')).toBeCloseTo(53.0235, 3);
    expect(model.lbm(78, 172, 'pediatric')).toBeCloseTo(53.0235, 3);
  });

  it('should floor adult LBM at 30 kg', () => {
    // 1.10 × 40 − 128 × 0.16 = 23.52
    expect(model.lbm(40, 100, 'male')).toBe(30);
  });

  it('should use the age-group factor for pediatric weights, whatever the declared sex', () => {
    expect(model.lbm(20, 110, 'male')).toBeCloseTo(15, 10);
    expect(model.lbm(3, 50, 'female')).toBeCloseTo(2.55, 10);
    expect(model.lbm(30, 130, 'pediatric')).toBeCloseTo(21, 10);
  });

  it('should fall back to weight tiers below the smallest age group', () => {
    expect(model.lbm(0.3, 35, 'pediatric')).toBeCloseTo(0.255, 10);
  });
});

describe('BMI multiplier', () => {
  it('should compute BMI from kg and cm', () => {
    expect(model.bmi(78, 172)).toBeCloseTo(26.3656, 3);
  });

  it('should be exactly 1.0 at and below the reference BMI', () => {
    expect(model.bmiMultiplier(22, 'FDG')).toBe(1.0);
    expect(model.bmiMultiplier(18, 'PSMA')).toBe(1.0);
  });

  it('should use a tracer-dependent exponent', () => {
    expect(model.bmiMultiplier(33, 'FDG')).toBeCloseTo(1.5 ** 0.6, 10);
    expect(model.bmiMultiplier(33, 'PSMA')).toBeCloseTo(1.5 ** 0.4, 10);
  });

  it('should be constant above the cap', () => {
    const capped = model.bmiMultiplier(40, 'FDG');
    expect(model.bmiMultiplier(45, 'FDG')).toBe(capped);
    expect(model.bmiMultiplier(60, 'FDG')).toBe(capped);
    expect(capped).toBeCloseTo((40 / 22) ** 0.6, 10);
  });

  it('should be non-decreasing in BMI', () => {
    let previous = 0;
    for (let bmi = 15; bmi <= 50; bmi += 0.5) {
      const value = model.bmiMultiplier(bmi, 'FDG');
      expect(value).toBeGreaterThanOrEqual(previous);
      previous = value;
    }
  });
});

describe('NEC / SNR model', () => {
  it('should compute NEC as activity × dwell × sensitivity', () => {
    expect(model.calculateNec(2, 10, 'FDG')).toBeCloseTo(182000, 6);
  });

  it('should compute SNR as √NEC × gain', () => {
    expect(model.calculateSnrFromNec(10000, 1.5)).toBe(150);
    expect(model.calculateSnrFromNec(10000)).toBe(100);
  });

  it('should floor non-positive NEC instead of returning NaN', () => {
    expect(model.calculateSnrFromNec(0, 2)).toBeCloseTo(Math.sqrt(NEC_EPSILON) * 2, 15);
    expect(model.calculateSnrFromNec(-50, 1)).toBeCloseTo(Math.sqrt(NEC_EPSILON), 15);
  });
});

describe('k calibration', () => {
  it('should reproduce the site reference SNR on the reference scan', () => {
    const k = model.calibrateK({ tRefS: 200, activityRefMbq: 3.7 * 78, reconGain: 1.6, snrRefSite: 12, tracer: 'FDG' });
    const necRef = model.calculateNec(3.7 * 78, 200, 'FDG');
    expect(k).toBeCloseTo(3.2725e-4, 7);
    expect(k * model.calculateSnrFromNec(necRef, 1.6)).toBeCloseTo(12, 10);
  });

  it('should floor k at a small epsilon', () => {
    expect(model.calibrateK({ tRefS: 200, activityRefMbq: 100, reconGain: 1, snrRefSite: 0, tracer: 'FDG' })).toBe(NEC_EPSILON);
  });
});
