/**
 * Pediatric Policy Tests
 *
 * The 35 kg gate decides pediatric handling for every solver and for LBM;
 * age groups only refine the table lookups.
 */

import {
  PEDIATRIC_TABLES,
  getAgeGroup,
  getDoseFactor,
  getFastReductionFactor,
  getLbmFactor,
  getScanTimeLimit,
  getSnrTarget,
  isPediatric,
} from '../pet-protocol/pediatric';

describe('Pediatric gate', () => {
  it('should treat every weight below 35 kg as pediatric', () => {
    for (const weight of [0.2, 3, 12, 20, 34.9, 34.999]) {
      expect(isPediatric(PEDIATRIC_TABLES, weight)).toBe(true);
    }
  });

  it('should treat 35 kg and above as adult', () => {
    for (const weight of [35, 35.01, 50, 78, 150]) {
      expect(isPediatric(PEDIATRIC_TABLES, weight)).toBe(false);
    }
  });
});

describe('Age groups', () => {
  it('should resolve weights inside the inclusive ranges', () => {
    expect(getAgeGroup(PEDIATRIC_TABLES, 3)).toBe('neonate');
    expect(getAgeGroup(PEDIATRIC_TABLES, 10)).toBe('infant');
    expect(getAgeGroup(PEDIATRIC_TABLES, 20)).toBe('toddler');
    expect(getAgeGroup(PEDIATRIC_TABLES, 30)).toBe('child');
    expect(getAgeGroup(PEDIATRIC_TABLES, 70)).toBe('adolescent');
  });

  it('should give shared boundaries to the lighter group', () => {
    expect(getAgeGroup(PEDIATRIC_TABLES, 5)).toBe('neonate');
    expect(getAgeGroup(PEDIATRIC_TABLES, 15)).toBe('infant');
    expect(getAgeGroup(PEDIATRIC_TABLES, 25)).toBe('toddler');
    expect(getAgeGroup(PEDIATRIC_TABLES, 50)).toBe('child');
  });

  it('should return null outside every range', () => {
    expect(getAgeGroup(PEDIATRIC_TABLES, 0.3)).toBeNull();
    expect(getAgeGroup(PEDIATRIC_TABLES, 120)).toBeNull();
  });
});

describe('Table lookups', () => {
  it('should read dose factors and fall back to 1.0', () => {
    expect(getDoseFactor(PEDIATRIC_TABLES, 3)).toBe(0.02);
    expect(getDoseFactor(PEDIATRIC_TABLES, 20)).toBe(0.10);
    expect(getDoseFactor(PEDIATRIC_TABLES, 0.3)).toBe(1.0);
  });

  it('should read scan-time ceilings and fall back to 180 s', () => {
    expect(getScanTimeLimit(PEDIATRIC_TABLES, 3)).toBe(30);
    expect(getScanTimeLimit(PEDIATRIC_TABLES, 20)).toBe(120);
    expect(getScanTimeLimit(PEDIATRIC_TABLES, 30)).toBe(180);
    expect(getScanTimeLimit(PEDIATRIC_TABLES, 0.3)).toBe(180);
  });

  it('should read LBM factors and fall back to weight tiers', () => {
    expect(getLbmFactor(PEDIATRIC_TABLES, 10)).toBe(0.80);
    expect(getLbmFactor(PEDIATRIC_TABLES, 0.3)).toBe(0.85);
  });
});

describe('Pediatric SNR target', () => {
  it('should scale the base target by the dose factor', () => {
    // 8 × (0.8 + 0.4 × 0.10 / 0.15)
    expect(getSnrTarget(PEDIATRIC_TABLES, 'FDG', 20)).toBeCloseTo(8.5333, 3);
    // 8 × (0.8 + 0.4 × 0.02 / 0.15)
    expect(getSnrTarget(PEDIATRIC_TABLES, 'FDG', 3)).toBeCloseTo(6.8267, 3);
  });

  it('should clamp the target to 12', () => {
    expect(getSnrTarget(PEDIATRIC_TABLES, 'PSMA', 70)).toBe(12);
    expect(getSnrTarget(PEDIATRIC_TABLES, 'PSMA', 0.3)).toBe(12);
  });

  it('should clamp the target to 5', () => {
    const tables = { ...PEDIATRIC_TABLES, snrTargets: { FDG: 4, PSMA: 4 } };
    expect(getSnrTarget(tables, 'FDG', 3)).toBe(5);
  });
});

describe('Fast protocol reduction', () => {
  it('should be 0.5 + 0.3 × doseFactor / 0.15', () => {
    expect(getFastReductionFactor(PEDIATRIC_TABLES, 20)).toBeCloseTo(0.7, 10);
    expect(getFastReductionFactor(PEDIATRIC_TABLES, 30)).toBeCloseTo(0.8, 10);
    expect(getFastReductionFactor(PEDIATRIC_TABLES, 3)).toBeCloseTo(0.54, 10);
  });
});
