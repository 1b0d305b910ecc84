/**
 * Scanner Device Profiles
 *
 * Constants for the continuous-bed-motion scanners the planner supports.
 * Each profile contains:
 * - Axial field of view (mm)
 * - Literature system sensitivity and half-life per tracer
 * - Named reconstruction profiles with their SNR gain
 * - Bed velocity bounds enforced by every protocol solver
 */

import type { DeviceProfile, ReconProfileName, Tracer } from './types';

export const TRACERS: readonly Tracer[] = ['FDG', 'PSMA'];

export const RECON_PROFILE_NAMES: readonly ReconProfileName[] = ['EARL', 'OSEM_TOF', 'HD_PET'];

/**
 * Siemens Biograph Vision 450
 *
 * F-18 labelled FDG and PSMA-1007 share the same half-life and sensitivity.
 */
export const VISION_450: DeviceProfile = Object.freeze({
  name: 'Biograph Vision 450',
  axialFovMm: 263.0,
  sensitivityKcpsPerMbq: Object.freeze({ FDG: 9.1, PSMA: 9.1 }),
  halfLifeMin: Object.freeze({ FDG: 109.77, PSMA: 109.77 }),
  reconProfiles: Object.freeze({
    EARL: Object.freeze({ gain: 1.0, note: 'EARL harmonized' }),
    OSEM_TOF: Object.freeze({ gain: 1.25, note: 'OSEM+TOF without PSF (site dependent)' }),
    HD_PET: Object.freeze({ gain: 1.6, note: 'TOF+PSF+filter (Vision)' }),
  }),
  fallbackReconGain: 1.6,
  velocityBoundsMmS: Object.freeze([0.5, 50.0] as const),
  defaultSnrTarget: Object.freeze({ FDG: 12.0, PSMA: 14.0 }),
  defaultSnrRefSite: Object.freeze({ FDG: 12.0, PSMA: 14.0 }),
});

export function isReconProfileName(value: string): value is ReconProfileName {
  return RECON_PROFILE_NAMES.some((name) => name === value);
}

/**
 * Resolve the reconstruction gain. A positive custom gain wins; an unknown
 * profile name resolves to the device's fallback gain.
 */
export function resolveReconGain(device: DeviceProfile, profile: string, customGain?: number | null): number {
  if (customGain !== undefined && customGain !== null && customGain > 0) {
    return customGain;
  }
  return isReconProfileName(profile) ? device.reconProfiles[profile].gain : device.fallbackReconGain;
}
