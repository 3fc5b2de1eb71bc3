/**
 * ScienceConfig — frozen scientific configuration.
 *
 * The comparison basis (functional unit, DH delivery boundary, conservation
 * tolerance, boundary-glide policy) is fixed for the life of the process.
 * `initScienceConfig` installs it once; `getScienceConfig` reads it. Engine
 * entry points take the config as an explicit argument defaulting to the
 * installed instance, so tests build their own with `createScienceConfig`.
 */

import { deepFreeze } from '../utils/freeze';

export type BoundaryGlidePolicy = 'log_mean' | 'arithmetic_mean';

export interface FunctionalUnitSpec {
  deliveredHeat: number;
  /** Energy unit of `deliveredHeat`. */
  unit: string;
  description: string;
}

export interface DeliveryBoundarySpec {
  name: string;
  temperatureUnit: 'K';
}

export interface ScienceConfigV1 {
  functionalUnit: FunctionalUnitSpec;
  deliveryBoundary: DeliveryBoundarySpec;
  conservation: {
    /** Tolerance relative to the magnitude of the balanced quantity. */
    relativeTolerance: number;
    /** Floor used when the balanced quantity is near zero. */
    absoluteTolerance: number;
  };
  boundaryGlidePolicy: BoundaryGlidePolicy;
  /** Exergy efficiencies outside this band are returned with a warning. */
  efficiencyWarningBand: { min: number; max: number };
}

export interface ScienceConfigOverrides {
  functionalUnit?: Partial<FunctionalUnitSpec>;
  deliveryBoundaryName?: string;
  conservation?: Partial<ScienceConfigV1['conservation']>;
  boundaryGlidePolicy?: BoundaryGlidePolicy;
  efficiencyWarningBand?: Partial<ScienceConfigV1['efficiencyWarningBand']>;
}

export const DEFAULT_SCIENCE_CONFIG: Readonly<ScienceConfigV1> = deepFreeze<ScienceConfigV1>({
  functionalUnit: {
    deliveredHeat: 1,
    unit: 'MWh',
    description: '1 MWh useful heat delivered to the DH delivery boundary',
  },
  deliveryBoundary: {
    name: 'district_heating_delivery_boundary',
    temperatureUnit: 'K',
  },
  conservation: {
    relativeTolerance: 1e-9,
    absoluteTolerance: 1e-12,
  },
  boundaryGlidePolicy: 'log_mean',
  efficiencyWarningBand: { min: 0, max: 1.2 },
});

/**
 * Build a validated, deep-frozen configuration. Invalid overrides are
 * programming errors and throw.
 */
export function createScienceConfig(overrides: ScienceConfigOverrides = {}): Readonly<ScienceConfigV1> {
  const d = DEFAULT_SCIENCE_CONFIG;
  const config: ScienceConfigV1 = {
    functionalUnit: { ...d.functionalUnit, ...overrides.functionalUnit },
    deliveryBoundary: {
      ...d.deliveryBoundary,
      name: overrides.deliveryBoundaryName ?? d.deliveryBoundary.name,
    },
    conservation: { ...d.conservation, ...overrides.conservation },
    boundaryGlidePolicy: overrides.boundaryGlidePolicy ?? d.boundaryGlidePolicy,
    efficiencyWarningBand: { ...d.efficiencyWarningBand, ...overrides.efficiencyWarningBand },
  };

  if (!(config.functionalUnit.deliveredHeat > 0) || !Number.isFinite(config.functionalUnit.deliveredHeat)) {
    throw new Error(`ScienceConfig: functionalUnit.deliveredHeat must be a positive number, got ${config.functionalUnit.deliveredHeat}`);
  }
  if (!config.functionalUnit.unit) {
    throw new Error('ScienceConfig: functionalUnit.unit is required');
  }
  if (!config.deliveryBoundary.name) {
    throw new Error('ScienceConfig: deliveryBoundary.name is required');
  }
  const { relativeTolerance, absoluteTolerance } = config.conservation;
  if (!(relativeTolerance >= 0) || !(absoluteTolerance >= 0)) {
    throw new Error('ScienceConfig: conservation tolerances must be non-negative');
  }
  if (!(config.efficiencyWarningBand.min <= config.efficiencyWarningBand.max)) {
    throw new Error('ScienceConfig: efficiencyWarningBand.min must not exceed max');
  }

  return deepFreeze(config);
}

/** Tolerance for balancing a quantity of the given magnitude. */
export function conservationTolerance(config: Readonly<ScienceConfigV1>, magnitude: number): number {
  return Math.max(config.conservation.relativeTolerance * Math.abs(magnitude), config.conservation.absoluteTolerance);
}

// ── Process-wide instance ─────────────────────────────────────────────────────

let installed: Readonly<ScienceConfigV1> | undefined;

/** Install the process-wide configuration. Throws when called twice. */
export function initScienceConfig(overrides: ScienceConfigOverrides = {}): Readonly<ScienceConfigV1> {
  if (installed !== undefined) {
    throw new Error('ScienceConfig is already initialised; build a new instance with createScienceConfig instead');
  }
  installed = createScienceConfig(overrides);
  return installed;
}

/** The installed configuration; installs the defaults on first read. */
export function getScienceConfig(): Readonly<ScienceConfigV1> {
  if (installed === undefined) {
    installed = createScienceConfig();
  }
  return installed;
}
