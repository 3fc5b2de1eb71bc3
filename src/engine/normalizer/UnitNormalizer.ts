/**
 * UnitNormalizer — converts temperature and energy ValueSpecs into the units
 * the exergy core expects.
 *
 * The core never converts implicitly; hosts run their inputs through here
 * before building a Scenario or a run. A conversion keeps the value's source
 * type and label (an assumed 10 °C stays assumed at 283.15 K) and records the
 * original value in `meta.conversion`.
 */

import type { EngineRefusal, EngineResult } from '../../contracts/EngineOutputV1';
import { REFUSAL_RULE_IDS } from '../../contracts/refusal.ids';
import { ok, refuse } from '../guardrails/refusal';
import { requireFinite, requireProvenance } from '../guardrails/Guardrails';
import { createValueSpec } from '../schema/ValueSpecV1';
import type { ValueSpec } from '../schema/ValueSpecV1';

const CELSIUS_OFFSET = 273.15;

const CELSIUS_UNITS = new Set(['°C', 'degC', 'C']);

/** Joules per unit. */
const ENERGY_UNIT_FACTORS: Record<string, number> = {
  J: 1,
  kJ: 1e3,
  MJ: 1e6,
  GJ: 1e9,
  Wh: 3600,
  kWh: 3.6e6,
  MWh: 3.6e9,
  GWh: 3.6e12,
};

/** Wh-family units say nothing about thermal versus electric energy. */
const AMBIGUOUS_ENERGY_UNITS = new Set(['Wh', 'kWh', 'MWh', 'GWh']);

export function energyUnitFactor(unit: string): number | undefined {
  return Object.prototype.hasOwnProperty.call(ENERGY_UNIT_FACTORS, unit) ? ENERGY_UNIT_FACTORS[unit] : undefined;
}

export function isEnergyUnit(unit: string): boolean {
  return energyUnitFactor(unit) !== undefined;
}

function unknownUnit(v: ValueSpec, accepted: string[]): EngineRefusal {
  return refuse('InvalidUnit', REFUSAL_RULE_IDS.UNIT_UNKNOWN, {
    message: `Cannot normalise ${v.label} because unit "${v.unit}" is not recognised.`,
    why: `Accepted units are ${accepted.join(', ')}.`,
    field: `${v.label}.unit`,
    details: { unit: v.unit },
  });
}

function converted(v: ValueSpec, value: number, unit: string): EngineResult<ValueSpec> {
  return createValueSpec({
    value,
    unit,
    sourceType: v.sourceType,
    label: v.label,
    meta: { ...v.meta, conversion: { fromValue: v.value, fromUnit: v.unit } },
  });
}

// ── Temperature ───────────────────────────────────────────────────────────────

/** Normalise a temperature to kelvin. Results at or below absolute zero refuse. */
export function normalizeTemperature(v: ValueSpec): EngineResult<ValueSpec> {
  const checked = requireProvenance(v, v.label);
  if (!checked.ok) return checked;
  const finite = requireFinite(v, v.label);
  if (!finite.ok) return finite;

  let kelvin: number;
  if (v.unit === 'K') {
    kelvin = v.value;
  } else if (CELSIUS_UNITS.has(v.unit)) {
    kelvin = v.value + CELSIUS_OFFSET;
  } else {
    return unknownUnit(v, ['K', ...CELSIUS_UNITS]);
  }

  if (!(kelvin > 0)) {
    return refuse('InvalidValue', REFUSAL_RULE_IDS.VALUE_NOT_POSITIVE, {
      message: `Cannot normalise ${v.label} because ${v.value} ${v.unit} is at or below absolute zero.`,
      why: 'Thermodynamic temperatures are strictly positive in kelvin.',
      field: v.label,
      details: { value: v.value, unit: v.unit },
    });
  }

  return v.unit === 'K' ? ok(v) : converted(v, kelvin, 'K');
}

// ── Energy ────────────────────────────────────────────────────────────────────

/**
 * Refuse a Wh-family energy that does not declare whether it is thermal or
 * electric.
 */
export function requireUnambiguousEnergy(v: ValueSpec): EngineResult<ValueSpec> {
  if (AMBIGUOUS_ENERGY_UNITS.has(v.unit) && v.meta?.energyKind === undefined) {
    return refuse('InvalidUnit', REFUSAL_RULE_IDS.UNIT_AMBIGUOUS_ENERGY, {
      message: `Cannot compute because '${v.unit}' on ${v.label} is ambiguous (thermal vs electric is unknown).`,
      why: 'Energies given in Wh, kWh, MWh or GWh must declare whether they are thermal or electric; otherwise efficiency chains and exergy results can be wrong.',
      field: `${v.label}.meta.energyKind`,
      missing: [`${v.label}.meta.energyKind`],
      details: { unit: v.unit },
    });
  }
  return ok(v);
}

export function normalizeEnergy(v: ValueSpec, targetUnit: string): EngineResult<ValueSpec> {
  const checked = requireProvenance(v, v.label);
  if (!checked.ok) return checked;
  const finite = requireFinite(v, v.label);
  if (!finite.ok) return finite;

  const from = energyUnitFactor(v.unit);
  if (from === undefined) return unknownUnit(v, Object.keys(ENERGY_UNIT_FACTORS));
  const to = energyUnitFactor(targetUnit);
  if (to === undefined) {
    return refuse('InvalidUnit', REFUSAL_RULE_IDS.UNIT_UNKNOWN, {
      message: `Cannot normalise ${v.label} because target unit "${targetUnit}" is not recognised.`,
      why: `Accepted units are ${Object.keys(ENERGY_UNIT_FACTORS).join(', ')}.`,
      field: 'targetUnit',
      details: { unit: targetUnit },
    });
  }

  const unambiguous = requireUnambiguousEnergy(v);
  if (!unambiguous.ok) return unambiguous;

  if (v.unit === targetUnit) return ok(v);
  return converted(v, (v.value * from) / to, targetUnit);
}

/** Convert a bare magnitude between energy units; undefined when either is unknown. */
export function convertEnergyMagnitude(value: number, fromUnit: string, toUnit: string): number | undefined {
  const from = energyUnitFactor(fromUnit);
  const to = energyUnitFactor(toUnit);
  if (from === undefined || to === undefined) return undefined;
  return fromUnit === toUnit ? value : (value * from) / to;
}
