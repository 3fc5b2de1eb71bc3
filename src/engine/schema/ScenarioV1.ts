/**
 * ScenarioV1 — the validated temperature boundary of one comparison run.
 *
 * A Scenario is built once from externally supplied inputs and never mutated.
 * Construction runs the guardrails in a fixed order so that the first problem
 * reported is always the most fundamental one:
 *
 *   T0 present → T0 provenance → T0 in K → T0 > 0
 *   → Tb (given directly, or derived from the supply/return glide) → Tb checks
 *   → Tb > T0 → delivery boundary name → auxiliary-input provenance
 *
 * Changing any input means building a new Scenario with `reviseScenarioV1`.
 */

import type { EngineResult } from '../../contracts/EngineOutputV1';
import { REFUSAL_RULE_IDS } from '../../contracts/refusal.ids';
import { getScienceConfig } from '../config/ScienceConfig';
import type { BoundaryGlidePolicy, ScienceConfigV1 } from '../config/ScienceConfig';
import { ok, refuse } from '../guardrails/refusal';
import {
  requireBoundaryValidity,
  requireDeliveryBoundaryName,
  requireFinite,
  requirePositive,
  requirePresent,
  requireProvenance,
  requireSupplyAboveReturn,
  requireUnit,
} from '../guardrails/Guardrails';
import { deepFreeze } from '../utils/freeze';
import { derivedValue, traceOf } from './ValueSpecV1';
import type { ValueSpec } from './ValueSpecV1';

export interface ScenarioInputV1 {
  name: string;
  /** Reference environment temperature. */
  T0?: ValueSpec;
  /** Boundary temperature at which heat is considered delivered. */
  Tb?: ValueSpec;
  /** DH supply temperature; with returnTemperature, lets Tb be derived. */
  supplyTemperature?: ValueSpec;
  returnTemperature?: ValueSpec;
  deliveryBoundaryName?: string;
  /** Component ids inside the declared system boundary. */
  boundaryElements: readonly string[];
  auxiliaryInputs?: Record<string, ValueSpec>;
}

export interface ScenarioV1 {
  readonly name: string;
  readonly T0: ValueSpec;
  readonly Tb: ValueSpec;
  readonly supplyTemperature?: ValueSpec;
  readonly returnTemperature?: ValueSpec;
  readonly deliveryBoundaryName: string;
  readonly boundaryElements: ReadonlySet<string>;
  readonly auxiliaryInputs: Readonly<Record<string, ValueSpec>>;
  /** 'direct' when Tb was supplied, otherwise the glide policy that derived it. */
  readonly boundaryTemperatureSource: 'direct' | BoundaryGlidePolicy;
}

function checkTemperature(v: ValueSpec | undefined, field: string): EngineResult<ValueSpec> {
  const present = requirePresent(v, field);
  if (!present.ok) return present;
  const provenance = requireProvenance(present.value, field);
  if (!provenance.ok) return provenance;
  const unit = requireUnit(present.value, 'K', field);
  if (!unit.ok) return unit;
  return requirePositive(present.value, field);
}

// ── Boundary glide ────────────────────────────────────────────────────────────

/**
 * Representative temperature of heat delivered over a supply→return glide.
 * log_mean is the entropic average: (Ts − Tr) / ln(Ts / Tr).
 */
export function glideTemperature(supply: number, ret: number, policy: BoundaryGlidePolicy): number {
  if (policy === 'arithmetic_mean') return (supply + ret) / 2;
  if (supply === ret) return supply;
  return (supply - ret) / Math.log(supply / ret);
}

function resolveBoundaryTemperature(
  input: ScenarioInputV1,
  policy: BoundaryGlidePolicy,
): EngineResult<{ Tb: ValueSpec; source: ScenarioV1['boundaryTemperatureSource'] }> {
  if (input.Tb !== undefined) {
    const tb = checkTemperature(input.Tb, 'Tb');
    if (!tb.ok) return tb;
    return ok({ Tb: tb.value, source: 'direct' });
  }

  const { supplyTemperature, returnTemperature } = input;
  if (supplyTemperature === undefined && returnTemperature === undefined) {
    return refuse('MissingInput', REFUSAL_RULE_IDS.INPUT_MISSING, {
      message: 'Cannot compute because Tb is missing.',
      why: 'Tb must be supplied directly or derived from DH supply and return temperatures; it is never defaulted.',
      field: 'Tb',
      missing: ['Tb', 'supplyTemperature + returnTemperature'],
    });
  }

  const supply = checkTemperature(supplyTemperature, 'supplyTemperature');
  if (!supply.ok) return supply;
  const ret = checkTemperature(returnTemperature, 'returnTemperature');
  if (!ret.ok) return ret;
  const ordered = requireSupplyAboveReturn(supply.value, ret.value);
  if (!ordered.ok) return ordered;

  const Tb = derivedValue(
    glideTemperature(supply.value.value, ret.value.value, policy),
    'K',
    'Tb',
    `boundary-glide:${policy}`,
    { inputs: { supplyTemperature: traceOf(supply.value), returnTemperature: traceOf(ret.value) } },
  );
  return ok({ Tb, source: policy });
}

// ── Construction ──────────────────────────────────────────────────────────────

export function buildScenarioV1(
  input: ScenarioInputV1,
  config: Readonly<ScienceConfigV1> = getScienceConfig(),
): EngineResult<ScenarioV1> {
  const t0 = checkTemperature(input.T0, 'T0');
  if (!t0.ok) return t0;

  const tb = resolveBoundaryTemperature(input, config.boundaryGlidePolicy);
  if (!tb.ok) return tb;

  const valid = requireBoundaryValidity(t0.value, tb.value.Tb);
  if (!valid.ok) return valid;

  const boundaryName = requireDeliveryBoundaryName(input.deliveryBoundaryName, config.deliveryBoundary.name);
  if (!boundaryName.ok) return boundaryName;

  const auxiliaryInputs: Record<string, ValueSpec> = {};
  for (const [name, v] of Object.entries(input.auxiliaryInputs ?? {})) {
    const field = `auxiliaryInputs.${name}`;
    const provenance = requireProvenance(v, field);
    if (!provenance.ok) return provenance;
    const finite = requireFinite(v, field);
    if (!finite.ok) return finite;
    auxiliaryInputs[name] = v;
  }

  if (!input.name) {
    return refuse('MissingInput', REFUSAL_RULE_IDS.INPUT_MISSING, {
      message: 'Cannot build scenario because it has no name.',
      why: 'Runs and refusals are reported against the scenario name.',
      field: 'name',
      missing: ['name'],
    });
  }

  const scenario: ScenarioV1 = {
    name: input.name,
    T0: t0.value,
    Tb: tb.value.Tb,
    ...(input.supplyTemperature !== undefined ? { supplyTemperature: input.supplyTemperature } : {}),
    ...(input.returnTemperature !== undefined ? { returnTemperature: input.returnTemperature } : {}),
    deliveryBoundaryName: boundaryName.value,
    boundaryElements: new Set(input.boundaryElements),
    auxiliaryInputs,
    boundaryTemperatureSource: tb.value.source,
  };
  return ok(deepFreeze(scenario));
}

/**
 * Build a new scenario from an existing one plus changes. A Tb that was derived
 * from the glide is re-derived, so changing supply or return moves it.
 */
export function reviseScenarioV1(
  scenario: ScenarioV1,
  changes: Partial<ScenarioInputV1>,
  config: Readonly<ScienceConfigV1> = getScienceConfig(),
): EngineResult<ScenarioV1> {
  const base: ScenarioInputV1 = {
    name: scenario.name,
    T0: scenario.T0,
    Tb: scenario.boundaryTemperatureSource === 'direct' ? scenario.Tb : undefined,
    supplyTemperature: scenario.supplyTemperature,
    returnTemperature: scenario.returnTemperature,
    deliveryBoundaryName: scenario.deliveryBoundaryName,
    boundaryElements: [...scenario.boundaryElements],
    auxiliaryInputs: { ...scenario.auxiliaryInputs },
  };
  return buildScenarioV1({ ...base, ...changes }, config);
}
