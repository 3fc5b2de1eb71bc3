/**
 * ExergyCoreModule — pure exergy functions over validated ValueSpecs.
 *
 * exergyOfHeat:        Ex = Q · (1 − T0/Tb), only for Tb > T0 (equality refuses)
 * exergyEfficiency:    η_ex = Ex_out / Ex_in, only for Ex_in > 0
 * exergyDestruction:   Ex_d = Ex_in + W_in − Ex_out − W_out − Ex_loss ≥ 0
 *
 * No implicit unit conversion: temperatures must be in K and every energy-like
 * term in one unit. Each function runs its guardrails immediately before the
 * arithmetic, so a refusal is always returned instead of a number.
 */

import type { EngineResult, ExergyResultV1 } from '../../contracts/EngineOutputV1';
import { conservationTolerance, getScienceConfig } from '../config/ScienceConfig';
import type { ScienceConfigV1 } from '../config/ScienceConfig';
import { ok } from '../guardrails/refusal';
import {
  requireBoundaryValidity,
  requireFinite,
  requireNonNegative,
  requireNonNegativeDestruction,
  requirePositive,
  requirePositiveInputExergy,
  requirePresent,
  requireProvenance,
  requireSameUnit,
  requireUnit,
} from '../guardrails/Guardrails';
import type { ScenarioV1 } from '../schema/ScenarioV1';
import type { ExergyCarrierV1 } from '../schema/StageChainV1';
import { derivedValue, traceOf } from '../schema/ValueSpecV1';
import type { ValueSpec, ValueSpecTrace } from '../schema/ValueSpecV1';

function checked(v: ValueSpec | undefined, field: string): EngineResult<ValueSpec> {
  const present = requirePresent(v, field);
  if (!present.ok) return present;
  const provenance = requireProvenance(present.value, field);
  if (!provenance.ok) return provenance;
  return requireFinite(present.value, field);
}

function checkedTemperature(v: ValueSpec | undefined, field: string): EngineResult<ValueSpec> {
  const c = checked(v, field);
  if (!c.ok) return c;
  const unit = requireUnit(c.value, 'K', field);
  if (!unit.ok) return unit;
  return requirePositive(c.value, field);
}

// ── Exergy of heat ────────────────────────────────────────────────────────────

/**
 * Exergy content of heat Q crossing a boundary at Tb, relative to an
 * environment at T0. The result is in Q's unit.
 */
export function exergyOfHeat(
  Q: ValueSpec | undefined,
  T0: ValueSpec | undefined,
  Tb: ValueSpec | undefined,
): EngineResult<ValueSpec> {
  const q = checked(Q, 'Q');
  if (!q.ok) return q;
  const t0 = checkedTemperature(T0, 'T0');
  if (!t0.ok) return t0;
  const tb = checkedTemperature(Tb, 'Tb');
  if (!tb.ok) return tb;

  const heat = requireNonNegative(q.value, 'Q');
  if (!heat.ok) return heat;

  const valid = requireBoundaryValidity(t0.value, tb.value);
  if (!valid.ok) return valid;

  const ex = q.value.value * (1 - t0.value.value / tb.value.value);
  return ok(derivedValue(ex, q.value.unit, `Ex(${q.value.label})`, 'exergy-of-heat', {
    inputs: { Q: traceOf(q.value), T0: traceOf(t0.value), Tb: traceOf(tb.value) },
  }));
}

// ── Exergy efficiency ─────────────────────────────────────────────────────────

export function exergyEfficiency(
  exergyOut: ValueSpec,
  exergyIn: ValueSpec,
  config: Readonly<ScienceConfigV1> = getScienceConfig(),
): EngineResult<ValueSpec> {
  const out = checked(exergyOut, 'exergyOut');
  if (!out.ok) return out;
  const inp = checked(exergyIn, 'exergyIn');
  if (!inp.ok) return inp;
  const sameUnit = requireSameUnit(exergyIn, exergyOut, 'exergyOut');
  if (!sameUnit.ok) return sameUnit;
  const positive = requirePositiveInputExergy(exergyIn);
  if (!positive.ok) return positive;

  const eta = exergyOut.value / exergyIn.value;
  const { min, max } = config.efficiencyWarningBand;
  const inputs = { exergyOut: traceOf(exergyOut), exergyIn: traceOf(exergyIn) };
  return ok(derivedValue(eta, '-', `eta_ex(${exergyOut.label}/${exergyIn.label})`, 'exergy-efficiency',
    eta < min || eta > max
      ? { inputs, warning: `Exergy efficiency ${eta} is outside [${min}, ${max}]; check the boundary and stage definitions.` }
      : { inputs }));
}

// ── Exergy destruction ────────────────────────────────────────────────────────

export interface DestructionBalanceInput {
  exergyIn: ValueSpec;
  exergyOut: ValueSpec;
  workIn?: ValueSpec;
  workOut?: ValueSpec;
  /** Exergy leaving with losses; not destroyed inside the control volume. */
  exergyLoss?: ValueSpec;
}

/**
 * Exergy destroyed inside a control volume. Negative results beyond the
 * conservation tolerance refuse; sub-tolerance negatives are rounding and clamp
 * to zero.
 */
export function exergyDestructionBalance(
  input: DestructionBalanceInput,
  config: Readonly<ScienceConfigV1> = getScienceConfig(),
): EngineResult<ValueSpec> {
  const terms: Array<[string, ValueSpec | undefined, 1 | -1]> = [
    ['exergyIn', input.exergyIn, 1],
    ['workIn', input.workIn, 1],
    ['exergyOut', input.exergyOut, -1],
    ['workOut', input.workOut, -1],
    ['exergyLoss', input.exergyLoss, -1],
  ];

  let total = 0;
  let supplied = 0;
  const traces: Record<string, ValueSpecTrace> = {};
  for (const [field, v, sign] of terms) {
    if (v === undefined) continue;
    const c = checked(v, field);
    if (!c.ok) return c;
    const unit = requireSameUnit(input.exergyIn, v, field);
    if (!unit.ok) return unit;
    total += sign * v.value;
    if (sign > 0) supplied += v.value;
    traces[field] = traceOf(v);
  }

  const tolerance = conservationTolerance(config, supplied);
  const nonNegative = requireNonNegativeDestruction(total, tolerance, input.exergyOut.label);
  if (!nonNegative.ok) return nonNegative;

  return ok(derivedValue(Math.max(total, 0), input.exergyIn.unit, `Ex_d(${input.exergyOut.label})`,
    'exergy-destruction-balance', { inputs: traces }));
}

// ── Carriers ──────────────────────────────────────────────────────────────────

/**
 * Exergy of an energy flow of the given carrier, relative to the scenario's
 * reference environment. Heat goes through exergyOfHeat and so refuses when
 * its temperature is not above T0.
 */
export function exergyOfFlow(
  energy: number,
  unit: string,
  carrier: ExergyCarrierV1,
  scenario: ScenarioV1,
  label: string,
): EngineResult<number> {
  switch (carrier.kind) {
    case 'work':
      return ok(energy);
    case 'ambient':
      return ok(0);
    case 'chemical': {
      const field = `${label}.carrier.exergyFactor`;
      const factor = checked(carrier.exergyFactor, field);
      if (!factor.ok) return factor;
      const unitOk = requireUnit(factor.value, '-', field);
      if (!unitOk.ok) return unitOk;
      const nonNegative = requireNonNegative(factor.value, field);
      if (!nonNegative.ok) return nonNegative;
      return ok(energy * factor.value.value);
    }
    case 'heat': {
      const Q = derivedValue(energy, unit, label, 'stage-compute');
      const ex = exergyOfHeat(Q, scenario.T0, carrier.temperature);
      if (!ex.ok) return ex;
      return ok(ex.value.value);
    }
  }
}

// ── Delivered heat ────────────────────────────────────────────────────────────

/**
 * The ExergyResult of a run: exergy of heat Q delivered at the scenario's Tb,
 * its efficiency against the system input exergy, and the exergy destroyed
 * along the way.
 */
export function evaluateDeliveredHeat(
  scenario: ScenarioV1,
  Q: ValueSpec,
  exergyIn: ValueSpec,
  config: Readonly<ScienceConfigV1> = getScienceConfig(),
): EngineResult<ExergyResultV1> {
  const exergyValue = exergyOfHeat(Q, scenario.T0, scenario.Tb);
  if (!exergyValue.ok) return exergyValue;
  const efficiency = exergyEfficiency(exergyValue.value, exergyIn, config);
  if (!efficiency.ok) return efficiency;
  const destruction = exergyDestructionBalance({ exergyIn, exergyOut: exergyValue.value }, config);
  if (!destruction.ok) return destruction;
  return ok({ exergyValue: exergyValue.value, efficiency: efficiency.value, destruction: destruction.value });
}
