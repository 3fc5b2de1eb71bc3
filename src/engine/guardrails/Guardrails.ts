/**
 * Guardrails — the single authority for refusal.
 *
 * Every rule is a pure, total function: same inputs, same verdict, no I/O.
 * A passing rule returns its (narrowed) subject so callers can chain checks
 * with an early return on the first refusal:
 *
 *   const t0 = requirePresent(input.T0, 'T0');
 *   if (!t0.ok) return t0;
 *
 * Rules are invoked at the earliest point where enough information exists:
 * Scenario construction, StageChain finalisation, and immediately before any
 * Exergy Core call. Nothing is deferred to "see if it resolves itself".
 */

import type { EngineResult } from '../../contracts/EngineOutputV1';
import { REFUSAL_RULE_IDS } from '../../contracts/refusal.ids';
import { SOURCE_TYPES } from '../../contracts/provenance.ids';
import type { ValueSpec } from '../schema/ValueSpecV1';
import type { StageKind } from '../schema/StageChainV1';
import { ok, refuse } from './refusal';

/** Minimal structural view of a stage — what the chain rules need to decide. */
export interface StageShape {
  readonly kind: StageKind;
  readonly name: string;
  readonly component?: Readonly<{ id: string; requiredForDelivery: boolean }>;
}

// ── Presence ──────────────────────────────────────────────────────────────────

export function requirePresent<T>(value: T | null | undefined, field: string): EngineResult<T> {
  if (value === undefined || value === null) {
    return refuse('MissingInput', REFUSAL_RULE_IDS.INPUT_MISSING, {
      message: `Cannot compute because ${field} is missing.`,
      why: `${field} is a mandatory input; the engine never substitutes a default for it.`,
      field,
      missing: [field],
    });
  }
  return ok(value);
}

// ── ValueSpec contract ────────────────────────────────────────────────────────

/**
 * Provenance rule: the four core fields are present and the source type carries
 * the detail it requires.
 */
export function requireProvenance(v: ValueSpec, field: string): EngineResult<ValueSpec> {
  const absent: string[] = [];
  if (!v.unit) absent.push(`${field}.unit`);
  if (!v.label) absent.push(`${field}.label`);
  if (!v.sourceType) absent.push(`${field}.sourceType`);
  if (absent.length > 0) {
    return refuse('MissingInput', REFUSAL_RULE_IDS.INPUT_MISSING, {
      message: `Cannot use ${field} because ${absent.join(', ')} is missing.`,
      why: 'Every quantity must carry its unit, label and source classification.',
      field,
      missing: absent,
    });
  }

  if (!SOURCE_TYPES.includes(v.sourceType)) {
    return refuse('InvalidProvenance', REFUSAL_RULE_IDS.PROVENANCE_SOURCE_UNKNOWN, {
      message: `Cannot use ${field} because source type "${v.sourceType}" is not recognised.`,
      why: `Source type must be one of ${SOURCE_TYPES.join(', ')}.`,
      field: `${field}.sourceType`,
    });
  }

  const meta = v.meta ?? {};
  const lacking: string[] = [];
  switch (v.sourceType) {
    case 'assumed':
      if (!meta.note) lacking.push('meta.note');
      break;
    case 'derived':
      if (!meta.tool) lacking.push('meta.tool');
      break;
    case 'external':
      if (!meta.source) lacking.push('meta.source');
      if (!meta.timeRange) lacking.push('meta.timeRange');
      break;
    case 'measured':
      if (meta.citation !== undefined) {
        if (!meta.citation.document) lacking.push('meta.citation.document');
        if (!Number.isInteger(meta.citation.page) || meta.citation.page < 1) lacking.push('meta.citation.page');
      }
      break;
  }

  if (lacking.length > 0) {
    return refuse('InvalidProvenance', REFUSAL_RULE_IDS.PROVENANCE_DETAIL_MISSING, {
      message: `Cannot use ${field} because its ${v.sourceType} provenance lacks ${lacking.join(', ')}.`,
      why: 'Assumed values must say why, derived values which tool produced them, external values where and when they come from, and citations a document and page.',
      field,
      missing: lacking.map(l => `${field}.${l}`),
    });
  }

  return ok(v);
}

export function requireFinite(v: ValueSpec, field: string): EngineResult<ValueSpec> {
  if (!Number.isFinite(v.value)) {
    return refuse('InvalidValue', REFUSAL_RULE_IDS.VALUE_NOT_FINITE, {
      message: `Cannot compute because ${field} is not a finite number.`,
      why: 'NaN and infinite values cannot take part in an energy or exergy balance.',
      field,
      details: { value: String(v.value) },
    });
  }
  return ok(v);
}

export function requireUnit(v: ValueSpec, unit: string, field: string): EngineResult<ValueSpec> {
  if (v.unit !== unit) {
    return refuse('InvalidUnit', REFUSAL_RULE_IDS.UNIT_MISMATCH, {
      message: `Cannot compute because ${field} is in "${v.unit}", not "${unit}".`,
      why: 'The core performs no implicit unit conversion; inputs must be normalised before they reach it.',
      field,
      missing: [`${field}.unit=${unit}`],
      details: { gotUnit: v.unit, expectedUnit: unit },
    });
  }
  return ok(v);
}

export function requireSameUnit(a: ValueSpec, b: ValueSpec, field: string): EngineResult<ValueSpec> {
  return requireUnit(b, a.unit, field);
}

export function requirePositive(v: ValueSpec, field: string): EngineResult<ValueSpec> {
  const finite = requireFinite(v, field);
  if (!finite.ok) return finite;
  if (v.value <= 0) {
    return refuse('InvalidValue', REFUSAL_RULE_IDS.VALUE_NOT_POSITIVE, {
      message: `Cannot compute because ${field} must be greater than zero (got ${v.value} ${v.unit}).`,
      why: `${field} is only physically meaningful when strictly positive.`,
      field,
      details: { value: v.value, unit: v.unit },
    });
  }
  return ok(v);
}

export function requireNonNegative(v: ValueSpec, field: string): EngineResult<ValueSpec> {
  const finite = requireFinite(v, field);
  if (!finite.ok) return finite;
  if (v.value < 0) {
    return refuse('InvalidValue', REFUSAL_RULE_IDS.VALUE_NEGATIVE, {
      message: `Cannot compute because ${field} is negative (got ${v.value} ${v.unit}).`,
      why: `${field} is a magnitude; its direction is fixed by where it sits in the chain.`,
      field,
      details: { value: v.value, unit: v.unit },
    });
  }
  return ok(v);
}

/** Closed interval check for dimensionless fractions such as efficiencies. */
export function requireFraction(v: ValueSpec, field: string): EngineResult<ValueSpec> {
  const nonNegative = requireNonNegative(v, field);
  if (!nonNegative.ok) return nonNegative;
  if (v.value > 1) {
    return refuse('InvalidValue', REFUSAL_RULE_IDS.VALUE_OUT_OF_RANGE, {
      message: `Cannot compute because ${field} exceeds 1 (got ${v.value}).`,
      why: `${field} is a fraction of the energy passing through the stage and cannot create energy.`,
      field,
      details: { value: v.value },
    });
  }
  return ok(v);
}

// ── Temperature boundary ──────────────────────────────────────────────────────

/**
 * The exergy-of-heat shortcut is defined as inapplicable, not merely degenerate,
 * whenever Tb ≤ T0 — equality refuses too.
 */
export function requireBoundaryValidity(T0: ValueSpec, Tb: ValueSpec): EngineResult<{ T0: ValueSpec; Tb: ValueSpec }> {
  if (!(Tb.value > T0.value)) {
    return refuse('InvalidTemperatureBoundary', REFUSAL_RULE_IDS.BOUNDARY_TB_NOT_ABOVE_T0, {
      message: `Cannot compute exergy of heat because ${Tb.label} (${Tb.value} ${Tb.unit}) is not above ${T0.label} (${T0.value} ${T0.unit}).`,
      why: 'Ex = Q·(1 − T0/Tb) only applies to heat delivered above the reference environment temperature.',
      field: Tb.label,
      missing: [`${Tb.label} > ${T0.label}`],
      details: { T0: T0.value, Tb: Tb.value },
    });
  }
  return ok({ T0, Tb });
}

export function requireSupplyAboveReturn(
  supply: ValueSpec,
  ret: ValueSpec,
): EngineResult<{ supply: ValueSpec; ret: ValueSpec }> {
  if (supply.value < ret.value) {
    return refuse('InvalidTemperatureBoundary', REFUSAL_RULE_IDS.BOUNDARY_SUPPLY_BELOW_RETURN, {
      message: `Cannot derive a boundary temperature because supply (${supply.value} ${supply.unit}) is below return (${ret.value} ${ret.unit}).`,
      why: 'Heat delivered across the DH boundary flows from supply to return; a supply colder than return is not a delivery.',
      field: 'supplyTemperature',
      details: { supply: supply.value, return: ret.value },
    });
  }
  return ok({ supply, ret });
}

export function requireDeliveryBoundaryName(
  name: string | undefined,
  expected: string,
): EngineResult<string> {
  if (!name) {
    return refuse('MissingInput', REFUSAL_RULE_IDS.BOUNDARY_NAME_MISSING, {
      message: 'Cannot compute because the delivery boundary is not named.',
      why: 'Systems are only comparable when they all declare the same useful-output boundary.',
      field: 'deliveryBoundaryName',
      missing: ['deliveryBoundaryName'],
    });
  }
  if (name !== expected) {
    return refuse('InvalidValue', REFUSAL_RULE_IDS.BOUNDARY_NAME_MISMATCH, {
      message: `Cannot compute because delivery boundary "${name}" is not the configured boundary "${expected}".`,
      why: 'Every compared system must deliver heat across the same boundary.',
      field: 'deliveryBoundaryName',
      details: { got: name, expected },
    });
  }
  return ok(name);
}

// ── Stage chain ───────────────────────────────────────────────────────────────

export function requireChainTerminatesInDelivery<S extends StageShape>(
  stages: readonly S[],
): EngineResult<readonly S[]> {
  if (stages.length === 0) {
    return refuse('IncompleteChain', REFUSAL_RULE_IDS.CHAIN_EMPTY, {
      message: 'Cannot build system because the stage chain has no stages.',
      why: 'A system must contain at least one stage, ending in DELIVER.',
      field: 'stages',
      missing: ['stages[0]'],
    });
  }

  const last = stages[stages.length - 1];
  if (last.kind !== 'DELIVER') {
    return refuse('IncompleteChain', REFUSAL_RULE_IDS.CHAIN_NOT_TERMINATED_BY_DELIVER, {
      message: `Cannot build system because the stage chain ends with ${last.kind} stage "${last.name}" instead of DELIVER.`,
      why: 'The functional unit is heat delivered at the DH boundary, so every chain must end in a DELIVER stage.',
      field: `stages[${stages.length - 1}].kind`,
      missing: ['last stage kind = DELIVER'],
      details: { lastKind: last.kind, lastStage: last.name },
    });
  }

  const early = stages.findIndex((s, i) => s.kind === 'DELIVER' && i < stages.length - 1);
  if (early >= 0) {
    return refuse('IncompleteChain', REFUSAL_RULE_IDS.CHAIN_DELIVER_NOT_LAST, {
      message: `Cannot build system because DELIVER stage "${stages[early].name}" is not the last stage.`,
      why: 'Delivery at the DH boundary ends the chain; stages after it would sit outside the boundary.',
      field: `stages[${early}].kind`,
      details: { stage: stages[early].name, position: early },
    });
  }

  return ok(stages);
}

export function requireUniqueStageNames<S extends StageShape>(stages: readonly S[]): EngineResult<readonly S[]> {
  const seen = new Set<string>();
  for (const stage of stages) {
    if (seen.has(stage.name)) {
      return refuse('InvalidValue', REFUSAL_RULE_IDS.CHAIN_DUPLICATE_STAGE_NAME, {
        message: `Cannot build system because stage name "${stage.name}" is used twice.`,
        why: 'Time-series records and losses are attributed by stage name; duplicates would merge two stages.',
        field: 'stages.name',
        details: { stage: stage.name },
      });
    }
    seen.add(stage.name);
  }
  return ok(stages);
}

/**
 * Every component flagged as required for delivery must sit inside the
 * scenario's declared boundary.
 */
export function requireBoundaryCompleteness<S extends StageShape>(
  scenario: { readonly boundaryElements: ReadonlySet<string> },
  stages: readonly S[],
): EngineResult<readonly S[]> {
  for (const stage of stages) {
    const component = stage.component;
    if (component && component.requiredForDelivery && !scenario.boundaryElements.has(component.id)) {
      return refuse('MissingBoundaryElement', REFUSAL_RULE_IDS.BOUNDARY_ELEMENT_MISSING, {
        message: `Cannot compute because component "${component.id}" (stage "${stage.name}") is required for delivery but is outside the declared boundary.`,
        why: 'Losses of a component needed to deliver heat must be inside the boundary, or the comparison silently drops them.',
        field: 'boundaryElements',
        missing: [`boundaryElements ∋ ${component.id}`],
        details: { component: component.id, stage: stage.name },
      });
    }
  }
  return ok(stages);
}

// ── Exergy core ───────────────────────────────────────────────────────────────

export function requirePositiveInputExergy(exergyIn: ValueSpec): EngineResult<ValueSpec> {
  if (!(exergyIn.value > 0)) {
    return refuse('ZeroInputExergy', REFUSAL_RULE_IDS.EXERGY_INPUT_NOT_POSITIVE, {
      message: `Cannot compute exergy efficiency because input exergy ${exergyIn.label} is ${exergyIn.value} ${exergyIn.unit}.`,
      why: 'Exergy efficiency is only defined for a strictly positive exergy input.',
      field: exergyIn.label,
      missing: [`${exergyIn.label} > 0`],
      details: { exergyIn: exergyIn.value },
    });
  }
  return ok(exergyIn);
}

// ── Computation integrity ─────────────────────────────────────────────────────

export interface ConservationCheck {
  ruleId:
    | typeof REFUSAL_RULE_IDS.INTEGRITY_ENERGY_NOT_CONSERVED
    | typeof REFUSAL_RULE_IDS.INTEGRITY_BALANCE_VIOLATED
    | typeof REFUSAL_RULE_IDS.INTEGRITY_STAGE_SPLIT_VIOLATED;
  /** What is being balanced, e.g. "energy balance of stage store". */
  subject: string;
  lhs: number;
  rhs: number;
  tolerance: number;
}

/**
 * Integrity rule: two sides of a conservation identity agree within tolerance.
 * A violation points at a loss model or engine defect, not at the inputs.
 */
export function requireConservation(check: ConservationCheck): EngineResult<number> {
  const residual = check.lhs - check.rhs;
  if (!(Math.abs(residual) <= check.tolerance)) {
    return refuse('ComputationIntegrityFailure', check.ruleId, {
      message: `Computation integrity failure: ${check.subject} does not close (residual ${residual}).`,
      why: 'A conservation identity that does not hold means a stage loss model double-counts or drops a quantity.',
      field: check.subject,
      details: { lhs: check.lhs, rhs: check.rhs, residual, tolerance: check.tolerance },
    });
  }
  return ok(residual);
}

/** Integrity rule: a flow produced by a loss model is a finite magnitude. */
export function requireNonNegativeFlow(value: number, subject: string): EngineResult<number> {
  if (!Number.isFinite(value) || value < 0) {
    return refuse('ComputationIntegrityFailure', REFUSAL_RULE_IDS.INTEGRITY_NEGATIVE_FLOW, {
      message: `Computation integrity failure: ${subject} is ${value}.`,
      why: 'Loss models must return finite, non-negative energy flows.',
      field: subject,
      details: { value: String(value) },
    });
  }
  return ok(value);
}

/** Second-law rule: destroyed exergy may not be negative beyond tolerance. */
export function requireNonNegativeDestruction(
  destroyed: number,
  tolerance: number,
  subject: string,
): EngineResult<number> {
  if (!(destroyed >= -tolerance)) {
    return refuse('ComputationIntegrityFailure', REFUSAL_RULE_IDS.INTEGRITY_NEGATIVE_DESTRUCTION, {
      message: `Computation integrity failure: exergy destruction of ${subject} is negative (${destroyed}).`,
      why: 'The second law forbids negative exergy destruction; the loss model creates exergy.',
      field: subject,
      details: { destroyed, tolerance },
    });
  }
  return ok(destroyed);
}
