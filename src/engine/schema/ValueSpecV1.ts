/**
 * ValueSpecV1 — a number that never travels without its unit and provenance.
 *
 * Every physical quantity entering or leaving the engine is a ValueSpec. The
 * four core fields (value, unit, sourceType, label) are mandatory and never
 * defaulted; equality is by the full tuple, so an assumed 288 K and a measured
 * 288 K are different values.
 *
 * Provenance detail per source type:
 *   measured — optional citation { document, page }
 *   assumed  — meta.note explaining the assumption
 *   derived  — meta.tool naming the computation that produced it
 *   external — meta.source and meta.timeRange
 */

import type { EngineResult } from '../../contracts/EngineOutputV1';
import { REFUSAL_RULE_IDS } from '../../contracts/refusal.ids';
import { SOURCE_TYPES, type SourceType } from '../../contracts/provenance.ids';
import { ok, refuse } from '../guardrails/refusal';
import { requireProvenance } from '../guardrails/Guardrails';
import { deepFreeze } from '../utils/freeze';

export { SOURCE_TYPES };
export type { SourceType };

export type EnergyKind = 'thermal' | 'electric';

export interface CitationV1 {
  document: string;
  /** 1-based page number. */
  page: number;
}

/** Compact trace of an input that fed a derived value. */
export interface ValueSpecTrace {
  value: number;
  unit: string;
  sourceType: SourceType;
  label: string;
}

export interface ValueSpecMeta {
  note?: string;
  tool?: string;
  source?: string;
  timeRange?: string;
  citation?: CitationV1;
  /** Required on Wh-family energies before they can be unit-normalised. */
  energyKind?: EnergyKind;
  inputs?: Record<string, ValueSpecTrace>;
  /** Set by the unit normaliser; the value's provenance is otherwise unchanged. */
  conversion?: { fromValue: number; fromUnit: string };
  warning?: string;
}

export interface ValueSpec {
  readonly value: number;
  readonly unit: string;
  readonly sourceType: SourceType;
  readonly label: string;
  readonly meta?: Readonly<ValueSpecMeta>;
}

/** Loosely-typed fields as supplied by configuration loading. */
export interface ValueSpecFields {
  value?: number;
  unit?: string;
  sourceType?: string;
  label?: string;
  meta?: ValueSpecMeta;
}

export function isSourceType(candidate: string): candidate is SourceType {
  return SOURCE_TYPES.some(s => s === candidate);
}

/** Copies every nested object so freezing the result leaves the caller's meta alone. */
function copyMeta(meta: ValueSpecMeta): ValueSpecMeta {
  const { citation, inputs, conversion, ...flat } = meta;
  return {
    ...flat,
    ...(citation !== undefined ? { citation: { ...citation } } : {}),
    ...(conversion !== undefined ? { conversion: { ...conversion } } : {}),
    ...(inputs !== undefined
      ? { inputs: Object.fromEntries(Object.entries(inputs).map(([name, trace]) => [name, { ...trace }])) }
      : {}),
  };
}

/**
 * Validate externally supplied fields and build a frozen ValueSpec.
 * Refuses instead of defaulting any missing field.
 */
export function createValueSpec(fields: ValueSpecFields): EngineResult<ValueSpec> {
  const { value, unit, sourceType, label } = fields;

  if (value === undefined || !unit || !sourceType || !label) {
    const owner = label ? label : 'valueSpec';
    const absent: string[] = [];
    if (value === undefined) absent.push('value');
    if (!unit) absent.push('unit');
    if (!sourceType) absent.push('sourceType');
    if (!label) absent.push('label');
    return refuse('MissingInput', REFUSAL_RULE_IDS.INPUT_MISSING, {
      message: `Cannot accept value "${owner}" because ${absent.join(', ')} ${absent.length === 1 ? 'is' : 'are'} missing.`,
      why: 'Every quantity must carry its value, unit, source classification and label; none is ever defaulted.',
      field: `${owner}.${absent[0]}`,
      missing: absent.map(f => `${owner}.${f}`),
    });
  }

  if (!Number.isFinite(value)) {
    return refuse('InvalidValue', REFUSAL_RULE_IDS.VALUE_NOT_FINITE, {
      message: `Cannot accept value "${label}" because it is not a finite number.`,
      why: 'NaN and infinite values cannot take part in an energy or exergy balance.',
      field: `${label}.value`,
      details: { value: String(value) },
    });
  }

  if (!isSourceType(sourceType)) {
    return refuse('InvalidProvenance', REFUSAL_RULE_IDS.PROVENANCE_SOURCE_UNKNOWN, {
      message: `Cannot accept value "${label}" because source type "${sourceType}" is not recognised.`,
      why: `Source type must be one of ${SOURCE_TYPES.join(', ')}.`,
      field: `${label}.sourceType`,
      details: { sourceType },
    });
  }

  const candidate: ValueSpec = fields.meta === undefined
    ? { value, unit, sourceType, label }
    : { value, unit, sourceType, label, meta: copyMeta(fields.meta) };

  const provenance = requireProvenance(candidate, label);
  if (!provenance.ok) return provenance;

  return ok(deepFreeze(candidate));
}

function unwrapOrThrow(result: EngineResult<ValueSpec>): ValueSpec {
  if (!result.ok) {
    throw new Error(`${result.refusal.kind}: ${result.refusal.message}`);
  }
  return result.value;
}

// ── Convenience constructors ──────────────────────────────────────────────────
// For values written in code. A malformed literal is a programming error, so
// these throw; externally supplied data goes through createValueSpec.

export function measuredValue(
  value: number,
  unit: string,
  label: string,
  extra: Pick<ValueSpecMeta, 'citation' | 'energyKind'> = {},
): ValueSpec {
  const meta: ValueSpecMeta = { ...extra };
  return unwrapOrThrow(createValueSpec({
    value, unit, sourceType: 'measured', label,
    meta: Object.keys(meta).length > 0 ? meta : undefined,
  }));
}

export function assumedValue(
  value: number,
  unit: string,
  label: string,
  note: string,
  extra: Pick<ValueSpecMeta, 'energyKind'> = {},
): ValueSpec {
  return unwrapOrThrow(createValueSpec({ value, unit, sourceType: 'assumed', label, meta: { note, ...extra } }));
}

export function derivedValue(
  value: number,
  unit: string,
  label: string,
  tool: string,
  extra: Pick<ValueSpecMeta, 'inputs' | 'energyKind' | 'warning'> = {},
): ValueSpec {
  return unwrapOrThrow(createValueSpec({ value, unit, sourceType: 'derived', label, meta: { tool, ...extra } }));
}

export function externalValue(
  value: number,
  unit: string,
  label: string,
  origin: { source: string; timeRange: string },
  extra: Pick<ValueSpecMeta, 'energyKind'> = {},
): ValueSpec {
  return unwrapOrThrow(createValueSpec({
    value, unit, sourceType: 'external', label,
    meta: { source: origin.source, timeRange: origin.timeRange, ...extra },
  }));
}

// ── Identity ──────────────────────────────────────────────────────────────────

/** Full-tuple equality: value, unit, source type and label must all agree. */
export function valueSpecEquals(a: ValueSpec, b: ValueSpec): boolean {
  return Object.is(a.value, b.value)
    && a.unit === b.unit
    && a.sourceType === b.sourceType
    && a.label === b.label;
}

export function traceOf(v: ValueSpec): ValueSpecTrace {
  return { value: v.value, unit: v.unit, sourceType: v.sourceType, label: v.label };
}

/** e.g. `T0 = 283.15 K (assumed)` */
export function describeValueSpec(v: ValueSpec): string {
  return `${v.label} = ${v.value} ${v.unit} (${v.sourceType})`;
}
