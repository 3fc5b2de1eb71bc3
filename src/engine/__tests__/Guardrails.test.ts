import { describe, it, expect } from 'vitest';
import {
  requireBoundaryCompleteness,
  requireBoundaryValidity,
  requireChainTerminatesInDelivery,
  requireConservation,
  requireDeliveryBoundaryName,
  requireNonNegativeDestruction,
  requirePresent,
  requireProvenance,
  requireUniqueStageNames,
  type StageShape,
} from '../guardrails/Guardrails';
import { REFUSAL_RULE_IDS } from '../../contracts/refusal.ids';
import { SOURCE_TYPES } from '../../contracts/provenance.ids';
import { measuredValue, type ValueSpec } from '../schema/ValueSpecV1';
import { BOUNDARY, kelvin, refusalOf, valueOf } from './exergyFixtures';

const stage = (kind: StageShape['kind'], name: string, component?: StageShape['component']): StageShape =>
  component ? { kind, name, component } : { kind, name };

describe('requirePresent', () => {
  it('refuses an absent field with MissingInput naming it', () => {
    const r = refusalOf(requirePresent<ValueSpec>(undefined, 'T0'));
    expect(r.kind).toBe('MissingInput');
    expect(r.category).toBe('input_contract');
    expect(r.field).toBe('T0');
    expect(r.missing).toEqual(['T0']);
  });

  it('passes a present value through', () => {
    const T0 = kelvin(280, 'T0');
    expect(valueOf(requirePresent(T0, 'T0'))).toBe(T0);
  });
});

describe('requireProvenance', () => {
  it('refuses a hand-built assumed value without a note', () => {
    const raw: ValueSpec = { value: 280, unit: 'K', sourceType: 'assumed', label: 'T0' };
    const r = refusalOf(requireProvenance(raw, 'scenario.T0'));
    expect(r.kind).toBe('InvalidProvenance');
    expect(r.missing).toEqual(['scenario.T0.meta.note']);
  });

  it('refuses a hand-built value with an empty unit', () => {
    const raw: ValueSpec = { value: 280, unit: '', sourceType: 'measured', label: 'T0' };
    const r = refusalOf(requireProvenance(raw, 'T0'));
    expect(r.kind).toBe('MissingInput');
    expect(r.missing).toEqual(['T0.unit']);
  });

  it('accepts every shared source type once its detail is present', () => {
    const meta = { note: 'site mean', tool: 'glide', source: 'grid operator', timeRange: '2023' };
    for (const sourceType of SOURCE_TYPES) {
      expect(requireProvenance({ value: 280, unit: 'K', sourceType, label: 'T0', meta }, 'T0').ok).toBe(true);
    }
  });
});

describe('requireBoundaryValidity', () => {
  it('passes when Tb is above T0', () => {
    expect(requireBoundaryValidity(kelvin(280, 'T0'), kelvin(350, 'Tb')).ok).toBe(true);
  });

  it('refuses Tb equal to T0', () => {
    const r = refusalOf(requireBoundaryValidity(kelvin(300, 'T0'), kelvin(300, 'Tb')));
    expect(r.kind).toBe('InvalidTemperatureBoundary');
    expect(r.category).toBe('physical_validity');
    expect(r.ruleId).toBe(REFUSAL_RULE_IDS.BOUNDARY_TB_NOT_ABOVE_T0);
    expect(r.details).toEqual({ T0: 300, Tb: 300 });
  });

  it('refuses Tb below T0', () => {
    expect(refusalOf(requireBoundaryValidity(kelvin(300, 'T0'), kelvin(290, 'Tb'))).kind)
      .toBe('InvalidTemperatureBoundary');
  });

  it('returns the same verdict on every call', () => {
    const a = requireBoundaryValidity(kelvin(300, 'T0'), kelvin(300, 'Tb'));
    const b = requireBoundaryValidity(kelvin(300, 'T0'), kelvin(300, 'Tb'));
    expect(a).toEqual(b);
  });
});

describe('requireChainTerminatesInDelivery', () => {
  it('refuses an empty chain', () => {
    const r = refusalOf(requireChainTerminatesInDelivery([]));
    expect(r.kind).toBe('IncompleteChain');
    expect(r.ruleId).toBe(REFUSAL_RULE_IDS.CHAIN_EMPTY);
  });

  it('refuses a chain that does not end in DELIVER', () => {
    const r = refusalOf(requireChainTerminatesInDelivery([
      stage('CHARGE', 'charge'), stage('STORE', 'store'), stage('CONVERT', 'convert'),
    ]));
    expect(r.kind).toBe('IncompleteChain');
    expect(r.ruleId).toBe(REFUSAL_RULE_IDS.CHAIN_NOT_TERMINATED_BY_DELIVER);
    expect(r.field).toBe('stages[2].kind');
  });

  it('refuses DELIVER anywhere but last', () => {
    const r = refusalOf(requireChainTerminatesInDelivery([stage('DELIVER', 'early'), stage('DELIVER', 'late')]));
    expect(r.ruleId).toBe(REFUSAL_RULE_IDS.CHAIN_DELIVER_NOT_LAST);
    expect(r.field).toBe('stages[0].kind');
  });

  it('accepts a single DELIVER stage', () => {
    expect(requireChainTerminatesInDelivery([stage('DELIVER', 'deliver')]).ok).toBe(true);
  });
});

describe('requireUniqueStageNames', () => {
  it('refuses a repeated stage name', () => {
    const r = refusalOf(requireUniqueStageNames([stage('STORE', 'tank'), stage('DELIVER', 'tank')]));
    expect(r.ruleId).toBe(REFUSAL_RULE_IDS.CHAIN_DUPLICATE_STAGE_NAME);
    expect(r.details).toEqual({ stage: 'tank' });
  });
});

describe('requireBoundaryCompleteness', () => {
  const stages = [
    stage('STORE', 'store', { id: 'pit-1', requiredForDelivery: false }),
    stage('DELIVER', 'deliver', { id: 'hx-1', requiredForDelivery: true }),
  ];

  it('refuses a required component outside the boundary', () => {
    const r = refusalOf(requireBoundaryCompleteness({ boundaryElements: new Set(['pit-1']) }, stages));
    expect(r.kind).toBe('MissingBoundaryElement');
    expect(r.details).toEqual({ component: 'hx-1', stage: 'deliver' });
  });

  it('ignores components not required for delivery', () => {
    expect(requireBoundaryCompleteness({ boundaryElements: new Set(['hx-1']) }, stages).ok).toBe(true);
  });
});

describe('requireDeliveryBoundaryName', () => {
  it('refuses a missing name', () => {
    const r = refusalOf(requireDeliveryBoundaryName(undefined, BOUNDARY));
    expect(r.kind).toBe('MissingInput');
    expect(r.ruleId).toBe(REFUSAL_RULE_IDS.BOUNDARY_NAME_MISSING);
  });

  it('refuses a different boundary', () => {
    const r = refusalOf(requireDeliveryBoundaryName('building_substation', BOUNDARY));
    expect(r.kind).toBe('InvalidValue');
    expect(r.ruleId).toBe(REFUSAL_RULE_IDS.BOUNDARY_NAME_MISMATCH);
  });
});

describe('integrity rules', () => {
  it('requireConservation passes within tolerance and returns the residual', () => {
    expect(valueOf(requireConservation({
      ruleId: REFUSAL_RULE_IDS.INTEGRITY_BALANCE_VIOLATED,
      subject: 'balance',
      lhs: 10,
      rhs: 9.5,
      tolerance: 1,
    }))).toBe(0.5);
  });

  it('requireConservation refuses as a computation-integrity failure', () => {
    const r = refusalOf(requireConservation({
      ruleId: REFUSAL_RULE_IDS.INTEGRITY_BALANCE_VIOLATED,
      subject: 'balance',
      lhs: 10,
      rhs: 8,
      tolerance: 1,
    }));
    expect(r.kind).toBe('ComputationIntegrityFailure');
    expect(r.category).toBe('computation_integrity');
    expect(r.details).toEqual({ lhs: 10, rhs: 8, residual: 2, tolerance: 1 });
  });

  it('requireNonNegativeDestruction tolerates rounding but not a second-law violation', () => {
    expect(requireNonNegativeDestruction(-1e-12, 1e-9, 'store').ok).toBe(true);
    expect(refusalOf(requireNonNegativeDestruction(-1, 1e-9, 'store')).ruleId)
      .toBe(REFUSAL_RULE_IDS.INTEGRITY_NEGATIVE_DESTRUCTION);
  });

  it('does not accept NaN as conserved', () => {
    expect(requireConservation({
      ruleId: REFUSAL_RULE_IDS.INTEGRITY_BALANCE_VIOLATED,
      subject: 'balance',
      lhs: Number.NaN,
      rhs: 1,
      tolerance: 1,
    }).ok).toBe(false);
  });
});

describe('measured fixtures', () => {
  it('carry no provenance meta', () => {
    expect(measuredValue(1, '-', 'x').meta).toBeUndefined();
  });
});
