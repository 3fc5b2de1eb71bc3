import { describe, it, expect } from 'vitest';
import { runSimulationV1, type SimulationInputV1 } from '../timeline/SimulationLoopV1';
import { STAGE_VARIABLES } from '../modules/StageComputeModule';
import { convertStage, deliverStage, deliveryLossModel, losslessTransferModel } from '../modules/StageLibrary';
import { ok } from '../guardrails/refusal';
import { createStageChainBuilder, type LossModelV1, type StageV1 } from '../schema/StageChainV1';
import { REFUSAL_RULE_IDS } from '../../contracts/refusal.ids';
import { measuredValue } from '../schema/ValueSpecV1';
import type { ScenarioV1 } from '../schema/ScenarioV1';
import {
  buildScenario,
  config,
  electricKWh,
  electricSource,
  fraction,
  hourlyAxis,
  kelvin,
  refusalOf,
  threeStageChain,
  valueOf,
} from './exergyFixtures';

const scenario = buildScenario();

function simulation(overrides: Partial<SimulationInputV1> = {}, stages: StageV1[] = threeStageChain(), on: ScenarioV1 = scenario) {
  const chain = valueOf(createStageChainBuilder(stages).finalize(on, config));
  return runSimulationV1({
    runLabel: 'pit',
    scenario: on,
    chain,
    timeAxis: hourlyAxis(2),
    source: electricSource([8, 8]),
    ...overrides,
  }, config);
}

const deliver = () => deliverStage({
  name: 'deliver',
  lossModel: deliveryLossModel,
  inputs: { delivery_efficiency: fraction(0.5, 'delivery efficiency') },
});

describe('runSimulationV1', () => {
  it('emits one record per step, stage and variable plus loss-model extras', () => {
    const run = valueOf(simulation());
    // 10 standard variables per stage, plus retained_fraction on the store stage
    expect(run.records).toHaveLength(62);
    expect(run.stepCount).toBe(2);
    expect(run.energyUnit).toBe('kWh');
    expect(run.stages).toEqual([
      { name: 'charge', kind: 'CHARGE' },
      { name: 'store', kind: 'STORE' },
      { name: 'deliver', kind: 'DELIVER' },
    ]);
  });

  it('orders records by step, then stage, then variable', () => {
    const { records } = valueOf(simulation());
    expect(records.slice(0, 10).map(r => r.variableName)).toEqual([...STAGE_VARIABLES]);
    expect(records[0]).toEqual({
      time: 0,
      stageName: 'charge',
      variableName: 'energy_in',
      value: 8,
      unit: 'kWh',
      sourceType: 'derived',
    });
    expect(records[20]).toEqual({
      time: 0,
      stageName: 'store',
      variableName: 'retained_fraction',
      value: 0.5,
      unit: '-',
      sourceType: 'derived',
    });
    expect(records[21].stageName).toBe('deliver');
    expect(records[28].variableName).toBe('exergy_out');
    expect(records[28].value).toBeCloseTo(0.2, 12);
    expect(records[31].time).toBe(1);
    expect(records[31].stageName).toBe('charge');
  });

  it('feeds each stage its predecessor\'s outflow from the same step', () => {
    const { records } = valueOf(simulation({ source: electricSource([8, 4]) }));
    const value = (time: number, stage: string, variable: string) =>
      records.find(r => r.time === time && r.stageName === stage && r.variableName === variable)?.value;
    expect(value(1, 'charge', 'energy_in')).toBe(4);
    expect(value(1, 'store', 'energy_in')).toBe(value(1, 'charge', 'energy_out'));
    expect(value(1, 'deliver', 'energy_in')).toBe(value(1, 'store', 'energy_out'));
    expect(value(1, 'deliver', 'energy_out')).toBe(0.5);
  });

  it('places steps on start + k · stepSize', () => {
    const { records } = valueOf(simulation({ timeAxis: { start: 10, stepSize: 0.5, stepCount: 2, unit: 'h' } }));
    expect([...new Set(records.map(r => r.time))]).toEqual([10, 10.5]);
  });

  it('produces identical records for identical inputs', () => {
    const a = valueOf(simulation());
    const b = valueOf(simulation());
    expect(JSON.stringify(a.records)).toBe(JSON.stringify(b.records));
  });

  it('freezes the record series', () => {
    expect(Object.isFrozen(valueOf(simulation()).records)).toBe(true);
  });
});

describe('pre-run validation', () => {
  it('refuses an invalid time axis and lists every problem', () => {
    const r = refusalOf(simulation({ timeAxis: { start: 0, stepSize: 0, stepCount: 2, unit: '' } }));
    expect(r.ruleId).toBe(REFUSAL_RULE_IDS.RUN_TIME_AXIS_INVALID);
    expect(r.field).toBe('timeAxis.stepSize');
    expect(r.missing).toEqual(['timeAxis.stepSize', 'timeAxis.unit']);
  });

  it('refuses a zero-step run', () => {
    const r = refusalOf(simulation({ timeAxis: hourlyAxis(0), source: electricSource([]) }));
    expect(r.field).toBe('timeAxis.stepCount');
  });

  it('refuses a source profile that does not cover every step', () => {
    const r = refusalOf(simulation({ source: electricSource([8]) }));
    expect(r.ruleId).toBe(REFUSAL_RULE_IDS.RUN_SOURCE_LENGTH_MISMATCH);
    expect(r.details).toEqual({ values: 1, steps: 2 });
  });

  it('refuses a source value that is not an energy', () => {
    const r = refusalOf(simulation({ source: { carrier: { kind: 'work' }, energy: [kelvin(8, 'x'), kelvin(8, 'y')] } }));
    expect(r.kind).toBe('InvalidUnit');
    expect(r.field).toBe('source.energy[0].unit');
  });

  it('refuses a source that mixes energy units', () => {
    const r = refusalOf(simulation({
      source: { carrier: { kind: 'work' }, energy: [electricKWh(8, 'a'), measuredValue(0.008, 'MWh', 'b', { energyKind: 'electric' })] },
    }));
    expect(r.ruleId).toBe(REFUSAL_RULE_IDS.UNIT_MISMATCH);
    expect(r.field).toBe('source.energy[1]');
  });

  it('refuses kWh that does not say thermal or electric', () => {
    const r = refusalOf(simulation({
      source: { carrier: { kind: 'work' }, energy: [measuredValue(8, 'kWh', 'a'), measuredValue(8, 'kWh', 'b')] },
    }));
    expect(r.ruleId).toBe(REFUSAL_RULE_IDS.UNIT_AMBIGUOUS_ENERGY);
  });

  it('refuses negative source energy', () => {
    const r = refusalOf(simulation({ source: electricSource([8, -1]) }));
    expect(r.ruleId).toBe(REFUSAL_RULE_IDS.VALUE_NEGATIVE);
    expect(r.field).toBe('source.energy[1]');
  });

  it('refuses auxiliary work in a different unit from the source', () => {
    const pump = convertStage({
      name: 'pump',
      lossModel: losslessTransferModel,
      inputs: { aux_energy_in: measuredValue(1, 'MJ', 'pump work') },
    });
    const r = refusalOf(simulation({}, [pump, deliver()]));
    expect(r.kind).toBe('InvalidUnit');
    expect(r.field).toBe('pump.inputs.aux_energy_in');
  });

  it('refuses a heat source at the reference temperature before any step runs', () => {
    const r = refusalOf(simulation({
      source: { carrier: { kind: 'heat', temperature: kelvin(280, 'source temperature') }, energy: electricSource([8, 8]).energy },
    }));
    expect(r.kind).toBe('InvalidTemperatureBoundary');
    expect(r.field).toBe('source.carrier.temperature');
    expect(r.details).toEqual({ T0: 280, Tb: 280 });
    expect(r.stepIndex).toBeUndefined();
  });

  it('refuses a chemical source without a dimensionless exergy factor before any step runs', () => {
    const r = refusalOf(simulation({
      source: { carrier: { kind: 'chemical', exergyFactor: measuredValue(94, '%', 'fuel factor') }, energy: electricSource([8, 8]).energy },
    }));
    expect(r.kind).toBe('InvalidUnit');
    expect(r.field).toBe('source.carrier.exergyFactor');
    expect(r.stepIndex).toBeUndefined();
  });

  it('rechecks boundary completeness against the scenario it runs on', () => {
    const inside = buildScenario({ boundaryElements: ['hx-1'] });
    const stages = [deliverStage({
      name: 'deliver',
      lossModel: deliveryLossModel,
      inputs: { delivery_efficiency: fraction(0.5, 'delivery efficiency') },
      component: { id: 'hx-1', requiredForDelivery: true },
    })];
    const chain = valueOf(createStageChainBuilder(stages).finalize(inside, config));
    const r = refusalOf(runSimulationV1({
      runLabel: 'pit',
      scenario,
      chain,
      timeAxis: hourlyAxis(2),
      source: electricSource([8, 8]),
    }, config));
    expect(r.kind).toBe('MissingBoundaryElement');
  });
});

describe('refusals during the run', () => {
  it('attaches the step and stage and returns no records', () => {
    const leaky: LossModelV1 = {
      id: 'leaky',
      requiredInputs: [],
      evaluate: ctx => ok({
        outflow: { energy: ctx.step.index === 1 ? ctx.inflow.energy + 1 : ctx.inflow.energy, carrier: ctx.inflow.carrier },
        loss: { energy: 0, carrier: { kind: 'ambient' } },
      }),
    };
    const result = simulation({}, [convertStage({ name: 'leaky', lossModel: leaky }), deliver()]);
    expect('value' in result).toBe(false);
    const r = refusalOf(result);
    expect(r.kind).toBe('ComputationIntegrityFailure');
    expect(r.ruleId).toBe(REFUSAL_RULE_IDS.INTEGRITY_ENERGY_NOT_CONSERVED);
    expect(r.stepIndex).toBe(1);
    expect(r.stage).toBe('leaky');
  });

});
