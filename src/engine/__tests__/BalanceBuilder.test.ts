import { describe, it, expect } from 'vitest';
import { aggregateRunV1, normalizeToFunctionalUnit } from '../BalanceBuilder';
import { createScienceConfig } from '../config/ScienceConfig';
import { createStageChainBuilder } from '../schema/StageChainV1';
import { runSimulationV1, type SimulationRunV1 } from '../timeline/SimulationLoopV1';
import { REFUSAL_RULE_IDS } from '../../contracts/refusal.ids';
import type { TimeSeriesRecordV1 } from '../../contracts/EngineOutputV1';
import {
  buildScenario,
  config,
  electricSource,
  hourlyAxis,
  refusalOf,
  threeStageChain,
  valueOf,
} from './exergyFixtures';

const scenario = buildScenario();

// 8 kWh of electricity per step for two hourly steps through charge → store → deliver.
function referenceRun(): SimulationRunV1 {
  const chain = valueOf(createStageChainBuilder(threeStageChain()).finalize(scenario, config));
  return valueOf(runSimulationV1({
    runLabel: 'pit',
    scenario,
    chain,
    timeAxis: hourlyAxis(2),
    source: electricSource([8, 8]),
  }, config));
}

function tamper(run: SimulationRunV1, index: number, patch: Partial<TimeSeriesRecordV1>): SimulationRunV1 {
  return { ...run, records: run.records.map((r, i) => (i === index ? { ...r, ...patch } : r)) };
}

// Record layout of step 0: charge 0–9, store 10–20 (20 = retained_fraction), deliver 21–30.
const STORE_EXERGY_OUT = 17;
const STORE_EXERGY_LOSS = 18;
const STORE_EXERGY_DESTROYED = 19;
const DELIVER_EXERGY_IN = 26;
const DELIVER_EXERGY_DESTROYED = 30;

describe('aggregateRunV1', () => {
  it('closes the system balance and reports per-stage destruction', () => {
    const balance = valueOf(aggregateRunV1(referenceRun(), scenario, config));
    expect(balance.systemInputExergy).toBe(16);
    expect(balance.deliveredEnergy).toBe(2);
    expect(balance.deliveredExergy).toBeCloseTo(0.4, 12);
    expect(balance.totalDestruction).toBeCloseTo(15.6, 12);
    expect(Math.abs(balance.residual)).toBeLessThanOrEqual(balance.tolerance);
    expect(balance.stages.map(s => s.stageName)).toEqual(['charge', 'store', 'deliver']);
    expect(balance.stages[0].exergyDestruction).toBeCloseTo(16 - 16 / 9, 12);
    expect(balance.stages[1].exergyDestruction).toBeCloseTo(8 / 9, 12);
    expect(balance.stages[1].energyLoss).toBe(4);
  });

  it('evaluates delivered heat through the exergy core', () => {
    const { exergyResult } = valueOf(aggregateRunV1(referenceRun(), scenario, config));
    expect(exergyResult.exergyValue.value).toBeCloseTo(0.4, 12);
    expect(exergyResult.efficiency.value).toBeCloseTo(0.025, 12);
    expect(exergyResult.destruction.value).toBeCloseTo(15.6, 12);
    expect(exergyResult.exergyValue.unit).toBe('kWh');
  });

  it('refuses a series with a missing record', () => {
    const run = referenceRun();
    const r = refusalOf(aggregateRunV1({ ...run, records: run.records.slice(1) }, scenario, config));
    expect(r.ruleId).toBe(REFUSAL_RULE_IDS.INTEGRITY_SERIES_INCOMPLETE);
    expect(r.stage).toBe('charge');
    expect(r.message).toContain('charge.energy_in has 1 of 2 steps');
  });

  it('refuses records for a stage the run does not have', () => {
    const run = referenceRun();
    const r = refusalOf(aggregateRunV1(tamper(run, 0, { stageName: 'ghost' }), scenario, config));
    expect(r.ruleId).toBe(REFUSAL_RULE_IDS.INTEGRITY_SERIES_INCOMPLETE);
    expect(r.message).toContain('unknown stage "ghost"');
  });

  it('refuses a standard variable in another unit', () => {
    const r = refusalOf(aggregateRunV1(tamper(referenceRun(), 0, { unit: 'MWh' }), scenario, config));
    expect(r.ruleId).toBe(REFUSAL_RULE_IDS.INTEGRITY_SERIES_INCOMPLETE);
    expect(r.stage).toBe('charge');
  });

  it('refuses a stage whose destruction and loss do not add up', () => {
    const run = referenceRun();
    const bumped = tamper(run, STORE_EXERGY_OUT, { value: run.records[STORE_EXERGY_OUT].value + 0.1 });
    const r = refusalOf(aggregateRunV1(bumped, scenario, config));
    expect(r.ruleId).toBe(REFUSAL_RULE_IDS.INTEGRITY_STAGE_SPLIT_VIOLATED);
    expect(r.stage).toBe('store');
  });

  it('refuses negative total destruction in a stage', () => {
    const run = referenceRun();
    const shifted = tamper(
      tamper(run, STORE_EXERGY_DESTROYED, { value: run.records[STORE_EXERGY_DESTROYED].value - 1 }),
      STORE_EXERGY_LOSS,
      { value: run.records[STORE_EXERGY_LOSS].value + 1 },
    );
    const r = refusalOf(aggregateRunV1(shifted, scenario, config));
    expect(r.ruleId).toBe(REFUSAL_RULE_IDS.INTEGRITY_NEGATIVE_DESTRUCTION);
    expect(r.stage).toBe('store');
  });

  it('refuses a system balance that does not close', () => {
    const run = referenceRun();
    const inflated = tamper(
      tamper(run, DELIVER_EXERGY_IN, { value: run.records[DELIVER_EXERGY_IN].value + 0.1 }),
      DELIVER_EXERGY_DESTROYED,
      { value: run.records[DELIVER_EXERGY_DESTROYED].value + 0.1 },
    );
    const r = refusalOf(aggregateRunV1(inflated, scenario, config));
    expect(r.kind).toBe('ComputationIntegrityFailure');
    expect(r.ruleId).toBe(REFUSAL_RULE_IDS.INTEGRITY_BALANCE_VIOLATED);
  });
});

describe('normalizeToFunctionalUnit', () => {
  it('rescales the run to 1 MWh delivered', () => {
    const balance = valueOf(aggregateRunV1(referenceRun(), scenario, config));
    const fu = valueOf(normalizeToFunctionalUnit(balance, config));
    expect(fu.deliveredHeat).toBe(1);
    expect(fu.unit).toBe('MWh');
    expect(fu.scale).toBeCloseTo(500, 9);
    expect(fu.systemInputExergy).toBeCloseTo(8, 9);
    expect(fu.deliveredExergy).toBeCloseTo(0.2, 9);
    expect(fu.stages.map(s => s.stageName)).toEqual(['charge', 'store', 'deliver']);
  });

  it('follows a configured functional unit', () => {
    const perThousandKWh = createScienceConfig({ functionalUnit: { deliveredHeat: 1000, unit: 'kWh' } });
    const balance = valueOf(aggregateRunV1(referenceRun(), scenario, perThousandKWh));
    const fu = valueOf(normalizeToFunctionalUnit(balance, perThousandKWh));
    expect(fu.scale).toBe(500);
    expect(fu.systemInputExergy).toBe(8000);
  });

  it('refuses a run that delivered nothing', () => {
    const balance = valueOf(aggregateRunV1(referenceRun(), scenario, config));
    const r = refusalOf(normalizeToFunctionalUnit({ ...balance, deliveredEnergy: 0 }, config));
    expect(r.ruleId).toBe(REFUSAL_RULE_IDS.FUNCTIONAL_UNIT_NO_DELIVERY);
  });

  it('refuses an energy unit it cannot convert', () => {
    const balance = valueOf(aggregateRunV1(referenceRun(), scenario, config));
    const r = refusalOf(normalizeToFunctionalUnit({ ...balance, energyUnit: 'therm' }, config));
    expect(r.kind).toBe('InvalidUnit');
    expect(r.field).toBe('energyUnit');
  });
});
