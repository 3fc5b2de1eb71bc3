import { describe, it, expect } from 'vitest';
import {
  ambientUpliftLossModel,
  defineStage,
  deliveryLossModel,
  fixedEfficiencyLossModel,
  losslessTransferModel,
  standingLossModel,
} from '../modules/StageLibrary';
import { REFUSAL_RULE_IDS } from '../../contracts/refusal.ids';
import type { LossModelContextV1 } from '../schema/StageChainV1';
import { measuredValue, type ValueSpec } from '../schema/ValueSpecV1';
import { buildScenario, fraction, kelvin, refusalOf, valueOf } from './exergyFixtures';

const scenario = buildScenario();

function context(inputs: Record<string, ValueSpec>, energy = 8, auxEnergy = 0): LossModelContextV1 {
  return {
    stageName: 's',
    kind: 'STORE',
    inflow: { energy, exergy: energy, unit: 'kWh', carrier: { kind: 'work' } },
    auxEnergy,
    inputs,
    scenario,
    step: { index: 0, time: 0, stepSize: 1, timeUnit: 'h' },
  };
}

function validate(model: typeof fixedEfficiencyLossModel, inputs: Record<string, ValueSpec>) {
  if (!model.validate) throw new Error(`${model.id} has no validate`);
  return model.validate(inputs, 'charge', scenario);
}

describe('fixedEfficiencyLossModel', () => {
  it('passes the efficiency fraction on and rejects the rest to the ambient', () => {
    const out = valueOf(fixedEfficiencyLossModel.evaluate(context({ efficiency: fraction(0.75, 'eta') })));
    expect(out.outflow.energy).toBe(6);
    expect(out.loss.energy).toBe(2);
    expect(out.loss.carrier).toEqual({ kind: 'ambient' });
    expect(out.outflow.carrier).toEqual({ kind: 'work' });
  });

  it('refuses an efficiency above 1', () => {
    const r = refusalOf(validate(fixedEfficiencyLossModel, { efficiency: fraction(1.2, 'eta') }));
    expect(r.ruleId).toBe(REFUSAL_RULE_IDS.VALUE_OUT_OF_RANGE);
    expect(r.field).toBe('charge.inputs.efficiency');
  });

  it('refuses an efficiency given as a percentage', () => {
    const r = refusalOf(validate(fixedEfficiencyLossModel, { efficiency: measuredValue(90, '%', 'eta') }));
    expect(r.kind).toBe('InvalidUnit');
    expect(r.field).toBe('charge.inputs.efficiency');
  });

  it('refuses an outflow that is both heat and a chemical carrier', () => {
    const r = refusalOf(validate(fixedEfficiencyLossModel, {
      efficiency: fraction(0.9, 'eta'),
      outflow_temperature: kelvin(360, 'outflow temperature'),
      outflow_exergy_factor: fraction(0.9, 'outflow factor'),
    }));
    expect(r.ruleId).toBe(REFUSAL_RULE_IDS.STAGE_INPUT_CONFLICT);
  });

  it('sends the outflow out as heat when an outflow temperature is given', () => {
    const temperature = kelvin(360, 'outflow temperature');
    const out = valueOf(fixedEfficiencyLossModel.evaluate(context({ efficiency: fraction(0.5, 'eta'), outflow_temperature: temperature })));
    expect(out.outflow.carrier).toEqual({ kind: 'heat', temperature });
  });
});

describe('standingLossModel', () => {
  it('retains (1 − rate)^duration and reports the retained fraction', () => {
    const out = valueOf(standingLossModel.evaluate(context({
      standing_loss_rate: measuredValue(0.5, '1/h', 'rate'),
      storage_duration: measuredValue(2, 'h', 'duration'),
    })));
    expect(out.outflow.energy).toBe(2);
    expect(out.loss.energy).toBe(6);
    expect(out.variables).toEqual({ retained_fraction: { value: 0.25, unit: '-' } });
  });

  it('refuses a negative storage duration', () => {
    const r = refusalOf(validate(standingLossModel, {
      standing_loss_rate: measuredValue(0.1, '1/h', 'rate'),
      storage_duration: measuredValue(-1, 'h', 'duration'),
    }));
    expect(r.ruleId).toBe(REFUSAL_RULE_IDS.VALUE_NEGATIVE);
    expect(r.field).toBe('charge.inputs.storage_duration');
  });
});

describe('deliveryLossModel', () => {
  it('values the delivered flow as heat at the scenario boundary temperature', () => {
    const out = valueOf(deliveryLossModel.evaluate(context({ delivery_efficiency: fraction(0.5, 'eta') })));
    expect(out.outflow.energy).toBe(4);
    expect(out.outflow.carrier).toEqual({ kind: 'heat', temperature: scenario.Tb });
  });
});

describe('losslessTransferModel', () => {
  it('passes inflow plus auxiliary work through', () => {
    const out = valueOf(losslessTransferModel.evaluate(context({}, 8, 2)));
    expect(out.outflow.energy).toBe(10);
    expect(out.loss.energy).toBe(0);
  });
});

describe('ambientUpliftLossModel', () => {
  it('multiplies supplied energy and reports the ambient gain', () => {
    const out = valueOf(ambientUpliftLossModel.evaluate(context({
      performance_factor: fraction(3, 'pf'),
      outflow_temperature: kelvin(350, 'outflow temperature'),
    }, 10)));
    expect(out.outflow.energy).toBe(30);
    expect(out.ambientGain).toBe(20);
    expect(out.loss.energy).toBe(0);
  });

  it('refuses a performance factor below 1', () => {
    const r = refusalOf(validate(ambientUpliftLossModel, {
      performance_factor: fraction(0.8, 'pf'),
      outflow_temperature: kelvin(350, 'outflow temperature'),
    }));
    expect(r.ruleId).toBe(REFUSAL_RULE_IDS.VALUE_OUT_OF_RANGE);
    expect(r.field).toBe('charge.inputs.performance_factor');
  });
});

describe('scenario-dependent checks', () => {
  it('refuses an outflow temperature at or below T0', () => {
    const r = refusalOf(validate(fixedEfficiencyLossModel, {
      efficiency: fraction(0.9, 'eta'),
      outflow_temperature: kelvin(280, 'outflow temperature'),
    }));
    expect(r.kind).toBe('InvalidTemperatureBoundary');
    expect(r.field).toBe('charge.inputs.outflow_temperature');
  });

  it('refuses a loss temperature below T0 on a model without other parameters', () => {
    const r = refusalOf(validate(losslessTransferModel, { loss_temperature: kelvin(270, 'loss temperature') }));
    expect(r.kind).toBe('InvalidTemperatureBoundary');
    expect(r.field).toBe('charge.inputs.loss_temperature');
  });

  it('bounds ambient uplift by the Carnot limit of the scenario', () => {
    const inputs = (pf: number) => ({ performance_factor: fraction(pf, 'pf'), outflow_temperature: kelvin(350, 'outflow temperature') });
    expect(validate(ambientUpliftLossModel, inputs(5)).ok).toBe(true);
    const r = refusalOf(validate(ambientUpliftLossModel, inputs(5.5)));
    expect(r.ruleId).toBe(REFUSAL_RULE_IDS.VALUE_OUT_OF_RANGE);
    expect(r.details).toEqual({ value: 5.5, limit: 5 });
  });
});

describe('shared loss models', () => {
  it('are frozen', () => {
    for (const model of [fixedEfficiencyLossModel, deliveryLossModel, standingLossModel, losslessTransferModel, ambientUpliftLossModel]) {
      expect(Object.isFrozen(model)).toBe(true);
      expect(Object.isFrozen(model.requiredInputs)).toBe(true);
    }
  });
});

describe('defineStage', () => {
  it('copies the inputs and omits an absent component', () => {
    const inputs = { efficiency: fraction(0.9, 'eta') };
    const stage = defineStage('CONVERT', { name: 'hx', lossModel: fixedEfficiencyLossModel, inputs });
    expect(stage.kind).toBe('CONVERT');
    expect(stage.inputs).toEqual(inputs);
    expect(stage.inputs).not.toBe(inputs);
    expect('component' in stage).toBe(false);
  });
});
