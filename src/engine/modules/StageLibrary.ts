/**
 * StageLibrary — generic loss models and stage factories.
 *
 * Loss models are parameterised entirely by the stage's ValueSpec inputs; none
 * knows which technology it stands for. A storage concept is described by
 * choosing stage kinds and filling in inputs, never by adding a branch here.
 *
 * Input conventions shared by every model:
 *
 *   aux_energy_in          auxiliary work per step (run energy unit); added to inflow
 *   outflow_temperature    K   — outflow is heat at this temperature
 *   outflow_exergy_factor  -   — outflow is a chemical carrier with this factor
 *   loss_temperature       K   — losses leave as heat at this temperature
 *
 * Without outflow_* inputs the outflow keeps the inflow's carrier; without
 * loss_temperature losses are rejected to the ambient and carry no exergy.
 * Outflow and loss temperatures must lie above the scenario's T0.
 *
 * The exported models are frozen and shared by every stage that uses them.
 */

import type { EngineResult } from '../../contracts/EngineOutputV1';
import { REFUSAL_RULE_IDS } from '../../contracts/refusal.ids';
import { ok, refuse } from '../guardrails/refusal';
import { requireBoundaryValidity, requireFraction, requireNonNegative, requireUnit } from '../guardrails/Guardrails';
import type { ScenarioV1 } from '../schema/ScenarioV1';
import type {
  ExergyCarrierV1,
  LossModelContextV1,
  LossModelOutputV1,
  LossModelV1,
  StageKind,
  StageV1,
} from '../schema/StageChainV1';
import type { ValueSpec } from '../schema/ValueSpecV1';
import { deepFreeze } from '../utils/freeze';

type StageInputs = Readonly<Record<string, ValueSpec>>;

const INPUT_UNITS: Record<string, string> = {
  efficiency: '-',
  delivery_efficiency: '-',
  performance_factor: '-',
  standing_loss_rate: '1/h',
  storage_duration: 'h',
  outflow_temperature: 'K',
  outflow_exergy_factor: '-',
  loss_temperature: 'K',
};

function requireInputUnit(inputs: StageInputs, name: string, stageName: string): EngineResult<true> {
  const v = inputs[name];
  if (v === undefined) return ok(true);
  const unit = requireUnit(v, INPUT_UNITS[name], `${stageName}.inputs.${name}`);
  return unit.ok ? ok(true) : unit;
}

function requireAboveReference(inputs: StageInputs, name: string, stageName: string, scenario: ScenarioV1): EngineResult<true> {
  const temperature = inputs[name];
  if (temperature === undefined) return ok(true);
  const valid = requireBoundaryValidity(scenario.T0, temperature);
  if (valid.ok) return ok(true);
  return { ok: false, refusal: { ...valid.refusal, field: `${stageName}.inputs.${name}`, stage: stageName } };
}

/** Unit and temperature checks for every conventional input the stage carries. */
function validateConventionalInputs(inputs: StageInputs, stageName: string, scenario: ScenarioV1): EngineResult<true> {
  for (const name of Object.keys(INPUT_UNITS)) {
    const unit = requireInputUnit(inputs, name, stageName);
    if (!unit.ok) return unit;
  }
  for (const name of ['outflow_temperature', 'loss_temperature']) {
    const above = requireAboveReference(inputs, name, stageName, scenario);
    if (!above.ok) return above;
  }
  if (inputs.outflow_temperature !== undefined && inputs.outflow_exergy_factor !== undefined) {
    return refuse('InvalidValue', REFUSAL_RULE_IDS.STAGE_INPUT_CONFLICT, {
      message: `Cannot build system because stage "${stageName}" declares both outflow_temperature and outflow_exergy_factor.`,
      why: 'An outflow is either heat at a temperature or a chemical carrier, not both.',
      field: `${stageName}.inputs.outflow_exergy_factor`,
    });
  }
  const factor = inputs.outflow_exergy_factor;
  if (factor !== undefined) {
    const nonNegative = requireNonNegative(factor, `${stageName}.inputs.outflow_exergy_factor`);
    if (!nonNegative.ok) return nonNegative;
  }
  return ok(true);
}

function outflowCarrier(ctx: LossModelContextV1): ExergyCarrierV1 {
  const { outflow_temperature: temperature, outflow_exergy_factor: exergyFactor } = ctx.inputs;
  if (temperature !== undefined) return { kind: 'heat', temperature };
  if (exergyFactor !== undefined) return { kind: 'chemical', exergyFactor };
  return ctx.inflow.carrier;
}

function lossCarrier(ctx: LossModelContextV1): ExergyCarrierV1 {
  const temperature = ctx.inputs.loss_temperature;
  return temperature !== undefined ? { kind: 'heat', temperature } : { kind: 'ambient' };
}

/** Energy entering the stage this step: upstream inflow plus auxiliary work. */
function supplied(ctx: LossModelContextV1): number {
  return ctx.inflow.energy + ctx.auxEnergy;
}

function splitByRetainedFraction(ctx: LossModelContextV1, retained: number): LossModelOutputV1 {
  const total = supplied(ctx);
  const out = total * retained;
  return {
    outflow: { energy: out, carrier: outflowCarrier(ctx) },
    loss: { energy: total - out, carrier: lossCarrier(ctx) },
  };
}

function fractionModel(id: string, input: string): LossModelV1 {
  return deepFreeze({
    id,
    requiredInputs: [input],
    validate(inputs, stageName, scenario) {
      const conventional = validateConventionalInputs(inputs, stageName, scenario);
      if (!conventional.ok) return conventional;
      const fraction = requireFraction(inputs[input], `${stageName}.inputs.${input}`);
      return fraction.ok ? ok(true) : fraction;
    },
    evaluate(ctx) {
      return ok(splitByRetainedFraction(ctx, ctx.inputs[input].value));
    },
  } satisfies LossModelV1);
}

// ── Loss models ───────────────────────────────────────────────────────────────

/** Outflow is a fixed fraction `efficiency` of the supplied energy. */
export const fixedEfficiencyLossModel: LossModelV1 = fractionModel('fixed-efficiency', 'efficiency');

/**
 * Delivery across the DH boundary with a fixed `delivery_efficiency`. The
 * delivered heat is valued at the scenario's Tb.
 */
export const deliveryLossModel: LossModelV1 = deepFreeze({
  ...fractionModel('delivery', 'delivery_efficiency'),
  evaluate(ctx) {
    const split = splitByRetainedFraction(ctx, ctx.inputs.delivery_efficiency.value);
    return ok({ ...split, outflow: { energy: split.outflow.energy, carrier: { kind: 'heat', temperature: ctx.scenario.Tb } } });
  },
} satisfies LossModelV1);

/**
 * Standing loss while energy is held: a `standing_loss_rate` fraction is lost
 * per hour over `storage_duration` hours, so (1 − rate)^duration is retained.
 */
export const standingLossModel: LossModelV1 = deepFreeze({
  id: 'standing-loss',
  requiredInputs: ['standing_loss_rate', 'storage_duration'],
  validate(inputs, stageName, scenario) {
    const conventional = validateConventionalInputs(inputs, stageName, scenario);
    if (!conventional.ok) return conventional;
    const rate = requireFraction(inputs.standing_loss_rate, `${stageName}.inputs.standing_loss_rate`);
    if (!rate.ok) return rate;
    const duration = requireNonNegative(inputs.storage_duration, `${stageName}.inputs.storage_duration`);
    return duration.ok ? ok(true) : duration;
  },
  evaluate(ctx) {
    const retained = Math.pow(1 - ctx.inputs.standing_loss_rate.value, ctx.inputs.storage_duration.value);
    return ok({
      ...splitByRetainedFraction(ctx, retained),
      variables: { retained_fraction: { value: retained, unit: '-' } },
    });
  },
} satisfies LossModelV1);

/** Passes everything supplied through; no loss. */
export const losslessTransferModel: LossModelV1 = deepFreeze({
  id: 'lossless-transfer',
  requiredInputs: [],
  validate: validateConventionalInputs,
  evaluate(ctx) {
    return ok(splitByRetainedFraction(ctx, 1));
  },
} satisfies LossModelV1);

/**
 * Work-driven uplift of ambient heat: outflow is `performance_factor` times the
 * supplied energy, the difference drawn from the environment. Outflow is heat
 * at `outflow_temperature`.
 *
 * The factor is bounded by the Carnot limit Tout / (Tout − T0) of the
 * scenario it is finalised against.
 */
export const ambientUpliftLossModel: LossModelV1 = deepFreeze({
  id: 'ambient-uplift',
  requiredInputs: ['performance_factor', 'outflow_temperature'],
  validate(inputs, stageName, scenario) {
    const conventional = validateConventionalInputs(inputs, stageName, scenario);
    if (!conventional.ok) return conventional;
    const factor = inputs.performance_factor;
    if (!(factor.value >= 1)) {
      return refuse('InvalidValue', REFUSAL_RULE_IDS.VALUE_OUT_OF_RANGE, {
        message: `Cannot build system because ${stageName}.inputs.performance_factor is ${factor.value}; it must be at least 1.`,
        why: 'Ambient uplift adds environmental heat to the supplied energy; a factor below 1 would be a loss, which belongs in a loss model.',
        field: `${stageName}.inputs.performance_factor`,
        details: { value: factor.value },
      });
    }
    const outflowTemperature = inputs.outflow_temperature.value;
    const carnotLimit = outflowTemperature / (outflowTemperature - scenario.T0.value);
    if (factor.value > carnotLimit) {
      return refuse('InvalidValue', REFUSAL_RULE_IDS.VALUE_OUT_OF_RANGE, {
        message: `Cannot build system because ${stageName}.inputs.performance_factor is ${factor.value}, above the Carnot limit ${carnotLimit} for an outflow at ${outflowTemperature} K against T0 ${scenario.T0.value} K.`,
        why: 'An uplift beyond the Carnot limit would deliver more exergy than the work it consumes.',
        field: `${stageName}.inputs.performance_factor`,
        details: { value: factor.value, limit: carnotLimit },
      });
    }
    return ok(true);
  },
  evaluate(ctx) {
    const total = supplied(ctx);
    const out = total * ctx.inputs.performance_factor.value;
    return ok({
      outflow: { energy: out, carrier: outflowCarrier(ctx) },
      loss: { energy: 0, carrier: lossCarrier(ctx) },
      ambientGain: out - total,
    });
  },
} satisfies LossModelV1);

// ── Stage factories ───────────────────────────────────────────────────────────

export interface StageDefinition {
  name: string;
  lossModel: LossModelV1;
  inputs?: Record<string, ValueSpec>;
  component?: StageV1['component'];
}

export function defineStage(kind: StageKind, definition: StageDefinition): StageV1 {
  return {
    kind,
    name: definition.name,
    lossModel: definition.lossModel,
    inputs: { ...definition.inputs },
    ...(definition.component !== undefined ? { component: definition.component } : {}),
  };
}

export const chargeStage = (definition: StageDefinition): StageV1 => defineStage('CHARGE', definition);
export const storeStage = (definition: StageDefinition): StageV1 => defineStage('STORE', definition);
export const convertStage = (definition: StageDefinition): StageV1 => defineStage('CONVERT', definition);
export const deliverStage = (definition: StageDefinition): StageV1 => defineStage('DELIVER', definition);
