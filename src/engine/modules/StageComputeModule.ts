/**
 * StageComputeModule — one stage, one time step.
 *
 * Order of work:
 *   1. Evaluate the stage's loss model on the upstream inflow plus aux work.
 *   2. Integrity: every flow finite and ≥ 0; energy conserved
 *      (in + aux + ambient = out + loss).
 *   3. Exergy of each flow from its carrier. A DELIVER stage's outflow is always
 *      valued as heat at the scenario's Tb.
 *   4. Second law: destroyed = in + aux − out − loss ≥ 0 (Exergy Core).
 *
 * Losses are attributed to this stage only. The stage never reaches up or
 * down the chain.
 */

import type { EngineResult } from '../../contracts/EngineOutputV1';
import { REFUSAL_RULE_IDS } from '../../contracts/refusal.ids';
import { conservationTolerance } from '../config/ScienceConfig';
import type { ScienceConfigV1 } from '../config/ScienceConfig';
import { ok, refuse } from '../guardrails/refusal';
import { requireConservation, requireNonNegativeFlow } from '../guardrails/Guardrails';
import type { ScenarioV1 } from '../schema/ScenarioV1';
import { AUX_ENERGY_INPUT } from '../schema/StageChainV1';
import type { ExergyCarrierV1, StageV1, StepContextV1 } from '../schema/StageChainV1';
import { derivedValue } from '../schema/ValueSpecV1';
import type { ValueSpec } from '../schema/ValueSpecV1';
import { exergyDestructionBalance, exergyOfFlow, exergyOfHeat } from './ExergyCoreModule';

/** Standard per-step variables, in record order. */
export const STAGE_VARIABLES = [
  'energy_in',
  'aux_energy_in',
  'ambient_energy_in',
  'energy_out',
  'energy_loss',
  'exergy_in',
  'aux_exergy_in',
  'exergy_out',
  'exergy_loss',
  'exergy_destroyed',
] as const;

export type StageVariableName = typeof STAGE_VARIABLES[number];

export interface StageInflowV1 {
  energy: number;
  exergy: number;
  unit: string;
  carrier: ExergyCarrierV1;
}

export interface StageStepInput {
  stage: StageV1;
  scenario: ScenarioV1;
  inflow: StageInflowV1;
  step: StepContextV1;
  config: Readonly<ScienceConfigV1>;
}

const TOOL = 'stage-compute';

export interface StageStepResultV1 {
  /** Standard variables of this stage and step, each a derived ValueSpec. */
  outputs: Record<StageVariableName, ValueSpec>;
  /** Loss-model observables, sorted by name. */
  extras: Array<{ name: string; value: ValueSpec }>;
  /** What the next stage receives. */
  outflow: StageInflowV1;
}

export function computeStageStep(input: StageStepInput): EngineResult<StageStepResultV1> {
  const { stage, scenario, inflow, step, config } = input;
  const unit = inflow.unit;
  const auxEnergy = stage.inputs[AUX_ENERGY_INPUT]?.value ?? 0;

  const evaluated = stage.lossModel.evaluate({
    stageName: stage.name,
    kind: stage.kind,
    inflow,
    auxEnergy,
    inputs: stage.inputs,
    scenario,
    step,
  });
  if (!evaluated.ok) return evaluated;
  const { outflow, loss } = evaluated.value;
  const ambientGain = evaluated.value.ambientGain ?? 0;

  // ── Energy integrity ──────────────────────────────────────────────────────

  const flows: Array<[string, number]> = [
    ['energy_out', outflow.energy],
    ['energy_loss', loss.energy],
    ['ambient_energy_in', ambientGain],
  ];
  for (const [name, value] of flows) {
    const flow = requireNonNegativeFlow(value, `${stage.name}.${name}`);
    if (!flow.ok) return flow;
  }

  const energySupplied = inflow.energy + auxEnergy + ambientGain;
  const conserved = requireConservation({
    ruleId: REFUSAL_RULE_IDS.INTEGRITY_ENERGY_NOT_CONSERVED,
    subject: `energy balance of stage ${stage.name}`,
    lhs: energySupplied,
    rhs: outflow.energy + loss.energy,
    tolerance: conservationTolerance(config, energySupplied),
  });
  if (!conserved.ok) return conserved;

  // ── Exergy ────────────────────────────────────────────────────────────────

  let exergyOut: number;
  let outCarrier: ExergyCarrierV1 = outflow.carrier;
  if (stage.kind === 'DELIVER') {
    outCarrier = { kind: 'heat', temperature: scenario.Tb };
    const delivered = exergyOfHeat(
      derivedValue(outflow.energy, unit, `${stage.name}.energy_out`, TOOL),
      scenario.T0,
      scenario.Tb,
    );
    if (!delivered.ok) return delivered;
    exergyOut = delivered.value.value;
  } else {
    const ex = exergyOfFlow(outflow.energy, unit, outflow.carrier, scenario, `${stage.name}.energy_out`);
    if (!ex.ok) return ex;
    exergyOut = ex.value;
  }

  const lossExergy = exergyOfFlow(loss.energy, unit, loss.carrier, scenario, `${stage.name}.energy_loss`);
  if (!lossExergy.ok) return lossExergy;

  const derived = (name: StageVariableName, value: number): ValueSpec =>
    derivedValue(value, unit, `${stage.name}.${name}`, TOOL);

  const exergyIn = derived('exergy_in', inflow.exergy);
  const auxExergyIn = derived('aux_exergy_in', auxEnergy);
  const exergyOutValue = derived('exergy_out', exergyOut);
  const exergyLossValue = derived('exergy_loss', lossExergy.value);
  const destroyed = exergyDestructionBalance({
    exergyIn,
    workIn: auxExergyIn,
    exergyOut: exergyOutValue,
    exergyLoss: exergyLossValue,
  }, config);
  if (!destroyed.ok) return destroyed;

  // ── Loss-model observables ────────────────────────────────────────────────

  const extras: Array<{ name: string; value: ValueSpec }> = [];
  const variables = Object.entries(evaluated.value.variables ?? {})
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  for (const [name, v] of variables) {
    if (!Number.isFinite(v.value) || !v.unit) {
      return refuse('ComputationIntegrityFailure', REFUSAL_RULE_IDS.INTEGRITY_INVALID_OBSERVABLE, {
        message: `Computation integrity failure: loss model "${stage.lossModel.id}" reported ${stage.name}.${name} as ${String(v.value)} "${v.unit}".`,
        why: 'Every recorded observable must be a finite number with a unit; anything else is a defect in the loss model.',
        field: `${stage.name}.${name}`,
        details: { value: String(v.value), unit: v.unit },
      });
    }
    extras.push({ name, value: derivedValue(v.value, v.unit, `${stage.name}.${name}`, `${TOOL}/${stage.lossModel.id}`) });
  }

  return ok({
    outputs: {
      energy_in: derived('energy_in', inflow.energy),
      aux_energy_in: derived('aux_energy_in', auxEnergy),
      ambient_energy_in: derived('ambient_energy_in', ambientGain),
      energy_out: derived('energy_out', outflow.energy),
      energy_loss: derived('energy_loss', loss.energy),
      exergy_in: exergyIn,
      aux_exergy_in: auxExergyIn,
      exergy_out: exergyOutValue,
      exergy_loss: exergyLossValue,
      exergy_destroyed: derived('exergy_destroyed', destroyed.value.value),
    },
    extras,
    outflow: { energy: outflow.energy, exergy: exergyOut, unit, carrier: outCarrier },
  });
}
