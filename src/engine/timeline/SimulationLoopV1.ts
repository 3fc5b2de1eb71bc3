/**
 * SimulationLoopV1 — deterministic time-stepped execution of a StageChain.
 *
 * Time axis: t_k = start + k · stepSize for k = 0 … stepCount − 1.
 *
 * Within a step, stages run strictly in chain order. The first stage consumes
 * the source profile's energy for that step; every later stage consumes its
 * predecessor's outflow from the same step. Nothing reads a future step.
 *
 * Records are emitted per (step, stage, variable) in this order:
 *   energy_in, aux_energy_in, ambient_energy_in, energy_out, energy_loss,
 *   exergy_in, aux_exergy_in, exergy_out, exergy_loss, exergy_destroyed,
 *   then loss-model extras sorted by name.
 *
 * The source carrier is valued once before the first step, so a heat source at
 * or below T0 refuses without step context. A refusal anywhere halts the run. It is returned with the step index and
 * stage name attached and no records at all: a partial series of an invalid
 * run is never handed out.
 */

import type { EngineRefusal, EngineResult, TimeSeriesRecordV1 } from '../../contracts/EngineOutputV1';
import { REFUSAL_RULE_IDS } from '../../contracts/refusal.ids';
import { getScienceConfig } from '../config/ScienceConfig';
import type { ScienceConfigV1 } from '../config/ScienceConfig';
import { ok, refuse, withStepContext } from '../guardrails/refusal';
import {
  requireBoundaryCompleteness,
  requireNonNegative,
  requireProvenance,
  requireUnit,
} from '../guardrails/Guardrails';
import { createLogger } from '../logging/logger';
import { exergyOfFlow } from '../modules/ExergyCoreModule';
import { computeStageStep, STAGE_VARIABLES } from '../modules/StageComputeModule';
import type { StageInflowV1 } from '../modules/StageComputeModule';
import { isEnergyUnit, requireUnambiguousEnergy } from '../normalizer/UnitNormalizer';
import type { ScenarioV1 } from '../schema/ScenarioV1';
import { AUX_ENERGY_INPUT } from '../schema/StageChainV1';
import type { ExergyCarrierV1, StageChainV1, StageKind } from '../schema/StageChainV1';
import type { ValueSpec } from '../schema/ValueSpecV1';

const log = createLogger('simulation');

export interface TimeAxisV1 {
  start: number;
  stepSize: number;
  stepCount: number;
  /** Unit of `start` and `stepSize`, e.g. "h". */
  unit: string;
}

/** Energy entering the first stage, one ValueSpec per step. */
export interface SourceProfileV1 {
  carrier: ExergyCarrierV1;
  energy: readonly ValueSpec[];
}

export interface SimulationInputV1 {
  runLabel: string;
  scenario: ScenarioV1;
  chain: StageChainV1;
  timeAxis: TimeAxisV1;
  source: SourceProfileV1;
}

export interface SimulationRunV1 {
  runLabel: string;
  records: readonly TimeSeriesRecordV1[];
  stepCount: number;
  energyUnit: string;
  timeAxis: Readonly<TimeAxisV1>;
  stages: ReadonlyArray<{ name: string; kind: StageKind }>;
}

// ── Pre-run validation ────────────────────────────────────────────────────────

function validateTimeAxis(axis: TimeAxisV1): EngineResult<TimeAxisV1> {
  const problems: string[] = [];
  if (!Number.isFinite(axis.start)) problems.push('timeAxis.start');
  if (!(Number.isFinite(axis.stepSize) && axis.stepSize > 0)) problems.push('timeAxis.stepSize');
  if (!(Number.isInteger(axis.stepCount) && axis.stepCount >= 1)) problems.push('timeAxis.stepCount');
  if (!axis.unit) problems.push('timeAxis.unit');
  if (problems.length > 0) {
    return refuse('InvalidValue', REFUSAL_RULE_IDS.RUN_TIME_AXIS_INVALID, {
      message: `Cannot run simulation because the time axis is invalid (${problems.join(', ')}).`,
      why: 'The time axis needs a finite start, a positive fixed step size, at least one step and a unit.',
      field: problems[0],
      missing: problems,
    });
  }
  return ok(axis);
}

/** Checks every source value and returns the run's single energy unit. */
function validateSource(source: SourceProfileV1, stepCount: number): EngineResult<string> {
  if (source.energy.length !== stepCount) {
    return refuse('InvalidValue', REFUSAL_RULE_IDS.RUN_SOURCE_LENGTH_MISMATCH, {
      message: `Cannot run simulation because the source profile has ${source.energy.length} values for ${stepCount} steps.`,
      why: 'Each time step needs exactly one source energy value; gaps are never filled in.',
      field: 'source.energy',
      details: { values: source.energy.length, steps: stepCount },
    });
  }

  const energyUnit = source.energy[0].unit;
  for (const [k, v] of source.energy.entries()) {
    const field = `source.energy[${k}]`;
    const provenance = requireProvenance(v, field);
    if (!provenance.ok) return provenance;
    if (!isEnergyUnit(v.unit)) {
      return refuse('InvalidUnit', REFUSAL_RULE_IDS.UNIT_UNKNOWN, {
        message: `Cannot run simulation because ${field} is in "${v.unit}", which is not an energy unit.`,
        why: 'Source values must be energies per time step in one recognised energy unit.',
        field: `${field}.unit`,
        details: { unit: v.unit },
      });
    }
    const unit = requireUnit(v, energyUnit, field);
    if (!unit.ok) return unit;
    const unambiguous = requireUnambiguousEnergy(v);
    if (!unambiguous.ok) return unambiguous;
    const nonNegative = requireNonNegative(v, field);
    if (!nonNegative.ok) return nonNegative;
  }
  return ok(energyUnit);
}

/** Values the source carrier once so a carrier at or below T0 refuses before any step runs. */
function validateSourceCarrier(carrier: ExergyCarrierV1, energyUnit: string, scenario: ScenarioV1): EngineResult<ExergyCarrierV1> {
  const valued = exergyOfFlow(0, energyUnit, carrier, scenario, 'source');
  if (valued.ok) return ok(carrier);
  if (carrier.kind !== 'heat') return valued;
  return { ok: false, refusal: { ...valued.refusal, field: 'source.carrier.temperature' } };
}

function validateAuxInputs(chain: StageChainV1, energyUnit: string): EngineResult<StageChainV1> {
  for (const stage of chain.stages) {
    const aux = stage.inputs[AUX_ENERGY_INPUT];
    if (aux === undefined) continue;
    const field = `${stage.name}.inputs.${AUX_ENERGY_INPUT}`;
    const unit = requireUnit(aux, energyUnit, field);
    if (!unit.ok) return unit;
    const unambiguous = requireUnambiguousEnergy(aux);
    if (!unambiguous.ok) return unambiguous;
    const nonNegative = requireNonNegative(aux, field);
    if (!nonNegative.ok) return nonNegative;
  }
  return ok(chain);
}

// ── Run ───────────────────────────────────────────────────────────────────────

function halt(runLabel: string, result: EngineRefusal): EngineRefusal {
  const { refusal } = result;
  const context = {
    runLabel,
    kind: refusal.kind,
    ruleId: refusal.ruleId,
    stage: refusal.stage,
    stepIndex: refusal.stepIndex,
    field: refusal.field,
  };
  if (refusal.category === 'computation_integrity') {
    log.error(refusal.message, context);
  } else {
    log.warn(refusal.message, context);
  }
  return result;
}

export function runSimulationV1(
  input: SimulationInputV1,
  config: Readonly<ScienceConfigV1> = getScienceConfig(),
): EngineResult<SimulationRunV1> {
  const { runLabel, scenario, chain, timeAxis, source } = input;

  const axis = validateTimeAxis(timeAxis);
  if (!axis.ok) return halt(runLabel, axis);
  const sourceUnit = validateSource(source, timeAxis.stepCount);
  if (!sourceUnit.ok) return halt(runLabel, sourceUnit);
  const energyUnit = sourceUnit.value;
  const carrier = validateSourceCarrier(source.carrier, energyUnit, scenario);
  if (!carrier.ok) return halt(runLabel, carrier);
  const aux = validateAuxInputs(chain, energyUnit);
  if (!aux.ok) return halt(runLabel, aux);
  const complete = requireBoundaryCompleteness(scenario, chain.stages);
  if (!complete.ok) return halt(runLabel, complete);

  log.debug('run start', { runLabel, scenario: scenario.name, stages: chain.stages.length, steps: timeAxis.stepCount });

  const records: TimeSeriesRecordV1[] = [];
  for (let k = 0; k < timeAxis.stepCount; k++) {
    const time = timeAxis.start + k * timeAxis.stepSize;
    const step = { index: k, time, stepSize: timeAxis.stepSize, timeUnit: timeAxis.unit };
    const energy = source.energy[k].value;

    const sourceExergy = exergyOfFlow(energy, energyUnit, source.carrier, scenario, `source.energy[${k}]`);
    if (!sourceExergy.ok) return halt(runLabel, withStepContext(sourceExergy, k, chain.stages[0].name));

    let inflow: StageInflowV1 = { energy, exergy: sourceExergy.value, unit: energyUnit, carrier: source.carrier };
    for (const stage of chain.stages) {
      const computed = computeStageStep({ stage, scenario, inflow, step, config });
      if (!computed.ok) return halt(runLabel, withStepContext(computed, k, stage.name));

      const named = [
        ...STAGE_VARIABLES.map(name => ({ name, value: computed.value.outputs[name] })),
        ...computed.value.extras,
      ];
      for (const { name, value } of named) {
        records.push({
          time,
          stageName: stage.name,
          variableName: name,
          value: value.value,
          unit: value.unit,
          sourceType: value.sourceType,
        });
      }
      inflow = computed.value.outflow;
    }
  }

  log.debug('run finished', { runLabel, records: records.length });

  return ok({
    runLabel,
    records: Object.freeze(records),
    stepCount: timeAxis.stepCount,
    energyUnit,
    timeAxis: Object.freeze({ ...timeAxis }),
    stages: Object.freeze(chain.stages.map(s => Object.freeze({ name: s.name, kind: s.kind }))),
  });
}
