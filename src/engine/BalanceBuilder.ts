import type {
  EngineRefusal,
  EngineResult,
  FunctionalUnitViewV1,
  StageBalanceV1,
  SystemBalanceV1,
  TimeSeriesRecordV1,
} from '../contracts/EngineOutputV1';
import { REFUSAL_RULE_IDS } from '../contracts/refusal.ids';
import { conservationTolerance, getScienceConfig } from './config/ScienceConfig';
import type { ScienceConfigV1 } from './config/ScienceConfig';
import { ok, refuse } from './guardrails/refusal';
import { requireConservation, requireNonNegativeDestruction } from './guardrails/Guardrails';
import { createLogger } from './logging/logger';
import { evaluateDeliveredHeat } from './modules/ExergyCoreModule';
import { STAGE_VARIABLES } from './modules/StageComputeModule';
import type { StageVariableName } from './modules/StageComputeModule';
import { convertEnergyMagnitude } from './normalizer/UnitNormalizer';
import type { ScenarioV1 } from './schema/ScenarioV1';
import { derivedValue } from './schema/ValueSpecV1';
import type { SimulationRunV1 } from './timeline/SimulationLoopV1';

const log = createLogger('balance');

const TOOL = 'balance-builder';

/**
 * Rolls a run's time series up into per-stage totals and the system exergy
 * balance:
 *
 *   systemInputExergy = deliveredExergy + Σ stage destruction
 *
 * where a stage's destruction is everything it took in minus what it passed on
 * (exergy_in + aux_exergy_in − exergy_out), i.e. its internal destruction plus
 * the exergy of its losses. Only the records are used, so the balance is an
 * independent check on the stage computations that produced them.
 */
export function aggregateRunV1(
  run: SimulationRunV1,
  scenario: ScenarioV1,
  config: Readonly<ScienceConfigV1> = getScienceConfig(),
): EngineResult<SystemBalanceV1> {
  const result = aggregate(run, scenario, config);
  if (!result.ok) {
    log.error(result.refusal.message, {
      runLabel: run.runLabel,
      ruleId: result.refusal.ruleId,
      stage: result.refusal.stage,
      field: result.refusal.field,
    });
  }
  return result;
}

function incomplete(run: SimulationRunV1, detail: string, stage?: string): EngineRefusal {
  const refusal = refuse('ComputationIntegrityFailure', REFUSAL_RULE_IDS.INTEGRITY_SERIES_INCOMPLETE, {
    message: `Computation integrity failure: the time series of run "${run.runLabel}" is incomplete (${detail}).`,
    why: 'A balance over a series with missing or unexpected records would silently drop or double-count exergy.',
    field: 'records',
  });
  return stage === undefined ? refusal : { ok: false, refusal: { ...refusal.refusal, stage } };
}

function collectTotals(
  run: SimulationRunV1,
): EngineResult<Map<string, { totals: Record<StageVariableName, number>; counts: Record<StageVariableName, number> }>> {
  const standard = new Set<string>(STAGE_VARIABLES);
  const byStage = new Map<string, { totals: Record<StageVariableName, number>; counts: Record<StageVariableName, number> }>();
  for (const stage of run.stages) {
    const zero = (): Record<StageVariableName, number> => ({
      energy_in: 0, aux_energy_in: 0, ambient_energy_in: 0, energy_out: 0, energy_loss: 0,
      exergy_in: 0, aux_exergy_in: 0, exergy_out: 0, exergy_loss: 0, exergy_destroyed: 0,
    });
    byStage.set(stage.name, { totals: zero(), counts: zero() });
  }

  for (const record of run.records) {
    const entry = byStage.get(record.stageName);
    if (entry === undefined) return incomplete(run, `record for unknown stage "${record.stageName}"`);
    if (!isStageVariable(record, standard)) continue;
    if (record.unit !== run.energyUnit) {
      return incomplete(run, `${record.stageName}.${record.variableName} is in "${record.unit}", not "${run.energyUnit}"`, record.stageName);
    }
    entry.totals[record.variableName] += record.value;
    entry.counts[record.variableName] += 1;
  }

  for (const [stageName, entry] of byStage) {
    for (const variable of STAGE_VARIABLES) {
      if (entry.counts[variable] !== run.stepCount) {
        return incomplete(run, `${stageName}.${variable} has ${entry.counts[variable]} of ${run.stepCount} steps`, stageName);
      }
    }
  }
  return ok(byStage);
}

function isStageVariable(
  record: TimeSeriesRecordV1,
  standard: ReadonlySet<string>,
): record is TimeSeriesRecordV1 & { variableName: StageVariableName } {
  return standard.has(record.variableName);
}

function aggregate(
  run: SimulationRunV1,
  scenario: ScenarioV1,
  config: Readonly<ScienceConfigV1>,
): EngineResult<SystemBalanceV1> {
  if (run.stages.length === 0) return incomplete(run, 'run has no stages');

  const collected = collectTotals(run);
  if (!collected.ok) return collected;

  const stages: StageBalanceV1[] = [];
  for (const [position, stage] of run.stages.entries()) {
    const entry = collected.value.get(stage.name);
    if (entry === undefined) return incomplete(run, `no records for stage "${stage.name}"`, stage.name);
    const t = entry.totals;

    const exergySupplied = t.exergy_in + t.aux_exergy_in;
    const exergyDestruction = exergySupplied - t.exergy_out;
    const tolerance = conservationTolerance(config, exergySupplied);

    const split = requireConservation({
      ruleId: REFUSAL_RULE_IDS.INTEGRITY_STAGE_SPLIT_VIOLATED,
      subject: `exergy split of stage ${stage.name}`,
      lhs: exergyDestruction,
      rhs: t.exergy_destroyed + t.exergy_loss,
      tolerance,
    });
    if (!split.ok) return { ok: false, refusal: { ...split.refusal, stage: stage.name } };

    const secondLaw = requireNonNegativeDestruction(t.exergy_destroyed, tolerance, stage.name);
    if (!secondLaw.ok) return { ok: false, refusal: { ...secondLaw.refusal, stage: stage.name } };

    stages.push({
      stageName: stage.name,
      kind: stage.kind,
      position,
      energyIn: t.energy_in,
      auxEnergyIn: t.aux_energy_in,
      ambientEnergyIn: t.ambient_energy_in,
      energyOut: t.energy_out,
      energyLoss: t.energy_loss,
      exergyIn: t.exergy_in,
      auxExergyIn: t.aux_exergy_in,
      exergyOut: t.exergy_out,
      exergyLoss: t.exergy_loss,
      exergyDestroyed: t.exergy_destroyed,
      exergyDestruction,
    });
  }

  const first = stages[0];
  const last = stages[stages.length - 1];
  const systemInputExergy = first.exergyIn + stages.reduce((sum, s) => sum + s.auxExergyIn, 0);
  const deliveredExergy = last.exergyOut;
  const deliveredEnergy = last.energyOut;
  const totalDestruction = stages.reduce((sum, s) => sum + s.exergyDestruction, 0);
  const residual = systemInputExergy - deliveredExergy - totalDestruction;
  const tolerance = conservationTolerance(config, systemInputExergy);

  const identity = requireConservation({
    ruleId: REFUSAL_RULE_IDS.INTEGRITY_BALANCE_VIOLATED,
    subject: `system exergy balance of run ${run.runLabel}`,
    lhs: systemInputExergy,
    rhs: deliveredExergy + totalDestruction,
    tolerance,
  });
  if (!identity.ok) return identity;

  const exergyResult = evaluateDeliveredHeat(
    scenario,
    derivedValue(deliveredEnergy, run.energyUnit, 'delivered_heat', TOOL, { energyKind: 'thermal' }),
    derivedValue(systemInputExergy, run.energyUnit, 'system_input_exergy', TOOL),
    config,
  );
  if (!exergyResult.ok) return exergyResult;

  // The delivered-heat exergy from the core must match what the DELIVER stage reported.
  const delivered = requireConservation({
    ruleId: REFUSAL_RULE_IDS.INTEGRITY_BALANCE_VIOLATED,
    subject: `delivered exergy of run ${run.runLabel}`,
    lhs: exergyResult.value.exergyValue.value,
    rhs: deliveredExergy,
    tolerance: conservationTolerance(config, deliveredExergy),
  });
  if (!delivered.ok) return delivered;

  return ok({
    runLabel: run.runLabel,
    energyUnit: run.energyUnit,
    stepCount: run.stepCount,
    stages,
    systemInputExergy,
    deliveredExergy,
    deliveredEnergy,
    totalDestruction,
    residual,
    tolerance,
    exergyResult: exergyResult.value,
  });
}

// ── Functional unit ───────────────────────────────────────────────────────────

/**
 * Rescale a balance so delivered heat equals the configured functional unit
 * (1 MWh delivered to the DH boundary by default).
 */
export function normalizeToFunctionalUnit(
  balance: SystemBalanceV1,
  config: Readonly<ScienceConfigV1> = getScienceConfig(),
): EngineResult<FunctionalUnitViewV1> {
  const fu = config.functionalUnit;
  const toUnit = convertEnergyMagnitude(1, balance.energyUnit, fu.unit);
  if (toUnit === undefined) {
    return refuse('InvalidUnit', REFUSAL_RULE_IDS.UNIT_UNKNOWN, {
      message: `Cannot express run "${balance.runLabel}" per functional unit because "${balance.energyUnit}" cannot be converted to "${fu.unit}".`,
      why: 'The functional unit compares systems per unit of delivered heat; both must be recognised energy units.',
      field: 'energyUnit',
      details: { from: balance.energyUnit, to: fu.unit },
    });
  }

  const deliveredInUnit = balance.deliveredEnergy * toUnit;
  if (!(deliveredInUnit > 0)) {
    return refuse('InvalidValue', REFUSAL_RULE_IDS.FUNCTIONAL_UNIT_NO_DELIVERY, {
      message: `Cannot express run "${balance.runLabel}" per functional unit because it delivered no heat.`,
      why: `The functional unit is ${fu.description}; a run that delivers nothing has no per-unit result.`,
      field: 'deliveredEnergy',
      details: { deliveredEnergy: balance.deliveredEnergy, unit: balance.energyUnit },
    });
  }

  const scale = fu.deliveredHeat / deliveredInUnit;
  const perUnit = (value: number): number => value * toUnit * scale;
  return ok({
    deliveredHeat: fu.deliveredHeat,
    unit: fu.unit,
    description: fu.description,
    scale,
    systemInputExergy: perUnit(balance.systemInputExergy),
    deliveredExergy: perUnit(balance.deliveredExergy),
    totalDestruction: perUnit(balance.totalDestruction),
    stages: balance.stages.map(s => ({ stageName: s.stageName, exergyDestruction: perUnit(s.exergyDestruction) })),
  });
}
