import type { EngineMetaV1, EngineOutputV1, EngineRefusal } from '../contracts/EngineOutputV1';
import { CONTRACT_VERSION, ENGINE_VERSION } from '../contracts/versions';
import { aggregateRunV1, normalizeToFunctionalUnit } from './BalanceBuilder';
import { getScienceConfig } from './config/ScienceConfig';
import type { ScienceConfigV1 } from './config/ScienceConfig';
import { createLogger } from './logging/logger';
import { buildProvenanceReportV1 } from './ProvenanceBuilder';
import { buildScenarioV1 } from './schema/ScenarioV1';
import type { ScenarioInputV1 } from './schema/ScenarioV1';
import { createStageChainBuilder } from './schema/StageChainV1';
import type { StageV1 } from './schema/StageChainV1';
import { runSimulationV1 } from './timeline/SimulationLoopV1';
import type { SourceProfileV1, TimeAxisV1 } from './timeline/SimulationLoopV1';

const log = createLogger('engine');

/** Everything needed to evaluate one storage concept end to end. */
export interface ExergyRunSpecV1 {
  runLabel: string;
  scenario: ScenarioInputV1;
  /** Stages in physical order; the last must be DELIVER. */
  stages: readonly StageV1[];
  timeAxis: TimeAxisV1;
  source: SourceProfileV1;
}

const META: EngineMetaV1 = Object.freeze({
  engineVersion: ENGINE_VERSION,
  contractVersion: CONTRACT_VERSION,
});

function refused(runLabel: string, result: EngineRefusal): EngineOutputV1 {
  log.info('run refused', { runLabel, kind: result.refusal.kind, ruleId: result.refusal.ruleId });
  return { status: 'refused', runLabel, refusal: result.refusal, meta: META };
}

/**
 * Scenario → chain → simulation → balance → functional unit → provenance.
 * The first refusal ends the run and is returned in place of a report.
 */
export function runExergyEngine(
  run: ExergyRunSpecV1,
  config: Readonly<ScienceConfigV1> = getScienceConfig(),
): EngineOutputV1 {
  const { runLabel } = run;

  const scenario = buildScenarioV1(run.scenario, config);
  if (!scenario.ok) return refused(runLabel, scenario);

  const chain = createStageChainBuilder(run.stages).finalize(scenario.value, config);
  if (!chain.ok) return refused(runLabel, chain);

  const simulation = runSimulationV1({
    runLabel,
    scenario: scenario.value,
    chain: chain.value,
    timeAxis: run.timeAxis,
    source: run.source,
  }, config);
  if (!simulation.ok) return refused(runLabel, simulation);

  const balance = aggregateRunV1(simulation.value, scenario.value, config);
  if (!balance.ok) return refused(runLabel, balance);

  const functionalUnit = normalizeToFunctionalUnit(balance.value, config);
  if (!functionalUnit.ok) return refused(runLabel, functionalUnit);

  const provenance = buildProvenanceReportV1(scenario.value, chain.value, run.source);

  log.info('run completed', {
    runLabel,
    records: simulation.value.records.length,
    efficiency: balance.value.exergyResult.efficiency.value,
    confidence: provenance.confidence.level,
  });

  return {
    status: 'completed',
    runLabel,
    records: simulation.value.records,
    balance: balance.value,
    functionalUnit: functionalUnit.value,
    provenance,
    meta: META,
  };
}

/**
 * Evaluate several storage concepts side by side. Runs are independent: one
 * refusal never affects another run's result.
 */
export function runExergyComparison(
  runs: readonly ExergyRunSpecV1[],
  config: Readonly<ScienceConfigV1> = getScienceConfig(),
): EngineOutputV1[] {
  return runs.map(run => runExergyEngine(run, config));
}
