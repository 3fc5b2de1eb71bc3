// Public API of the district-heating boundary exergy engine.

export { runExergyEngine, runExergyComparison } from './engine/Engine';
export type { ExergyRunSpecV1 } from './engine/Engine';

export { aggregateRunV1, normalizeToFunctionalUnit } from './engine/BalanceBuilder';
export { buildProvenanceReportV1 } from './engine/ProvenanceBuilder';

export {
  createScienceConfig,
  initScienceConfig,
  getScienceConfig,
  conservationTolerance,
  DEFAULT_SCIENCE_CONFIG,
} from './engine/config/ScienceConfig';
export type {
  BoundaryGlidePolicy,
  ScienceConfigOverrides,
  ScienceConfigV1,
} from './engine/config/ScienceConfig';

export * from './engine/guardrails/Guardrails';
export { ok, refuse, withStepContext } from './engine/guardrails/refusal';

export { createLogger } from './engine/logging/logger';
export type { Logger, LogLevel } from './engine/logging/logger';

export {
  exergyOfHeat,
  exergyEfficiency,
  exergyDestructionBalance,
  exergyOfFlow,
  evaluateDeliveredHeat,
} from './engine/modules/ExergyCoreModule';
export type { DestructionBalanceInput } from './engine/modules/ExergyCoreModule';

export {
  fixedEfficiencyLossModel,
  standingLossModel,
  deliveryLossModel,
  losslessTransferModel,
  ambientUpliftLossModel,
  defineStage,
  chargeStage,
  storeStage,
  convertStage,
  deliverStage,
} from './engine/modules/StageLibrary';
export type { StageDefinition } from './engine/modules/StageLibrary';

export { computeStageStep, STAGE_VARIABLES } from './engine/modules/StageComputeModule';
export type { StageStepResultV1, StageVariableName } from './engine/modules/StageComputeModule';

export {
  normalizeTemperature,
  normalizeEnergy,
  energyUnitFactor,
  requireUnambiguousEnergy,
} from './engine/normalizer/UnitNormalizer';

export { buildScenarioV1, reviseScenarioV1, glideTemperature } from './engine/schema/ScenarioV1';
export type { ScenarioInputV1, ScenarioV1 } from './engine/schema/ScenarioV1';

export {
  AUX_ENERGY_INPUT,
  STAGE_KINDS,
  createStageChainBuilder,
  reviseStageChain,
  validateStages,
} from './engine/schema/StageChainV1';
export type {
  ExergyCarrierV1,
  LossModelContextV1,
  LossModelOutputV1,
  LossModelV1,
  StageChainBuilder,
  StageChainV1,
  StageKind,
  StageV1,
} from './engine/schema/StageChainV1';

export {
  createValueSpec,
  measuredValue,
  assumedValue,
  derivedValue,
  externalValue,
  valueSpecEquals,
  describeValueSpec,
} from './engine/schema/ValueSpecV1';
export type { SourceType, ValueSpec, ValueSpecMeta } from './engine/schema/ValueSpecV1';

export { runSimulationV1 } from './engine/timeline/SimulationLoopV1';
export type { SimulationRunV1, SourceProfileV1, TimeAxisV1 } from './engine/timeline/SimulationLoopV1';

export type * from './contracts/EngineOutputV1';
export { REFUSAL_RULE_IDS } from './contracts/refusal.ids';
export type { RefusalRuleId } from './contracts/refusal.ids';
export { ENGINE_VERSION, CONTRACT_VERSION } from './contracts/versions';
