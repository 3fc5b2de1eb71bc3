import type { ENGINE_VERSION, CONTRACT_VERSION } from './versions';
import type { RefusalRuleId } from './refusal.ids';
import type { SourceType } from './provenance.ids';
import type { ValueSpec } from '../engine/schema/ValueSpecV1';
import type { StageKind } from '../engine/schema/StageChainV1';

// ── Refusals ──────────────────────────────────────────────────────────────────

/**
 * Classified refusal kinds. A refusal is an intentional, terminal outcome —
 * never a transient fault to be retried.
 */
export type RefusalKind =
  | 'MissingInput'
  | 'InvalidTemperatureBoundary'
  | 'IncompleteChain'
  | 'MissingBoundaryElement'
  | 'ZeroInputExergy'
  | 'ComputationIntegrityFailure'
  | 'InvalidUnit'
  | 'InvalidProvenance'
  | 'InvalidValue';

/**
 * `computation_integrity` signals a defect in a stage loss model or in the
 * engine itself; the other two categories signal a problem with the inputs.
 */
export type RefusalCategory = 'physical_validity' | 'input_contract' | 'computation_integrity';

export type RefusalDetailValue = number | string | boolean | null;

export interface RefusalV1 {
  kind: RefusalKind;
  ruleId: RefusalRuleId;
  category: RefusalCategory;
  /** One-line user-facing message naming the violated rule. */
  message: string;
  /** Physical or contractual reason the rule exists. */
  why: string;
  /** Offending field, e.g. "T0" or "store.inputs.standing_loss_rate". */
  field?: string;
  /** Stage name, when the refusal was raised while computing a stage. */
  stage?: string;
  /** Zero-based time-step index, when raised inside a simulation run. */
  stepIndex?: number;
  /** What would have to be supplied or fixed for the computation to proceed. */
  missing: string[];
  details?: Record<string, RefusalDetailValue>;
}

export interface EngineSuccess<T> {
  ok: true;
  value: T;
}

export interface EngineRefusal {
  ok: false;
  refusal: RefusalV1;
}

/** Every fallible engine operation returns this instead of throwing. */
export type EngineResult<T> = EngineSuccess<T> | EngineRefusal;

// ── Time series ───────────────────────────────────────────────────────────────

/**
 * One observed quantity of one stage at one time step.
 * The only artifact handed to presentation/export layers.
 */
export interface TimeSeriesRecordV1 {
  time: number;
  stageName: string;
  variableName: string;
  value: number;
  unit: string;
  sourceType: SourceType;
}

// ── Balances ──────────────────────────────────────────────────────────────────

export interface ExergyResultV1 {
  /** Exergy of the delivered heat at the boundary temperature. */
  exergyValue: ValueSpec;
  /** Delivered exergy over system input exergy (dimensionless). */
  efficiency: ValueSpec;
  /** System input exergy minus delivered exergy. */
  destruction: ValueSpec;
}

/** Run totals for one stage, all in the run's energy unit. */
export interface StageBalanceV1 {
  stageName: string;
  kind: StageKind;
  position: number;
  energyIn: number;
  auxEnergyIn: number;
  ambientEnergyIn: number;
  energyOut: number;
  energyLoss: number;
  exergyIn: number;
  auxExergyIn: number;
  exergyOut: number;
  /** Exergy carried out of the stage by its losses. */
  exergyLoss: number;
  /** Exergy destroyed inside the stage. */
  exergyDestroyed: number;
  /**
   * Exergy attributed to this stage as destroyed: internal destruction plus the
   * exergy of its losses, which is destroyed in the environment.
   * Equals exergyIn + auxExergyIn − exergyOut.
   */
  exergyDestruction: number;
}

export interface SystemBalanceV1 {
  runLabel: string;
  energyUnit: string;
  stepCount: number;
  stages: StageBalanceV1[];
  /** Source exergy entering the first stage plus all auxiliary exergy. */
  systemInputExergy: number;
  deliveredExergy: number;
  deliveredEnergy: number;
  totalDestruction: number;
  /** systemInputExergy − deliveredExergy − totalDestruction. */
  residual: number;
  /** Absolute tolerance the residual was checked against. */
  tolerance: number;
  exergyResult: ExergyResultV1;
}

/** A balance rescaled so that delivered heat equals the configured functional unit. */
export interface FunctionalUnitViewV1 {
  deliveredHeat: number;
  unit: string;
  description: string;
  /** Multiplier applied to run totals (after conversion to `unit`). */
  scale: number;
  systemInputExergy: number;
  deliveredExergy: number;
  totalDestruction: number;
  stages: Array<{ stageName: string; exergyDestruction: number }>;
}

// ── Provenance ────────────────────────────────────────────────────────────────

export interface ProvenanceEntryV1 {
  /** Where the value sits, e.g. "scenario.T0" or "stage[store].inputs.storage_duration". */
  location: string;
  label: string;
  sourceType: 'assumed' | 'external';
  value: number;
  unit: string;
  note?: string;
}

export interface ProvenanceReportV1 {
  confidence: {
    level: 'high' | 'medium' | 'low';
    reasons: string[];
  };
  entries: ProvenanceEntryV1[];
}

// ── Engine output ─────────────────────────────────────────────────────────────

export interface EngineMetaV1 {
  engineVersion: typeof ENGINE_VERSION;
  contractVersion: typeof CONTRACT_VERSION;
}

export interface CompletedRunOutputV1 {
  status: 'completed';
  runLabel: string;
  records: readonly TimeSeriesRecordV1[];
  balance: SystemBalanceV1;
  functionalUnit: FunctionalUnitViewV1;
  provenance: ProvenanceReportV1;
  meta: EngineMetaV1;
}

export interface RefusedRunOutputV1 {
  status: 'refused';
  runLabel: string;
  refusal: RefusalV1;
  meta: EngineMetaV1;
}

export type EngineOutputV1 = CompletedRunOutputV1 | RefusedRunOutputV1;
