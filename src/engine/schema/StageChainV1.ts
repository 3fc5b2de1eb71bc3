/**
 * StageChainV1 — the system model: an ordered, immutable chain of generic
 * transformation stages ending in heat delivery.
 *
 * Stages carry no technology identity. What a stage does is entirely its
 * kind, its loss model and the ValueSpec inputs that parameterise it.
 *
 * Construction is two-phase: append stages in physical order, then finalise
 * against a Scenario. Finalisation runs the chain guardrails and freezes the
 * result; a finalised builder rejects further edits. Structural changes go
 * through `reviseStageChain`, which seeds a new builder and leaves the original
 * chain valid for side-by-side comparison.
 */

import type { EngineResult } from '../../contracts/EngineOutputV1';
import { REFUSAL_RULE_IDS } from '../../contracts/refusal.ids';
import { getScienceConfig } from '../config/ScienceConfig';
import type { ScienceConfigV1 } from '../config/ScienceConfig';
import { ok, refuse } from '../guardrails/refusal';
import {
  requireBoundaryCompleteness,
  requireChainTerminatesInDelivery,
  requireFinite,
  requireProvenance,
  requireUniqueStageNames,
} from '../guardrails/Guardrails';
import type { ScenarioV1 } from './ScenarioV1';
import type { ValueSpec } from './ValueSpecV1';

// ── Stage kinds & carriers ────────────────────────────────────────────────────

export type StageKind = 'CHARGE' | 'STORE' | 'CONVERT' | 'DELIVER';

export const STAGE_KINDS: readonly StageKind[] = ['CHARGE', 'STORE', 'CONVERT', 'DELIVER'];

/**
 * What an energy flow physically is, which fixes how much of it is exergy.
 *
 *   work     — electricity or shaft work; all exergy
 *   heat     — heat at a temperature; Q·(1 − T0/T)
 *   chemical — fuel with an exergy-to-energy factor
 *   ambient  — heat at the reference environment; no exergy
 */
export type ExergyCarrierV1 =
  | { kind: 'work' }
  | { kind: 'heat'; temperature: ValueSpec }
  | { kind: 'chemical'; exergyFactor: ValueSpec }
  | { kind: 'ambient' };

// ── Loss models ───────────────────────────────────────────────────────────────

export interface StepContextV1 {
  index: number;
  time: number;
  stepSize: number;
  timeUnit: string;
}

export interface LossModelContextV1 {
  stageName: string;
  kind: StageKind;
  /** Energy arriving from upstream in this step, in the run's energy unit. */
  inflow: {
    energy: number;
    exergy: number;
    unit: string;
    carrier: ExergyCarrierV1;
  };
  /** Auxiliary work supplied to the stage in this step. */
  auxEnergy: number;
  inputs: Readonly<Record<string, ValueSpec>>;
  scenario: ScenarioV1;
  step: StepContextV1;
}

export interface LossModelOutputV1 {
  /** Useful flow handed to the next stage. */
  outflow: { energy: number; carrier: ExergyCarrierV1 };
  /** Energy leaving the system at this stage. */
  loss: { energy: number; carrier: ExergyCarrierV1 };
  /** Heat drawn from the environment; carries no exergy. */
  ambientGain?: number;
  /** Extra per-step observables, recorded after the standard variables. */
  variables?: Record<string, { value: number; unit: string }>;
}

export interface LossModelV1 {
  id: string;
  requiredInputs: readonly string[];
  /**
   * Parameter checks run at finalisation, before any step is computed. The
   * scenario is the one the chain is being finalised against.
   */
  validate?(inputs: Readonly<Record<string, ValueSpec>>, stageName: string, scenario: ScenarioV1): EngineResult<true>;
  evaluate(context: LossModelContextV1): EngineResult<LossModelOutputV1>;
}

// ── Stages ────────────────────────────────────────────────────────────────────

/** Input name for auxiliary work supplied to a stage each step. */
export const AUX_ENERGY_INPUT = 'aux_energy_in';

export interface StageComponentV1 {
  id: string;
  /** Delivery is impossible without this component; it must be inside the boundary. */
  requiredForDelivery: boolean;
}

export interface StageV1 {
  readonly kind: StageKind;
  readonly name: string;
  readonly lossModel: LossModelV1;
  readonly inputs: Readonly<Record<string, ValueSpec>>;
  readonly component?: Readonly<StageComponentV1>;
}

export interface StageChainV1 {
  readonly stages: readonly StageV1[];
  /** Name of the scenario the chain was finalised against. */
  readonly scenarioName: string;
}

export interface StageChainBuilder {
  readonly stages: readonly StageV1[];
  readonly finalized: boolean;
  append(stage: StageV1): StageChainBuilder;
  /** Swap the stage with the given name for another, keeping its position. */
  replace(name: string, stage: StageV1): StageChainBuilder;
  finalize(scenario: ScenarioV1, config?: Readonly<ScienceConfigV1>): EngineResult<StageChainV1>;
}

function freezeStage(stage: StageV1): StageV1 {
  return Object.freeze({
    ...stage,
    inputs: Object.freeze({ ...stage.inputs }),
    ...(stage.component !== undefined ? { component: Object.freeze({ ...stage.component }) } : {}),
  });
}

function checkStageInputs(stage: StageV1, scenario: ScenarioV1): EngineResult<StageV1> {
  const missing = stage.lossModel.requiredInputs.filter(name => stage.inputs[name] === undefined);
  if (missing.length > 0) {
    const fields = missing.map(name => `${stage.name}.inputs.${name}`);
    return refuse('MissingInput', REFUSAL_RULE_IDS.INPUT_MISSING, {
      message: `Cannot build system because stage "${stage.name}" is missing ${missing.join(', ')} required by loss model "${stage.lossModel.id}".`,
      why: 'Loss models never fall back to default parameters.',
      field: fields[0],
      missing: fields,
      details: { stage: stage.name, lossModel: stage.lossModel.id },
    });
  }

  for (const [name, v] of Object.entries(stage.inputs)) {
    const field = `${stage.name}.inputs.${name}`;
    const provenance = requireProvenance(v, field);
    if (!provenance.ok) return provenance;
    const finite = requireFinite(v, field);
    if (!finite.ok) return finite;
  }

  if (stage.lossModel.validate) {
    const valid = stage.lossModel.validate(stage.inputs, stage.name, scenario);
    if (!valid.ok) return valid;
  }

  return ok(stage);
}

/**
 * Validate a stage list against a scenario. Checks run in order: termination,
 * unique names, per-stage inputs, boundary completeness.
 */
export function validateStages(stages: readonly StageV1[], scenario: ScenarioV1): EngineResult<readonly StageV1[]> {
  const terminated = requireChainTerminatesInDelivery(stages);
  if (!terminated.ok) return terminated;
  const unique = requireUniqueStageNames(stages);
  if (!unique.ok) return unique;
  for (const stage of stages) {
    const checked = checkStageInputs(stage, scenario);
    if (!checked.ok) return checked;
  }
  return requireBoundaryCompleteness(scenario, stages);
}

export function createStageChainBuilder(initial: readonly StageV1[] = []): StageChainBuilder {
  const stages: StageV1[] = [...initial];
  let finalized = false;

  function assertOpen(operation: string): void {
    if (finalized) {
      throw new Error(`StageChain builder is finalised; cannot ${operation}. Use reviseStageChain to derive a new chain.`);
    }
  }

  const builder: StageChainBuilder = {
    get stages() {
      return [...stages];
    },
    get finalized() {
      return finalized;
    },
    append(stage) {
      assertOpen(`append "${stage.name}"`);
      stages.push(stage);
      return builder;
    },
    replace(name, stage) {
      assertOpen(`replace "${name}"`);
      const index = stages.findIndex(s => s.name === name);
      if (index < 0) throw new Error(`StageChain builder has no stage named "${name}"`);
      stages[index] = stage;
      return builder;
    },
    finalize(scenario, config = getScienceConfig()) {
      assertOpen('finalise twice');
      const valid = validateStages(stages, scenario);
      if (!valid.ok) return valid;
      // The configured delivery boundary is fixed; a chain finalised against a
      // scenario for another boundary would not be comparable.
      if (scenario.deliveryBoundaryName !== config.deliveryBoundary.name) {
        return refuse('InvalidValue', REFUSAL_RULE_IDS.BOUNDARY_NAME_MISMATCH, {
          message: `Cannot build system because scenario "${scenario.name}" delivers to "${scenario.deliveryBoundaryName}", not "${config.deliveryBoundary.name}".`,
          why: 'Every compared system must deliver heat across the same boundary.',
          field: 'deliveryBoundaryName',
        });
      }
      finalized = true;
      return ok(Object.freeze({
        stages: Object.freeze(stages.map(freezeStage)),
        scenarioName: scenario.name,
      }));
    },
  };
  return builder;
}

/** A fresh, open builder seeded with an existing chain's stages. */
export function reviseStageChain(chain: StageChainV1): StageChainBuilder {
  return createStageChainBuilder(chain.stages);
}
