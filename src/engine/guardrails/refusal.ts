import type {
  EngineRefusal,
  EngineSuccess,
  RefusalCategory,
  RefusalDetailValue,
  RefusalKind,
  RefusalV1,
} from '../../contracts/EngineOutputV1';
import type { RefusalRuleId } from '../../contracts/refusal.ids';

const KIND_CATEGORY: Record<RefusalKind, RefusalCategory> = {
  MissingInput: 'input_contract',
  InvalidUnit: 'input_contract',
  InvalidProvenance: 'input_contract',
  InvalidValue: 'input_contract',
  InvalidTemperatureBoundary: 'physical_validity',
  IncompleteChain: 'physical_validity',
  MissingBoundaryElement: 'physical_validity',
  ZeroInputExergy: 'physical_validity',
  ComputationIntegrityFailure: 'computation_integrity',
};

export interface RefusalBody {
  message: string;
  why: string;
  field?: string;
  missing?: string[];
  details?: Record<string, RefusalDetailValue>;
}

export function ok<T>(value: T): EngineSuccess<T> {
  return { ok: true, value };
}

export function refuse(kind: RefusalKind, ruleId: RefusalRuleId, body: RefusalBody): EngineRefusal {
  const refusal: RefusalV1 = {
    kind,
    ruleId,
    category: KIND_CATEGORY[kind],
    message: body.message,
    why: body.why,
    missing: body.missing ?? [],
  };
  if (body.field !== undefined) refusal.field = body.field;
  if (body.details !== undefined) refusal.details = body.details;
  return { ok: false, refusal };
}

/**
 * Attach run context to a refusal raised inside a simulation step.
 * Context already present on the refusal is kept.
 */
export function withStepContext(result: EngineRefusal, stepIndex: number, stage: string): EngineRefusal {
  return {
    ok: false,
    refusal: {
      ...result.refusal,
      stage: result.refusal.stage ?? stage,
      stepIndex: result.refusal.stepIndex ?? stepIndex,
    },
  };
}
