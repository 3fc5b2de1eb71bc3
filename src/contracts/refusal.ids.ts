export const REFUSAL_RULE_IDS = {
  // Presence
  INPUT_MISSING: 'input.missing',

  // ValueSpec contract
  VALUE_NOT_FINITE: 'value.not_finite',
  VALUE_NOT_POSITIVE: 'value.not_positive',
  VALUE_NEGATIVE: 'value.negative',
  VALUE_OUT_OF_RANGE: 'value.out_of_range',
  PROVENANCE_SOURCE_UNKNOWN: 'provenance.source_unknown',
  PROVENANCE_DETAIL_MISSING: 'provenance.detail_missing',
  UNIT_MISMATCH: 'unit.mismatch',
  UNIT_UNKNOWN: 'unit.unknown',
  UNIT_AMBIGUOUS_ENERGY: 'unit.ambiguous_energy',

  // Temperature boundary
  BOUNDARY_TB_NOT_ABOVE_T0: 'boundary.tb_not_above_t0',
  BOUNDARY_SUPPLY_BELOW_RETURN: 'boundary.supply_below_return',
  BOUNDARY_NAME_MISSING: 'boundary.name_missing',
  BOUNDARY_NAME_MISMATCH: 'boundary.name_mismatch',
  BOUNDARY_ELEMENT_MISSING: 'boundary.element_missing',

  // Stage chain
  CHAIN_EMPTY: 'chain.empty',
  CHAIN_NOT_TERMINATED_BY_DELIVER: 'chain.not_terminated_by_deliver',
  CHAIN_DELIVER_NOT_LAST: 'chain.deliver_not_last',
  CHAIN_DUPLICATE_STAGE_NAME: 'chain.duplicate_stage_name',
  STAGE_INPUT_CONFLICT: 'stage.input_conflict',

  // Simulation run
  RUN_TIME_AXIS_INVALID: 'run.time_axis_invalid',
  RUN_SOURCE_LENGTH_MISMATCH: 'run.source_length_mismatch',

  // Exergy core
  EXERGY_INPUT_NOT_POSITIVE: 'exergy.input_not_positive',
  FUNCTIONAL_UNIT_NO_DELIVERY: 'functional_unit.no_delivery',

  // Integrity
  INTEGRITY_ENERGY_NOT_CONSERVED: 'integrity.energy_not_conserved',
  INTEGRITY_NEGATIVE_DESTRUCTION: 'integrity.negative_destruction',
  INTEGRITY_NEGATIVE_FLOW: 'integrity.negative_flow',
  INTEGRITY_INVALID_OBSERVABLE: 'integrity.invalid_observable',
  INTEGRITY_BALANCE_VIOLATED: 'integrity.balance_violated',
  INTEGRITY_STAGE_SPLIT_VIOLATED: 'integrity.stage_split_violated',
  INTEGRITY_SERIES_INCOMPLETE: 'integrity.series_incomplete',
} as const;

export type RefusalRuleId = typeof REFUSAL_RULE_IDS[keyof typeof REFUSAL_RULE_IDS];
