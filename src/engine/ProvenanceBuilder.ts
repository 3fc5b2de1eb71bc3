import type { ProvenanceEntryV1, ProvenanceReportV1 } from '../contracts/EngineOutputV1';
import type { ScenarioV1 } from './schema/ScenarioV1';
import type { ExergyCarrierV1, StageChainV1 } from './schema/StageChainV1';
import type { ValueSpec } from './schema/ValueSpecV1';
import type { SourceProfileV1 } from './timeline/SimulationLoopV1';

/**
 * Lists every assumed or external input of a run and grades confidence.
 *
 * Rules:
 *  - Start high
 *  - Any assumed input → medium
 *  - T0 or Tb assumed (including the supply/return temperatures behind a
 *    glide-derived Tb) → low, since every exergy figure scales with them
 *  - External inputs are listed but do not lower confidence
 */
export function buildProvenanceReportV1(
  scenario: ScenarioV1,
  chain: StageChainV1,
  source?: SourceProfileV1,
): ProvenanceReportV1 {
  const entries: ProvenanceEntryV1[] = [];

  const note = (location: string, v: ValueSpec | undefined): void => {
    if (v === undefined) return;
    if (v.sourceType === 'assumed') {
      entries.push({ location, label: v.label, sourceType: 'assumed', value: v.value, unit: v.unit, note: v.meta?.note });
    } else if (v.sourceType === 'external') {
      const origin = v.meta?.source && v.meta.timeRange ? `${v.meta.source} (${v.meta.timeRange})` : v.meta?.source;
      entries.push({ location, label: v.label, sourceType: 'external', value: v.value, unit: v.unit, note: origin });
    }
  };

  const noteCarrier = (location: string, carrier: ExergyCarrierV1): void => {
    if (carrier.kind === 'heat') note(`${location}.temperature`, carrier.temperature);
    if (carrier.kind === 'chemical') note(`${location}.exergyFactor`, carrier.exergyFactor);
  };

  // ── Scenario ──────────────────────────────────────────────────────────────

  note('scenario.T0', scenario.T0);
  note('scenario.Tb', scenario.Tb);
  note('scenario.supplyTemperature', scenario.supplyTemperature);
  note('scenario.returnTemperature', scenario.returnTemperature);
  for (const name of Object.keys(scenario.auxiliaryInputs).sort()) {
    note(`scenario.auxiliaryInputs.${name}`, scenario.auxiliaryInputs[name]);
  }

  // ── Stages ────────────────────────────────────────────────────────────────

  for (const stage of chain.stages) {
    for (const name of Object.keys(stage.inputs).sort()) {
      note(`stage[${stage.name}].inputs.${name}`, stage.inputs[name]);
    }
  }

  // ── Source ────────────────────────────────────────────────────────────────

  if (source) {
    noteCarrier('source.carrier', source.carrier);
    source.energy.forEach((v, k) => note(`source.energy[${k}]`, v));
  }

  // ── Confidence ────────────────────────────────────────────────────────────

  const reasons: string[] = [];
  const glideAssumed = scenario.boundaryTemperatureSource !== 'direct'
    && (scenario.supplyTemperature?.sourceType === 'assumed' || scenario.returnTemperature?.sourceType === 'assumed');

  if (scenario.T0.sourceType === 'assumed') {
    reasons.push('Reference temperature T0 is assumed; every exergy figure scales with it.');
  }
  if (scenario.Tb.sourceType === 'assumed') {
    reasons.push('Boundary temperature Tb is assumed.');
  }
  if (glideAssumed) {
    reasons.push('Tb is derived from an assumed supply or return temperature.');
  }
  const boundaryAssumed = reasons.length > 0;

  const assumedCount = entries.filter(e => e.sourceType === 'assumed').length;
  let level: ProvenanceReportV1['confidence']['level'];
  if (boundaryAssumed) {
    level = 'low';
  } else if (assumedCount > 0) {
    level = 'medium';
    reasons.push(`${assumedCount} input${assumedCount === 1 ? ' is' : 's are'} assumed.`);
  } else {
    level = 'high';
    reasons.push('No input is assumed.');
  }

  return { confidence: { level, reasons }, entries };
}
