import { PARAMETER_NAMES } from '../parameters/definitions.js';
import type { SimulationResult } from '../types.js';
import { formatValue } from './format.js';
import type { Responder, ResponderInput, ResponderOutcome } from './type.js';

const EPSILON = 1e-9;

/** Comparative statements over the simulation window. Read-only. */
export class AnalysisResponder implements Responder {
  readonly label = 'analysis';

  async respond(input: ResponderInput): Promise<ResponderOutcome> {
    const [latest, previous] = input.history.simulations;
    if (!latest) {
      return { responseText: 'There are no simulation results to analyse yet. Ask me to generate a PV curve first.' };
    }

    const lines = [describeRun('Latest run', latest)];
    if (!previous) {
      lines.push('There is no earlier run to compare with. Change a parameter and generate again to see its effect.');
      return { responseText: lines.join('\n') };
    }

    lines.push(describeRun('Previous run', previous));
    lines.push(delta('Critical voltage', previous.criticalVoltage, latest.criticalVoltage, 3, 'pu'));
    lines.push(delta('Maximum power', previous.maxPower, latest.maxPower, 1, 'MW'));

    const diffs = PARAMETER_NAMES
      .filter(n => latest.parameters[n] !== previous.parameters[n])
      .map(n => `${n} ${formatValue(previous.parameters[n])} → ${formatValue(latest.parameters[n])}`);
    lines.push(diffs.length ? `Parameters that differ: ${diffs.join(', ')}.` : 'Both runs used the same parameters.');

    return { responseText: lines.join('\n') };
  }
}

function describeRun(label: string, s: SimulationResult): string {
  const margin = s.maxPower - s.parameters.base_power;
  return (
    `${label}: ${s.parameters.grid} bus ${s.parameters.monitored_bus}, nose at ${s.maxPower.toFixed(1)} MW / ` +
    `${s.criticalVoltage.toFixed(3)} pu, load margin ${margin.toFixed(1)} MW.`
  );
}

function delta(label: string, before: number, after: number, digits: number, unit: string): string {
  const d = after - before;
  if (Math.abs(d) < EPSILON) return `${label} unchanged at ${after.toFixed(digits)} ${unit}.`;
  const dir = d > 0 ? 'rose' : 'fell';
  return `${label} ${dir} by ${Math.abs(d).toFixed(digits)} ${unit} (${before.toFixed(digits)} → ${after.toFixed(digits)} ${unit}).`;
}
