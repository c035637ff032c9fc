import type { CurveData, CurveGenerator } from '../agents/type.js';
import { GenerationFailure } from '../errors.js';
import { GRID_PRESETS } from '../parameters/definitions.js';
import type { CurvePoint, ParameterSet, Result, SimulationResult } from '../types.js';

const BASE_MVA = 100;
const SOURCE_VOLTAGE = 1;
/** Upper bound on points in one sweep; the lower branch adds at most as many again. */
export const MAX_SWEEP_POINTS = 5000;

/** Reactance seen from `bus`: buses further down each group of ten sit electrically further out. */
export function busReactance(parameters: Readonly<ParameterSet>): number {
  const { reactance } = GRID_PRESETS[parameters.grid];
  return reactance * (1 + 0.05 * ((parameters.monitored_bus - 1) % 10));
}

/**
 * Closed-form two-bus solution: a source E behind reactance X feeding P + jQ.
 * Returns V² on the chosen branch, or null past the nose.
 */
export function solveVoltageSquared(p: number, q: number, x: number, branch: 'upper' | 'lower'): number | null {
  const e2 = SOURCE_VOLTAGE ** 2;
  const disc = (e2 * e2) / 4 - q * x * e2 - x * x * p * p;
  if (disc < 0) return null;
  const root = Math.sqrt(disc);
  return branch === 'upper' ? e2 / 2 - q * x + root : e2 / 2 - q * x - root;
}

/**
 * PV curve generator over the Thevenin equivalent of the selected IEEE grid.
 * The load is scaled from 1 to `max_scale` in `step_size` increments.
 */
export class TheveninCurveGenerator implements CurveGenerator {
  async generate(parameters: Readonly<ParameterSet>): Promise<Result<CurveData, GenerationFailure>> {
    const preset = GRID_PRESETS[parameters.grid];
    if (parameters.base_power <= 0) {
      return fail('invalid_configuration', 'base_power must be above 0 MW to trace a curve');
    }
    if (parameters.monitored_bus > preset.buses) {
      return fail('invalid_configuration', `bus ${parameters.monitored_bus} does not exist in ${parameters.grid}`);
    }

    const steps = Math.floor((parameters.max_scale - 1) / parameters.step_size + 1e-9);
    if (steps + 1 > MAX_SWEEP_POINTS) {
      const minStep = Math.ceil(((parameters.max_scale - 1) / (MAX_SWEEP_POINTS - 1)) * 1e4) / 1e4;
      return fail(
        'invalid_configuration',
        `step_size ${parameters.step_size} up to max_scale ${parameters.max_scale} needs ${steps + 1} points, ` +
          `above the limit of ${MAX_SWEEP_POINTS} sweep points; use a step_size of at least ${minStep}`
      );
    }

    const x = busReactance(parameters);
    const tanPhi = Math.tan(Math.acos(parameters.power_factor));
    const sign = parameters.load_type === 'inductive' ? 1 : -1;
    const loadAt = (scale: number) => {
      const p = (parameters.base_power * scale) / BASE_MVA;
      return { p, q: sign * p * tanPhi, mw: parameters.base_power * scale };
    };

    const points: CurvePoint[] = [];
    const scales: number[] = [];
    let stoppedBy: SimulationResult['stoppedBy'] = 'max_scale';
    for (let i = 0; i <= steps; i++) {
      const scale = 1 + i * parameters.step_size;
      const { p, q, mw } = loadAt(scale);
      const v2 = solveVoltageSquared(p, q, x, 'upper');
      if (v2 === null || v2 <= 0) {
        stoppedBy = 'nose';
        break;
      }
      const voltage = Math.sqrt(v2);
      if (voltage < parameters.voltage_limit) {
        stoppedBy = 'voltage_limit';
        break;
      }
      points.push({ power: mw, voltage });
      scales.push(scale);
    }

    if (!points.length) {
      return fail(
        'non_convergence',
        `no solution at the base load of ${parameters.base_power} MW on ${parameters.grid} bus ${parameters.monitored_bus}`
      );
    }

    const noseIndex = points.length - 1;
    const nose = points[noseIndex];

    if (stoppedBy === 'nose' && parameters.continuation) {
      for (let i = scales.length - 2; i >= 0; i--) {
        const { p, q, mw } = loadAt(scales[i]);
        const v2 = solveVoltageSquared(p, q, x, 'lower');
        if (v2 === null || v2 <= 0) break;
        const voltage = Math.sqrt(v2);
        if (voltage < parameters.voltage_limit) break;
        points.push({ power: mw, voltage });
      }
    }

    return {
      ok: true,
      value: {
        points,
        criticalVoltage: nose.voltage,
        maxPower: nose.power,
        noseIndex,
        convergedSteps: points.length,
        stoppedBy
      }
    };
  }
}

function fail(reason: GenerationFailure['reason'], message: string): Result<CurveData, GenerationFailure> {
  return { ok: false, error: new GenerationFailure(reason, message) };
}
