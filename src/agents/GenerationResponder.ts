import { GenerationFailure, errorMessage } from '../errors.js';
import { isTimeoutError, withTimeout } from '../lib/timeoutGuard.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import type { ParameterSet, Result, SimulationResult } from '../types.js';
import type { CurveData, CurveGenerator, Responder, ResponderInput, ResponderOutcome } from './type.js';

export interface GenerationResponderDeps {
  generator: CurveGenerator;
  timeoutMs: number;
  /** Chain an analysis turn when an earlier run is available to compare with. */
  analyzeAfterGeneration?: boolean;
  logger?: Logger;
}

const STOP_REASONS: Record<SimulationResult['stoppedBy'], string> = {
  nose: 'the nose point (voltage collapse)',
  voltage_limit: 'the voltage limit',
  max_scale: 'the maximum load scale'
};

export class GenerationResponder implements Responder {
  readonly label = 'generation';
  private readonly log: Logger;

  constructor(private readonly deps: GenerationResponderDeps) {
    this.log = (deps.logger ?? rootLogger).child({ responder: 'generation' });
  }

  async respond(input: ResponderInput): Promise<ResponderOutcome> {
    const params = input.parameters;
    let outcome: Result<CurveData, GenerationFailure>;
    try {
      outcome = await withTimeout(this.deps.generator.generate(params), this.deps.timeoutMs, 'curve generation');
    } catch (err) {
      outcome = {
        ok: false,
        error: isTimeoutError(err)
          ? new GenerationFailure('timeout', `no result within ${this.deps.timeoutMs} ms`)
          : new GenerationFailure('internal', errorMessage(err))
      };
    }

    if (!outcome.ok) {
      this.log.warn({ sessionId: input.sessionId, reason: outcome.error.reason }, '[Generation] curve generation failed');
      return { responseText: failureText(outcome.error), failure: outcome.error };
    }

    const data = outcome.value;
    const simulation: SimulationResult = {
      id: `sim-${input.turnId}`,
      timestamp: input.timestamp,
      parameters: { ...params },
      points: data.points,
      criticalVoltage: data.criticalVoltage,
      maxPower: data.maxPower,
      noseIndex: data.noseIndex,
      convergedSteps: data.convergedSteps,
      stoppedBy: data.stoppedBy
    };
    this.log.info(
      { sessionId: input.sessionId, grid: params.grid, bus: params.monitored_bus, steps: data.convergedSteps },
      '[Generation] PV curve generated'
    );

    const compare = (this.deps.analyzeAfterGeneration ?? true) && input.history.simulations.length > 0;
    return {
      responseText: successText(params, data),
      simulation,
      followUp: compare ? { label: 'analysis', text: 'Compare the new curve with the previous run.' } : undefined
    };
  }
}

function successText(p: Readonly<ParameterSet>, d: CurveData): string {
  const branch = p.continuation ? 'with the lower branch' : 'upper branch only';
  return (
    `PV curve generated for ${p.grid.toUpperCase()} bus ${p.monitored_bus} ` +
    `(${p.load_type} load, power factor ${p.power_factor}, ${branch}).\n` +
    `Nose point: ${d.maxPower.toFixed(1)} MW at ${d.criticalVoltage.toFixed(3)} pu. ` +
    `${d.convergedSteps} points computed; the sweep stopped at ${STOP_REASONS[d.stoppedBy]}.`
  );
}

function failureText(f: GenerationFailure): string {
  switch (f.reason) {
    case 'non_convergence':
      return `Curve generation failed: the power flow did not converge (${f.message}). ` +
        'Try a lower base_power, or a power_factor closer to 1.';
    case 'invalid_configuration':
      return `Curve generation failed: invalid configuration (${f.message}). Adjust that parameter and try again.`;
    case 'timeout':
      return `Curve generation failed: the generator timed out (${f.message}). ` +
        'Try again, or use a larger step_size for a shorter sweep.';
    case 'internal':
      return `Curve generation failed: ${f.message}.`;
  }
}
