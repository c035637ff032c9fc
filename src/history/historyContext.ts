import { PARAMETER_NAMES } from '../parameters/definitions.js';
import type {
  HistoryView,
  InteractionLog,
  ParameterEvolution,
  ParameterName,
  ParameterSet,
  SimulationResult,
  Turn,
  TurnKind
} from '../types.js';

export interface HistoryLimits {
  maxConversationTurns: number;
  maxSimulationResults: number;
  classifierContextTurns: number;
  summaryIntents: number;
  summarySimulations: number;
  summaryChangeWindow: number;
  maxSummaryLength: number;
}

export const DEFAULT_HISTORY_LIMITS: HistoryLimits = {
  maxConversationTurns: 10,
  maxSimulationResults: 5,
  classifierContextTurns: 3,
  summaryIntents: 5,
  summarySimulations: 3,
  summaryChangeWindow: 5,
  maxSummaryLength: 600
};

// Phrases that make a question depend on earlier turns.
const HISTORY_KEYWORDS = [
  'previous', 'before', 'last', 'earlier', 'compare', 'comparison', 'history', 'trend',
  'pattern', 'evolution', 'change over time', 'what did i', 'what parameters', 'show me my',
  'my previous', 'past'
];

export interface ClassificationContextEntry { text: string; kind: TurnKind; }

/**
 * Bounded views over the interaction log. Every method is a pure function of
 * its arguments and the limits; the log itself may grow without bound.
 */
export class HistoryContext {
  readonly limits: HistoryLimits;

  constructor(limits: Partial<HistoryLimits> = {}) {
    this.limits = { ...DEFAULT_HISTORY_LIMITS, ...limits };
  }

  conversationWindow(log: InteractionLog): Turn[] {
    return lastN(log, this.limits.maxConversationTurns).reverse();
  }

  simulationWindow(log: InteractionLog): SimulationResult[] {
    const out: SimulationResult[] = [];
    for (let i = log.length - 1; i >= 0 && out.length < this.limits.maxSimulationResults; i--) {
      const sim = log[i].simulation;
      if (sim) out.push(sim);
    }
    return out;
  }

  parameterEvolution(log: InteractionLog, parameters: Readonly<ParameterSet>): ParameterEvolution {
    const evolution = emptyEvolution();
    for (const turn of log) {
      for (const change of turn.parameterChanges ?? []) {
        if (!(change.name in parameters)) continue;
        evolution[change.name].push({
          timestamp: turn.timestamp,
          previous: change.previous,
          next: change.next,
          turnId: turn.id
        });
      }
    }
    for (const name of PARAMETER_NAMES) {
      evolution[name] = lastN(evolution[name], this.limits.maxConversationTurns);
    }
    return evolution;
  }

  view(log: InteractionLog, parameters: Readonly<ParameterSet>): HistoryView {
    return {
      conversation: this.conversationWindow(log),
      simulations: this.simulationWindow(log),
      evolution: this.parameterEvolution(log, parameters)
    };
  }

  /** The only history the classifier gets to see. Oldest first. */
  classificationContext(log: InteractionLog): ClassificationContextEntry[] {
    return lastN(log, this.limits.classifierContextTurns).map(t => ({ text: t.text, kind: t.kind }));
  }

  summarize(view: HistoryView): string {
    const { summaryIntents, summarySimulations, summaryChangeWindow, maxSummaryLength } = this.limits;

    const intents = view.conversation.slice(0, summaryIntents).map(t => t.kind);
    const runs = view.simulations
      .slice(0, summarySimulations)
      .map(s => `Vcrit=${s.criticalVoltage.toFixed(3)} pu @ Pmax=${s.maxPower.toFixed(1)} MW`);
    const changed: ParameterName[] = [];
    for (const turn of view.conversation.slice(0, summaryChangeWindow)) {
      for (const c of turn.parameterChanges ?? []) {
        if (!changed.includes(c.name)) changed.push(c.name);
      }
    }

    const parts: string[] = [];
    if (intents.length) parts.push(`intents: ${intents.join(', ')}`);
    if (runs.length) parts.push(`runs: ${runs.join('; ')}`);
    if (changed.length) parts.push(`changed: ${changed.join(', ')}`);
    const summary = parts.join(' | ');
    return summary.length > maxSummaryLength ? `${summary.slice(0, maxSummaryLength - 1)}…` : summary;
  }

  needsHistory(text: string): boolean {
    const t = (text || '').toLowerCase();
    return HISTORY_KEYWORDS.some(k => t.includes(k));
  }
}

function lastN<T>(items: readonly T[], n: number): T[] {
  return n <= 0 ? [] : items.slice(-n);
}

function emptyEvolution(): ParameterEvolution {
  return {
    grid: [], monitored_bus: [], base_power: [], step_size: [], max_scale: [],
    power_factor: [], voltage_limit: [], load_type: [], continuation: []
  };
}
