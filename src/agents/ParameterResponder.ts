import { isParameterName } from '../parameters/definitions.js';
import { ParameterStore } from '../parameters/parameterStore.js';
import type { ParameterEvolutionEntry, ParameterName } from '../types.js';
import { formatValue, humanName } from './format.js';
import type { FollowUp, ParameterExtractor, Responder, ResponderInput, ResponderOutcome } from './type.js';

export interface ParameterResponderOptions {
  /** Recent turns searched for back-and-forth changes. */
  oscillationWindow: number;
  /** Consecutive reverting changes that trigger the advisory. */
  oscillationMinChanges: number;
}

const DEFAULTS: ParameterResponderOptions = { oscillationWindow: 6, oscillationMinChanges: 4 };

const NOTHING_FOUND =
  'I could not find a parameter change in that message. Try something like "set step size to 0.05" or "reset the parameters".';

/**
 * Turns a mutation request into a proposal. The engine commits it and writes
 * the summary of what changed; `responseText` here only carries notes.
 */
export class ParameterResponder implements Responder {
  readonly label = 'parameter';
  private readonly options: ParameterResponderOptions;

  constructor(private readonly extractor: ParameterExtractor, options: Partial<ParameterResponderOptions> = {}) {
    this.options = { ...DEFAULTS, ...options };
  }

  async respond(input: ResponderInput): Promise<ResponderOutcome> {
    const extraction = await this.extractor.extract(input.text, input.parameters);
    const followUp: FollowUp | undefined = extraction.thenGenerate
      ? { label: 'generation', text: input.text }
      : undefined;

    if (extraction.reset) {
      return { responseText: '', parameterChange: { kind: 'reset' }, followUp };
    }
    if (!extraction.modifications.length) {
      return { responseText: NOTHING_FOUND };
    }

    // fromEntries keeps "__proto__" as an own key for the store to reject
    const deltas: Record<string, unknown> = Object.fromEntries(
      extraction.modifications.map((m): [string, unknown] => [ParameterStore.resolveName(m.parameter) ?? m.parameter, m.value])
    );

    const recentTurnIds = new Set(input.history.conversation.slice(0, this.options.oscillationWindow).map(t => t.id));
    const notes: string[] = [];
    for (const name of Object.keys(deltas)) {
      if (!isParameterName(name)) continue;
      const recent = input.history.evolution[name].filter(e => recentTurnIds.has(e.turnId));
      const note = oscillationNote(name, recent, this.options.oscillationMinChanges);
      if (note) notes.push(note);
    }

    return { responseText: notes.join('\n'), parameterChange: { kind: 'update', deltas }, followUp };
  }
}

/** Length of the trailing run of changes that each undo the one before. */
export function revertingRun(entries: readonly ParameterEvolutionEntry[]): number {
  if (!entries.length) return 0;
  let run = 1;
  for (let i = entries.length - 1; i > 0; i--) {
    const cur = entries[i];
    const prev = entries[i - 1];
    if (cur.previous === prev.next && cur.next === prev.previous) run++;
    else break;
  }
  return run;
}

function oscillationNote(name: ParameterName, entries: readonly ParameterEvolutionEntry[], minChanges: number): string | null {
  const run = revertingRun(entries);
  if (run < minChanges) return null;
  const last = entries[entries.length - 1];
  return (
    `Note: ${humanName(name)} has been switched back and forth between ${formatValue(last.previous)} and ` +
    `${formatValue(last.next)} ${run} times in recent turns. To compare the two settings, generate a curve for each ` +
    'and ask for an analysis.'
  );
}
