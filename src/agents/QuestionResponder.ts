import type { HistoryContext } from '../history/historyContext.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import { PARAMETER_DEFINITIONS } from '../parameters/definitions.js';
import { ParameterStore } from '../parameters/parameterStore.js';
import type { ChatMessage, ParameterName } from '../types.js';
import { formatValue, humanName } from './format.js';
import type { Responder, ResponderInput, ResponderOutcome, Retriever, Snippet, TextGenerator } from './type.js';

const SYSTEM_PROMPT = `You are a power-systems assistant specialised in voltage stability and PV (nose) curves.
Answer the user's question in plain language, in at most a few short paragraphs.
Use the reference material when it is relevant and say so when it does not cover the question.
Do not invent simulation results; only cite runs listed in the session context.`;

export interface QuestionResponderDeps {
  retriever: Retriever;
  generator: TextGenerator | null;
  history: HistoryContext;
  logger?: Logger;
}

export class QuestionResponder implements Responder {
  readonly label = 'question';
  private readonly log: Logger;

  constructor(private readonly deps: QuestionResponderDeps) {
    this.log = (deps.logger ?? rootLogger).child({ responder: 'question' });
  }

  async respond(input: ResponderInput): Promise<ResponderOutcome> {
    const parameter = ParameterStore.findMentioned(input.text);
    if (parameter && asksAboutSetting(input.text, parameter)) {
      return { responseText: answerParameterQuestion(parameter, input) };
    }

    const snippets = await this.deps.retriever.retrieve(input.text);
    this.log.debug({ sessionId: input.sessionId, snippets: snippets.length }, '[Question] retrieved reference material');
    if (!this.deps.generator) return { responseText: snippetAnswer(snippets) };

    const reply = await this.deps.generator.generate(this.buildMessages(input, snippets));
    return { responseText: reply.trim() || snippetAnswer(snippets) };
  }

  private buildMessages(input: ResponderInput, snippets: Snippet[]): ChatMessage[] {
    const params = Object.entries(input.parameters).map(([k, v]) => `${k}=${formatValue(v)}`).join(', ');
    const context: string[] = [`Current parameters: ${params}`];

    if (this.deps.history.needsHistory(input.text)) {
      const turns = input.history.conversation.slice(0, 5).reverse();
      if (turns.length) {
        context.push('Recent conversation:');
        for (const t of turns) {
          const reply = t.responseText.length > 300 ? `${t.responseText.slice(0, 300)}...` : t.responseText;
          context.push(`  User: ${t.text}`, `  Assistant: ${reply}`);
        }
      }
      const runs = input.history.simulations.slice(0, 2);
      if (runs.length) {
        context.push('Previous simulation results:');
        for (const s of runs) {
          context.push(
            `  ${s.timestamp}: ${s.parameters.grid} bus ${s.parameters.monitored_bus}, pf ${s.parameters.power_factor}, ` +
            `max power ${s.maxPower.toFixed(1)} MW at ${s.criticalVoltage.toFixed(3)} pu`
          );
        }
      }
    }

    const reference = snippets.length
      ? snippets.map((s, i) => `[${i + 1}] ${s.title}: ${s.text}`).join('\n')
      : 'No matching reference material.';

    return [
      { role: 'system', content: `${SYSTEM_PROMPT}\n\nSession context:\n${context.join('\n')}` },
      { role: 'user', content: `Question: ${input.text}\n\nReference material:\n${reference}` }
    ];
  }
}

const VALUE_CUES = /\b(current|currently|right now|value of|what did i|changed)\b/;

/**
 * True when the question is about the setting itself ("what is the current pf",
 * "what does the monitored bus do"), not a domain question that merely names one
 * ("why does a weak bus collapse first").
 */
export function asksAboutSetting(text: string, name: ParameterName): boolean {
  const t = ` ${text.toLowerCase().replace(/[^a-z0-9_ ]/g, ' ').replace(/\s+/g, ' ').trim()} `;
  if (VALUE_CUES.test(t)) return true;
  const names = [name, ...PARAMETER_DEFINITIONS[name].aliases].sort((a, b) => b.length - a.length).join('|');
  return new RegExp(`^ (?:what|which) (?:is|s|was|does|do) (?:the |my )?(?:${names})(?: do| mean| now)? $`).test(t);
}

function answerParameterQuestion(name: ParameterName, input: ResponderInput): string {
  const entries = input.history.evolution[name];
  const latest = entries[entries.length - 1];
  const head = latest
    ? `The current ${humanName(name)} is ${formatValue(latest.next)} (changed from ${formatValue(latest.previous)} at ${latest.timestamp}).`
    : `The current ${humanName(name)} is ${formatValue(input.parameters[name])}, unchanged since the session started.`;
  return `${head}\n${ParameterStore.describe(name)}.`;
}

function snippetAnswer(snippets: Snippet[]): string {
  if (!snippets.length) {
    return 'I have no reference material on that yet. Try asking about PV curves, the nose point, voltage collapse or one of the simulation parameters.';
  }
  return ['Here is what the reference material says:', ...snippets.map(s => `- ${s.title}: ${s.text}`)].join('\n');
}
