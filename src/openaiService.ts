import OpenAI from 'openai';
import { z } from 'zod';
import type {
  ClassifierVerdict,
  ParameterExtraction,
  ParameterExtractor,
  TextGenerator,
  TurnClassifier,
  TurnPlan,
  TurnPlanner
} from './agents/type.js';
import type { ClassificationContextEntry } from './history/historyContext.js';
import { logger as rootLogger, type Logger } from './logger.js';
import { PARAMETER_DEFINITIONS, PARAMETER_NAMES } from './parameters/definitions.js';
import type { ChatMessage, ParameterSet } from './types.js';

export interface OpenAIOptions {
  apiKey: string | undefined;
  model: string;
  logger?: Logger;
}

/** Thin chat wrapper; the client is created on first use so a missing key only fails the call that needs it. */
export class OpenAIChat {
  private client: OpenAI | null = null;
  readonly log: Logger;

  constructor(private readonly options: OpenAIOptions) {
    this.log = (options.logger ?? rootLogger).child({ component: 'openai' });
  }

  private getOpenAI(): OpenAI {
    if (this.client) return this.client;
    if (!this.options.apiKey) throw new Error('Missing OPENAI_API_KEY. Add it to your .env and restart.');
    this.client = new OpenAI({ apiKey: this.options.apiKey });
    return this.client;
  }

  async complete(messages: ChatMessage[], opts: { json?: boolean; temperature?: number } = {}): Promise<string> {
    const resp = await this.getOpenAI().chat.completions.create({
      model: this.options.model,
      messages: messages.map(toParam),
      temperature: opts.temperature ?? 0.2,
      ...(opts.json ? { response_format: { type: 'json_object' as const } } : {})
    });
    return resp.choices[0]?.message?.content ?? '';
  }

  /** Asks for a JSON object and validates it; a reply that does not fit `schema` is an error. */
  async completeJson<T>(messages: ChatMessage[], schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const raw = await this.complete(messages, { json: true, temperature: 0 });
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      throw new Error(`model returned invalid JSON: ${raw.slice(0, 120)}`);
    }
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new Error(`model reply did not match the expected shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
  }
}

function toParam(m: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (m.role) {
    case 'system': return { role: 'system', content: m.content };
    case 'user': return { role: 'user', content: m.content };
    case 'assistant': return { role: 'assistant', content: m.content };
  }
}

// ---- classifier

const ClassificationSchema = z.object({
  label: z.enum(['question', 'parameter', 'generation', 'analysis', 'unclassifiable']),
  confidence: z.number().min(0).max(1).default(1),
  reason: z.string().optional()
});

const CLASSIFIER_PROMPT = `You route messages sent to a voltage-stability assistant that computes PV curves.
Pick exactly one label:
- "question": asks for an explanation, a definition, or a current setting.
- "parameter": asks to set, change or reset simulation parameters (${PARAMETER_NAMES.join(', ')}).
- "generation": asks to run, generate or plot a PV curve.
- "analysis": asks to analyse, compare or interpret simulation results.
- "unclassifiable": none of the above.
Reply with JSON: {"label": "...", "confidence": 0..1, "reason": "short"}.`;

export class OpenAIClassifier implements TurnClassifier {
  constructor(private readonly chat: OpenAIChat) {}

  async classify(text: string, context: ClassificationContextEntry[]): Promise<ClassifierVerdict> {
    const recent = context.map(c => `[${c.kind}] ${c.text}`).join('\n');
    const reply = await this.chat.completeJson(
      [
        { role: 'system', content: CLASSIFIER_PROMPT },
        { role: 'user', content: `${recent ? `Recent messages:\n${recent}\n\n` : ''}Message to classify:\n${text}` }
      ],
      ClassificationSchema
    );
    if (reply.label === 'unclassifiable') return { kind: 'unclassifiable', reason: reply.reason ?? 'model could not place the message' };
    return { kind: 'classified', label: reply.label, confidence: reply.confidence };
  }
}

// ---- planning

const PlanSchema = z.object({
  compound: z.boolean(),
  description: z.string().default(''),
  steps: z
    .array(z.object({ label: z.enum(['question', 'parameter', 'generation', 'analysis']), text: z.string().min(1) }))
    .default([])
});

const PLANNER_PROMPT = `You plan requests sent to a voltage-stability assistant that computes PV curves.
A request is compound when it asks for two or more actions in sequence, for example
"explain the nose point, then set pf to 0.9 and run it".
For a compound request, list the steps in order. Each step has a label
("question", "parameter", "generation" or "analysis") and the part of the message it covers, rewritten to stand alone.
A parameter change that is immediately followed by a run may stay one "parameter" step.
Reply with JSON: {"compound": true|false, "description": "short", "steps": [{"label": "...", "text": "..."}]}.`;

export class OpenAIPlanner implements TurnPlanner {
  constructor(private readonly chat: OpenAIChat) {}

  async plan(text: string): Promise<TurnPlan> {
    const reply = await this.chat.completeJson(
      [
        { role: 'system', content: PLANNER_PROMPT },
        { role: 'user', content: text }
      ],
      PlanSchema
    );
    if (!reply.compound || reply.steps.length < 2) return { kind: 'simple' };
    const description = reply.description || reply.steps.map(s => s.label).join(', then ');
    return { kind: 'compound', description, steps: reply.steps };
  }
}

// ---- parameter extraction

const ExtractionSchema = z.object({
  modifications: z
    .array(z.object({ parameter: z.string(), value: z.union([z.string(), z.number(), z.boolean()]) }))
    .default([]),
  reset: z.boolean().default(false),
  thenGenerate: z.boolean().default(false)
});

function extractorPrompt(current: Readonly<ParameterSet>): string {
  const lines = PARAMETER_NAMES.map(n => `- ${n} (${PARAMETER_DEFINITIONS[n].domain}), current: ${String(current[n])}`);
  return `Extract parameter changes from the user's message for a PV-curve simulator.
Parameters:
${lines.join('\n')}
Use the exact parameter names above. For relative changes ("increase by 10%") compute the new absolute value from the current one.
Set "reset" when the user asks to restore defaults, and "thenGenerate" when they also ask to run or plot a curve.
Reply with JSON: {"modifications": [{"parameter": "...", "value": ...}], "reset": false, "thenGenerate": false}.`;
}

export class OpenAIParameterExtractor implements ParameterExtractor {
  constructor(private readonly chat: OpenAIChat) {}

  async extract(text: string, current: Readonly<ParameterSet>): Promise<ParameterExtraction> {
    return this.chat.completeJson(
      [
        { role: 'system', content: extractorPrompt(current) },
        { role: 'user', content: text }
      ],
      ExtractionSchema
    );
  }
}

// ---- free text

export class OpenAITextGenerator implements TextGenerator {
  constructor(private readonly chat: OpenAIChat) {}

  async generate(messages: ChatMessage[]): Promise<string> {
    const reply = await this.chat.complete(messages, { temperature: 0.3 });
    this.chat.log.debug({ chars: reply.length }, '[OpenAI] answer generated');
    return reply;
  }
}
