import type { ParameterExtraction, ParameterExtractor, ParameterModification } from '../agents/type.js';
import { ParameterStore } from '../parameters/parameterStore.js';
import type { ParameterSet } from '../types.js';

const RESET = /\b(reset|restore)\b.*\b(parameters?|defaults?|settings|everything|all)\b|\bback to defaults?\b/;
const THEN_GENERATE = /\b(run|generate|simulate|plot)\b/;
const CLAUSE_SPLIT = /\s*(?:[,;]|\band\b|\bthen\b)\s*/;

const ASSIGN = /^(?:please\s+)?(set|change|update|make|switch|adjust)?\s*(?:the\s+)?(.+?)(?:\s+(?:to|is)\s+|\s*[=:]\s*)(.+)$/;
const RELATIVE = /^(?:please\s+)?(increase|raise|decrease|lower|reduce)\s+(?:the\s+)?(.+?)\s+by\s+(\d+(?:\.\d+)?)\s*(%|percent)?$/;
const TOGGLE = /^(?:please\s+)?(enable|disable|turn on|turn off)\s+(?:the\s+)?(.+)$/;

function cleanValue(raw: string): string | number {
  const v = raw.trim().replace(/[.!?]+$/, '').replace(/\s*(mw|pu|p\.u)$/, '').trim();
  return /^-?\d+(\.\d+)?$/.test(v) ? Number(v) : v;
}

function round(value: number): number {
  return Number(value.toPrecision(10));
}

/**
 * Offline extractor for phrasings like "set step size to 0.05",
 * "base power = 150 MW", "increase base load by 20%" or "disable continuation".
 * A name that resolves to no parameter is passed through only when a
 * mutation verb makes the intent clear, so the store can reject it by name.
 */
export class PatternParameterExtractor implements ParameterExtractor {
  async extract(text: string, current: Readonly<ParameterSet>): Promise<ParameterExtraction> {
    const t = (text || '').trim().toLowerCase();
    const thenGenerate = THEN_GENERATE.test(t);
    if (RESET.test(t)) return { modifications: [], reset: true, thenGenerate };

    const modifications: ParameterModification[] = [];
    for (const clause of t.split(CLAUSE_SPLIT).filter(Boolean)) {
      const found = parseClause(clause, current);
      if (found) modifications.push(found);
    }
    return { modifications, reset: false, thenGenerate };
  }
}

function parseClause(clause: string, current: Readonly<ParameterSet>): ParameterModification | null {
  const toggle = TOGGLE.exec(clause);
  if (toggle) {
    const name = ParameterStore.resolveName(toggle[2]);
    if (name) return { parameter: name, value: toggle[1] === 'enable' || toggle[1] === 'turn on' };
  }

  const relative = RELATIVE.exec(clause);
  if (relative) {
    const name = ParameterStore.resolveName(relative[2]);
    if (!name) return { parameter: relative[2].trim(), value: relative[3] };
    const base = current[name];
    if (typeof base !== 'number') return { parameter: name, value: relative[3] };
    const amount = Number(relative[3]);
    const delta = relative[4] ? (base * amount) / 100 : amount;
    const sign = relative[1] === 'increase' || relative[1] === 'raise' ? 1 : -1;
    return { parameter: name, value: round(base + sign * delta) };
  }

  const assign = ASSIGN.exec(clause);
  if (!assign) return null;
  const [, verb, rawName, rawValue] = assign;
  const name = ParameterStore.resolveName(rawName);
  if (name) return { parameter: name, value: cleanValue(rawValue) };
  return verb ? { parameter: rawName.trim(), value: cleanValue(rawValue) } : null;
}
