import type { PlanStep, TurnClassifier, TurnPlan, TurnPlanner } from '../agents/type.js';
import { KeywordClassifier } from './keywordClassifier.js';

// Sentence breaks and sequencing words. A "." needs whitespace after it so decimals survive.
const STEP_SPLIT = /\s*(?:;|[.?!](?=\s)|,?\s*\b(?:and then|then|after that|afterwards)\b)\s*/i;

/**
 * Offline planner: splits on sequencing words, labels each clause with the
 * classifier and merges neighbours that share a label. A clause with no label
 * joins the step before it (or the first labelled step when it leads).
 */
export class ClausePlanner implements TurnPlanner {
  constructor(private readonly classifier: TurnClassifier = new KeywordClassifier()) {}

  async plan(text: string): Promise<TurnPlan> {
    const clauses = (text || '').split(STEP_SPLIT).map(c => c.trim()).filter(Boolean);
    if (clauses.length < 2) return { kind: 'simple' };

    const steps: PlanStep[] = [];
    let orphan = '';
    for (const clause of clauses) {
      const verdict = await this.classifier.classify(clause, []);
      const last = steps[steps.length - 1];
      if (verdict.kind === 'unclassifiable') {
        if (last) last.text = `${last.text} and ${clause}`;
        else orphan = orphan ? `${orphan} and ${clause}` : clause;
        continue;
      }
      const body = orphan ? `${orphan} and ${clause}` : clause;
      orphan = '';
      if (last && last.label === verdict.label) last.text = `${last.text} and ${body}`;
      else steps.push({ label: verdict.label, text: body });
    }

    if (steps.length < 2) return { kind: 'simple' };
    return { kind: 'compound', description: steps.map(s => s.label).join(', then '), steps };
  }
}
