import type { ClassifierVerdict, TurnClassifier } from '../agents/type.js';
import type { ClassificationContextEntry } from '../history/historyContext.js';
import { TURN_LABELS, type TurnLabel } from '../types.js';

// Order of TURN_LABELS breaks ties.
const CUES: Record<TurnLabel, RegExp[]> = {
  question: [
    /\?\s*$/,
    /^(what|why|how|when|which|who|explain|define|describe)\b/,
    /\bmean(s|ing)?\b/
  ],
  parameter: [
    /\b(set|change|update|increase|decrease|lower|raise|reset|switch)\b/,
    /\bto\s+-?\d/,
    /=/
  ],
  generation: [
    /\b(generate|run|simulate|plot|draw)\b/,
    /\b(pv|nose)\s+curve\b/
  ],
  analysis: [
    /\b(analy[sz]e|analysis|compare|comparison|difference|trend)\b/,
    /\b(previous|last)\s+(run|result|simulation)s?\b/
  ]
};

/**
 * Offline classifier: counts cue hits per label. Confidence is the winning
 * label's share of all hits, so mixed messages fall under the threshold.
 */
export class KeywordClassifier implements TurnClassifier {
  async classify(text: string, _context: ClassificationContextEntry[]): Promise<ClassifierVerdict> {
    const t = (text || '').trim().toLowerCase();
    const scores = TURN_LABELS.map(label => ({ label, hits: CUES[label].filter(re => re.test(t)).length }));
    const total = scores.reduce((sum, s) => sum + s.hits, 0);
    if (total === 0) return { kind: 'unclassifiable', reason: 'no cue words found' };

    let best = scores[0];
    for (const s of scores) if (s.hits > best.hits) best = s;
    return { kind: 'classified', label: best.label, confidence: best.hits / total };
  }
}
