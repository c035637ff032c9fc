import type { ClassifierVerdict, Responder } from './agents/type.js';
import type { TurnClassification, TurnLabel } from './types.js';

export interface ResponderSet {
  question: Responder;
  parameter: Responder;
  generation: Responder;
  analysis?: Responder;
}

/**
 * Label resolution and responder lookup. Anything the classifier could not
 * place with enough confidence goes to the question path, which never mutates
 * parameters or runs a simulation.
 */
export class Dispatcher {
  constructor(private readonly responders: ResponderSet, private readonly confidenceThreshold: number) {}

  resolve(verdict: ClassifierVerdict): TurnClassification & { label: TurnLabel } {
    if (verdict.kind === 'unclassifiable') {
      return { label: 'question', confidence: null, fallback: true };
    }
    if (verdict.confidence < this.confidenceThreshold) {
      return { label: 'question', confidence: verdict.confidence, fallback: true };
    }
    return { label: verdict.label, confidence: verdict.confidence, fallback: false };
  }

  responderFor(label: TurnLabel): Responder {
    switch (label) {
      case 'question': return this.responders.question;
      case 'parameter': return this.responders.parameter;
      case 'generation': return this.responders.generation;
      case 'analysis': return this.responders.analysis ?? this.responders.question;
    }
  }
}
