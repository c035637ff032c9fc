import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { AnalysisResponder } from '../src/agents/AnalysisResponder.js';
import { GenerationResponder } from '../src/agents/GenerationResponder.js';
import { ParameterResponder, revertingRun } from '../src/agents/ParameterResponder.js';
import { QuestionResponder, asksAboutSetting } from '../src/agents/QuestionResponder.js';
import type {
  CurveData,
  CurveGenerator,
  ParameterExtractor,
  ResponderInput,
  Retriever,
  Snippet,
  TextGenerator
} from '../src/agents/type.js';
import { GenerationFailure } from '../src/errors.js';
import { HistoryContext } from '../src/history/historyContext.js';
import { DEFAULT_PARAMETERS } from '../src/parameters/definitions.js';
import { PatternParameterExtractor } from '../src/reasoner/patternExtractor.js';
import { TheveninCurveGenerator } from '../src/simulation/theveninCurve.js';
import type { ChatMessage, ParameterEvolutionEntry, Result, Turn } from '../src/types.js';
import { KeywordRetriever, loadKnowledgeBase } from '../src/vectorStore.js';
import { FIXED_ISO, makeSimulation, makeTurn } from './helpers.js';

const history = new HistoryContext();

function inputFor(text: string, log: Turn[] = [], parameters = DEFAULT_PARAMETERS): ResponderInput {
  return {
    text,
    parameters,
    history: history.view(log, parameters),
    timestamp: FIXED_ISO,
    turnId: `turn-${log.length}`,
    sessionId: 'session-1'
  };
}

class StubTextGenerator implements TextGenerator {
  readonly calls: ChatMessage[][] = [];
  async generate(messages: ChatMessage[]): Promise<string> {
    this.calls.push(messages);
    return '  Generated answer.  ';
  }
}

class RecordingRetriever implements Retriever {
  readonly queries: string[] = [];
  async retrieve(query: string): Promise<Snippet[]> {
    this.queries.push(query);
    return [];
  }
}

class StubCurveGenerator implements CurveGenerator {
  constructor(private readonly impl: () => Promise<Result<CurveData, GenerationFailure>>) {}
  generate() {
    return this.impl();
  }
}

const curve: CurveData = {
  points: [{ power: 100, voltage: 0.98 }, { power: 200, voltage: 0.72 }],
  criticalVoltage: 0.72,
  maxPower: 200,
  noseIndex: 1,
  convergedSteps: 2,
  stoppedBy: 'nose'
};

describe('QuestionResponder', () => {
  const retriever = new KeywordRetriever(loadKnowledgeBase());

  it('answers parameter questions from the evolution', async () => {
    const responder = new QuestionResponder({ retriever, generator: null, history });
    const log = [makeTurn(0, { kind: 'parameter', parameterChanges: [{ name: 'step_size', previous: 0.01, next: 0.05 }] })];
    const outcome = await responder.respond(inputFor('What is the current step size?', log, { ...DEFAULT_PARAMETERS, step_size: 0.05 }));
    assert.equal(
      outcome.responseText,
      `The current step size is 0.05 (changed from 0.01 at ${FIXED_ISO}).\n` +
        'step_size: load-scale increment between two curve points (at least 0.001 and at most 1).'
    );
  });

  it('falls back to the snapshot for a parameter that never changed', async () => {
    const responder = new QuestionResponder({ retriever, generator: null, history });
    const outcome = await responder.respond(inputFor('what is the power factor'));
    assert.equal(
      outcome.responseText.split('\n')[0],
      'The current power factor is 0.95, unchanged since the session started.'
    );
  });

  it('sends domain questions that merely name a parameter through retrieval', async () => {
    const recording = new RecordingRetriever();
    const generator = new StubTextGenerator();
    const responder = new QuestionResponder({ retriever: recording, generator, history });
    const questions = [
      'Why does voltage collapse happen first at a weak bus?',
      'How does power factor affect the nose point and voltage collapse?'
    ];
    for (const q of questions) {
      assert.equal((await responder.respond(inputFor(q))).responseText, 'Generated answer.');
    }
    assert.deepEqual(recording.queries, questions);
    assert.equal(generator.calls.length, 2);
  });

  it('quotes reference material when no text generator is configured', async () => {
    const responder = new QuestionResponder({ retriever, generator: null, history });
    const outcome = await responder.respond(inputFor('What is the nose point?'));
    const lines = outcome.responseText.split('\n');
    assert.equal(lines[0], 'Here is what the reference material says:');
    assert.ok(lines[1].startsWith('- Nose point and maximum loadability: '));
    assert.equal(outcome.parameterChange, undefined);
  });

  it('passes history to the generator when the question refers back', async () => {
    const generator = new StubTextGenerator();
    const responder = new QuestionResponder({ retriever, generator, history });
    const log = [makeTurn(0, { kind: 'generation', simulation: makeSimulation('sim-turn-0') })];
    const outcome = await responder.respond(inputFor('How does the nose point compare with the previous run?', log));

    assert.equal(outcome.responseText, 'Generated answer.');
    const [system, user] = generator.calls[0];
    assert.ok(system.content.includes('Recent conversation:'));
    assert.ok(system.content.includes('Previous simulation results:'));
    assert.ok(user.content.startsWith('Question: How does the nose point compare with the previous run?'));
  });
});

describe('asksAboutSetting', () => {
  it('tells setting questions from domain questions', () => {
    assert.equal(asksAboutSetting('What is the current step size?', 'step_size'), true);
    assert.equal(asksAboutSetting("what's the pf?", 'power_factor'), true);
    assert.equal(asksAboutSetting('What does the monitored bus do?', 'monitored_bus'), true);
    assert.equal(asksAboutSetting('What did I set the grid to?', 'grid'), true);
    assert.equal(asksAboutSetting('Why does voltage collapse happen first at a weak bus?', 'monitored_bus'), false);
    assert.equal(asksAboutSetting('How does power factor affect the nose point?', 'power_factor'), false);
  });
});

describe('ParameterResponder', () => {
  const responder = new ParameterResponder(new PatternParameterExtractor());

  it('proposes deltas and leaves the commit summary to the engine', async () => {
    const outcome = await responder.respond(inputFor('set base power to 150'));
    assert.deepEqual(outcome.parameterChange, { kind: 'update', deltas: { base_power: 150 } });
    assert.equal(outcome.responseText, '');
    assert.equal(outcome.followUp, undefined);
  });

  it('asks for a generation follow-up on "and run"', async () => {
    const outcome = await responder.respond(inputFor('set step size to 0.05 and run it'));
    assert.deepEqual(outcome.followUp, { label: 'generation', text: 'set step size to 0.05 and run it' });
  });

  it('keeps a __proto__ name in the batch so the store can reject it', async () => {
    const extractor: ParameterExtractor = {
      extract: async () => ({ modifications: [{ parameter: '__proto__', value: 1 }], reset: false, thenGenerate: false })
    };
    const outcome = await new ParameterResponder(extractor).respond(inputFor('set __proto__ to 1'));
    assert.equal(outcome.parameterChange?.kind, 'update');
    if (outcome.parameterChange?.kind !== 'update') return;
    assert.deepEqual(Object.keys(outcome.parameterChange.deltas), ['__proto__']);
  });

  it('explains when nothing could be extracted', async () => {
    const outcome = await responder.respond(inputFor('make it better'));
    assert.equal(outcome.parameterChange, undefined);
    assert.ok(outcome.responseText.startsWith('I could not find a parameter change in that message.'));
  });

  it('measures the trailing run of reverting changes', () => {
    const entry = (previous: number, next: number): ParameterEvolutionEntry => ({ timestamp: FIXED_ISO, previous, next, turnId: 't' });
    assert.equal(revertingRun([]), 0);
    assert.equal(revertingRun([entry(0.01, 0.05), entry(0.05, 0.01), entry(0.01, 0.05)]), 3);
    assert.equal(revertingRun([entry(0.01, 0.02), entry(0.02, 0.05), entry(0.05, 0.02)]), 2);
  });
});

describe('GenerationResponder', () => {
  it('builds a simulation result and chains an analysis when an earlier run exists', async () => {
    const responder = new GenerationResponder({
      generator: new StubCurveGenerator(async () => ({ ok: true, value: curve })),
      timeoutMs: 1000
    });
    const log = [makeTurn(0, { kind: 'generation', simulation: makeSimulation('sim-turn-0') })];
    const outcome = await responder.respond(inputFor('run it', log));

    assert.equal(outcome.simulation?.id, 'sim-turn-1');
    assert.equal(outcome.simulation?.maxPower, 200);
    assert.deepEqual(outcome.followUp, { label: 'analysis', text: 'Compare the new curve with the previous run.' });
    assert.equal(
      outcome.responseText,
      'PV curve generated for IEEE39 bus 5 (inductive load, power factor 0.95, with the lower branch).\n' +
        'Nose point: 200.0 MW at 0.720 pu. 2 points computed; the sweep stopped at the nose point (voltage collapse).'
    );
  });

  it('does not chain an analysis for the first run', async () => {
    const responder = new GenerationResponder({
      generator: new StubCurveGenerator(async () => ({ ok: true, value: curve })),
      timeoutMs: 1000
    });
    const outcome = await responder.respond(inputFor('run it'));
    assert.equal(outcome.followUp, undefined);
  });

  it('turns a hung generator into a timeout failure', async () => {
    const responder = new GenerationResponder({
      generator: new StubCurveGenerator(() => new Promise(() => undefined)),
      timeoutMs: 20
    });
    const outcome = await responder.respond(inputFor('run it'));
    assert.equal(outcome.simulation, undefined);
    assert.ok(outcome.failure instanceof GenerationFailure);
    assert.equal(outcome.failure.reason, 'timeout');
    assert.equal(
      outcome.responseText,
      'Curve generation failed: the generator timed out (no result within 20 ms). Try again, or use a larger step_size for a shorter sweep.'
    );
  });

  it('fails cleanly on a sweep above the point limit', async () => {
    const responder = new GenerationResponder({ generator: new TheveninCurveGenerator(), timeoutMs: 50 });
    const outcome = await responder.respond(inputFor('run it', [], { ...DEFAULT_PARAMETERS, step_size: 0.000001 }));
    assert.equal(outcome.simulation, undefined);
    assert.ok(outcome.failure instanceof GenerationFailure);
    assert.equal(outcome.failure.reason, 'invalid_configuration');
    assert.ok(
      outcome.responseText.startsWith('Curve generation failed: invalid configuration (step_size 0.000001 up to max_scale 3 needs ')
    );
  });

  it('turns a thrown error into an internal failure', async () => {
    const responder = new GenerationResponder({
      generator: new StubCurveGenerator(async () => {
        throw new Error('solver crashed');
      }),
      timeoutMs: 1000
    });
    const outcome = await responder.respond(inputFor('run it'));
    assert.equal(outcome.responseText, 'Curve generation failed: solver crashed.');
  });
});

describe('AnalysisResponder', () => {
  const responder = new AnalysisResponder();

  it('asks for a curve first when there are no runs', async () => {
    const outcome = await responder.respond(inputFor('analyse the results'));
    assert.equal(outcome.responseText, 'There are no simulation results to analyse yet. Ask me to generate a PV curve first.');
  });

  it('compares the latest run with the previous one', async () => {
    const log = [
      makeTurn(0),
      makeTurn(1, { kind: 'generation', simulation: makeSimulation('sim-turn-1', { criticalVoltage: 0.7, maxPower: 200 }) }),
      makeTurn(2, { kind: 'parameter', parameterChanges: [{ name: 'power_factor', previous: 0.95, next: 0.9 }] }),
      makeTurn(3, {
        kind: 'generation',
        simulation: makeSimulation('sim-turn-3', { criticalVoltage: 0.65, maxPower: 180 }, { power_factor: 0.9 })
      })
    ];
    const outcome = await responder.respond(inputFor('compare the runs', log));
    assert.deepEqual(outcome.responseText.split('\n'), [
      'Latest run: ieee39 bus 5, nose at 180.0 MW / 0.650 pu, load margin 80.0 MW.',
      'Previous run: ieee39 bus 5, nose at 200.0 MW / 0.700 pu, load margin 100.0 MW.',
      'Critical voltage fell by 0.050 pu (0.700 → 0.650 pu).',
      'Maximum power fell by 20.0 MW (200.0 → 180.0 MW).',
      'Parameters that differ: power_factor 0.95 → 0.9.'
    ]);
    assert.equal(outcome.parameterChange, undefined);
  });
});
