import { AnalysisResponder } from '../src/agents/AnalysisResponder.js';
import { GenerationResponder } from '../src/agents/GenerationResponder.js';
import { ParameterResponder } from '../src/agents/ParameterResponder.js';
import { QuestionResponder } from '../src/agents/QuestionResponder.js';
import type { ClassifierVerdict, CurveGenerator, TurnClassifier } from '../src/agents/type.js';
import type { ClassificationContextEntry } from '../src/history/historyContext.js';
import { HistoryContext } from '../src/history/historyContext.js';
import { logger } from '../src/logger.js';
import { DEFAULT_PARAMETERS } from '../src/parameters/definitions.js';
import { ClausePlanner } from '../src/reasoner/clausePlanner.js';
import { KeywordClassifier } from '../src/reasoner/keywordClassifier.js';
import { PatternParameterExtractor } from '../src/reasoner/patternExtractor.js';
import { TheveninCurveGenerator } from '../src/simulation/theveninCurve.js';
import type { ParameterSet, SimulationResult, Turn } from '../src/types.js';
import { KeywordRetriever, loadKnowledgeBase } from '../src/vectorStore.js';
import { WorkflowEngine, type WorkflowEngineDeps } from '../src/workflowEngine.js';

logger.level = 'silent';

export const SECRET = 'test-secret';
export const FIXED_ISO = '2024-05-01T10:00:00.000Z';
export const fixedClock = () => new Date(FIXED_ISO);

/** Classifier driven by a function of the text; an Error result is thrown. */
export class ScriptedClassifier implements TurnClassifier {
  readonly calls: { text: string; context: ClassificationContextEntry[] }[] = [];

  constructor(private readonly route: (text: string) => ClassifierVerdict | Error) {}

  async classify(text: string, context: ClassificationContextEntry[]): Promise<ClassifierVerdict> {
    this.calls.push({ text, context });
    const verdict = this.route(text);
    if (verdict instanceof Error) throw verdict;
    return verdict;
  }
}

export interface TestEngineOptions extends Partial<Omit<WorkflowEngineDeps, 'responders'>> {
  curveGenerator?: CurveGenerator;
  analysis?: boolean;
}

export function buildTestEngine(options: TestEngineOptions = {}): WorkflowEngine {
  const { curveGenerator, analysis = true, ...deps } = options;
  const history = deps.history ?? new HistoryContext();
  return new WorkflowEngine({
    classifier: new KeywordClassifier(),
    planner: new ClausePlanner(),
    stateSecret: SECRET,
    now: fixedClock,
    ...deps,
    history,
    responders: {
      question: new QuestionResponder({ retriever: new KeywordRetriever(loadKnowledgeBase()), generator: null, history }),
      parameter: new ParameterResponder(new PatternParameterExtractor()),
      generation: new GenerationResponder({ generator: curveGenerator ?? new TheveninCurveGenerator(), timeoutMs: 1000 }),
      ...(analysis ? { analysis: new AnalysisResponder() } : {})
    }
  });
}

export function makeSimulation(id: string, overrides: Partial<SimulationResult> = {}, parameters: Partial<ParameterSet> = {}): SimulationResult {
  return {
    id,
    timestamp: FIXED_ISO,
    parameters: { ...DEFAULT_PARAMETERS, ...parameters },
    points: [{ power: 100, voltage: 0.95 }],
    criticalVoltage: 0.7,
    maxPower: 200,
    noseIndex: 0,
    convergedSteps: 1,
    stoppedBy: 'nose',
    ...overrides
  };
}

export function makeTurn(index: number, overrides: Partial<Turn> = {}): Turn {
  return {
    id: `turn-${index}`,
    index,
    role: 'user',
    kind: 'question',
    text: `message ${index}`,
    responseText: `reply ${index}`,
    timestamp: FIXED_ISO,
    outcome: 'ok',
    chainDepth: 0,
    ...overrides
  };
}
