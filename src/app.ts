import express from 'express';
import cookieParser from 'cookie-parser';
import { AnalysisResponder } from './agents/AnalysisResponder.js';
import { GenerationResponder } from './agents/GenerationResponder.js';
import { ParameterResponder } from './agents/ParameterResponder.js';
import { QuestionResponder } from './agents/QuestionResponder.js';
import type { ParameterExtractor, TextGenerator, TurnClassifier, TurnPlanner } from './agents/type.js';
import type { AppConfig } from './config.js';
import { HistoryContext } from './history/historyContext.js';
import type { Logger } from './logger.js';
import { OpenAIChat, OpenAIClassifier, OpenAIParameterExtractor, OpenAIPlanner, OpenAITextGenerator } from './openaiService.js';
import { ClausePlanner } from './reasoner/clausePlanner.js';
import { KeywordClassifier } from './reasoner/keywordClassifier.js';
import { PatternParameterExtractor } from './reasoner/patternExtractor.js';
import { createAgentRouter } from './routes/agent.js';
import { createSessionStore, type SessionStore } from './sessionStore.js';
import { TheveninCurveGenerator } from './simulation/theveninCurve.js';
import { KeywordRetriever, loadKnowledgeBase } from './vectorStore.js';
import { WorkflowEngine } from './workflowEngine.js';

/** Wires adapters, responders and the engine. Without an OpenAI key the offline adapters are used. */
export function buildEngine(config: AppConfig, log: Logger): WorkflowEngine {
  const history = new HistoryContext(config.history);

  let classifier: TurnClassifier;
  let planner: TurnPlanner;
  let extractor: ParameterExtractor;
  let generator: TextGenerator | null;
  if (config.openaiApiKey) {
    const chat = new OpenAIChat({ apiKey: config.openaiApiKey, model: config.openaiModel, logger: log });
    classifier = new OpenAIClassifier(chat);
    planner = new OpenAIPlanner(chat);
    extractor = new OpenAIParameterExtractor(chat);
    generator = new OpenAITextGenerator(chat);
  } else {
    log.warn('[Setup] OPENAI_API_KEY not set, using keyword classifier, clause planner and pattern extractor');
    classifier = new KeywordClassifier();
    planner = new ClausePlanner(classifier);
    extractor = new PatternParameterExtractor();
    generator = null;
  }

  return new WorkflowEngine({
    classifier,
    planner,
    history,
    responders: {
      question: new QuestionResponder({ retriever: new KeywordRetriever(loadKnowledgeBase()), generator, history, logger: log }),
      parameter: new ParameterResponder(extractor),
      generation: new GenerationResponder({
        generator: new TheveninCurveGenerator(),
        timeoutMs: config.externalTimeoutMs,
        logger: log
      }),
      analysis: new AnalysisResponder()
    },
    stateSecret: config.stateSecret,
    maxChainDepth: config.maxChainDepth,
    confidenceThreshold: config.classifierConfidenceThreshold,
    externalTimeoutMs: config.externalTimeoutMs,
    logger: log
  });
}

export function createApp(sessions: SessionStore, log: Logger) {
  const app = express();
  app.use(express.json());
  app.use(cookieParser());

  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });
  app.use('/agent', createAgentRouter(sessions, log));
  return app;
}

export function createSessions(config: AppConfig, log: Logger): SessionStore {
  return createSessionStore(buildEngine(config, log));
}
