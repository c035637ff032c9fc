import type { AgentError, GenerationFailure } from '../errors.js';
import type { ClassificationContextEntry } from '../history/historyContext.js';
import type {
  ChatMessage,
  CurvePoint,
  HistoryView,
  ParameterSet,
  Result,
  SimulationResult,
  TurnLabel
} from '../types.js';

// ---- external collaborators

export type ClassifierVerdict =
  | { kind: 'classified'; label: TurnLabel; confidence: number }
  | { kind: 'unclassifiable'; reason: string };

export interface TurnClassifier {
  classify(text: string, context: ClassificationContextEntry[]): Promise<ClassifierVerdict>;
}

export interface PlanStep {
  label: TurnLabel;
  text: string;
}

/** A compound request split into ordered steps; anything else is `simple`. */
export type TurnPlan =
  | { kind: 'simple' }
  | { kind: 'compound'; description: string; steps: PlanStep[] };

export interface TurnPlanner {
  plan(text: string): Promise<TurnPlan>;
}

export interface Snippet {
  id: string;
  title: string;
  text: string;
  score: number;
}

export interface Retriever {
  retrieve(query: string): Promise<Snippet[]>;
}

export interface TextGenerator {
  generate(messages: ChatMessage[]): Promise<string>;
}

export interface ParameterModification {
  parameter: string;
  value: string | number | boolean;
}

export interface ParameterExtraction {
  modifications: ParameterModification[];
  reset: boolean;
  thenGenerate: boolean;
}

export interface ParameterExtractor {
  extract(text: string, current: Readonly<ParameterSet>): Promise<ParameterExtraction>;
}

export interface CurveData {
  points: CurvePoint[];
  criticalVoltage: number;
  maxPower: number;
  noseIndex: number;
  convergedSteps: number;
  stoppedBy: SimulationResult['stoppedBy'];
}

export interface CurveGenerator {
  generate(parameters: Readonly<ParameterSet>): Promise<Result<CurveData, GenerationFailure>>;
}

// ---- responders

export interface ResponderInput {
  text: string;
  parameters: Readonly<ParameterSet>;
  history: HistoryView;
  timestamp: string;
  turnId: string;
  sessionId: string;
}

export type ParameterProposal =
  | { kind: 'update'; deltas: Record<string, unknown> }
  | { kind: 'reset' };

export interface FollowUp { label: TurnLabel; text: string; }

/** What a responder hands back for commit. Responders never touch session state. */
export interface ResponderOutcome {
  responseText: string;
  parameterChange?: ParameterProposal;
  simulation?: SimulationResult;
  followUp?: FollowUp;
  failure?: AgentError;
}

export interface Responder {
  readonly label: TurnLabel;
  respond(input: ResponderInput): Promise<ResponderOutcome>;
}
