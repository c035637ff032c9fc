export interface ChatMessage { role: 'system' | 'user' | 'assistant'; content: string; }

export type TurnLabel = 'question' | 'parameter' | 'generation' | 'analysis';
export type TurnKind = TurnLabel | 'error';
export const TURN_LABELS: readonly TurnLabel[] = ['question', 'parameter', 'generation', 'analysis'];

export type GridName = 'ieee14' | 'ieee24' | 'ieee30' | 'ieee39' | 'ieee57' | 'ieee118' | 'ieee300';
export type LoadType = 'inductive' | 'capacitive';

export interface ParameterSet {
  grid: GridName;
  monitored_bus: number;
  base_power: number;
  step_size: number;
  max_scale: number;
  power_factor: number;
  voltage_limit: number;
  load_type: LoadType;
  continuation: boolean;
}

export type ParameterName = keyof ParameterSet;
export type ParameterValue = ParameterSet[ParameterName];

export interface ParameterChange {
  name: ParameterName;
  previous: ParameterValue;
  next: ParameterValue;
}

export interface CurvePoint { power: number; voltage: number; }

export interface SimulationResult {
  id: string;
  timestamp: string;
  parameters: ParameterSet;
  points: CurvePoint[];
  criticalVoltage: number;  // pu, at the nose
  maxPower: number;         // MW
  noseIndex: number;
  convergedSteps: number;
  stoppedBy: 'nose' | 'voltage_limit' | 'max_scale';
}

export interface TurnClassification {
  label: TurnLabel | 'unclassifiable';
  confidence: number | null;
  fallback: boolean;
}

export interface Turn {
  id: string;
  index: number;
  role: 'user' | 'assistant';          // assistant = follow-up chained by the engine
  kind: TurnKind;
  text: string;
  responseText: string;
  timestamp: string;
  outcome: 'ok' | 'failed';
  chainDepth: number;
  classification?: TurnClassification;
  parameterChanges?: ParameterChange[];
  simulation?: SimulationResult;
  error?: { code: string; message: string };
}

export type InteractionLog = readonly Turn[];

export interface ParameterEvolutionEntry {
  timestamp: string;
  previous: ParameterValue;
  next: ParameterValue;
  turnId: string;
}

export type ParameterEvolution = Record<ParameterName, ParameterEvolutionEntry[]>;

export interface HistoryView {
  conversation: Turn[];            // most recent first
  simulations: SimulationResult[]; // most recent first
  evolution: ParameterEvolution;
}

export interface SessionState {
  sessionId: string;
  parameters: ParameterSet;
  parameterVersion: number;
  log: InteractionLog;
  lastSimulation: SimulationResult | null;
  contextSummary: string;
  seal: string;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };
