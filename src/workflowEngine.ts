import type { FollowUp, ParameterProposal, PlanStep, ResponderOutcome, TurnClassifier, TurnPlanner } from './agents/type.js';
import { describeChange } from './agents/format.js';
import { Dispatcher, type ResponderSet } from './dispatcher.js';
import {
  AgentError,
  ClassificationFailure,
  InvalidParameterError,
  type ParameterError,
  RecursionLimitExceeded,
  ResponderFailure,
  StateIntegrityError,
  errorMessage
} from './errors.js';
import { HistoryContext } from './history/historyContext.js';
import { withTimeout } from './lib/timeoutGuard.js';
import { logger as rootLogger, type Logger } from './logger.js';
import { DEFAULT_PARAMETERS, PARAMETER_DEFINITIONS, PARAMETER_NAMES, isParameterName } from './parameters/definitions.js';
import { ParameterStore } from './parameters/parameterStore.js';
import { checkState, computeSeal, deepFreeze, type UnsealedState } from './stateSeal.js';
import type {
  ParameterChange,
  ParameterSet,
  Result,
  SessionState,
  Turn,
  TurnClassification,
  TurnKind,
  TurnLabel
} from './types.js';

export type EnginePhase = 'awaiting_turn' | 'classifying' | 'dispatching' | 'committing';

export interface WorkflowEngineDeps {
  classifier: TurnClassifier;
  /** Splits compound requests into ordered steps; without one every input is a single turn. */
  planner?: TurnPlanner;
  responders: ResponderSet;
  stateSecret: string;
  history?: HistoryContext;
  /** Follow-up turns one raw input may chain before the guard trips. */
  maxChainDepth?: number;
  confidenceThreshold?: number;
  /** Applied to the classifier and planner calls. */
  externalTimeoutMs?: number;
  /** Applied to a whole responder call; defaults to twice `externalTimeoutMs`. */
  responderTimeoutMs?: number;
  now?: () => Date;
  logger?: Logger;
}

export interface ProcessResult {
  state: SessionState;
  responseText: string;
  /** Turns appended by this call, oldest first. */
  turns: Turn[];
  errors: { code: string; message: string }[];
  /** Set when the input ran as a multi-step plan. */
  plan: PlanReport | null;
}

export interface PlanReport {
  description: string;
  steps: PlanStep[];
  completed: number;
  /** Planned steps not run because an earlier turn failed or the follow-up limit was reached. */
  skipped: PlanStep[];
}

interface PendingStep {
  text: string;
  role: Turn['role'];
  forcedLabel?: TurnLabel;
  planned: boolean;
}

interface TurnInput {
  text: string;
  role: Turn['role'];
  depth: number;
  forcedLabel?: TurnLabel;
}

interface TurnDraft extends TurnInput {
  kind: TurnKind;
  classification?: TurnClassification;
}

interface Committed {
  state: SessionState;
  turn: Turn;
  followUp: FollowUp | null;
}

export class WorkflowEngine {
  private readonly history: HistoryContext;
  private readonly dispatcher: Dispatcher;
  private readonly maxChainDepth: number;
  private readonly externalTimeoutMs: number;
  private readonly responderTimeoutMs: number;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(private readonly deps: WorkflowEngineDeps) {
    this.history = deps.history ?? new HistoryContext();
    this.dispatcher = new Dispatcher(deps.responders, deps.confidenceThreshold ?? 0.5);
    this.maxChainDepth = deps.maxChainDepth ?? 3;
    this.externalTimeoutMs = deps.externalTimeoutMs ?? 30_000;
    this.responderTimeoutMs = deps.responderTimeoutMs ?? this.externalTimeoutMs * 2;
    this.now = deps.now ?? (() => new Date());
    this.log = (deps.logger ?? rootLogger).child({ component: 'workflow' });
  }

  createInitialState(sessionId: string): SessionState {
    return this.seal({
      sessionId,
      parameters: Object.freeze({ ...DEFAULT_PARAMETERS }),
      parameterVersion: 0,
      log: Object.freeze([]),
      lastSimulation: null,
      contextSummary: ''
    });
  }

  /**
   * Runs one raw input through classify → dispatch → commit, plus any chained
   * follow-ups. A compound input runs its planned steps in order, with each
   * step's own follow-ups ahead of the next step. Only a state this engine did
   * not produce makes it throw.
   */
  async process(rawText: string, priorState: SessionState): Promise<ProcessResult> {
    const problem = checkState(priorState, this.deps.stateSecret);
    if (problem) throw new StateIntegrityError(`Rejected session state: ${problem}`);

    const plan = await this.plan(priorState.sessionId, rawText);
    const queue: PendingStep[] = plan
      ? plan.steps.map((step): PendingStep => ({ text: step.text, role: 'user', forcedLabel: step.label, planned: true }))
      : [{ text: rawText, role: 'user', planned: false }];

    const turns: Turn[] = [];
    let state = priorState;
    let completed = 0;
    for (let depth = 0; queue.length; depth++) {
      const step = queue[0];
      if (depth > this.maxChainDepth) {
        const label = step.forcedLabel ?? 'question';
        const limit = new RecursionLimitExceeded(this.maxChainDepth);
        this.log.warn({ sessionId: state.sessionId, depth, label }, '[Workflow] follow-up limit reached');
        const stopped = this.commit(
          state,
          { text: step.text, role: step.role, depth, kind: 'error' },
          { responseText: `${limit.message} Ask again for the ${label} step if you still want it.`, failure: limit }
        );
        state = stopped.state;
        turns.push(stopped.turn);
        break;
      }

      queue.shift();
      const committed = await this.runTurn(state, { text: step.text, role: step.role, forcedLabel: step.forcedLabel, depth });
      state = committed.state;
      turns.push(committed.turn);
      if (committed.turn.outcome === 'failed') break;
      if (step.planned) completed++;
      if (committed.followUp) {
        queue.unshift({ text: committed.followUp.text, role: 'assistant', forcedLabel: committed.followUp.label, planned: false });
      }
    }

    const report = plan ? planReport(plan, completed, queue) : null;
    const paragraphs = turns.map(t => t.responseText);
    if (report) paragraphs.push(planSummary(report));
    return {
      state,
      responseText: paragraphs.filter(Boolean).join('\n\n'),
      turns,
      errors: turns.flatMap(t => (t.error ? [t.error] : [])),
      plan: report
    };
  }

  /** Compound plans of two or more steps; a planner failure falls back to a single turn. */
  private async plan(sessionId: string, text: string): Promise<{ description: string; steps: PlanStep[] } | null> {
    if (!this.deps.planner) return null;
    try {
      const plan = await withTimeout(this.deps.planner.plan(text), this.externalTimeoutMs, 'planning');
      if (plan.kind === 'simple' || plan.steps.length < 2) return null;
      this.log.info({ sessionId, steps: plan.steps.map(s => s.label) }, '[Workflow] running multi-step plan');
      return plan;
    } catch (err) {
      this.log.warn({ sessionId, err: errorMessage(err) }, '[Workflow] planning failed, handling input as a single turn');
      return null;
    }
  }

  private async runTurn(state: SessionState, input: TurnInput): Promise<Committed> {
    const ctx = { sessionId: state.sessionId, turn: state.log.length, depth: input.depth };
    let phase: EnginePhase = 'classifying';
    this.log.debug({ ...ctx, phase }, '[Workflow] turn started');

    let classification: (TurnClassification & { label: TurnLabel }) | undefined;
    if (!input.forcedLabel) {
      const classified = await this.classify(state, input.text);
      if (!classified.ok) {
        this.log.warn({ ...ctx, err: classified.error.message }, '[Workflow] classification failed');
        return this.commit(state, { ...input, kind: 'error' }, {
          responseText: `Sorry, I could not interpret that message (${classified.error.message}). Nothing was changed; please try again.`,
          failure: classified.error
        });
      }
      classification = classified.value;
      if (classification.fallback) {
        this.log.info({ ...ctx, confidence: classification.confidence }, '[Workflow] low-confidence or unclassifiable input, answering as a question');
      }
    }
    const label: TurnLabel = input.forcedLabel ?? classification?.label ?? 'question';

    phase = 'dispatching';
    const responder = this.dispatcher.responderFor(label);
    const turnIndex = state.log.length;
    let outcome: ResponderOutcome;
    try {
      outcome = await withTimeout(
        responder.respond({
          text: input.text,
          parameters: state.parameters,
          history: this.history.view(state.log, state.parameters),
          timestamp: this.now().toISOString(),
          turnId: turnId(turnIndex),
          sessionId: state.sessionId
        }),
        this.responderTimeoutMs,
        `${responder.label} responder`
      );
    } catch (err) {
      const failure = new ResponderFailure(responder.label, errorMessage(err));
      this.log.error({ ...ctx, phase, err: failure.message }, '[Workflow] responder failed');
      outcome = {
        responseText: `Sorry, the ${responder.label} step failed (${failure.message}). Nothing was changed; please try again.`,
        failure
      };
    }

    phase = 'committing';
    this.log.debug({ ...ctx, phase, label: responder.label }, '[Workflow] committing turn');
    return this.commit(state, { ...input, kind: responder.label, classification }, outcome);
  }

  private async classify(
    state: SessionState,
    text: string
  ): Promise<Result<TurnClassification & { label: TurnLabel }, ClassificationFailure>> {
    try {
      const verdict = await withTimeout(
        this.deps.classifier.classify(text, this.history.classificationContext(state.log)),
        this.externalTimeoutMs,
        'classification'
      );
      return { ok: true, value: this.dispatcher.resolve(verdict) };
    } catch (err) {
      return { ok: false, error: new ClassificationFailure(`classifier error: ${errorMessage(err)}`, err) };
    }
  }

  /** Builds the next state as a fresh value; `prior` is never touched. */
  private commit(prior: SessionState, draft: TurnDraft, outcome: ResponderOutcome): Committed {
    let parameters = prior.parameters;
    let parameterVersion = prior.parameterVersion;
    let changes: ParameterChange[] = [];
    let responseText = outcome.responseText;
    let failure: AgentError | undefined = outcome.failure;

    if (!failure && outcome.parameterChange) {
      const store = new ParameterStore(prior.parameters, prior.parameterVersion);
      const applied = applyProposal(store, outcome.parameterChange);
      if (applied.ok) {
        changes = diffParameters(prior.parameters, applied.value);
        parameters = applied.value;
        parameterVersion = store.version;
        responseText = [changeSummary(outcome.parameterChange, changes), outcome.responseText].filter(Boolean).join('\n');
      } else {
        failure = applied.error;
        responseText = rejectionText(applied.error);
      }
    }

    const simulation = failure ? undefined : outcome.simulation;
    const index = prior.log.length;
    const turn: Turn = {
      id: turnId(index),
      index,
      role: draft.role,
      kind: draft.kind,
      text: draft.text,
      responseText,
      timestamp: this.now().toISOString(),
      outcome: failure ? 'failed' : 'ok',
      chainDepth: draft.depth,
      ...(draft.classification ? { classification: { ...draft.classification } } : {}),
      ...(changes.length ? { parameterChanges: changes } : {}),
      ...(simulation ? { simulation } : {}),
      ...(failure ? { error: { code: failure.code, message: failure.message } } : {})
    };
    deepFreeze(turn);

    const log = Object.freeze([...prior.log, turn]);
    const state = this.seal({
      sessionId: prior.sessionId,
      parameters,
      parameterVersion,
      log,
      lastSimulation: simulation ?? prior.lastSimulation,
      contextSummary: this.history.summarize(this.history.view(log, parameters))
    });

    this.log.info(
      { sessionId: state.sessionId, turnId: turn.id, kind: turn.kind, outcome: turn.outcome, depth: turn.chainDepth },
      '[Workflow] turn committed'
    );
    return { state, turn, followUp: failure ? null : outcome.followUp ?? null };
  }

  private seal(unsealed: UnsealedState): SessionState {
    return Object.freeze({ ...unsealed, seal: computeSeal(unsealed, this.deps.stateSecret) });
  }
}

function planReport(plan: { description: string; steps: PlanStep[] }, completed: number, left: PendingStep[]): PlanReport {
  const skipped = left.flatMap(s => (s.planned && s.forcedLabel ? [{ label: s.forcedLabel, text: s.text }] : []));
  return { description: plan.description, steps: plan.steps, completed, skipped };
}

function planSummary(report: PlanReport): string {
  const head = `Completed ${report.completed} of ${report.steps.length} planned steps (${report.description}).`;
  if (!report.skipped.length) return head;
  return `${head} Not run: ${report.skipped.map(s => `${s.label} "${s.text}"`).join(', ')}.`;
}

function turnId(index: number): string {
  return `turn-${index}`;
}

function applyProposal(store: ParameterStore, proposal: ParameterProposal): Result<Readonly<ParameterSet>, ParameterError> {
  if (proposal.kind === 'reset') return { ok: true as const, value: store.resetToDefault() };
  return store.apply(proposal.deltas);
}

function diffParameters(before: Readonly<ParameterSet>, after: Readonly<ParameterSet>): ParameterChange[] {
  return PARAMETER_NAMES
    .filter(name => before[name] !== after[name])
    .map(name => ({ name, previous: before[name], next: after[name] }));
}

function changeSummary(proposal: ParameterProposal, changes: ParameterChange[]): string {
  if (!changes.length) {
    return proposal.kind === 'reset'
      ? 'Parameters are already at their defaults.'
      : 'No parameters changed; the requested values are already set.';
  }
  const list = changes.map(c => describeChange(c.name, c.previous, c.next)).join(', ');
  return proposal.kind === 'reset' ? `Reset parameters to defaults: ${list}.` : `Updated parameters: ${list}.`;
}

function rejectionText(error: AgentError): string {
  const hint =
    error instanceof InvalidParameterError && isParameterName(error.parameter)
      ? ` Allowed values for ${error.parameter}: ${PARAMETER_DEFINITIONS[error.parameter].domain}.`
      : '';
  return `Could not update parameters. ${error.message}${hint} No parameters were changed.`;
}
