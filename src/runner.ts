import os from 'node:os';
import {
  CancelledError,
  ConfigError,
  EngineError,
  EvaluationError,
  ProcessExitError,
  RecoveryError,
  asEngineError,
  partialResultOf
} from './errors.js';
import { type Logger, logger as rootLogger } from './logger.js';
import { type ActiveRun, type CancellationSignal, type RunRegistry, defaultRegistry } from './registry.js';
import { runProcessStep } from './steps/run.js';
import type {
  Action,
  ForeachStep,
  LineLogger,
  PipelineStep,
  RunMeta,
  RunResult,
  RunStep,
  Scope,
  Step,
  StepResult,
  Value,
  ValueMap,
  WorkflowConfig
} from './types.js';
import { evaluateCondition, renderTemplate, resolveExpression } from './utils/template.js';
import { isMap, toValueMap } from './utils/value.js';

/** Recovery step results land in the final map under this prefix. */
export const RECOVERY_PREFIX = 'on_error.';

/** Key of the run metadata inside a RunResult; no step may take it. */
const META_KEY = '_meta';

export type EngineOptions = {
  registry?: RunRegistry;
  pollIntervalMs?: number;
  killGraceMs?: number;
  logger?: Logger;
};

/** Per-walk state: one for the primary pipeline, a fresh one for recovery. */
type RunContext = {
  actionId: string;
  vars: ValueMap;
  form: ValueMap;
  /** Results written by this walk. */
  results: Record<string, StepResult>;
  /** Results of an earlier walk that this one may read (recovery sees the primary's). */
  inherited: Record<string, StepResult>;
  extra: ValueMap;
  signal: CancellationSignal;
  log: LineLogger;
};

function isRunStep(step: Step): step is RunStep {
  return 'run' in step;
}

function isPipelineStep(step: Step): step is PipelineStep {
  return 'pipeline' in step;
}

function isForeachStep(step: Step): step is ForeachStep {
  return 'foreach' in step;
}

function flatten(results: Record<string, StepResult>, meta: RunMeta): RunResult {
  return { ...results, _meta: meta };
}

function environmentValues(): ValueMap {
  const env: ValueMap = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) env[key] = value;
  }
  return env;
}

export class WorkflowEngine {
  private readonly registry: RunRegistry;
  private readonly pollIntervalMs: number;
  private readonly killGraceMs: number;
  private readonly logger: Logger;

  constructor(private readonly config: WorkflowConfig, options: EngineOptions = {}) {
    this.registry = options.registry ?? defaultRegistry;
    this.pollIntervalMs = options.pollIntervalMs ?? 100;
    this.killGraceMs = options.killGraceMs ?? 1000;
    this.logger = options.logger ?? rootLogger.child({ component: 'engine' });
  }

  actionIds(): string[] {
    return Object.keys(this.config.actions);
  }

  getAction(actionId: string): Action {
    if (!Object.hasOwn(this.config.actions, actionId)) throw new ConfigError(`Unknown action: ${actionId}`);
    return this.config.actions[actionId];
  }

  /** Compute the action's variables for display; runs no process. */
  resolve(actionId: string, form: Record<string, unknown>): ValueMap {
    this.getAction(actionId);
    return this.resolveVars(toValueMap(form));
  }

  stop(actionId: string): boolean {
    return this.registry.stop(actionId);
  }

  isCancelled(actionId: string): boolean {
    return this.registry.isCancelled(actionId);
  }

  async run(actionId: string, formValues: Record<string, unknown>, log: LineLogger): Promise<RunResult> {
    const action = this.getAction(actionId);
    const pipeline = this.pipelineOf(actionId, action);
    const form = toValueMap(formValues);
    const logger = this.logger.child({ actionId });

    const active = this.registry.begin(actionId);
    try {
      const vars = this.resolveVars(form);
      const ctx: RunContext = {
        actionId,
        vars,
        form,
        results: {},
        inherited: {},
        extra: {},
        signal: active.newSignal(),
        log
      };
      logger.debug('run started', { steps: pipeline.length });
      try {
        await this.runSteps(pipeline, ctx, {});
      } catch (err) {
        const primary = asEngineError(err, '');
        if (!action.on_error) throw primary;
        return await this.recover(action.on_error, ctx, primary, active, logger);
      }
      logger.debug('run finished', { status: 'success' });
      return flatten(ctx.results, { status: 'success' });
    } finally {
      active.end();
    }
  }

  private async recover(
    steps: Step[],
    primaryCtx: RunContext,
    primary: EngineError,
    active: ActiveRun,
    logger: Logger
  ): Promise<RunResult> {
    const error = primary.toContext();
    primaryCtx.log(`[recover] ${error.step_id}: ${error.type}`);
    logger.info('running recovery pipeline', { failedStep: error.step_id, errorType: error.type });

    const ctx: RunContext = {
      ...primaryCtx,
      results: {},
      inherited: primaryCtx.results,
      extra: { error },
      signal: active.newSignal()
    };
    try {
      await this.runSteps(steps, ctx, {});
    } catch (err) {
      const failure = asEngineError(err, '').toContext();
      throw new RecoveryError(error, { ...failure, step_id: RECOVERY_PREFIX + failure.step_id }, { cause: err });
    }

    const recovered: Record<string, StepResult> = { ...primaryCtx.results };
    for (const [stepId, result] of Object.entries(ctx.results)) recovered[RECOVERY_PREFIX + stepId] = result;
    return flatten(recovered, { status: 'recovered', error });
  }

  private pipelineOf(actionId: string, action: Action): Step[] {
    if (action.pipeline !== undefined) {
      if (!Array.isArray(action.pipeline)) throw new ConfigError(`Action ${actionId}: pipeline must be a list`);
      return action.pipeline;
    }
    if (action.run !== undefined) return [{ id: `${actionId}_run`, run: action.run }];
    throw new ConfigError(`Action ${actionId} requires pipeline or run`);
  }

  /** Declaration order; each var sees the ones before it. */
  private resolveVars(form: ValueMap): ValueMap {
    const vars: ValueMap = {};
    for (const [name, raw] of Object.entries(this.config.vars ?? {})) {
      const declared: Value = isMap(raw) && Object.hasOwn(raw, 'default') ? raw.default : raw;
      const scope = this.baseScope({ vars, form, results: {}, inherited: {}, extra: {} }, {});
      vars[name] = renderTemplate(declared, scope);
    }
    return vars;
  }

  private baseScope(ctx: Pick<RunContext, 'vars' | 'form' | 'results' | 'inherited' | 'extra'>, bindings: ValueMap): Scope {
    return {
      vars: { ...ctx.vars },
      form: ctx.form,
      env: environmentValues(),
      step: { ...ctx.inherited, ...ctx.results },
      cwd: process.cwd(),
      home: os.homedir(),
      temp: os.tmpdir(),
      os: process.platform === 'win32' ? 'nt' : 'posix',
      ...ctx.extra,
      ...bindings
    };
  }

  private stepIdOf(step: Step, ctx: RunContext, suffix: string): string {
    if (step.id) return step.id + suffix;
    return `step_${Object.keys(ctx.results).length + 1}`;
  }

  /** Checked before the process starts: ids are unique within one walk. */
  private claim(ctx: RunContext, stepId: string): void {
    if (stepId === META_KEY || stepId.startsWith(RECOVERY_PREFIX)) {
      throw new ConfigError(`Reserved step id: ${stepId}`, { stepId });
    }
    if (Object.hasOwn(ctx.results, stepId)) throw new ConfigError(`Duplicate step id: ${stepId}`, { stepId });
  }

  /**
   * Walk steps in order. `suffix` tags explicit step ids inside foreach
   * bodies (`build[0]`, `build[1]`) so every iteration keeps its result.
   */
  private async runSteps(steps: Step[], ctx: RunContext, bindings: ValueMap, suffix = ''): Promise<void> {
    for (const step of steps) {
      const stepId = this.stepIdOf(step, ctx, suffix);
      if (ctx.signal.cancelled) throw new CancelledError({ stepId });

      const scope = this.baseScope(ctx, bindings);
      try {
        if (step.when !== undefined && !evaluateCondition(step.when, scope)) {
          ctx.log(`[skip] ${stepId} (when=false)`);
          continue;
        }
        await this.dispatch(step, stepId, scope, ctx, bindings, suffix);
      } catch (err) {
        const error = asEngineError(err, stepId);
        const partial = partialResultOf(error);
        if (partial && error.stepId && !Object.hasOwn(ctx.results, error.stepId)) ctx.results[error.stepId] = partial;
        if (!step.continue_on_error || error.kind === 'config') throw error;
        ctx.log(`[warn] ${stepId}: ${error.message}`);
        this.logger.warn('step failed, continuing', { actionId: ctx.actionId, stepId, errorType: error.kind });
      }
    }
  }

  private async dispatch(
    step: Step,
    stepId: string,
    scope: Scope,
    ctx: RunContext,
    bindings: ValueMap,
    suffix: string
  ): Promise<void> {
    if (isRunStep(step)) {
      this.claim(ctx, stepId);
      const result = await runProcessStep({
        stepId,
        spec: step.run,
        scope,
        config: this.config,
        signal: ctx.signal,
        log: ctx.log,
        logger: this.logger.child({ actionId: ctx.actionId }),
        pollIntervalMs: this.pollIntervalMs,
        killGraceMs: this.killGraceMs
      });
      ctx.results[stepId] = result;
      if (result.exit_code !== 0 && !step.continue_on_error) throw new ProcessExitError(stepId, result.exit_code);
      return;
    }
    if (isPipelineStep(step)) {
      if (!Array.isArray(step.pipeline)) throw new ConfigError(`Step ${stepId}: pipeline must be a list`, { stepId });
      await this.runSteps(step.pipeline, ctx, bindings, suffix);
      return;
    }
    if (isForeachStep(step)) {
      const items = resolveExpression(step.foreach.in, scope);
      if (!Array.isArray(items)) throw new EvaluationError(`foreach.in must evaluate to a list (step ${stepId})`);
      const alias = step.foreach.as ?? 'item';
      const body = step.foreach.steps ?? [];
      for (const [index, item] of items.entries()) {
        const iteration: ValueMap = { ...bindings, [alias]: item, loop: { index } };
        await this.runSteps(body, ctx, iteration, `${suffix}[${index}]`);
      }
      return;
    }
    throw new ConfigError(`Step ${stepId} has no known type (expected run, pipeline or foreach)`, { stepId });
  }
}
