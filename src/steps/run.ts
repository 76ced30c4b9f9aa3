import fs from 'node:fs';
import os from 'node:os';
import { performance } from 'node:perf_hooks';
import { setTimeout as delay } from 'node:timers/promises';
import type { ChildProcess, StdioOptions } from 'node:child_process';
import type { Readable } from 'node:stream';
import spawn from 'cross-spawn';
import { CancelledError, ConfigError, IoError, ProcessSpawnError, StepTimeoutError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { CancellationSignal, TrackedProcess } from '../registry.js';
import type { LineLogger, RunSpec, Scope, StepResult, Value, WorkflowConfig } from '../types.js';
import { buildArgv } from '../utils/argv.js';
import { LineSplitter } from '../utils/lines.js';
import { renderTemplate } from '../utils/template.js';
import { stringify } from '../utils/value.js';

const IS_WINDOWS = process.platform === 'win32';

export type StreamTarget = { mode: 'inherit' } | { mode: 'capture' } | { mode: 'file'; path: string };

export type ProcessRunOptions = {
  stepId: string;
  spec: RunSpec;
  scope: Scope;
  config: WorkflowConfig;
  signal: CancellationSignal;
  log: LineLogger;
  logger: Logger;
  pollIntervalMs: number;
  killGraceMs: number;
};

type ExitInfo = { code: number | null; signal: NodeJS.Signals | null };

/** Apply the `runtime.<name>.executable` override table. */
export function resolveProgram(program: string, config: WorkflowConfig, scope: Scope): string {
  const runtime = config.runtime ?? {};
  if (!Object.hasOwn(runtime, program)) return program;
  return stringify(renderTemplate(runtime[program].executable, scope));
}

export function resolveStreamTarget(mode: string, scope: Scope): StreamTarget {
  if (mode === 'inherit') return { mode: 'inherit' };
  if (mode === 'capture') return { mode: 'capture' };
  if (mode.startsWith('file:')) {
    const path = stringify(renderTemplate(mode.slice('file:'.length), scope));
    if (!path) throw new ConfigError(`Stream mode '${mode}' needs a path`);
    return { mode: 'file', path };
  }
  throw new ConfigError(`Unsupported stream mode: ${mode}`);
}

/** Process environment, then app-level, then step-level overrides. */
export function buildEnv(layers: Array<Record<string, Value> | undefined>, scope: Scope): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) env[key] = value;
  }
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer ?? {})) env[key] = stringify(renderTemplate(value, scope));
  }
  return env;
}

/** Signal the whole process group (or tree, on Windows) rooted at the child. */
export function killTree(child: ChildProcess, signal: NodeJS.Signals, logger: Logger): void {
  const pid = child.pid;
  if (pid === undefined) return;
  if (IS_WINDOWS) {
    const killer = spawn('taskkill', ['/PID', String(pid), '/T', '/F'], { stdio: 'ignore', windowsHide: true });
    killer.on('error', err => logger.warn('taskkill failed', { pid, error: err.message }));
    return;
  }
  try {
    process.kill(-pid, signal);
  } catch (err) {
    // already gone
    if (err instanceof Error && 'code' in err && err.code === 'ESRCH') return;
    throw err;
  }
}

function exitCodeOf(info: ExitInfo | undefined): number {
  if (!info) return -1;
  if (info.code !== null) return info.code;
  const signo = Object.entries(os.constants.signals).find(([name]) => name === info.signal)?.[1];
  return signo === undefined ? 1 : 128 + signo;
}

function attachReader(stream: Readable | null, splitter: LineSplitter, name: string, logger: Logger): void {
  if (!stream) return;
  stream.setEncoding('utf8');
  stream.on('data', (chunk: string) => splitter.push(chunk));
  stream.on('end', () => splitter.end());
  stream.on('error', err => logger.warn('stream read failed', { stream: name, error: err.message }));
}

function watch(child: ChildProcess) {
  let exitInfo: ExitInfo | undefined;
  let spawnError: Error | undefined;
  let closed = false;
  const exitedPromise = new Promise<void>(resolve => {
    child.once('exit', (code, signal) => {
      exitInfo = { code, signal };
      resolve();
    });
  });
  const failedPromise = new Promise<void>(resolve => {
    child.once('error', err => {
      spawnError = err;
      resolve();
    });
  });
  const closedPromise = new Promise<void>(resolve => {
    child.once('close', () => {
      closed = true;
      resolve();
    });
  });
  return {
    exited: exitedPromise,
    failed: failedPromise,
    closed: closedPromise,
    exitInfo: () => exitInfo,
    spawnError: () => spawnError,
    isClosed: () => closed
  };
}

function openTarget(target: StreamTarget, fds: number[], stepId: string): 'inherit' | 'pipe' | number {
  if (target.mode === 'inherit') return 'inherit';
  if (target.mode === 'capture') return 'pipe';
  try {
    const fd = fs.openSync(target.path, 'w');
    fds.push(fd);
    return fd;
  } catch (err) {
    throw new IoError(`Cannot open output file ${target.path}`, { stepId, cause: err });
  }
}

/**
 * Run one `run` step: spawn the program in its own process group, stream
 * stdout/stderr line by line, and poll for exit, cancellation and timeout.
 */
export async function runProcessStep(options: ProcessRunOptions): Promise<StepResult> {
  const { stepId, spec, scope, config, log } = options;
  const program = resolveProgram(stringify(renderTemplate(spec.program, scope)), config, scope);
  const argv = buildArgv(spec.argv ?? [], scope);
  const shell = spec.shell ?? config.app?.shell ?? false;
  const rawWorkdir = spec.workdir ?? config.app?.workdir;
  const cwd = rawWorkdir ? stringify(renderTemplate(rawWorkdir, scope)) || undefined : undefined;
  const env = buildEnv([config.app?.env, spec.env], scope);
  const defaultMode = spec.capture === false ? 'inherit' : 'capture';
  const stdoutTarget = resolveStreamTarget(spec.stdout ?? defaultMode, scope);
  const stderrTarget = resolveStreamTarget(spec.stderr ?? defaultMode, scope);

  log(`[run] ${stepId}: ${program} ${JSON.stringify(argv)}`);

  const fds: number[] = [];
  try {
    const stdio: StdioOptions = [
      'ignore',
      openTarget(stdoutTarget, fds, stepId),
      openTarget(stderrTarget, fds, stepId)
    ];
    return await supervise(options, program, argv, { cwd, env, shell, stdio });
  } finally {
    for (const fd of fds) fs.closeSync(fd);
  }
}

async function supervise(
  options: ProcessRunOptions,
  program: string,
  argv: string[],
  spawnOptions: { cwd?: string; env: Record<string, string>; shell: boolean; stdio: StdioOptions }
): Promise<StepResult> {
  const { stepId, spec, signal, log, logger, pollIntervalMs, killGraceMs } = options;
  const started = performance.now();

  let child: ChildProcess;
  try {
    child = spawn(program, argv, { ...spawnOptions, detached: !IS_WINDOWS, windowsHide: true });
  } catch (err) {
    throw new ProcessSpawnError(stepId, program, err);
  }

  const stdout = new LineSplitter(line => log(`[stdout] ${line}`));
  const stderr = new LineSplitter(line => log(`[stderr] ${line}`));
  attachReader(child.stdout, stdout, 'stdout', logger);
  attachReader(child.stderr, stderr, 'stderr', logger);
  const state = watch(child);

  const tree: TrackedProcess = { pid: child.pid, terminate: () => killTree(child, 'SIGTERM', logger) };
  const untrack = signal.track(tree);
  logger.debug('process spawned', { stepId, pid: child.pid, program });

  const snapshot = (): StepResult => {
    stdout.end();
    stderr.end();
    return {
      exit_code: exitCodeOf(state.exitInfo()),
      stdout: stdout.text(),
      stderr: stderr.text(),
      duration_ms: Math.round(performance.now() - started)
    };
  };
  const deadline = spec.timeout_ms ? started + spec.timeout_ms : undefined;

  try {
    // Wait for `close`, not just `exit`: both readers must drain first.
    while (!state.isClosed()) {
      const spawnError = state.spawnError();
      if (spawnError && child.pid === undefined) throw new ProcessSpawnError(stepId, program, spawnError);
      if (signal.cancelled) {
        killTree(child, 'SIGTERM', logger);
        await Promise.race([state.exited, delay(killGraceMs, undefined, { ref: false })]);
        if (!state.exitInfo()) logger.warn('process ignored SIGTERM, killing', { stepId, pid: child.pid });
        // stragglers in the group die either way
        killTree(child, 'SIGKILL', logger);
        await state.closed;
        throw new CancelledError({ stepId, partial: snapshot() });
      }
      if (deadline !== undefined && performance.now() >= deadline) {
        killTree(child, 'SIGKILL', logger);
        await state.closed;
        throw new StepTimeoutError(stepId, spec.timeout_ms ?? 0, snapshot());
      }
      const waits = [state.closed, delay(pollIntervalMs, undefined, { ref: false })];
      if (!spawnError) waits.push(state.failed);
      await Promise.race(waits);
    }
    const spawnError = state.spawnError();
    if (spawnError && child.pid === undefined) throw new ProcessSpawnError(stepId, program, spawnError);
    const result = snapshot();
    if (signal.cancelled) throw new CancelledError({ stepId, partial: result });
    logger.debug('process finished', { stepId, exitCode: result.exit_code, durationMs: result.duration_ms });
    return result;
  } finally {
    untrack();
  }
}
