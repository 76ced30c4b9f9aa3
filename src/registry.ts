import { logger as rootLogger } from './logger.js';

/** A spawned process tree the registry can tear down on `stop`. */
export interface TrackedProcess {
  readonly pid: number | undefined;
  terminate(): void;
}

/** What a pipeline walk and its process runner consult while they work. */
export interface CancellationSignal {
  readonly cancelled: boolean;
  /** Register a live process; the returned function unregisters it. */
  track(process: TrackedProcess): () => void;
}

export type ActionState = {
  stops: number;
  runs: number;
  processes: Set<TrackedProcess>;
};

/** One invocation's hold on its action's shared state. */
export class ActiveRun {
  private ended = false;

  constructor(private readonly registry: RunRegistry, readonly actionId: string, private readonly state: ActionState) {}

  /**
   * A signal that fires for `stop` requests issued from now on. The recovery
   * pipeline takes a fresh one so it still runs after a cancelled primary.
   */
  newSignal(): CancellationSignal {
    const state = this.state;
    const baseline = state.stops;
    return {
      get cancelled() {
        return state.stops > baseline;
      },
      track(tracked: TrackedProcess) {
        state.processes.add(tracked);
        return () => {
          state.processes.delete(tracked);
        };
      }
    };
  }

  end(): void {
    if (this.ended) return;
    this.ended = true;
    this.registry.release(this.actionId, this.state);
  }
}

/**
 * Process-wide, per-action run state. Concurrent runs of the same action share
 * one entry, reference-counted by active runs, so a single `stop` reaches all
 * of their process trees.
 */
export class RunRegistry {
  private readonly actions = new Map<string, ActionState>();
  private readonly log = rootLogger.child({ component: 'run-registry' });

  begin(actionId: string): ActiveRun {
    let state = this.actions.get(actionId);
    if (!state) {
      state = { stops: 0, runs: 0, processes: new Set() };
      this.actions.set(actionId, state);
    }
    state.runs++;
    return new ActiveRun(this, actionId, state);
  }

  /** Cancel every active run of the action and kill its live process trees. */
  stop(actionId: string): boolean {
    const state = this.actions.get(actionId);
    if (!state) return false;
    state.stops++;
    this.log.info('stop requested', { actionId, activeRuns: state.runs, processes: state.processes.size });
    for (const tracked of [...state.processes]) {
      try {
        tracked.terminate();
      } catch (error) {
        this.log.warn('terminate failed', { actionId, pid: tracked.pid, error: error instanceof Error ? error.message : String(error) });
      }
    }
    return true;
  }

  isCancelled(actionId: string): boolean {
    const state = this.actions.get(actionId);
    return state !== undefined && state.stops > 0;
  }

  activeRuns(actionId: string): number {
    return this.actions.get(actionId)?.runs ?? 0;
  }

  liveProcesses(actionId: string): number {
    return this.actions.get(actionId)?.processes.size ?? 0;
  }

  /** @internal */
  release(actionId: string, state: ActionState): void {
    state.runs--;
    if (state.runs <= 0 && this.actions.get(actionId) === state) this.actions.delete(actionId);
  }
}

export const defaultRegistry = new RunRegistry();
