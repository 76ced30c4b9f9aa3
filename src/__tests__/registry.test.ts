import { afterAll, beforeAll, describe, it, expect, vi } from 'vitest';
import { setLogHandler, type LogEntry, type LogHandler } from '../logger.js';
import { RunRegistry, type TrackedProcess } from '../registry.js';

let previous: LogHandler;
beforeAll(() => {
  previous = setLogHandler(() => {});
});
afterAll(() => {
  setLogHandler(previous);
});

describe('RunRegistry', () => {
  it('returns false when stopping an action with no active run', () => {
    const registry = new RunRegistry();
    expect(registry.stop('idle')).toBe(false);
    expect(registry.isCancelled('idle')).toBe(false);
  });

  it('cancels signals of active runs and terminates tracked processes', () => {
    const registry = new RunRegistry();
    const run = registry.begin('deploy');
    const signal = run.newSignal();
    const tracked: TrackedProcess = { pid: 123, terminate: vi.fn() };
    signal.track(tracked);

    expect(signal.cancelled).toBe(false);
    expect(registry.stop('deploy')).toBe(true);
    expect(signal.cancelled).toBe(true);
    expect(registry.isCancelled('deploy')).toBe(true);
    expect(tracked.terminate).toHaveBeenCalledTimes(1);
    run.end();
  });

  it('keeps signalling the remaining trees when one terminate throws', () => {
    const entries: LogEntry[] = [];
    const restore = setLogHandler(entry => entries.push(entry));
    const registry = new RunRegistry();
    const run = registry.begin('deploy');
    const signal = run.newSignal();
    const failing: TrackedProcess = {
      pid: 11,
      terminate: vi.fn(() => {
        throw new Error('kill EPERM');
      })
    };
    const healthy: TrackedProcess = { pid: 12, terminate: vi.fn() };
    signal.track(failing);
    signal.track(healthy);

    try {
      expect(registry.stop('deploy')).toBe(true);
    } finally {
      setLogHandler(restore);
    }
    expect(failing.terminate).toHaveBeenCalledTimes(1);
    expect(healthy.terminate).toHaveBeenCalledTimes(1);
    expect(signal.cancelled).toBe(true);
    const warning = entries.find(entry => entry.level === 'warn');
    expect(warning?.message).toBe('terminate failed');
    expect(warning?.context).toMatchObject({ actionId: 'deploy', pid: 11, error: 'kill EPERM' });
    run.end();
  });

  it('gives a fresh signal that ignores earlier stops', () => {
    const registry = new RunRegistry();
    const run = registry.begin('deploy');
    const primary = run.newSignal();
    registry.stop('deploy');
    const recovery = run.newSignal();
    expect(primary.cancelled).toBe(true);
    expect(recovery.cancelled).toBe(false);
    run.end();
  });

  it('reaches every concurrent run of the same action', () => {
    const registry = new RunRegistry();
    const first = registry.begin('sync');
    const second = registry.begin('sync');
    const a = first.newSignal();
    const b = second.newSignal();
    expect(registry.activeRuns('sync')).toBe(2);
    registry.stop('sync');
    expect(a.cancelled).toBe(true);
    expect(b.cancelled).toBe(true);
    first.end();
    second.end();
  });

  it('untracks processes and releases state when the last run ends', () => {
    const registry = new RunRegistry();
    const run = registry.begin('build');
    const untrack = run.newSignal().track({ pid: 1, terminate: () => {} });
    expect(registry.liveProcesses('build')).toBe(1);
    untrack();
    expect(registry.liveProcesses('build')).toBe(0);

    run.end();
    run.end();
    expect(registry.activeRuns('build')).toBe(0);
    expect(registry.stop('build')).toBe(false);
  });

  it('does not cancel a run that begins after the last one released the action', () => {
    const registry = new RunRegistry();
    const old = registry.begin('build');
    registry.stop('build');
    old.end();
    const fresh = registry.begin('build');
    expect(fresh.newSignal().cancelled).toBe(false);
    expect(registry.isCancelled('build')).toBe(false);
    fresh.end();
  });
});
