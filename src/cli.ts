#!/usr/bin/env node
import path from 'node:path';
import dotenv from 'dotenv';
import { loadWorkflow } from './config.js';
import { EngineError, RecoveryError } from './errors.js';
import { setLogLevel } from './logger.js';
import { WorkflowEngine } from './runner.js';
import { parseFormArgs, readSettings } from './settings.js';

dotenv.config();

async function main() {
  const args = process.argv.slice(2);
  const resolveOnly = args.includes('--resolve');
  const [fileArg, actionId, ...rest] = args.filter(arg => arg !== '--resolve');
  if (!fileArg) {
    console.error('Usage: wfrun <workflow.yml> [action] [--resolve] [key=value ...]');
    process.exit(1);
  }
  const settings = readSettings();
  setLogLevel(settings.logLevel);

  const config = loadWorkflow(path.resolve(process.cwd(), fileArg));
  const engine = new WorkflowEngine(config, {
    pollIntervalMs: settings.pollIntervalMs,
    killGraceMs: settings.killGraceMs
  });

  if (!actionId) {
    for (const id of engine.actionIds()) console.log(`${id}\t${engine.getAction(id).title}`);
    return;
  }

  const form = parseFormArgs(rest);
  if (resolveOnly) {
    console.log(JSON.stringify(engine.resolve(actionId, form), null, 2));
    return;
  }

  process.once('SIGINT', () => {
    console.error(`Stopping ${actionId}...`);
    engine.stop(actionId);
  });
  const result = await engine.run(actionId, form, line => console.log(line));
  console.log('\n=== Run Result ===');
  console.log(JSON.stringify(result, null, 2));
}

main().catch((e) => {
  if (e instanceof RecoveryError) {
    console.error(JSON.stringify({ error: e.primary, recovery_error: e.recovery }, null, 2));
  } else if (e instanceof EngineError) {
    console.error(JSON.stringify({ error: e.toContext() }, null, 2));
  } else {
    console.error(e);
  }
  process.exit(1);
});
