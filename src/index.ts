export * from './types.js';
export * from './errors.js';
export { RECOVERY_PREFIX, WorkflowEngine } from './runner.js';
export type { EngineOptions } from './runner.js';
export { RunRegistry, ActiveRun, defaultRegistry } from './registry.js';
export type { CancellationSignal, TrackedProcess } from './registry.js';
export { loadWorkflow, parseWorkflow, validateWorkflow, workflowSchema } from './config.js';
export { evalExpression, parseExpression, evaluateNode } from './utils/expression.js';
export type { ExpressionNode } from './utils/expression.js';
export { renderTemplate, renderString, parseTemplate, evaluateCondition } from './utils/template.js';
export { buildArgv } from './utils/argv.js';
export { runProcessStep } from './steps/run.js';
export { createLogger, setLogHandler, setLogLevel, logger } from './logger.js';
export type { Logger, LogEntry, LogLevel } from './logger.js';
