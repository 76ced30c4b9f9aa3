import fs from 'node:fs';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { ArgvItem, RunSpec, Step, Value, WorkflowConfig } from './types.js';

// ---------------------------------------------------------------------------
// Zod schemas
// ---------------------------------------------------------------------------

const valueSchema: z.ZodType<Value> = z.lazy(() =>
  z.union([z.null(), z.boolean(), z.number(), z.string(), z.array(valueSchema), z.record(z.string(), valueSchema)])
);

const argvOptionSchema = z
  .object({
    opt: z.string().min(1),
    from: valueSchema.optional(),
    mode: z.enum(['auto', 'flag', 'value', 'repeat', 'join']).optional(),
    style: z.enum(['separate', 'equals']).optional(),
    template: z.string().optional(),
    joiner: z.string().optional(),
    false_opt: z.string().optional(),
    omit_if_empty: z.boolean().optional(),
    when: valueSchema.optional()
  })
  .strict();

const argvShorthandSchema = z
  .record(z.string(), valueSchema)
  .refine(item => Object.keys(item).length === 1 && !Object.hasOwn(item, 'opt'), {
    message: 'shorthand argv entries take exactly one option'
  });

const argvItemSchema: z.ZodType<ArgvItem> = z.union([z.string(), argvOptionSchema, argvShorthandSchema]);

const streamModeSchema = z
  .string()
  .refine(mode => mode === 'inherit' || mode === 'capture' || mode.startsWith('file:'), {
    message: 'expected inherit, capture or file:<path>'
  });

const runSpecSchema: z.ZodType<RunSpec> = z
  .object({
    program: z.string().min(1),
    argv: z.array(argvItemSchema).optional(),
    env: z.record(z.string(), valueSchema).optional(),
    workdir: z.string().optional(),
    shell: z.boolean().optional(),
    stdout: streamModeSchema.optional(),
    stderr: streamModeSchema.optional(),
    capture: z.boolean().optional(),
    timeout_ms: z.number().int().positive().optional()
  })
  .strict();

const stepBase = {
  id: z.string().min(1).optional(),
  when: valueSchema.optional(),
  continue_on_error: z.boolean().optional()
};

const stepSchema: z.ZodType<Step> = z.lazy(() =>
  z.union([
    z.object({ ...stepBase, run: runSpecSchema }).strict(),
    z.object({ ...stepBase, pipeline: z.array(stepSchema) }).strict(),
    z
      .object({
        ...stepBase,
        foreach: z
          .object({
            in: valueSchema,
            as: z.string().min(1).optional(),
            steps: z.array(stepSchema).optional()
          })
          .strict()
      })
      .strict()
  ])
);

const actionSchema = z
  .object({
    title: z.string().min(1),
    pipeline: z.array(stepSchema).optional(),
    run: runSpecSchema.optional(),
    on_error: z.array(stepSchema).optional()
  })
  .refine(action => action.pipeline !== undefined || action.run !== undefined, {
    message: 'action requires pipeline or run'
  });

export const workflowSchema: z.ZodType<WorkflowConfig> = z.object({
  version: z.literal(1),
  vars: z.record(z.string(), valueSchema).optional(),
  app: z
    .object({
      env: z.record(z.string(), valueSchema).optional(),
      workdir: z.string().optional(),
      shell: z.boolean().optional()
    })
    .optional(),
  runtime: z.record(z.string(), z.object({ executable: z.string().min(1) })).optional(),
  actions: z.record(z.string(), actionSchema).refine(actions => Object.keys(actions).length > 0, {
    message: 'actions must be a non-empty map'
  })
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/** Validate an already-parsed document. */
export function validateWorkflow(doc: unknown): WorkflowConfig {
  const parsed = workflowSchema.safeParse(doc);
  if (!parsed.success) throw new ConfigError(`Invalid workflow: ${describeIssues(parsed.error)}`, { cause: parsed.error });
  return parsed.data;
}

export function parseWorkflow(text: string): WorkflowConfig {
  let doc: unknown;
  try {
    doc = YAML.parse(text);
  } catch (err) {
    throw new ConfigError(`Invalid YAML: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }
  return validateWorkflow(doc);
}

export function loadWorkflow(filePath: string): WorkflowConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    throw new ConfigError(`Cannot read workflow file ${filePath}`, { cause: err });
  }
  return parseWorkflow(raw);
}
