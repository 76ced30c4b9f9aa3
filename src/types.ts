export type Value = null | boolean | number | string | Value[] | ValueMap;
export type ValueMap = { [key: string]: Value };

/** Read-only names visible to an expression. */
export type Scope = { readonly [name: string]: Value };

export type ArgvMode = 'auto' | 'flag' | 'value' | 'repeat' | 'join';
export type ArgvStyle = 'separate' | 'equals';

export type ArgvOption = {
  opt: string;
  from?: Value;
  mode?: ArgvMode;
  style?: ArgvStyle;
  template?: string; // per-item format, e.g. "{name}={value}"
  joiner?: string;
  false_opt?: string;
  omit_if_empty?: boolean;
  when?: Value;
};

// `{ "--name": "${form.name}" }`
export type ArgvShorthand = { [opt: string]: Value };

export type ArgvItem = string | ArgvOption | ArgvShorthand;

export type RunSpec = {
  program: string;
  argv?: ArgvItem[];
  env?: Record<string, Value>;
  workdir?: string;
  shell?: boolean;
  stdout?: string; // inherit | capture | file:<path>
  stderr?: string;
  capture?: boolean;
  timeout_ms?: number;
};

type StepBase = {
  id?: string;
  when?: Value; // expression
  continue_on_error?: boolean;
};

export type RunStep = StepBase & { run: RunSpec };
export type PipelineStep = StepBase & { pipeline: Step[] };
export type ForeachStep = StepBase & {
  foreach: { in: Value; as?: string; steps?: Step[] };
};

export type Step = RunStep | PipelineStep | ForeachStep;

export type Action = {
  title: string;
  pipeline?: Step[];
  run?: RunSpec;
  on_error?: Step[];
};

export type AppSettings = {
  env?: Record<string, Value>;
  workdir?: string;
  shell?: boolean;
};

export type WorkflowConfig = {
  version: 1;
  vars?: Record<string, Value>;
  app?: AppSettings;
  runtime?: Record<string, { executable: string }>;
  actions: Record<string, Action>;
};

export type StepResult = {
  exit_code: number;
  stdout: string;
  stderr: string;
  duration_ms: number;
};

export type ErrorContext = {
  step_id: string;
  type: string;
  message: string;
};

export type RunMeta = {
  status: 'success' | 'recovered';
  error?: ErrorContext;
};

/** Step results keyed by step id, with the run metadata under `_meta`. */
export type RunResult = {
  _meta: RunMeta;
  [stepId: string]: StepResult | RunMeta;
};

export type LineLogger = (line: string) => void;
