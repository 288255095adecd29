export const MODEL_TYPES = ["normal", "thinking"] as const;
export type ModelType = (typeof MODEL_TYPES)[number];

export type InstanceStatus = "created" | "busy" | "idle" | "errored";

export interface Instance {
  id: string;
  role: string;
  modelType: ModelType;
  responsibility: string;
  status: InstanceStatus;
  /** Ids of instances this one has exchanged messages with */
  connectedTo: Set<string>;
  /** Append-only */
  outputHistory: string[];
  createdAt: number;
}

/** Serializable view of an Instance for listings and the HTTP API. */
export interface InstanceSnapshot {
  id: string;
  role: string;
  modelType: ModelType;
  responsibility: string;
  status: InstanceStatus;
  connectedTo: string[];
  messageCount: number;
  lastOutput: string | null;
  createdAt: number;
}

export interface InstanceDetail extends InstanceSnapshot {
  outputHistory: string[];
}

export interface InstanceListing {
  mother: InstanceSnapshot | null;
  instances: InstanceSnapshot[];
}

export interface NetworkStats {
  instanceCount: number;
  totalMessages: number;
  turnCount: number;
  motherStatus: "active" | "inactive";
  /** Seconds since the current mother was created, 0 before the first turn */
  uptime: number;
}

// ─── Directives ──────────────────────────────────────────────────────────────

export interface AnalyzeCommand {
  kind: "analyze";
  text: string;
  line: number;
}

export interface CreateCommand {
  kind: "create";
  role: string;
  modelType: ModelType;
  responsibility: string;
  line: number;
}

export interface RouteToCommand {
  kind: "route_to";
  /** Raw reference: a role declared in the block or an existing instance id */
  instanceRef: string;
  message: string;
  line: number;
}

export interface SynthesizeCommand {
  kind: "synthesize";
  line: number;
}

export type Command = AnalyzeCommand | CreateCommand | RouteToCommand | SynthesizeCommand;

export type DirectiveWarningKind =
  | "unrecognized_line"
  | "unknown_model_type"
  | "malformed_create"
  | "malformed_route"
  | "duplicate_analyze"
  | "duplicate_synthesize";

export interface DirectiveWarning {
  kind: DirectiveWarningKind;
  line: number;
  text: string;
  detail?: string;
}

export type ParseFailureReason = "missing_synthesize" | "synthesize_not_terminal";

export type ParseResult =
  | { ok: true; commands: Command[]; warnings: DirectiveWarning[] }
  | {
      ok: false;
      reason: ParseFailureReason;
      message: string;
      commands: Command[];
      warnings: DirectiveWarning[];
    };

// ─── Turns ───────────────────────────────────────────────────────────────────

export type TurnPhase =
  | "awaiting_directives"
  | "executing_commands"
  | "awaiting_worker_outputs"
  | "synthesizing"
  | "complete"
  | "failed";

export type WorkerOutcome =
  | { ok: true; text: string }
  | { ok: false; error: string };

/** One entry of the synthesis input, in parsed RouteTo order. */
export interface WorkerOutput {
  instanceId: string;
  role: string;
  message: string;
  outcome: WorkerOutcome;
  durationMs?: number;
}

export interface TurnResult {
  finalResponse: string;
  instances: InstanceListing;
  outputs: WorkerOutput[];
  /** Command-level problems that were skipped without aborting the turn */
  warnings: string[];
  /** True when synthesis failed and the response is the concatenated worker outputs */
  degraded: boolean;
  phases: TurnPhase[];
  turn: number;
}

export interface StatusUpdate {
  phase: TurnPhase;
  message: string;
  progress?: string;
}
