import type { Config } from "../config.js";
import type { ModelClient } from "../model/client.js";
import { invokeModel } from "../model/invoker.js";
import type { RateLimiter } from "../utils/rate-limiter.js";
import { Semaphore } from "../utils/semaphore.js";
import { callScope, settleWithin } from "../utils/deadline.js";
import { TurnLock } from "../utils/turn-lock.js";
import { logger } from "../utils/logger.js";
import {
  CallTimeoutError,
  DirectiveParseError,
  DuplicateRoleError,
  EmptyMessageError,
  MotherUnavailableError,
  TurnCancelledError,
  TurnInProgressError,
  TurnTimeoutError,
  UnknownInstanceError,
  describeError,
} from "../errors.js";
import { parseDirectives, formatWarning } from "./directive-parser.js";
import { InstanceRegistry } from "./instance-registry.js";
import { WorkerAgent } from "./worker.js";
import { SynthesisEngine, concatenateOutputs } from "./synthesis.js";
import { buildCorrectivePrompt, buildMotherPrompt } from "./prompts.js";
import type {
  Command,
  DirectiveWarning,
  Instance,
  InstanceDetail,
  InstanceListing,
  NetworkStats,
  StatusUpdate,
  TurnPhase,
  TurnResult,
  WorkerOutput,
} from "./types.js";

export type OrchestratorSettings = Pick<Config, "maxConcurrency" | "callTimeoutMs" | "turnTimeoutMs">;

export interface SubmitOptions {
  abortSignal?: AbortSignal;
  onStatusUpdate?: (update: StatusUpdate) => void;
}

/** A RouteTo bound to its instance, with its position among the turn's RouteTos. */
interface Dispatch {
  index: number;
  instance: Instance;
  message: string;
}

interface TurnContext {
  turn: number;
  signal: AbortSignal;
  phases: TurnPhase[];
  deadlineHit: () => boolean;
  onStatusUpdate?: (update: StatusUpdate) => void;
}

/**
 * Drives one user turn through
 * awaiting_directives → executing_commands → awaiting_worker_outputs → synthesizing → complete,
 * with `failed` reachable from any phase.
 */
export class Orchestrator {
  private workerAgent: WorkerAgent;
  private synthesis: SynthesisEngine;
  private semaphore: Semaphore;
  private turnLock = new TurnLock();

  constructor(
    private client: ModelClient,
    private rateLimiter: RateLimiter,
    private settings: OrchestratorSettings,
    private registry: InstanceRegistry = new InstanceRegistry(),
  ) {
    this.workerAgent = new WorkerAgent(client, rateLimiter);
    this.synthesis = new SynthesisEngine(client, rateLimiter);
    this.semaphore = new Semaphore(settings.maxConcurrency);
  }

  get isBusy(): boolean {
    return this.turnLock.isLocked;
  }

  /** Runs one full turn. Rejects with TurnInProgressError while another turn is running. */
  async submitUserMessage(text: string, opts: SubmitOptions = {}): Promise<TurnResult> {
    const message = text.trim();
    if (!message) throw new EmptyMessageError();

    const controller = this.turnLock.lock();
    try {
      return await this.runTurn(message, controller, opts);
    } finally {
      this.turnLock.unlock(controller);
    }
  }

  /** Aborts the running turn, if any. */
  cancelTurn(): boolean {
    return this.turnLock.cancel();
  }

  listInstances(): InstanceListing {
    return this.registry.list();
  }

  getInstance(id: string): InstanceDetail | null {
    return this.registry.get(id);
  }

  clear(): void {
    if (this.turnLock.isLocked) throw new TurnInProgressError();
    this.registry.clear();
  }

  networkStats(): NetworkStats {
    return this.registry.stats();
  }

  private async runTurn(
    message: string,
    controller: AbortController,
    opts: SubmitOptions,
  ): Promise<TurnResult> {
    const turnStart = Date.now();
    const turn = this.registry.beginTurn();
    const timeoutMs = this.settings.turnTimeoutMs;

    let deadlineHit = false;
    const deadline = setTimeout(() => {
      deadlineHit = true;
      logger.warn({ turn, timeoutMs }, "Turn deadline reached, detaching outstanding calls");
      controller.abort(new TurnTimeoutError(timeoutMs));
    }, timeoutMs);

    const onExternalAbort = () => controller.abort(new TurnCancelledError());
    if (opts.abortSignal?.aborted) {
      controller.abort(new TurnCancelledError());
    } else {
      opts.abortSignal?.addEventListener("abort", onExternalAbort, { once: true });
    }

    const ctx: TurnContext = {
      turn,
      signal: controller.signal,
      phases: [],
      deadlineHit: () => deadlineHit,
      onStatusUpdate: opts.onStatusUpdate,
    };

    logger.info({ turn, messageLength: message.length, followUp: this.registry.isFollowUp }, "Turn starting");

    try {
      this.enter(ctx, "awaiting_directives", "Planning the work...");
      const mother = this.registry.getOrCreateMother();
      const previousResponse = lastOf(mother.outputHistory);
      const { commands, warnings: parseWarnings } = await this.requestDirectives(
        ctx, mother, message, previousResponse,
      );

      this.enter(ctx, "executing_commands", `Executing ${commands.length} directive(s)`);
      const warnings = parseWarnings.map(formatWarning);
      const dispatches = this.executeCommands(commands, warnings);
      // Duplicate roles are allowed until the first turn's CREATEs have run
      this.registry.setTaskContext(message);

      this.enter(ctx, "awaiting_worker_outputs", `Waiting on ${dispatches.length} instance(s)`);
      const outputs = await this.dispatchAll(ctx, mother, dispatches);
      this.throwIfCancelled(ctx);

      this.enter(ctx, "synthesizing", "Combining results...");
      const { text, degraded } = await this.synthesize(ctx, message, outputs, previousResponse);

      this.registry.recordOutput(mother.id, text);
      this.registry.markStatus(mother.id, "idle");

      this.enter(ctx, "complete", `Done in ${formatDuration(Date.now() - turnStart)}`);
      logger.info({
        turn,
        workers: outputs.length,
        failed: outputs.filter((o) => !o.outcome.ok).length,
        warnings: warnings.length,
        degraded,
        durationMs: Date.now() - turnStart,
      }, "Turn complete");

      return {
        finalResponse: text,
        instances: this.registry.list(),
        outputs,
        warnings,
        degraded,
        phases: ctx.phases,
        turn,
      };
    } catch (err) {
      ctx.phases.push("failed");
      logger.error({ turn, error: describeError(err), code: errorCode(err) }, "Turn failed");
      opts.onStatusUpdate?.({ phase: "failed", message: describeError(err) });
      throw err;
    } finally {
      clearTimeout(deadline);
      opts.abortSignal?.removeEventListener("abort", onExternalAbort);
    }
  }

  private enter(ctx: TurnContext, phase: TurnPhase, message: string): void {
    ctx.phases.push(phase);
    logger.info({ turn: ctx.turn, phase }, message);
    ctx.onStatusUpdate?.({ phase, message });
  }

  /** Asks the mother for directives, re-prompting once if the block is malformed. */
  private async requestDirectives(
    ctx: TurnContext,
    mother: Instance,
    message: string,
    previousResponse: string | null,
  ): Promise<{ commands: Command[]; warnings: DirectiveWarning[] }> {
    const prompt = buildMotherPrompt({
      userMessage: message,
      team: this.registry.list().instances,
      previousResponse,
      taskContext: this.registry.getTaskContext(),
    });

    const first = parseDirectives(await this.callMother(ctx, mother, prompt));
    if (first.ok) return first;

    logger.warn({ turn: ctx.turn, reason: first.reason, detail: first.message }, "Malformed directive block, re-prompting");
    const second = parseDirectives(
      await this.callMother(ctx, mother, buildCorrectivePrompt(prompt, first.message)),
    );
    if (second.ok) return second;

    throw new DirectiveParseError(second.reason, second.message);
  }

  private async callMother(ctx: TurnContext, mother: Instance, prompt: string): Promise<string> {
    this.registry.markStatus(mother.id, "busy");
    const scope = callScope(ctx.signal);
    try {
      const raw = await settleWithin(
        invokeModel({
          prompt,
          modelType: mother.modelType,
          client: this.client,
          rateLimiter: this.rateLimiter,
          label: mother.id,
          signal: scope.signal,
        }),
        { timeoutMs: this.settings.callTimeoutMs, label: "Planning agent", signal: ctx.signal },
      );
      this.registry.markStatus(mother.id, "idle");
      return raw;
    } catch (err) {
      this.registry.markStatus(mother.id, "errored");
      if (
        err instanceof CallTimeoutError ||
        err instanceof TurnTimeoutError ||
        err instanceof TurnCancelledError
      ) {
        throw err;
      }
      throw new MotherUnavailableError(err);
    } finally {
      scope.end();
    }
  }

  /**
   * Realizes CREATEs in order and binds each TO to an instance as of its
   * position in the block. Bad references are skipped with a warning.
   */
  private executeCommands(commands: Command[], warnings: string[]): Dispatch[] {
    const dispatches: Dispatch[] = [];

    for (const command of commands) {
      switch (command.kind) {
        case "analyze":
          logger.info({ analysis: command.text }, "Mother analysis");
          break;

        case "create":
          try {
            this.registry.create(command.role, command.modelType, command.responsibility);
          } catch (err) {
            if (!(err instanceof DuplicateRoleError)) throw err;
            logger.info(
              { role: command.role, instanceId: err.existing.id },
              "Role already on the team, reusing existing instance",
            );
          }
          break;

        case "route_to":
          try {
            const instance = this.registry.resolve(command.instanceRef);
            dispatches.push({ index: dispatches.length, instance, message: command.message });
          } catch (err) {
            if (!(err instanceof UnknownInstanceError)) throw err;
            const warning = `Skipped TO on line ${command.line}: no instance matches "${command.instanceRef}"`;
            logger.warn({ instanceRef: command.instanceRef, line: command.line }, "Unknown instance in TO");
            warnings.push(warning);
          }
          break;

        case "synthesize":
          break;
      }
    }

    return dispatches;
  }

  /**
   * Fans the turn's messages out. Messages for the same instance run one after
   * another in parsed order; different instances run concurrently up to
   * `maxConcurrency`. Results come back in parsed order.
   */
  private async dispatchAll(ctx: TurnContext, mother: Instance, dispatches: Dispatch[]): Promise<WorkerOutput[]> {
    const results: WorkerOutput[] = new Array<WorkerOutput>(dispatches.length);
    const byInstance = new Map<string, Dispatch[]>();
    for (const d of dispatches) {
      const queue = byInstance.get(d.instance.id);
      if (queue) queue.push(d);
      else byInstance.set(d.instance.id, [d]);
    }

    const ids = [...byInstance.keys()];
    for (const id of ids) this.registry.connect(mother.id, id);
    for (let i = 0; i < ids.length; i++) {
      for (let j = i + 1; j < ids.length; j++) this.registry.connect(ids[i], ids[j]);
    }

    const start = Date.now();
    let settled = 0;
    const total = dispatches.length;

    await Promise.all(
      [...byInstance.values()].map(async (queue) => {
        for (const d of queue) {
          results[d.index] = await this.runDispatch(ctx, d);
          settled++;
          ctx.onStatusUpdate?.({
            phase: "awaiting_worker_outputs",
            message: `${results[d.index].outcome.ok ? "✅" : "❌"} ${d.instance.role}`,
            progress: `${settled}/${total} responses`,
          });
        }
      }),
    );

    if (total > 0) {
      logger.info({ turn: ctx.turn, total, elapsed: formatDuration(Date.now() - start) }, "Worker outputs settled");
    }
    return results;
  }

  /** Never rejects: failures become an errored instance and a failed outcome. */
  private async runDispatch(ctx: TurnContext, d: Dispatch): Promise<WorkerOutput> {
    const { instance } = d;
    const start = Date.now();
    const base = { instanceId: instance.id, role: instance.role, message: d.message };
    // Ends when this dispatch stops waiting, so a detached call makes no further attempts
    const scope = callScope(ctx.signal);

    try {
      const text = await settleWithin(
        this.semaphore.run(() => {
          scope.signal.throwIfAborted();
          this.registry.markStatus(instance.id, "busy");
          return settleWithin(
            this.workerAgent.execute({
              instance,
              message: d.message,
              taskContext: this.registry.getTaskContext(),
            }, scope.signal),
            { timeoutMs: this.settings.callTimeoutMs, label: `Instance ${instance.id}`, signal: ctx.signal },
          );
        }),
        { label: `Instance ${instance.id}`, signal: ctx.signal },
      );

      this.registry.recordOutput(instance.id, text);
      this.registry.markStatus(instance.id, "idle");
      return { ...base, outcome: { ok: true, text }, durationMs: Date.now() - start };
    } catch (err) {
      const error = describeError(err);
      this.registry.markStatus(instance.id, "errored");
      logger.warn({ turn: ctx.turn, instanceId: instance.id, code: errorCode(err), error }, "Instance failed to respond");
      return { ...base, outcome: { ok: false, error }, durationMs: Date.now() - start };
    } finally {
      scope.end();
    }
  }

  /** Synthesis failure degrades to the concatenated outputs instead of failing the turn. */
  private async synthesize(
    ctx: TurnContext,
    userMessage: string,
    outputs: WorkerOutput[],
    previousResponse: string | null,
  ): Promise<{ text: string; degraded: boolean }> {
    // Past the deadline synthesis still gets its own call timeout
    const signal = ctx.deadlineHit() ? undefined : ctx.signal;
    const scope = callScope(signal);
    try {
      const text = await settleWithin(
        this.synthesis.synthesize({
          userMessage,
          outputs,
          taskContext: this.registry.getTaskContext(),
          previousResponse,
        }, scope.signal),
        { timeoutMs: this.settings.callTimeoutMs, label: "Synthesis", signal },
      );
      return { text, degraded: false };
    } catch (err) {
      this.throwIfCancelled(ctx);
      logger.error({ turn: ctx.turn, error: describeError(err) }, "Synthesis failed, returning concatenated outputs");
      return { text: concatenateOutputs(outputs), degraded: true };
    } finally {
      scope.end();
    }
  }

  private throwIfCancelled(ctx: TurnContext): void {
    if (ctx.signal.aborted && !ctx.deadlineHit()) throw new TurnCancelledError();
  }
}

function lastOf(items: string[]): string | null {
  return items.length > 0 ? items[items.length - 1] : null;
}

function errorCode(err: unknown): string | undefined {
  return typeof err === "object" && err !== null && "code" in err && typeof err.code === "string"
    ? err.code
    : undefined;
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  const minutes = Math.floor(seconds / 60);
  const remainingSec = seconds % 60;
  if (minutes < 60) return remainingSec > 0 ? `${minutes}m ${remainingSec}s` : `${minutes}m`;
  const hours = Math.floor(minutes / 60);
  const remainingMin = minutes % 60;
  return `${hours}h ${remainingMin}m`;
}
