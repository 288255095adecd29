import type {
  Instance,
  InstanceDetail,
  InstanceListing,
  InstanceSnapshot,
  InstanceStatus,
  ModelType,
  NetworkStats,
} from "./types.js";
import { DuplicateRoleError, UnknownInstanceError } from "../errors.js";
import { logger } from "../utils/logger.js";

export const MOTHER_ROLE = "scrum_master";

/** Lower-case, whitespace collapsed to `-`. Used to match role references. */
export function normalizeRef(ref: string): string {
  return ref.trim().toLowerCase().replace(/\s+/g, "-");
}

function idPrefix(role: string): string {
  const slug = normalizeRef(role).replace(/[^a-z0-9_-]/g, "");
  return slug || "instance";
}

export function toSnapshot(instance: Instance): InstanceSnapshot {
  const history = instance.outputHistory;
  return {
    id: instance.id,
    role: instance.role,
    modelType: instance.modelType,
    responsibility: instance.responsibility,
    status: instance.status,
    connectedTo: [...instance.connectedTo],
    messageCount: history.length,
    lastOutput: history.length > 0 ? history[history.length - 1] : null,
    createdAt: instance.createdAt,
  };
}

/**
 * The live network: one lazily created mother plus the worker instances,
 * in creation order. Ids come from a counter that survives `clear()`, so an
 * id is never handed out twice by the same registry.
 */
export class InstanceRegistry {
  private mother: Instance | null = null;
  private instances = new Map<string, Instance>();
  private nextId = 1;
  private taskContext: string | null = null;
  private turnCount = 0;

  constructor(private readonly now: () => number = Date.now) {}

  getOrCreateMother(): Instance {
    if (this.mother) return this.mother;

    this.mother = this.newInstance("mother", MOTHER_ROLE, "normal",
      "Plans each turn and delegates work to specialist instances");
    logger.info({ instanceId: this.mother.id }, "Mother instance created");
    return this.mother;
  }

  /**
   * Adds a worker. On a follow-up turn (task context already set) a second
   * active instance for the same role is refused with DuplicateRoleError,
   * which carries the instance to reuse.
   */
  create(role: string, modelType: ModelType, responsibility: string): Instance {
    if (this.taskContext !== null) {
      const existing = this.findActiveByRole(role);
      if (existing) throw new DuplicateRoleError(existing);
    }

    const instance = this.newInstance(idPrefix(role), role.trim(), modelType, responsibility);
    this.instances.set(instance.id, instance);
    logger.info({ instanceId: instance.id, role: instance.role, modelType }, "Instance created");
    return instance;
  }

  /**
   * Looks a worker up by role, then by id. Among instances sharing a role the
   * most recent active one wins, falling back to the most recent errored one.
   */
  resolve(instanceRef: string): Instance {
    const byRole = this.findActiveByRole(instanceRef) ?? this.findLatestByRole(instanceRef);
    if (byRole) return byRole;

    const byId = this.instances.get(instanceRef.trim()) ?? this.instances.get(normalizeRef(instanceRef));
    if (byId) return byId;

    throw new UnknownInstanceError(instanceRef);
  }

  markStatus(id: string, status: InstanceStatus): void {
    const instance = this.require(id);
    if (instance.status !== status) {
      logger.debug({ instanceId: id, from: instance.status, to: status }, "Instance status changed");
    }
    instance.status = status;
  }

  recordOutput(id: string, output: string): void {
    this.require(id).outputHistory.push(output);
  }

  /** Links two instances in both directions. */
  connect(a: string, b: string): void {
    if (a === b) return;
    this.require(a).connectedTo.add(b);
    this.require(b).connectedTo.add(a);
  }

  get(id: string): InstanceDetail | null {
    const instance = this.lookup(id);
    if (!instance) return null;
    return { ...toSnapshot(instance), outputHistory: [...instance.outputHistory] };
  }

  list(): InstanceListing {
    return {
      mother: this.mother ? toSnapshot(this.mother) : null,
      instances: [...this.instances.values()].map(toSnapshot),
    };
  }

  /** Workers in creation order. */
  workers(): Instance[] {
    return [...this.instances.values()];
  }

  get isFollowUp(): boolean {
    return this.taskContext !== null;
  }

  /** Sets the original task once; later calls are ignored until `clear()`. */
  setTaskContext(task: string): void {
    if (this.taskContext !== null) return;
    this.taskContext = task;
    logger.debug({ taskLength: task.length }, "Task context recorded");
  }

  getTaskContext(): string | null {
    return this.taskContext;
  }

  beginTurn(): number {
    return ++this.turnCount;
  }

  clear(): void {
    const dropped = this.instances.size;
    this.mother = null;
    this.instances.clear();
    this.taskContext = null;
    this.turnCount = 0;
    logger.info({ dropped }, "Network cleared");
  }

  stats(): NetworkStats {
    const all = this.mother ? [this.mother, ...this.instances.values()] : [...this.instances.values()];
    return {
      instanceCount: this.instances.size,
      totalMessages: all.reduce((sum, i) => sum + i.outputHistory.length, 0),
      turnCount: this.turnCount,
      motherStatus: this.mother ? "active" : "inactive",
      uptime: this.mother ? Math.max(0, (this.now() - this.mother.createdAt) / 1000) : 0,
    };
  }

  private newInstance(prefix: string, role: string, modelType: ModelType, responsibility: string): Instance {
    return {
      id: `${prefix}-${this.nextId++}`,
      role,
      modelType,
      responsibility: responsibility.trim(),
      status: "created",
      connectedTo: new Set(),
      outputHistory: [],
      createdAt: this.now(),
    };
  }

  private findActiveByRole(role: string): Instance | undefined {
    const key = normalizeRef(role);
    return this.workers().reverse().find((i) => normalizeRef(i.role) === key && i.status !== "errored");
  }

  private findLatestByRole(role: string): Instance | undefined {
    const key = normalizeRef(role);
    return this.workers().reverse().find((i) => normalizeRef(i.role) === key);
  }

  private lookup(id: string): Instance | undefined {
    if (this.mother?.id === id) return this.mother;
    return this.instances.get(id);
  }

  private require(id: string): Instance {
    const instance = this.lookup(id);
    if (!instance) throw new UnknownInstanceError(id);
    return instance;
  }
}
