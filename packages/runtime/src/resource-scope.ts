import type {
  AgentConfig,
  AgentDefinition,
  AgentId,
  AgentService,
  ConversationId,
  FileId,
  VectorStore,
  VectorStoreId,
} from "@agentdeck/types";
import { createSilentLogger, type Logger } from "@agentdeck/core";

export type ResourceRef =
  | { readonly kind: "conversation"; readonly id: ConversationId }
  | { readonly kind: "agent"; readonly id: AgentId }
  | { readonly kind: "vectorStore"; readonly id: VectorStoreId }
  | { readonly kind: "file"; readonly id: FileId };

export interface ReleaseReport {
  readonly released: ReadonlyArray<ResourceRef>;
  readonly failed: ReadonlyArray<ResourceRef>;
}

/** Dependents are released before what they depend on. */
const RELEASE_ORDER: ReadonlyArray<ResourceRef["kind"]> = ["conversation", "agent", "vectorStore", "file"];

export interface ResourceScopeOptions {
  service: AgentService;
  logger?: Logger;
}

/**
 * Tracks the remote resources a use case creates and deletes them when it
 * ends. Deletion is best-effort: failures are logged and never thrown, and a
 * resource is attempted at most once.
 */
export class ResourceScope {
  private readonly service: AgentService;
  private readonly logger: Logger;
  private tracked: ResourceRef[] = [];

  constructor(opts: ResourceScopeOptions) {
    this.service = opts.service;
    this.logger = (opts.logger ?? createSilentLogger()).child({ component: "cleanup" });
  }

  track(ref: ResourceRef): void {
    this.tracked.push(ref);
  }

  /** Stop tracking a resource so it outlives the scope. Returns false if it was not tracked. */
  untrack(ref: ResourceRef): boolean {
    const index = this.tracked.findIndex((entry) => entry.kind === ref.kind && entry.id === ref.id);
    if (index < 0) return false;
    this.tracked.splice(index, 1);
    return true;
  }

  get size(): number {
    return this.tracked.length;
  }

  async createAgent(definition: AgentDefinition): Promise<AgentConfig> {
    const agent = await this.service.createAgent(definition);
    this.track({ kind: "agent", id: agent.id });
    return agent;
  }

  async createConversation(): Promise<ConversationId> {
    const id = await this.service.createConversation();
    this.track({ kind: "conversation", id });
    return id;
  }

  async uploadFile(filename: string, content: string): Promise<FileId> {
    const id = await this.service.uploadFile(filename, content);
    this.track({ kind: "file", id });
    return id;
  }

  async createVectorStore(name: string, fileIds: ReadonlyArray<FileId>): Promise<VectorStore> {
    const store = await this.service.createVectorStore(name, fileIds);
    this.track({ kind: "vectorStore", id: store.id });
    return store;
  }

  /** Delete everything tracked so far. Calling it again only handles resources tracked since. */
  async release(): Promise<ReleaseReport> {
    const pending = this.tracked;
    this.tracked = [];

    const released: ResourceRef[] = [];
    const failed: ResourceRef[] = [];
    for (const kind of RELEASE_ORDER) {
      for (const ref of pending) {
        if (ref.kind !== kind) continue;
        try {
          await this.delete(ref);
          released.push(ref);
          this.logger.debug({ kind: ref.kind, id: ref.id }, "resource deleted");
        } catch (err) {
          failed.push(ref);
          this.logger.warn({ kind: ref.kind, id: ref.id, err }, "resource cleanup failed");
        }
      }
    }
    return { released, failed };
  }

  private delete(ref: ResourceRef): Promise<void> {
    switch (ref.kind) {
      case "conversation":
        return this.service.deleteConversation(ref.id);
      case "agent":
        return this.service.deleteAgent(ref.id);
      case "vectorStore":
        return this.service.deleteVectorStore(ref.id);
      case "file":
        return this.service.deleteFile(ref.id);
    }
  }
}

/** Run `body` with a fresh scope that is released however `body` ends. */
export async function withResources<T>(
  service: AgentService,
  logger: Logger | undefined,
  body: (scope: ResourceScope) => Promise<T>
): Promise<T> {
  const scope = new ResourceScope({ service, logger });
  try {
    return await body(scope);
  } finally {
    await scope.release();
  }
}
