import type { VectorStoreId } from "./foundational.js";

export type VectorStoreStatus = "in_progress" | "completed" | "expired";

export interface VectorStore {
  readonly id: VectorStoreId;
  readonly name: string;
  readonly status: VectorStoreStatus;
  readonly fileCounts: {
    readonly inProgress: number;
    readonly completed: number;
    readonly failed: number;
  };
}
