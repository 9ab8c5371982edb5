/**
 * Checkpoint Store
 *
 * Keeps the state of suspended workflows so a later resume can continue them.
 * Snapshots are deep copies: callers never share a live object with the store.
 * Access to one thread id is serialized; different thread ids do not contend.
 *
 * Sessions expire after the configured TTL, and the oldest session is evicted
 * once the store is full.
 */

import { getCheckpointPolicy, type CheckpointPolicy } from "../../config";
import { KeyedMutex } from "../../utils/keyed-mutex";
import type { TicketState } from "./types";

export interface CheckpointStore {
  save(threadId: string, state: TicketState): Promise<void>;
  load(threadId: string): Promise<TicketState | undefined>;
  /** Load and remove in one step; at most one caller receives the state */
  take(threadId: string): Promise<TicketState | undefined>;
  delete(threadId: string): Promise<boolean>;
  size(): number;
}

interface Checkpoint {
  state: TicketState;
  savedAt: number;
}

export class InMemoryCheckpointStore implements CheckpointStore {
  private checkpoints = new Map<string, Checkpoint>();
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly policy: CheckpointPolicy = getCheckpointPolicy(),
    private readonly now: () => number = Date.now,
  ) {}

  save(threadId: string, state: TicketState): Promise<void> {
    return this.locks.runExclusive(threadId, () => {
      // Re-inserting keeps Map order equal to save order, oldest first.
      this.checkpoints.delete(threadId);
      this.evictOverflow();
      this.checkpoints.set(threadId, { state: structuredClone(state), savedAt: this.now() });
      console.log(`[Checkpoint Store] Saved ${threadId} (${this.checkpoints.size} active)`);
    });
  }

  load(threadId: string): Promise<TicketState | undefined> {
    return this.locks.runExclusive(threadId, () => {
      const checkpoint = this.getLive(threadId);
      return checkpoint ? structuredClone(checkpoint.state) : undefined;
    });
  }

  take(threadId: string): Promise<TicketState | undefined> {
    return this.locks.runExclusive(threadId, () => {
      const checkpoint = this.getLive(threadId);
      if (!checkpoint) {
        return undefined;
      }
      this.checkpoints.delete(threadId);
      console.log(`[Checkpoint Store] Claimed ${threadId}`);
      return checkpoint.state;
    });
  }

  delete(threadId: string): Promise<boolean> {
    return this.locks.runExclusive(threadId, () => this.checkpoints.delete(threadId));
  }

  size(): number {
    return this.checkpoints.size;
  }

  /**
   * Drop every checkpoint older than the TTL. Returns how many were removed.
   */
  cleanupExpired(): number {
    let removed = 0;
    for (const [threadId, checkpoint] of this.checkpoints) {
      if (this.isExpired(checkpoint) && !this.locks.isLocked(threadId)) {
        this.checkpoints.delete(threadId);
        removed++;
      }
    }

    if (removed > 0) {
      console.log(`[Checkpoint Store] Cleaned up ${removed} expired checkpoints`);
    }
    return removed;
  }

  private getLive(threadId: string): Checkpoint | undefined {
    const checkpoint = this.checkpoints.get(threadId);
    if (checkpoint && this.isExpired(checkpoint)) {
      this.checkpoints.delete(threadId);
      console.log(`[Checkpoint Store] ${threadId} expired`);
      return undefined;
    }
    return checkpoint;
  }

  private isExpired(checkpoint: Checkpoint): boolean {
    return this.now() - checkpoint.savedAt > this.policy.ttlMs;
  }

  private evictOverflow(): void {
    while (this.checkpoints.size >= this.policy.maxEntries) {
      const oldest = this.checkpoints.keys().next();
      if (oldest.done) {
        return;
      }
      this.checkpoints.delete(oldest.value);
      console.warn(`[Checkpoint Store] Evicted ${oldest.value} (store full)`);
    }
  }
}
