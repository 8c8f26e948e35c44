/**
 * Last-seen heartbeat times
 * @module @strata/core/stores/heartbeat-tracker
 */

/**
 * Datanode id to epoch milliseconds of the last heartbeat seen.
 * Unknown ids read as 0 so elapsed-time checks treat them as long silent.
 */
export class HeartbeatTracker {
  private readonly lastSeen = new Map<string, number>();

  get(id: string): number {
    return this.lastSeen.get(id) ?? 0;
  }

  record(id: string, now: number): void {
    this.lastSeen.set(id, now);
  }

  delete(id: string): boolean {
    return this.lastSeen.delete(id);
  }

  get size(): number {
    return this.lastSeen.size;
  }

  clear(): void {
    this.lastSeen.clear();
  }
}
