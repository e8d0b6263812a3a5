import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { DeploymentStatus } from './deployment-status';

export interface ActiveDeploymentEntry {
  id: string;
  status: DeploymentStatus;
  start_time: string;
}

/**
 * In-memory index of in-flight and recently finished deployments, for status polling and
 * the live stream. Not authoritative: the deployments table is. Entries are dropped after
 * the retention window, or with the process.
 */
@Injectable()
export class ActiveDeploymentRegistry implements OnModuleDestroy {
  private readonly entries = new Map<string, ActiveDeploymentEntry>();
  private readonly evictions = new Map<string, ReturnType<typeof setTimeout>>();

  track(id: string, status: DeploymentStatus, startedAt: Date = new Date()): ActiveDeploymentEntry {
    const entry = { id, status, start_time: startedAt.toISOString() };
    this.entries.set(id, entry);
    return { ...entry };
  }

  /** Mirrors a new status; returns false when the id is not tracked. */
  update(id: string, status: DeploymentStatus): boolean {
    const entry = this.entries.get(id);
    if (!entry) return false;
    entry.status = status;
    return true;
  }

  get(id: string): ActiveDeploymentEntry | undefined {
    const entry = this.entries.get(id);
    return entry ? { ...entry } : undefined;
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Replaces any eviction already pending for this id. */
  scheduleEviction(id: string, delayMs: number): void {
    this.cancelEviction(id);
    const timer = setTimeout(() => {
      this.evictions.delete(id);
      this.entries.delete(id);
    }, delayMs);
    timer.unref();
    this.evictions.set(id, timer);
  }

  onModuleDestroy(): void {
    for (const timer of this.evictions.values()) clearTimeout(timer);
    this.evictions.clear();
    this.entries.clear();
  }

  private cancelEviction(id: string): void {
    const timer = this.evictions.get(id);
    if (timer) {
      clearTimeout(timer);
      this.evictions.delete(id);
    }
  }
}
