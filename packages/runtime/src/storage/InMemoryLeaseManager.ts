import type { Lease, LeaseManager } from "../types/index.js";

export interface LeaseClockOptions {
  now?: () => number;
}

export class InMemoryLeaseManager implements LeaseManager {
  private leases = new Map<string, Lease>();

  private readonly now: () => number;

  constructor(options: LeaseClockOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  async acquire(taskId: string, holderId: string, ttlMs: number): Promise<Lease | null> {
    const now = this.now();
    const current = this.leases.get(taskId);
    if (current && current.holderId !== holderId && current.expiresAt > now) {
      return null;
    }
    const lease: Lease = { taskId, holderId, acquiredAt: now, expiresAt: now + ttlMs };
    this.leases.set(taskId, lease);
    return { ...lease };
  }

  async renew(lease: Lease, ttlMs: number): Promise<Lease | null> {
    const current = this.leases.get(lease.taskId);
    if (!current || current.holderId !== lease.holderId) {
      return null;
    }
    const renewed: Lease = { ...current, expiresAt: this.now() + ttlMs };
    this.leases.set(lease.taskId, renewed);
    return { ...renewed };
  }

  async release(lease: Lease): Promise<void> {
    const current = this.leases.get(lease.taskId);
    if (current && current.holderId === lease.holderId) {
      this.leases.delete(lease.taskId);
    }
  }
}
