import { PlanError } from "./errors.js";
import type { LockPolicy } from "./settings.js";

export type ReleaseLock = () => void;

/**
 * Exclusive hold on the live document. Waiters are served in arrival order;
 * under the "reject" policy a busy document fails immediately.
 */
export class DocumentLock {
  private held = false;
  private waiters: Array<(release: ReleaseLock) => void> = [];

  get locked(): boolean {
    return this.held;
  }

  get pending(): number {
    return this.waiters.length;
  }

  acquire(policy: LockPolicy = "queue"): Promise<ReleaseLock> {
    if (!this.held) {
      this.held = true;
      return Promise.resolve(this.createRelease());
    }
    if (policy === "reject") {
      return Promise.reject(new PlanError("DocumentBusy", "DOCUMENT_BUSY", "Another apply run holds the document."));
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  async runExclusive<T>(task: () => Promise<T>, policy: LockPolicy = "queue"): Promise<T> {
    const release = await this.acquire(policy);
    try {
      return await task();
    } finally {
      release();
    }
  }

  private createRelease(): ReleaseLock {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        next(this.createRelease());
      } else {
        this.held = false;
      }
    };
  }
}
