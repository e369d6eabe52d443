/**
 * CPU/GPU slot pool with first-come, first-served admission.
 *
 * A request waits until the pool has enough free CPUs and GPUs and no
 * earlier request is still waiting. Releasing returns the slots and admits
 * waiters in arrival order.
 */

import { fitsWithin, type ResourceBudget } from "../resources/index.js";

export type Release = () => void;

interface Waiter {
  readonly request: ResourceBudget;
  readonly admit: (release: Release) => void;
}

export class SlotPool {
  private freeCpus: number;
  private freeGpus: number;
  private running = 0;
  private readonly queue: Waiter[] = [];

  constructor(
    public readonly capacity: ResourceBudget,
    private readonly maxConcurrent: number = Infinity
  ) {
    this.freeCpus = capacity.cpus;
    this.freeGpus = capacity.gpus;
  }

  /** Whether `request` fits in an empty pool. */
  fits(request: ResourceBudget): boolean {
    return fitsWithin(request, this.capacity);
  }

  get activeCount(): number {
    return this.running;
  }

  get waitingCount(): number {
    return this.queue.length;
  }

  acquire(request: ResourceBudget): Promise<Release> {
    return new Promise((admit) => {
      this.queue.push({ request, admit });
      this.drain();
    });
  }

  private available(request: ResourceBudget): boolean {
    return (
      this.running < this.maxConcurrent &&
      request.cpus <= this.freeCpus &&
      request.gpus <= this.freeGpus
    );
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const head = this.queue[0];
      if (head === undefined || !this.available(head.request)) {
        return;
      }
      this.queue.shift();
      this.take(head.request);
      head.admit(this.releaser(head.request));
    }
  }

  private take(request: ResourceBudget): void {
    this.freeCpus -= request.cpus;
    this.freeGpus -= request.gpus;
    this.running++;
  }

  private releaser(request: ResourceBudget): Release {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      this.freeCpus += request.cpus;
      this.freeGpus += request.gpus;
      this.running--;
      this.drain();
    };
  }
}
