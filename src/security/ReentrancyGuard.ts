/**
 * ReentrancyGuard.ts
 * Mutual exclusion across every state-mutating entry point of one engine
 *
 * Outgoing transfers hand control to arbitrary recipients before an operation
 * has finalized its state. Any guarded call arriving while another one runs,
 * including one made from inside such a transfer, is rejected at once.
 */

import { MarketErrors } from '../market/MarketErrors';

export class ReentrancyGuard {
  private activeOperation: string | null;
  private rejectedCount: number;

  constructor() {
    this.activeOperation = null;
    this.rejectedCount = 0;
  }

  run<T>(operation: string, work: () => T): T {
    if (this.activeOperation !== null) {
      this.rejectedCount++;
      throw MarketErrors.reentrantCall(operation, this.activeOperation);
    }

    this.activeOperation = operation;
    try {
      return work();
    } finally {
      this.activeOperation = null;
    }
  }

  get locked(): boolean {
    return this.activeOperation !== null;
  }

  getActiveOperation(): string | null {
    return this.activeOperation;
  }

  /**
   * Reentrant calls turned away since construction.
   */
  getRejectedCount(): number {
    return this.rejectedCount;
  }
}
