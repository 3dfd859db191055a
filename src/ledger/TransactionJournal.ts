/**
 * TransactionJournal.ts
 * Atomic transactions with rollback for every ledger mutation
 *
 * Provides:
 * - Undo journal: each mutation registers the action that reverses it
 * - Reverse-order rollback when a transaction throws
 * - Nested transactions as savepoints (inner failure undoes only inner work)
 * - Post-commit hooks, dropped on rollback
 * - Bounded log of finished transactions for audit
 */

import { createLogger, Logger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export type TransactionId = string;

export type TransactionStatus = 'committed' | 'rolled_back';

export type UndoAction = () => void;

export interface TransactionRecord {
  readonly transactionId: TransactionId;
  readonly label: string;
  readonly status: TransactionStatus;
  readonly operationCount: number;
  readonly startedAt: number;
  readonly finishedAt: number;
  readonly error?: string;
}

export interface TransactionJournalConfig {
  readonly logLimit: number;
}

export const DEFAULT_JOURNAL_CONFIG: TransactionJournalConfig = {
  logLimit: 1000,
};

interface JournalFrame {
  readonly transactionId: TransactionId;
  readonly label: string;
  readonly startedAt: number;
  readonly undo: UndoAction[];
  readonly afterCommit: (() => void)[];
}

// ============================================================================
// TransactionJournal Implementation
// ============================================================================

export class TransactionJournal {
  private readonly config: TransactionJournalConfig;
  private readonly frames: JournalFrame[];
  private readonly transactionLog: TransactionRecord[];
  private readonly logger: Logger;
  private counter: number;

  constructor(config: Partial<TransactionJournalConfig> = {}, logger?: Logger) {
    this.config = { ...DEFAULT_JOURNAL_CONFIG, ...config };
    this.frames = [];
    this.transactionLog = [];
    this.logger = logger ?? createLogger('journal');
    this.counter = 0;
  }

  /**
   * Run `work` atomically. Nested calls become savepoints of the enclosing
   * transaction.
   */
  atomically<T>(label: string, work: () => T): T {
    const frame: JournalFrame = {
      transactionId: `tx_${++this.counter}`,
      label,
      startedAt: Date.now(),
      undo: [],
      afterCommit: [],
    };

    this.frames.push(frame);

    let result: T;
    try {
      result = work();
    } catch (error) {
      this.frames.pop();
      this.rollback(frame, error);
      throw error;
    }

    this.frames.pop();

    const parent = this.currentFrame();
    if (parent) {
      parent.undo.push(...frame.undo);
      parent.afterCommit.push(...frame.afterCommit);
      return result;
    }

    this.finish(frame, 'committed');
    for (const hook of frame.afterCommit) {
      try {
        hook();
      } catch (hookError) {
        this.logger.error('After-commit hook failed', { transactionId: frame.transactionId }, hookError);
      }
    }

    return result;
  }

  /**
   * Register the reversal of a mutation that has just been applied.
   * Outside a transaction the mutation is final and nothing is recorded.
   */
  record(undo: UndoAction): void {
    this.currentFrame()?.undo.push(undo);
  }

  /**
   * Defer `hook` until the outermost transaction commits.
   */
  afterCommit(hook: () => void): void {
    const frame = this.currentFrame();
    if (frame) {
      frame.afterCommit.push(hook);
      return;
    }
    hook();
  }

  get inTransaction(): boolean {
    return this.frames.length > 0;
  }

  get depth(): number {
    return this.frames.length;
  }

  getTransactionLog(): readonly TransactionRecord[] {
    return [...this.transactionLog];
  }

  getLastTransaction(): TransactionRecord | null {
    return this.transactionLog[this.transactionLog.length - 1] ?? null;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private currentFrame(): JournalFrame | undefined {
    return this.frames[this.frames.length - 1];
  }

  private rollback(frame: JournalFrame, originalError: unknown): void {
    for (let i = frame.undo.length - 1; i >= 0; i--) {
      try {
        frame.undo[i]();
      } catch (undoError) {
        // Keep undoing; the original error is what the caller sees.
        this.logger.error(
          'Undo action failed during rollback',
          { transactionId: frame.transactionId, label: frame.label, index: i },
          undoError
        );
      }
    }

    if (this.frames.length === 0) {
      this.finish(frame, 'rolled_back', originalError);
    }
  }

  private finish(frame: JournalFrame, status: TransactionStatus, error?: unknown): void {
    this.transactionLog.push({
      transactionId: frame.transactionId,
      label: frame.label,
      status,
      operationCount: frame.undo.length,
      startedAt: frame.startedAt,
      finishedAt: Date.now(),
      error: error === undefined ? undefined : error instanceof Error ? error.message : String(error),
    });

    while (this.transactionLog.length > this.config.logLimit) {
      this.transactionLog.shift();
    }
  }
}

export function createTransactionJournal(
  config?: Partial<TransactionJournalConfig>,
  logger?: Logger
): TransactionJournal {
  return new TransactionJournal(config, logger);
}
