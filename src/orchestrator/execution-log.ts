import type { Logger } from 'pino';
import type {
  ExecutionLogItem,
  ExecutionRecord,
  LogEntry,
  PlanningDocument,
} from '../types/index.js';
import type { DocumentStore } from '../store/document-store.js';
import { appendCapped, newestFirst } from '../store/capped.js';
import { InvalidArgumentError } from '../errors.js';
import { createLogger } from '../utils/logger.js';

export const DEFAULT_LOG_PAGE = 200;
export const MAX_LOG_PAGE = 1000;

export interface LogEntryInput {
  executionId: string;
  step: string;
  status?: string;
  detail: string;
  metadata?: Record<string, unknown>;
}

export interface ExecutionRecordInput {
  planId: string;
  status?: string | undefined;
  note?: string | null | undefined;
  metadata?: Record<string, unknown> | undefined;
}

export interface LogQueryOptions {
  limit?: number | undefined;
  executionId?: string | undefined;
}

export function isLogEntry(item: ExecutionLogItem): item is LogEntry {
  return 'executionId' in item;
}

/**
 * Append-only, capped audit trail of engine actions.
 *
 * Entries live in the planning document's `executionLogs` ring, so an
 * entry written inside a store update cycle is persisted together with
 * the state change it describes.
 */
export class ExecutionLog {
  private readonly logger: Logger;

  constructor(
    private readonly store: DocumentStore,
    private readonly limit: number
  ) {
    this.logger = createLogger('execution-log');
  }

  /**
   * Append an entry to an already-loaded document.
   */
  append(document: PlanningDocument, input: LogEntryInput): LogEntry {
    const entry: LogEntry = {
      executionId: input.executionId,
      step: input.step,
      status: input.status ?? 'success',
      detail: input.detail,
      metadata: input.metadata ?? {},
      timestamp: new Date().toISOString(),
    };

    appendCapped(document.executionLogs, entry, this.limit);
    this.logger.debug(
      { executionId: entry.executionId, step: entry.step, status: entry.status },
      `Log: ${entry.step}`
    );
    return entry;
  }

  /**
   * Store a free-form operator record against a plan.
   */
  async record(input: ExecutionRecordInput): Promise<ExecutionRecord> {
    if (!input.planId.trim()) {
      throw new InvalidArgumentError('planId is required', { field: 'planId' });
    }

    const record: ExecutionRecord = {
      planId: input.planId,
      status: input.status ?? 'planned',
      note: input.note ?? null,
      metadata: input.metadata ?? {},
      timestamp: new Date().toISOString(),
    };

    await this.store.update((document) => {
      appendCapped(document.executionLogs, record, this.limit);
    });
    this.logger.info({ planId: record.planId, status: record.status }, 'Execution record stored');
    return record;
  }

  /**
   * Newest entries first. Filtering by execution drops free-form records,
   * which are not tied to an execution.
   */
  async list(options: LogQueryOptions = {}): Promise<ExecutionLogItem[]> {
    const document = await this.store.load();
    const limit = Math.max(1, Math.min(options.limit ?? DEFAULT_LOG_PAGE, MAX_LOG_PAGE));
    const { executionId } = options;

    const items = executionId
      ? document.executionLogs.filter(
          (item) => isLogEntry(item) && item.executionId === executionId
        )
      : document.executionLogs;

    return newestFirst(items, limit);
  }
}
