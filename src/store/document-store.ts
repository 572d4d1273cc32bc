/**
 * Whole-document persistence for rules, chains, plan history,
 * executions and execution logs.
 *
 * Every mutating operation is a load -> modify -> save cycle. `update()`
 * runs that cycle under a per-store mutex so overlapping requests cannot
 * lose each other's writes.
 */

import { access, readFile, writeFile, rename, mkdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { nanoid } from 'nanoid';
import {
  planningDocumentSchema,
  type PlanningDocument,
} from '../types/index.js';
import { createDefaultDocument, createEmptyDocument } from './default-catalog.js';
import { Mutex } from './mutex.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('document-store');

export const DOCUMENT_FILE_NAME = 'planning-store.json';

/**
 * Error raised when the persisted document fails schema validation.
 */
export class DocumentCorruptedError extends Error {
  readonly name = 'DocumentCorruptedError';
  readonly location: string;
  readonly validationErrors: string[];

  constructor(location: string, validationErrors: string[]) {
    super(`Planning document at ${location} is invalid: ${validationErrors.join('; ')}`);
    this.location = location;
    this.validationErrors = validationErrors;
    Object.setPrototypeOf(this, DocumentCorruptedError.prototype);
  }
}

export interface DocumentStore {
  load(): Promise<PlanningDocument>;
  save(document: PlanningDocument): Promise<void>;
  /**
   * Load, hand the document to `mutator`, then save it. Nothing is saved
   * when the mutator throws.
   */
  update<T>(mutator: (document: PlanningDocument) => T | Promise<T>): Promise<T>;
}

/**
 * Shared critical-section handling for concrete stores.
 */
export abstract class BaseDocumentStore implements DocumentStore {
  private readonly mutex = new Mutex();

  abstract load(): Promise<PlanningDocument>;
  abstract save(document: PlanningDocument): Promise<void>;

  async update<T>(mutator: (document: PlanningDocument) => T | Promise<T>): Promise<T> {
    const release = await this.mutex.acquire();
    try {
      const document = await this.load();
      const result = await mutator(document);
      document.updatedAt = new Date().toISOString();
      await this.save(document);
      return result;
    } finally {
      release();
    }
  }
}

function parseDocument(raw: unknown, location: string): PlanningDocument {
  const result = planningDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new DocumentCorruptedError(
      location,
      result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`)
    );
  }
  return result.data;
}

/**
 * In-process store. Documents are deep-copied on the way in and out so
 * callers never share references with the stored state.
 */
export class MemoryDocumentStore extends BaseDocumentStore {
  private document: PlanningDocument;

  constructor(initial: unknown = createEmptyDocument()) {
    super();
    this.document = parseDocument(structuredClone(initial), 'memory');
  }

  async load(): Promise<PlanningDocument> {
    return structuredClone(this.document);
  }

  async save(document: PlanningDocument): Promise<void> {
    this.document = structuredClone(document);
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

/**
 * JSON file store under the configured data directory. The file is
 * seeded with the default rule and chain catalog on first load.
 *
 * Concurrent first loads share one seeding write, and seeding never
 * overwrites a file that already exists.
 */
export class JsonFileDocumentStore extends BaseDocumentStore {
  readonly path: string;
  private seeding: Promise<void> | null = null;

  constructor(dataDir: string, fileName: string = DOCUMENT_FILE_NAME) {
    super();
    this.path = join(dataDir, fileName);
  }

  async load(): Promise<PlanningDocument> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
      await this.seedOnce();
      content = await readFile(this.path, 'utf-8');
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DocumentCorruptedError(this.path, [`invalid JSON: ${reason}`]);
    }

    const document = parseDocument(raw, this.path);
    log.debug(
      { path: this.path, executions: document.executions.length },
      'Planning document loaded'
    );
    return document;
  }

  async save(document: PlanningDocument): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tmpPath = `${this.path}.${nanoid(8)}.tmp`;
    await writeFile(tmpPath, JSON.stringify(document, null, 2), 'utf-8');
    await rename(tmpPath, this.path);
    log.debug({ path: this.path }, 'Planning document saved');
  }

  private async seedOnce(): Promise<void> {
    if (!this.seeding) {
      this.seeding = this.seedIfMissing().finally(() => {
        this.seeding = null;
      });
    }
    await this.seeding;
  }

  private async seedIfMissing(): Promise<void> {
    try {
      await access(this.path);
      return;
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
    }
    log.info({ path: this.path }, 'Planning document not found, seeding default catalog');
    await this.save(createDefaultDocument());
  }
}
