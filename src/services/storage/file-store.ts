// File store for governance records

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import type { z } from 'zod';
import type { Artifact } from '../../models/artifact.js';
import type { ArtifactType } from '../../models/types.js';
import type { RFC, Clause } from '../../models/rfc.js';
import type { ADR } from '../../models/adr.js';
import type { WorkItem, Release } from '../../models/work-item.js';
import type { ProjectIndex, RFCEntry } from '../../models/project-index.js';
import {
  RFCSchema,
  ClauseSchema,
  ADRSchema,
  WorkItemSchema,
  ReleasesFileSchema,
  parseWithSchema
} from '../../core/schemas.js';
import { validateId, sanitizePath } from '../../core/validation.js';
import { IOError, SchemaError, ValidationError, isErrnoException } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import { writeFileAtomic, readFileIfExists } from './atomic-write.js';

/**
 * Configuration for the file store
 */
export interface FileStoreConfig {
  /** Store root (default: .gov) */
  baseDir: string;
}

const DEFAULT_CONFIG: FileStoreConfig = {
  baseDir: '.gov'
};

/**
 * Subdirectory per top-level record type. Clauses live under their RFC.
 */
const TYPE_DIRECTORIES = {
  rfc: 'rfc',
  adr: 'adr',
  work: 'work'
} as const;

const RFC_FILE = 'rfc.yaml';
const CLAUSE_DIRECTORY = 'clauses';
const RELEASES_FILE = 'releases.yaml';
const RECORD_EXTENSION = '.yaml';

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Synchronous YAML store. Every write replaces the whole file atomically.
 */
export class FileStore {
  private config: FileStoreConfig;

  constructor(config: Partial<FileStoreConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  getBaseDir(): string {
    return this.config.baseDir;
  }

  isInitialized(): boolean {
    return fs.existsSync(path.join(this.config.baseDir, TYPE_DIRECTORIES.rfc));
  }

  /**
   * Creates the store directory layout
   */
  initialize(): void {
    try {
      for (const subdir of Object.values(TYPE_DIRECTORIES)) {
        fs.mkdirSync(path.join(this.config.baseDir, subdir), { recursive: true });
      }
    } catch (error) {
      throw new IOError(`Failed to initialize store at ${this.config.baseDir}`, this.config.baseDir, error);
    }
    logger.debug('Initialized store', { baseDir: this.config.baseDir });
  }

  // Paths

  private rfcDir(rfcId: string): string {
    return path.join(this.config.baseDir, TYPE_DIRECTORIES.rfc, sanitizePath(rfcId));
  }

  private rfcPath(rfcId: string): string {
    return path.join(this.rfcDir(rfcId), RFC_FILE);
  }

  private clausePath(rfcId: string, clauseId: string): string {
    return path.join(this.rfcDir(rfcId), CLAUSE_DIRECTORY, `${sanitizePath(clauseId)}${RECORD_EXTENSION}`);
  }

  private recordPath(type: 'adr' | 'work', id: string): string {
    return path.join(this.config.baseDir, TYPE_DIRECTORIES[type], `${sanitizePath(id)}${RECORD_EXTENSION}`);
  }

  /**
   * Path of the file holding a record, given its global id
   */
  pathFor(id: string): string {
    const parsed = validateId(id);
    switch (parsed.type) {
      case 'rfc':
        return this.rfcPath(parsed.id);
      case 'clause':
        return this.clausePath(parsed.rfcId, parsed.clauseId);
      case 'adr':
      case 'work':
        return this.recordPath(parsed.type, parsed.id);
    }
  }

  // Reading

  private listDirectory(dir: string): fs.Dirent[] {
    try {
      return fs
        .readdirSync(dir, { withFileTypes: true })
        .filter(entry => !entry.name.startsWith('.'))
        .sort((a, b) => compareIds(a.name, b.name));
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw new IOError(`Failed to list ${dir}`, dir, error);
    }
  }

  private listRecordIds(dir: string): string[] {
    return this.listDirectory(dir)
      .filter(entry => entry.isFile() && entry.name.endsWith(RECORD_EXTENSION))
      .map(entry => entry.name.slice(0, -RECORD_EXTENSION.length));
  }

  private readRecord<T extends z.ZodTypeAny>(filePath: string, schema: T): z.output<T> | null {
    const content = readFileIfExists(filePath);
    if (content === null) return null;

    let data: unknown;
    try {
      data = yaml.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SchemaError(`Malformed YAML in ${filePath}: ${reason}`, filePath);
    }
    return parseWithSchema(schema, data, filePath);
  }

  private expectId(record: { id: string }, expected: string, filePath: string): void {
    if (record.id !== expected) {
      throw new SchemaError(
        `Record id ${record.id} does not match its location (${expected})`,
        filePath,
        [`id: expected ${expected}`]
      );
    }
  }

  loadRFC(rfcId: string): RFC | null {
    const filePath = this.rfcPath(rfcId);
    const rfc: RFC | null = this.readRecord(filePath, RFCSchema);
    if (rfc) this.expectId(rfc, rfcId, filePath);
    return rfc;
  }

  loadClause(rfcId: string, clauseId: string): Clause | null {
    const filePath = this.clausePath(rfcId, clauseId);
    const clause: Clause | null = this.readRecord(filePath, ClauseSchema);
    if (clause) {
      this.expectId(clause, clauseId, filePath);
      if (clause.rfcId !== rfcId) {
        throw new SchemaError(`Clause ${clauseId} names RFC ${clause.rfcId} but is stored under ${rfcId}`, filePath, [
          `rfcId: expected ${rfcId}`
        ]);
      }
    }
    return clause;
  }

  loadADR(id: string): ADR | null {
    const filePath = this.recordPath('adr', id);
    const adr: ADR | null = this.readRecord(filePath, ADRSchema);
    if (adr) this.expectId(adr, id, filePath);
    return adr;
  }

  loadWorkItem(id: string): WorkItem | null {
    const filePath = this.recordPath('work', id);
    const item: WorkItem | null = this.readRecord(filePath, WorkItemSchema);
    if (item) this.expectId(item, id, filePath);
    return item;
  }

  /**
   * Every RFC directory. Plain files under rfc/ are ignored; a directory
   * without rfc.yaml is a SchemaError.
   */
  loadRFCs(): RFC[] {
    const rfcs: RFC[] = [];
    for (const entry of this.listDirectory(path.join(this.config.baseDir, TYPE_DIRECTORIES.rfc))) {
      if (!entry.isDirectory()) continue;
      const rfc = this.loadRFC(entry.name);
      if (!rfc) {
        const dir = this.rfcDir(entry.name);
        throw new SchemaError(`RFC directory ${dir} has no ${RFC_FILE}`, dir, [`${RFC_FILE}: missing`]);
      }
      rfcs.push(rfc);
    }
    return rfcs;
  }

  /**
   * Every clause file under an RFC, listed in a section or not
   */
  loadClauses(rfcId: string): Clause[] {
    const clauses: Clause[] = [];
    for (const clauseId of this.listRecordIds(path.join(this.rfcDir(rfcId), CLAUSE_DIRECTORY))) {
      const clause = this.loadClause(rfcId, clauseId);
      if (clause) clauses.push(clause);
    }
    return clauses;
  }

  loadADRs(): ADR[] {
    const adrs: ADR[] = [];
    for (const id of this.listRecordIds(path.join(this.config.baseDir, TYPE_DIRECTORIES.adr))) {
      const adr = this.loadADR(id);
      if (adr) adrs.push(adr);
    }
    return adrs;
  }

  loadWorkItems(): WorkItem[] {
    const items: WorkItem[] = [];
    for (const id of this.listRecordIds(path.join(this.config.baseDir, TYPE_DIRECTORIES.work))) {
      const item = this.loadWorkItem(id);
      if (item) items.push(item);
    }
    return items;
  }

  /**
   * All records of a type, sorted by global id
   */
  loadAll(type: ArtifactType): Artifact[] {
    switch (type) {
      case 'rfc':
        return this.loadRFCs();
      case 'clause':
        return this.loadRFCs().flatMap(rfc => this.loadClauses(rfc.id));
      case 'adr':
        return this.loadADRs();
      case 'work':
        return this.loadWorkItems();
    }
  }

  /**
   * Loads a record by global id
   *
   * @returns The record, or null when no file exists for the id
   */
  get(id: string): Artifact | null {
    const parsed = validateId(id);
    switch (parsed.type) {
      case 'rfc':
        return this.loadRFC(parsed.id);
      case 'clause':
        return this.loadClause(parsed.rfcId, parsed.clauseId);
      case 'adr':
        return this.loadADR(parsed.id);
      case 'work':
        return this.loadWorkItem(parsed.id);
    }
  }

  loadReleases(): Release[] {
    const filePath = path.join(this.config.baseDir, RELEASES_FILE);
    return this.readRecord(filePath, ReleasesFileSchema)?.releases ?? [];
  }

  /**
   * Builds the in-memory index of the whole store
   */
  loadIndex(): ProjectIndex {
    const rfcs: RFCEntry[] = this.loadRFCs().map(rfc => ({ rfc, clauses: this.loadClauses(rfc.id) }));
    return {
      rfcs,
      adrs: this.loadADRs(),
      workItems: this.loadWorkItems(),
      releases: this.loadReleases()
    };
  }

  // Writing

  /**
   * Validates and writes a record, replacing any previous version atomically
   */
  save(record: Artifact): void {
    let filePath: string;
    switch (record.type) {
      case 'rfc':
        validateId(record.id, 'rfc');
        parseWithSchema(RFCSchema, record);
        filePath = this.rfcPath(record.id);
        break;
      case 'clause':
        validateId(`${record.rfcId}:${record.id}`, 'clause');
        parseWithSchema(ClauseSchema, record);
        filePath = this.clausePath(record.rfcId, record.id);
        break;
      case 'adr':
        validateId(record.id, 'adr');
        parseWithSchema(ADRSchema, record);
        filePath = this.recordPath('adr', record.id);
        break;
      case 'work':
        validateId(record.id, 'work');
        parseWithSchema(WorkItemSchema, record);
        filePath = this.recordPath('work', record.id);
        break;
    }

    writeFileAtomic(filePath, yaml.stringify(record));
    logger.debug('Saved record', { type: record.type, id: record.id, file: filePath });
  }

  saveReleases(releases: Release[]): void {
    const filePath = path.join(this.config.baseDir, RELEASES_FILE);
    writeFileAtomic(filePath, yaml.stringify({ releases }));
    logger.debug('Saved releases', { count: releases.length });
  }

  /**
   * Removes a record file. Deleting an RFC directory is not supported.
   *
   * @returns false when the record did not exist
   */
  deleteRecord(id: string): boolean {
    if (validateId(id).type === 'rfc') {
      throw new ValidationError(`RFCs cannot be deleted: ${id}`, 'id');
    }
    const filePath = this.pathFor(id);
    if (!fs.existsSync(filePath)) {
      return false;
    }
    try {
      fs.rmSync(filePath);
    } catch (error) {
      throw new IOError(`Failed to delete ${filePath}`, filePath, error);
    }
    logger.debug('Deleted record', { id, file: filePath });
    return true;
  }
}
