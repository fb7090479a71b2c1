// Facade over the store, validator, resolver, signer and renderer

import * as fs from 'fs';
import * as path from 'path';
import { RENDERABLE_TYPES, type ArtifactType, type BumpLevel, type CriterionStatus } from '../../models/types.js';
import type { RFC, Clause } from '../../models/rfc.js';
import type { ADR } from '../../models/adr.js';
import type { WorkItem } from '../../models/work-item.js';
import type { ResolvedRefs } from '../../models/reference.js';
import { allSubjects, findSubject, type ProjectIndex, type Subject } from '../../models/project-index.js';
import {
  createDiagnostic,
  sortDiagnostics,
  type Diagnostic,
  type OperationResult
} from '../../models/diagnostic.js';
import { computeSignature, verifySignature, extractSourceId } from '../../core/integrity.js';
import { validateId } from '../../core/validation.js';
import { IOError, NotFoundError, ValidationError, isErrnoException } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import { FileStore } from '../storage/file-store.js';
import { writeFileAtomic, readFileIfExists } from '../storage/atomic-write.js';
import { ConfigService } from '../config/config-service.js';
import { ProjectValidator } from '../validation/validator.js';
import { RegexMentionMatcher } from '../reference/mention-matcher.js';
import { ReferenceIndex } from '../reference/reference-index.js';
import { ReferenceService } from '../reference/reference-service.js';
import { SourceScanner } from '../reference/source-scanner.js';
import { LifecycleService, type TransitionOptions, type TransitionResult, type BumpResult } from '../lifecycle/lifecycle-service.js';
import { RFCService, type CreateRFCData, type CreateClauseData, type CreateResult } from '../rfc/rfc-service.js';
import { ADRService, type CreateADRData } from '../adr/adr-service.js';
import { WorkItemService, type CreateWorkItemData } from '../work/work-service.js';
import { EditService, type AddOptions, type MatchOptions } from '../edit/edit-service.js';
import { MarkdownRenderer, projectionPath } from '../render/renderer.js';
import { renderChangelog } from '../render/changelog.js';
import { QueryService, type ListOptions, type ListEntry, type StatusSummary } from '../query/query-service.js';

export interface GovernanceServiceOptions {
  /** Project root; the store, docs and changelog paths are relative to it */
  root: string;
  /** Store directory under the root (default: .gov) */
  storeDir: string;
  now: () => Date;
}

export interface CheckOptions {
  /** Count warnings as failures */
  strict?: boolean;
  /** Scan the configured source roots (default: sourceScan.enabled) */
  scanSource?: boolean;
}

export interface CheckResult {
  diagnostics: Diagnostic[];
  errors: number;
  warnings: number;
  ok: boolean;
}

export interface RenderAllOptions {
  /** Regenerate released changelog sections as well */
  force?: boolean;
}

export interface RenderAllResult {
  /** Files whose content changed, relative to the root */
  written: string[];
  unchanged: string[];
  /** Generated projections whose record no longer exists */
  removed: string[];
}

/**
 * A generated projection on disk whose record is gone
 */
interface OrphanProjection {
  file: string;
  sourceId: string;
}

interface Services {
  matcher: RegexMentionMatcher;
  references: ReferenceService;
  lifecycle: LifecycleService;
  rfcs: RFCService;
  adrs: ADRService;
  workItems: WorkItemService;
  edits: EditService;
}

/**
 * Entry point for every governance operation. Each call loads the store
 * afresh and runs to completion synchronously.
 */
export class GovernanceService {
  private options: GovernanceServiceOptions;
  private store: FileStore;
  private config: ConfigService;
  private validator = new ProjectValidator();
  private query: QueryService;
  private cached: Services | null = null;

  constructor(options: Partial<GovernanceServiceOptions> = {}) {
    this.options = { root: process.cwd(), storeDir: '.gov', now: () => new Date(), ...options };
    const baseDir = path.resolve(this.options.root, this.options.storeDir);
    this.store = new FileStore({ baseDir });
    this.config = new ConfigService({ baseDir });
    this.query = new QueryService(this.store);
  }

  // Config is read on first use, so a malformed file only fails commands that need it
  private services(): Services {
    if (this.cached) return this.cached;
    const now = this.options.now;
    const matcher = new RegexMentionMatcher(this.config.getMentionPattern());
    const references = new ReferenceService(matcher);
    this.cached = {
      matcher,
      references,
      lifecycle: new LifecycleService(this.store, { now, references }),
      rfcs: new RFCService(this.store, now),
      adrs: new ADRService(this.store, now),
      workItems: new WorkItemService(this.store, { now, workStrategy: this.config.getWorkIdStrategy() }),
      edits: new EditService(this.store, now)
    };
    return this.cached;
  }

  getStore(): FileStore {
    return this.store;
  }

  /**
   * Create the store layout and a default config.yaml
   *
   * @returns false when the store already existed
   */
  init(): boolean {
    const existed = this.store.isInitialized();
    this.store.initialize();
    if (!fs.existsSync(this.config.getConfigPath())) {
      this.config.save();
    }
    return !existed;
  }

  private requireStore(): void {
    if (!this.store.isInitialized()) {
      throw new NotFoundError('Governance store', this.store.getBaseDir());
    }
  }

  loadIndex(): ProjectIndex {
    this.requireStore();
    return this.store.loadIndex();
  }

  // Queries

  list(kind: ArtifactType, options: ListOptions = {}): ListEntry[] {
    this.requireStore();
    return this.query.list(kind, options);
  }

  status(): StatusSummary {
    this.requireStore();
    return this.query.status();
  }

  get(id: string, field?: string): string {
    this.requireStore();
    return this.query.get(id, field);
  }

  // Integrity

  /**
   * Lifecycle and structural checks only
   */
  validate(kind?: ArtifactType): Diagnostic[] {
    return this.validator.validate(this.loadIndex(), kind);
  }

  /**
   * Validator, resolver and signature verification in one pass
   */
  check(options: CheckOptions = {}): CheckResult {
    const index = this.loadIndex();
    const { references, matcher } = this.services();
    const refIndex = ReferenceIndex.build(index);

    const diagnostics = [
      ...this.validator.validate(index),
      ...references.validate(index, refIndex),
      ...this.verifyProjections(index)
    ];

    const scan = this.config.getSourceScan();
    if (options.scanSource ?? scan.enabled) {
      const mentions = new SourceScanner(matcher, {
        baseDir: this.options.root,
        roots: scan.roots,
        extensions: scan.extensions,
        exclude: scan.exclude
      }).scan();
      diagnostics.push(...references.validateSourceMentions(mentions, refIndex));
    }

    const sorted = sortDiagnostics(diagnostics);
    const errors = sorted.filter(d => d.severity === 'error').length;
    const warnings = sorted.length - errors;
    logger.debug('Check finished', { errors, warnings });
    return { diagnostics: sorted, errors, warnings, ok: errors === 0 && (!options.strict || warnings === 0) };
  }

  private verifyProjections(index: ProjectIndex): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];
    for (const subject of allSubjects(index)) {
      const file = this.projectionFile(subject);
      const markdown = readFileIfExists(path.join(this.options.root, file));
      if (markdown === null) continue;

      const sourceId = extractSourceId(markdown);
      if (sourceId !== null && sourceId !== subject.id) {
        diagnostics.push(
          createDiagnostic('TAMPER_OR_STALE', subject.id, `Projection names ${sourceId} as its source; re-render it`, { file })
        );
        continue;
      }

      const result = verifySignature(subject, markdown);
      if (result.valid) continue;
      if (result.reason === 'missing') {
        diagnostics.push(createDiagnostic('SIGNATURE_MISSING', subject.id, 'Projection has no signature line; re-render it', { file }));
      } else {
        diagnostics.push(
          createDiagnostic('TAMPER_OR_STALE', subject.id, 'Projection does not match its source; re-render it', { file })
        );
      }
    }

    for (const orphan of this.orphanProjections(index)) {
      diagnostics.push(
        createDiagnostic(
          'ORPHAN_PROJECTION',
          orphan.sourceId,
          `Projection of ${orphan.sourceId} has no source record; re-render to remove it`,
          { file: orphan.file }
        )
      );
    }
    return diagnostics;
  }

  /**
   * Generated files under the docs directory that no record renders to.
   * Files without the generated banner are left alone.
   */
  private orphanProjections(index: ProjectIndex): OrphanProjection[] {
    const expected = new Set(allSubjects(index).map(subject => this.projectionFile(subject)));
    const orphans: OrphanProjection[] = [];

    for (const type of RENDERABLE_TYPES) {
      const dir = path.posix.join(this.config.getDocsOutput(), type);
      for (const name of this.listMarkdown(path.join(this.options.root, dir))) {
        const file = path.posix.join(dir, name);
        if (expected.has(file)) continue;
        const markdown = readFileIfExists(path.join(this.options.root, file));
        const sourceId = markdown === null ? null : extractSourceId(markdown);
        if (sourceId !== null) orphans.push({ file, sourceId });
      }
    }
    return orphans;
  }

  private listMarkdown(dir: string): string[] {
    try {
      return fs
        .readdirSync(dir, { withFileTypes: true })
        .filter(entry => entry.isFile() && entry.name.endsWith('.md'))
        .map(entry => entry.name)
        .sort();
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return [];
      throw new IOError(`Failed to list ${dir}`, dir, error);
    }
  }

  private projectionFile(subject: Subject): string {
    return path.posix.join(this.config.getDocsOutput(), projectionPath(subject.type, subject.id));
  }

  private requireSubject(index: ProjectIndex, id: string): Subject {
    const parsed = validateId(id);
    if (parsed.type === 'clause') {
      throw new ValidationError(`Clauses are signed and rendered as part of ${parsed.rfcId}`, 'id');
    }
    const subject = findSubject(index, parsed.id);
    if (!subject) throw new NotFoundError('Artifact', parsed.id);
    return subject;
  }

  sign(id: string): string {
    return computeSignature(this.requireSubject(this.loadIndex(), id));
  }

  render(id: string): string {
    const index = this.loadIndex();
    return this.renderer(index).render(this.requireSubject(index, id));
  }

  private renderer(index: ProjectIndex): MarkdownRenderer {
    return new MarkdownRenderer(ReferenceIndex.build(index), this.services().matcher);
  }

  /**
   * Write every projection and the changelog. Files whose content is already
   * current are left untouched.
   */
  renderAll(options: RenderAllOptions = {}): RenderAllResult {
    const index = this.loadIndex();
    const renderer = this.renderer(index);
    const result: RenderAllResult = { written: [], unchanged: [], removed: [] };

    const write = (file: string, content: string): void => {
      const target = path.join(this.options.root, file);
      if (readFileIfExists(target) === content) {
        result.unchanged.push(file);
        return;
      }
      writeFileAtomic(target, content);
      result.written.push(file);
      logger.debug('Rendered', { file });
    };

    for (const subject of allSubjects(index)) {
      write(this.projectionFile(subject), renderer.render(subject));
    }

    for (const orphan of this.orphanProjections(index)) {
      const target = path.join(this.options.root, orphan.file);
      try {
        fs.rmSync(target);
      } catch (error) {
        throw new IOError(`Failed to remove ${orphan.file}`, target, error);
      }
      result.removed.push(orphan.file);
      logger.debug('Removed orphan projection', { file: orphan.file, source: orphan.sourceId });
    }

    const changelogFile = this.config.getChangelogPath();
    const existing = readFileIfExists(path.join(this.options.root, changelogFile));
    write(changelogFile, renderChangelog(index, existing, options));

    logger.info(`Rendered ${result.written.length} file(s)`, { unchanged: result.unchanged.length, removed: result.removed.length });
    return result;
  }

  resolveRefs(id: string): ResolvedRefs | Diagnostic[] {
    const index = this.loadIndex();
    return this.services().references.resolveRefs(index, validateId(id).id);
  }

  // Lifecycle

  transition(id: string, target: string, options: TransitionOptions = {}): TransitionResult {
    return this.services().lifecycle.transition(this.loadIndex(), id, target, options);
  }

  amend(rfcId: string): OperationResult {
    return this.services().lifecycle.amend(this.loadIndex(), rfcId);
  }

  bump(rfcId: string, level: BumpLevel, summary: string, changes: string[] = []): BumpResult {
    return this.services().lifecycle.bump(this.loadIndex(), rfcId, level, summary, changes);
  }

  delete(id: string): OperationResult {
    return this.services().lifecycle.delete(this.loadIndex(), id);
  }

  release(version: string, date?: string): OperationResult {
    return this.services().lifecycle.release(this.loadIndex(), version, date);
  }

  // Allocation

  newRfc(data: CreateRFCData): RFC {
    return this.services().rfcs.newRfc(this.loadIndex(), data);
  }

  newClause(rfcId: string, data: CreateClauseData): CreateResult<Clause> {
    return this.services().rfcs.newClause(this.loadIndex(), rfcId, data);
  }

  newAdr(data: CreateADRData): ADR {
    return this.services().adrs.newAdr(this.loadIndex(), data);
  }

  newWorkItem(data: CreateWorkItemData): WorkItem {
    return this.services().workItems.newWorkItem(this.loadIndex(), data);
  }

  // Edits

  set(id: string, field: string, value: string): OperationResult {
    return this.services().edits.set(this.loadIndex(), id, field, value);
  }

  add(id: string, field: string, value: string, options: AddOptions = {}): OperationResult {
    return this.services().edits.add(this.loadIndex(), id, field, value, options);
  }

  remove(id: string, field: string, pattern: string, options: MatchOptions = {}): OperationResult {
    return this.services().edits.remove(this.loadIndex(), id, field, pattern, options);
  }

  tick(id: string, field: string, pattern: string, status: CriterionStatus, options: MatchOptions = {}): OperationResult {
    return this.services().edits.tick(this.loadIndex(), id, field, pattern, status, options);
  }
}
