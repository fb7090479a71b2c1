// Tests for work item and ADR allocation

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { WorkItemService, createCriterion } from './work-service.js';
import { ADRService } from '../adr/adr-service.js';
import { FileStore } from '../storage/file-store.js';
import { ValidationError } from '../../core/errors.js';
import { createTestWorkItem, createTestIndex, emptyIndex } from '../../testing/fixtures.js';

const NOW = new Date('2024-05-01T08:00:00Z');

describe('createCriterion', () => {
  it('should take the category from the prefix', () => {
    expect(createCriterion('fix: Handle empty files')).toEqual({ text: 'Handle empty files', status: 'pending', category: 'fixed' });
    expect(createCriterion('Export command')).toEqual({ text: 'Export command', status: 'pending', category: 'added' });
  });

  it('should reject a prefix with no text', () => {
    expect(() => createCriterion('chore:')).toThrow(ValidationError);
  });
});

describe('allocation', () => {
  let root: string;
  let store: FileStore;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'docgov-work-'));
    store = new FileStore({ baseDir: path.join(root, '.gov') });
    store.initialize();
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  describe('WorkItemService', () => {
    it('should queue a dated work item', () => {
      const service = new WorkItemService(store, { now: () => NOW });
      const item = service.newWorkItem(emptyIndex(), { title: 'Add export', criteria: ['add: Export command'] });
      expect(item).toEqual({
        type: 'work',
        id: 'WI-2024-05-01-001',
        title: 'Add export',
        status: 'queue',
        created: '2024-05-01',
        started: undefined,
        refs: [],
        description: '',
        notes: [],
        acceptanceCriteria: [{ text: 'Export command', status: 'pending', category: 'added' }]
      });
      expect(store.get('WI-2024-05-01-001')).not.toBeNull();
    });

    it('should start an item right away when asked', () => {
      const service = new WorkItemService(store, { workStrategy: 'sequential', now: () => NOW });
      const index = createTestIndex({ workItems: [createTestWorkItem({ id: 'WI-0004' })] });
      const item = service.newWorkItem(index, { title: 'Hotfix', active: true, refs: ['rfc-0001'] });
      expect(item).toMatchObject({ id: 'WI-0005', status: 'active', started: '2024-05-01', refs: ['RFC-0001'] });
    });
  });

  describe('ADRService', () => {
    it('should create a proposed ADR with placeholders', () => {
      const adr = new ADRService(store, () => NOW).newAdr(emptyIndex(), { title: 'Adopt YAML', refs: ['RFC-0001'] });
      expect(adr).toMatchObject({ id: 'ADR-0001', status: 'proposed', date: '2024-05-01', refs: ['RFC-0001'], alternatives: [] });
      expect(store.loadADR('ADR-0001')?.decision).toBe('[Describe the decision]');
    });
  });
});
