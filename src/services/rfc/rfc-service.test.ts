// Tests for RFC and clause allocation

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RFCService } from './rfc-service.js';
import { FileStore } from '../storage/file-store.js';
import { NotFoundError, ValidationError } from '../../core/errors.js';
import { createTestRFC, createTestClause, emptyIndex } from '../../testing/fixtures.js';

const NOW = new Date('2024-05-01T08:00:00Z');

describe('RFCService', () => {
  let root: string;
  let store: FileStore;
  let service: RFCService;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'docgov-rfc-'));
    store = new FileStore({ baseDir: path.join(root, '.gov') });
    store.initialize();
    service = new RFCService(store, () => NOW);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  describe('newRfc', () => {
    it('should create a draft with an initial changelog entry', () => {
      const rfc = service.newRfc(emptyIndex(), { title: '  Wire protocol ', owners: ['net-team'] });
      expect(rfc).toEqual({
        type: 'rfc',
        id: 'RFC-0001',
        title: 'Wire protocol',
        version: '0.1.0',
        status: 'draft',
        phase: 'spec',
        owners: ['net-team'],
        created: '2024-05-01',
        amendable: false,
        sections: [],
        changelog: [{ version: '0.1.0', date: '2024-05-01', summary: 'Initial draft', changes: [] }]
      });
      expect(store.loadRFC('RFC-0001')).toEqual(rfc);
    });

    it('should allocate the next sequential id', () => {
      store.save(createTestRFC({ id: 'RFC-0007' }));
      expect(service.newRfc(store.loadIndex(), { title: 'Next' }).id).toBe('RFC-0008');
    });

    it('should reject an invalid initial version', () => {
      expect(() => service.newRfc(emptyIndex(), { title: 'Bad', version: '1.0' })).toThrow(ValidationError);
    });
  });

  describe('newClause', () => {
    it('should create the default section when the RFC has none', () => {
      store.save(createTestRFC({ sections: [], version: '0.2.0' }));
      const result = service.newClause(store.loadIndex(), 'RFC-0001', { name: 'wire format', text: 'Frames MUST be length-prefixed.' });

      expect(result.applied).toBe(true);
      expect(result.record).toEqual({
        type: 'clause',
        id: 'C-WIRE-FORMAT',
        rfcId: 'RFC-0001',
        title: 'wire format',
        kind: 'normative',
        status: 'active',
        text: 'Frames MUST be length-prefixed.',
        since: '0.2.0'
      });
      expect(store.loadRFC('RFC-0001')?.sections).toEqual([{ title: 'Specification', clauses: ['C-WIRE-FORMAT'] }]);
      expect(store.loadRFC('RFC-0001')?.updated).toBe('2024-05-01');
    });

    it('should append to an existing section matched without case', () => {
      store.save(createTestRFC({ sections: [{ title: 'Scope', clauses: ['C-SCOPE'] }, { title: 'Format', clauses: [] }] }));
      store.save(createTestClause());
      service.newClause(store.loadIndex(), 'RFC-0001', { name: 'Limits', section: 'scope' });
      expect(store.loadRFC('RFC-0001')?.sections).toEqual([
        { title: 'Scope', clauses: ['C-SCOPE', 'C-LIMITS'] },
        { title: 'Format', clauses: [] }
      ]);
    });

    it('should reject a clause id the RFC already has', () => {
      store.save(createTestRFC());
      store.save(createTestClause());
      expect(() => service.newClause(store.loadIndex(), 'RFC-0001', { name: 'scope' })).toThrow(ValidationError);
    });

    it('should refuse a normative RFC without an open amendment', () => {
      store.save(createTestRFC({ status: 'normative' }));
      const result = service.newClause(store.loadIndex(), 'RFC-0001', { name: 'Limits' });
      expect(result.applied).toBe(false);
      expect(result.diagnostics.map(d => d.code)).toEqual(['AMENDMENT_NOT_OPEN']);
      expect(store.get('RFC-0001:C-LIMITS')).toBeNull();
    });

    it('should raise NotFoundError for a missing RFC', () => {
      expect(() => service.newClause(emptyIndex(), 'RFC-0003', { name: 'x' })).toThrow(NotFoundError);
    });
  });
});
