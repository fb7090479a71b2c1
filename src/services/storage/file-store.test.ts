// Tests for FileStore service

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FileStore } from './file-store.js';
import { SchemaError, SecurityError, ValidationError } from '../../core/errors.js';
import {
  createTestRFC,
  createTestClause,
  createTestADR,
  createTestWorkItem
} from '../../testing/fixtures.js';

describe('FileStore', () => {
  let root: string;
  let store: FileStore;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'docgov-store-'));
    store = new FileStore({ baseDir: path.join(root, '.gov') });
    store.initialize();
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  describe('initialize', () => {
    it('should create the directory layout', () => {
      for (const dir of ['rfc', 'adr', 'work']) {
        expect(fs.statSync(path.join(root, '.gov', dir)).isDirectory()).toBe(true);
      }
      expect(store.isInitialized()).toBe(true);
    });
  });

  describe('save and get', () => {
    it('should round-trip every record type', () => {
      const rfc = createTestRFC();
      const clause = createTestClause();
      const adr = createTestADR();
      const item = createTestWorkItem();
      store.save(rfc);
      store.save(clause);
      store.save(adr);
      store.save(item);

      expect(store.get('RFC-0001')).toEqual(rfc);
      expect(store.get('RFC-0001:C-SCOPE')).toEqual(clause);
      expect(store.get('ADR-0001')).toEqual(adr);
      expect(store.get('WI-0001')).toEqual(item);
    });

    it('should store clauses under their RFC directory', () => {
      store.save(createTestClause());
      expect(fs.existsSync(path.join(root, '.gov', 'rfc', 'RFC-0001', 'clauses', 'C-SCOPE.yaml'))).toBe(true);
    });

    it('should return null for a missing record', () => {
      expect(store.get('ADR-0009')).toBeNull();
    });

    it('should leave no temporary files behind', () => {
      store.save(createTestADR());
      store.save(createTestADR({ title: 'Use YAML everywhere' }));
      expect(fs.readdirSync(path.join(root, '.gov', 'adr'))).toEqual(['ADR-0001.yaml']);
    });

    it('should refuse to save a record that breaks its schema', () => {
      expect(() => store.save(createTestADR({ date: 'yesterday' }))).toThrow(SchemaError);
      expect(store.get('ADR-0001')).toBeNull();
    });

    it('should reject ids that try to escape the store', () => {
      expect(() => store.get('../RFC-0001')).toThrow(SecurityError);
    });
  });

  describe('loadAll', () => {
    it('should return records sorted by id', () => {
      store.save(createTestWorkItem({ id: 'WI-0003' }));
      store.save(createTestWorkItem({ id: 'WI-0001' }));
      store.save(createTestWorkItem({ id: 'WI-0002' }));
      expect(store.loadAll('work').map(item => item.id)).toEqual(['WI-0001', 'WI-0002', 'WI-0003']);
    });

    it('should list clauses across RFCs', () => {
      store.save(createTestRFC());
      store.save(createTestRFC({ id: 'RFC-0002' }));
      store.save(createTestClause({ id: 'C-B' }));
      store.save(createTestClause({ id: 'C-A' }));
      store.save(createTestClause({ id: 'C-A', rfcId: 'RFC-0002' }));
      const clauses = store.loadAll('clause');
      expect(clauses.map(clause => clause.type === 'clause' ? `${clause.rfcId}:${clause.id}` : clause.id)).toEqual([
        'RFC-0001:C-A',
        'RFC-0001:C-B',
        'RFC-0002:C-A'
      ]);
    });

    it('should return an empty list for an empty store', () => {
      expect(store.loadAll('adr')).toEqual([]);
    });
  });

  describe('loadIndex', () => {
    it('should group clauses with their RFC', () => {
      store.save(createTestRFC());
      store.save(createTestClause());
      store.save(createTestWorkItem());
      store.saveReleases([{ version: '1.0.0', date: '2024-03-01', refs: ['WI-0001'] }]);

      const index = store.loadIndex();
      expect(index.rfcs).toHaveLength(1);
      expect(index.rfcs[0]?.clauses.map(clause => clause.id)).toEqual(['C-SCOPE']);
      expect(index.workItems.map(item => item.id)).toEqual(['WI-0001']);
      expect(index.releases).toEqual([{ version: '1.0.0', date: '2024-03-01', refs: ['WI-0001'] }]);
    });

    it('should ignore plain files beside the RFC directories', () => {
      store.save(createTestRFC());
      fs.writeFileSync(path.join(root, '.gov', 'rfc', 'README.md'), '# RFCs\n');

      expect(store.loadIndex().rfcs.map(entry => entry.rfc.id)).toEqual(['RFC-0001']);
    });

    it('should raise SchemaError for an RFC directory without rfc.yaml', () => {
      store.save(createTestClause({ rfcId: 'RFC-0002' }));

      expect(() => store.loadIndex()).toThrow(SchemaError);
      expect(() => store.loadIndex()).toThrow(/RFC-0002 has no rfc\.yaml/);
    });
  });

  describe('malformed records', () => {
    it('should raise SchemaError for unparseable YAML', () => {
      fs.writeFileSync(path.join(root, '.gov', 'adr', 'ADR-0001.yaml'), 'title: [unclosed\n');
      expect(() => store.get('ADR-0001')).toThrow(SchemaError);
    });

    it('should raise SchemaError for missing required fields', () => {
      fs.writeFileSync(path.join(root, '.gov', 'adr', 'ADR-0001.yaml'), 'type: adr\nid: ADR-0001\n');
      expect(() => store.loadADRs()).toThrow(SchemaError);
    });

    it('should raise SchemaError when the id does not match the file name', () => {
      store.save(createTestADR({ id: 'ADR-0002' }));
      fs.renameSync(path.join(root, '.gov', 'adr', 'ADR-0002.yaml'), path.join(root, '.gov', 'adr', 'ADR-0001.yaml'));
      expect(() => store.get('ADR-0001')).toThrow(SchemaError);
    });
  });

  describe('deleteRecord', () => {
    it('should remove a clause file', () => {
      store.save(createTestClause());
      expect(store.deleteRecord('RFC-0001:C-SCOPE')).toBe(true);
      expect(store.get('RFC-0001:C-SCOPE')).toBeNull();
    });

    it('should report a missing record', () => {
      expect(store.deleteRecord('WI-0042')).toBe(false);
    });

    it('should refuse to delete an RFC', () => {
      expect(() => store.deleteRecord('RFC-0001')).toThrow(ValidationError);
    });
  });
});
