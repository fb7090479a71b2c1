// Tests for store-level validation

import { describe, it, expect } from 'vitest';
import { ProjectValidator } from './validator.js';
import type { ProjectIndex } from '../../models/project-index.js';
import {
  createTestRFC,
  createTestClause,
  createTestADR,
  createTestWorkItem,
  createTestCriterion,
  createTestIndex
} from '../../testing/fixtures.js';

describe('ProjectValidator', () => {
  const validator = new ProjectValidator();

  const codes = (index: ProjectIndex) => validator.validate(index).map(d => `${d.artifactId} ${d.code}`);

  it('should accept a consistent store', () => {
    const index = createTestIndex({ adrs: [createTestADR()], workItems: [createTestWorkItem()] });
    expect(validator.validate(index)).toEqual([]);
  });

  describe('RFCs', () => {
    it('should reject a draft RFC at phase stable', () => {
      const index = createTestIndex();
      index.rfcs[0] = { rfc: createTestRFC({ phase: 'stable' }), clauses: [createTestClause()] };
      expect(codes(index)).toEqual(['RFC-0001 STATUS_PHASE_FORBIDDEN']);
    });

    it('should warn about a deprecated RFC still at spec', () => {
      const index = createTestIndex();
      index.rfcs[0] = { rfc: createTestRFC({ status: 'deprecated' }), clauses: [createTestClause()] };
      expect(validator.validate(index)).toEqual([
        {
          code: 'STATUS_PHASE_WARNING',
          severity: 'warning',
          artifactId: 'RFC-0001',
          message: 'status=deprecated with phase=spec: RFC was deprecated before any implementation'
        }
      ]);
    });

    it('should report an invalid version and a missing changelog', () => {
      const index = createTestIndex();
      index.rfcs[0] = { rfc: createTestRFC({ version: '1.0', changelog: [] }), clauses: [createTestClause()] };
      expect(codes(index)).toEqual(['RFC-0001 INVALID_VERSION', 'RFC-0001 MISSING_CHANGELOG']);
    });

    it('should report missing, duplicate and orphaned clauses', () => {
      const index = createTestIndex();
      index.rfcs[0] = {
        rfc: createTestRFC({
          sections: [
            { title: 'Scope', clauses: ['C-SCOPE', 'C-GHOST'] },
            { title: 'Again', clauses: ['C-SCOPE'] }
          ]
        }),
        clauses: [createTestClause(), createTestClause({ id: 'C-STRAY' })]
      };
      expect(codes(index)).toEqual([
        'RFC-0001 DUPLICATE_CLAUSE',
        'RFC-0001 MISSING_CLAUSE',
        'RFC-0001:C-STRAY ORPHAN_CLAUSE'
      ]);
    });
  });

  describe('clauses', () => {
    it('should warn about a clause without since', () => {
      const index = createTestIndex();
      index.rfcs[0] = { rfc: createTestRFC(), clauses: [createTestClause({ since: undefined })] };
      expect(codes(index)).toEqual(['RFC-0001:C-SCOPE MISSING_SINCE']);
    });

    it('should require supersededBy to name an active clause of the same RFC', () => {
      const index = createTestIndex();
      index.rfcs[0] = {
        rfc: createTestRFC({ sections: [{ title: 'Scope', clauses: ['C-A', 'C-B', 'C-C'] }] }),
        clauses: [
          createTestClause({ id: 'C-A', status: 'superseded', supersededBy: 'C-B' }),
          createTestClause({ id: 'C-B', status: 'deprecated' }),
          createTestClause({ id: 'C-C', status: 'active', supersededBy: 'C-NOPE' })
        ]
      };
      expect(validator.validate(index).map(d => `${d.artifactId}: ${d.message}`)).toEqual([
        'RFC-0001:C-A: Superseding clause RFC-0001:C-B is deprecated',
        'RFC-0001:C-C: Superseding clause RFC-0001:C-NOPE does not exist',
        'RFC-0001:C-C: supersededBy is set but status is active'
      ]);
    });
  });

  describe('ADRs', () => {
    it('should warn about an ADR without refs', () => {
      expect(codes(createTestIndex({ adrs: [createTestADR({ refs: [] })] }))).toEqual(['ADR-0001 ADR_WITHOUT_REFS']);
    });

    it('should require a superseded ADR to name an existing replacement', () => {
      const index = createTestIndex({
        adrs: [
          createTestADR({ status: 'superseded' }),
          createTestADR({ id: 'ADR-0002', status: 'superseded', supersededBy: 'ADR-0009' })
        ]
      });
      expect(codes(index)).toEqual(['ADR-0001 INVALID_SUPERSESSION', 'ADR-0002 INVALID_SUPERSESSION']);
    });
  });

  describe('work items', () => {
    it('should flag a done item that still has pending criteria', () => {
      const index = createTestIndex({
        workItems: [createTestWorkItem({ status: 'done', acceptanceCriteria: [createTestCriterion()] })]
      });
      expect(codes(index)).toEqual(['WI-0001 CRITERIA_INCOMPLETE']);
    });
  });

  describe('releases', () => {
    it('should report bad versions, duplicates and unknown work items', () => {
      const index = createTestIndex({
        workItems: [createTestWorkItem()],
        releases: [
          { version: '1.1.0', date: '2024-04-01', refs: ['WI-0404'] },
          { version: '1.1.0', date: '2024-03-01', refs: ['WI-0001'] },
          { version: 'next', date: '2024-02-01', refs: [] }
        ]
      });
      expect(codes(index)).toEqual([
        'release:1.1.0 DANGLING_REFERENCE',
        'release:1.1.0 RELEASE_REFUSED',
        'release:next INVALID_VERSION'
      ]);
    });
  });

  it('should restrict checks to one kind when asked', () => {
    const index = createTestIndex({ adrs: [createTestADR({ refs: [] })] });
    index.rfcs[0] = { rfc: createTestRFC({ changelog: [] }), clauses: [createTestClause()] };
    expect(validator.validate(index, 'adr').map(d => d.code)).toEqual(['ADR_WITHOUT_REFS']);
  });
});
