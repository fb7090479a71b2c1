// Record factories shared by the test suites

import type { RFC, Clause } from '../models/rfc.js';
import type { ADR } from '../models/adr.js';
import type { WorkItem, AcceptanceCriterion } from '../models/work-item.js';
import type { ProjectIndex, RFCEntry } from '../models/project-index.js';

export function createTestRFC(overrides: Partial<RFC> = {}): RFC {
  return {
    type: 'rfc',
    id: 'RFC-0001',
    title: 'Storage layout',
    version: '1.0.0',
    status: 'draft',
    phase: 'spec',
    owners: ['platform-team'],
    created: '2024-01-15',
    amendable: false,
    sections: [{ title: 'Scope', clauses: ['C-SCOPE'] }],
    changelog: [{ version: '1.0.0', date: '2024-01-15', summary: 'Initial draft', changes: [] }],
    ...overrides
  };
}

export function createTestClause(overrides: Partial<Clause> = {}): Clause {
  return {
    type: 'clause',
    id: 'C-SCOPE',
    rfcId: 'RFC-0001',
    title: 'Scope',
    kind: 'normative',
    status: 'active',
    text: 'Records MUST be stored as YAML.',
    since: '1.0.0',
    ...overrides
  };
}

export function createTestADR(overrides: Partial<ADR> = {}): ADR {
  return {
    type: 'adr',
    id: 'ADR-0001',
    title: 'Use YAML for records',
    status: 'proposed',
    date: '2024-01-20',
    refs: ['RFC-0001'],
    context: 'Records need to be diffable.',
    decision: 'Store every record as YAML.',
    consequences: 'Hand edits are possible.',
    alternatives: [],
    ...overrides
  };
}

export function createTestCriterion(overrides: Partial<AcceptanceCriterion> = {}): AcceptanceCriterion {
  return { text: 'tests pass', status: 'pending', category: 'added', ...overrides };
}

export function createTestWorkItem(overrides: Partial<WorkItem> = {}): WorkItem {
  return {
    type: 'work',
    id: 'WI-0001',
    title: 'Implement store',
    status: 'queue',
    created: '2024-02-01',
    refs: [],
    description: 'Write the record store.',
    notes: [],
    acceptanceCriteria: [],
    ...overrides
  };
}

export function emptyIndex(): ProjectIndex {
  return { rfcs: [], adrs: [], workItems: [], releases: [] };
}

export function createTestIndex(overrides: Partial<ProjectIndex> = {}): ProjectIndex {
  const entry: RFCEntry = { rfc: createTestRFC(), clauses: [createTestClause()] };
  return { rfcs: [entry], adrs: [], workItems: [], releases: [], ...overrides };
}
