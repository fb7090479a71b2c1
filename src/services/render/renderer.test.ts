// Tests for the markdown renderer

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { MarkdownRenderer, clauseAnchor, linkTarget, projectionPath } from './renderer.js';
import { ReferenceIndex } from '../reference/reference-index.js';
import { RegexMentionMatcher } from '../reference/mention-matcher.js';
import { computeSignature, extractSignature, verifySignature } from '../../core/integrity.js';
import type { ProjectIndex, Subject } from '../../models/project-index.js';
import {
  createTestIndex,
  createTestRFC,
  createTestClause,
  createTestADR,
  createTestWorkItem,
  createTestCriterion
} from '../../testing/fixtures.js';

function rendererFor(index: ProjectIndex): MarkdownRenderer {
  return new MarkdownRenderer(ReferenceIndex.build(index), new RegexMentionMatcher());
}

function rfcSubject(index: ProjectIndex): Subject {
  const entry = index.rfcs[0];
  if (!entry) throw new Error('fixture has no RFC');
  return { type: 'rfc', id: entry.rfc.id, rfc: entry.rfc, clauses: entry.clauses };
}

describe('paths and anchors', () => {
  it('should derive projection paths and clause anchors', () => {
    expect(projectionPath('adr', 'ADR-0003')).toBe('adr/ADR-0003.md');
    expect(clauseAnchor('RFC-0001:C-SCOPE')).toBe('rfc-0001-c-scope');
  });

  it('should link clauses into their RFC projection', () => {
    const entry = { id: 'RFC-0002:C-WIRE-FORMAT', type: 'clause' as const, title: 'Wire', lifecycle: { state: 'active' as const } };
    expect(linkTarget(entry)).toBe('../rfc/RFC-0002.md#rfc-0002-c-wire-format');
  });
});

describe('MarkdownRenderer', () => {
  describe('RFC projection', () => {
    it('should render sections, clauses and the changelog in order', () => {
      const index = createTestIndex();
      expect(rendererFor(index).renderBody(rfcSubject(index))).toBe(
        [
          '# RFC-0001: Storage layout',
          '',
          '> **Version:** 1.0.0 | **Status:** draft | **Phase:** spec',
          '',
          '**Owners:** platform-team',
          '',
          '## 1. Scope',
          '',
          '<a id="rfc-0001-c-scope"></a>',
          '### [RFC-0001:C-SCOPE] Scope (Normative)',
          '',
          'Records MUST be stored as YAML.',
          '',
          '*Since: v1.0.0*',
          '',
          '## Changelog',
          '',
          '### v1.0.0 (2024-01-15)',
          '',
          'Initial draft'
        ].join('\n')
      );
    });

    it('should prepend the generated banner and signature', () => {
      const index = createTestIndex();
      const subject = rfcSubject(index);
      const output = rendererFor(index).render(subject);
      expect(output.startsWith(
        `<!-- GENERATED: do not edit. source=RFC-0001 -->\n<!-- signature: sha256:${computeSignature(subject)} -->\n\n# RFC-0001`
      )).toBe(true);
      expect(output.endsWith('Initial draft\n')).toBe(true);
      expect(verifySignature(subject, output)).toEqual({ valid: true, signature: computeSignature(subject) });
    });

    it('should mark superseded clauses and link their replacement', () => {
      const index = createTestIndex({
        rfcs: [
          {
            rfc: createTestRFC({ sections: [{ title: 'Scope', clauses: ['C-OLD', 'C-NEW'] }], changelog: [] }),
            clauses: [
              createTestClause({ id: 'C-NEW', title: 'New', text: 'Replaces [[RFC-0001:C-OLD]].', since: undefined }),
              createTestClause({ id: 'C-OLD', title: 'Old', status: 'superseded', supersededBy: 'C-NEW', since: undefined })
            ]
          }
        ]
      });
      const body = rendererFor(index).renderBody(rfcSubject(index));
      expect(body).toContain(
        '### [RFC-0001:C-OLD] Old (Normative) ~~SUPERSEDED~~\n\nRecords MUST be stored as YAML.\n\n> **Superseded by:** [RFC-0001:C-NEW](../rfc/RFC-0001.md#rfc-0001-c-new)'
      );
      expect(body).toContain('Replaces [RFC-0001:C-OLD](../rfc/RFC-0001.md#rfc-0001-c-old).');
    });
  });

  describe('ADR projection', () => {
    it('should render refs, body sections and alternatives', () => {
      const adr = createTestADR({
        alternatives: [{ text: 'Use JSON', pros: ['Strict'], cons: ['Noisy diffs'], rejectionReason: 'Hard to review' }]
      });
      const index = createTestIndex({ adrs: [adr] });
      expect(rendererFor(index).renderBody({ type: 'adr', id: adr.id, adr })).toBe(
        [
          '# ADR-0001: Use YAML for records',
          '',
          '> **Status:** proposed | **Date:** 2024-01-20',
          '',
          '**References:** [RFC-0001](../rfc/RFC-0001.md)',
          '',
          '## Context',
          '',
          'Records need to be diffable.',
          '',
          '## Decision',
          '',
          'Store every record as YAML.',
          '',
          '## Consequences',
          '',
          'Hand edits are possible.',
          '',
          '## Alternatives Considered',
          '',
          '### Use JSON',
          '',
          '**Pros:**',
          '- Strict',
          '',
          '**Cons:**',
          '- Noisy diffs',
          '',
          '**Rejection Reason:** Hard to review'
        ].join('\n')
      );
    });
  });

  describe('work item projection', () => {
    it('should render the acceptance criteria as a checklist', () => {
      const item = createTestWorkItem({
        acceptanceCriteria: [
          createTestCriterion({ text: 'a' }),
          createTestCriterion({ text: 'b', status: 'done' }),
          createTestCriterion({ text: 'c', status: 'cancelled' })
        ]
      });
      const index = createTestIndex({ workItems: [item] });
      expect(rendererFor(index).renderBody({ type: 'work', id: item.id, item })).toBe(
        [
          '# WI-0001: Implement store',
          '',
          '> **Status:** queue | **Created:** 2024-02-01',
          '',
          '## Description',
          '',
          'Write the record store.',
          '',
          '## Acceptance Criteria',
          '',
          '- [ ] a',
          '- [x] b',
          '- ~~c~~'
        ].join('\n')
      );
    });

    it('should expand known mentions and leave unknown ones as written', () => {
      const item = createTestWorkItem({ description: 'See [[RFC-0001:C-SCOPE]] and [[ADR-0404]].' });
      const index = createTestIndex({ workItems: [item] });
      expect(rendererFor(index).expandMentions(item.description)).toBe(
        'See [RFC-0001:C-SCOPE](../rfc/RFC-0001.md#rfc-0001-c-scope) and [[ADR-0404]].'
      );
    });
  });

  describe('idempotence', () => {
    it('should produce identical bytes for unchanged input', () => {
      fc.assert(
        fc.property(fc.string(), fc.string(), fc.array(fc.string(), { maxLength: 4 }), (title, text, notes) => {
          const index = createTestIndex({
            rfcs: [{ rfc: createTestRFC({ title }), clauses: [createTestClause({ text })] }],
            workItems: [createTestWorkItem({ notes })]
          });
          const renderer = rendererFor(index);
          const subject = rfcSubject(index);
          const first = renderer.render(subject);
          expect(rendererFor(index).render(subject)).toBe(first);
          expect(extractSignature(first)).toBe(computeSignature(subject));

          const work: Subject = { type: 'work', id: 'WI-0001', item: createTestWorkItem({ notes }) };
          expect(renderer.render(work)).toBe(renderer.render(work));
        })
      );
    });
  });
});
