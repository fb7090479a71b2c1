// Tests for changelog generation

import { describe, it, expect } from 'vitest';
import {
  CHANGELOG_PREAMBLE,
  parseCategory,
  unreleasedWorkItems,
  renderChangelogSection,
  renderChangelog
} from './changelog.js';
import { createTestIndex, createTestWorkItem, createTestCriterion } from '../../testing/fixtures.js';
import type { ProjectIndex } from '../../models/project-index.js';

function sampleIndex(): ProjectIndex {
  return createTestIndex({
    workItems: [
      createTestWorkItem({
        id: 'WI-0001',
        status: 'done',
        acceptanceCriteria: [
          createTestCriterion({ text: 'Record store', status: 'done', category: 'added' }),
          createTestCriterion({ text: 'Crash on empty file', status: 'done', category: 'fixed' }),
          createTestCriterion({ text: 'Tests pass', status: 'done', category: 'chore' }),
          createTestCriterion({ text: 'Docs', status: 'cancelled', category: 'added' })
        ]
      }),
      createTestWorkItem({
        id: 'WI-0002',
        status: 'done',
        acceptanceCriteria: [createTestCriterion({ text: 'Release command', status: 'done' })]
      }),
      createTestWorkItem({
        id: 'WI-0003',
        status: 'active',
        acceptanceCriteria: [createTestCriterion({ text: 'Not yet', status: 'done' })]
      })
    ],
    releases: [{ version: '1.0.0', date: '2024-03-01', refs: ['WI-0001'] }]
  });
}

const UNRELEASED_SECTION = '## [Unreleased]\n\n### Added\n\n- Release command (WI-0002)\n';
const RELEASE_SECTION =
  '## [1.0.0] - 2024-03-01\n\n### Added\n\n- Record store (WI-0001)\n\n### Fixed\n\n- Crash on empty file (WI-0001)\n';

describe('parseCategory', () => {
  it('should map short and long prefixes', () => {
    expect(parseCategory('add: New command')).toEqual({ category: 'added', text: 'New command', source: 'prefix' });
    expect(parseCategory('fix: Off by one')).toEqual({ category: 'fixed', text: 'Off by one', source: 'prefix' });
    expect(parseCategory('Fixed: Off by one').category).toBe('fixed');
    expect(parseCategory('security:Escape output').text).toBe('Escape output');
    expect(parseCategory('chore: Tests pass').category).toBe('chore');
  });

  it('should default to added and keep the text when no known prefix is present', () => {
    expect(parseCategory('Support YAML')).toEqual({ category: 'added', text: 'Support YAML', source: 'default' });
    expect(parseCategory('Note: keep this')).toEqual({ category: 'added', text: 'Note: keep this', source: 'default' });
  });
});

describe('unreleasedWorkItems', () => {
  it('should return done items missing from every release', () => {
    expect(unreleasedWorkItems(sampleIndex()).map(item => item.id)).toEqual(['WI-0002']);
  });
});

describe('renderChangelogSection', () => {
  it('should note a section without published entries', () => {
    const item = createTestWorkItem({
      acceptanceCriteria: [createTestCriterion({ text: 'Refactor', status: 'done', category: 'chore' })]
    });
    expect(renderChangelogSection('[0.1.0] - 2024-01-01', [item])).toBe('## [0.1.0] - 2024-01-01\n\n*No changes recorded.*\n');
  });
});

describe('renderChangelog', () => {
  it('should generate every section in Keep a Changelog order', () => {
    expect(renderChangelog(sampleIndex())).toBe(`${CHANGELOG_PREAMBLE}\n\n${UNRELEASED_SECTION}\n${RELEASE_SECTION}`);
  });

  it('should replace only Unreleased and keep released sections as found', () => {
    const existing = `${CHANGELOG_PREAMBLE}\n\n## [Unreleased]\n\n- stale\n\n## [1.0.0] - 2024-03-01\n\nHand-written notes.\n`;
    expect(renderChangelog(sampleIndex(), existing)).toBe(
      `${CHANGELOG_PREAMBLE}\n\n${UNRELEASED_SECTION}\n## [1.0.0] - 2024-03-01\n\nHand-written notes.\n`
    );
  });

  it('should regenerate released sections when forced', () => {
    const existing = `# Old title\n\n## [1.0.0] - 2024-03-01\n\nHand-written notes.\n`;
    expect(renderChangelog(sampleIndex(), existing, { force: true })).toBe(
      `${CHANGELOG_PREAMBLE}\n\n${UNRELEASED_SECTION}\n${RELEASE_SECTION}`
    );
  });

  it('should be stable when merged into its own output', () => {
    const first = renderChangelog(sampleIndex());
    expect(renderChangelog(sampleIndex(), first)).toBe(first);
  });

  it('should drop Unreleased once everything is released', () => {
    const index = sampleIndex();
    index.releases = [{ version: '1.1.0', date: '2024-04-01', refs: ['WI-0002'] }, ...index.releases];
    const existing = renderChangelog(sampleIndex());
    expect(renderChangelog(index, existing)).toBe(
      `${CHANGELOG_PREAMBLE}\n\n## [1.1.0] - 2024-04-01\n\n### Added\n\n- Release command (WI-0002)\n\n${RELEASE_SECTION}`
    );
  });
});
