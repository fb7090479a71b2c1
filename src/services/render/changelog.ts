// Keep a Changelog generation from done work items

import type { ChangelogCategory } from '../../models/types.js';
import type { WorkItem, Release } from '../../models/work-item.js';
import type { ProjectIndex } from '../../models/project-index.js';

/**
 * Category prefixes accepted at the start of an acceptance criterion
 */
const CATEGORY_PREFIXES: Readonly<Record<string, ChangelogCategory>> = {
  add: 'added',
  added: 'added',
  changed: 'changed',
  deprecated: 'deprecated',
  removed: 'removed',
  fix: 'fixed',
  fixed: 'fixed',
  security: 'security',
  chore: 'chore'
};

const PUBLISHED_SECTIONS: ReadonlyArray<[Exclude<ChangelogCategory, 'chore'>, string]> = [
  ['added', 'Added'],
  ['changed', 'Changed'],
  ['deprecated', 'Deprecated'],
  ['removed', 'Removed'],
  ['fixed', 'Fixed'],
  ['security', 'Security']
];

const PREFIX_PATTERN = /^([A-Za-z]+)\s*:\s*([\s\S]*)$/;
const SECTION_HEADING = /^## \[([^\]]+)\]/;
const UNRELEASED = 'Unreleased';

export const CHANGELOG_PREAMBLE = [
  '# Changelog',
  '',
  'All notable changes to this project will be documented in this file.',
  '',
  'The format is based on [Keep a Changelog](https://keepachangelog.com/en/1.1.0/),',
  'and this project adheres to [Semantic Versioning](https://semver.org/spec/v2.0.0.html).'
].join('\n');

export interface ParsedCategory {
  category: ChangelogCategory;
  text: string;
  /** 'default' when no known prefix was present and `added` was assumed */
  source: 'prefix' | 'default';
}

/**
 * Split a criterion into its category and text. Text without a known
 * prefix is kept as written and filed under `added`.
 */
export function parseCategory(text: string): ParsedCategory {
  const match = PREFIX_PATTERN.exec(text.trim());
  const category = match?.[1] ? CATEGORY_PREFIXES[match[1].toLowerCase()] : undefined;
  if (match && category) {
    return { category, text: (match[2] ?? '').trim(), source: 'prefix' };
  }
  return { category: 'added', text: text.trim(), source: 'default' };
}

/**
 * Done work items that no release lists yet, sorted by id
 */
export function unreleasedWorkItems(index: ProjectIndex): WorkItem[] {
  const released = new Set(index.releases.flatMap(release => release.refs));
  return index.workItems
    .filter(item => item.status === 'done' && !released.has(item.id))
    .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}

/**
 * One `## [title]` block with its category subsections
 */
export function renderChangelogSection(heading: string, items: WorkItem[]): string {
  const lines = [`## ${heading}`, ''];
  let entries = 0;

  for (const [category, label] of PUBLISHED_SECTIONS) {
    const bullets = items.flatMap(item =>
      item.acceptanceCriteria
        .filter(criterion => criterion.status === 'done' && criterion.category === category)
        .map(criterion => `- ${criterion.text} (${item.id})`)
    );
    if (bullets.length === 0) continue;
    lines.push(`### ${label}`, '', ...bullets, '');
    entries += bullets.length;
  }

  if (entries === 0) {
    lines.push('*No changes recorded.*', '');
  }
  return `${lines.join('\n').trimEnd()}\n`;
}

function releaseHeading(release: Release): string {
  return `[${release.version}] - ${release.date}`;
}

function releaseItems(index: ProjectIndex, release: Release): WorkItem[] {
  return release.refs.flatMap(ref => index.workItems.filter(item => item.id === ref));
}

interface ParsedChangelog {
  preamble: string;
  sections: { key: string; text: string }[];
}

function parseChangelog(content: string): ParsedChangelog {
  const preamble: string[] = [];
  const sections: { key: string; lines: string[] }[] = [];

  for (const line of content.split(/\r?\n/)) {
    const heading = SECTION_HEADING.exec(line);
    if (heading?.[1]) {
      sections.push({ key: heading[1], lines: [line] });
    } else {
      const current = sections[sections.length - 1];
      if (current) current.lines.push(line);
      else preamble.push(line);
    }
  }

  return {
    preamble: preamble.join('\n').trim(),
    sections: sections.map(section => ({ key: section.key, text: `${section.lines.join('\n').trimEnd()}\n` }))
  };
}

export interface ChangelogOptions {
  /** Regenerate released sections too instead of keeping them as found */
  force?: boolean;
}

/**
 * Build CHANGELOG.md. Without `force`, an existing file keeps its preamble and
 * every released section it already has; only Unreleased is rebuilt and
 * missing releases are added. Sections for unknown versions are kept at the end.
 */
export function renderChangelog(index: ProjectIndex, existing: string | null = null, options: ChangelogOptions = {}): string {
  const parsed = existing !== null && !options.force ? parseChangelog(existing) : { preamble: '', sections: [] };
  const kept = new Map(parsed.sections.map(section => [section.key, section.text]));

  const sections: string[] = [];
  const unreleased = unreleasedWorkItems(index);
  if (unreleased.length > 0) {
    sections.push(renderChangelogSection(`[${UNRELEASED}]`, unreleased));
  }

  const known = new Set<string>([UNRELEASED]);
  for (const release of index.releases) {
    known.add(release.version);
    sections.push(kept.get(release.version) ?? renderChangelogSection(releaseHeading(release), releaseItems(index, release)));
  }

  for (const section of parsed.sections) {
    if (!known.has(section.key)) sections.push(section.text);
  }

  const preamble = parsed.preamble.length > 0 ? parsed.preamble : CHANGELOG_PREAMBLE;
  return [`${preamble}\n`, ...sections].join('\n');
}
