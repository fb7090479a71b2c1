// Markdown projections of signed governance records

import type { RenderableType } from '../../models/types.js';
import type { RFC, Clause } from '../../models/rfc.js';
import type { ADR, Alternative } from '../../models/adr.js';
import type { WorkItem, AcceptanceCriterion } from '../../models/work-item.js';
import type { Subject } from '../../models/project-index.js';
import type { IndexEntry } from '../../models/reference.js';
import { computeSignature, formatSignatureHeader } from '../../core/integrity.js';
import type { MentionMatcher } from '../reference/mention-matcher.js';
import type { ReferenceIndex } from '../reference/reference-index.js';

/**
 * Location of a projection relative to the docs output root
 */
export function projectionPath(type: RenderableType, id: string): string {
  return `${type}/${id}.md`;
}

/**
 * HTML anchor of a clause inside its RFC projection
 */
export function clauseAnchor(qualifiedId: string): string {
  return qualifiedId.toLowerCase().replace(/[^a-z0-9]+/g, '-');
}

/**
 * Relative link from one projection to the projection of an index entry
 */
export function linkTarget(entry: IndexEntry): string {
  if (entry.type === 'clause') {
    const [rfcId = entry.id] = entry.id.split(':');
    return `../${projectionPath('rfc', rfcId)}#${clauseAnchor(entry.id)}`;
  }
  return `../${projectionPath(entry.type, entry.id)}`;
}

const CLAUSE_KIND_MARKERS = {
  normative: '(Normative)',
  informative: '(Informative)'
} as const;

const CLAUSE_STATUS_MARKERS = {
  active: '',
  superseded: ' ~~SUPERSEDED~~',
  deprecated: ' ~~DEPRECATED~~'
} as const;

/**
 * Renders RFCs, ADRs and work items to markdown. Output depends only on the
 * subject and the reference index, so rendering unchanged input twice gives
 * the same bytes.
 */
export class MarkdownRenderer {
  constructor(
    private readonly refIndex: ReferenceIndex,
    private readonly matcher: MentionMatcher
  ) {}

  /**
   * Full projection: generated banner, signature line and body
   */
  render(subject: Subject): string {
    const header = formatSignatureHeader(subject.id, computeSignature(subject));
    return `${header}\n\n${this.renderBody(subject)}\n`;
  }

  renderBody(subject: Subject): string {
    switch (subject.type) {
      case 'rfc':
        return this.renderRFC(subject.rfc, subject.clauses);
      case 'adr':
        return this.renderADR(subject.adr);
      case 'work':
        return this.renderWorkItem(subject.item);
    }
  }

  /**
   * Replace known mentions with links. Unknown ids are left as written.
   */
  expandMentions(text: string): string {
    let output = '';
    let cursor = 0;
    for (const mention of this.matcher.findAll(text)) {
      const entry = this.refIndex.lookup(mention.id);
      if (!entry) continue;
      output += text.slice(cursor, mention.index) + `[${entry.id}](${linkTarget(entry)})`;
      cursor = mention.index + mention.raw.length;
    }
    return output + text.slice(cursor);
  }

  private linkId(id: string): string {
    const entry = this.refIndex.lookup(id);
    return entry ? `[${entry.id}](${linkTarget(entry)})` : id;
  }

  private renderRefs(refs: string[]): string | null {
    return refs.length > 0 ? `**References:** ${refs.map(ref => this.linkId(ref)).join(', ')}` : null;
  }

  // RFC

  private renderRFC(rfc: RFC, clauses: Clause[]): string {
    const blocks: string[] = [];
    const byId = new Map(clauses.map(clause => [clause.id, clause]));

    blocks.push(`# ${rfc.id}: ${rfc.title}`);
    blocks.push(`> **Version:** ${rfc.version} | **Status:** ${rfc.status} | **Phase:** ${rfc.phase}`);
    if (rfc.owners.length > 0) {
      blocks.push(`**Owners:** ${rfc.owners.join(', ')}`);
    }

    rfc.sections.forEach((section, i) => {
      blocks.push(`## ${i + 1}. ${this.expandMentions(section.title)}`);
      for (const clauseId of section.clauses) {
        const clause = byId.get(clauseId);
        if (clause) blocks.push(this.renderClause(rfc, clause));
      }
    });

    if (rfc.changelog.length > 0) {
      blocks.push('## Changelog');
      for (const entry of rfc.changelog) {
        blocks.push(`### v${entry.version} (${entry.date})`);
        blocks.push(entry.summary);
        if (entry.changes.length > 0) {
          blocks.push(entry.changes.map(change => `- ${change}`).join('\n'));
        }
      }
    }

    return blocks.join('\n\n');
  }

  private renderClause(rfc: RFC, clause: Clause): string {
    const qualifiedId = `${rfc.id}:${clause.id}`;
    const lines = [
      `<a id="${clauseAnchor(qualifiedId)}"></a>`,
      `### [${qualifiedId}] ${this.expandMentions(clause.title)} ${CLAUSE_KIND_MARKERS[clause.kind]}${CLAUSE_STATUS_MARKERS[clause.status]}`,
      '',
      this.expandMentions(clause.text)
    ];
    if (clause.supersededBy) {
      lines.push('', `> **Superseded by:** ${this.linkId(`${rfc.id}:${clause.supersededBy}`)}`);
    }
    if (clause.since) {
      lines.push('', `*Since: v${clause.since}*`);
    }
    return lines.join('\n');
  }

  // ADR

  private renderADR(adr: ADR): string {
    const blocks: string[] = [];

    blocks.push(`# ${adr.id}: ${adr.title}`);
    blocks.push(`> **Status:** ${adr.status} | **Date:** ${adr.date}`);
    if (adr.supersededBy) {
      blocks.push(`> **Superseded by:** ${this.linkId(adr.supersededBy)}`);
    }
    const refs = this.renderRefs(adr.refs);
    if (refs) blocks.push(refs);

    blocks.push(`## Context\n\n${this.expandMentions(adr.context)}`);
    blocks.push(`## Decision\n\n${this.expandMentions(adr.decision)}`);
    blocks.push(`## Consequences\n\n${this.expandMentions(adr.consequences)}`);

    if (adr.alternatives.length > 0) {
      blocks.push(`## Alternatives Considered\n\n${adr.alternatives.map(alt => this.renderAlternative(alt)).join('\n\n')}`);
    }

    return blocks.join('\n\n');
  }

  private renderAlternative(alt: Alternative): string {
    const lines: string[] = [];
    lines.push(`### ${this.expandMentions(alt.text)}`);

    if (alt.pros.length > 0) {
      lines.push('');
      lines.push('**Pros:**');
      alt.pros.forEach(pro => lines.push(`- ${this.expandMentions(pro)}`));
    }

    if (alt.cons.length > 0) {
      lines.push('');
      lines.push('**Cons:**');
      alt.cons.forEach(con => lines.push(`- ${this.expandMentions(con)}`));
    }

    if (alt.rejectionReason) {
      lines.push('');
      lines.push(`**Rejection Reason:** ${this.expandMentions(alt.rejectionReason)}`);
    }

    return lines.join('\n');
  }

  // Work item

  private renderWorkItem(item: WorkItem): string {
    const blocks: string[] = [];

    blocks.push(`# ${item.id}: ${item.title}`);
    const dates = [`**Created:** ${item.created}`];
    if (item.started) dates.push(`**Started:** ${item.started}`);
    if (item.completed) dates.push(`**Completed:** ${item.completed}`);
    blocks.push(`> **Status:** ${item.status} | ${dates.join(' | ')}`);

    const refs = this.renderRefs(item.refs);
    if (refs) blocks.push(refs);

    blocks.push(`## Description\n\n${this.expandMentions(item.description)}`);

    if (item.acceptanceCriteria.length > 0) {
      const checklist = item.acceptanceCriteria.map(criterion => this.renderCriterion(criterion));
      blocks.push(`## Acceptance Criteria\n\n${checklist.join('\n')}`);
    }

    if (item.notes.length > 0) {
      blocks.push(`## Notes\n\n${item.notes.map(note => `- ${this.expandMentions(note)}`).join('\n')}`);
    }

    return blocks.join('\n\n');
  }

  private renderCriterion(criterion: AcceptanceCriterion): string {
    const text = this.expandMentions(criterion.text);
    switch (criterion.status) {
      case 'pending':
        return `- [ ] ${text}`;
      case 'done':
        return `- [x] ${text}`;
      case 'cancelled':
        return `- ~~${text}~~`;
    }
  }
}
