// Reference resolution across structured refs, inline mentions and external sources

import type { Artifact } from '../../models/artifact.js';
import { globalId } from '../../models/artifact.js';
import type { ProjectIndex } from '../../models/project-index.js';
import { findArtifact } from '../../models/project-index.js';
import type { ReferenceOccurrence, ResolvedRef, ResolvedRefs } from '../../models/reference.js';
import { createDiagnostic, sortDiagnostics, type Diagnostic } from '../../models/diagnostic.js';
import { NotFoundError } from '../../core/errors.js';
import { ReferenceIndex } from './reference-index.js';
import { RegexMentionMatcher, type MentionMatcher } from './mention-matcher.js';
import type { SourceMention } from './source-scanner.js';

/**
 * A block of text that may carry inline mentions
 */
export interface ContentField {
  field: string;
  text: string;
}

/**
 * The content fields of a record that are scanned for mentions
 */
export function contentFields(artifact: Artifact): ContentField[] {
  switch (artifact.type) {
    case 'rfc':
      return artifact.sections.map((section, i) => ({ field: `sections[${i}].title`, text: section.title }));
    case 'clause':
      return [
        { field: 'title', text: artifact.title },
        { field: 'text', text: artifact.text }
      ];
    case 'adr': {
      const fields: ContentField[] = [
        { field: 'context', text: artifact.context },
        { field: 'decision', text: artifact.decision },
        { field: 'consequences', text: artifact.consequences }
      ];
      artifact.alternatives.forEach((alternative, i) => {
        const prefix = `alternatives[${i}]`;
        fields.push({ field: `${prefix}.text`, text: alternative.text });
        alternative.pros.forEach((pro, j) => fields.push({ field: `${prefix}.pros[${j}]`, text: pro }));
        alternative.cons.forEach((con, j) => fields.push({ field: `${prefix}.cons[${j}]`, text: con }));
        if (alternative.rejectionReason) {
          fields.push({ field: `${prefix}.rejectionReason`, text: alternative.rejectionReason });
        }
      });
      return fields;
    }
    case 'work':
      return [
        { field: 'description', text: artifact.description },
        ...artifact.notes.map((note, i) => ({ field: `notes[${i}]`, text: note })),
        ...artifact.acceptanceCriteria.map((criterion, i) => ({
          field: `acceptanceCriteria[${i}].text`,
          text: criterion.text
        }))
      ];
  }
}

function allArtifacts(index: ProjectIndex): Artifact[] {
  return [
    ...index.rfcs.flatMap(({ rfc, clauses }): Artifact[] => [rfc, ...clauses]),
    ...index.adrs,
    ...index.workItems
  ];
}

/**
 * Reference Service
 *
 * Resolves `refs` arrays and inline mentions against a ReferenceIndex.
 * Unknown targets are DANGLING_REFERENCE errors, outdated ones
 * OUTDATED_REFERENCE warnings. supersededBy links are indexed for deletion
 * protection but checked by the validator, not here.
 */
export class ReferenceService {
  constructor(private readonly matcher: MentionMatcher = new RegexMentionMatcher()) {}

  /**
   * refs entries and inline mentions of one record
   */
  referencesOf(artifact: Artifact): ReferenceOccurrence[] {
    const sourceId = globalId(artifact);
    const occurrences: ReferenceOccurrence[] = [];

    if (artifact.type === 'adr' || artifact.type === 'work') {
      for (const targetId of artifact.refs) {
        occurrences.push({ sourceId, targetId, surface: 'refs', field: 'refs' });
      }
    }

    for (const { field, text } of contentFields(artifact)) {
      for (const mention of this.matcher.findAll(text)) {
        occurrences.push({ sourceId, targetId: mention.id, surface: 'mention', field });
      }
    }

    return occurrences;
  }

  /**
   * Classify one occurrence. Returns null when the target is known and active.
   */
  classify(occurrence: ReferenceOccurrence, refIndex: ReferenceIndex): Diagnostic | null {
    const location = { file: occurrence.file, line: occurrence.line };
    const where = occurrence.surface === 'source' ? 'source mention' : (occurrence.field ?? occurrence.surface);
    const entry = refIndex.lookup(occurrence.targetId);

    if (!entry) {
      return createDiagnostic(
        'DANGLING_REFERENCE',
        occurrence.sourceId,
        `Unknown id ${occurrence.targetId} referenced in ${where}`,
        location
      );
    }
    if (entry.lifecycle.state === 'outdated') {
      return createDiagnostic(
        'OUTDATED_REFERENCE',
        occurrence.sourceId,
        `Reference to outdated ${occurrence.targetId} in ${where}: ${entry.lifecycle.reason}`,
        location
      );
    }
    return null;
  }

  /**
   * Check every refs entry and inline mention in the store
   */
  validate(index: ProjectIndex, refIndex: ReferenceIndex = ReferenceIndex.build(index)): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];
    for (const artifact of allArtifacts(index)) {
      for (const occurrence of this.referencesOf(artifact)) {
        const diagnostic = this.classify(occurrence, refIndex);
        if (diagnostic) diagnostics.push(diagnostic);
      }
    }
    return sortDiagnostics(diagnostics);
  }

  /**
   * Check mentions found in external source files. The referrer is the file path.
   */
  validateSourceMentions(mentions: SourceMention[], refIndex: ReferenceIndex): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];
    for (const mention of mentions) {
      const diagnostic = this.classify(
        { sourceId: mention.file, targetId: mention.id, surface: 'source', file: mention.file, line: mention.line },
        refIndex
      );
      if (diagnostic) diagnostics.push(diagnostic);
    }
    return sortDiagnostics(diagnostics);
  }

  /**
   * Resolve everything one record references
   *
   * @returns the resolved references, or the diagnostics when any is dangling or outdated
   */
  resolveRefs(index: ProjectIndex, id: string, refIndex: ReferenceIndex = ReferenceIndex.build(index)): ResolvedRefs | Diagnostic[] {
    const artifact = findArtifact(index, id);
    if (!artifact) {
      throw new NotFoundError('Artifact', id);
    }

    const resolved: ResolvedRef[] = [];
    const diagnostics: Diagnostic[] = [];
    for (const occurrence of this.referencesOf(artifact)) {
      const diagnostic = this.classify(occurrence, refIndex);
      const target = refIndex.lookup(occurrence.targetId);
      if (diagnostic) {
        diagnostics.push(diagnostic);
      } else if (target) {
        resolved.push({ ...occurrence, target });
      }
    }

    return diagnostics.length > 0 ? sortDiagnostics(diagnostics) : { resolved };
  }

  /**
   * Deletion is refused while any structural reference points at the id
   */
  checkDeletion(refIndex: ReferenceIndex, id: string): Diagnostic[] {
    const referrers = refIndex.referrersOf(id);
    if (referrers.length === 0) return [];
    return [
      createDiagnostic(
        'DANGLING_REFERENCE',
        id,
        `Cannot delete ${id}: still referenced by ${referrers.join(', ')}`
      )
    ];
  }
}
