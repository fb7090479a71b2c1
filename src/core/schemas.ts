// Zod schemas for stored records and configuration

import { z } from 'zod';
import {
  RFC_STATUSES,
  RFC_PHASES,
  CLAUSE_KINDS,
  CLAUSE_STATUSES,
  ADR_STATUSES,
  WORK_ITEM_STATUSES,
  CRITERION_STATUSES,
  CHANGELOG_CATEGORIES
} from '../models/types.js';
import { ID_PATTERNS, DATE_PATTERN } from './validation.js';
import { SchemaError } from './errors.js';

const isoDate = z.string().regex(DATE_PATTERN, 'Expected a YYYY-MM-DD date');

// Versions are checked by the validator so that a bad version is reported, not fatal
const version = z.string().min(1, 'Version is required');

const title = z.string().min(1, 'Title is required').max(200, 'Title too long');

/**
 * Section schema for RFC
 */
export const SectionSchema = z.object({
  title: z.string().min(1),
  clauses: z.array(z.string().regex(ID_PATTERNS.clause, 'Invalid clause ID format')).default([])
});

export const RFCChangelogEntrySchema = z.object({
  version,
  date: isoDate,
  summary: z.string(),
  changes: z.array(z.string()).default([])
});

export const RFCSchema = z.object({
  type: z.literal('rfc'),
  id: z.string().regex(ID_PATTERNS.rfc, 'Invalid RFC ID format'),
  title,
  version,
  status: z.enum(RFC_STATUSES),
  phase: z.enum(RFC_PHASES),
  owners: z.array(z.string()).default([]),
  created: isoDate,
  updated: isoDate.optional(),
  amendable: z.boolean().default(false),
  sections: z.array(SectionSchema).default([]),
  changelog: z.array(RFCChangelogEntrySchema).default([])
});

export const ClauseSchema = z.object({
  type: z.literal('clause'),
  id: z.string().regex(ID_PATTERNS.clause, 'Invalid clause ID format'),
  rfcId: z.string().regex(ID_PATTERNS.rfc, 'Invalid RFC ID format'),
  title,
  kind: z.enum(CLAUSE_KINDS),
  status: z.enum(CLAUSE_STATUSES),
  text: z.string().default(''),
  since: version.optional(),
  supersededBy: z.string().regex(ID_PATTERNS.clause, 'Invalid clause ID format').optional()
});

/**
 * Alternative schema for ADR
 */
export const AlternativeSchema = z.object({
  text: z.string().min(1),
  pros: z.array(z.string()).default([]),
  cons: z.array(z.string()).default([]),
  rejectionReason: z.string().optional()
});

export const ADRSchema = z.object({
  type: z.literal('adr'),
  id: z.string().regex(ID_PATTERNS.adr, 'Invalid ADR ID format'),
  title,
  status: z.enum(ADR_STATUSES),
  date: isoDate,
  supersededBy: z.string().regex(ID_PATTERNS.adr, 'Invalid ADR ID format').optional(),
  refs: z.array(z.string()).default([]),
  context: z.string().default(''),
  decision: z.string().default(''),
  consequences: z.string().default(''),
  alternatives: z.array(AlternativeSchema).default([])
});

export const AcceptanceCriterionSchema = z.object({
  text: z.string().min(1),
  status: z.enum(CRITERION_STATUSES),
  category: z.enum(CHANGELOG_CATEGORIES)
});

export const WorkItemSchema = z.object({
  type: z.literal('work'),
  id: z.string().regex(ID_PATTERNS.work, 'Invalid work item ID format'),
  title,
  status: z.enum(WORK_ITEM_STATUSES),
  created: isoDate,
  started: isoDate.optional(),
  completed: isoDate.optional(),
  refs: z.array(z.string()).default([]),
  description: z.string().default(''),
  notes: z.array(z.string()).default([]),
  acceptanceCriteria: z.array(AcceptanceCriterionSchema).default([])
});

export const ReleaseSchema = z.object({
  version,
  date: isoDate,
  refs: z.array(z.string().regex(ID_PATTERNS.work, 'Invalid work item ID format')).default([])
});

export const ReleasesFileSchema = z.object({
  releases: z.array(ReleaseSchema).default([])
});

/**
 * Configuration schema, every section optional with defaults
 */
export const ConfigSchema = z.object({
  project: z.object({
    name: z.string().min(1).default('docgov-project')
  }).default({}),
  paths: z.object({
    docsOutput: z.string().min(1).default('docs'),
    changelog: z.string().min(1).default('CHANGELOG.md')
  }).default({}),
  references: z.object({
    pattern: z.string().min(1).default('\\[\\[([^\\[\\]]+)\\]\\]')
  }).default({}),
  ids: z.object({
    work: z.enum(['date', 'sequential']).default('date')
  }).default({}),
  sourceScan: z.object({
    enabled: z.boolean().default(false),
    roots: z.array(z.string()).default(['src']),
    extensions: z.array(z.string()).default(['.ts', '.js', '.md']),
    exclude: z.array(z.string()).default(['node_modules', '.git', 'dist'])
  }).default({})
});

export type GovernanceConfig = z.infer<typeof ConfigSchema>;

/**
 * Parse data against a schema, turning zod issues into a SchemaError
 */
export function parseWithSchema<T extends z.ZodTypeAny>(schema: T, data: unknown, file?: string): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    const where = file ? ` in ${file}` : '';
    throw new SchemaError(`Malformed record${where}: ${issues.join('; ')}`, file, issues);
  }
  return result.data;
}
