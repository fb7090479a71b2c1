/**
 * Tests for the configuration service
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as yaml from 'yaml';
import { ConfigService, compileMentionPattern } from './config-service.js';
import { SchemaError } from '../../core/errors.js';

describe('ConfigService', () => {
  let baseDir: string;
  let configService: ConfigService;

  beforeEach(() => {
    baseDir = fs.mkdtempSync(path.join(os.tmpdir(), 'docgov-config-'));
    configService = new ConfigService({ baseDir });
  });

  afterEach(() => {
    fs.rmSync(baseDir, { recursive: true, force: true });
  });

  describe('defaults', () => {
    it('should return defaults when no config file exists', () => {
      expect(configService.getDocsOutput()).toBe('docs');
      expect(configService.getChangelogPath()).toBe('CHANGELOG.md');
      expect(configService.getWorkIdStrategy()).toBe('date');
      expect(configService.getSourceScan().enabled).toBe(false);
      expect(configService.getMentionPattern().source).toBe('\\[\\[([^\\[\\]]+)\\]\\]');
    });

    it('should treat an empty file as all defaults', () => {
      fs.writeFileSync(path.join(baseDir, 'config.yaml'), '');
      expect(configService.load().project.name).toBe('docgov-project');
    });
  });

  describe('overrides', () => {
    it('should merge a partial section with its defaults', () => {
      fs.writeFileSync(
        path.join(baseDir, 'config.yaml'),
        yaml.stringify({ paths: { docsOutput: 'site' }, ids: { work: 'sequential' } })
      );
      expect(configService.getDocsOutput()).toBe('site');
      expect(configService.getChangelogPath()).toBe('CHANGELOG.md');
      expect(configService.getWorkIdStrategy()).toBe('sequential');
    });

    it('should read the file once per service', () => {
      expect(configService.getDocsOutput()).toBe('docs');
      fs.writeFileSync(path.join(baseDir, 'config.yaml'), yaml.stringify({ paths: { docsOutput: 'out' } }));
      expect(configService.getDocsOutput()).toBe('docs');
      expect(new ConfigService({ baseDir }).getDocsOutput()).toBe('out');
    });
  });

  describe('malformed config', () => {
    it('should raise SchemaError for an unknown id strategy', () => {
      fs.writeFileSync(path.join(baseDir, 'config.yaml'), yaml.stringify({ ids: { work: 'random' } }));
      expect(() => configService.load()).toThrow(SchemaError);
    });

    it('should raise SchemaError for an invalid reference pattern', () => {
      fs.writeFileSync(path.join(baseDir, 'config.yaml'), yaml.stringify({ references: { pattern: '[[(' } }));
      expect(() => configService.load()).toThrow(SchemaError);
    });

    it('should raise SchemaError for a pattern without a capture group', () => {
      fs.writeFileSync(path.join(baseDir, 'config.yaml'), yaml.stringify({ references: { pattern: '@@\\w+' } }));
      expect(() => configService.load()).toThrow(SchemaError);
    });
  });

  describe('save', () => {
    it('should write every setting back so a fresh service reads the same values', () => {
      fc.assert(
        fc.property(
          fc.constantFrom('docs', 'site', 'out/docs'),
          fc.constantFrom<'date' | 'sequential'>('date', 'sequential'),
          fc.boolean(),
          (docsOutput, work, enabled) => {
            const saved = configService.save({
              paths: { docsOutput, changelog: 'CHANGES.md' },
              ids: { work },
              sourceScan: { enabled, roots: ['lib'], extensions: ['.ts'], exclude: [] }
            });
            const reloaded = new ConfigService({ baseDir }).load();
            expect(reloaded).toEqual(saved);
          }
        )
      );
    });
  });
});

describe('compileMentionPattern', () => {
  it('should compile a global regex with one capture group', () => {
    const regex = compileMentionPattern('\\{\\{(\\S+)\\}\\}');
    expect(regex.flags).toBe('g');
    expect([...'see {{ADR-0001}}'.matchAll(regex)].map(match => match[1])).toEqual(['ADR-0001']);
  });
});
