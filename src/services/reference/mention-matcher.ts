// Inline mention matching behind a narrow interface

import { compileMentionPattern } from '../config/config-service.js';

export const DEFAULT_MENTION_PATTERN = '\\[\\[([^\\[\\]]+)\\]\\]';

/**
 * One inline mention found in a block of text
 */
export interface Mention {
  /** Referenced id, trimmed */
  id: string;
  /** Full matched text, e.g. [[RFC-0001]] */
  raw: string;
  /** Offset of the match in the text */
  index: number;
  /** 1-based line of the match */
  line: number;
}

/**
 * Finds inline mentions. Alternate syntaxes are a different matcher, not a code branch.
 */
export interface MentionMatcher {
  findAll(text: string): Mention[];
}

/**
 * Matcher driven by a regular expression whose first capture group is the id
 */
export class RegexMentionMatcher implements MentionMatcher {
  private readonly pattern: RegExp;

  constructor(pattern: RegExp | string = DEFAULT_MENTION_PATTERN) {
    this.pattern = typeof pattern === 'string'
      ? compileMentionPattern(pattern)
      : new RegExp(pattern.source, pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`);
  }

  findAll(text: string): Mention[] {
    const mentions: Mention[] = [];
    let line = 1;
    let scanned = 0;

    for (const match of text.matchAll(this.pattern)) {
      const id = match[1]?.trim();
      if (!id || match.index === undefined) continue;

      for (; scanned < match.index; scanned++) {
        if (text.charCodeAt(scanned) === 10) line++;
      }
      mentions.push({ id, raw: match[0], index: match.index, line });
    }

    return mentions;
  }
}
