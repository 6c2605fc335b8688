/**
 * Citation self-review.
 *
 * Rewrites generated Markdown so that every `[Ref: <id>]` token names an
 * allowed id, line by line:
 *
 * - Tokens naming an id outside the allowed set are replaced with the
 *   fallback id (or removed when nothing is allowed).
 * - Within a line only the first token for each id survives.
 * - Tokens for ids with a known URL become `[Ref: <id>](<url>)`; any other
 *   URL attached to a token is dropped.
 * - A sentence-terminated line in a paragraph that has no citation yet gets
 *   the fallback id appended.
 *
 * Headings and blank lines end a paragraph. Heading lines get invalid ids
 * replaced and repeated ids dropped, but never an inserted citation, and
 * their valid tokens keep whatever link they were written with.
 *
 * Never throws on malformed citations.
 */

import { Logger, logger as rootLogger } from '../logger';

export interface ReferenceEntry {
  name: string;
  description: string;
  url?: string;
}

export type ReferenceLookup = ReadonlyMap<string, ReferenceEntry>;

export interface CitationSubstitution {
  /** 1-based line number. */
  line: number;
  original: string;
  /** null when the token was removed because nothing is allowed. */
  replacement: string | null;
}

export interface CitationInsertion {
  line: number;
  id: string;
}

export interface ReviewRecord {
  substitutions: CitationSubstitution[];
  inserted: CitationInsertion[];
  /** Allowed ids in fallback order. */
  allowedIds: string[];
  fallbackId: string | null;
}

export interface ReviewedText {
  text: string;
  review: ReviewRecord;
}

const CITATION_PATTERN = /( ?)\[Ref:\s*([^\]]*?)\s*\](?:\(([^)\s]*)\))?/g;
const HEADING_PATTERN = /^\s*#/;
const TERMINATOR_PATTERN = /[.!?]["'”’)\]]*\s*$/;

/** Ids of every citation token in `text`, in order of appearance. */
export function extractCitationIds(text: string): string[] {
  return [...text.matchAll(CITATION_PATTERN)].map((m) => m[2]);
}

/** Citation ids in `text` that are outside `allowed`. */
export function findInvalidCitations(text: string, allowed: Iterable<string>): string[] {
  const allowedSet = new Set(allowed);
  return extractCitationIds(text).filter((id) => !allowedSet.has(id));
}

/**
 * Deterministic fallback: the first allowed id (UTF-16 code unit order) that
 * has a known URL, else the first allowed id, else null.
 */
export function chooseFallbackId(sortedIds: readonly string[], lookup: ReferenceLookup): string | null {
  return sortedIds.find((id) => Boolean(lookup.get(id)?.url)) ?? sortedIds[0] ?? null;
}

function citationToken(id: string, lookup: ReferenceLookup): string {
  const url = lookup.get(id)?.url;
  return url ? `[Ref: ${id}](${url})` : `[Ref: ${id}]`;
}

interface LineRewrite {
  text: string;
  cited: boolean;
}

export class SelfReviewer {
  private readonly log: Logger;

  constructor(logger?: Logger) {
    this.log = logger ?? rootLogger.child({ component: 'self-review' });
  }

  review(markdown: string, allowed: Iterable<string>, lookup: ReferenceLookup = new Map()): ReviewedText {
    const allowedIds = [...new Set(allowed)].sort();
    const allowedSet = new Set(allowedIds);
    const fallbackId = chooseFallbackId(allowedIds, lookup);
    const substitutions: CitationSubstitution[] = [];
    const inserted: CitationInsertion[] = [];

    const resolve = (lineNo: number, id: string): string | null => {
      if (allowedSet.has(id)) return id;
      substitutions.push({ line: lineNo, original: id, replacement: fallbackId });
      return fallbackId;
    };

    // Valid heading tokens stay as written; only repeats and invalid ids change.
    const rewriteHeading = (line: string, lineNo: number): string => {
      const seen = new Set<string>();
      return line.replace(CITATION_PATTERN, (token: string, space: string, id: string) => {
        const resolved = resolve(lineNo, id);
        if (resolved === null || seen.has(resolved)) return '';
        seen.add(resolved);
        return resolved === id ? token : `${space}${citationToken(resolved, lookup)}`;
      });
    };

    const rewriteBody = (line: string, lineNo: number): LineRewrite => {
      const seen = new Set<string>();
      const text = line.replace(CITATION_PATTERN, (_token: string, space: string, id: string) => {
        const resolved = resolve(lineNo, id);
        if (resolved === null || seen.has(resolved)) return '';
        seen.add(resolved);
        return `${space}${citationToken(resolved, lookup)}`;
      });
      return { text, cited: seen.size > 0 };
    };

    const out: string[] = [];
    let paragraphCited = false;

    markdown.split(/\r?\n/).forEach((line, index) => {
      const lineNo = index + 1;
      if (HEADING_PATTERN.test(line)) {
        out.push(rewriteHeading(line, lineNo));
        paragraphCited = false;
        return;
      }
      if (!line.trim()) {
        out.push(line);
        paragraphCited = false;
        return;
      }

      const rewrite = rewriteBody(line, lineNo);
      let text = rewrite.text;
      if (rewrite.cited) {
        paragraphCited = true;
      } else if (!paragraphCited && fallbackId !== null && TERMINATOR_PATTERN.test(text)) {
        text = `${text.trimEnd()} ${citationToken(fallbackId, lookup)}`;
        inserted.push({ line: lineNo, id: fallbackId });
        paragraphCited = true;
      }
      out.push(text);
    });

    const review: ReviewRecord = { substitutions, inserted, allowedIds, fallbackId };
    if (substitutions.length > 0 || inserted.length > 0) {
      this.log.warn('Self-review repaired citations', {
        substitutions: substitutions.length,
        inserted: inserted.length,
        fallbackId,
      });
    } else {
      this.log.debug('Self-review found nothing to repair', { allowedIds: allowedIds.length });
    }
    return { text: out.join('\n'), review };
  }
}

/** Run the self-review pass with the default logger. */
export function selfReview(markdown: string, allowed: Iterable<string>, lookup?: ReferenceLookup): ReviewedText {
  return new SelfReviewer().review(markdown, allowed, lookup);
}
