/**
 * Critique sentinels.
 *
 * Every evaluator answers with a critique that starts with ACCEPT or REVISE.
 * Leading markdown decoration (`**`, `_`, `#`, `>`, list dashes) and a
 * trailing colon are tolerated; the text after the sentinel is the detail.
 */

import { Verdict } from '../domain/refinement';

export const ACCEPT_SENTINEL = 'ACCEPT';
export const REVISE_SENTINEL = 'REVISE';

const SENTINEL_PATTERN = /^[\s*_>#`-]*(ACCEPT|REVISE)(?![A-Za-z])[\s*_`]*[:-]?\s*([\s\S]*)$/i;

/** Parse a critique into a verdict. Critiques without a sentinel count as REVISE. */
export function parseVerdict(critique: string): Verdict {
  const text = critique.trim();
  const match = SENTINEL_PATTERN.exec(text);
  if (!match) {
    return { decision: 'revise', detail: text, recognized: false };
  }
  const sentinel = match[1].toUpperCase();
  return {
    decision: sentinel === ACCEPT_SENTINEL ? 'accept' : 'revise',
    detail: match[2].trim(),
    recognized: true,
  };
}

/** Render a verdict back into critique form. */
export function formatVerdict(decision: Verdict['decision'], detail: string): string {
  const sentinel = decision === 'accept' ? ACCEPT_SENTINEL : REVISE_SENTINEL;
  return detail ? `${sentinel}: ${detail}` : sentinel;
}

/** Prompt fragment instructing an evaluator to answer with the sentinel vocabulary. */
export function sentinelInstruction(acceptHint: string, reviseHint: string): string {
  return (
    `Start your answer with exactly one of:\n` +
    `${ACCEPT_SENTINEL}: <${acceptHint}>\n` +
    `${REVISE_SENTINEL}: <${reviseHint}>`
  );
}
