/**
 * Output schemas, one per generation call site.
 *
 * Models are loose about shape: a single insight arrives as a string rather
 * than a list, numbers arrive where ids were asked for. The schemas coerce
 * those at the boundary so downstream code only sees the declared types.
 */

import { z } from 'zod';

const text = z.union([z.string(), z.number()]).transform((value) => String(value));

/** A list of strings that also accepts a lone string, or nothing. */
const stringList = z
  .preprocess((value) => {
    if (value === undefined || value === null) return [];
    return Array.isArray(value) ? value : [value];
  }, z.array(text))
  .default([]);

const optionalText = z
  .preprocess((value) => (value === null ? undefined : value), text.optional());

/** Analysis stepper: the next script to run and what it is meant to show. */
export const AnalysisProposalSchema = z.object({
  focus: optionalText,
  code: z.string(),
  commentary: stringList,
  /** Artifact names or uids backing the commentary. */
  evidence: stringList,
  /** The model's own judgement that the goal has been reached. */
  complete: z.boolean().optional().default(false),
});

export type AnalysisProposal = z.infer<typeof AnalysisProposalSchema>;

const PerspectiveDraftSchema = z.object({
  id: optionalText,
  focus: optionalText,
  narrative: optionalText,
  evidence_uids: stringList,
});

export type PerspectiveDraft = z.infer<typeof PerspectiveDraftSchema>;

/** Chain compilation: `{ perspectives: [...] }`, or the bare array. */
export const PerspectivesSchema = z
  .union([z.array(PerspectiveDraftSchema), z.object({ perspectives: z.array(PerspectiveDraftSchema).default([]) })])
  .transform((value) => (Array.isArray(value) ? value : value.perspectives));
