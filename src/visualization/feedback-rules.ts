/**
 * Feedback rule table for chart refinement.
 *
 * Rules are keyword triggers, matched against the upper-cased feedback in
 * table order. Each matching rule transforms the spec; feedback that matches
 * nothing is still kept verbatim in `notes` and changes nothing else.
 */

import { ChartSpec, DEFAULT_CHART_TITLE, cloneChartSpec } from './chart-spec';

export interface FeedbackRule {
  id: string;
  pattern: RegExp;
  /**
   * @param spec - the spec being built (already a copy; mutate freely)
   * @param previous - the spec the feedback was about
   */
  apply(spec: ChartSpec, previous: ChartSpec): void;
}

export const DEFAULT_FEEDBACK_RULES: readonly FeedbackRule[] = [
  {
    id: 'title',
    pattern: /TITLE/,
    apply(spec, previous) {
      spec.title = `${previous.title ?? DEFAULT_CHART_TITLE} (Refined)`;
    },
  },
  {
    id: 'axes',
    pattern: /AXIS|AXES/,
    apply(spec, previous) {
      if (spec.xaxisTitle === undefined) {
        spec.xaxisTitle = 'Date';
      }
      if (spec.yaxisTitle === undefined && previous.y.length > 0) {
        spec.yaxisTitle = previous.y.join(', ');
      }
    },
  },
  {
    id: 'palette',
    pattern: /COLOU?R/,
    apply(spec) {
      spec.paletteHint = 'corporate';
    },
  },
  {
    id: 'annotation',
    pattern: /ANNOT/,
    apply(spec) {
      spec.annotations.push({ text: 'Key event', xref: 'paper', yref: 'paper', x: 0.95, y: 0.95 });
    },
  },
  {
    id: 'legend',
    pattern: /LEGEND/,
    apply(spec) {
      spec.showLegend = true;
    },
  },
];

export interface FeedbackApplication {
  spec: ChartSpec;
  matchedRules: string[];
}

/** Apply feedback to a spec. The input spec is not modified. */
export function applyFeedback(
  spec: ChartSpec,
  feedback: string,
  rules: readonly FeedbackRule[] = DEFAULT_FEEDBACK_RULES,
): FeedbackApplication {
  const next = cloneChartSpec(spec);
  next.notes.push(feedback);

  const upper = feedback.toUpperCase();
  const matchedRules: string[] = [];
  for (const rule of rules) {
    if (rule.pattern.test(upper)) {
      rule.apply(next, spec);
      matchedRules.push(rule.id);
    }
  }
  return { spec: next, matchedRules };
}
