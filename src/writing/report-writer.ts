/**
 * Report writer.
 *
 * Asks the generation capability for a Markdown memo, runs the citation
 * self-review over it, appends the final chart and a generated references
 * table, and registers the result as `final_report`.
 */

import { Perspective } from '../domain/analysis';
import { GenerationCapability } from '../llm';
import { Logger, logger as rootLogger } from '../logger';
import { Orchestrator } from '../runtime/orchestrator';
import { ReferenceIndex, buildReferenceIndex } from './reference-index';
import { ReviewRecord, SelfReviewer } from './self-review';

export const FINAL_REPORT_ARTIFACT = 'final_report';

export const DEFAULT_OUTLINE: readonly string[] = [
  'Executive Summary',
  'Company Overview',
  'Market & Macro Trends',
  'Financial Analysis',
  'Risk Factors',
  'Catalysts & Outlook',
  'Recommendation',
  'References',
];

export interface WriteReportInput {
  question: string;
  perspectives: readonly Perspective[];
  outline?: readonly string[];
  /** Visualization artifact whose final raster is embedded as a figure. */
  visualizationUid?: string;
  /** Further artifact uids the memo may cite. */
  extraUids?: readonly string[];
}

export interface WrittenReport {
  uid: string;
  markdown: string;
  review: ReviewRecord;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Base64 raster of the last iteration of a visualization artifact value, if any. */
export function finalRasterOf(value: unknown): string | undefined {
  if (!isRecord(value) || !Array.isArray(value.iterations)) return undefined;
  const last: unknown = value.iterations[value.iterations.length - 1];
  if (!isRecord(last)) return undefined;
  const raster = last.rasterBase64;
  return typeof raster === 'string' && raster.length > 0 ? raster : undefined;
}

/**
 * Drop a model-written References section: from its heading up to the next
 * heading of the same or a higher level.
 */
export function stripReferencesSection(markdown: string): string {
  const lines = markdown.split(/\r?\n/);
  const start = lines.findIndex((line) => /^\s*#{1,6}\s*references\b/i.test(line));
  if (start === -1) return markdown;

  const level = (lines[start].trim().match(/^#+/)?.[0] ?? '#').length;
  let end = start + 1;
  while (end < lines.length) {
    const heading = lines[end].trim().match(/^#+(?=\s)/);
    if (heading && heading[0].length <= level) break;
    end++;
  }
  return [...lines.slice(0, start), ...lines.slice(end)].join('\n');
}

function cell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

export function renderReferencesTable(index: ReferenceIndex): string {
  const lines = ['### References', '', '| UID | Name | Description | Link |', '| :--- | :--- | :--- | :--- |'];
  for (const id of index.allowedIds) {
    const entry = index.lookup.get(id);
    const url = entry?.url ?? '';
    const link = url ? `[${url}](${url})` : '';
    lines.push(`| ${cell(id)} | ${cell(entry?.name || id)} | ${cell(entry?.description ?? '')} | ${link} |`);
  }
  return lines.join('\n');
}

export class ReportWriter {
  readonly name = 'report_writer';
  private readonly reviewer: SelfReviewer;
  private readonly log: Logger;

  constructor(
    private readonly orchestrator: Orchestrator,
    private readonly generation: GenerationCapability,
    logger?: Logger,
  ) {
    this.log = logger ?? rootLogger.child({ component: 'report-writer' });
    this.reviewer = new SelfReviewer(this.log.child({ component: 'self-review' }));
  }

  async write(input: WriteReportInput): Promise<WrittenReport> {
    const store = this.orchestrator.store;
    const outline = input.outline ?? DEFAULT_OUTLINE;
    const index = buildReferenceIndex(store, input.perspectives, input.extraUids);

    const prompt =
      'You are the report generation agent.\n' +
      'Craft a professional financial research memo in Markdown.\n' +
      'Use the provided perspectives and artifact memory to support claims.\n' +
      'For every factual statement, cite evidence using [Ref: <id>] where id is a perspective id or artifact uid from the allowed list.\n' +
      `Allowed IDs: ${JSON.stringify(index.allowedIds)}\n` +
      'Structure the memo according to the outline order.\n' +
      `Research Question: ${input.question}\n` +
      `Outline: ${JSON.stringify(outline)}\n` +
      `Perspectives: ${JSON.stringify(input.perspectives)}\n` +
      `Artifact Snapshot: ${store.renderSnapshot()}`;

    const draft = await this.generation.generate(prompt);
    const { text, review } = this.reviewer.review(draft, index.allowedIds, index.lookup);

    const sections = [stripReferencesSection(text).trimEnd()];
    if (input.visualizationUid && store.has(input.visualizationUid)) {
      const raster = finalRasterOf(store.get(input.visualizationUid).value);
      if (raster) {
        sections.push(`### Figure: Final Chart\n\n![Final Chart](data:image/png;base64,${raster})`);
      }
    }
    sections.push(renderReferencesTable(index));
    const markdown = `${sections.join('\n\n')}\n`;

    this.orchestrator.recordEvent('self_review', null, {
      substitutions: review.substitutions,
      inserted: review.inserted,
      allowedIds: review.allowedIds,
      fallbackId: review.fallbackId,
    });

    const uid = this.orchestrator.registerData(
      FINAL_REPORT_ARTIFACT,
      {
        markdown,
        outline: [...outline],
        question: input.question,
        perspectives: input.perspectives,
        selfReview: review,
      },
      {
        description: 'Final research memo',
        tags: ['report', 'memo'],
        source: this.name,
      },
    );
    this.log.info('Report written', { uid, substitutions: review.substitutions.length, inserted: review.inserted.length });

    return { uid, markdown, review };
  }
}
