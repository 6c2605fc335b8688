import {
  ReferenceEntry,
  SelfReviewer,
  chooseFallbackId,
  extractCitationIds,
  findInvalidCitations,
  selfReview,
} from '../../src/writing/self-review';
import { captureLogs } from '../helpers/fakes';

function lookupOf(entries: Record<string, ReferenceEntry>): Map<string, ReferenceEntry> {
  return new Map(Object.entries(entries));
}

describe('citation helpers', () => {
  test('extracts ids in order, with or without links', () => {
    expect(extractCitationIds('a [Ref: X1] b [Ref:Y2](https://y.example) c [Ref:  Z3 ]')).toEqual(['X1', 'Y2', 'Z3']);
  });

  test('finds ids outside the allowed set', () => {
    expect(findInvalidCitations('[Ref: A1] [Ref: B2] [Ref: A1]', ['A1'])).toEqual(['B2']);
  });

  test('fallback prefers the first id with a url', () => {
    const lookup = lookupOf({ B2: { name: 'b', description: '', url: 'https://b.example' } });
    expect(chooseFallbackId(['A1', 'B2'], lookup)).toBe('B2');
    expect(chooseFallbackId(['A1', 'B2'], new Map())).toBe('A1');
    expect(chooseFallbackId([], new Map())).toBeNull();
  });
});

describe('SelfReviewer', () => {
  let logs: ReturnType<typeof captureLogs>;

  beforeEach(() => {
    logs = captureLogs();
  });

  afterEach(() => {
    logs.restore();
  });

  test('replaces an invalid id with the fallback', () => {
    const { text, review } = selfReview('Revenue grew. [Ref: Z9]', ['A2', 'A1']);

    expect(text).toBe('Revenue grew. [Ref: A1]');
    expect(review).toEqual({
      substitutions: [{ line: 1, original: 'Z9', replacement: 'A1' }],
      inserted: [],
      allowedIds: ['A1', 'A2'],
      fallbackId: 'A1',
    });
  });

  test('leaves an unterminated line without a citation alone', () => {
    const { text, review } = selfReview('See chart below', ['A1']);
    expect(text).toBe('See chart below');
    expect(review.inserted).toEqual([]);
  });

  test('collapses repeated ids on one line', () => {
    const { text } = selfReview('Margins widened [Ref: A1] and held [Ref: A1].', ['A1']);
    expect(text).toBe('Margins widened [Ref: A1] and held.');
  });

  test('collapses an invalid id onto a fallback already cited on the line', () => {
    const { text, review } = selfReview('Up [Ref: A1] and [Ref: Q7].', ['A1']);
    expect(text).toBe('Up [Ref: A1] and.');
    expect(review.substitutions).toEqual([{ line: 1, original: 'Q7', replacement: 'A1' }]);
  });

  test('appends the fallback to the first terminated line of an uncited paragraph', () => {
    const lookup = lookupOf({ A1: { name: 'prices', description: '', url: 'https://a.example' } });
    const input = ['Revenue grew.', 'Costs fell.', '', 'Margins improved!'].join('\n');

    const { text, review } = selfReview(input, ['A1'], lookup);

    expect(text).toBe(
      [
        'Revenue grew. [Ref: A1](https://a.example)',
        'Costs fell.',
        '',
        'Margins improved! [Ref: A1](https://a.example)',
      ].join('\n'),
    );
    expect(review.inserted).toEqual([
      { line: 1, id: 'A1' },
      { line: 4, id: 'A1' },
    ]);
  });

  test('closing quotes and brackets still count as terminated', () => {
    expect(selfReview('He said "up."', ['A1']).text).toBe('He said "up." [Ref: A1]');
    expect(selfReview('(See above.)', ['A1']).text).toBe('(See above.) [Ref: A1]');
  });

  test('a cited line covers the rest of its paragraph', () => {
    const { text, review } = selfReview('Sales rose [Ref: A1].\nMore detail follows.', ['A1']);
    expect(text).toBe('Sales rose [Ref: A1].\nMore detail follows.');
    expect(review.inserted).toEqual([]);
  });

  test('headings get repaired but never an inserted citation, and end the paragraph', () => {
    const input = ['# Outlook [Ref: Z9]', 'Demand is firm.', '## Risks [Ref: A1] [Ref: A1].', 'Supply is tight.'].join('\n');

    const { text, review } = selfReview(input, ['A1']);

    expect(text).toBe(
      ['# Outlook [Ref: A1]', 'Demand is firm. [Ref: A1]', '## Risks [Ref: A1].', 'Supply is tight. [Ref: A1]'].join('\n'),
    );
    expect(review.substitutions).toEqual([{ line: 1, original: 'Z9', replacement: 'A1' }]);
    expect(review.inserted.map((i) => i.line)).toEqual([2, 4]);
  });

  test('a heading substitution does not duplicate a citation already on the line', () => {
    const { text, review } = selfReview('## Outlook [Ref: Z9] [Ref: A1]\nBody.', ['A1']);
    expect(text.split('\n')[0]).toBe('## Outlook [Ref: A1]');
    expect(review.substitutions).toEqual([{ line: 1, original: 'Z9', replacement: 'A1' }]);
  });

  test('valid heading tokens keep their written link', () => {
    const { text } = selfReview('## Outlook [Ref: A1](https://a.example)', ['A1']);
    expect(text).toBe('## Outlook [Ref: A1](https://a.example)');
  });

  test('links known urls and drops generated ones', () => {
    const lookup = lookupOf({ A1: { name: 'prices', description: '', url: 'https://a.example' } });
    expect(selfReview('Up [Ref: A1](https://elsewhere.example).', ['A1'], lookup).text).toBe(
      'Up [Ref: A1](https://a.example).',
    );
    expect(selfReview('Up [Ref: B2](https://elsewhere.example).', ['B2'], lookup).text).toBe('Up [Ref: B2].');
  });

  test('removes every token when nothing is allowed', () => {
    const { text, review } = selfReview('Revenue grew [Ref: Z9].', []);
    expect(text).toBe('Revenue grew.');
    expect(review).toEqual({
      substitutions: [{ line: 1, original: 'Z9', replacement: null }],
      inserted: [],
      allowedIds: [],
      fallbackId: null,
    });
  });

  test('output never cites an invalid id or repeats one on a line', () => {
    const allowed = ['P-1', 'art_1', 'art_2'];
    const input = [
      '## Summary [Ref: bogus] [Ref: P-1] [Ref: art_1] [Ref: art_1]',
      'Growth [Ref: art_2] [Ref: nope] [Ref: art_2] [Ref: P-1].',
      'Risks [Ref:art_1](x) [Ref: art_1 ] remain.',
      '',
      'Nothing cited here.',
    ].join('\r\n');

    const { text } = new SelfReviewer().review(input, allowed);

    expect(findInvalidCitations(text, allowed)).toEqual([]);
    for (const line of text.split('\n')) {
      const ids = extractCitationIds(line);
      expect(new Set(ids).size).toBe(ids.length);
    }
    expect(text.split('\n')[0]).toBe('## Summary [Ref: P-1] [Ref: art_1]');
    expect(text.split('\n')[1]).toBe('Growth [Ref: art_2] [Ref: P-1].');
    expect(text.split('\n')[2]).toBe('Risks [Ref: art_1] remain.');
  });

  test('warns when it repairs and stays quiet otherwise', () => {
    selfReview('Fine [Ref: A1].', ['A1']);
    expect(logs.entries.filter((e) => e.level === 'warn')).toEqual([]);

    selfReview('Broken [Ref: Z9].', ['A1']);
    const warnings = logs.entries.filter((e) => e.level === 'warn');
    expect(warnings).toHaveLength(1);
    expect(warnings[0].message).toBe('Self-review repaired citations');
    expect(warnings[0].context).toMatchObject({ substitutions: 1, inserted: 0, fallbackId: 'A1' });
  });
});
