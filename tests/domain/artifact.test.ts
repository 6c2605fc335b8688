import { citationUrlOf, isArtifactKind, isTabularPayload, isTextPayload } from '../../src/domain/artifact';
import { priceTable } from '../helpers/fakes';

describe('artifact payload guards', () => {
  test('isArtifactKind', () => {
    expect(['data', 'tool', 'agent'].every(isArtifactKind)).toBe(true);
    expect(isArtifactKind('model')).toBe(false);
  });

  test('isTabularPayload needs string columns and a two-part shape', () => {
    expect(isTabularPayload(priceTable())).toBe(true);
    expect(isTabularPayload({ ...priceTable(), columns: [1, 2] })).toBe(false);
    expect(isTabularPayload({ ...priceTable(), shape: [3] })).toBe(false);
    expect(isTabularPayload([priceTable()])).toBe(false);
  });

  test('isTextPayload', () => {
    expect(isTextPayload({ kind: 'text', content: 'Item 1A. Risk Factors' })).toBe(true);
    expect(isTextPayload({ kind: 'text' })).toBe(false);
    expect(isTextPayload(priceTable())).toBe(false);
  });

  test('citationUrlOf prefers sourceUrl over url', () => {
    expect(citationUrlOf({ sourceUrl: 'https://a.example', url: 'https://b.example' })).toBe('https://a.example');
    expect(citationUrlOf({ sourceUrl: '', url: 'https://b.example' })).toBe('https://b.example');
    expect(citationUrlOf({ url: 42 })).toBeUndefined();
    expect(citationUrlOf('https://a.example')).toBeUndefined();
  });
});
