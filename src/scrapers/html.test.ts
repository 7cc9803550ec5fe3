import { describe, expect, it } from 'vitest';
import { decodeEntities, emptyToNull, isoDay, stripHtml, truncateDescription } from './html';
import { MAX_DESCRIPTION_LENGTH } from './types';

describe('html helpers', () => {
  it('decodes named and numeric entities', () => {
    expect(decodeEntities('Tom &amp; Jerry &#39;s &#x41; &ndash; &unknown;')).toBe("Tom & Jerry 's A - &unknown;");
  });

  it('leaves numeric references beyond the Unicode range undecoded', () => {
    expect(decodeEntities('X &#9999999; Y &#x110000; &#x10FFFF;')).toBe('X &#9999999; Y &#x110000; \u{10FFFF}');
    expect(stripHtml('<a>X &#9999999; Y</a>')).toBe('X &#9999999; Y');
  });

  it('strips tags, scripts and styles', () => {
    expect(stripHtml('<style>p{}</style><p>Hello<br/>world</p><script>alert(1)</script>')).toBe('Hello world');
  });

  it('truncates long descriptions', () => {
    expect(truncateDescription('x'.repeat(MAX_DESCRIPTION_LENGTH + 10))).toHaveLength(MAX_DESCRIPTION_LENGTH);
    expect(truncateDescription('')).toBeNull();
  });

  it('normalizes blanks and dates', () => {
    expect(emptyToNull('  ')).toBeNull();
    expect(emptyToNull(' a ')).toBe('a');
    expect(isoDay('2026-01-15T10:00:00Z')).toBe('2026-01-15');
    expect(isoDay('January 15')).toBeNull();
  });
});
