import { describe, it, expect } from 'vitest';
import {
  buildPreviewSnippet,
  compareTimestamps,
  escapeHtml,
  formatTimestamp,
  formatTimestampFull,
  highlightText,
  markdownToPlainText,
  splitRecipients,
} from './utils';

describe('formatTimestamp', () => {
  const now = Date.parse('2025-03-14T12:00:00Z');

  it('returns empty string for undefined', () => {
    expect(formatTimestamp(undefined, now)).toBe('');
  });

  it('returns empty string for empty string', () => {
    expect(formatTimestamp('', now)).toBe('');
  });

  it('shows the time for today', () => {
    expect(formatTimestamp('2025-03-14T11:30:00Z', now)).toMatch(/^\d{2}:\d{2}$/);
  });

  it('says Yesterday one day back', () => {
    expect(formatTimestamp('2025-03-13T11:00:00Z', now)).toBe('Yesterday');
  });

  it('uses the weekday within a week', () => {
    expect(formatTimestamp('2025-03-11T10:00:00Z', now)).toBe('Tue');
  });

  it('uses day and month for older messages', () => {
    expect(formatTimestamp('2025-02-21T10:00:00Z', now)).toBe('21 Feb');
  });

  it('returns raw string when parsing fails', () => {
    expect(formatTimestamp('not-a-date', now)).toBe('not-a-date');
  });
});

describe('formatTimestampFull', () => {
  it('falls back for missing and unparseable values', () => {
    expect(formatTimestampFull(null)).toBe('Unknown');
    expect(formatTimestampFull('garbage')).toBe('garbage');
  });
});

describe('compareTimestamps', () => {
  it('orders parseable values by instant', () => {
    expect(compareTimestamps('2025-01-01T10:00:00+02:00', '2025-01-01T09:00:00Z')).toBeLessThan(0);
  });

  it('puts unparseable values first', () => {
    const values = ['2025-01-02T00:00:00Z', 'zzz', '2025-01-01T00:00:00Z', 'aaa'];
    expect([...values].sort(compareTimestamps)).toEqual([
      'aaa',
      'zzz',
      '2025-01-01T00:00:00Z',
      '2025-01-02T00:00:00Z',
    ]);
  });
});

describe('escapeHtml and highlightText', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;');
  });

  it('marks matches inside escaped text', () => {
    expect(highlightText('Fix <b> tag', '<b>')).toBe('Fix <mark>&lt;b&gt;</mark> tag');
    expect(highlightText('Deploy deploy', 'DEPLOY')).toBe('<mark>Deploy</mark> <mark>deploy</mark>');
    expect(highlightText('plain', '')).toBe('plain');
  });
});

describe('previews', () => {
  it('strips markdown syntax', () => {
    expect(markdownToPlainText('# Title\n\nSee [docs](https://example.com) and `code`.')).toBe('Title See docs and .');
  });

  it('truncates long previews to 160 characters', () => {
    const preview = buildPreviewSnippet('word '.repeat(60));
    expect(preview.length).toBe(160);
    expect(preview.endsWith('...')).toBe(true);
  });
});

describe('splitRecipients', () => {
  it('splits and trims the joined roster', () => {
    expect(splitRecipients('Alice, Bob ,, Carol')).toEqual(['Alice', 'Bob', 'Carol']);
    expect(splitRecipients('')).toEqual([]);
  });
});
