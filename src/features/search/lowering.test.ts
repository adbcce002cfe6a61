import { describe, it, expect } from 'vitest';
import { compile, type Expr } from './booleanQuery';
import { likePattern, matchesText, toFullTextQuery, toSubstringClause } from './lowering';

function expr(text: string): Expr {
  const e = compile(text);
  if (!e) throw new Error(`no expression for ${text}`);
  return e;
}

const TERM_SQL =
  "(LOWER(COALESCE(subject, '')) LIKE ? ESCAPE '\\' OR LOWER(COALESCE(body_md, '')) LIKE ? ESCAPE '\\')";

describe('toFullTextQuery', () => {
  it('parenthesizes every operator', () => {
    expect(toFullTextQuery(expr('a OR b AND c'))).toBe('(a OR (b AND c))');
    expect(toFullTextQuery(expr('NOT a'))).toBe('(NOT a)');
  });

  it('quotes phrases and doubles embedded quotes', () => {
    expect(toFullTextQuery(expr('"build failed"'))).toBe('"build failed"');
    expect(toFullTextQuery({ type: 'term', value: 'say "hi" there' })).toBe('"say ""hi"" there"');
  });
});

describe('likePattern', () => {
  it('lower-cases and escapes wildcards', () => {
    expect(likePattern('Foo_%')).toBe('%foo\\_\\%%');
    expect(likePattern('a\\b')).toBe('%a\\\\b%');
  });
});

describe('toSubstringClause', () => {
  it('matches a term against subject or body', () => {
    expect(toSubstringClause(expr('Deploy'))).toEqual({ sql: TERM_SQL, params: ['%deploy%', '%deploy%'] });
  });

  it('mirrors the tree', () => {
    const clause = toSubstringClause(expr('a AND NOT b'));
    expect(clause.sql).toBe(`(${TERM_SQL} AND NOT (${TERM_SQL}))`);
    expect(clause.params).toEqual(['%a%', '%a%', '%b%', '%b%']);
  });

  it('uses the given column expressions', () => {
    const clause = toSubstringClause(expr('x'), { subject: 'subject_lower', body: 'body_md' });
    expect(clause.sql).toBe("(subject_lower LIKE ? ESCAPE '\\' OR LOWER(body_md) LIKE ? ESCAPE '\\')");
  });
});

describe('matchesText', () => {
  it('evaluates case-insensitive substrings', () => {
    expect(matchesText(expr('BUILD'), 'Nightly build', '')).toBe(true);
    expect(matchesText(expr('build AND NOT nightly'), 'Nightly build', '')).toBe(false);
    expect(matchesText(expr('missing OR body'), 'subject', 'in the body')).toBe(true);
  });
});
