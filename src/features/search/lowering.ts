/**
 * Lower a parsed query into the two evaluation forms: an FTS5 MATCH expression and a
 * parameterized LIKE clause. Both mirror the tree node for node.
 */

import type { Expr } from './booleanQuery';

function quoteFts(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

/** Terms stay bare unless they contain whitespace; every operator is parenthesized. */
export function toFullTextQuery(expr: Expr): string {
  switch (expr.type) {
    case 'term':
      return /\s/.test(expr.value) ? quoteFts(expr.value) : expr.value;
    case 'not':
      return `(NOT ${toFullTextQuery(expr.child)})`;
    case 'and':
      return `(${toFullTextQuery(expr.left)} AND ${toFullTextQuery(expr.right)})`;
    case 'or':
      return `(${toFullTextQuery(expr.left)} OR ${toFullTextQuery(expr.right)})`;
  }
}

export interface SqlClause {
  sql: string;
  params: string[];
}

export interface SubstringColumns {
  /** Lower-cased subject expression, e.g. a precomputed `subject_lower` column. */
  subject: string;
  /** Body expression, lower-cased by the clause. */
  body: string;
}

export const DEFAULT_SUBSTRING_COLUMNS: SubstringColumns = {
  subject: "LOWER(COALESCE(subject, ''))",
  body: "COALESCE(body_md, '')",
};

/** `%term%` pattern, lower-cased, with LIKE wildcards in the term matched literally. */
export function likePattern(term: string): string {
  return `%${term.toLowerCase().replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

export function toSubstringClause(expr: Expr, columns: SubstringColumns = DEFAULT_SUBSTRING_COLUMNS): SqlClause {
  switch (expr.type) {
    case 'term': {
      const needle = likePattern(expr.value);
      return {
        sql: `(${columns.subject} LIKE ? ESCAPE '\\' OR LOWER(${columns.body}) LIKE ? ESCAPE '\\')`,
        params: [needle, needle],
      };
    }
    case 'not': {
      const child = toSubstringClause(expr.child, columns);
      return { sql: `NOT (${child.sql})`, params: child.params };
    }
    case 'and':
    case 'or': {
      const left = toSubstringClause(expr.left, columns);
      const right = toSubstringClause(expr.right, columns);
      const op = expr.type === 'and' ? 'AND' : 'OR';
      return { sql: `(${left.sql} ${op} ${right.sql})`, params: [...left.params, ...right.params] };
    }
  }
}

/** Evaluate the same tree against in-memory text, with the LIKE clause's matching rules. */
export function matchesText(expr: Expr, subject: string, body: string): boolean {
  switch (expr.type) {
    case 'term': {
      const needle = expr.value.toLowerCase();
      return subject.toLowerCase().includes(needle) || body.toLowerCase().includes(needle);
    }
    case 'not':
      return !matchesText(expr.child, subject, body);
    case 'and':
      return matchesText(expr.left, subject, body) && matchesText(expr.right, subject, body);
    case 'or':
      return matchesText(expr.left, subject, body) || matchesText(expr.right, subject, body);
  }
}
