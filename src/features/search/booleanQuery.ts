/**
 * Boolean query language for mailbox search: bare words, "quoted phrases", parentheses,
 * AND / OR / NOT (case-insensitive) and `|` as an alias for OR.
 * Precedence NOT > AND > OR; NOT is unary and right-associative, AND and OR are left-associative.
 * Adjacent terms are not joined implicitly: without an operator the last complete
 * expression wins.
 */

export type Expr =
  | { type: 'term'; value: string }
  | { type: 'not'; child: Expr }
  | { type: 'and'; left: Expr; right: Expr }
  | { type: 'or'; left: Expr; right: Expr };

export type Operator = 'AND' | 'OR' | 'NOT';

export type Token =
  | { kind: 'term'; value: string; position: number }
  | { kind: 'op'; value: Operator; position: number }
  | { kind: '('; position: number }
  | { kind: ')'; position: number };

export class SearchCompileError extends Error {
  constructor(message: string, readonly position: number) {
    super(`${message} at position ${position}`);
    this.name = 'SearchCompileError';
  }
}

export interface CompileOptions {
  /** Reject malformed input instead of recovering. */
  strict?: boolean;
}

const PRECEDENCE: Record<Operator, number> = { NOT: 3, AND: 2, OR: 1 };
const RIGHT_ASSOC: Record<Operator, boolean> = { NOT: true, AND: false, OR: false };

function operatorFor(word: string): Operator | null {
  if (word === '|') return 'OR';
  const upper = word.toUpperCase();
  if (upper === 'AND' || upper === 'OR' || upper === 'NOT') return upper;
  return null;
}

function isWordChar(ch: string): boolean {
  return !/\s/.test(ch) && ch !== '(' && ch !== ')' && ch !== '"';
}

/**
 * Split query text into tokens. An unterminated quote is dropped and the rest is read as
 * bare words (strict mode rejects it). Empty phrases are skipped.
 */
export function tokenize(text: string, options: CompileOptions = {}): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    if (ch === '(' || ch === ')') {
      tokens.push({ kind: ch, position: i });
      i++;
      continue;
    }
    if (ch === '"') {
      const close = text.indexOf('"', i + 1);
      if (close === -1) {
        if (options.strict) throw new SearchCompileError('Unterminated quoted phrase', i);
        i++;
        continue;
      }
      const phrase = text.slice(i + 1, close);
      if (phrase.trim()) tokens.push({ kind: 'term', value: phrase, position: i });
      i = close + 1;
      continue;
    }
    const start = i;
    while (i < text.length && isWordChar(text[i])) i++;
    const word = text.slice(start, i);
    const op = operatorFor(word);
    if (op) tokens.push({ kind: 'op', value: op, position: start });
    else tokens.push({ kind: 'term', value: word, position: start });
  }
  return tokens;
}

/** Strict-mode grammar check over the token stream. */
function validate(tokens: readonly Token[], textLength: number): void {
  let expectOperand = true;
  const open: number[] = [];
  for (const t of tokens) {
    switch (t.kind) {
      case 'term':
        if (!expectOperand) throw new SearchCompileError('Missing operator before term', t.position);
        expectOperand = false;
        break;
      case '(':
        if (!expectOperand) throw new SearchCompileError('Missing operator before "("', t.position);
        open.push(t.position);
        break;
      case ')':
        if (open.length === 0) throw new SearchCompileError('Unbalanced ")"', t.position);
        if (expectOperand) throw new SearchCompileError('Missing operand before ")"', t.position);
        open.pop();
        break;
      case 'op':
        if (t.value === 'NOT') {
          if (!expectOperand) throw new SearchCompileError('Missing operator before NOT', t.position);
        } else if (expectOperand) {
          throw new SearchCompileError(`Missing operand before ${t.value}`, t.position);
        } else {
          expectOperand = true;
        }
        break;
    }
  }
  if (open.length > 0) throw new SearchCompileError('Unclosed "("', open[open.length - 1]);
  if (expectOperand && tokens.length > 0) throw new SearchCompileError('Missing operand at end of query', textLength);
}

/** Shunting-yard: tokens to reverse Polish order. Stray ")" are dropped, unclosed "(" ignored. */
export function toRpn(tokens: readonly Token[]): Token[] {
  const output: Token[] = [];
  const ops: Token[] = [];
  for (const t of tokens) {
    if (t.kind === 'term') {
      output.push(t);
    } else if (t.kind === 'op') {
      while (ops.length > 0) {
        const top = ops[ops.length - 1];
        if (top.kind !== 'op') break;
        const pops = RIGHT_ASSOC[t.value]
          ? PRECEDENCE[top.value] > PRECEDENCE[t.value]
          : PRECEDENCE[top.value] >= PRECEDENCE[t.value];
        if (!pops) break;
        output.push(top);
        ops.pop();
      }
      ops.push(t);
    } else if (t.kind === '(') {
      ops.push(t);
    } else if (ops.some((o) => o.kind === '(')) {
      let top = ops.pop();
      while (top && top.kind !== '(') {
        output.push(top);
        top = ops.pop();
      }
    }
  }
  while (ops.length > 0) {
    const top = ops.pop();
    if (top && top.kind === 'op') output.push(top);
  }
  return output;
}

/** Fold RPN into an expression tree. Operators missing an operand are dropped. */
export function buildAst(rpn: readonly Token[]): Expr | null {
  const stack: Expr[] = [];
  for (const t of rpn) {
    if (t.kind === 'term') {
      stack.push({ type: 'term', value: t.value });
    } else if (t.kind === 'op') {
      if (t.value === 'NOT') {
        const child = stack.pop();
        if (child) stack.push({ type: 'not', child });
        continue;
      }
      const right = stack.pop();
      const left = stack.pop();
      if (left && right) {
        stack.push({ type: t.value === 'AND' ? 'and' : 'or', left, right });
      } else if (right) {
        stack.push(right);
      }
    }
  }
  return stack.pop() ?? null;
}

/**
 * Parse query text. Returns null for empty, whitespace-only or term-less input.
 */
export function compile(text: string, options: CompileOptions = {}): Expr | null {
  if (!text.trim()) return null;
  const tokens = tokenize(text, options);
  if (options.strict) validate(tokens, text.length);
  return buildAst(toRpn(tokens));
}

/** Fully parenthesized rendering, e.g. `(a OR (b AND c))`. */
export function formatExpr(expr: Expr): string {
  switch (expr.type) {
    case 'term':
      return /\s/.test(expr.value) ? `"${expr.value}"` : expr.value;
    case 'not':
      return `(NOT ${formatExpr(expr.child)})`;
    case 'and':
      return `(${formatExpr(expr.left)} AND ${formatExpr(expr.right)})`;
    case 'or':
      return `(${formatExpr(expr.left)} OR ${formatExpr(expr.right)})`;
  }
}
