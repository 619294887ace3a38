/**
 * Arithmetic formulas over column names, e.g. `[Data 2] / [Data 3] * 100`.
 *
 * Grammar:
 *   expr    := term (('+' | '-') term)*
 *   term    := unary (('*' | '/') unary)*
 *   unary   := '-' unary | primary
 *   primary := number | column | '(' expr ')'
 *   column  := identifier | '[' any text except ']' ']'
 */

import type { Row } from './excelParser';
import { YieldFormulaError } from './errors';

export type BinaryOperator = '+' | '-' | '*' | '/';

export type FormulaNode =
    | { kind: 'number'; value: number }
    | { kind: 'column'; name: string }
    | { kind: 'negate'; operand: FormulaNode }
    | { kind: 'binary'; op: BinaryOperator; left: FormulaNode; right: FormulaNode };

type Token =
    | { type: 'number'; value: number; pos: number }
    | { type: 'column'; name: string; pos: number }
    | { type: 'op'; op: BinaryOperator; pos: number }
    | { type: 'lparen'; pos: number }
    | { type: 'rparen'; pos: number };

const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_]/;
const NUMBER = /^(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?/;

function tokenize(source: string): Token[] {
    const tokens: Token[] = [];
    let i = 0;

    while (i < source.length) {
        const ch = source[i];

        if (/\s/.test(ch)) {
            i++;
            continue;
        }

        if (ch === '+' || ch === '-' || ch === '*' || ch === '/') {
            tokens.push({ type: 'op', op: ch, pos: i });
            i++;
            continue;
        }
        if (ch === '(') {
            tokens.push({ type: 'lparen', pos: i });
            i++;
            continue;
        }
        if (ch === ')') {
            tokens.push({ type: 'rparen', pos: i });
            i++;
            continue;
        }

        if (ch === '[') {
            const end = source.indexOf(']', i + 1);
            if (end === -1) throw new YieldFormulaError('Unclosed column reference', i);
            const name = source.slice(i + 1, end).trim();
            if (!name) throw new YieldFormulaError('Empty column reference', i);
            tokens.push({ type: 'column', name, pos: i });
            i = end + 1;
            continue;
        }

        const numberMatch = NUMBER.exec(source.slice(i));
        if (numberMatch) {
            tokens.push({ type: 'number', value: Number(numberMatch[0]), pos: i });
            i += numberMatch[0].length;
            continue;
        }

        if (IDENT_START.test(ch)) {
            let end = i + 1;
            while (end < source.length && IDENT_PART.test(source[end])) end++;
            tokens.push({ type: 'column', name: source.slice(i, end), pos: i });
            i = end;
            continue;
        }

        throw new YieldFormulaError(`Unexpected character '${ch}'`, i);
    }

    return tokens;
}

class Parser {
    private index = 0;

    constructor(private readonly tokens: Token[], private readonly sourceLength: number) {}

    parse(): FormulaNode {
        if (this.tokens.length === 0) throw new YieldFormulaError('Empty formula', 0);
        const node = this.expr();
        const extra = this.peek();
        if (extra) throw new YieldFormulaError('Unexpected token', extra.pos);
        return node;
    }

    private peek(): Token | undefined {
        return this.tokens[this.index];
    }

    private next(): Token {
        const token = this.tokens[this.index];
        if (!token) throw new YieldFormulaError('Unexpected end of formula', this.sourceLength);
        this.index++;
        return token;
    }

    private expr(): FormulaNode {
        let left = this.term();
        for (let t = this.peek(); t && t.type === 'op' && (t.op === '+' || t.op === '-'); t = this.peek()) {
            this.index++;
            left = { kind: 'binary', op: t.op, left, right: this.term() };
        }
        return left;
    }

    private term(): FormulaNode {
        let left = this.unary();
        for (let t = this.peek(); t && t.type === 'op' && (t.op === '*' || t.op === '/'); t = this.peek()) {
            this.index++;
            left = { kind: 'binary', op: t.op, left, right: this.unary() };
        }
        return left;
    }

    private unary(): FormulaNode {
        const t = this.peek();
        if (t && t.type === 'op' && t.op === '-') {
            this.index++;
            return { kind: 'negate', operand: this.unary() };
        }
        return this.primary();
    }

    private primary(): FormulaNode {
        const t = this.next();
        switch (t.type) {
            case 'number':
                return { kind: 'number', value: t.value };
            case 'column':
                return { kind: 'column', name: t.name };
            case 'lparen': {
                const inner = this.expr();
                const close = this.next();
                if (close.type !== 'rparen') throw new YieldFormulaError("Expected ')'", close.pos);
                return inner;
            }
            default:
                throw new YieldFormulaError('Unexpected token', t.pos);
        }
    }
}

export function parseFormula(source: string): FormulaNode {
    return new Parser(tokenize(source), source.length).parse();
}

export function referencedColumns(node: FormulaNode): string[] {
    const names = new Set<string>();
    const walk = (n: FormulaNode): void => {
        switch (n.kind) {
            case 'column':
                names.add(n.name);
                break;
            case 'negate':
                walk(n.operand);
                break;
            case 'binary':
                walk(n.left);
                walk(n.right);
                break;
            case 'number':
                break;
        }
    };
    walk(node);
    return [...names];
}

/**
 * Numeric view of a cell; anything that is not a finite number becomes NaN
 */
export function toNumber(value: Row[string] | undefined): number {
    if (typeof value === 'number') return value;
    if (typeof value === 'boolean') return value ? 1 : 0;
    if (typeof value === 'string') {
        const trimmed = value.replace(/,/g, '').trim();
        if (trimmed === '') return NaN;
        return Number(trimmed);
    }
    return NaN;
}

function evaluateRaw(node: FormulaNode, row: Row): number {
    switch (node.kind) {
        case 'number':
            return node.value;
        case 'column':
            return toNumber(row[node.name]);
        case 'negate':
            return -evaluateRaw(node.operand, row);
        case 'binary': {
            const left = evaluateRaw(node.left, row);
            const right = evaluateRaw(node.right, row);
            switch (node.op) {
                case '+': return left + right;
                case '-': return left - right;
                case '*': return left * right;
                case '/': return left / right;
            }
        }
    }
}

/**
 * Evaluate against one row. Division by zero and missing operands give 0, never Infinity or NaN.
 */
export function evaluateFormula(node: FormulaNode, row: Row): number {
    const result = evaluateRaw(node, row);
    return Number.isFinite(result) ? result : 0;
}

export function formatFormula(node: FormulaNode): string {
    switch (node.kind) {
        case 'number':
            return String(node.value);
        case 'column':
            return IDENT_START.test(node.name[0]) && [...node.name].every((c) => IDENT_PART.test(c))
                ? node.name
                : `[${node.name}]`;
        case 'negate':
            return `-(${formatFormula(node.operand)})`;
        case 'binary':
            return `(${formatFormula(node.left)} ${node.op} ${formatFormula(node.right)})`;
    }
}
