/**
 * Recursive-descent parser for guard expressions.
 *
 * Precedence, loosest first: or, and, not, comparison/membership, primary.
 * Both word (`and`, `or`, `not`) and symbol (`&&`, `||`, `!`) connectives
 * are accepted.
 */

import type { PathSegment } from '../../lib/paths';
import { formatPath } from '../../lib/paths';
import { GuardSyntaxError } from '../../lib/errors';
import type {
    CompareOperator,
    GuardExpression,
    GuardFunction,
    GuardRoot,
    PathExpression,
} from './ast';
import { GUARD_FUNCTIONS, GUARD_ROOTS } from './ast';
import type { Token } from './lexer';
import { tokenize } from './lexer';

const COMPARE_OPERATORS: readonly string[] = ['==', '!=', '<', '<=', '>', '>='];

/**
 * Parse a guard source string into an expression tree.
 *
 * @throws GuardSyntaxError on malformed input
 */
export function parseGuard(source: string): GuardExpression {
    const parser = new GuardParser(source, tokenize(source));
    return parser.parse();
}

class GuardParser {
    private index = 0;

    constructor(
        private readonly source: string,
        private readonly tokens: Token[],
    ) { }

    parse(): GuardExpression {
        if (this.peek().type === 'eof') {
            throw this.error('Empty guard');
        }
        const expression = this.parseOr();
        const trailing = this.peek();
        if (trailing.type !== 'eof') {
            throw this.error(`Unexpected "${trailing.value}"`, trailing);
        }
        return expression;
    }

    private parseOr(): GuardExpression {
        let left = this.parseAnd();
        while (this.matchWord('or') || this.matchOperator('||')) {
            left = { kind: 'logical', operator: 'or', left, right: this.parseAnd() };
        }
        return left;
    }

    private parseAnd(): GuardExpression {
        let left = this.parseNot();
        while (this.matchWord('and') || this.matchOperator('&&')) {
            left = { kind: 'logical', operator: 'and', left, right: this.parseNot() };
        }
        return left;
    }

    private parseNot(): GuardExpression {
        if (this.matchWord('not') || this.matchOperator('!')) {
            return { kind: 'not', operand: this.parseNot() };
        }
        return this.parseComparison();
    }

    private parseComparison(): GuardExpression {
        const left = this.parsePrimary();
        const next = this.peek();

        if (next.type === 'operator' && COMPARE_OPERATORS.includes(next.value)) {
            this.advance();
            return {
                kind: 'compare',
                operator: toCompareOperator(next.value),
                left,
                right: this.parsePrimary(),
            };
        }
        if (this.matchWord('in')) {
            return { kind: 'membership', negated: false, item: left, collection: this.parsePrimary() };
        }
        if (next.type === 'keyword' && next.value === 'not' && this.peekAt(1).value === 'in') {
            this.advance();
            this.advance();
            return { kind: 'membership', negated: true, item: left, collection: this.parsePrimary() };
        }
        return left;
    }

    private parsePrimary(): GuardExpression {
        const token = this.peek();

        if (token.type === 'number') {
            this.advance();
            return { kind: 'literal', value: Number(token.value) };
        }
        if (token.type === 'punct' && token.value === '-' && this.peekAt(1).type === 'number') {
            this.advance();
            return { kind: 'literal', value: -Number(this.advance().value) };
        }
        if (token.type === 'string') {
            this.advance();
            return { kind: 'literal', value: token.value };
        }
        if (token.type === 'keyword') {
            switch (token.value) {
                case 'true':
                case 'True':
                    this.advance();
                    return { kind: 'literal', value: true };
                case 'false':
                case 'False':
                    this.advance();
                    return { kind: 'literal', value: false };
                case 'null':
                case 'None':
                    this.advance();
                    return { kind: 'literal', value: null };
            }
            throw this.error(`Unexpected keyword "${token.value}"`, token);
        }
        if (this.matchPunct('(')) {
            const inner = this.parseOr();
            this.expectPunct(')');
            return inner;
        }
        if (this.matchPunct('[')) {
            const items: GuardExpression[] = [];
            if (!this.matchPunct(']')) {
                do {
                    items.push(this.parseOr());
                } while (this.matchPunct(','));
                this.expectPunct(']');
            }
            return { kind: 'list', items };
        }
        if (token.type === 'identifier') {
            if (this.peekAt(1).type === 'punct' && this.peekAt(1).value === '(') {
                return this.parseCall();
            }
            return this.parsePath();
        }

        throw this.error(token.type === 'eof' ? 'Unexpected end of guard' : `Unexpected "${token.value}"`, token);
    }

    private parseCall(): GuardExpression {
        const nameToken = this.advance();
        const fn = GUARD_FUNCTIONS.find(name => name === nameToken.value);
        if (!fn) {
            throw this.error(`Unknown function "${nameToken.value}"`, nameToken);
        }
        this.expectPunct('(');
        const args: GuardExpression[] = [];
        if (!this.matchPunct(')')) {
            do {
                args.push(this.parseOr());
            } while (this.matchPunct(','));
            this.expectPunct(')');
        }
        this.checkArguments(fn, args, nameToken);
        return { kind: 'call', fn, args };
    }

    private checkArguments(fn: GuardFunction, args: GuardExpression[], at: Token): void {
        if (args.length !== 1) {
            throw this.error(`${fn}() takes exactly one argument`, at);
        }
        const [arg] = args;
        if (fn === 'exists' && arg.kind !== 'path') {
            throw this.error('exists() takes a state path', at);
        }
        if ((fn === 'retries' || fn === 'visits') && !(arg.kind === 'literal' && typeof arg.value === 'string')) {
            throw this.error(`${fn}() takes a quoted id`, at);
        }
    }

    private parsePath(): PathExpression {
        const segments: PathSegment[] = [this.advance().value];

        while (true) {
            if (this.matchPunct('.')) {
                const next = this.advance();
                if (next.type === 'identifier' || next.type === 'keyword') {
                    segments.push(next.value);
                } else if (next.type === 'number' && /^\d+$/.test(next.value)) {
                    segments.push(Number(next.value));
                } else {
                    throw this.error('Expected a field name after "."', next);
                }
                continue;
            }
            if (this.matchPunct('[')) {
                const key = this.advance();
                if (key.type === 'number' && /^\d+$/.test(key.value)) {
                    segments.push(Number(key.value));
                } else if (key.type === 'string') {
                    segments.push(key.value);
                } else {
                    throw this.error('Expected an index or quoted key', key);
                }
                this.expectPunct(']');
                continue;
            }
            break;
        }

        const text = formatPath(segments);
        if (segments[0] === 'state') {
            segments.shift();
        }
        const head = segments[0];
        const root = GUARD_ROOTS.find(r => r === head);
        if (root === 'counters') {
            // Counter names are camelCase; `failed_tasks` reads `failedTasks`
            const [name, ...rest] = segments.slice(1);
            const key = typeof name === 'string' ? name.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase()) : name;
            return { kind: 'path', root, segments: key === undefined ? [] : [key, ...rest], text };
        }
        if (root) {
            return { kind: 'path', root, segments: segments.slice(1), text };
        }
        // Bare names read from the data bag
        return { kind: 'path', root: 'data' satisfies GuardRoot, segments, text };
    }

    // ------------------------------------------------------------------------
    // Token helpers
    // ------------------------------------------------------------------------

    private peek(): Token {
        return this.peekAt(0);
    }

    private peekAt(offset: number): Token {
        return this.tokens[Math.min(this.index + offset, this.tokens.length - 1)];
    }

    private advance(): Token {
        const token = this.peek();
        if (token.type !== 'eof') this.index++;
        return token;
    }

    private matchWord(word: string): boolean {
        const token = this.peek();
        if (token.type === 'keyword' && token.value === word) {
            // `not in` belongs to the comparison level
            if (word === 'not' && this.peekAt(1).value === 'in') return false;
            this.index++;
            return true;
        }
        return false;
    }

    private matchOperator(op: string): boolean {
        const token = this.peek();
        if (token.type === 'operator' && token.value === op) {
            this.index++;
            return true;
        }
        return false;
    }

    private matchPunct(value: string): boolean {
        const token = this.peek();
        if (token.type === 'punct' && token.value === value) {
            this.index++;
            return true;
        }
        return false;
    }

    private expectPunct(value: string): void {
        if (!this.matchPunct(value)) {
            throw this.error(`Expected "${value}"`);
        }
    }

    private error(message: string, token: Token = this.peek()): GuardSyntaxError {
        return new GuardSyntaxError(this.source, token.position, message);
    }
}

function toCompareOperator(value: string): CompareOperator {
    switch (value) {
        case '==':
        case '!=':
        case '<':
        case '<=':
        case '>':
        case '>=':
            return value;
    }
    throw new Error(`Not a comparison operator: ${value}`);
}
