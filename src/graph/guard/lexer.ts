import { GuardSyntaxError } from '../../lib/errors';

export type TokenType =
    | 'number'
    | 'string'
    | 'identifier'
    | 'keyword'
    | 'operator'
    | 'punct'
    | 'eof';

export interface Token {
    type: TokenType;
    value: string;
    position: number;
}

const KEYWORDS = new Set(['and', 'or', 'not', 'in', 'true', 'false', 'null', 'True', 'False', 'None']);

const TWO_CHAR_OPERATORS = ['==', '!=', '<=', '>=', '&&', '||'];
const ONE_CHAR_OPERATORS = ['<', '>', '!'];
const PUNCTUATION = ['(', ')', '[', ']', ',', '.', '-'];

/**
 * Split a guard source into tokens. The final token is always `eof`.
 */
export function tokenize(source: string): Token[] {
    const tokens: Token[] = [];
    let i = 0;

    while (i < source.length) {
        const ch = source[i];

        if (/\s/.test(ch)) {
            i++;
            continue;
        }

        if (/[0-9]/.test(ch)) {
            const start = i;
            while (i < source.length && /[0-9]/.test(source[i])) i++;
            // A fraction needs a digit after the dot, so `items.0.name` stays a path
            if (source[i] === '.' && /[0-9]/.test(source[i + 1] ?? '') && !precededByDot(tokens)) {
                i++;
                while (i < source.length && /[0-9]/.test(source[i])) i++;
            }
            tokens.push({ type: 'number', value: source.slice(start, i), position: start });
            continue;
        }

        if (ch === '"' || ch === "'") {
            const start = i;
            const quote = ch;
            let value = '';
            i++;
            while (i < source.length && source[i] !== quote) {
                if (source[i] === '\\' && i + 1 < source.length) {
                    value += source[i + 1];
                    i += 2;
                } else {
                    value += source[i];
                    i++;
                }
            }
            if (i >= source.length) {
                throw new GuardSyntaxError(source, start, 'Unterminated string');
            }
            i++;
            tokens.push({ type: 'string', value, position: start });
            continue;
        }

        if (/[A-Za-z_]/.test(ch)) {
            const start = i;
            while (i < source.length && /[A-Za-z0-9_]/.test(source[i])) i++;
            const word = source.slice(start, i);
            tokens.push({ type: KEYWORDS.has(word) ? 'keyword' : 'identifier', value: word, position: start });
            continue;
        }

        const pair = source.slice(i, i + 2);
        if (TWO_CHAR_OPERATORS.includes(pair)) {
            tokens.push({ type: 'operator', value: pair, position: i });
            i += 2;
            continue;
        }
        if (ONE_CHAR_OPERATORS.includes(ch)) {
            tokens.push({ type: 'operator', value: ch, position: i });
            i++;
            continue;
        }
        if (ch === '=') {
            throw new GuardSyntaxError(source, i, 'Use "==" for equality');
        }
        if (PUNCTUATION.includes(ch)) {
            tokens.push({ type: 'punct', value: ch, position: i });
            i++;
            continue;
        }

        throw new GuardSyntaxError(source, i, `Unexpected character "${ch}"`);
    }

    tokens.push({ type: 'eof', value: '', position: source.length });
    return tokens;
}

function precededByDot(tokens: Token[]): boolean {
    const last = tokens[tokens.length - 1];
    return last !== undefined && last.type === 'punct' && last.value === '.';
}
