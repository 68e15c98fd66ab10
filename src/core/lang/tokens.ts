import type { Range } from '../../types/diagnostic.js';

export type TokenType =
    | 'PROGRAM'
    | 'PROCEDURE'
    | 'VAR'
    | 'INTEGER'
    | 'REAL'
    | 'INTEGER_CONST'
    | 'REAL_CONST'
    | 'LPAREN'
    | 'RPAREN'
    | 'PLUS'
    | 'MINUS'
    | 'MUL'
    | 'FLOAT_DIV'
    | 'INTEGER_DIV'
    | 'ID'
    | 'ASSIGN'
    | 'BEGIN'
    | 'END'
    | 'SEMI'
    | 'COLON'
    | 'COMMA'
    | 'DOT'
    | 'EOF';

export interface Token {
    kind: TokenType;
    /** Number for constants, text for everything else, null for EOF */
    value: number | bigint | string | null;
    range: Range;
}

// Keys are uppercase: identifiers are normalized before lookup
export const RESERVED_KEYWORDS: ReadonlyMap<string, TokenType> = new Map<string, TokenType>([
    ['PROGRAM', 'PROGRAM'],
    ['VAR', 'VAR'],
    ['DIV', 'INTEGER_DIV'],
    ['INTEGER', 'INTEGER'],
    ['REAL', 'REAL'],
    ['BEGIN', 'BEGIN'],
    ['END', 'END'],
    ['PROCEDURE', 'PROCEDURE']
]);

export const SINGLE_CHAR_TOKENS: ReadonlyMap<string, TokenType> = new Map<string, TokenType>([
    [';', 'SEMI'],
    [':', 'COLON'],
    [',', 'COMMA'],
    ['+', 'PLUS'],
    ['-', 'MINUS'],
    ['*', 'MUL'],
    ['/', 'FLOAT_DIV'],
    ['(', 'LPAREN'],
    [')', 'RPAREN'],
    ['.', 'DOT']
]);

export function describeToken(token: Token): string {
    if (token.kind === 'EOF') return 'end of input';
    return `${token.kind} "${token.value}"`;
}
