import { Stage } from '../types/diagnostic.js';
import type { Diagnostic, Range } from '../types/diagnostic.js';
import type { Token } from './lang/tokens.js';

export type ErrorKind =
    | 'InvalidCharacter'
    | 'UnterminatedComment'
    | 'InvalidSyntax'
    | 'DuplicateIdentifier'
    | 'UndeclaredIdentifier'
    | 'UndefinedVariable'
    | 'DivisionByZero';

const ERROR_INFO: Record<ErrorKind, { code: string; stage: Stage }> = {
    InvalidCharacter: { code: 'INVALID_CHARACTER', stage: Stage.LEX },
    UnterminatedComment: { code: 'UNTERMINATED_COMMENT', stage: Stage.LEX },
    InvalidSyntax: { code: 'INVALID_SYNTAX', stage: Stage.PARSE },
    DuplicateIdentifier: { code: 'DUPLICATE_IDENTIFIER', stage: Stage.SEMANTIC },
    UndeclaredIdentifier: { code: 'UNDECLARED_IDENTIFIER', stage: Stage.SEMANTIC },
    UndefinedVariable: { code: 'UNDEFINED_VARIABLE', stage: Stage.RUNTIME },
    DivisionByZero: { code: 'DIVISION_BY_ZERO', stage: Stage.RUNTIME }
};

export interface LangErrorContext {
    range?: Range;
    token?: Token;
    identifier?: string;
}

export class LangError extends Error {
    public readonly kind: ErrorKind;
    public readonly range?: Range;
    public readonly token?: Token;
    public readonly identifier?: string;

    constructor(kind: ErrorKind, message: string, context: LangErrorContext) {
        super(message);
        this.name = 'LangError';
        this.kind = kind;
        this.range = context.range;
        this.token = context.token;
        this.identifier = context.identifier;
    }

    get code(): string {
        return ERROR_INFO[this.kind].code;
    }

    get stage(): Stage {
        return ERROR_INFO[this.kind].stage;
    }
}

export function toDiagnostic(err: LangError, file: string): Diagnostic {
    return {
        code: err.code,
        message: err.message,
        severity: 'error',
        file,
        range: err.range,
        stage: err.stage
    };
}
