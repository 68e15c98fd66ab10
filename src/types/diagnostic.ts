export type Severity = 'error' | 'warning';

export enum Stage {
    CONFIG = 'config',
    LEX = 'lex',
    PARSE = 'parse',
    SEMANTIC = 'semantic',
    RUNTIME = 'runtime',
    IO = 'io'
}

export interface Location {
    line: number;
    col: number;
    offset: number;
}

export interface Range {
    start: Location;
    end: Location;
}

export interface Diagnostic {
    code: string;
    message: string;
    severity: Severity;
    file: string;
    range?: Range;
    stage?: Stage; // Pipeline stage that raised it
}
