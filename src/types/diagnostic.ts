export type Severity = 'error' | 'warning';

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
    found?: string; // Offending text, when the parser reported one
}

export interface ExpressionStats {
    total: number;
    passed: number;
    failed: number;
}
