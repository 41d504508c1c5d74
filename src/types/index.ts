export type TargetKind =
    | "import-block"
    | "struct-body"
    | "constructor-params"
    | "call-args"
    | "placeholder-statement";

/**
 * A located construct. `open` and `close` are the offsets of the enclosing
 * delimiters; `start`/`end` bound the text between them.
 */
export type Span = {
    open: number;
    close: number;
    start: number;
    end: number;
};

/**
 * Anything the file rewriter can run over a file's content.
 */
export interface TextTransform {
    readonly name: string;
    transform(content: string): string;
}

export interface EditRule extends TextTransform {
    readonly kind: TargetKind;
    readonly target: string;
}

export type TransformationResult = {
    content: string;
    changed: boolean;
    applied: string[];
};

export type FileVerdict = {
    path: string;
    changed: boolean;
    applied: string[];
};

export type RunSummary = {
    verdicts: FileVerdict[];
    updated: number;
};

export interface CodemodOptions {
    dryRun?: boolean;
    atomic?: boolean;
}
