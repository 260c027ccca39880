/** Folds two handler results into one. */
export type Reducer<U> = (previous: U, next: U) => U;

export type BooleanOperator = Reducer<boolean>;

export function lastWins<U>(_previous: U, next: U): U {
    return next;
}

export function firstWins<U>(previous: U, _next: U): U {
    return previous;
}

/** Non-short-circuiting boolean folds: every handler is still called. */
export const BooleanOperators = Object.freeze({
    AND: (previous: boolean, next: boolean): boolean => previous && next,
    OR: (previous: boolean, next: boolean): boolean => previous || next,
    XOR: (previous: boolean, next: boolean): boolean => previous !== next,
} satisfies Record<string, BooleanOperator>);
