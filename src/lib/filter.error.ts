/**
 * Thrown when filter JSON is malformed or does not describe a filter tree.
 * `details` lists one message per rejected property, as `path: reason`.
 */
export class FilterParseError extends Error {
    constructor(
        message: string,
        readonly details: readonly string[] = [],
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'FilterParseError';
    }
}
