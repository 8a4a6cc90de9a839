/**
 * Raised when a document cannot be read as the structure it claims to be.
 * Fatal for that document; nothing is written.
 */
export class MalformedInputError extends Error {
    readonly origin: string;
    readonly issues: string[];

    constructor(origin: string, issues: string[]) {
        super(`${origin} is not a valid notebook: ${issues.join('; ')}`);
        this.name = 'MalformedInputError';
        this.origin = origin;
        this.issues = issues;
    }
}

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}
