export interface ValidationReport {
    readonly isValid: boolean;
    readonly errors: readonly string[];
}

export function toReport(errors: readonly string[]): ValidationReport {
    return Object.freeze({ isValid: errors.length === 0, errors: Object.freeze([...errors]) });
}
