export const SECURITY_LEVELS = ['off', 'warn', 'enforce'] as const;

export type SecurityLevel = (typeof SECURITY_LEVELS)[number];

export interface SecurityPolicy {
    level: SecurityLevel;
    /** Insertion-ordered, no duplicates */
    exemptedPatterns: string[];
}

export interface Finding {
    kind: 'pattern' | 'file-reference';
    /** Rule label, or the offending path */
    subject: string;
    message: string;
}

export interface ValidationOutcome {
    findings: string[];
    warn: boolean;
    error: boolean;
}

export function defaultPolicy(): SecurityPolicy {
    return { level: 'enforce', exemptedPatterns: [] };
}
