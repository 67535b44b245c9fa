import { findFileReferences, isUnsafeReference } from '../commands/markers.js';
import { SecurityError } from '../commands/errors.js';
import { DENY_RULES, fileReferenceMessage, patternMessage, type DenyRule } from './patterns.js';
import type { Finding, SecurityPolicy, ValidationOutcome } from './types.js';

/**
 * Security Validator — denylist and unsafe-path scan over template text
 */

export function scan(text: string): Finding[] {
    const findings: Finding[] = [];

    for (const rule of DENY_RULES) {
        if (rule.pattern.test(text)) {
            findings.push({ kind: 'pattern', subject: rule.label, message: patternMessage(rule.label) });
        }
    }

    for (const ref of findFileReferences(text)) {
        if (isUnsafeReference(ref)) {
            findings.push({ kind: 'file-reference', subject: ref, message: fileReferenceMessage(ref) });
        }
    }

    return findings;
}

function normalizeWhitespace(value: string): string {
    return value.trim().replace(/\s+/g, ' ');
}

/**
 * Whether an exemption covers a deny rule. The exemption matches when it
 * contains the rule label, or when, with its whitespace runs read as `\s+`,
 * it is a substring of the rule's regex source.
 */
export function exemptsRule(exemption: string, rule: DenyRule): boolean {
    const normalized = normalizeWhitespace(exemption);
    if (!normalized) return false;
    if (normalized.includes(rule.label)) return true;
    return rule.pattern.source.includes(normalized.replace(/ /g, '\\s+'));
}

export function isExempt(finding: Finding, exemptions: readonly string[]): boolean {
    if (finding.kind === 'file-reference') {
        return exemptions.some(e => {
            const normalized = normalizeWhitespace(e);
            return normalized !== '' && finding.subject.includes(normalized);
        });
    }

    const rule = DENY_RULES.find(r => r.label === finding.subject);
    if (!rule) return false;
    return exemptions.some(e => exemptsRule(e, rule));
}

/**
 * Scan and apply a policy: exempted findings are dropped, the rest set the
 * flag the policy level calls for
 */
export function validate(text: string, policy: SecurityPolicy): ValidationOutcome {
    const findings = scan(text)
        .filter(f => !isExempt(f, policy.exemptedPatterns))
        .map(f => f.message);

    const flagged = findings.length > 0;
    return {
        findings,
        warn: flagged && policy.level === 'warn',
        error: flagged && policy.level === 'enforce',
    };
}

/**
 * Enforce-level check with no exemptions; throws SecurityError on any finding
 */
export function validateContent(text: string, commandName: string): void {
    const findings = scan(text);
    if (findings.length > 0) {
        throw new SecurityError(commandName, findings.map(f => f.message));
    }
}
