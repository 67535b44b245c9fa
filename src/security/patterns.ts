export interface DenyRule {
    /** Human-readable name shown in findings and matched by exemptions */
    label: string;
    pattern: RegExp;
}

export const DENY_RULES: readonly DenyRule[] = [
    { label: 'rm -rf', pattern: /\brm\s+-rf/ },
    { label: 'sudo rm', pattern: /\bsudo\s+rm/ },
    { label: '> /dev/null', pattern: />\s*\/dev\/null/ },
    { label: 'curl | bash', pattern: /\bcurl\b.*\|\s*(?:ba|z)?sh\b/ },
    { label: 'wget | bash', pattern: /\bwget\b.*\|\s*(?:ba|z)?sh\b/ },
    { label: 'eval', pattern: /\beval\s/ },
    { label: 'exec', pattern: /\bexec\s+/ },
    { label: 'nc -l', pattern: /\bnc\s+-l/ },
    { label: 'python -c', pattern: /\bpython[\d.]*\s+-c\b/ },
    { label: 'perl -e', pattern: /\bperl\s+-e\b/ },
];

export function patternMessage(label: string): string {
    return `Potentially dangerous pattern detected: ${label}`;
}

export function fileReferenceMessage(ref: string): string {
    return `Potentially unsafe file reference: ${ref}`;
}
