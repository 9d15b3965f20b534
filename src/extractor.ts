import type { PackageDescriptor, PackageVariables } from './types.js';

export type MakefileLine =
    | { kind: 'blank' }
    | { kind: 'comment' }
    | { kind: 'conditional-open' }
    | { kind: 'conditional-else' }
    | { kind: 'conditional-close' }
    | { kind: 'define-open' }
    | { kind: 'define-close' }
    | { kind: 'package'; name: string }
    | { kind: 'assignment'; variable: string; operator: AssignmentOperator; value: string }
    | { kind: 'text'; text: string };

export type AssignmentOperator = '=' | ':=' | '?=' | '+=';

export interface ExtractedVariables {
    name?: string; // Undefined when the file declares no `package=` line
    variables: PackageVariables;
}

const PACKAGE_RE = /^package\s*:?=\s*(\S.*)$/;
const ASSIGNMENT_RE = /^\$\(package\)_(\w+)\s*(:=|\?=|\+=|=)\s*(.*)$/;
const CONDITIONAL_OPEN_RE = /^if(?:eq|neq|def|ndef)\b/;
const CONDITIONAL_ELSE_RE = /^else\b/;
const CONDITIONAL_CLOSE_RE = /^endif\b/;
const DEFINE_OPEN_RE = /^define\b/;
const DEFINE_CLOSE_RE = /^endef\b/;
// Conditional logic appended to a value on the same line is not evaluated
const CONDITIONAL_SUFFIX_RE = /\s+(?:ifeq|ifneq|ifdef|ifndef|if|else|endif)\b.*$/;

export function classifyLine(raw: string): MakefileLine {
    const line = raw.trim();

    if (line === '') return { kind: 'blank' };
    if (line.startsWith('#')) return { kind: 'comment' };
    if (DEFINE_OPEN_RE.test(line)) return { kind: 'define-open' };
    if (DEFINE_CLOSE_RE.test(line)) return { kind: 'define-close' };
    if (CONDITIONAL_OPEN_RE.test(line)) return { kind: 'conditional-open' };
    if (CONDITIONAL_ELSE_RE.test(line)) return { kind: 'conditional-else' };
    if (CONDITIONAL_CLOSE_RE.test(line)) return { kind: 'conditional-close' };

    const packageMatch = PACKAGE_RE.exec(line);
    if (packageMatch) {
        return { kind: 'package', name: packageMatch[1].trim() };
    }

    const assignment = ASSIGNMENT_RE.exec(line);
    if (assignment) {
        const [, variable, operator, value] = assignment;
        return {
            kind: 'assignment',
            variable,
            operator: toOperator(operator),
            value: stripConditionalSuffix(value),
        };
    }

    return { kind: 'text', text: stripConditionalSuffix(line) };
}

function toOperator(token: string): AssignmentOperator {
    switch (token) {
        case ':=':
        case '?=':
        case '+=':
            return token;
        default:
            return '=';
    }
}

export function stripConditionalSuffix(value: string): string {
    return value.replace(CONDITIONAL_SUFFIX_RE, '').trim();
}

// ============================================================================
// Extraction
// ============================================================================

/**
 * Scans the text of one package file and collects its `$(package)_<name>` assignments.
 *
 * The scanner is either idle or accumulating a value. Any non-assignment line that follows
 * an assignment continues it, unless it appears inside a conditional block. Conditionals are
 * tracked by depth only; assignments inside them are still recorded. `define` bodies are
 * skipped entirely.
 */
export function extractVariables(text: string): ExtractedVariables {
    const lines = text.split(/\r?\n/).map(classifyLine);

    const packageLine = lines.find(line => line.kind === 'package');
    if (!packageLine || packageLine.kind !== 'package') {
        return { variables: new Map() };
    }

    const variables = new Map<string, string>();
    let current: string | undefined;
    let parts: string[] = [];
    let conditionalDepth = 0;
    let defineDepth = 0;

    const flush = () => {
        if (current !== undefined) {
            variables.set(current, parts.join(' ').trim());
        }
        current = undefined;
        parts = [];
    };

    for (const line of lines) {
        if (defineDepth > 0) {
            if (line.kind === 'define-open') defineDepth++;
            if (line.kind === 'define-close') defineDepth--;
            continue;
        }

        switch (line.kind) {
            case 'define-open':
                defineDepth++;
                break;
            case 'conditional-open':
                conditionalDepth++;
                break;
            case 'conditional-close':
                conditionalDepth = Math.max(0, conditionalDepth - 1);
                break;
            case 'assignment':
                flush();
                if (line.operator === '?=' && variables.has(line.variable)) {
                    break;
                }
                current = line.variable;
                parts = [line.value];
                if (line.operator === '+=') {
                    const previous = variables.get(line.variable);
                    if (previous !== undefined) parts.unshift(previous);
                }
                break;
            case 'text':
                if (current !== undefined && conditionalDepth === 0 && line.text !== '') {
                    parts.push(line.text);
                }
                break;
            default:
                break;
        }
    }
    flush();

    return { name: packageLine.name, variables };
}

export function parseDescriptor(text: string): PackageDescriptor | undefined {
    const { name, variables } = extractVariables(text);
    return name === undefined ? undefined : { name, variables };
}
