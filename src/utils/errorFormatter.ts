/**
 * Utility for formatting errors with source context
 */

export interface ErrorContext {
    line?: number; // 1-based line number
    code?: string; // Original source code
    message: string;
}

/**
 * Format an error message with the offending line and up to two lines around it
 *
 * @example
 * ```
 * Unrecognised action: sya "hi"
 *   at line 3
 *
 * Context:
 *      2 | function greet:
 *   >  3 |     sya "hi"
 * ```
 */
export function formatErrorWithContext(context: ErrorContext): string {
    const { line, code, message } = context;

    if (line === undefined || line < 1) {
        return message;
    }

    let errorMsg = `${message}\n  at line ${line}`;

    if (code) {
        const lines = code.split('\n');
        const lineIndex = line - 1;

        if (lineIndex < lines.length) {
            const contextLines: string[] = [];
            for (let i = Math.max(0, lineIndex - 2); i < Math.min(lines.length, lineIndex + 3); i++) {
                const lineNum = (i + 1).toString().padStart(3, ' ');
                const marker = i === lineIndex ? '>' : ' ';
                contextLines.push(`  ${marker}${lineNum} | ${lines[i]}`);
            }
            errorMsg += '\n\nContext:\n' + contextLines.join('\n');
        }
    }

    return errorMsg;
}

/**
 * Extract a readable message from anything thrown
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
