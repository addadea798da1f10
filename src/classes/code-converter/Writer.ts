/**
 * Writer - line-oriented string building for flow-script output
 *
 * Collects parts in an array and joins once at the end.
 */
export class Writer {
    private parts: string[] = [];
    private currentIndent: number = 0;
    private readonly indentString: string;

    constructor(indentString: string = '    ') {
        this.indentString = indentString;
    }

    /**
     * Set the indentation level
     */
    indent(level: number): void {
        this.currentIndent = level;
    }

    /**
     * Push a line with current indentation
     */
    pushLine(text: string): void {
        this.parts.push(this.indentString.repeat(this.currentIndent) + text);
        this.parts.push('\n');
    }

    /**
     * Push a blank line, never two in a row or at the start
     */
    pushBlankLine(): void {
        if (this.parts.length === 0 || this.parts[this.parts.length - 2] === '') {
            return;
        }
        this.parts.push('', '\n');
    }

    /**
     * Get the final string
     */
    toString(): string {
        return this.parts.join('');
    }
}
