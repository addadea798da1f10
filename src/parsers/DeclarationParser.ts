/**
 * Parser for top-level declarations: version, import, var and config entries
 */

import { coerceLiteral, isQuoted, splitCsv, unquote } from '../utils';
import type { Value } from '../utils';
import { ParseError } from '../classes/exceptions';
import type { Variable } from '../types/Ast.type';
import { IDENTIFIER } from './ParserUtils';

const VERSION = /^version:\s*(.+)$/;
const IMPORT = /^import\s+(.+)$/;
const VARIABLE = new RegExp(`^var\\s+(?:(persistent)\\s+)?(${IDENTIFIER})(?:\\s*:\\s*(${IDENTIFIER}))?(?:\\s*=\\s*(.+))?$`);
const CONFIG_ENTRY = /^([A-Za-z_][A-Za-z0-9_.-]*)\s*:\s*(.*)$/;
const MODULE_NAME = new RegExp(`^${IDENTIFIER}$`);

export class DeclarationParser {
    /**
     * `version: 1.2.0` -> "1.2.0", or null when the line is not a version line
     */
    static parseVersion(text: string): string | null {
        const match = text.match(VERSION);
        return match ? unquote(match[1]) : null;
    }

    /**
     * `import a, b` -> ["a", "b"], or null when the line is not an import
     */
    static parseImport(text: string, line: number): string[] | null {
        const match = text.match(IMPORT);
        if (!match) {
            return null;
        }
        const names = splitCsv(match[1]);
        for (const name of names) {
            if (!MODULE_NAME.test(name)) {
                throw new ParseError(`Invalid module name in import: ${name}`, line);
            }
        }
        return names;
    }

    /**
     * `var [persistent ]name[: type][ = value]`, or null when the line is not a var line
     */
    static parseVariable(text: string, line: number): Variable | null {
        if (!/^var\s/.test(text)) {
            return null;
        }
        const match = text.match(VARIABLE);
        if (!match) {
            throw new ParseError(`Invalid variable declaration: ${text}`, line);
        }

        const raw = match[4];
        let value: Value = null;
        if (raw !== undefined) {
            value = isQuoted(raw) ? unquote(raw) : coerceLiteral(raw);
        }

        return {
            name: match[2],
            value,
            type: match[3] ?? 'string',
            persistent: match[1] !== undefined
        };
    }

    /**
     * One indented `key: value` line of a config block
     */
    static parseConfigEntry(text: string, line: number): [string, Value] {
        const match = text.match(CONFIG_ENTRY);
        if (!match) {
            throw new ParseError(`Invalid config entry: ${text}`, line);
        }
        return [match[1], coerceLiteral(match[2])];
    }
}
