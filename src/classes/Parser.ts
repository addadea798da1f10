import { DeclarationParser } from '../parsers/DeclarationParser';
import { DefineParser } from '../parsers/DefineParser';
import { FlowParser } from '../parsers/FlowParser';
import { MiddlewareParser } from '../parsers/MiddlewareParser';
import type { SourceLine } from '../parsers/ParserUtils';
import { createLogger } from '../utils';
import type { Logger } from '../utils';
import type { Module } from '../types/Ast.type';
import { ParseError } from './exceptions';

type BlockKind = 'flow' | 'function' | 'middleware' | 'config' | 'unknown';

interface Block {
    kind: BlockKind;
    header: SourceLine;
    body: SourceLine[];
}

export class Parser {
    private readonly source: string;
    private readonly name: string;
    private readonly logger: Logger;

    static readonly DEFAULT_MODULE_NAME = 'main';

    /**
     * Create a new Parser
     * @param source - Full flow-script text
     * @param name - Module name (defaults to "main")
     * @param logger - Logger for debug traces
     */
    constructor(source: string, name?: string, logger?: Logger) {
        this.source = source;
        this.name = name ?? Parser.DEFAULT_MODULE_NAME;
        this.logger = logger ?? createLogger('Parser');
    }

    /**
     * Parse flow-script text into a Module
     */
    static parse(source: string, name?: string, logger?: Logger): Module {
        return new Parser(source, name, logger).parse();
    }

    /**
     * Parse the source into a Module
     * @throws ParseError when a line inside a flow, function or middleware block is malformed
     */
    parse(): Module {
        try {
            return this.parseModule();
        } catch (error) {
            if (error instanceof ParseError && error.source === null) {
                error.source = this.source;
            }
            throw error;
        }
    }

    private parseModule(): Module {
        const module: Module = {
            name: this.name,
            version: null,
            flows: new Map(),
            functions: new Map(),
            variables: new Map(),
            middleware: new Map(),
            imports: [],
            config: {}
        };

        let block: Block | null = null;
        const closeBlock = (): void => {
            if (block) {
                this.addBlock(module, block);
                block = null;
            }
        };

        const lines = this.source.split('\n');
        for (let i = 0; i < lines.length; i++) {
            const raw = lines[i].replace(/\r$/, '');
            const text = raw.trim();
            const line = i + 1;

            if (text === '' || text.startsWith('#')) {
                continue;
            }

            const indented = raw.startsWith(' ') || raw.startsWith('\t');
            if (indented) {
                if (block) {
                    block.body.push({ text, line });
                } else {
                    this.logger.debug(`Ignoring indented line outside a block (line ${line})`);
                }
                continue;
            }

            closeBlock();

            const version = DeclarationParser.parseVersion(text);
            if (version !== null) {
                module.version = version;
                continue;
            }

            const imports = DeclarationParser.parseImport(text, line);
            if (imports !== null) {
                for (const name of imports) {
                    if (!module.imports.includes(name)) {
                        module.imports.push(name);
                    }
                }
                continue;
            }

            const variable = DeclarationParser.parseVariable(text, line);
            if (variable !== null) {
                if (module.variables.has(variable.name)) {
                    throw new ParseError(`Duplicate variable: ${variable.name}`, line);
                }
                module.variables.set(variable.name, variable);
                continue;
            }

            if (text.endsWith(':')) {
                block = { kind: Parser.classifyHeader(text), header: { text, line }, body: [] };
                continue;
            }

            this.logger.debug(`Ignoring unrecognized top-level line ${line}: ${text}`);
        }

        closeBlock();
        return module;
    }

    private static classifyHeader(text: string): BlockKind {
        if (text === 'config:') {
            return 'config';
        }
        if (FlowParser.isHeader(text)) {
            return 'flow';
        }
        if (DefineParser.isHeader(text)) {
            return 'function';
        }
        if (MiddlewareParser.isHeader(text)) {
            return 'middleware';
        }
        return 'unknown';
    }

    private addBlock(module: Module, block: Block): void {
        const { header, body } = block;

        switch (block.kind) {
            case 'flow': {
                const flow = FlowParser.parse(header, body);
                if (module.flows.has(flow.name)) {
                    throw new ParseError(`Duplicate flow: ${flow.name}`, header.line);
                }
                module.flows.set(flow.name, flow);
                break;
            }
            case 'function': {
                const fn = DefineParser.parse(header, body);
                if (module.functions.has(fn.name)) {
                    throw new ParseError(`Duplicate function: ${fn.name}`, header.line);
                }
                module.functions.set(fn.name, fn);
                break;
            }
            case 'middleware': {
                const definition = MiddlewareParser.parse(header, body);
                if (module.middleware.has(definition.name)) {
                    throw new ParseError(`Duplicate middleware: ${definition.name}`, header.line);
                }
                module.middleware.set(definition.name, definition);
                break;
            }
            case 'config':
                for (const entry of body) {
                    const [key, value] = DeclarationParser.parseConfigEntry(entry.text, entry.line);
                    module.config[key] = value;
                }
                break;
            case 'unknown':
                this.logger.debug(`Ignoring unknown block at line ${header.line}: ${header.text}`);
                break;
        }
    }
}
