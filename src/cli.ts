#!/usr/bin/env node
/**
 * CLI Entry Point for jsoncore
 */

import * as fs from 'fs';
import { JsonEngine } from './json_engine';
import { clearLogContext, createLogger, isJsonMode, setLogContext } from './logger';
import { nativeHost } from './native_host';
import { isJsonEngineFailure } from './structured_error';

const log = createLogger('cli');

export interface CliIO {
    stdout(text: string): void;
    stderr(text: string): void;
    readFile(filePath: string): string;
    readStdin(): Promise<string>;
}

interface CliOptions {
    source: string;
    indent: number | string | undefined;
    keys: string[] | undefined;
}

class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

export const EXIT = {
    OK: 0,
    FAILED: 1,
    USAGE: 2,
} as const;

const processIO: CliIO = {
    stdout: (text) => { process.stdout.write(text); },
    stderr: (text) => { process.stderr.write(text); },
    readFile: (filePath) => fs.readFileSync(filePath, 'utf-8'),
    async readStdin() {
        const chunks: Buffer[] = [];
        for await (const chunk of process.stdin) {
            chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
        }
        return Buffer.concat(chunks).toString('utf-8');
    },
};

class JsonCoreCLI {
    constructor(
        private readonly io: CliIO = processIO,
        private readonly engine: JsonEngine<unknown> = new JsonEngine(nativeHost)
    ) {}

    async run(args: string[]): Promise<number> {
        const command = args[2] || 'help';

        if (command === 'help' || command === '--help') {
            this.io.stdout(this.usage());
            return EXIT.OK;
        }
        if (command !== 'format' && command !== 'minify' && command !== 'validate') {
            this.io.stderr(`Unknown command: ${command}\n${this.usage()}`);
            return EXIT.USAGE;
        }

        let options: CliOptions;
        try {
            options = this.parseOptions(args.slice(3));
        } catch (err) {
            if (err instanceof UsageError) {
                this.io.stderr(`Error: ${err.message}\n`);
                return EXIT.USAGE;
            }
            throw err;
        }

        setLogContext({ command, source: options.source });
        try {
            const text = options.source === '-' ? await this.io.readStdin() : this.io.readFile(options.source);
            const value = this.engine.parse(text);

            switch (command) {
                case 'validate':
                    this.io.stdout('ok\n');
                    break;
                case 'minify':
                    this.io.stdout(`${this.engine.stringify(value, options.keys) ?? ''}\n`);
                    break;
                case 'format':
                    this.io.stdout(`${this.engine.stringify(value, options.keys, options.indent ?? 2) ?? ''}\n`);
                    break;
            }
            log.debug('command complete', { bytes: text.length });
            return EXIT.OK;
        } catch (err) {
            return this.report(err);
        } finally {
            clearLogContext();
        }
    }

    private report(err: unknown): number {
        if (isJsonEngineFailure(err)) {
            if (isJsonMode()) {
                this.io.stderr(`${this.engine.stringify(err.toStructured())}\n`);
            } else {
                this.io.stderr(`Error: ${err.message}\n`);
            }
            return EXIT.FAILED;
        }
        if (err instanceof Error) {
            log.error('command failed', { name: err.name, message: err.message });
            this.io.stderr(`Error: ${err.message}\n`);
            return EXIT.FAILED;
        }
        throw err;
    }

    private parseOptions(rest: string[]): CliOptions {
        const options: CliOptions = { source: '-', indent: undefined, keys: undefined };
        let sourceSeen = false;

        for (let i = 0; i < rest.length; i++) {
            const arg = rest[i];
            if (arg === '--indent' || arg === '--keys') {
                const next = rest[i + 1];
                if (next === undefined) throw new UsageError(`${arg} requires a value`);
                i++;
                if (arg === '--indent') {
                    options.indent = /^\d+$/.test(next) ? parseInt(next, 10) : next;
                } else {
                    options.keys = next.split(',').filter((k) => k.length > 0);
                }
            } else if (arg.startsWith('--')) {
                throw new UsageError(`Unknown option: ${arg}`);
            } else if (!sourceSeen) {
                options.source = arg;
                sourceSeen = true;
            } else {
                throw new UsageError(`Unexpected argument: ${arg}`);
            }
        }
        return options;
    }

    private usage(): string {
        return `
jsoncore - JSON formatter and validator

USAGE:
  jsoncore <command> [file|-] [options]

COMMANDS:
  format     Pretty-print JSON (default indent: 2)
  minify     Print JSON without insignificant whitespace
  validate   Check that the input is valid JSON
  help       Show this help

OPTIONS:
  --indent <n|string>   Indentation: a width (0-10) or a literal string (max 10 chars)
  --keys <a,b,c>        Only emit these object keys, in this order

EXAMPLES:
  jsoncore format package.json --indent 4
  cat data.json | jsoncore minify --keys id,name
  jsoncore validate config.json
`;
    }
}

// Run CLI
if (require.main === module) {
    const cli = new JsonCoreCLI();
    cli.run(process.argv).then((code) => {
        process.exitCode = code;
    }).catch((err: unknown) => {
        console.error('Fatal error:', err);
        process.exitCode = 1;
    });
}

export { JsonCoreCLI };
