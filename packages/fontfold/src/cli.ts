// fontfold/src/cli.ts
// `fontfold build` command.
//
//   fontfold build [--config path] [--family name]... [--style name]...
//                  [--concurrency n] [--force]
//
// Exit codes: 0 every planned target built and delivered, 1 some target
// failed, 2 configuration or usage error.

import { parseArgs } from 'node:util';
import { DEFAULT_CONFIG_FILE, loadConfig, parseFilter, readEnv } from './lib/config.js';
import type { ConfigOverrides, EnvSettings } from './lib/config.js';
import { ConfigError, errorMessage, toBuildError } from './lib/errors.js';
import type { ArtifactEngine } from './lib/artifact.js';
import { createDefaultFetcher } from './lib/fetcher.js';
import type { Fetcher } from './lib/fetcher.js';
import { parsePositiveInt } from './lib/helpers.js';
import { JsonGlyphEngine } from './lib/json-engine.js';
import { createLogger } from './lib/logger.js';
import { build } from './lib/pipeline.js';
import { formatSummary, summarize, writeErrorReport } from './lib/report.js';

export const EXIT_OK = 0;
export const EXIT_TARGET_FAILED = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: fontfold build [options]

Options:
  -c, --config <path>     Config file (default: ${DEFAULT_CONFIG_FILE}, env FONTFOLD_CONFIG)
  -f, --family <name>     Build only this family; repeatable or comma-separated
  -s, --style <name>      Build only this style; repeatable or comma-separated
  -j, --concurrency <n>   Targets built in parallel (env FONTFOLD_CONCURRENCY)
      --force             Ignore cached entries from earlier builds
  -h, --help              Show this help`;

export interface CliIo {
    env?: NodeJS.ProcessEnv;
    signal?: AbortSignal;
    stdout?: (text: string) => void;
    stderr?: (text: string) => void;
    /** Replace the default artifact engine or fetcher. */
    engine?: ArtifactEngine;
    fetcher?: Fetcher;
}

interface CliArgs {
    help: boolean;
    config?: string;
    families?: string[];
    styles?: string[];
    concurrency?: number;
    force: boolean;
}

function parseCliArgs(argv: readonly string[]): CliArgs {
    const { values, positionals } = parseArgs({
        args: [...argv],
        allowPositionals: true,
        strict: true,
        options: {
            config: { type: 'string', short: 'c' },
            family: { type: 'string', short: 'f', multiple: true },
            style: { type: 'string', short: 's', multiple: true },
            concurrency: { type: 'string', short: 'j' },
            force: { type: 'boolean', default: false },
            help: { type: 'boolean', short: 'h', default: false },
        },
    });

    const help = values.help ?? false;
    if (!help) {
        const [command, ...rest] = positionals;
        if (command !== 'build') {
            throw new ConfigError(command ? `Unknown command "${command}"` : 'Missing command');
        }
        if (rest.length > 0) {
            throw new ConfigError(`Unexpected arguments: ${rest.join(' ')}`);
        }
    }

    let concurrency: number | undefined;
    if (values.concurrency !== undefined) {
        try {
            concurrency = parsePositiveInt(values.concurrency, 1);
        } catch (err) {
            throw new ConfigError(`--concurrency: ${errorMessage(err)}`);
        }
    }

    return {
        help,
        config: values.config,
        families: parseFilter(values.family),
        styles: parseFilter(values.style),
        concurrency,
        force: values.force ?? false,
    };
}

function overridesFrom(args: CliArgs, env: EnvSettings): ConfigOverrides {
    return {
        outputDir: env.outputDir,
        cacheDir: env.cacheDir,
        concurrency: args.concurrency ?? env.concurrency,
    };
}

/**
 * Run the CLI and resolve to its exit code. Never rejects.
 */
export async function runCli(argv: readonly string[], io: CliIo = {}): Promise<number> {
    const stdout = io.stdout ?? ((text: string) => console.log(text));
    const stderr = io.stderr ?? ((text: string) => console.error(text));

    let args: CliArgs;
    let env: EnvSettings;
    try {
        args = parseCliArgs(argv);
        env = readEnv(io.env ?? process.env);
    } catch (err) {
        stderr(errorMessage(err));
        stderr(USAGE);
        return EXIT_USAGE;
    }
    if (args.help) {
        stdout(USAGE);
        return EXIT_OK;
    }

    const logger = createLogger('fontfold', {}, env.logLevel ?? 'info');

    try {
        const config = await loadConfig(args.config ?? env.configPath ?? DEFAULT_CONFIG_FILE, overridesFrom(args, env));
        const outcome = await build(
            config,
            {
                engine: io.engine ?? new JsonGlyphEngine(),
                fetcher: io.fetcher ?? createDefaultFetcher(config.settings.fetch.timeoutMs),
                logger,
            },
            {
                filters: { families: args.families, styles: args.styles },
                refresh: args.force,
                signal: io.signal,
            },
        );

        const summary = summarize(outcome);
        stdout(formatSummary(summary));
        if (!summary.ok) {
            await writeErrorReport(config.settings.reportPath, summary);
            stderr(`Error report written to ${config.settings.reportPath}`);
            return EXIT_TARGET_FAILED;
        }
        return EXIT_OK;
    } catch (err) {
        if (err instanceof ConfigError) {
            stderr(err.message);
            return EXIT_USAGE;
        }
        const error = toBuildError(err);
        logger.error('Build aborted', error, { kind: error.kind });
        return EXIT_TARGET_FAILED;
    }
}
