import { Option } from 'commander';
import type { Command } from 'commander';
import { stringify as stringifyYaml } from 'yaml';

import { loadOptionsSchema } from '../schema/index.js';
import type { ExtrinsicConfig, LoadOptions } from '../schema/index.js';
import {
  isConfigError,
  serializeExtrinsicConfig,
  toExtrinsicDocument,
} from '../core/index.js';
import { EXIT_CODES } from '../config/defaults.js';
import { loadEnvOptions, mergeLoadOptions } from '../config/env.js';
import { loadExtrinsicFile } from '../config/loader.js';
import { generateJSON, generateMarkdown, serializeJSON } from '../report/reporter.js';
import type { LoadOutcome } from '../report/reporter.js';
import * as log from '../utils/logger.js';

// ── Shared option handling ───────────────────────────────────

function resolveLoadOptions(allowSource: string[] | undefined): LoadOptions {
  return loadOptionsSchema.parse(
    mergeLoadOptions(loadEnvOptions(), { extraSources: allowSource ?? [] }),
  );
}

function exitCodeFor(err: unknown): number {
  return isConfigError(err) ? err.exitCode : EXIT_CODES.FAILURE;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ── Validate command ─────────────────────────────────────────

export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Validate one or more extrinsic hint configuration files')
    .argument('<files...>', 'Configuration files (.cfg text, .json or .yaml)')
    .option('--json', 'Output a JSON report to stdout')
    .option('--allow-source <codes...>', 'Accept additional evidence source codes')
    .action(
      async (
        files: string[],
        opts: {
          json?: true;
          allowSource?: string[];
        },
      ) => {
        let options: LoadOptions;
        try {
          options = resolveLoadOptions(opts.allowSource);
        } catch (err) {
          log.error(`Invalid options: ${describeError(err)}`);
          process.exitCode = EXIT_CODES.FAILURE;
          return;
        }

        const outcomes: LoadOutcome[] = [];
        let worstExitCode: number = EXIT_CODES.VALID;

        for (const file of files) {
          try {
            const config = await loadExtrinsicFile(file, options);
            outcomes.push({ file, ok: true, config });
            log.valid(file, config.sources.length, config.features.length);
          } catch (err) {
            outcomes.push({ file, ok: false, error: err });
            if (isConfigError(err)) {
              log.invalid(file, err.kind, err.message);
            } else {
              log.error(`${file}: ${describeError(err)}`);
            }
            worstExitCode = Math.max(worstExitCode, exitCodeFor(err));
          }
        }

        if (opts.json) {
          process.stdout.write(serializeJSON(generateJSON(outcomes, worstExitCode)) + '\n');
        }

        process.exitCode = worstExitCode;
      },
    );
}

// ── Show command ─────────────────────────────────────────────

export type ShowFormat = 'cfg' | 'json' | 'yaml' | 'markdown';

export function registerShowCommand(program: Command): void {
  program
    .command('show')
    .description('Load a configuration and print it in normalized form')
    .argument('<file>', 'Configuration file (.cfg text, .json or .yaml)')
    .addOption(
      new Option('--format <format>', 'Output format')
        .choices(['cfg', 'json', 'yaml', 'markdown'])
        .default('cfg'),
    )
    .option('--allow-source <codes...>', 'Accept additional evidence source codes')
    .action(
      async (
        file: string,
        opts: {
          format: ShowFormat;
          allowSource?: string[];
        },
      ) => {
        try {
          const config = await loadExtrinsicFile(file, resolveLoadOptions(opts.allowSource));
          process.stdout.write(renderConfig(config, opts.format));
        } catch (err) {
          if (isConfigError(err)) {
            log.invalid(file, err.kind, err.message);
          } else {
            log.error(`${file}: ${describeError(err)}`);
          }
          process.exitCode = exitCodeFor(err);
        }
      },
    );
}

export function renderConfig(config: ExtrinsicConfig, format: ShowFormat): string {
  switch (format) {
    case 'cfg':
      return serializeExtrinsicConfig(config);
    case 'json':
      // Key order carries the source order, so no sorted serialization here.
      return JSON.stringify(toExtrinsicDocument(config), null, 2) + '\n';
    case 'yaml':
      return stringifyYaml(toExtrinsicDocument(config));
    case 'markdown':
      return generateMarkdown(config) + '\n';
  }
}
