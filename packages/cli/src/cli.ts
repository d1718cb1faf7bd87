#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   relecov-mapper map --lab <metadata.xlsx|json> --out <dir> [--bioinfo <folder>]
 *                      [--targets relecov,ena,gisaid] [--institution <name>] [--config <run.json>]
 *   relecov-mapper check-config [--config <run.json>]
 */

import { resolve } from 'node:path';
import { Logger, MappingError } from '@relecov-mapper/core';
import { option, parseTargets } from './args.js';
import { loadRunConfig, resolvePaths, type LoadedRunConfig } from './config.js';
import { runCheckConfig, runMapCommand } from './run.js';

const USAGE = [
  'Usage:',
  '  relecov-mapper map --lab <metadata.xlsx|metadata.json> --out <dir> [--bioinfo <folder>]',
  '                     [--targets relecov,ena,gisaid] [--institution <name>] [--config <run.json>]',
  '  relecov-mapper check-config [--config <run.json>]',
  '',
  'Example run.json:',
  JSON.stringify(
    {
      configurationPath: './conf/configuration.json',
      referenceDir: '${RELECOV_REFERENCE_DIR:-./conf/reference}',
      concurrency: 4,
      logging: { level: 'info', format: 'text' },
    },
    null,
    2
  ),
].join('\n');

async function main(): Promise<void> {
  let logger = new Logger();
  const args = process.argv.slice(2);
  const command = args[0];

  if (command !== 'map' && command !== 'check-config') {
    console.error(USAGE);
    process.exit(1);
  }

  try {
    const configPath = option(args, '--config');
    const loaded: LoadedRunConfig = configPath
      ? await loadRunConfig(configPath)
      : { config: {}, baseDir: process.cwd() };
    const { config } = loaded;
    logger = new Logger({ level: config.logging?.level, format: config.logging?.format });
    const paths = resolvePaths(config, loaded.baseDir);

    if (command === 'check-config') {
      const result = await runCheckConfig(paths, logger);
      for (const message of result.messages) console.log(message);
      process.exit(result.ok ? 0 : 1);
    }

    const labPath = option(args, '--lab');
    const outDir = option(args, '--out');
    if (!labPath || !outDir) {
      console.error(USAGE);
      process.exit(1);
    }

    const bioinfoDir = option(args, '--bioinfo');
    const result = await runMapCommand({
      labPath: resolve(process.cwd(), labPath),
      outDir: resolve(process.cwd(), outDir),
      bioinfoDir: bioinfoDir ? resolve(process.cwd(), bioinfoDir) : undefined,
      targets: parseTargets(option(args, '--targets')) ?? config.targets,
      institution: option(args, '--institution'),
      concurrency: config.concurrency,
      paths,
      logger,
    });

    const { summary } = result.report;
    console.log(`Processed ${summary.total} records: ${summary.succeeded} succeeded, ${summary.failed} failed`);
    for (const file of result.files) console.log(`  ${file}`);
    process.exit(result.exitCode);
  } catch (error) {
    if (error instanceof MappingError) {
      console.error(error.toActionableMessage());
    }
    logger.error('Run failed', { error });
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
