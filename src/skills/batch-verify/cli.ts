#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig, exitOnConfigError, type Config } from '../../config/index.js';
import { applyLogLevel, logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { VerificationPipeline } from '../../services/pipeline/VerificationPipeline.js';
import { BatchVerifier } from './index.js';
import { CliArgsError, parseArgs, type CliArgs } from './args.js';
import { ProgressReporter, formatStatus } from './reporters/ProgressReporter.js';
import type { BatchConfig, BatchResult } from './types.js';

const HELP = `
Batch Document Verification - Classify and verify property documents in a folder

Usage:
  npm run batch-verify -- --folder <path> [options]

Options:
  --folder <path>      Folder containing PDF, PNG or JPEG documents (required)
  --type <type>        Treat every file as this type: rent_agreement, title_deed or noc
                       (default: classify from the file name)
  --format <fmt>       Output format: table or json (default: table)
  --concurrency <n>    Max documents verified at once (default: PIPELINE_CONCURRENCY)
  --help               Show this help message

Examples:
  npm run batch-verify -- --folder ./documents
  npm run batch-verify -- --folder ./leases --type rent_agreement
  npm run batch-verify -- --folder ./documents --format json --concurrency 2
`;

const printTable = (result: BatchResult, colored: boolean) => {
  const maxName = Math.max(20, ...result.files.map(f => f.name.length));
  const header = `${'File'.padEnd(maxName)} | Type           | Status              | Complete | Risks`;
  const separator = '-'.repeat(header.length);

  console.log(separator);
  console.log(header);
  console.log(separator);

  for (const v of result.verified) {
    const status = formatStatus(v.status, colored);
    const padding = ' '.repeat(Math.max(0, 19 - `x ${v.status}`.length));
    console.log(
      `${v.fileName.padEnd(maxName)} | ${v.documentType.padEnd(14)} | ${status}${padding} | ${v.completeness.toFixed(2).padStart(8)} | ${v.risks}`
    );
  }
  for (const f of result.files.filter(file => file.skip)) {
    console.log(`${f.name.padEnd(maxName)} | ${'-'.padEnd(14)} | skipped (${f.skipReason ?? 'unknown'})`);
  }
  console.log(separator);
};

const printSummary = (result: BatchResult) => {
  const { summary } = result;
  console.log('\nSummary:');
  console.log(`  Total:     ${summary.total}`);
  console.log(`  Succeeded: ${summary.succeeded}`);
  console.log(`  Partial:   ${summary.partial}`);
  console.log(`  Failed:    ${summary.failed}`);
  console.log(`  Skipped:   ${summary.skipped}`);
  console.log('\nBy Type:');
  for (const [type, count] of Object.entries(summary.byType)) {
    console.log(`  ${type}: ${count}`);
  }
  for (const v of result.verified.filter(item => item.failure)) {
    console.log(`\n  ${v.fileName}: ${v.failure} - ${v.record.failure?.message ?? ''}`);
  }
};

const main = async (): Promise<void> => {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliArgsError) {
      console.error(`Error: ${error.message}`);
      console.log(HELP);
      process.exit(1);
    }
    throw error;
  }

  if (args.help) {
    console.log(HELP);
    process.exit(0);
  }

  if (!args.folder) {
    console.error('Error: --folder is required');
    console.log(HELP);
    process.exit(1);
  }

  let appConfig: Config;
  try {
    appConfig = loadConfig();
  } catch (error) {
    exitOnConfigError(error);
  }
  applyLogLevel(appConfig.server.logLevel);

  const config: BatchConfig = {
    folder: args.folder,
    documentType: args.documentType,
    format: args.format ?? 'table',
    concurrency: args.concurrency ?? appConfig.pipeline.concurrency,
  };

  const pipeline = VerificationPipeline.fromConfig({
    ...appConfig,
    pipeline: { ...appConfig.pipeline, concurrency: config.concurrency },
  });
  const colored = Boolean(process.stdout.isTTY) && config.format !== 'json';
  const verifier = new BatchVerifier(pipeline);

  logger.info({ folder: config.folder, documentType: config.documentType }, 'Starting batch verification');

  const result = await verifier.run(config, new ProgressReporter(colored));

  if (config.format === 'json') {
    console.log(JSON.stringify(result, null, 2));
  } else {
    console.log(`\nVerification Results (${result.files.length} files):\n`);
    printTable(result, colored);
    printSummary(result);
  }
};

main().catch(error => {
  logger.error({ error: errorMessage(error) }, 'Batch verification failed');
  console.error('Error:', errorMessage(error));
  process.exit(1);
});
