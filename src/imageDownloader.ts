#!/usr/bin/env node

import fs from 'fs/promises';
import chalk from 'chalk';
import ora from 'ora';
import { USAGE, buildConfig, parseArgs } from './catalog/config.js';
import { ConfigError } from './catalog/errors.js';
import { createHttpCollaborators, runImageSync } from './catalog/runner.js';
import type { RunReport } from './catalog/runner.js';
import type { SyncConfig } from './catalog/types.js';
import { loadDotEnv } from './env.js';
import { createConsoleLogger } from './logger.js';
import type { Logger } from './logger.js';

const MAX_LISTED_FAILURES = 10;

function printSummary(report: RunReport, config: Readonly<SyncConfig>, logger: Logger): void {
  const { summary } = report;
  const line = '='.repeat(60);
  logger.info(`\n${line}`);
  if (!report.ok) {
    logger.error(chalk.bold('Catalog fetch failed: no images were downloaded'));
    logger.error(`  ${report.error.message}`);
    logger.info(line);
    return;
  }

  logger.info(chalk.bold('Download complete'));
  logger.info(line);
  logger.info(`Catalog records:    ${summary.records}`);
  logger.info(`Without images:     ${summary.skipped}`);
  if (summary.invalid > 0) {
    logger.info(chalk.yellow(`Invalid entries:    ${summary.invalid}`));
  }
  logger.info(`Candidates:         ${summary.candidates}`);
  if (summary.superseded > 0) {
    logger.info(chalk.yellow(`Duplicate codes:    ${summary.superseded}`));
  }
  logger.info(chalk.green(`✅ Success:          ${summary.succeeded}/${summary.candidates}`));
  if (summary.existing > 0) {
    logger.info(chalk.cyan(`Already on disk:    ${summary.existing}`));
  }
  const failedText = `❌ Failed:           ${summary.failed}/${summary.candidates}`;
  logger.info(summary.failed > 0 ? chalk.red(failedText) : failedText);
  if (summary.cancelled > 0) {
    logger.info(chalk.yellow(`Not started:        ${summary.cancelled}`));
  }
  logger.info(chalk.dim(`Output directory:   ${config.outputDir}`));

  if (summary.failures.length > 0) {
    logger.info(chalk.bold('\nFailures:'));
    for (const failure of summary.failures.slice(0, MAX_LISTED_FAILURES)) {
      logger.info(chalk.red(`  ${failure.externalCode}: ${failure.reason}`));
    }
    if (summary.failures.length > MAX_LISTED_FAILURES) {
      logger.info(chalk.dim(`  ... and ${summary.failures.length - MAX_LISTED_FAILURES} more`));
    }
  }
  logger.info(line);
}

async function run(): Promise<void> {
  await loadDotEnv();
  const argv = process.argv.slice(2);
  if (parseArgs(argv).help) {
    createConsoleLogger().info(USAGE);
    return;
  }

  const config = buildConfig(process.env, argv);
  const logger = createConsoleLogger({ verbose: config.verbose });
  await fs.mkdir(config.outputDir, { recursive: true });

  const controller = new AbortController();
  let interrupts = 0;
  process.on('SIGINT', () => {
    interrupts += 1;
    if (interrupts > 1) {
      process.exit(130);
    }
    logger.warn('\nInterrupted: letting in-flight downloads finish (press Ctrl+C again to quit now)');
    controller.abort();
  });

  logger.info(chalk.bold.cyan('Product Image Downloader'));
  logger.debug(`API: ${config.apiBaseUrl} | size ${config.preferredSize}px | ${config.concurrency} workers`);

  const useProgressBar = Boolean(process.stdout.isTTY) && !config.verbose;
  const spinner = ora({ text: 'Fetching catalog...', color: 'cyan', isEnabled: useProgressBar }).start();

  const renderProgress = (done: number, total: number, ok: number, fail: number) => {
    const width = 30;
    const ratio = total === 0 ? 0 : done / total;
    const filled = Math.round(ratio * width);
    const bar = `${'█'.repeat(filled)}${'░'.repeat(width - filled)}`;
    process.stdout.write(`\rProgress ${done}/${total} [${bar}] ok ${ok} fail ${fail}`);
  };

  let succeeded = 0;
  let failed = 0;
  const report = await runImageSync({
    config,
    ...createHttpCollaborators(config),
    logger,
    signal: controller.signal,
    onPage: ({ page, totalRecords }) => {
      spinner.text = `Fetching catalog... page ${page} (${totalRecords} products)`;
      logger.debug(`Fetched page ${page} (${totalRecords} products so far)`);
    },
    onCatalogReady: ({ records, candidates, skipped }) => {
      spinner.succeed(`Catalog loaded: ${records} products, ${candidates} with images, ${skipped} without`);
      logger.info(chalk.dim(`Downloading with ${config.concurrency} parallel workers into ${config.outputDir}`));
    },
    onResult: (result, done, total) => {
      if (result.status === 'failure') {
        failed += 1;
      } else {
        succeeded += 1;
      }
      const due = done === total || (config.progressEvery > 0 && done % config.progressEvery === 0);
      if (!due) {
        return;
      }
      if (useProgressBar) {
        renderProgress(done, total, succeeded, failed);
        if (done === total) {
          process.stdout.write('\n');
        }
      } else {
        logger.info(`Progress: ${done}/${total} (ok ${succeeded}, fail ${failed})`);
      }
    }
  });

  if (!report.ok) {
    spinner.fail('Catalog fetch failed');
  }
  printSummary(report, config, logger);
  if (!report.ok || report.summary.cancelled > 0) {
    process.exitCode = 1;
  }
}

run().catch(error => {
  const logger = createConsoleLogger();
  if (error instanceof ConfigError) {
    logger.error(error.message);
    logger.info(`\n${USAGE}`);
  } else {
    logger.error(`Image download failed: ${error instanceof Error ? (error.stack ?? error.message) : String(error)}`);
  }
  process.exitCode = 1;
});
