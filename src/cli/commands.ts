/**
 * CLI Commands Module
 *
 * Commands:
 * - watch: Poll the watch directory and keep the index in sync (default)
 * - sync: Run one sync pass and exit
 * - status: Show tracked documents, index rows and pending changes
 * - search: Query the index with natural language
 * - reset: Delete every row and forget all sync state
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import cliProgress from 'cli-progress';
import * as fs from 'node:fs';
import * as readline from 'node:readline';
import { z } from 'zod';

import { loadConfig, loadDotEnv, describeConfig, type IndexerConfig } from '../storage/config.js';
import { summarizeReport, type SyncReport } from '../engines/synchronizer.js';
import {
  initLogging,
  openServices,
  closeServices,
  runLoggedTick,
  startWatching,
  installSignalHandlers,
  type IndexerServices,
} from '../service.js';
import { retryWithBackoff, defaultRetryPolicy } from '../utils/retry.js';
import { getLogger, flushLogger } from '../utils/logger.js';
import { isIndexerError } from '../errors/index.js';

// ============================================================================
// Types
// ============================================================================

interface CLIOptions {
  json?: boolean;
  verbose?: boolean;
  force?: boolean;
  topK?: number;
  threshold?: number;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_TOP_K = 5;
export const DEFAULT_THRESHOLD = 0.5;

/** Characters of content shown per search hit */
const SNIPPET_LENGTH = 240;

// ============================================================================
// Output Formatters
// ============================================================================

function printHeader(text: string): void {
  console.log('');
  console.log(chalk.cyan.bold(text));
  console.log(chalk.cyan('='.repeat(text.length)));
  console.log('');
}

function printSuccess(text: string): void {
  console.log(chalk.green('  ' + text));
}

function printError(text: string): void {
  console.log(chalk.red('  Error: ' + text));
}

function printWarning(text: string): void {
  console.log(chalk.yellow('  Warning: ' + text));
}

function printInfo(label: string, value: string | number): void {
  console.log(chalk.gray(`  ${label}: `) + chalk.white(String(value)));
}

/**
 * Collapse whitespace and cut to `length` characters
 */
export function formatSnippet(content: string, length: number = SNIPPET_LENGTH): string {
  const flat = content.replace(/\s+/g, ' ').trim();
  return flat.length > length ? `${flat.slice(0, length)}...` : flat;
}

function createProgressBar(format: string): cliProgress.SingleBar {
  return new cliProgress.SingleBar({
    format,
    barCompleteChar: '█',
    barIncompleteChar: '░',
    hideCursor: true,
    clearOnComplete: false,
  }, cliProgress.Presets.shades_classic);
}

function printReport(report: SyncReport): void {
  console.log('');
  console.log(chalk.white('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━'));
  printInfo('Created', report.created.length);
  printInfo('Updated', report.updated.length);
  printInfo('Deleted', report.deleted.length);
  printInfo('Duration', `${report.durationMs}ms`);

  if (report.skipped.length > 0) {
    console.log('');
    printWarning(`${report.skipped.length} documents skipped:`);
    for (const skipped of report.skipped) {
      console.log(chalk.yellow(`    - ${skipped.path}: ${skipped.reason}`));
    }
  }

  if (report.failed.length > 0) {
    console.log('');
    printError(`${report.failed.length} documents failed and will be retried:`);
    for (const failed of report.failed) {
      console.log(chalk.red(`    - ${failed.path} (${failed.operation}): ${failed.message}`));
    }
  }
  console.log('');
}

// ============================================================================
// Shared Setup
// ============================================================================

/**
 * Load `.env` and the configuration, then route logs
 *
 * @param quiet - Keep log lines off the console (file output unaffected)
 */
function prepare(quiet: boolean): IndexerConfig {
  loadDotEnv();
  const config = loadConfig();
  initLogging(config);
  if (quiet) {
    getLogger().setSilentConsole(true);
  }
  return config;
}

async function withServices<T>(
  config: IndexerConfig,
  fn: (services: IndexerServices) => Promise<T>
): Promise<T> {
  const services = await openServices(config);
  try {
    return await fn(services);
  } finally {
    await closeServices(services);
    await flushLogger();
  }
}

// ============================================================================
// Command: watch
// ============================================================================

async function watchCommand(): Promise<void> {
  try {
    const config = prepare(false);
    const services = await openServices(config);
    const handle = await startWatching(services);
    installSignalHandlers(handle);
  } catch (error) {
    handleError(error);
  }
}

// ============================================================================
// Command: sync
// ============================================================================

async function syncCommand(options: CLIOptions): Promise<void> {
  if (options.json) {
    try {
      const config = prepare(true);
      const report = await withServices(config, (services) => runLoggedTick(services.synchronizer));
      console.log(JSON.stringify({ success: report.failed.length === 0, ...report }));
      if (report.failed.length > 0) {
        process.exitCode = 1;
      }
    } catch (error) {
      const message = isIndexerError(error) ? error.userMessage : String(error);
      console.log(JSON.stringify({ success: false, error: message }));
      process.exit(1);
    }
    return;
  }

  printHeader('docs-vector-sync - Sync');

  const spinner = ora('Loading configuration...').start();
  const progress: { bar: cliProgress.SingleBar | null } = { bar: null };

  try {
    const config = prepare(!options.verbose);
    spinner.succeed(`Watch directory: ${chalk.cyan(config.watchDir)}`);

    const report = await withServices(config, async (services) => {
      const result = await runLoggedTick(services.synchronizer, {
        onProgress: (done, total, file) => {
          if (!progress.bar) {
            progress.bar = createProgressBar('  Syncing |{bar}| {percentage}% | {value}/{total} | {file}');
            progress.bar.start(total, 0, { file: '' });
          }
          progress.bar.update(done, { file });
        },
      });
      progress.bar?.stop();
      progress.bar = null;
      return result;
    });

    printReport(report);
    if (report.failed.length > 0) {
      process.exitCode = 1;
    } else {
      printSuccess(`Index in sync: ${summarizeReport(report)}`);
      console.log('');
    }
  } catch (error) {
    progress.bar?.stop();
    spinner.fail('Sync failed');
    handleError(error);
  }
}

// ============================================================================
// Command: status
// ============================================================================

async function statusCommand(options: CLIOptions): Promise<void> {
  const spinner = options.json ? null : ora('Checking index status...').start();

  try {
    const config = prepare(true);
    const status = await withServices(config, async (services) => {
      const changes = await services.synchronizer.detectChanges();
      return {
        watchDir: config.watchDir,
        trackedDocuments: services.state.count(),
        indexRows: await services.store.count(),
        statePath: services.state.path,
        lastStateUpdate: services.state.lastUpdated(),
        pending: {
          created: changes.created.length,
          updated: changes.updated.length,
          deleted: changes.deleted.length,
        },
      };
    });

    if (options.json) {
      console.log(JSON.stringify(status, null, 2));
      return;
    }

    spinner?.succeed('Status collected');
    printHeader('docs-vector-sync - Status');
    printInfo('Watch directory', status.watchDir);
    printInfo('Tracked documents', status.trackedDocuments);
    printInfo('Rows in index', status.indexRows);
    printInfo('State file', status.statePath);
    printInfo('Last state update', status.lastStateUpdate ?? 'never');
    printInfo(
      'Pending changes',
      `${status.pending.created} created, ${status.pending.updated} updated, ${status.pending.deleted} deleted`
    );

    console.log('');
    console.log(chalk.white('  Configuration:'));
    for (const [key, value] of Object.entries(describeConfig(config))) {
      if (value !== undefined) {
        printInfo(`  ${key}`, String(value));
      }
    }
    console.log('');
  } catch (error) {
    spinner?.fail('Status failed');
    if (options.json) {
      const message = isIndexerError(error) ? error.userMessage : String(error);
      console.log(JSON.stringify({ success: false, error: message }));
      process.exit(1);
    }
    handleError(error);
  }
}

// ============================================================================
// Command: search
// ============================================================================

async function searchCommand(query: string, options: CLIOptions): Promise<void> {
  const topK = options.topK ?? DEFAULT_TOP_K;
  const threshold = options.threshold ?? DEFAULT_THRESHOLD;
  const spinner = options.json ? null : ora('Searching...').start();

  try {
    const config = prepare(true);
    const results = await withServices(config, async (services) => {
      const vector = await retryWithBackoff(
        () => services.embedder.embed(query),
        defaultRetryPolicy(config.retry),
        { label: 'embed query' }
      );
      return services.store.match(vector, threshold, topK);
    });

    if (options.json) {
      console.log(JSON.stringify({ query, results }, null, 2));
      return;
    }

    spinner?.succeed(`Found ${results.length} results`);
    console.log('');

    if (results.length === 0) {
      console.log(chalk.yellow('  No documents above the similarity threshold.'));
      console.log('');
      return;
    }

    results.forEach((result, index) => {
      console.log(
        chalk.cyan.bold(`[${index + 1}] ${result.path}`) +
          chalk.yellow(` ${(result.similarity * 100).toFixed(1)}%`)
      );
      console.log(chalk.gray(`    id: ${result.id}`));
      console.log(chalk.dim(`    ${formatSnippet(result.content)}`));
      console.log('');
    });
  } catch (error) {
    spinner?.fail('Search failed');
    if (options.json) {
      const message = isIndexerError(error) ? error.userMessage : String(error);
      console.log(JSON.stringify({ success: false, error: message }));
      process.exit(1);
    }
    handleError(error);
  }
}

// ============================================================================
// Command: reset
// ============================================================================

function promptConfirm(question: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.toLowerCase() === 'y' || answer.toLowerCase() === 'yes');
    });
  });
}

async function resetCommand(options: CLIOptions): Promise<void> {
  printHeader('docs-vector-sync - Reset');

  try {
    const config = prepare(true);

    if (!options.force) {
      console.log(chalk.red.bold(`  Warning: This deletes every row in table "${config.index.table}".`));
      console.log(chalk.red('  The next sync uploads every document again.'));
      console.log('');

      const confirmed = await promptConfirm(chalk.yellow('  Reset index? [y/N]: '));
      if (!confirmed) {
        console.log('');
        console.log(chalk.gray('  Cancelled.'));
        console.log('');
        return;
      }
    }

    const spinner = ora('Clearing index...').start();
    await withServices(config, async (services) => {
      await services.store.clear();
      services.state.clear();
      await services.state.save();
    });
    spinner.succeed('Index and sync state cleared');
    console.log('');
  } catch (error) {
    handleError(error);
  }
}

// ============================================================================
// Error Handling
// ============================================================================

/**
 * Print the error and exit with code 1
 */
function handleError(error: unknown): void {
  console.log('');

  if (isIndexerError(error)) {
    printError(error.userMessage);
    if (process.env.DEBUG) {
      console.log(chalk.gray('  Developer: ' + error.developerMessage));
    }
  } else if (error instanceof Error) {
    printError(error.message);
    if (process.env.DEBUG) {
      console.log(chalk.gray('  Stack: ' + error.stack));
    }
  } else {
    printError(String(error));
  }

  console.log('');
  console.log(chalk.gray('  For more details, run with DEBUG=1 environment variable'));
  console.log('');

  process.exit(1);
}

// ============================================================================
// CLI Program
// ============================================================================

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError(`Not a number: ${value}`);
  }
  return parsed;
}

function parseNumber(value: string): number {
  const parsed = Number.parseFloat(value);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError(`Not a number: ${value}`);
  }
  return parsed;
}

export function createCLI(): Command {
  const program = new Command();

  program
    .name('docs-vector-sync')
    .description('Keep a vector index in sync with a directory of documents')
    .version(getVersion(), '-v, --version', 'Show version number');

  program
    .command('watch', { isDefault: true })
    .description('Poll the watch directory and sync changes until stopped')
    .action(watchCommand);

  program
    .command('sync')
    .description('Run one sync pass and exit')
    .option('--json', 'Output the report as JSON')
    .option('--verbose', 'Show detailed logging output')
    .action(syncCommand);

  program
    .command('status')
    .description('Show tracked documents, index rows and pending changes')
    .option('--json', 'Output results as JSON')
    .action(statusCommand);

  program
    .command('search <query>')
    .description('Search indexed documents with a natural language query')
    .option('-k, --top-k <number>', `Number of results to return (default: ${DEFAULT_TOP_K})`, parseInteger)
    .option('-t, --threshold <number>', `Minimum similarity (default: ${DEFAULT_THRESHOLD})`, parseNumber)
    .option('--json', 'Output results as JSON')
    .action(searchCommand);

  program
    .command('reset')
    .description('Delete every row in the index and clear the sync state')
    .option('-f, --force', 'Skip confirmation prompt')
    .action(resetCommand);

  return program;
}

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  try {
    const packageJsonPath = new URL('../../package.json', import.meta.url);
    const parsed = PackageJsonSchema.safeParse(JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch (error) {
    getLogger().debug('cli', 'Could not read package version', {
      error: error instanceof Error ? error.message : String(error),
    });
    return '0.0.0';
  }
}

export async function runCLI(args: string[]): Promise<void> {
  const program = createCLI();
  await program.parseAsync(args, { from: 'node' });
}
