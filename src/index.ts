#!/usr/bin/env node
/**
 * docs-vector-sync - Entry Point
 *
 * Keeps a vector index in sync with a directory of text documents.
 *
 * Usage:
 *   docs-vector-sync                      # Watch and sync until stopped
 *   docs-vector-sync sync                 # One pass, then exit
 *   docs-vector-sync status               # Tracked documents and pending changes
 *   docs-vector-sync search "query"       # Query the index
 *   docs-vector-sync reset --force        # Empty the index and sync state
 *   docs-vector-sync --help               # Show help
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';

// Early crash logging - write to file before any other imports that might fail
function logCrash(error: unknown): void {
  try {
    const logDir = path.join(os.homedir(), '.docs-vector-sync', 'logs');
    fs.mkdirSync(logDir, { recursive: true });
    const timestamp = new Date().toISOString();
    const errorMsg = error instanceof Error ? `${error.message}\n${error.stack}` : String(error);
    fs.appendFileSync(
      path.join(logDir, 'crash.log'),
      `[${timestamp}] [ERROR] [startup] Process crashed: ${errorMsg}\n`
    );
  } catch (logError) {
    console.error('Could not write crash log:', logError);
  }
  console.error('docs-vector-sync crashed:', error);
}

process.on('uncaughtException', (error) => {
  logCrash(error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logCrash(reason instanceof Error ? reason : new Error(String(reason)));
  process.exit(1);
});

async function main(): Promise<void> {
  const { runCLI } = await import('./cli/commands.js');
  await runCLI(process.argv);
}

main().catch((error: unknown) => {
  logCrash(error);
  process.exit(1);
});
