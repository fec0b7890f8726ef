#!/usr/bin/env node
/**
 * drive-text-merge: sync a Google Drive folder into a few merged text files
 *
 * Each run lists the folder, re-extracts only new or changed documents,
 * and re-packs every active document into <folder>_partN.md files.
 */

import 'dotenv/config';
import { readFileSync, realpathSync } from 'node:fs';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadConfig, type AppConfig } from './config/env.js';
import { DriveClient, type DriveClientOptions } from './drive/drive-client.js';
import { SyncError } from './errors/index.js';
import { DocumentTextExtractor } from './extract/text-extractor.js';
import { MetricsCollector } from './monitoring/metrics.js';
import { createDriveLimiter } from './monitoring/rate-limiter.js';
import { createFileWorkspaceFactory } from './sync/folder-workspace.js';
import { SyncOrchestrator } from './sync/sync-orchestrator.js';
import type { SyncReport } from './types/index.js';
import { checkForUpdate } from './update/update-check.js';
import { formatBytes, formatDuration, formatNumber } from './utils/format.js';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_USAGE = 2;

/**
 * Parsed command line
 */
export interface CliOptions {
  folderUrl?: string;
  /** Overrides OUTPUT_DIR */
  outputDir?: string;
  skipUpdateCheck: boolean;
  help: boolean;
  version: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `Usage: drive-text-merge <folder-url> [options]

Merge the documents of a Google Drive folder into text files of at most
200 MiB / 450,000 words each. Only new or changed documents are downloaded.

Arguments:
  <folder-url>          Drive folder, shared drive or file URL (or a bare id)

Options:
  -o, --output <dir>    Output root directory (default: OUTPUT_DIR or synced_content)
  --skip-update-check   Do not look for a newer release
  -h, --help            Show this help
  -v, --version         Show version number

Credentials come from GOOGLE_SERVICE_ACCOUNT_JSON or GOOGLE_APPLICATION_CREDENTIALS.`;

export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { skipUpdateCheck: false, help: false, version: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg === '--version' || arg === '-v') {
      options.version = true;
    } else if (arg === '--skip-update-check') {
      options.skipUpdateCheck = true;
    } else if (arg === '--output' || arg === '-o') {
      const dir = argv[++i];
      if (!dir || dir.startsWith('-')) {
        throw new UsageError(`${arg} requires a directory`);
      }
      options.outputDir = dir;
    } else if (arg.startsWith('--output=')) {
      const dir = arg.slice('--output='.length);
      if (!dir) {
        throw new UsageError('--output requires a directory');
      }
      options.outputDir = dir;
    } else if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else if (options.folderUrl === undefined) {
      options.folderUrl = arg;
    } else {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
  }

  return options;
}

export function readVersion(): string {
  const packageJson: unknown = JSON.parse(
    readFileSync(new URL('../package.json', import.meta.url), 'utf8')
  );
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return '0.0.0';
}

export function formatReport(report: SyncReport): string {
  const lines = [
    `Folder: ${report.folderName} (${report.folderId})`,
    `Output: ${report.outputDir}`,
    `Changes: ${formatNumber(report.added)} added, ${formatNumber(report.modified)} modified, ` +
      `${formatNumber(report.deleted)} deleted, ${formatNumber(report.unchanged)} unchanged`,
    `Unsupported: ${formatNumber(report.unsupported)}, failed: ${formatNumber(report.failed)}`,
    `Documents: ${formatNumber(report.activeDocuments)} in ${report.chunkFiles.length} file(s), ` +
      `${formatNumber(report.totalWords)} words, ${formatBytes(report.totalBytes)}`,
    `Downloaded: ${formatBytes(report.downloadedBytes)} in ${formatDuration(report.duration)}`,
  ];

  for (const file of report.chunkFiles) {
    lines.push(`  ${file}`);
  }
  if (report.errors.length > 0) {
    lines.push('Errors:');
    for (const message of report.errors) {
      lines.push(`  - ${message}`);
    }
  }

  return lines.join('\n');
}

async function createDriveClient(config: AppConfig, metrics: MetricsCollector): Promise<DriveClient> {
  const options: DriveClientOptions = {
    retry: config.retry,
    limiter: createDriveLimiter(config.driveRequestsPer100s),
    metrics,
  };

  const { credentials } = config;
  return credentials.kind === 'json'
    ? DriveClient.fromJSON(credentials.json, credentials.subject, options)
    : DriveClient.fromKeyFile(credentials.path, credentials.subject, options);
}

/**
 * Run the CLI and return its exit code
 */
export async function main(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(error.message);
      console.error(USAGE);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (options.help) {
    console.log(USAGE);
    return EXIT_OK;
  }
  if (options.version) {
    console.log(`drive-text-merge v${readVersion()}`);
    return EXIT_OK;
  }
  if (!options.folderUrl) {
    console.error('Missing <folder-url>');
    console.error(USAGE);
    return EXIT_USAGE;
  }

  try {
    const config = loadConfig(env);

    if (!options.skipUpdateCheck && config.updateCheckUrl) {
      await checkForUpdate(readVersion(), config.updateCheckUrl);
    }

    const metrics = new MetricsCollector();
    const orchestrator = new SyncOrchestrator(
      await createDriveClient(config, metrics),
      new DocumentTextExtractor(),
      createFileWorkspaceFactory(resolve(options.outputDir ?? config.outputDir)),
      { limits: config.limits },
      { metrics }
    );

    const report = await orchestrator.run(options.folderUrl);
    console.log(formatReport(report));
    return EXIT_OK;
  } catch (error) {
    if (error instanceof SyncError) {
      console.error(`Sync aborted: ${error.message}`);
    } else {
      console.error('Sync aborted:', error);
    }
    return EXIT_FATAL;
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (script === undefined) return false;
  try {
    // npm links the bin, so compare real paths
    return realpathSync(script) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main(process.argv.slice(2)).then(
    code => process.exit(code),
    error => {
      console.error(error);
      process.exit(EXIT_FATAL);
    }
  );
}
