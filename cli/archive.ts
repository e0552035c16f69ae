#!/usr/bin/env npx tsx
/**
 * Blog Archive CLI
 *
 * Discover every article on the configured blog listing and keep a Markdown
 * archive of them current. Incremental by default: only articles missing
 * from the checkpoint are fetched.
 *
 * Usage:
 *   npx tsx cli/archive.ts [options]
 *   npx tsx cli/archive.ts --force
 *   npx tsx cli/archive.ts --check
 *
 * Options:
 *   --force, -f      Re-scrape all articles and rebuild the archive
 *   --output, -o     Output directory (default: output)
 *   --workers, -w    Concurrent article fetches (default: 10)
 *   --quiet, -q      Suppress progress messages
 *   --check          Report whether the archive is stale and exit
 *   --help, -h       Show this help message
 *
 * Site and file names come from ARCHIVER_* environment variables
 * (ARCHIVER_SITE_ORIGIN, ARCHIVER_LISTING_PATH, ARCHIVER_TITLE, ...).
 */

import { pathToFileURL } from 'url';
import {
  archivePath,
  checkpointPath,
  listingUrl,
  resolveConfig,
  type ArchiverConfigInput
} from '../lib/config';
import { runArchive } from '../lib/archiver';
import { FileCheckpointStore } from '../lib/checkpoint';
import { ArchiveWriter } from '../lib/archive/archive-writer';
import { isArchiveStale, mostRecentPostDate } from '../lib/archive/archive-index';
import { describeError } from '../lib/errors';

// ============================================================================
// Argument Parsing
// ============================================================================

export interface CliArgs {
  force: boolean;
  output?: string;
  workers?: number;
  quiet: boolean;
  check: boolean;
  help: boolean;
}

export function parseArgs(argv: string[]): CliArgs {
  const args = argv.slice(2);
  const result: CliArgs = {
    force: false,
    output: undefined,
    workers: undefined,
    quiet: false,
    check: false,
    help: false,
  };

  const valueFor = (flag: string, index: number): string => {
    const value = args[index];
    if (value === undefined || value.startsWith('-')) {
      throw new Error(`Missing value for ${flag}`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--force':
      case '-f':
        result.force = true;
        break;
      case '--output':
      case '-o':
        result.output = valueFor(arg, ++i);
        break;
      case '--workers':
      case '-w':
        result.workers = Number(valueFor(arg, ++i));
        break;
      case '--quiet':
      case '-q':
        result.quiet = true;
        break;
      case '--check':
        result.check = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return result;
}

function showHelp() {
  console.log(`
Blog Archive CLI

Usage:
  npx tsx cli/archive.ts [options]

Examples:
  npx tsx cli/archive.ts                  # Fetch new articles, append to archive
  npx tsx cli/archive.ts --force          # Re-scrape everything, rebuild archive
  npx tsx cli/archive.ts -o ./data -w 4   # Custom output dir, 4 workers
  npx tsx cli/archive.ts --check          # Is the archive older than a week?

Options:
  -f, --force           Re-scrape all articles and rebuild the archive
  -o, --output <dir>    Output directory (default: output)
  -w, --workers <n>     Concurrent article fetches (default: 10)
  -q, --quiet           Suppress progress messages
  --check               Report whether the archive is stale and exit
  -h, --help            Show this help message

Environment:
  ARCHIVER_SITE_ORIGIN, ARCHIVER_LISTING_PATH, ARCHIVER_OUTPUT_DIR,
  ARCHIVER_ARCHIVE_FILE, ARCHIVER_CHECKPOINT_FILE, ARCHIVER_TITLE,
  ARCHIVER_VENDOR_NAME, ARCHIVER_USER_AGENT, ARCHIVER_WORKERS,
  ARCHIVER_TIMEOUT_MS, ARCHIVER_MAX_PAGES
`);
}

// ============================================================================
// Main
// ============================================================================

export async function main(argv: string[] = process.argv): Promise<number> {
  const args = parseArgs(argv);

  if (args.help) {
    showHelp();
    return 0;
  }

  const overrides: ArchiverConfigInput = {};
  if (args.output) overrides.outputDir = args.output;
  if (args.workers !== undefined) overrides.workers = args.workers;

  const config = resolveConfig(overrides);
  const logger = { quiet: args.quiet };

  if (args.check) {
    const writer = new ArchiveWriter({
      archivePath: archivePath(config),
      title: config.archiveTitle,
      listingUrl: listingUrl(config),
      logger,
    });
    const ledger = await new FileCheckpointStore(checkpointPath(config), { logger }).load();
    const stale = isArchiveStale({ archiveExists: writer.exists(), ledger });
    const newest = mostRecentPostDate(ledger);

    console.log(
      `${stale ? 'stale' : 'fresh'}: newest article ${newest ? newest.toISOString().slice(0, 10) : 'unknown'}`
    );
    return 0;
  }

  await runArchive({ config, force: args.force, logger });
  return 0;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().then(
    code => process.exit(code),
    error => {
      console.error(`Fatal error: ${describeError(error)}`);
      process.exit(1);
    }
  );
}
