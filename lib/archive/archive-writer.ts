import * as fs from 'fs';
import * as path from 'path';
import type { ArticleRef, SuccessfulScrape, WriteMode } from '../types';
import { PersistenceError, toError } from '../errors';
import { createLogger, type Logger, type LoggerOptions } from '../logger';
import { parseArchive } from './archive-index';

export interface ArchiveWriterConfig {
  archivePath: string;
  /** Heading of a rebuilt archive */
  title: string;
  /** Full listing URL credited in the preamble */
  listingUrl: string;
  logger?: LoggerOptions;
}

export interface WriteReport {
  mode: WriteMode;
  written: number;
  /**
   * Appended slugs whose source URL was already in the archive. Append mode
   * reports this drift between ledger and archive but does not repair it.
   */
  duplicated: string[];
}

export function formatSection(result: SuccessfulScrape): string {
  const source = result.date ? `*Source: ${result.url} | ${result.date}*` : `*Source: ${result.url}*`;
  return `## ${result.title}\n\n${source}\n\n${result.markdown}\n\n---\n\n`;
}

/**
 * Sole writer of the archive document. Sections always follow listing order,
 * whatever order the scrapes finished in.
 */
export class ArchiveWriter {
  private readonly archivePath: string;
  private readonly title: string;
  private readonly listingUrl: string;
  private readonly log: Logger;

  constructor(config: ArchiveWriterConfig) {
    this.archivePath = config.archivePath;
    this.title = config.title;
    this.listingUrl = config.listingUrl;
    this.log = createLogger('Archive', config.logger);
  }

  get filePath(): string {
    return this.archivePath;
  }

  exists(): boolean {
    return fs.existsSync(this.archivePath);
  }

  /** Rebuild when forced or when there is no archive to append to */
  resolveWriteMode(force: boolean): WriteMode {
    return force || !this.exists() ? 'rebuild' : 'append';
  }

  header(): string {
    const display = this.listingUrl.replace(/^https?:\/\//, '');
    return `# ${this.title}\n\n*Articles from [${display}](${this.listingUrl})*\n\n---\n\n`;
  }

  /**
   * Emit one section per ref present in `resultsBySlug`, in listing order.
   * Throws PersistenceError when the file cannot be written.
   */
  write(mode: WriteMode, refs: ArticleRef[], resultsBySlug: ReadonlyMap<string, SuccessfulScrape>): WriteReport {
    const sections: SuccessfulScrape[] = [];
    for (const ref of refs) {
      const result = resultsBySlug.get(ref.slug);
      if (result) sections.push(result);
    }

    const body = sections.map(formatSection).join('');

    try {
      if (mode === 'rebuild') {
        this.replaceFile(this.header() + body);
        this.log.info(`📝 Archive rebuilt with ${sections.length} articles: ${this.archivePath}`);
        return { mode, written: sections.length, duplicated: [] };
      }

      if (!this.exists()) {
        throw new Error('archive file does not exist');
      }

      const duplicated = this.findAlreadyArchived(sections);
      if (duplicated.length > 0) {
        this.log.warn(
          `${duplicated.length} appended article(s) already have a section in the archive: ${duplicated.join(', ')}. ` +
          `Run with --force to rebuild.`
        );
      }

      fs.appendFileSync(this.archivePath, body, 'utf-8');
      this.log.info(`📝 ${sections.length} new articles appended to ${this.archivePath}`);
      return { mode, written: sections.length, duplicated };
    } catch (error) {
      throw new PersistenceError(`could not write archive: ${toError(error).message}`, {
        path: this.archivePath,
        target: 'archive',
        cause: toError(error),
      });
    }
  }

  private replaceFile(content: string): void {
    const tempPath = `${this.archivePath}.tmp`;
    fs.mkdirSync(path.dirname(this.archivePath), { recursive: true });
    fs.writeFileSync(tempPath, content, 'utf-8');
    fs.renameSync(tempPath, this.archivePath);
  }

  private findAlreadyArchived(sections: SuccessfulScrape[]): string[] {
    if (sections.length === 0) return [];

    const archivedUrls = new Set(parseArchive(fs.readFileSync(this.archivePath, 'utf-8')).map(entry => entry.url));
    return sections.filter(section => archivedUrls.has(section.url)).map(section => section.slug);
  }
}
