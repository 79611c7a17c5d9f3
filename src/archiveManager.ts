import fs from 'fs/promises';
import path from 'path';
import { parseDateFolderName } from './batchFiles.js';
import { DestinationUnwritableError, errnoCode, toDestinationError } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('archive');

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ArchiveOptions {
  artifactRoot: string;
  archiveRoot: string;
  archiveAfterDays?: number;
  now?: () => Date;
}

export interface ArchiveResult {
  moved: string[];
  skipped: string[];
}

/**
 * Moves dated export folders (`6-Jan-26`) older than the cutoff out of the
 * artifact root. History records pointing into them are hidden on the next
 * load rather than deleted.
 */
export class ArchiveManager {
  private readonly archiveAfterDays: number;
  private readonly now: () => Date;

  constructor(private readonly options: ArchiveOptions) {
    this.archiveAfterDays = options.archiveAfterDays ?? 90;
    this.now = options.now ?? (() => new Date());
  }

  async archiveOldArtifacts(): Promise<ArchiveResult> {
    const { artifactRoot, archiveRoot } = this.options;
    const cutoff = this.now().getTime() - this.archiveAfterDays * DAY_MS;

    let entries: string[];
    try {
      entries = (await fs.readdir(artifactRoot, { withFileTypes: true }))
        .filter(entry => entry.isDirectory())
        .map(entry => entry.name);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return { moved: [], skipped: [] };
      }
      throw toDestinationError(error, artifactRoot);
    }

    const due = entries.filter(name => {
      const date = parseDateFolderName(name);
      return date !== null && date.getTime() < cutoff;
    });
    if (due.length === 0) {
      return { moved: [], skipped: [] };
    }

    try {
      await fs.mkdir(archiveRoot, { recursive: true });
    } catch (error) {
      throw toDestinationError(error, archiveRoot);
    }

    const moved: string[] = [];
    const skipped: string[] = [];
    for (const name of due) {
      const target = path.join(archiveRoot, name);
      if (await exists(target)) {
        skipped.push(name);
        continue;
      }
      try {
        await fs.rename(path.join(artifactRoot, name), target);
        moved.push(name);
      } catch (error) {
        if (errnoCode(error) === 'EXDEV') {
          throw new DestinationUnwritableError(target, 'archive folder must be on the same drive as the export folder', {
            cause: error
          });
        }
        throw toDestinationError(error, target);
      }
    }

    if (moved.length > 0) {
      log.info(`Archived ${moved.length} export folder(s) to ${archiveRoot}`);
    }
    if (skipped.length > 0) {
      log.warn(`Left ${skipped.length} folder(s) in place because the archive already has them: ${skipped.join(', ')}`);
    }
    return { moved, skipped };
  }
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.stat(filePath);
    return true;
  } catch {
    return false;
  }
}
