import fs from 'fs/promises';
import path from 'path';
import ExcelJS from 'exceljs';
import type { Workbook } from 'exceljs';
import { MAX_COLLISION_SUFFIX, getArtifactDir, getArtifactFileName } from './batchFiles.js';
import { formatCustomerForCell } from './customerDirectory.js';
import { DestinationUnwritableError, InvalidTransitionError, toDestinationError } from './errors.js';
import { createLogger } from './logger.js';
import type {
  Batch,
  BatchArtifactExporter,
  CustomerLookup,
  ExportOptions,
  ReferenceLookup,
  ReferenceRecord
} from './types.js';

const log = createLogger('export');

export const PALLET_SHEET = 'PALLET SHEET';
export const HEADER_ROW = 5;

export interface BatchExporterOptions {
  artifactRoot: string;
  prefix?: string;
  reference?: ReferenceLookup;
  customers?: CustomerLookup;
}

function formatDate(date: Date): string {
  const month = (date.getMonth() + 1).toString().padStart(2, '0');
  const day = date.getDate().toString().padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.stat(filePath);
    return true;
  } catch {
    return false;
  }
}

export class BatchExporter implements BatchArtifactExporter {
  private readonly artifactRoot: string;
  private readonly prefix: string;

  constructor(private readonly options: BatchExporterOptions) {
    this.artifactRoot = options.artifactRoot;
    this.prefix = options.prefix ?? 'PALLET';
  }

  /**
   * Writes the pallet workbook under `<root>/<d-Mon-yy>/` and returns its
   * path. The workbook is written to a hidden temp file and renamed into
   * place, so a partial file is never visible under the final name.
   */
  async export(batch: Batch, options: ExportOptions): Promise<string> {
    if (batch.serials.length === 0) {
      throw new InvalidTransitionError('export an empty pallet', batch.state, batch.palletNumber);
    }

    const dir = getArtifactDir(this.artifactRoot, options.completedAt);
    try {
      await fs.mkdir(dir, { recursive: true });
    } catch (error) {
      throw toDestinationError(error, dir);
    }

    const finalPath = await this.availablePath(dir, batch.palletNumber, options.completedAt);
    const tempPath = path.join(dir, `.${path.basename(finalPath)}.${process.pid}.tmp`);
    const workbook = this.buildWorkbook(batch, options);

    try {
      await workbook.xlsx.writeFile(tempPath);
      await fs.rename(tempPath, finalPath);
    } catch (error) {
      await this.removeTemp(tempPath);
      throw toDestinationError(error, finalPath);
    }

    log.info(`Pallet #${batch.palletNumber} exported to ${finalPath} (${batch.serials.length} panels)`);
    return finalPath;
  }

  async discard(artifactPath: string): Promise<void> {
    try {
      await fs.rm(artifactPath, { force: true });
    } catch (error) {
      log.warn(`Could not remove ${artifactPath}:`, error);
    }
  }

  private async availablePath(dir: string, palletNumber: number, completedAt: Date): Promise<string> {
    for (let suffix = 0; suffix <= MAX_COLLISION_SUFFIX; suffix += 1) {
      const candidate = path.join(dir, getArtifactFileName(this.prefix, palletNumber, completedAt, suffix));
      if (!(await pathExists(candidate))) {
        if (suffix > 0) {
          log.warn(`Artifact name already taken, using ${path.basename(candidate)}`);
        }
        return candidate;
      }
    }
    throw new DestinationUnwritableError(dir, 'too many files with the same name, clean up the export folder');
  }

  private async removeTemp(tempPath: string): Promise<void> {
    try {
      await fs.rm(tempPath, { force: true });
    } catch (error) {
      log.warn(`Could not remove temporary file ${tempPath}:`, error);
    }
  }

  private buildWorkbook(batch: Batch, options: ExportOptions): Workbook {
    const workbook = new ExcelJS.Workbook();
    workbook.created = options.completedAt;
    const sheet = workbook.addWorksheet(PALLET_SHEET);
    const dateLabel = formatDate(options.completedAt);

    sheet.getCell('A1').value = 'Panel Type';
    sheet.getCell('B1').value = options.category;
    sheet.getCell('A2').value = 'Pallet';
    sheet.getCell('B2').value = batch.palletNumber;
    sheet.getCell('B3').value = `${options.category} ${dateLabel} #${batch.palletNumber}`;
    sheet.getCell('G3').value = dateLabel;

    if (options.destination) {
      const customer = this.options.customers?.get(options.destination);
      const cell = sheet.getCell('A3');
      cell.value = customer ? formatCustomerForCell(customer) : options.destination;
      cell.alignment = { wrapText: true, vertical: 'top' };
    }

    const references = batch.serials.map(serial => this.options.reference?.lookup(serial));
    const attributeKeys = collectAttributeKeys(references);

    const header = sheet.getRow(HEADER_ROW);
    header.values = ['#', 'Serial No', ...attributeKeys];
    header.font = { bold: true };

    batch.serials.forEach((serial, index) => {
      const attributes = references[index]?.attributes ?? {};
      sheet.getRow(HEADER_ROW + 1 + index).values = [
        index + 1,
        serial,
        ...attributeKeys.map(key => attributes[key] ?? '')
      ];
    });

    sheet.getColumn(1).width = 28;
    sheet.getColumn(2).width = 24;
    return workbook;
  }
}

function collectAttributeKeys(references: Array<ReferenceRecord | undefined>): string[] {
  const keys: string[] = [];
  for (const reference of references) {
    for (const key of Object.keys(reference?.attributes ?? {})) {
      if (!keys.includes(key)) {
        keys.push(key);
      }
    }
  }
  return keys;
}
