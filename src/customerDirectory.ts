import ExcelJS from 'exceljs';
import { errnoCode, toSourceError } from './errors.js';
import { createLogger } from './logger.js';
import type { Customer, CustomerLookup } from './types.js';

const log = createLogger('customers');

const COLUMNS: Record<keyof Customer, string[]> = {
  name: ['NAME', 'CONTACT'],
  business: ['BUSINESS', 'COMPANY'],
  address: ['ADDRESS', 'STREET'],
  city: ['CITY'],
  state: ['STATE'],
  zipCode: ['ZIP', 'ZIPCODE', 'POSTALCODE']
};

export function customerTag(customer: Pick<Customer, 'name' | 'business'>): string {
  return `${customer.name} | ${customer.business}`;
}

/** Four-line address block written into the pallet sheet. */
export function formatCustomerForCell(customer: Customer): string {
  return [
    customer.name,
    customer.business,
    customer.address,
    `${customer.city}, ${customer.state} ${customer.zipCode}`.trim()
  ].join('\n');
}

/**
 * Destination customers kept in a spreadsheet the operator edits by hand.
 * The tag `Name | Business` identifies a customer on pallet records.
 */
export class CustomerDirectory implements CustomerLookup {
  private customers: Customer[] = [];

  constructor(private readonly filePath: string) {}

  async load(): Promise<number> {
    const workbook = new ExcelJS.Workbook();
    try {
      await workbook.xlsx.readFile(this.filePath);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT' || (error instanceof Error && /not found/i.test(error.message))) {
        log.debug(`No customer file at ${this.filePath}`);
        this.customers = [];
        return 0;
      }
      throw toSourceError(error, this.filePath);
    }

    const sheet = workbook.worksheets[0];
    if (!sheet) {
      this.customers = [];
      return 0;
    }

    const headerRow = sheet.getRow(1);
    const columns = new Map<keyof Customer, number>();
    for (let col = 1; col <= headerRow.cellCount; col += 1) {
      const header = headerRow.getCell(col).text.trim().toUpperCase().replace(/[\s_]+/g, '');
      for (const [field, names] of Object.entries(COLUMNS)) {
        if (names.includes(header) && isCustomerField(field) && !columns.has(field)) {
          columns.set(field, col);
        }
      }
    }

    const loaded: Customer[] = [];
    for (let rowNumber = 2; rowNumber <= sheet.rowCount; rowNumber += 1) {
      const row = sheet.getRow(rowNumber);
      const read = (field: keyof Customer): string => {
        const col = columns.get(field);
        return col === undefined ? '' : row.getCell(col).text.trim();
      };
      const customer: Customer = {
        name: read('name'),
        business: read('business'),
        address: read('address'),
        city: read('city'),
        state: read('state'),
        zipCode: read('zipCode')
      };
      if (customer.name && customer.business) {
        loaded.push(customer);
      }
    }

    this.customers = loaded;
    return loaded.length;
  }

  list(): Customer[] {
    return [...this.customers];
  }

  tags(): string[] {
    return this.customers.map(customerTag);
  }

  get(tag: string): Customer | undefined {
    return this.customers.find(customer => customerTag(customer) === tag);
  }
}

function isCustomerField(field: string): field is keyof Customer {
  return Object.prototype.hasOwnProperty.call(COLUMNS, field);
}
