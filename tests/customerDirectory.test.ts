import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CustomerDirectory, customerTag, formatCustomerForCell } from '../src/customerDirectory.js';
import { makeTempDir, removeTempDir, writeWorkbook } from './helpers.js';

describe('CustomerDirectory', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it('loads customers and looks them up by tag', async () => {
    const filePath = path.join(tempDir, 'customers.xlsx');
    await writeWorkbook(
      filePath,
      [
        ['Name', 'Business', 'Address', 'City', 'State', 'Zip Code'],
        ['Jane Doe', 'Acme Solar', '12 Main St', 'Denver', 'CO', '80202'],
        ['No Business', '', '1 Side St', 'Austin', 'TX', '73301'],
        ['Sam Lee', 'Sunny Roofs', '9 Elm Ave', 'Boise', 'ID', '83702']
      ],
      'Customers'
    );
    const directory = new CustomerDirectory(filePath);

    expect(await directory.load()).toBe(2);
    expect(directory.tags()).toEqual(['Jane Doe | Acme Solar', 'Sam Lee | Sunny Roofs']);
    expect(directory.get('Sam Lee | Sunny Roofs')).toEqual({
      name: 'Sam Lee',
      business: 'Sunny Roofs',
      address: '9 Elm Ave',
      city: 'Boise',
      state: 'ID',
      zipCode: '83702'
    });
    expect(directory.get('Nobody | Nowhere')).toBeUndefined();
  });

  it('treats a missing file as an empty directory', async () => {
    const directory = new CustomerDirectory(path.join(tempDir, 'customers.xlsx'));
    expect(await directory.load()).toBe(0);
    expect(directory.list()).toEqual([]);
  });
});

describe('customer formatting', () => {
  const customer = {
    name: 'Jane Doe',
    business: 'Acme Solar',
    address: '12 Main St',
    city: 'Denver',
    state: 'CO',
    zipCode: '80202'
  };

  it('builds the destination tag', () => {
    expect(customerTag(customer)).toBe('Jane Doe | Acme Solar');
  });

  it('builds the four-line address block', () => {
    expect(formatCustomerForCell(customer)).toBe('Jane Doe\nAcme Solar\n12 Main St\nDenver, CO 80202');
  });
});
