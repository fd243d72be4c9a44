import { expect } from 'chai';
import { promises as fsp } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { load } from '../src/pipeline/load.js';
import type { CleanedRecord, MonthlyAggregate } from '../src/types.js';
import { captureError, makeTempDir, removeDir } from './helpers.js';

const EOL = os.EOL;

const cleaned: CleanedRecord[] = [
  { Store_ID: 5, Month: 11, Dept: 3, IsHoliday: 1, Weekly_Sales: 25000, CPI: 130.5, Unemployment: 7.2 },
  { Store_ID: 7, Month: null, Dept: 1, IsHoliday: 0, Weekly_Sales: 15000, CPI: 126.1, Unemployment: 7.5 },
];

const aggregate: MonthlyAggregate[] = [
  { Month: 11, Weekly_Sales: 25000 },
  { Month: null, Weekly_Sales: 15000 },
];

describe('load', () => {
  let dir: string;
  let cleanPath: string;
  let aggPath: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    cleanPath = path.join(dir, 'clean_data.csv');
    aggPath = path.join(dir, 'agg_data.csv');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('writes both tables with headers and no row index', async () => {
    await load(cleaned, aggregate, cleanPath, aggPath);

    expect(await fsp.readFile(cleanPath, 'utf8')).to.equal(
      [
        'Store_ID,Month,Dept,IsHoliday,Weekly_Sales,CPI,Unemployment',
        '5,11,3,1,25000,130.5,7.2',
        '7,,1,0,15000,126.1,7.5',
      ].join(EOL) + EOL
    );
    expect(await fsp.readFile(aggPath, 'utf8')).to.equal(['Month,Weekly_Sales', '11,25000', ',15000'].join(EOL) + EOL);
  });

  it('writes header-only files for empty tables', async () => {
    await load([], [], cleanPath, aggPath);

    expect(await fsp.readFile(cleanPath, 'utf8')).to.equal(`Store_ID,Month,Dept,IsHoliday,Weekly_Sales,CPI,Unemployment${EOL}`);
    expect(await fsp.readFile(aggPath, 'utf8')).to.equal(`Month,Weekly_Sales${EOL}`);
  });

  it('produces byte-identical files when run twice', async () => {
    await load(cleaned, aggregate, cleanPath, aggPath);
    const first = await fsp.readFile(cleanPath);
    const firstAgg = await fsp.readFile(aggPath);

    await load(cleaned, aggregate, cleanPath, aggPath);

    expect((await fsp.readFile(cleanPath)).equals(first)).to.equal(true);
    expect((await fsp.readFile(aggPath)).equals(firstAgg)).to.equal(true);
  });

  it('overwrites existing files', async () => {
    await fsp.writeFile(cleanPath, 'stale contents that are longer than the new file will be\n'.repeat(20));

    await load([], [], cleanPath, aggPath);

    expect(await fsp.readFile(cleanPath, 'utf8')).to.equal(`Store_ID,Month,Dept,IsHoliday,Weekly_Sales,CPI,Unemployment${EOL}`);
  });

  it('keeps the first file when the second write fails', async () => {
    const unreachable = path.join(dir, 'missing', 'agg_data.csv');

    const error = await captureError(load(cleaned, aggregate, cleanPath, unreachable));

    expect(error).to.be.instanceOf(Error);
    expect(error).to.have.property('code', 'ENOENT');
    expect((await fsp.stat(cleanPath)).isFile()).to.equal(true);
  });
});
