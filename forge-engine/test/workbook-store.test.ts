/*
 * This file is part of TREB.
 *
 * TREB is free software: you can redistribute it and/or modify it under the 
 * terms of the GNU General Public License as published by the Free Software 
 * Foundation, either version 3 of the License, or (at your option) any 
 * later version.
 *
 * TREB is distributed in the hope that it will be useful, but WITHOUT ANY 
 * WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS 
 * FOR A PARTICULAR PURPOSE. See the GNU General Public License for more 
 * details.
 *
 * You should have received a copy of the GNU General Public License along 
 * with TREB. If not, see <https://www.gnu.org/licenses/>. 
 *
 * Copyright 2022-2025 trebco, llc. 
 * info@treb.app
 * 
 */

import { promises as fs } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConflictError, FormatError } from 'forge-base-types';
import { WorkbookStore, CreateLogger, type EngineConfig } from '../src';

describe('workbook store', () => {

  let root: string;
  let store: WorkbookStore;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'sheetforge-store-'));
    const config: EngineConfig = { files_path: root, log_level: 'silent', max_cells: 1000 };
    store = new WorkbookStore(config, CreateLogger('silent'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  test('a missing file opens as an empty workbook and is not written', async () => {

    const file = store.Resolve('missing.xlsx');
    const session = await store.Open(file);

    expect(session.exists).toBe(false);
    expect(session.workbook.sheets.map(sheet => sheet.name)).toEqual(['Sheet1']);

    await store.WithSession(file, () => undefined);
    expect(await fs.readdir(root)).toEqual([]);

  });

  test('changes made in a session are saved', async () => {

    const file = store.Resolve('book.xlsx');

    await store.WithSession(file, session => {
      session.workbook.sheets[0].EnsureCell({ row: 1, column: 1 }).SetValue('hello');
      session.workbook.dirty = true;
    });

    const reopened = await store.Open(file);
    expect(reopened.exists).toBe(true);
    expect(reopened.workbook.sheets[0].GetCell({ row: 1, column: 1 })?.value).toEqual('hello');
    expect(await fs.readdir(root)).toEqual(['book.xlsx']);

  });

  test('a failed task leaves the file alone', async () => {

    const file = store.Resolve('book.xlsx');
    await store.Create(file);
    const before = await fs.readFile(file);

    await expect(store.WithSession(file, session => {
      session.workbook.AddSheet('Data');
      throw new Error('task failed');
    })).rejects.toThrow('task failed');

    expect(await fs.readFile(file)).toEqual(before);

  });

  test('invariant violations stop the save', async () => {

    const file = store.Resolve('book.xlsx');

    await expect(store.WithSession(file, session => {
      session.workbook.AddSheet('Data').name = 'Sheet1';
    })).rejects.toThrow(FormatError);

    expect(await fs.readdir(root)).toEqual([]);

  });

  test('create fails if the file exists', async () => {
    const file = store.Resolve('book.xlsx');
    await store.Create(file);
    await expect(store.Create(file)).rejects.toThrow(ConflictError);
  });

  test('sessions on one path serialize', async () => {

    const file = store.Resolve('counter.xlsx');

    const Increment = () => store.WithSession(file, async session => {
      const cell = session.workbook.sheets[0].EnsureCell({ row: 1, column: 1 });
      const current = typeof cell.value === 'number' ? cell.value : 0;
      await new Promise<void>(resolve => setImmediate(resolve));
      cell.SetValue(current + 1);
      session.workbook.dirty = true;
    });

    await Promise.all([Increment(), Increment(), Increment()]);

    const session = await store.Open(file);
    expect(session.workbook.sheets[0].GetCell({ row: 1, column: 1 })?.value).toEqual(3);

  });

});
