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

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { PathError } from 'forge-base-types';
import { ResolvePath, CSV_EXTENSIONS } from '../src';

const root = path.resolve('/srv/workbooks');

describe('path policy', () => {

  test('relative paths resolve against the root', () => {
    expect(ResolvePath('reports/q1.xlsx', root)).toEqual(path.join(root, 'reports', 'q1.xlsx'));
  });

  test('absolute paths inside the root are accepted', () => {
    expect(ResolvePath(path.join(root, 'a.XLSX'), root)).toEqual(path.join(root, 'a.XLSX'));
  });

  test('absolute paths are accepted without a root', () => {
    expect(ResolvePath('/tmp/book.xlsm')).toEqual(path.resolve('/tmp/book.xlsm'));
  });

  test('relative paths need a root', () => {
    expect(() => ResolvePath('book.xlsx')).toThrow(PathError);
  });

  test('traversal and escapes are rejected', () => {
    expect(() => ResolvePath('../book.xlsx', root)).toThrow(PathError);
    expect(() => ResolvePath('a/../../book.xlsx', root)).toThrow(/parent directory/);
    expect(() => ResolvePath('/etc/book.xlsx', root)).toThrow(/outside the permitted root/);
    expect(() => ResolvePath('bad\0name.xlsx', root)).toThrow(PathError);
    expect(() => ResolvePath('  ', root)).toThrow(/empty path/);
  });

  test('extensions are checked', () => {
    expect(() => ResolvePath('notes.txt', root)).toThrow(/unsupported file type .txt/);
    expect(() => ResolvePath('book', root)).toThrow(/unsupported file type \(none\)/);
    expect(ResolvePath('data.csv', root, CSV_EXTENSIONS)).toEqual(path.join(root, 'data.csv'));
  });

  describe('symbolic links', () => {

    let base = '';
    let files = '';

    beforeAll(() => {
      base = fs.mkdtempSync(path.join(os.tmpdir(), 'path-policy-'));
      files = path.join(base, 'files');
      fs.mkdirSync(path.join(files, 'reports'), { recursive: true });
      fs.mkdirSync(path.join(base, 'outside'));
      fs.symlinkSync(path.join(base, 'outside'), path.join(files, 'escape'));
      fs.symlinkSync(path.join(files, 'reports'), path.join(files, 'latest'));
      fs.symlinkSync(path.join(base, 'missing'), path.join(files, 'dangling'));
    });

    afterAll(() => {
      fs.rmSync(base, { recursive: true, force: true });
    });

    test('a link out of the root is rejected', () => {
      expect(() => ResolvePath('escape/book.xlsx', files)).toThrow(/outside the permitted root/);
      expect(() => ResolvePath(path.join(files, 'escape', 'book.xlsx'), files)).toThrow(PathError);
    });

    test('a link that stays inside the root is accepted', () => {
      expect(ResolvePath('latest/book.xlsx', files)).toEqual(path.join(files, 'latest', 'book.xlsx'));
    });

    test('a broken link is rejected', () => {
      expect(() => ResolvePath('dangling/book.xlsx', files)).toThrow(/broken symbolic link/);
    });

  });

});
