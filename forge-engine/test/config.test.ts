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

import * as path from 'node:path';
import { ValidationError } from 'forge-base-types';
import { LoadConfig } from '../src';

describe('configuration', () => {

  test('defaults', () => {
    expect(LoadConfig({})).toEqual({
      files_path: undefined,
      log_level: 'info',
      log_file: undefined,
      max_cells: 1_000_000,
    });
  });

  test('values from the environment', () => {
    const config = LoadConfig({
      SHEETFORGE_FILES_PATH: 'data/books',
      SHEETFORGE_LOG_LEVEL: 'debug',
      SHEETFORGE_MAX_CELLS: '5000',
    });
    expect(config.files_path).toEqual(path.resolve('data/books'));
    expect(config.log_level).toEqual('debug');
    expect(config.max_cells).toEqual(5000);
  });

  test('empty strings count as unset', () => {
    const config = LoadConfig({ SHEETFORGE_FILES_PATH: '', SHEETFORGE_LOG_LEVEL: '', SHEETFORGE_MAX_CELLS: '' });
    expect(config.files_path).toBeUndefined();
    expect(config.log_level).toEqual('info');
    expect(config.max_cells).toEqual(1_000_000);
  });

  test('bad values are rejected', () => {
    expect(() => LoadConfig({ SHEETFORGE_LOG_LEVEL: 'loud' })).toThrow(ValidationError);
    expect(() => LoadConfig({ SHEETFORGE_MAX_CELLS: '-3' })).toThrow(/SHEETFORGE_MAX_CELLS/);
  });

});
