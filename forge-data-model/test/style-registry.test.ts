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

import { ParseReference } from 'forge-parser';
import { ValidationError } from 'forge-base-types';
import { StyleRegistry, Workbook } from '../src';

test('identical bundles share a handle', () => {

  const styles = new StyleRegistry();

  const bold = styles.Resolve({ bold: true });
  expect(bold).toEqual(1);
  expect(styles.Resolve({ bold: true, italic: false })).toEqual(1);
  expect(styles.Resolve({})).toEqual(0);

  const red = styles.Resolve({ fill_color: '#ff0000' });
  expect(styles.Resolve({ fill_color: 'FFFF0000' })).toEqual(red);
  expect(styles.count).toEqual(3);

});

test('merge leaves the original bundle alone', () => {

  const styles = new StyleRegistry();
  const bold = styles.Resolve({ bold: true });

  const merged = styles.Merge(bold, { fill_color: 'ff0000' });

  expect(merged).not.toEqual(bold);
  expect(styles.Get(bold)).toEqual({ bold: true });
  expect(styles.Get(merged)).toEqual({ bold: true, fill_color: 'FFFF0000' });

  // false removes a flag
  expect(styles.Get(styles.Merge(merged, { bold: false }))).toEqual({ fill_color: 'FFFF0000' });

});

test('unknown handles and bad attributes', () => {

  const styles = new StyleRegistry();

  expect(() => styles.Get(99)).toThrow('unknown style handle: 99');
  expect(() => styles.Resolve({ font_color: 'blue' })).toThrow(ValidationError);
  expect(() => styles.CheckOverrides({ font_size: 500 })).toThrow(ValidationError);

});

test('format merges each distinct style once', () => {

  const workbook = Workbook.Empty();
  const sheet = workbook.sheets[0];
  const styles = workbook.styles;

  const bold = styles.Resolve({ bold: true });
  sheet.EnsureCell({ row: 2, column: 1 }).style = bold;

  styles.Format(sheet, ParseReference('A1:A3').area, { italic: true });

  const italic = sheet.GetCell({ row: 1, column: 1 })?.style;
  expect(italic).toBeDefined();
  expect(sheet.GetCell({ row: 3, column: 1 })?.style).toEqual(italic);
  expect(styles.Get(italic ?? 0)).toEqual({ italic: true });
  expect(styles.Get(sheet.GetCell({ row: 2, column: 1 })?.style ?? 0)).toEqual({ bold: true, italic: true });

});

test('differential styles', () => {

  const styles = new StyleRegistry();

  expect(styles.ResolveDifferential({ fill_color: 'ffc7ce', bold: true })).toEqual(0);
  expect(styles.ResolveDifferential({ fill_color: 'FFFFC7CE', bold: true })).toEqual(0);
  expect(styles.ResolveDifferential({ font_color: '9c0006' })).toEqual(1);
  expect(styles.GetDifferential(0)).toEqual({ fill_color: 'FFFFC7CE', bold: true });

});
