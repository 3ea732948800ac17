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

import { FormulaScanner, UnknownFunctions, IsKnownFunction } from '../src/formula-scanner';

const scanner = new FormulaScanner();

describe('formula scanner', () => {

  test('valid formulas', () => {
    for (const text of [
      '=SUM(A1:A10)',
      '=IF(A1>0,"yes","no")',
      `='My Sheet'!B2*2`,
      '="say ""hi"""',
      '={1,2;3,4}',
      '=Table1[[#This Row],[Amount]]',
      '=A1%',
    ]) {
      const result = scanner.Scan(text);
      expect(result.valid).toBeTruthy();
      expect(result.error).toBeUndefined();
    }
  });

  test('function names', () => {
    const result = scanner.Scan('=sum(A1:A3)+ROUND(Average(B1:B3),2)+SUM(C1)');
    expect(result.functions).toEqual(['SUM', 'ROUND', 'AVERAGE']);
    expect(UnknownFunctions(result)).toEqual([]);

    const unknown = scanner.Scan('=FOO(1)+_xlfn.XLOOKUP(1,A:A,B:B)');
    expect(unknown.valid).toBeTruthy();
    expect(unknown.functions).toEqual(['FOO', 'XLOOKUP']);
    expect(UnknownFunctions(unknown)).toEqual(['FOO']);

    expect(IsKnownFunction('_xlfn.STDEV.S')).toBeTruthy();
    expect(IsKnownFunction('NOTAFUNCTION')).toBeFalsy();
  });

  test('errors and positions', () => {

    expect(scanner.Scan('SUM(A1)')).toEqual({
      valid: false, error: 'formula must start with =', error_position: 0, functions: [] });

    expect(scanner.Scan('=')).toEqual({
      valid: false, error: 'empty formula', error_position: 1, functions: [] });

    let result = scanner.Scan('=SUM(A1');
    expect(result.valid).toBeFalsy();
    expect(result.error).toEqual('missing )');
    expect(result.error_position).toEqual(4);

    result = scanner.Scan('=A1)');
    expect(result.error).toEqual('unbalanced )');
    expect(result.error_position).toEqual(3);

    result = scanner.Scan('=(A1]');
    expect(result.error).toEqual('unbalanced ]');
    expect(result.error_position).toEqual(4);

    result = scanner.Scan('="abc');
    expect(result.error).toEqual('unterminated string');
    expect(result.error_position).toEqual(1);

    result = scanner.Scan(`='Sheet 1!A1`);
    expect(result.error).toEqual('unterminated sheet name');

    result = scanner.Scan('=A1+');
    expect(result.error).toEqual('unexpected end of formula');
    expect(result.error_position).toEqual(3);

    // parens inside strings don't count
    expect(scanner.Scan('="(("&A1').valid).toBeTruthy();

  });

});
