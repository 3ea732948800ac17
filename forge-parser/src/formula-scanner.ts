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

import function_list from './functions.json';

export interface ScanResult {
  valid: boolean;
  error?: string;

  /** offset into the original text, including the leading = */
  error_position?: number;

  /** function names in order of appearance, uppercase, no duplicates */
  functions: string[];
}

const known_functions = new Set<string>(function_list);

/** prefixes the container uses for newer functions */
const function_prefix = /^_xl(fn|ws)\./i;

/**
 * check a function name against the recognized list. the name may
 * carry one of the future-function prefixes.
 */
export const IsKnownFunction = (name: string): boolean => {
  return known_functions.has(name.replace(function_prefix, '').toUpperCase());
};

const OPEN: Record<string, string> = { '(': ')', '[': ']', '{': '}' };
const CLOSE: Record<string, string> = { ')': '(', ']': '[', '}': '{' };

/** a formula can't end with one of these */
const trailing_operators = '+-*/^&=<>,';

/**
 * syntax scanner for formulas. this is not a full parser: it checks
 * that the text is well-formed enough to store (balanced groups,
 * terminated strings and quoted names) and collects function names.
 * nothing is evaluated.
 */
export class FormulaScanner {

  protected text = '';
  protected index = 0;

  /** rolling error state */
  protected valid = true;
  protected error: string | undefined;
  protected error_position: number | undefined;

  protected functions: string[] = [];

  public Scan(text: string): ScanResult {

    this.text = text;
    this.index = 0;
    this.valid = true;
    this.error = undefined;
    this.error_position = undefined;
    this.functions = [];

    if (text[0] !== '=') {
      this.Fail('formula must start with =', 0);
    }
    else if (!text.substring(1).trim()) {
      this.Fail('empty formula', 1);
    }
    else {
      this.index = 1;
      this.ScanBody();
    }

    return {
      valid: this.valid,
      ...(this.error ? { error: this.error, error_position: this.error_position } : {}),
      functions: this.functions,
    };

  }

  protected Fail(error: string, position: number): void {
    if (this.valid) {
      this.valid = false;
      this.error = error;
      this.error_position = position;
    }
  }

  protected ScanBody(): void {

    const stack: Array<{ char: string, position: number }> = [];
    const length = this.text.length;

    while (this.valid && this.index < length) {

      const char = this.text[this.index];

      if (char === '"') {
        this.ScanQuoted('"', 'unterminated string');
        continue;
      }

      if (char === '\'') {
        const start = this.index;
        this.ScanQuoted('\'', 'unterminated sheet name');
        if (this.valid && this.text[this.index] !== '!') {
          this.Fail('expected ! after quoted sheet name', start);
        }
        continue;
      }

      if (OPEN[char]) {
        stack.push({ char, position: this.index++ });
        continue;
      }

      if (CLOSE[char]) {
        const top = stack.pop();
        if (!top || top.char !== CLOSE[char]) {
          this.Fail(`unbalanced ${char}`, this.index);
        }
        this.index++;
        continue;
      }

      if (/[A-Za-z_\\]/.test(char)) {
        this.ScanIdentifier();
        continue;
      }

      this.index++;

    }

    if (!this.valid) {
      return;
    }

    const open = stack.pop();
    if (open) {
      this.Fail(`missing ${OPEN[open.char]}`, open.position);
      return;
    }

    const body = this.text.trimEnd();
    if (trailing_operators.includes(body[body.length - 1])) {
      this.Fail('unexpected end of formula', body.length - 1);
    }

  }

  /**
   * consume a quoted segment starting at the current index. the quote
   * char is escaped by doubling it.
   */
  protected ScanQuoted(quote: string, message: string): void {

    const start = this.index++;
    const length = this.text.length;

    while (this.index < length) {
      if (this.text[this.index] === quote) {
        if (this.text[this.index + 1] === quote) {
          this.index += 2;
          continue;
        }
        this.index++;
        return;
      }
      this.index++;
    }

    this.Fail(message, start);

  }

  /**
   * identifiers are names, references or function calls. only the last
   * one matters to us; a function is an identifier immediately followed
   * by an open paren.
   */
  protected ScanIdentifier(): void {

    const start = this.index;
    const length = this.text.length;

    while (this.index < length && /[A-Za-z0-9_.\\$]/.test(this.text[this.index])) {
      this.index++;
    }

    if (this.text[this.index] === '(') {
      const name = this.text.substring(start, this.index).replace(function_prefix, '').toUpperCase();
      if (!this.functions.includes(name)) {
        this.functions.push(name);
      }
    }

  }

}

/**
 * scan and return the names that are not in the recognized list.
 */
export const UnknownFunctions = (result: ScanResult): string[] => {
  return result.functions.filter(name => !IsKnownFunction(name));
};
