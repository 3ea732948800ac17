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

import { FindAll, Text, ToDOM, BuildXML, type XMLNode, type DOMContent } from './xml-utils';

/**
 * shared strings table. loaded entries are kept as they were (rich text
 * runs and phonetic data included) and new strings are appended, so a
 * cell whose text didn't change points back at its original entry.
 */
export class SharedStrings {

  public strings: string[] = [];
  public reverse: Map<string, number> = new Map();

  /** loaded <si> elements, by index */
  protected loaded: XMLNode[] = [];

  /** read strings table from (pre-parsed) xml; removes any existing strings */
  public FromXML(xml: XMLNode): void {

    this.strings = [];
    this.reverse.clear();
    this.loaded = [];

    // plain strings are <si><t>text</t></si>; rich strings have one or
    // more runs, <si><r><rPr/><t>part</t></r>...</si>. we keep the text.

    FindAll(xml, 'sst/si').forEach((si, index) => {
      const value = Text(si);
      this.strings[index] = value;
      this.loaded[index] = si;
      if (!this.reverse.has(value)) {
        this.reverse.set(value, index);
      }
    });

  }

  /** return a string by index */
  public Get(index: number): string | undefined {
    return this.strings[index];
  }

  public get count(): number {
    return this.strings.length;
  }

  /** find existing string or insert, and return index */
  public Ensure(value: string): number {

    let index = this.reverse.get(value);
    if (index !== undefined) {
      return index;
    }

    index = this.strings.length;
    this.strings.push(value);
    this.reverse.set(value, index);
    return index;

  }

  public ToXML(): string {

    const si: DOMContent[] = this.strings.map((value, index) => {
      const loaded = this.loaded[index];
      if (loaded) {
        return ToDOM(loaded);
      }
      return {
        t: {
          a$: { 'xml:space': /^\s|\s$/.test(value) ? 'preserve' : undefined },
          t$: value,
        },
      };
    });

    return BuildXML({
      sst: {
        a$: {
          xmlns: 'http://schemas.openxmlformats.org/spreadsheetml/2006/main',
          count: this.strings.length,
          uniqueCount: this.strings.length,
        },
        si,
      },
    });

  }

}
