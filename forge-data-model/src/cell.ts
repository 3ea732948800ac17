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

import type { CellValue } from 'forge-base-types';

/**
 * cached result as stored in the container: the raw type flag and the
 * raw text. we never evaluate, so this is only carried through for
 * formulas (and error literals) we loaded.
 */
export interface CachedValue {
  type?: string;
  text: string;
}

/**
 * cached results are stored as raw text with a type flag. numbers and
 * booleans come back typed; errors and strings stay text.
 */
export const CachedLiteral = (cached?: CachedValue): CellValue => {
  if (!cached) {
    return undefined;
  }
  switch (cached.type) {
    case 'b':
      return cached.text === '1';
    case 'str':
    case 's':
    case 'e':
    case 'inlineStr':
      return cached.text;
    default: {
      const value = Number(cached.text);
      return cached.text !== '' && Number.isFinite(value) ? value : cached.text;
    }
  }
};

/**
 * a single cell. a cell holds either a literal value or a formula,
 * never both. style 0 is the default style.
 */
export class Cell {

  public value: CellValue;

  /** formula text without the leading = */
  public formula?: string;

  /**
   * attributes of a loaded formula element (shared or array formulas).
   * dropped as soon as the formula is replaced.
   */
  public formula_attributes?: Record<string, string>;

  public cached?: CachedValue;

  /**
   * index of the loaded shared string this text came from. rich text
   * entries flatten to the same text as plain ones, so the container
   * writes this index back while the text is unchanged.
   */
  public string_index?: number;

  public style = 0;

  /** true if there's nothing here to write out */
  public get empty(): boolean {
    return this.value === undefined
      && this.formula === undefined
      && this.cached === undefined
      && this.style === 0;
  }

  /** true if there's a value or a formula */
  public get has_content(): boolean {
    return this.value !== undefined || this.formula !== undefined || this.cached !== undefined;
  }

  /** set a literal value. clears any formula */
  public SetValue(value: CellValue): void {
    this.value = value === '' ? undefined : value;
    this.formula = undefined;
    this.formula_attributes = undefined;
    this.cached = undefined;
    this.string_index = undefined;
  }

  /** set formula text (with or without the leading =). clears the value */
  public SetFormula(text: string): void {
    this.formula = text[0] === '=' ? text.substring(1) : text;
    this.formula_attributes = undefined;
    this.value = undefined;
    this.cached = undefined;
    this.string_index = undefined;
  }

  /** remove value and formula, keep style */
  public Clear(): void {
    this.SetValue(undefined);
  }

  /** id of the shared formula group this cell belongs to, if any */
  public get shared_group(): string | undefined {
    return this.formula_attributes?.t === 'shared' ? this.formula_attributes.si : undefined;
  }

  /**
   * replace the formula with its cached result. an error result has no
   * literal form, so it stays as a cached value.
   */
  public Detach(): void {
    if (this.cached?.type === 'e') {
      this.formula = undefined;
      this.formula_attributes = undefined;
      return;
    }
    this.SetValue(CachedLiteral(this.cached));
  }

  /**
   * formula as users write it, or undefined. dependent cells of a shared
   * formula carry no text of their own and report undefined.
   */
  public get formula_text(): string | undefined {
    return this.formula ? '=' + this.formula : undefined;
  }

  public Clone(): Cell {
    const clone = new Cell();
    clone.value = this.value instanceof Date ? new Date(this.value.getTime()) : this.value;
    clone.formula = this.formula;
    clone.formula_attributes = this.formula_attributes ? { ...this.formula_attributes } : undefined;
    clone.cached = this.cached ? { ...this.cached } : undefined;
    clone.string_index = this.string_index;
    clone.style = this.style;
    return clone;
  }

}
