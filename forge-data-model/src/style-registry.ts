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

import {
  NormalizeStyle, NormalizeDifferentialStyle, StyleKey, ValidationError,
  BorderStyleList as border_styles,
  HorizontalAlignList as horizontal_aligns,
  VerticalAlignList as vertical_aligns,
  type Area, type DifferentialStyle, type StyleAttributes,
} from 'forge-base-types';
import type { Worksheet } from './worksheet';

/**
 * overrides for format operations. `false` turns a flag off; undefined
 * leaves the existing value alone.
 */
export type StyleOverrides = { [K in keyof StyleAttributes]?: StyleAttributes[K] | false };

/**
 * content-addressed style table. a handle is an index into the list of
 * bundles; identical bundles share one handle. bundles are never
 * modified once registered, so changing the format of a cell always
 * means resolving a new handle.
 *
 * handles line up with the container's cell format list, so loaded
 * bundles keep their index.
 */
export class StyleRegistry {

  protected bundles: StyleAttributes[] = [{}];
  protected keys: Map<string, number> = new Map([[StyleKey({}), 0]]);

  /** differential styles (conditional formats), same idea */
  protected differential: DifferentialStyle[] = [];
  protected differential_keys: Map<string, number> = new Map();

  /** count of bundles that came from the container */
  public loaded_count = 1;
  public loaded_differential_count = 0;

  public get count(): number {
    return this.bundles.length;
  }

  public get differential_count(): number {
    return this.differential.length;
  }

  /**
   * replace the table with bundles read from a container. index order
   * is kept; if two loaded bundles have the same attributes, the first
   * one wins when resolving.
   */
  public Load(bundles: StyleAttributes[], differential: DifferentialStyle[] = []): void {

    this.bundles = bundles.length ? bundles.map(bundle => NormalizeStyle(bundle)) : [{}];
    this.keys.clear();

    this.bundles.forEach((bundle, index) => {
      const key = StyleKey(bundle);
      if (!this.keys.has(key)) {
        this.keys.set(key, index);
      }
    });

    this.loaded_count = this.bundles.length;

    // loaded differential styles are not matched when resolving, since
    // we may not have read everything in them.
    this.differential = differential.map(style => NormalizeDifferentialStyle(style));
    this.differential_keys.clear();
    this.loaded_differential_count = this.differential.length;

  }

  public Has(handle: number): boolean {
    return Number.isInteger(handle) && handle >= 0 && handle < this.bundles.length;
  }

  /**
   * returns a copy of the bundle for this handle
   */
  public Get(handle: number): StyleAttributes {
    if (!this.Has(handle)) {
      throw new ValidationError(`unknown style handle: ${handle}`);
    }
    return { ...this.bundles[handle] };
  }

  /**
   * return the handle for this bundle, registering it if necessary
   */
  public Resolve(attributes: StyleAttributes): number {

    const normalized = NormalizeStyle(attributes);
    const key = StyleKey(normalized);

    const existing = this.keys.get(key);
    if (existing !== undefined) {
      return existing;
    }

    const handle = this.bundles.length;
    this.bundles.push(normalized);
    this.keys.set(key, handle);
    return handle;

  }

  /**
   * handle for "existing bundle plus overrides". the original bundle is
   * not touched.
   */
  public Merge(handle: number, overrides: StyleOverrides): number {

    const merged: Record<string, unknown> = { ...this.Get(handle) };

    for (const [key, value] of Object.entries(overrides)) {
      if (value === false) {
        delete merged[key];
      }
      else if (value !== undefined) {
        merged[key] = value;
      }
    }

    return this.Resolve(this.FromRecord(merged));

  }

  /**
   * validate overrides without registering anything. throws the same
   * errors Merge would.
   */
  public CheckOverrides(overrides: StyleOverrides): void {
    const test: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(overrides)) {
      if (value !== undefined && value !== false) {
        test[key] = value;
      }
    }
    NormalizeStyle(this.FromRecord(test));
  }

  /**
   * set every cell in the area to this handle, creating cells.
   */
  public Apply(sheet: Worksheet, area: Area, handle: number): void {
    if (!this.Has(handle)) {
      throw new ValidationError(`unknown style handle: ${handle}`);
    }
    sheet.CheckBounds(area);
    for (const address of area.Array()) {
      sheet.EnsureCell(address).style = handle;
    }
  }

  /**
   * apply overrides to every cell in the area. each distinct existing
   * handle is merged once, so cells that shared a handle still share
   * one afterwards.
   */
  public Format(sheet: Worksheet, area: Area, overrides: StyleOverrides): void {

    sheet.CheckBounds(area);
    this.CheckOverrides(overrides);

    const map: Map<number, number> = new Map();

    for (const address of area.Array()) {
      const cell = sheet.EnsureCell(address);
      let handle = map.get(cell.style);
      if (handle === undefined) {
        handle = this.Merge(cell.style, overrides);
        map.set(cell.style, handle);
      }
      cell.style = handle;
    }

  }

  public GetDifferential(index: number): DifferentialStyle {
    const style = this.differential[index];
    if (!style) {
      throw new ValidationError(`unknown differential style: ${index}`);
    }
    return { ...style };
  }

  /**
   * index for a differential style, registering it if necessary
   */
  public ResolveDifferential(style: DifferentialStyle): number {

    const normalized = NormalizeDifferentialStyle(style);
    const key = JSON.stringify([
      normalized.font_color, normalized.fill_color, !!normalized.bold, !!normalized.italic]);

    const existing = this.differential_keys.get(key);
    if (existing !== undefined) {
      return existing;
    }

    const index = this.differential.length;
    this.differential.push(normalized);
    this.differential_keys.set(key, index);
    return index;

  }

  /**
   * rebuild a typed bundle from a loose record, keeping only the
   * fields a bundle can have.
   */
  protected FromRecord(record: Record<string, unknown>): StyleAttributes {

    const style: StyleAttributes = {};
    const flag = (key: string) => record[key] === true;
    const text = (key: string) => {
      const value = record[key];
      return typeof value === 'string' ? value : undefined;
    };

    if (flag('bold')) style.bold = true;
    if (flag('italic')) style.italic = true;
    if (flag('underline')) style.underline = true;
    if (flag('strike')) style.strike = true;
    if (flag('wrap')) style.wrap = true;

    const size = record.font_size;
    if (typeof size === 'number') style.font_size = size;

    style.font_name = text('font_name');
    style.font_color = text('font_color');
    style.fill_color = text('fill_color');
    style.border_color = text('border_color');
    style.number_format = text('number_format');

    const border = text('border_style');
    if (border) style.border_style = this.Narrow(border, border_styles, 'border style');

    const horizontal = text('horizontal');
    if (horizontal) style.horizontal = this.Narrow(horizontal, horizontal_aligns, 'horizontal alignment');

    const vertical = text('vertical');
    if (vertical) style.vertical = this.Narrow(vertical, vertical_aligns, 'vertical alignment');

    return style;

  }

  protected Narrow<T extends string>(value: string, list: readonly T[], what: string): T {
    const match = list.find(entry => entry === value);
    if (!match) {
      throw new ValidationError(`invalid ${what}: ${value}`);
    }
    return match;
  }

}
