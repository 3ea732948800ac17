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

import { ValidationError } from './errors';

export const BorderStyleList = [
  'thin', 'medium', 'thick', 'dashed', 'dotted', 'double', 'hair',
  'mediumDashed', 'dashDot', 'mediumDashDot', 'dashDotDot',
  'mediumDashDotDot', 'slantDashDot',
] as const;

export type BorderStyle = typeof BorderStyleList[number];

export const HorizontalAlignList = [
  'general', 'left', 'center', 'right', 'fill', 'justify',
  'centerContinuous', 'distributed',
] as const;

export type HorizontalAlign = typeof HorizontalAlignList[number];

export const VerticalAlignList = [
  'top', 'center', 'bottom', 'justify', 'distributed',
] as const;

export type VerticalAlign = typeof VerticalAlignList[number];

/**
 * style bundle. every field is optional; a missing field means "use
 * the default", so the empty object is the default style. colors are
 * normalized AARRGGBB.
 *
 * border applies the same style and color to all four edges.
 */
export interface StyleAttributes {
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
  strike?: boolean;
  font_size?: number;
  font_name?: string;
  font_color?: string;
  fill_color?: string;
  border_style?: BorderStyle;
  border_color?: string;
  horizontal?: HorizontalAlign;
  vertical?: VerticalAlign;
  wrap?: boolean;
  number_format?: string;
}

/**
 * differential style, used by conditional formats. a subset of
 * the cell style.
 */
export interface DifferentialStyle {
  font_color?: string;
  fill_color?: string;
  bold?: boolean;
  italic?: boolean;
}

/** fixed field order, so serialized keys are stable */
const style_keys: Array<keyof StyleAttributes> = [
  'bold', 'italic', 'underline', 'strike', 'font_size', 'font_name',
  'font_color', 'fill_color', 'border_style', 'border_color', 'horizontal',
  'vertical', 'wrap', 'number_format',
];

/**
 * accepts RRGGBB, #RRGGBB or AARRGGBB (case-insensitive), returns
 * uppercase AARRGGBB. throws on anything else.
 */
export const NormalizeColor = (color: string): string => {
  const match = color.trim().match(/^#?([0-9a-fA-F]{6})$|^([0-9a-fA-F]{8})$/);
  if (!match) {
    throw new ValidationError(`invalid color: ${color}`);
  }
  if (match[1]) {
    return 'FF' + match[1].toUpperCase();
  }
  return match[2].toUpperCase();
};

/**
 * drop undefined fields, normalize colors. returns a new object.
 */
export const NormalizeStyle = (style: StyleAttributes): StyleAttributes => {

  const normalized: StyleAttributes = {};

  if (style.bold) normalized.bold = true;
  if (style.italic) normalized.italic = true;
  if (style.underline) normalized.underline = true;
  if (style.strike) normalized.strike = true;
  if (style.wrap) normalized.wrap = true;

  if (style.font_size !== undefined) {
    if (!(style.font_size > 0 && style.font_size <= 409)) {
      throw new ValidationError(`invalid font size: ${style.font_size}`);
    }
    normalized.font_size = style.font_size;
  }

  if (style.font_name) normalized.font_name = style.font_name;
  if (style.font_color) normalized.font_color = NormalizeColor(style.font_color);
  if (style.fill_color) normalized.fill_color = NormalizeColor(style.fill_color);
  if (style.border_style) normalized.border_style = style.border_style;
  if (style.border_color) normalized.border_color = NormalizeColor(style.border_color);
  if (style.horizontal) normalized.horizontal = style.horizontal;
  if (style.vertical) normalized.vertical = style.vertical;
  if (style.number_format) normalized.number_format = style.number_format;

  return normalized;

};

/**
 * canonical string for a normalized bundle. two bundles are identical
 * iff their keys are identical.
 */
export const StyleKey = (style: StyleAttributes): string => {
  const entries: Array<[string, unknown]> = [];
  for (const key of style_keys) {
    if (style[key] !== undefined) {
      entries.push([key, style[key]]);
    }
  }
  return JSON.stringify(entries);
};

export const NormalizeDifferentialStyle = (style: DifferentialStyle): DifferentialStyle => {
  const normalized: DifferentialStyle = {};
  if (style.font_color) normalized.font_color = NormalizeColor(style.font_color);
  if (style.fill_color) normalized.fill_color = NormalizeColor(style.fill_color);
  if (style.bold) normalized.bold = true;
  if (style.italic) normalized.italic = true;
  return normalized;
};
