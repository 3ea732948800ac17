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
  BorderStyleList, HorizontalAlignList, VerticalAlignList,
  type BorderStyle, type DifferentialStyle, type HorizontalAlign,
  type StyleAttributes, type VerticalAlign,
} from 'forge-base-types';
import type { StyleRegistry } from 'forge-data-model';
import {
  ParseXML, BuildXML, ToDOM, Reorder, CreateNode, CloneNode,
  Attr, Child, Children, Flag, SetAttr, type XMLNode,
} from './xml-utils';

/**
 * implicit number formats. these have ids but are not written to the
 * numFmts list. the list is not complete, there are locale-specific
 * ones we don't know about.
 */
export const BuiltinNumberFormats: Record<number, string> = {
  0: 'General',
  1: '0',
  2: '0.00',
  3: '#,##0',
  4: '#,##0.00',
  9: '0%',
  10: '0.00%',
  11: '0.00E+00',
  12: '# ?/?',
  13: '# ??/??',
  14: 'mm-dd-yy',
  15: 'd-mmm-yy',
  16: 'd-mmm',
  17: 'mmm-yy',
  18: 'h:mm AM/PM',
  19: 'h:mm:ss AM/PM',
  20: 'h:mm',
  21: 'h:mm:ss',
  22: 'm/d/yy h:mm',
  37: '#,##0 ;(#,##0)',
  38: '#,##0 ;[Red](#,##0)',
  39: '#,##0.00;(#,##0.00)',
  40: '#,##0.00;[Red](#,##0.00)',
  45: 'mm:ss',
  46: '[h]:mm:ss',
  47: 'mmss.0',
  48: '##0.0E+0',
  49: '@',
};

/** first id for custom formats */
const custom_format_base = 164;

/**
 * true if a format code shows a date or time. we strip quoted text,
 * escaped characters and bracketed tags (colors, conditions, locales)
 * and then look for date/time tokens. elapsed-time tags ([h], [mm])
 * count as time.
 */
export const IsDateFormat = (code: string | undefined): boolean => {
  if (!code || /^general$/i.test(code)) {
    return false;
  }
  if (/\[(h+|m+|s+)\]/i.test(code)) {
    return true;
  }
  const stripped = code
    .replace(/"[^"]*"/g, '')
    .replace(/\\./g, '')
    .replace(/\[[^\]]*\]/g, '')
    .replace(/_./g, '')
    .replace(/\*./g, '');
  return /[dmyhs]/i.test(stripped);
};

/**
 * styles.xml for new workbooks: one font, the two fills every file
 * has, one border, one xf.
 */
const default_styles = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<styleSheet xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main">
<fonts count="1"><font><sz val="11"/><color theme="1"/><name val="Calibri"/><family val="2"/><scheme val="minor"/></font></fonts>
<fills count="2"><fill><patternFill patternType="none"/></fill><fill><patternFill patternType="gray125"/></fill></fills>
<borders count="1"><border><left/><right/><top/><bottom/><diagonal/></border></borders>
<cellStyleXfs count="1"><xf numFmtId="0" fontId="0" fillId="0" borderId="0"/></cellStyleXfs>
<cellXfs count="1"><xf numFmtId="0" fontId="0" fillId="0" borderId="0" xfId="0"/></cellXfs>
<cellStyles count="1"><cellStyle name="Normal" xfId="0" builtinId="0"/></cellStyles>
<dxfs count="0"/>
<tableStyles count="0" defaultTableStyle="TableStyleMedium9" defaultPivotStyle="PivotStyleLight16"/>
</styleSheet>`;

const stylesheet_order = [
  'numFmts', 'fonts', 'fills', 'borders', 'cellStyleXfs', 'cellXfs',
  'cellStyles', 'dxfs', 'tableStyles', 'colors', 'extLst',
];

const font_order = [
  'b', 'i', 'strike', 'condense', 'extend', 'outline', 'shadow', 'u',
  'vertAlign', 'sz', 'color', 'name', 'family', 'charset', 'scheme',
];

const edges = ['left', 'right', 'top', 'bottom'];

interface FontAttributes {
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
  strike?: boolean;
  font_size?: number;
  font_name?: string;
  font_color?: string;
}

const Narrow = <T extends string>(value: string | undefined, list: readonly T[]): T | undefined => {
  return list.find(entry => entry === value);
};

/** boolean element like <b/> or <b val="0"/> */
const ElementFlag = (node: XMLNode, name: string): boolean => {
  const element = Child(node, name);
  if (!element) {
    return false;
  }
  const value = Attr(element, 'val');
  return value === undefined || (value !== '0' && value !== 'false');
};

/** we only model explicit argb colors. theme and indexed colors are skipped */
const RGB = (node: XMLNode | undefined): string | undefined => {
  const rgb = Attr(node, 'rgb');
  return rgb && /^[0-9a-fA-F]{8}$/.test(rgb) ? rgb.toUpperCase() : undefined;
};

const FontKey = (font: FontAttributes) => JSON.stringify([
  !!font.bold, !!font.italic, !!font.underline, !!font.strike,
  font.font_size, font.font_name, font.font_color]);

const BorderKey = (style?: BorderStyle, color?: string) => JSON.stringify([style, color]);

/**
 * the style part. we read what we can model into style bundles, one per
 * cell xf, so registry handles and xf indexes line up. on write, the
 * loaded DOM is kept and anything the registry added since is appended.
 */
export class StyleTable {

  /** number formats by id, builtin and custom */
  protected number_formats: Map<number, string> = new Map();
  protected number_format_ids: Map<string, number> = new Map();
  protected next_number_format = custom_format_base;

  protected font_ids: Map<string, number> = new Map();
  protected fill_ids: Map<string, number> = new Map();
  protected border_ids: Map<string, number> = new Map();

  /** attributes for the default font; other fonts are read relative to it */
  protected default_font: FontAttributes = {};

  /**
   * @param root - the styleSheet element
   */
  constructor(public root: XMLNode) {

    for (const [id, code] of Object.entries(BuiltinNumberFormats)) {
      this.number_formats.set(Number(id), code);
      if (!this.number_format_ids.has(code)) {
        this.number_format_ids.set(code, Number(id));
      }
    }

    for (const format of this.List('numFmts', 'numFmt')) {
      const id = Number(Attr(format, 'numFmtId'));
      const code = Attr(format, 'formatCode');
      if (Number.isInteger(id) && code !== undefined) {
        this.number_formats.set(id, code);
        this.number_format_ids.set(code, id);
        this.next_number_format = Math.max(this.next_number_format, id + 1);
      }
    }

    const fonts = this.List('fonts', 'font');
    if (fonts[0]) {
      this.default_font = this.ReadFont(fonts[0], true);
    }
    fonts.forEach((font, index) => {
      const key = FontKey(this.ReadFont(font));
      if (!this.font_ids.has(key)) {
        this.font_ids.set(key, index);
      }
    });

    this.List('fills', 'fill').forEach((fill, index) => {
      const color = this.ReadFill(fill);
      if (color && !this.fill_ids.has(color)) {
        this.fill_ids.set(color, index);
      }
    });

    this.List('borders', 'border').forEach((border, index) => {
      const { border_style, border_color } = this.ReadBorder(border);
      const key = BorderKey(border_style, border_color);
      if (!this.border_ids.has(key)) {
        this.border_ids.set(key, index);
      }
    });

    // a file without any xf is legal (barely); handle 0 needs one
    if (!this.List('cellXfs', 'xf').length) {
      this.Container('cellXfs').xf = [CreateNode({ numFmtId: 0, fontId: 0, fillId: 0, borderId: 0 })];
    }

  }

  public static FromXML(data: string): StyleTable {
    const root = Child(ParseXML(data), 'styleSheet');
    if (!root) {
      throw new Error('missing styleSheet element');
    }
    return new StyleTable(root);
  }

  public static Default(): StyleTable {
    return StyleTable.FromXML(default_styles);
  }

  /** bundles, one per cell xf, in order */
  public CellStyles(): StyleAttributes[] {
    const fonts = this.List('fonts', 'font');
    const fills = this.List('fills', 'fill');
    const borders = this.List('borders', 'border');

    return this.List('cellXfs', 'xf').map(xf => {

      const font = fonts[Number(Attr(xf, 'fontId') || 0)];
      const fill = fills[Number(Attr(xf, 'fillId') || 0)];
      const border = borders[Number(Attr(xf, 'borderId') || 0)];

      const style: StyleAttributes = {
        ...(font ? this.ReadFont(font) : {}),
        ...(border ? this.ReadBorder(border) : {}),
      };

      const fill_color = fill ? this.ReadFill(fill) : undefined;
      if (fill_color) {
        style.fill_color = fill_color;
      }

      const number_format = Number(Attr(xf, 'numFmtId') || 0);
      if (number_format) {
        style.number_format = this.number_formats.get(number_format);
      }

      const alignment = Child(xf, 'alignment');
      if (alignment) {
        style.horizontal = Narrow<HorizontalAlign>(Attr(alignment, 'horizontal'), HorizontalAlignList);
        style.vertical = Narrow<VerticalAlign>(Attr(alignment, 'vertical'), VerticalAlignList);
        style.wrap = Flag(alignment, 'wrapText') || undefined;
      }

      return style;

    });
  }

  /** differential styles, in order */
  public DifferentialStyles(): DifferentialStyle[] {
    return this.List('dxfs', 'dxf').map(dxf => {
      const style: DifferentialStyle = {};
      const font = Child(dxf, 'font');
      if (font) {
        if (ElementFlag(font, 'b')) style.bold = true;
        if (ElementFlag(font, 'i')) style.italic = true;
        style.font_color = RGB(Child(font, 'color'));
      }
      const pattern = Child(Child(dxf, 'fill'), 'patternFill');
      if (pattern) {
        style.fill_color = RGB(Child(pattern, 'bgColor')) || RGB(Child(pattern, 'fgColor'));
      }
      return style;
    });
  }

  /** number format code for a cell xf, if it has one */
  public NumberFormat(xf_index: number): string | undefined {
    const xf = this.List('cellXfs', 'xf')[xf_index];
    const id = Number(Attr(xf, 'numFmtId') || 0);
    return id ? this.number_formats.get(id) : undefined;
  }

  /**
   * append xfs and dxfs for anything the registry holds that we don't
   * have yet. handles past the end of the xf list are new bundles.
   */
  public Update(registry: StyleRegistry): void {

    const xfs = this.Container('cellXfs');
    xfs.xf = xfs.xf || [];

    for (let handle = xfs.xf.length; handle < registry.count; handle++) {
      xfs.xf.push(this.CreateXf(registry.Get(handle)));
    }

    const dxfs = this.Container('dxfs');
    dxfs.dxf = dxfs.dxf || [];

    for (let index = dxfs.dxf.length; index < registry.differential_count; index++) {
      dxfs.dxf.push(this.CreateDxf(registry.GetDifferential(index)));
    }

  }

  public ToXML(): string {

    const lists: Array<[string, string]> = [
      ['numFmts', 'numFmt'], ['fonts', 'font'], ['fills', 'fill'], ['borders', 'border'],
      ['cellXfs', 'xf'], ['dxfs', 'dxf'],
    ];

    for (const [container, element] of lists) {
      const node = Child(this.root, container);
      if (node) {
        SetAttr(node, 'count', String(Children(node, element).length));
      }
    }

    return BuildXML({ styleSheet: Reorder(ToDOM(this.root), stylesheet_order) });

  }

  // --- reading ---------------------------------------------------------------

  protected List(container: string, element: string): XMLNode[] {
    return Children(Child(this.root, container), element);
  }

  /** get or create a container element */
  protected Container(name: string): XMLNode {
    let node = Child(this.root, name);
    if (!node) {
      node = CreateNode();
      this.root[name] = [node];
    }
    return node;
  }

  /**
   * font attributes. size, name and color are only reported where they
   * differ from the default font, so the default style stays empty.
   */
  protected ReadFont(font: XMLNode, absolute = false): FontAttributes {

    const attributes: FontAttributes = {};

    if (ElementFlag(font, 'b')) attributes.bold = true;
    if (ElementFlag(font, 'i')) attributes.italic = true;
    if (ElementFlag(font, 'strike')) attributes.strike = true;

    const underline = Child(font, 'u');
    if (underline && Attr(underline, 'val') !== 'none') {
      attributes.underline = true;
    }

    const size = Number(Attr(Child(font, 'sz'), 'val'));
    if (size > 0 && (absolute || size !== this.default_font.font_size)) {
      attributes.font_size = size;
    }

    const name = Attr(Child(font, 'name'), 'val');
    if (name && (absolute || name !== this.default_font.font_name)) {
      attributes.font_name = name;
    }

    const color = RGB(Child(font, 'color'));
    if (color && (absolute || color !== this.default_font.font_color)) {
      attributes.font_color = color;
    }

    return attributes;

  }

  /** solid fill color, or undefined for anything else */
  protected ReadFill(fill: XMLNode): string | undefined {
    const pattern = Child(fill, 'patternFill');
    if (Attr(pattern, 'patternType') !== 'solid') {
      return undefined;
    }
    return RGB(Child(pattern, 'fgColor'));
  }

  /**
   * a border is only modeled if all four edges match. mixed borders
   * read as no border, which is lossy, but only for reporting; the xf
   * keeps its border in the file.
   */
  protected ReadBorder(border: XMLNode): { border_style?: BorderStyle, border_color?: string } {
    const styles = edges.map(edge => Attr(Child(border, edge), 'style'));
    const colors = edges.map(edge => RGB(Child(Child(border, edge), 'color')));
    if (styles.some(style => style !== styles[0]) || colors.some(color => color !== colors[0])) {
      return {};
    }
    const border_style = Narrow<BorderStyle>(styles[0], BorderStyleList);
    if (!border_style) {
      return {};
    }
    return { border_style, border_color: colors[0] };
  }

  // --- writing ---------------------------------------------------------------

  protected EnsureNumberFormat(code?: string): number {

    if (!code || /^general$/i.test(code)) {
      return 0;
    }

    const existing = this.number_format_ids.get(code);
    if (existing !== undefined) {
      return existing;
    }

    const id = this.next_number_format++;
    this.Container('numFmts').numFmt = [
      ...this.List('numFmts', 'numFmt'),
      CreateNode({ numFmtId: id, formatCode: code }),
    ];

    this.number_formats.set(id, code);
    this.number_format_ids.set(code, id);
    return id;

  }

  protected EnsureFont(style: StyleAttributes): number {

    const attributes: FontAttributes = {
      bold: style.bold, italic: style.italic, underline: style.underline, strike: style.strike,
      font_size: style.font_size, font_name: style.font_name, font_color: style.font_color,
    };

    const key = FontKey(attributes);
    const existing = this.font_ids.get(key);
    if (existing !== undefined) {
      return existing;
    }

    // every font is based on the default font
    const base = this.List('fonts', 'font')[0] || CreateNode();
    const parts: Record<string, XMLNode[]> = {};

    if (attributes.bold) parts.b = [CreateNode()];
    if (attributes.italic) parts.i = [CreateNode()];
    if (attributes.strike) parts.strike = [CreateNode()];
    if (attributes.underline) parts.u = [CreateNode()];

    const size = attributes.font_size ?? this.default_font.font_size;
    if (size !== undefined) {
      parts.sz = [CreateNode({ val: size })];
    }

    if (attributes.font_color) {
      parts.color = [CreateNode({ rgb: attributes.font_color })];
    }
    else {
      const color = Child(base, 'color');
      if (color) {
        parts.color = [CloneNode(color)];
      }
    }

    const name = attributes.font_name ?? this.default_font.font_name;
    if (name !== undefined) {
      parts.name = [CreateNode({ val: name })];
    }

    const family = Child(base, 'family');
    if (family) {
      parts.family = [CloneNode(family)];
    }

    // the scheme ties the font to the theme, which is wrong if we
    // changed the face
    const scheme = Child(base, 'scheme');
    if (scheme && !attributes.font_name) {
      parts.scheme = [CloneNode(scheme)];
    }

    const font = CreateNode();
    for (const element of font_order) {
      const list = parts[element];
      if (list) {
        font[element] = list;
      }
    }

    const container = this.Container('fonts');
    container.font = [...Children(container, 'font'), font];

    const index = container.font.length - 1;
    this.font_ids.set(key, index);
    return index;

  }

  protected EnsureFill(color?: string): number {

    if (!color) {
      return 0;
    }

    const existing = this.fill_ids.get(color);
    if (existing !== undefined) {
      return existing;
    }

    const fill = CreateNode({}, {
      patternFill: [CreateNode({ patternType: 'solid' }, {
        fgColor: [CreateNode({ rgb: color })],
        bgColor: [CreateNode({ indexed: 64 })],
      })],
    });

    const container = this.Container('fills');
    container.fill = [...Children(container, 'fill'), fill];

    const index = container.fill.length - 1;
    this.fill_ids.set(color, index);
    return index;

  }

  protected EnsureBorder(style?: BorderStyle, color?: string): number {

    if (!style) {
      return 0;
    }

    const key = BorderKey(style, color);
    const existing = this.border_ids.get(key);
    if (existing !== undefined) {
      return existing;
    }

    const edge = () => CreateNode({ style }, color ? { color: [CreateNode({ rgb: color })] } : {});
    const border = CreateNode({}, {
      left: [edge()],
      right: [edge()],
      top: [edge()],
      bottom: [edge()],
      diagonal: [CreateNode()],
    });

    const container = this.Container('borders');
    container.border = [...Children(container, 'border'), border];

    const index = container.border.length - 1;
    this.border_ids.set(key, index);
    return index;

  }

  protected CreateXf(style: StyleAttributes): XMLNode {

    const number_format = this.EnsureNumberFormat(style.number_format);
    const font = this.EnsureFont(style);
    const fill = this.EnsureFill(style.fill_color);
    const border = this.EnsureBorder(style.border_style, style.border_color);
    const aligned = !!(style.horizontal || style.vertical || style.wrap);

    const children: Record<string, XMLNode[]> = {};
    if (aligned) {
      children.alignment = [CreateNode({
        horizontal: style.horizontal,
        vertical: style.vertical,
        wrapText: style.wrap ? 1 : undefined,
      })];
    }

    return CreateNode({
      numFmtId: number_format,
      fontId: font,
      fillId: fill,
      borderId: border,
      xfId: 0,
      applyNumberFormat: number_format ? 1 : undefined,
      applyFont: font ? 1 : undefined,
      applyFill: fill ? 1 : undefined,
      applyBorder: border ? 1 : undefined,
      applyAlignment: aligned ? 1 : undefined,
    }, children);

  }

  protected CreateDxf(style: DifferentialStyle): XMLNode {

    const children: Record<string, XMLNode[]> = {};

    if (style.bold || style.italic || style.font_color) {
      const font: Record<string, XMLNode[]> = {};
      if (style.bold) font.b = [CreateNode()];
      if (style.italic) font.i = [CreateNode()];
      if (style.font_color) font.color = [CreateNode({ rgb: style.font_color })];
      children.font = [CreateNode({}, font)];
    }

    if (style.fill_color) {
      children.fill = [CreateNode({}, {
        patternFill: [CreateNode({}, { bgColor: [CreateNode({ rgb: style.fill_color })] })],
      })];
    }

    return CreateNode({}, children);

  }

}

