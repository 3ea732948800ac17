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

import { ParseXML, BuildXML, FindAll, Attr, type DOMContent } from './xml-utils';
import type { ZipWrapper } from './zip-wrapper';

const content_types_path = '[Content_Types].xml';

const ooxml = 'application/vnd.openxmlformats-officedocument';

export const ContentType = {
  workbook: `${ooxml}.spreadsheetml.sheet.main+xml`,
  workbook_macro: 'application/vnd.ms-excel.sheet.macroEnabled.main+xml',
  worksheet: `${ooxml}.spreadsheetml.worksheet+xml`,
  styles: `${ooxml}.spreadsheetml.styles+xml`,
  shared_strings: `${ooxml}.spreadsheetml.sharedStrings+xml`,
  drawing: `${ooxml}.drawing+xml`,
  chart: `${ooxml}.drawingml.chart+xml`,
  table: `${ooxml}.spreadsheetml.table+xml`,
  custom_properties: `${ooxml}.custom-properties+xml`,
  relationships: 'application/vnd.openxmlformats-package.relationships+xml',
} as const;

/**
 * [Content_Types].xml. defaults map extensions; overrides map single
 * parts. we add and remove overrides as parts come and go.
 */
export class ContentTypes {

  public defaults: Map<string, string> = new Map([
    ['rels', ContentType.relationships],
    ['xml', 'application/xml'],
  ]);

  public overrides: Map<string, string> = new Map();

  public static Read(zip: ZipWrapper): ContentTypes {

    const types = new ContentTypes();
    if (!zip.Has(content_types_path)) {
      return types;
    }

    const root = ParseXML(zip.Get(content_types_path));
    types.defaults.clear();

    for (const entry of FindAll(root, 'Types/Default')) {
      const extension = Attr(entry, 'Extension');
      const type = Attr(entry, 'ContentType');
      if (extension && type) {
        types.defaults.set(extension.toLowerCase(), type);
      }
    }

    for (const entry of FindAll(root, 'Types/Override')) {
      const part = Attr(entry, 'PartName');
      const type = Attr(entry, 'ContentType');
      if (part && type) {
        types.overrides.set(part.replace(/^\//, ''), type);
      }
    }

    return types;

  }

  /** content type for a part, from its override or its extension */
  public TypeOf(part: string): string | undefined {
    const override = this.overrides.get(part);
    if (override) {
      return override;
    }
    const extension = part.substring(part.lastIndexOf('.') + 1).toLowerCase();
    return this.defaults.get(extension);
  }

  public Add(part: string, type: string): void {
    this.overrides.set(part, type);
  }

  public Remove(part: string): void {
    this.overrides.delete(part);
  }

  public Write(zip: ZipWrapper): void {

    const dom: DOMContent = {
      Types: {
        a$: { xmlns: 'http://schemas.openxmlformats.org/package/2006/content-types' },
        Default: Array.from(this.defaults.entries()).map(([extension, type]) => ({
          a$: { Extension: extension, ContentType: type },
        })),
        Override: Array.from(this.overrides.entries()).map(([part, type]) => ({
          a$: { PartName: '/' + part, ContentType: type },
        })),
      },
    };

    zip.Set(content_types_path, BuildXML(dom));

  }

}
