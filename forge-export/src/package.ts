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

import { ZipWrapper } from './zip-wrapper';
import { ContentTypes, ContentType } from './content-types';
import {
  ReadRels, WriteRels, RelsPath, ResolveTarget, FindRel, AddRel,
  RelationshipType, type RelationshipMap,
} from './relationship';
import { StyleTable } from './style-table';
import { SharedStrings } from './shared-strings';
import { ParseXML, Child, CloneNode, FindAll, SetAttr, type XMLNode } from './xml-utils';

/** a table part owned by a sheet */
export interface TablePart {
  path: string;
  relationship: string;
  root: XMLNode;
}

/** a chart in a drawing: its part, and its anchor in the drawing */
export interface ChartPart {
  path: string;
  relationship: string;
  anchor: XMLNode;
}

export interface DrawingPart {
  path: string;

  /** relationship from the sheet */
  relationship: string;

  /** xdr:wsDr element */
  root: XMLNode;
  rels: RelationshipMap;

  /** charts we model, by chart id */
  charts: Map<number, ChartPart>;
}

/**
 * everything we carry for a worksheet between load and save. the
 * worksheet element is kept whole; the parts we own (cells, merges,
 * validations, conditional formats, drawing and table references) are
 * rebuilt on save and the rest is written back as it was.
 */
export interface SheetPart {

  /** path is assigned on save for new sheets */
  path?: string;
  relationship?: string;
  sheet_id?: number;

  /** visibility from workbook.xml (hidden, veryHidden) */
  state?: string;

  /** worksheet element */
  root: XMLNode;
  rels: RelationshipMap;

  /** row attributes (height, hidden, outline level, style) by row */
  rows: Map<number, Record<string, string>>;

  drawing?: DrawingPart;

  /** tables we model, by table id */
  tables: Map<number, TablePart>;

  /** data validations of kinds we don't model */
  validations: XMLNode[];
}

const workbook_template = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<workbook xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main" xmlns:r="http://schemas.openxmlformats.org/officeDocument/2006/relationships">
<bookViews><workbookView activeTab="0"/></bookViews>
<sheets/>
<calcPr calcId="191029"/>
</workbook>`;

const worksheet_template = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<worksheet xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main" xmlns:r="http://schemas.openxmlformats.org/officeDocument/2006/relationships">
<sheetViews><sheetView workbookViewId="0"/></sheetViews>
<sheetFormatPr defaultRowHeight="15"/>
<sheetData/>
<pageMargins left="0.7" right="0.7" top="0.75" bottom="0.75" header="0.3" footer="0.3"/>
</worksheet>`;

/** worksheet children that point at other parts; copies don't get these */
const relationship_elements = [
  'drawing', 'legacyDrawing', 'legacyDrawingHF', 'drawingHF', 'picture',
  'oleObjects', 'controls', 'tableParts', 'hyperlinks',
];

/**
 * the container. holds the zip and the parsed parts we need; parts we
 * never parse stay in the zip as they were loaded.
 */
export class Package {

  public zip = new ZipWrapper();
  public content_types = new ContentTypes();

  public workbook_path = 'xl/workbook.xml';
  public workbook_root: XMLNode = {};
  public workbook_rels: RelationshipMap = {};

  public styles = StyleTable.Default();
  public shared_strings = new SharedStrings();

  /** by model sheet id */
  public sheets: Map<number, SheetPart> = new Map();

  /** custom properties root, if the file has one (or we need one) */
  public custom_properties?: XMLNode;

  /**
   * sheets we don't model (chart sheets, dialog sheets). their entries
   * in workbook.xml are kept and their parts are left alone.
   */
  public foreign_sheets: XMLNode[] = [];

  /**
   * defined names scoped to a sheet, and the sheet they belong to (a
   * model sheet id or a foreign sheet entry). localSheetId is a position
   * in the sheet list, so we renumber these on save.
   */
  public local_names: Map<XMLNode, number | XMLNode> = new Map();

  /**
   * a package for a new workbook. sheets are added when the workbook
   * is saved.
   */
  public static Create(): Package {

    const pkg = new Package();
    const root = Child(ParseXML(workbook_template), 'workbook');
    if (root) {
      pkg.workbook_root = root;
    }

    pkg.content_types.Add(pkg.workbook_path, ContentType.workbook);
    pkg.content_types.Add('xl/styles.xml', ContentType.styles);

    const package_rels: RelationshipMap = {};
    AddRel(package_rels, RelationshipType.office_document, pkg.workbook_path);
    WriteRels(pkg.zip, package_rels, '_rels/.rels');

    AddRel(pkg.workbook_rels, RelationshipType.styles, 'styles.xml');

    return pkg;

  }

  /**
   * open the structural parts of a container: content types, the
   * workbook and its relationships, styles, shared strings and custom
   * properties. throws on anything missing that we can't do without;
   * the importer turns that into a format error.
   */
  public static async Open(data: Uint8Array): Promise<Package> {

    const pkg = new Package();
    pkg.zip = await ZipWrapper.Load(data);
    pkg.content_types = ContentTypes.Read(pkg.zip);

    const office_document = FindRel(ReadRels(pkg.zip, '_rels/.rels'), RelationshipType.office_document);
    if (office_document) {
      pkg.workbook_path = ResolveTarget('', office_document.target);
    }

    if (!pkg.zip.Has(pkg.workbook_path)) {
      throw new Error(`missing workbook part: ${pkg.workbook_path}`);
    }

    const root = Child(ParseXML(pkg.zip.Get(pkg.workbook_path)), 'workbook');
    if (!root) {
      throw new Error('missing workbook element');
    }

    pkg.workbook_root = root;
    pkg.workbook_rels = ReadRels(pkg.zip, RelsPath(pkg.workbook_path));

    const styles = FindRel(pkg.workbook_rels, RelationshipType.styles);
    if (styles) {
      const path = ResolveTarget(pkg.workbook_path, styles.target);
      if (pkg.zip.Has(path)) {
        pkg.styles = StyleTable.FromXML(pkg.zip.Get(path));
      }
    }

    const strings = FindRel(pkg.workbook_rels, RelationshipType.shared_strings);
    if (strings) {
      const path = ResolveTarget(pkg.workbook_path, strings.target);
      if (pkg.zip.Has(path)) {
        pkg.shared_strings.FromXML(ParseXML(pkg.zip.Get(path)));
      }
    }

    const custom = FindRel(ReadRels(pkg.zip, '_rels/.rels'), RelationshipType.custom_properties);
    if (custom) {
      const path = ResolveTarget('', custom.target);
      if (pkg.zip.Has(path)) {
        pkg.custom_properties = Child(ParseXML(pkg.zip.Get(path)), 'Properties');
      }
    }

    return pkg;

  }

  /** sheet part for a new sheet */
  public static CreateSheetPart(): SheetPart {
    return {
      root: Child(ParseXML(worksheet_template), 'worksheet') || {},
      rels: {},
      rows: new Map(),
      tables: new Map(),
      validations: [],
    };
  }

  /** part for a sheet, creating a blank one if we don't have it yet */
  public EnsureSheet(id: number): SheetPart {
    let part = this.sheets.get(id);
    if (!part) {
      part = Package.CreateSheetPart();
      this.sheets.set(id, part);
    }
    return part;
  }

  /**
   * carry sheet-level settings over to a copied sheet: views, column
   * widths, page setup, row heights and the like. anything that points
   * at another part stays with the source. the copy is never the
   * selected tab.
   */
  public CopySheet(source_id: number, target_id: number): void {

    const source = this.sheets.get(source_id);
    if (!source) {
      return;
    }

    const root = CloneNode(source.root);
    for (const element of relationship_elements) {
      delete root[element];
    }

    for (const view of FindAll(root, 'sheetViews/sheetView')) {
      SetAttr(view, 'tabSelected', undefined);
    }

    const rows = new Map<number, Record<string, string>>();
    for (const [row, attributes] of source.rows) {
      rows.set(row, { ...attributes });
    }

    this.sheets.set(target_id, {
      root,
      rels: {},
      rows,
      tables: new Map(),
      validations: source.validations.map(node => CloneNode(node)),
      state: source.state,
    });

  }

  /**
   * first unused path like xl/worksheets/sheet{N}.xml
   */
  public NextPath(prefix: string, extension = '.xml'): string {
    for (let index = 1; ; index++) {
      const path = `${prefix}${index}${extension}`;
      if (!this.zip.Has(path) && !this.content_types.overrides.has(path)) {
        return path;
      }
    }
  }

  /**
   * remove a part, its rels part and its content type override
   */
  public RemovePart(path: string): void {
    this.zip.Delete(path);
    this.zip.Delete(RelsPath(path));
    this.content_types.Remove(path);
  }

}
