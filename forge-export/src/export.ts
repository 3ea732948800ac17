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

import { Area, DateToSerial } from 'forge-base-types';
import { InferValue } from 'forge-parser';
import type {
  Cell, ConditionalFormatRule, DataValidationEntry, DataValidationRule,
  Operand, Workbook, Worksheet,
} from 'forge-data-model';
import type { Package, SheetPart, DrawingPart } from './package';
import { ContentType } from './content-types';
import {
  AddRel, FindRel, ReadRels, RelativeTarget, RelsPath, ResolveTarget, WriteRels,
  RelationshipType,
} from './relationship';
import { CreateChartXML } from './chart';
import { AllAnchors, CreateChartAnchor, CreateDrawing, MaxShapeId, RemoveAnchor } from './drawing';
import { CreateTable, UpdateTable, TableOrder } from './table';
import { CreateProperties, WritePivots } from './custom-properties';
import {
  BuildXML, ToDOM, Reorder, CreateNode, IsXMLNode,
  Attr, Child, Children, FindAll, SetAttr,
  type DOMContent, type XMLNode,
} from './xml-utils';

/** CT_Worksheet child order */
const worksheet_order = [
  'sheetPr', 'dimension', 'sheetViews', 'sheetFormatPr', 'cols', 'sheetData',
  'sheetCalcPr', 'sheetProtection', 'protectedRanges', 'scenarios', 'autoFilter',
  'sortState', 'dataConsolidate', 'customSheetViews', 'mergeCells', 'phoneticPr',
  'conditionalFormatting', 'dataValidations', 'hyperlinks', 'printOptions',
  'pageMargins', 'pageSetup', 'headerFooter', 'rowBreaks', 'colBreaks',
  'customProperties', 'cellWatches', 'ignoredErrors', 'smartTags', 'drawing',
  'legacyDrawing', 'legacyDrawingHF', 'drawingHF', 'picture', 'oleObjects',
  'controls', 'webPublishItems', 'tableParts', 'extLst',
];

/** CT_Workbook child order */
const workbook_order = [
  'fileVersion', 'fileSharing', 'workbookPr', 'workbookProtection', 'bookViews',
  'sheets', 'functionGroups', 'externalReferences', 'definedNames', 'calcPr',
  'oleSize', 'customWorkbookViews', 'pivotCaches', 'smartTagPr', 'smartTagTypes',
  'webPublishing', 'fileRecoveryPr', 'webPublishObjects', 'extLst',
];

const relationships_namespace = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';

const package_rels_path = '_rels/.rels';

/** model validation type -> attribute value */
const validation_types: Record<DataValidationRule['type'], string> = {
  'whole': 'whole',
  'decimal': 'decimal',
  'date': 'date',
  'text-length': 'textLength',
  'list': 'list',
  'custom': 'custom',
};

/** formula text as stored in the file, without the leading = */
const FormulaText = (text: string) => text.trim().replace(/^=/, '');

/**
 * writes a workbook model into its package and generates the archive.
 * parts we own are rebuilt from the model; everything else in the
 * package goes out as it came in.
 */
export class Exporter {

  /** set if we write a formula without a cached value */
  protected needs_calculation = false;

  constructor(protected workbook: Workbook, protected pkg: Package) {}

  public static async Export(workbook: Workbook, pkg: Package): Promise<Buffer> {
    const exporter = new Exporter(workbook, pkg);
    exporter.Write();
    return pkg.zip.Generate();
  }

  /**
   * update every part in the package. synchronous; only generating the
   * archive is async. shared formulas that lost their master cell are
   * released first, see Worksheet.ReleaseSharedFormulas.
   */
  public Write(): void {

    this.workbook.ReleaseSharedFormulas();
    this.RemoveDeletedSheets();

    for (const sheet of this.workbook.sheets) {
      const part = this.pkg.EnsureSheet(sheet.id);
      this.AssignPath(part);
      this.WriteSheet(sheet, part);
    }

    this.WriteStyles();
    this.WriteSharedStrings();
    this.WriteCustomProperties();
    this.WriteWorkbook();

    WriteRels(this.pkg.zip, this.pkg.workbook_rels, RelsPath(this.pkg.workbook_path));
    this.pkg.content_types.Write(this.pkg.zip);

  }

  // --- sheets ----------------------------------------------------------------

  /**
   * drop parts for sheets that are no longer in the workbook, along with
   * their drawings, charts and tables, and names scoped to them.
   */
  protected RemoveDeletedSheets(): void {

    const ids = new Set(this.workbook.sheets.map(sheet => sheet.id));

    for (const [id, part] of Array.from(this.pkg.sheets.entries())) {

      if (ids.has(id)) {
        continue;
      }

      if (part.drawing) {
        this.RemoveDrawing(part, part.drawing);
      }

      for (const table of part.tables.values()) {
        this.pkg.RemovePart(table.path);
      }

      if (part.path) {
        this.pkg.RemovePart(part.path);
      }

      if (part.relationship) {
        delete this.pkg.workbook_rels[part.relationship];
      }

      this.pkg.sheets.delete(id);

      const names = Child(this.pkg.workbook_root, 'definedNames');
      for (const [node, owner] of Array.from(this.pkg.local_names.entries())) {
        if (owner === id) {
          this.pkg.local_names.delete(node);
          if (names) {
            names.definedName = Children(names, 'definedName').filter(test => test !== node);
          }
        }
      }

    }

  }

  /** give a new sheet its part path, relationship and sheet id */
  protected AssignPath(part: SheetPart): void {

    if (part.path) {
      return;
    }

    const path = this.pkg.NextPath('xl/worksheets/sheet');
    this.pkg.content_types.Add(path, ContentType.worksheet);

    part.path = path;
    part.relationship = AddRel(this.pkg.workbook_rels, RelationshipType.worksheet,
      RelativeTarget(this.pkg.workbook_path, path));

    const used = [
      ...Array.from(this.pkg.sheets.values()).map(test => test.sheet_id || 0),
      ...this.pkg.foreign_sheets.map(entry => Number(Attr(entry, 'sheetId')) || 0),
    ];
    part.sheet_id = Math.max(0, ...used) + 1;

  }

  protected WriteSheet(sheet: Worksheet, part: SheetPart): void {

    const path = part.path;
    if (!path) {
      return;
    }

    if (!Attr(part.root, 'xmlns:r')) {
      SetAttr(part.root, 'xmlns:r', relationships_namespace);
    }

    const dom = ToDOM(part.root);

    dom.dimension = { a$: { ref: sheet.extent_area?.spreadsheet_label || 'A1' } };
    dom.sheetData = { row: this.RowsDOM(sheet, part) };

    if (sheet.merges.length) {
      dom.mergeCells = {
        a$: { count: sheet.merges.length },
        mergeCell: sheet.merges.map(area => ({ a$: { ref: area.spreadsheet_label } })),
      };
    }

    const formats = this.ConditionalFormatsDOM(sheet.conditional_formats);
    if (formats.length) {
      dom.conditionalFormatting = formats;
    }

    const validations = [
      ...sheet.validations.map(entry => this.ValidationDOM(entry)),
      ...part.validations.map(node => ToDOM(node)),
    ];

    if (validations.length) {
      dom.dataValidations = {
        a$: { count: validations.length },
        dataValidation: validations,
      };
    }

    const drawing = this.WriteDrawing(sheet, part);
    if (drawing) {
      dom.drawing = { a$: { 'r:id': drawing } };
    }

    const tables = this.WriteTables(sheet, part);
    if (tables.length) {
      dom.tableParts = {
        a$: { count: tables.length },
        tablePart: tables.map(relationship => ({ a$: { 'r:id': relationship } })),
      };
    }

    WriteRels(this.pkg.zip, part.rels, RelsPath(path));
    this.pkg.zip.Set(path, BuildXML({ worksheet: Reorder(dom, worksheet_order) }));

  }

  /**
   * rows in order. a row is written if it has cells to write or if it
   * carries attributes of its own (height, hidden, style).
   */
  protected RowsDOM(sheet: Worksheet, part: SheetPart): DOMContent[] {

    const indexes = Array.from(new Set([...sheet.cells.keys(), ...part.rows.keys()])).sort((a, b) => a - b);
    const rows: DOMContent[] = [];

    for (const row of indexes) {

      const cells: DOMContent[] = [];
      const columns = sheet.cells.get(row);

      if (columns) {
        for (const column of Array.from(columns.keys()).sort((a, b) => a - b)) {
          const cell = columns.get(column);
          if (cell && !cell.empty) {
            cells.push(this.CellDOM({ row, column }, cell));
          }
        }
      }

      const attributes = part.rows.get(row);
      if (!cells.length && !attributes) {
        continue;
      }

      rows.push({
        a$: { r: row, ...attributes },
        c: cells,
      });

    }

    return rows;

  }

  protected CellDOM(address: { row: number, column: number }, cell: Cell): DOMContent {

    const element: DOMContent = {};
    const attributes: Record<string, string | number | undefined> = {
      r: Area.CellAddressToLabel(address),
      s: cell.style || undefined,
    };

    element.a$ = attributes;

    if (cell.formula !== undefined) {
      const formula: DOMContent = {};
      if (cell.formula_attributes) {
        formula.a$ = { ...cell.formula_attributes };
      }
      if (cell.formula) {
        formula.t$ = cell.formula;
      }
      element.f = formula;
      if (cell.cached) {
        attributes.t = cell.cached.type;
        element.v = cell.cached.text;
      }
      else {
        this.needs_calculation = true;
      }
      return element;
    }

    const value = cell.value;

    if (value instanceof Date) {
      element.v = String(DateToSerial(value));
    }
    else if (typeof value === 'boolean') {
      attributes.t = 'b';
      element.v = value ? '1' : '0';
    }
    else if (typeof value === 'number') {
      element.v = String(value);
    }
    else if (typeof value === 'string') {
      const strings = this.pkg.shared_strings;
      attributes.t = 's';
      element.v = String(cell.string_index !== undefined && strings.Get(cell.string_index) === value
        ? cell.string_index : strings.Ensure(value));
    }
    else if (cell.cached) {
      attributes.t = cell.cached.type;
      element.v = cell.cached.text;
    }

    return element;

  }

  // --- validations and conditional formats -----------------------------------

  /**
   * operand as formula text. date rules take date literals, which we
   * write as serial numbers.
   */
  protected ValidationOperand(type: DataValidationRule['type'], operand: Operand): string {
    if (typeof operand === 'number') {
      return String(operand);
    }
    const text = FormulaText(operand);
    if (type === 'date') {
      const inferred = InferValue(text);
      if (inferred.value instanceof Date) {
        return String(DateToSerial(inferred.value));
      }
    }
    return text;
  }

  protected ValidationDOM(entry: DataValidationEntry): DOMContent {

    const rule = entry.rule;
    const element: DOMContent = {};

    const attributes: Record<string, string | number | undefined> = {
      type: validation_types[rule.type],
      allowBlank: rule.allow_blank === false ? undefined : 1,
      showInputMessage: rule.prompt_message || rule.prompt_title ? 1 : undefined,
      showErrorMessage: 1,
      errorStyle: rule.error_style && rule.error_style !== 'stop' ? rule.error_style : undefined,
      errorTitle: rule.error_title,
      error: rule.error_message,
      promptTitle: rule.prompt_title,
      prompt: rule.prompt_message,
      sqref: entry.areas.map(area => area.spreadsheet_label).join(' '),
    };

    element.a$ = attributes;

    switch (rule.type) {
      case 'list':
        element.formula1 = rule.values?.length
          ? `"${rule.values.map(value => value.replace(/"/g, '""')).join(',')}"`
          : FormulaText(rule.source || '');
        break;

      case 'custom':
        element.formula1 = FormulaText(rule.formula);
        break;

      default:
        attributes.operator = rule.operator;
        element.formula1 = this.ValidationOperand(rule.type, rule.value1);
        if (rule.value2 !== undefined && (rule.operator === 'between' || rule.operator === 'notBetween')) {
          element.formula2 = this.ValidationOperand(rule.type, rule.value2);
        }
    }

    return element;

  }

  /** comparison operand: number, formula, or quoted text */
  protected ConditionOperand(operand: Operand): string {
    if (typeof operand === 'number') {
      return String(operand);
    }
    if (operand.trim().startsWith('=')) {
      return FormulaText(operand);
    }
    return `"${operand.replace(/"/g, '""')}"`;
  }

  protected ConditionalFormatsDOM(rules: ConditionalFormatRule[]): DOMContent[] {

    const list: DOMContent[] = [];

    for (const rule of rules) {

      const condition = rule.condition;
      let element: DOMContent | undefined;

      const attributes = (type: string, extra: Record<string, string | number | undefined> = {}) => ({
        type,
        dxfId: rule.style,
        priority: rule.priority,
        stopIfTrue: rule.stop_if_true ? 1 : undefined,
        ...extra,
      });

      switch (condition.type) {
        case 'comparison':
          element = {
            a$: attributes('cellIs', { operator: condition.operator }),
            formula: [condition.value1, condition.value2]
              .filter((operand): operand is Operand => operand !== undefined)
              .map(operand => ({ t$: this.ConditionOperand(operand) })),
          };
          break;

        case 'expression':
          element = {
            a$: attributes('expression'),
            formula: FormulaText(condition.formula),
          };
          break;

        case 'duplicate':
          element = { a$: attributes('duplicateValues') };
          break;

        case 'unique':
          element = { a$: attributes('uniqueValues') };
          break;

        case 'preserved':
          if (IsXMLNode(condition.payload)) {
            const node = condition.payload;
            SetAttr(node, 'priority', String(rule.priority));
            element = ToDOM(node);
          }
          break;
      }

      if (element) {
        list.push({
          a$: { sqref: rule.areas.map(area => area.spreadsheet_label).join(' ') },
          cfRule: element,
        });
      }

    }

    return list;

  }

  // --- drawings and charts ---------------------------------------------------

  protected RemoveDrawing(part: SheetPart, drawing: DrawingPart): void {
    for (const rel of Object.values(drawing.rels)) {
      if (rel.type === RelationshipType.chart) {
        this.pkg.RemovePart(ResolveTarget(drawing.path, rel.target));
      }
    }
    this.pkg.RemovePart(drawing.path);
    delete part.rels[drawing.relationship];
    part.drawing = undefined;
  }

  /**
   * bring the drawing in line with the sheet's charts. a drawing we
   * don't change is not rewritten. returns the relationship id, or
   * undefined if the sheet has no drawing.
   */
  protected WriteDrawing(sheet: Worksheet, part: SheetPart): string | undefined {

    const path = part.path;
    if (!path) {
      return undefined;
    }

    let drawing = part.drawing;
    let changed = false;

    const ids = new Set(sheet.charts.map(chart => chart.id));

    if (drawing) {
      for (const [id, chart] of Array.from(drawing.charts.entries())) {
        if (!ids.has(id)) {
          RemoveAnchor(drawing.root, chart.anchor);
          delete drawing.rels[chart.relationship];
          this.pkg.RemovePart(chart.path);
          drawing.charts.delete(id);
          changed = true;
        }
      }
    }

    const added = sheet.charts.filter(chart => !drawing?.charts.has(chart.id));

    if (added.length && !drawing) {
      const drawing_path = this.pkg.NextPath('xl/drawings/drawing');
      this.pkg.content_types.Add(drawing_path, ContentType.drawing);
      drawing = {
        path: drawing_path,
        relationship: AddRel(part.rels, RelationshipType.drawing, RelativeTarget(path, drawing_path)),
        root: CreateDrawing(),
        rels: {},
        charts: new Map(),
      };
      part.drawing = drawing;
    }

    if (!drawing) {
      return undefined;
    }

    for (const chart of added) {

      const chart_path = this.pkg.NextPath('xl/charts/chart');
      this.pkg.content_types.Add(chart_path, ContentType.chart);
      this.pkg.zip.Set(chart_path, CreateChartXML(chart));

      const relationship = AddRel(drawing.rels, RelationshipType.chart, RelativeTarget(drawing.path, chart_path));
      const anchor = CreateChartAnchor(chart, relationship, MaxShapeId(drawing.root) + 1);

      drawing.root['xdr:twoCellAnchor'] = [...Children(drawing.root, 'xdr:twoCellAnchor'), anchor];
      drawing.charts.set(chart.id, { path: chart_path, relationship, anchor });
      changed = true;

    }

    if (!AllAnchors(drawing.root).length) {
      this.RemoveDrawing(part, drawing);
      return undefined;
    }

    if (changed) {
      if (!Attr(drawing.root, 'xmlns:a')) {
        SetAttr(drawing.root, 'xmlns:a', 'http://schemas.openxmlformats.org/drawingml/2006/main');
      }
      this.pkg.zip.Set(drawing.path, BuildXML({ 'xdr:wsDr': ToDOM(drawing.root) }));
      WriteRels(this.pkg.zip, drawing.rels, RelsPath(drawing.path));
    }

    return drawing.relationship;

  }

  // --- tables ----------------------------------------------------------------

  /** write table parts; returns relationship ids in table order */
  protected WriteTables(sheet: Worksheet, part: SheetPart): string[] {

    const path = part.path;
    if (!path) {
      return [];
    }

    const ids = new Set(sheet.tables.map(table => table.id));

    for (const [id, table] of Array.from(part.tables.entries())) {
      if (!ids.has(id)) {
        this.pkg.RemovePart(table.path);
        delete part.rels[table.relationship];
        part.tables.delete(id);
      }
    }

    return sheet.tables.map(table => {

      let table_part = part.tables.get(table.id);

      if (table_part) {
        UpdateTable(table_part.root, table);
      }
      else {
        const table_path = this.pkg.NextPath('xl/tables/table');
        this.pkg.content_types.Add(table_path, ContentType.table);
        table_part = {
          path: table_path,
          relationship: AddRel(part.rels, RelationshipType.table, RelativeTarget(path, table_path)),
          root: CreateTable(table),
        };
        part.tables.set(table.id, table_part);
      }

      this.pkg.zip.Set(table_part.path, BuildXML({ table: Reorder(ToDOM(table_part.root), TableOrder) }));
      return table_part.relationship;

    });

  }

  // --- workbook-level parts --------------------------------------------------

  /** path for a part the workbook points at, adding it if it's new */
  protected WorkbookPart(type: string, content_type: string, default_path: string): string {
    const rel = FindRel(this.pkg.workbook_rels, type);
    if (rel) {
      return ResolveTarget(this.pkg.workbook_path, rel.target);
    }
    AddRel(this.pkg.workbook_rels, type, RelativeTarget(this.pkg.workbook_path, default_path));
    this.pkg.content_types.Add(default_path, content_type);
    return default_path;
  }

  protected WriteStyles(): void {
    this.pkg.styles.Update(this.workbook.styles);
    const path = this.WorkbookPart(RelationshipType.styles, ContentType.styles, 'xl/styles.xml');
    this.pkg.zip.Set(path, this.pkg.styles.ToXML());
  }

  protected WriteSharedStrings(): void {
    const strings = this.pkg.shared_strings;
    if (!strings.count && !FindRel(this.pkg.workbook_rels, RelationshipType.shared_strings)) {
      return;
    }
    const path = this.WorkbookPart(RelationshipType.shared_strings, ContentType.shared_strings, 'xl/sharedStrings.xml');
    this.pkg.zip.Set(path, strings.ToXML());
  }

  /**
   * pivot definitions live in a custom document property. the part is
   * created when the first pivot is saved and the property is removed
   * when the last one goes.
   */
  protected WriteCustomProperties(): void {

    const pivots = this.workbook.AllPivots().map(({ sheet, pivot }) => ({ sheet: sheet.name, pivot }));

    if (!pivots.length && !this.pkg.custom_properties) {
      return;
    }

    const root = this.pkg.custom_properties || CreateProperties();
    this.pkg.custom_properties = root;

    const rels = ReadRels(this.pkg.zip, package_rels_path);
    const rel = FindRel(rels, RelationshipType.custom_properties);
    const path = rel ? ResolveTarget('', rel.target) : 'docProps/custom.xml';

    if (WritePivots(root, pivots)) {
      this.pkg.zip.Set(path, BuildXML({ Properties: ToDOM(root) }));
      this.pkg.content_types.Add(path, ContentType.custom_properties);
      if (!rel) {
        AddRel(rels, RelationshipType.custom_properties, path);
      }
    }
    else {
      this.pkg.RemovePart(path);
      if (rel) {
        delete rels[rel.id];
      }
      this.pkg.custom_properties = undefined;
    }

    WriteRels(this.pkg.zip, rels, package_rels_path);

  }

  /**
   * sheet list in model order (sheets we don't model go last), scoped
   * names renumbered, and a recalculation flag if we wrote formulas
   * without results.
   */
  protected WriteWorkbook(): void {

    const root = this.pkg.workbook_root;
    const positions: Map<number | XMLNode, number> = new Map();

    const entries: XMLNode[] = this.workbook.sheets.map((sheet, index) => {
      const part = this.pkg.EnsureSheet(sheet.id);
      positions.set(sheet.id, index);
      return CreateNode({
        name: sheet.name,
        sheetId: part.sheet_id,
        state: part.state,
        'r:id': part.relationship,
      });
    });

    this.pkg.foreign_sheets.forEach((entry, index) => {
      positions.set(entry, this.workbook.sheets.length + index);
      entries.push(entry);
    });

    let sheets = Child(root, 'sheets');
    if (!sheets) {
      sheets = CreateNode();
      root.sheets = [sheets];
    }
    sheets.sheet = entries;

    for (const [node, owner] of this.pkg.local_names) {
      const position = positions.get(owner);
      if (position !== undefined) {
        SetAttr(node, 'localSheetId', String(position));
      }
    }

    const names = Child(root, 'definedNames');
    if (names && !Children(names, 'definedName').length) {
      delete root.definedNames;
    }

    for (const view of FindAll(root, 'bookViews/workbookView')) {
      if (Number(Attr(view, 'activeTab') || 0) >= this.workbook.sheets.length) {
        SetAttr(view, 'activeTab', '0');
      }
      if (Number(Attr(view, 'firstSheet') || 0) >= this.workbook.sheets.length) {
        SetAttr(view, 'firstSheet', undefined);
      }
    }

    if (this.needs_calculation) {
      let calc = Child(root, 'calcPr');
      if (!calc) {
        calc = CreateNode();
        root.calcPr = [calc];
      }
      SetAttr(calc, 'fullCalcOnLoad', '1');
    }

    this.pkg.zip.Set(this.pkg.workbook_path, BuildXML({ workbook: Reorder(ToDOM(root), workbook_order) }));

  }

}
