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
  FormatError, SerialToDate,
  type Area, type ICellAddress,
} from 'forge-base-types';
import { ParseCellAddress, ParseReference } from 'forge-parser';
import {
  Workbook, Worksheet, ComparisonOperatorList,
  type Chart, type ComparisonOperator, type ConditionalFormatCondition,
  type DataValidationRule, type Operand, type ValidationOptions,
} from 'forge-data-model';
import { Package, type SheetPart, type DrawingPart } from './package';
import { ReadRels, RelsPath, ResolveTarget, RelationshipType } from './relationship';
import { IsDateFormat } from './style-table';
import { ReadTable } from './table';
import { ReadChart } from './chart';
import { ChartAnchors } from './drawing';
import { ReadPivots } from './custom-properties';
import {
  ParseXML, Attr, Child, Children, FindAll, Text, Flag, attrs,
  type XMLNode,
} from './xml-utils';

export interface ImportResult {
  workbook: Workbook;
  package: Package;
}

/** worksheet children we rebuild on save, so we don't carry them */
const owned_elements = [
  'dimension', 'sheetData', 'mergeCells', 'dataValidations',
  'conditionalFormatting', 'drawing', 'tableParts',
];

const validation_types: Record<string, DataValidationRule['type']> = {
  whole: 'whole',
  decimal: 'decimal',
  date: 'date',
  textLength: 'text-length',
  list: 'list',
  custom: 'custom',
};

const numeric = /^-?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/** space-separated list of references */
const ParseSqref = (sqref: string | undefined): Area[] => {
  if (!sqref) {
    return [];
  }
  return sqref.trim().split(/\s+/).map(ref => ParseReference(ref).area);
};

const NarrowOperator = (value: string | undefined): ComparisonOperator => {
  return ComparisonOperatorList.find(test => test === value) || 'between';
};

/**
 * reads a container into a workbook model, keeping the package around
 * so the exporter can write back everything we didn't model.
 */
export class Importer {

  protected workbook = new Workbook();
  protected max_table_id = 0;

  constructor(protected pkg: Package) {}

  /**
   * load a container. anything that goes wrong while reading it is
   * reported as a format error.
   */
  public static async Load(data: Uint8Array): Promise<ImportResult> {
    try {
      const pkg = await Package.Open(data);
      const importer = new Importer(pkg);
      return { workbook: importer.Read(), package: pkg };
    }
    catch (err) {
      if (err instanceof FormatError) {
        throw err;
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new FormatError(`cannot read workbook: ${message}`);
    }
  }

  public Read(): Workbook {

    const pkg = this.pkg;
    const workbook = this.workbook;

    workbook.styles.Load(pkg.styles.CellStyles(), pkg.styles.DifferentialStyles());

    const entries = FindAll(pkg.workbook_root, 'sheets/sheet');

    // list position -> model id or foreign entry, for scoped names
    const positions: Array<number | XMLNode> = [];

    for (const entry of entries) {

      const name = Attr(entry, 'name');
      const relationship = Attr(entry, 'r:id');
      const rel = relationship ? pkg.workbook_rels[relationship] : undefined;

      if (!name || !rel || rel.type !== RelationshipType.worksheet) {
        pkg.foreign_sheets.push(entry);
        positions.push(entry);
        continue;
      }

      const path = ResolveTarget(pkg.workbook_path, rel.target);
      if (!pkg.zip.Has(path)) {
        throw new FormatError(`missing worksheet part: ${path}`);
      }

      const root = Child(ParseXML(pkg.zip.Get(path)), 'worksheet');
      if (!root) {
        throw new FormatError(`missing worksheet element in ${path}`);
      }

      const sheet = new Worksheet(workbook.NextSheetId(), name);
      const part: SheetPart = {
        path,
        relationship,
        sheet_id: Number(Attr(entry, 'sheetId')) || undefined,
        state: Attr(entry, 'state'),
        root,
        rels: ReadRels(pkg.zip, RelsPath(path)),
        rows: new Map(),
        tables: new Map(),
        validations: [],
      };

      this.ReadSheet(sheet, part);

      workbook.AttachSheet(sheet);
      pkg.sheets.set(sheet.id, part);
      positions.push(sheet.id);

    }

    if (!workbook.sheets.length) {
      throw new FormatError('workbook has no worksheets');
    }

    for (const defined_name of FindAll(pkg.workbook_root, 'definedNames/definedName')) {
      const local = Attr(defined_name, 'localSheetId');
      if (local !== undefined) {
        const owner = positions[Number(local)];
        if (owner !== undefined) {
          pkg.local_names.set(defined_name, owner);
        }
      }
    }

    if (pkg.custom_properties) {
      for (const { sheet, pivot } of ReadPivots(pkg.custom_properties)) {
        workbook.FindSheet(sheet)?.pivots.push(pivot);
      }
    }

    workbook.ReserveIds(this.max_table_id, 0);
    workbook.dirty = false;

    return workbook;

  }

  protected ReadSheet(sheet: Worksheet, part: SheetPart): void {

    this.ReadCells(sheet, part);

    for (const merge of FindAll(part.root, 'mergeCells/mergeCell')) {
      const area = ParseReference(Attr(merge, 'ref') || '').area;
      sheet.merges.push(area);
      sheet.Grow(area.end);
    }

    this.ReadValidations(sheet, part);
    this.ReadConditionalFormats(sheet, part);
    this.ReadTables(sheet, part);
    this.ReadDrawing(sheet, part);

    for (const element of owned_elements) {
      delete part.root[element];
    }

  }

  protected ReadCells(sheet: Worksheet, part: SheetPart): void {

    const strings = this.pkg.shared_strings;
    const styles = this.workbook.styles;
    const table = this.pkg.styles;
    let row_index = 0;

    for (const row of FindAll(part.root, 'sheetData/row')) {

      row_index = Number(Attr(row, 'r')) || row_index + 1;

      const attributes: Record<string, string> = { ...row[attrs] };
      delete attributes.r;
      delete attributes.spans;

      if (Object.keys(attributes).length) {
        part.rows.set(row_index, attributes);
      }

      let column = 0;

      for (const element of Children(row, 'c')) {

        const reference = Attr(element, 'r');
        const address: ICellAddress | undefined = reference
          ? ParseCellAddress(reference)
          : { row: row_index, column: column + 1 };

        if (!address) {
          throw new FormatError(`invalid cell reference: ${reference}`);
        }

        column = address.column;

        const cell = sheet.EnsureCell(address);
        const style = Number(Attr(element, 's') || 0);
        cell.style = styles.Has(style) ? style : 0;

        const type = Attr(element, 't');
        const value = Child(element, 'v');
        const formula = Child(element, 'f');

        if (formula) {
          cell.formula = Text(formula);
          const formula_attributes = formula[attrs];
          if (formula_attributes && Object.keys(formula_attributes).length) {
            cell.formula_attributes = { ...formula_attributes };
          }
          if (value) {
            cell.cached = { type, text: Text(value) };
          }
          continue;
        }

        switch (type) {
          case 's': {
            const index = Number(Text(value));
            cell.value = strings.Get(index) || undefined;
            if (cell.value !== undefined) {
              cell.string_index = index;
            }
            break;
          }

          case 'inlineStr':
            cell.value = Text(Child(element, 'is')) || undefined;
            break;

          case 'str':
            cell.value = Text(value) || undefined;
            break;

          case 'b':
            if (value) {
              cell.value = Text(value) === '1' || Text(value) === 'true';
            }
            break;

          case 'e':
            if (value) {
              cell.cached = { type, text: Text(value) };
            }
            break;

          case 'd':
            if (value) {
              const date = new Date(Text(value));
              cell.value = isNaN(date.getTime()) ? Text(value) : date;
            }
            break;

          default:
            if (value) {
              const number = Number(Text(value));
              if (Text(value).trim() && Number.isFinite(number)) {
                cell.value = IsDateFormat(table.NumberFormat(cell.style)) ? SerialToDate(number) : number;
              }
            }
        }

      }
    }

  }

  /**
   * operand of a validation rule: numbers come back as numbers, anything
   * else is formula text.
   */
  protected Operand(node: XMLNode | undefined): Operand | undefined {
    if (!node) {
      return undefined;
    }
    const text = Text(node).trim();
    return numeric.test(text) ? Number(text) : text;
  }

  protected ReadValidations(sheet: Worksheet, part: SheetPart): void {

    for (const element of FindAll(part.root, 'dataValidations/dataValidation')) {

      const type = validation_types[Attr(element, 'type') || ''];
      const areas = ParseSqref(Attr(element, 'sqref'));

      if (!type || !areas.length) {
        part.validations.push(element);
        continue;
      }

      const options: ValidationOptions = {
        allow_blank: Flag(element, 'allowBlank'),
      };

      const error_style = Attr(element, 'errorStyle');
      if (error_style === 'stop' || error_style === 'warning' || error_style === 'information') {
        options.error_style = error_style;
      }

      const error_title = Attr(element, 'errorTitle');
      const error_message = Attr(element, 'error');
      const prompt_title = Attr(element, 'promptTitle');
      const prompt_message = Attr(element, 'prompt');

      if (error_title !== undefined) options.error_title = error_title;
      if (error_message !== undefined) options.error_message = error_message;
      if (prompt_title !== undefined) options.prompt_title = prompt_title;
      if (prompt_message !== undefined) options.prompt_message = prompt_message;

      const formula1 = Child(element, 'formula1');
      let rule: DataValidationRule | undefined;

      switch (type) {
        case 'list': {
          const text = Text(formula1).trim();
          const match = text.match(/^"(.*)"$/);
          rule = match
            ? { ...options, type, values: match[1].replace(/""/g, '"').split(',') }
            : { ...options, type, source: text };
          break;
        }

        case 'custom':
          rule = { ...options, type, formula: Text(formula1) };
          break;

        default: {
          const value1 = this.Operand(formula1);
          const value2 = this.Operand(Child(element, 'formula2'));
          if (value1 !== undefined) {
            rule = {
              ...options,
              type,
              operator: NarrowOperator(Attr(element, 'operator')),
              value1,
              ...(value2 === undefined ? {} : { value2 }),
            };
          }
        }
      }

      if (rule) {
        sheet.validations.push({ areas, rule });
        for (const area of areas) {
          sheet.Grow(area.end);
        }
      }
      else {
        part.validations.push(element);
      }

    }

  }

  /**
   * comparison operand in a conditional format: a number, a quoted
   * string, or formula text (which we mark with a leading =).
   */
  protected ConditionOperand(node: XMLNode | undefined): Operand | undefined {
    if (!node) {
      return undefined;
    }
    const text = Text(node).trim();
    if (numeric.test(text)) {
      return Number(text);
    }
    const quoted = text.match(/^"(.*)"$/);
    if (quoted) {
      return quoted[1].replace(/""/g, '"');
    }
    return '=' + text;
  }

  protected ReadConditionalFormats(sheet: Worksheet, part: SheetPart): void {

    for (const element of FindAll(part.root, 'conditionalFormatting')) {

      const areas = ParseSqref(Attr(element, 'sqref'));
      if (!areas.length) {
        continue;
      }

      for (const rule of Children(element, 'cfRule')) {

        const kind = Attr(rule, 'type') || '';
        const dxf = Attr(rule, 'dxfId');
        const formulas = Children(rule, 'formula');
        let condition: ConditionalFormatCondition = { type: 'preserved', kind, payload: rule };

        if (dxf !== undefined) {
          switch (kind) {
            case 'cellIs': {
              const value1 = this.ConditionOperand(formulas[0]);
              if (value1 !== undefined) {
                condition = {
                  type: 'comparison',
                  operator: NarrowOperator(Attr(rule, 'operator')),
                  value1,
                };
                const value2 = this.ConditionOperand(formulas[1]);
                if (value2 !== undefined) {
                  condition.value2 = value2;
                }
              }
              break;
            }

            case 'expression':
              if (formulas[0]) {
                condition = { type: 'expression', formula: Text(formulas[0]) };
              }
              break;

            case 'duplicateValues':
              condition = { type: 'duplicate' };
              break;

            case 'uniqueValues':
              condition = { type: 'unique' };
              break;
          }
        }

        sheet.conditional_formats.push({
          areas: areas.map(area => area.Clone()),
          condition,
          style: Number(dxf || 0),
          priority: Number(Attr(rule, 'priority')) || 1,
          ...(Flag(rule, 'stopIfTrue') ? { stop_if_true: true } : {}),
        });

      }

      for (const area of areas) {
        sheet.Grow(area.end);
      }

    }

    sheet.conditional_formats.sort((a, b) => a.priority - b.priority);

  }

  protected ReadTables(sheet: Worksheet, part: SheetPart): void {

    for (const element of FindAll(part.root, 'tableParts/tablePart')) {

      const relationship = Attr(element, 'r:id');
      const rel = relationship ? part.rels[relationship] : undefined;
      if (!relationship || !rel || !part.path) {
        continue;
      }

      const path = ResolveTarget(part.path, rel.target);
      if (!this.pkg.zip.Has(path)) {
        continue;
      }

      const root = Child(ParseXML(this.pkg.zip.Get(path)), 'table');
      const id = Number(Attr(root, 'id'));
      const table = root ? ReadTable(root, id) : undefined;

      if (!root || !table || !Number.isInteger(id)) {
        continue;
      }

      sheet.tables.push(table);
      sheet.Grow(table.area.end);
      part.tables.set(id, { path, relationship, root });
      this.max_table_id = Math.max(this.max_table_id, id);

    }

  }

  protected ReadDrawing(sheet: Worksheet, part: SheetPart): void {

    const relationship = Attr(Child(part.root, 'drawing'), 'r:id');
    const rel = relationship ? part.rels[relationship] : undefined;

    if (!relationship || !rel || !part.path) {
      return;
    }

    const path = ResolveTarget(part.path, rel.target);
    if (!this.pkg.zip.Has(path)) {
      return;
    }

    const root = Child(ParseXML(this.pkg.zip.Get(path)), 'xdr:wsDr');
    if (!root) {
      return;
    }

    const drawing: DrawingPart = {
      path,
      relationship,
      root,
      rels: ReadRels(this.pkg.zip, RelsPath(path)),
      charts: new Map(),
    };

    part.drawing = drawing;

    for (const anchor of ChartAnchors(root)) {

      const chart_rel = drawing.rels[anchor.relationship];
      if (!chart_rel || chart_rel.type !== RelationshipType.chart) {
        continue;
      }

      const chart_path = ResolveTarget(path, chart_rel.target);
      if (!this.pkg.zip.Has(chart_path) || !anchor.from) {
        continue;
      }

      const description = ReadChart(this.pkg.zip.Get(chart_path));
      if (!description) {
        continue;
      }

      const id = this.workbook.NextChartId();
      let name = anchor.name || `Chart ${id}`;
      if (sheet.charts.some(chart => chart.name.toLowerCase() === name.toLowerCase())) {
        name = `${name} (${id})`;
      }

      const chart: Chart = {
        id,
        name,
        ...description,
        anchor: anchor.from,
        width: Math.max(1, (anchor.to?.column ?? anchor.from.column + 8) - anchor.from.column),
        height: Math.max(1, (anchor.to?.row ?? anchor.from.row + 15) - anchor.from.row),
        preserved: true,
      };

      sheet.charts.push(chart);
      drawing.charts.set(id, { path: chart_path, relationship: anchor.relationship, anchor: anchor.node });

    }

  }

}
