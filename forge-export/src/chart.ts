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

import { FormatReference, ParseReference } from 'forge-parser';
import type { Chart, ChartSeries, ChartType, SheetRange } from 'forge-data-model';
import {
  ParseXML, BuildXML, Child, Children, FindAll, Text, Attr,
  type DOMContent, type XMLNode,
} from './xml-utils';

const axis_ids = ['47003664', '1789284464'];

/**
 * title element. the text is a single run; rich formatting is left
 * to the application.
 */
const Title = (text: string): DOMContent => ({
  'c:tx': {
    'c:rich': {
      'a:bodyPr': {},
      'a:lstStyle': {},
      'a:p': {
        'a:pPr': { 'a:defRPr': {} },
        'a:r': {
          'a:rPr': { a$: { lang: 'en-US' } },
          'a:t': text,
        },
      },
    },
  },
  'c:overlay': { a$: { val: 0 } },
});

const Reference = (range: SheetRange) => FormatReference(range.area, range.sheet, true);

const SeriesName = (series: ChartSeries): DOMContent | undefined => {
  if (series.name_ref) {
    return { 'c:strRef': { 'c:f': Reference(series.name_ref) } };
  }
  if (series.name !== undefined) {
    return { 'c:v': series.name };
  }
  return undefined;
};

const Fill = (index: number): DOMContent => ({
  'a:solidFill': { 'a:schemeClr': { a$: { val: `accent${(index % 6) + 1}` } } },
});

/**
 * one series element. element order differs by chart type, so we build
 * the list in schema order for each.
 */
const Series = (type: ChartType, series: ChartSeries, index: number): DOMContent => {

  const element: DOMContent = {
    'c:idx': { a$: { val: index } },
    'c:order': { a$: { val: index } },
    'c:tx': SeriesName(series),
  };

  switch (type) {
    case 'line':
      element['c:spPr'] = { 'a:ln': { a$: { w: 28575, cap: 'rnd' }, ...Fill(index) } };
      element['c:marker'] = { 'c:symbol': { a$: { val: 'none' } } };
      break;

    case 'scatter':
      element['c:spPr'] = { 'a:ln': { a$: { w: 19050, cap: 'rnd' }, ...Fill(index) } };
      element['c:marker'] = { 'c:symbol': { a$: { val: 'circle' } } };
      break;

    case 'bar':
    case 'column':
      element['c:spPr'] = Fill(index);
      element['c:invertIfNegative'] = { a$: { val: 0 } };
      break;

    case 'pie':
      break;

    default:
      element['c:spPr'] = Fill(index);
  }

  if (type === 'scatter') {
    if (series.categories) {
      element['c:xVal'] = { 'c:numRef': { 'c:f': Reference(series.categories) } };
    }
    element['c:yVal'] = { 'c:numRef': { 'c:f': Reference(series.values) } };
    element['c:smooth'] = { a$: { val: 0 } };
  }
  else {
    if (series.categories) {
      element['c:cat'] = { 'c:strRef': { 'c:f': Reference(series.categories) } };
    }
    element['c:val'] = { 'c:numRef': { 'c:f': Reference(series.values) } };
    if (type === 'line') {
      element['c:smooth'] = { a$: { val: 0 } };
    }
  }

  return element;

};

/**
 * axis pair. scatter charts have two value axes; the rest have a
 * category axis and a value axis. horizontal bars swap positions.
 */
const Axes = (chart: Chart): DOMContent => {

  const horizontal = chart.type === 'bar';

  const common = (id: string, cross: string, position: string, title?: string): DOMContent => ({
    'c:axId': { a$: { val: id } },
    'c:scaling': { 'c:orientation': { a$: { val: 'minMax' } } },
    'c:delete': { a$: { val: 0 } },
    'c:axPos': { a$: { val: position } },
    'c:title': title ? Title(title) : undefined,
    'c:numFmt': { a$: { formatCode: 'General', sourceLinked: 1 } },
    'c:majorTickMark': { a$: { val: 'none' } },
    'c:minorTickMark': { a$: { val: 'none' } },
    'c:tickLblPos': { a$: { val: 'nextTo' } },
    'c:crossAx': { a$: { val: cross } },
    'c:crosses': { a$: { val: 'autoZero' } },
  });

  const x = common(axis_ids[0], axis_ids[1], horizontal ? 'l' : 'b', chart.x_axis_title);
  const y = common(axis_ids[1], axis_ids[0], horizontal ? 'b' : 'l', chart.y_axis_title);

  if (chart.type === 'scatter') {
    return {
      'c:valAx': [
        { ...x, 'c:crossBetween': { a$: { val: 'midCat' } } },
        { ...y, 'c:crossBetween': { a$: { val: 'midCat' } } },
      ],
    };
  }

  return {
    'c:catAx': {
      ...x,
      'c:auto': { a$: { val: 1 } },
      'c:lblAlgn': { a$: { val: 'ctr' } },
      'c:lblOffset': { a$: { val: 100 } },
      'c:noMultiLvlLbl': { a$: { val: 0 } },
    },
    'c:valAx': {
      ...y,
      'c:crossBetween': { a$: { val: 'between' } },
    },
  };

};

const PlotElement = (chart: Chart): [string, DOMContent] => {

  const series = chart.series.map((entry, index) => Series(chart.type, entry, index));
  const axes = { 'c:axId': axis_ids.map(id => ({ a$: { val: id } })) };

  switch (chart.type) {
    case 'bar':
    case 'column':
      return ['c:barChart', {
        'c:barDir': { a$: { val: chart.type === 'bar' ? 'bar' : 'col' } },
        'c:grouping': { a$: { val: 'clustered' } },
        'c:varyColors': { a$: { val: 0 } },
        'c:ser': series,
        'c:gapWidth': { a$: { val: 219 } },
        'c:overlap': { a$: { val: -27 } },
        ...axes,
      }];

    case 'line':
      return ['c:lineChart', {
        'c:grouping': { a$: { val: 'standard' } },
        'c:varyColors': { a$: { val: 0 } },
        'c:ser': series,
        'c:marker': { a$: { val: 1 } },
        ...axes,
      }];

    case 'area':
      return ['c:areaChart', {
        'c:grouping': { a$: { val: 'standard' } },
        'c:varyColors': { a$: { val: 0 } },
        'c:ser': series,
        ...axes,
      }];

    case 'scatter':
      return ['c:scatterChart', {
        'c:scatterStyle': { a$: { val: 'lineMarker' } },
        'c:varyColors': { a$: { val: 0 } },
        'c:ser': series,
        ...axes,
      }];

    case 'pie':
      return ['c:pieChart', {
        'c:varyColors': { a$: { val: 1 } },
        'c:ser': series,
        'c:firstSliceAng': { a$: { val: 0 } },
      }];
  }

};

/**
 * chart part for a chart created in this session
 */
export const CreateChartXML = (chart: Chart): string => {

  const [element, plot] = PlotElement(chart);
  const legend = chart.type === 'pie' || chart.series.length > 1;

  const dom: DOMContent = {
    'c:chartSpace': {
      a$: {
        'xmlns:c': 'http://schemas.openxmlformats.org/drawingml/2006/chart',
        'xmlns:a': 'http://schemas.openxmlformats.org/drawingml/2006/main',
        'xmlns:r': 'http://schemas.openxmlformats.org/officeDocument/2006/relationships',
      },
      'c:date1904': { a$: { val: 0 } },
      'c:lang': { a$: { val: 'en-US' } },
      'c:roundedCorners': { a$: { val: 0 } },
      'c:chart': {
        'c:title': chart.title ? Title(chart.title) : undefined,
        'c:autoTitleDeleted': { a$: { val: chart.title ? 0 : 1 } },
        'c:plotArea': {
          'c:layout': {},
          [element]: plot,
          ...(chart.type === 'pie' ? {} : Axes(chart)),
        },
        'c:legend': legend ? {
          'c:legendPos': { a$: { val: 'b' } },
          'c:overlay': { a$: { val: 0 } },
        } : undefined,
        'c:plotVisOnly': { a$: { val: 1 } },
        'c:dispBlanksAs': { a$: { val: 'gap' } },
      },
    },
  };

  return BuildXML(dom);

};

// --- reading -----------------------------------------------------------------

/** what we can read from a chart part */
export interface ChartDescription {
  type: ChartType;
  title?: string;
  x_axis_title?: string;
  y_axis_title?: string;
  series: ChartSeries[];
}

const TitleText = (title: XMLNode | undefined): string | undefined => {
  if (!title) {
    return undefined;
  }
  const runs = FindAll(title, 'c:tx/c:rich/a:p/a:r/a:t');
  if (runs.length) {
    return runs.map(run => Text(run)).join('');
  }
  const cached = FindAll(title, 'c:tx/c:strRef/c:strCache/c:pt/c:v');
  return cached.length ? Text(cached[0]) : undefined;
};

/**
 * parse a range from a series formula. anything that isn't a plain
 * reference with a sheet name (named ranges, literal arrays) reads as
 * undefined.
 */
const RangeOf = (node: XMLNode | undefined): SheetRange | undefined => {
  const formula = FindAll(node, 'c:numRef/c:f')[0] || FindAll(node, 'c:strRef/c:f')[0];
  if (!formula) {
    return undefined;
  }
  try {
    const parsed = ParseReference(Text(formula).replace(/^\(|\)$/g, ''));
    return parsed.sheet === undefined ? undefined : { sheet: parsed.sheet, area: parsed.area };
  }
  catch {
    return undefined;
  }
};

const plot_types: Array<[string, ChartType]> = [
  ['c:lineChart', 'line'], ['c:line3DChart', 'line'],
  ['c:barChart', 'column'], ['c:bar3DChart', 'column'],
  ['c:pieChart', 'pie'], ['c:pie3DChart', 'pie'], ['c:doughnutChart', 'pie'],
  ['c:scatterChart', 'scatter'], ['c:bubbleChart', 'scatter'],
  ['c:areaChart', 'area'], ['c:area3DChart', 'area'],
];

/**
 * describe a chart part. returns undefined for chart kinds we don't
 * model (radar, stock, surface, combinations we can't read) or for
 * series we can't resolve; those charts are carried through untouched.
 */
export const ReadChart = (data: string): ChartDescription | undefined => {

  const chart = FindAll(ParseXML(data), 'c:chartSpace/c:chart')[0];
  const plot_area = Child(chart, 'c:plotArea');
  if (!plot_area) {
    return undefined;
  }

  let type: ChartType | undefined;
  let plot: XMLNode | undefined;

  for (const [element, chart_type] of plot_types) {
    plot = Child(plot_area, element);
    if (plot) {
      type = chart_type;
      if (element.startsWith('c:bar') && Attr(Child(plot, 'c:barDir'), 'val') === 'bar') {
        type = 'bar';
      }
      break;
    }
  }

  if (!type || !plot) {
    return undefined;
  }

  const series: ChartSeries[] = [];

  for (const ser of Children(plot, 'c:ser')) {

    const values = RangeOf(Child(ser, 'c:val') || Child(ser, 'c:yVal'));
    if (!values) {
      return undefined;
    }

    const entry: ChartSeries = {
      values,
      categories: RangeOf(Child(ser, 'c:cat') || Child(ser, 'c:xVal')),
    };

    const tx = Child(ser, 'c:tx');
    if (tx) {
      entry.name_ref = RangeOf(tx);
      const literal = Child(tx, 'c:v');
      const cached = FindAll(tx, 'c:strRef/c:strCache/c:pt/c:v')[0];
      if (literal || cached) {
        entry.name = Text(literal || cached);
      }
    }

    series.push(entry);

  }

  if (!series.length) {
    return undefined;
  }

  const axes = [...Children(plot_area, 'c:catAx'), ...Children(plot_area, 'c:dateAx'), ...Children(plot_area, 'c:valAx')];
  const horizontal = (position?: string) => position === 'b' || position === 't';
  const x_axis = axes.find(axis => horizontal(Attr(Child(axis, 'c:axPos'), 'val')) !== (type === 'bar'));
  const y_axis = axes.find(axis => axis !== x_axis);

  return {
    type,
    title: TitleText(Child(chart, 'c:title')),
    x_axis_title: TitleText(Child(x_axis, 'c:title')),
    y_axis_title: TitleText(Child(y_axis, 'c:title')),
    series,
  };

};
