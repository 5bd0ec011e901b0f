/**
 * Parser for the line-oriented bar chart race dataset format.
 *
 * ```
 * <title>
 * <x-axis label>
 * <data source>
 *
 * <n>
 * <caption>,<name>,<region>,<value>,<category>   (n rows)
 *
 * <n>
 * ...
 * ```
 *
 * @module parseDataset
 */

import { BarChartError } from '../errors';
import type { DatasetParseOptions, LabelMode } from '../config/types';

export interface DatasetRow {
  readonly name: string;
  readonly value: number;
  readonly category: string;
}

export interface DatasetFrame {
  readonly caption: string;
  readonly rows: ReadonlyArray<DatasetRow>;
}

export interface Dataset {
  readonly title: string;
  readonly xAxisLabel: string;
  readonly dataSource: string;
  /** Record count of the first frame; the most bars any caller should draw. */
  readonly maxBars: number;
  readonly frames: ReadonlyArray<DatasetFrame>;
}

const FIELDS_PER_ROW = 5;
const COUNT_RE = /^\d+$/;

const formatError = (lineNumber: number, message: string): BarChartError =>
  new BarChartError(`parseDataset: line ${lineNumber}: ${message}`, 'INVALID_FORMAT', 'parseDataset');

const toLabel = (name: string, region: string, mode: LabelMode): string =>
  mode === 'name' || region.length === 0 ? name : `${name}, ${region}`;

export function parseDataset(text: string, options?: DatasetParseOptions): Dataset {
  const labels = options?.labels ?? 'name-and-region';
  const lines = text.split(/\r?\n/);

  if (lines.length < 3) {
    throw formatError(lines.length, 'expected title, x-axis label and data source lines');
  }
  const [title, xAxisLabel, dataSource] = lines;

  const frames: DatasetFrame[] = [];
  let i = 3;

  const skipBlank = (): void => {
    while (i < lines.length && lines[i].trim() === '') i++;
  };

  skipBlank();
  while (i < lines.length) {
    const countLine = lines[i].trim();
    if (!COUNT_RE.test(countLine)) {
      throw formatError(i + 1, `expected a record count, got "${countLine}"`);
    }
    const count = Number(countLine);
    if (!Number.isSafeInteger(count)) {
      throw formatError(i + 1, `record count ${countLine} exceeds ${Number.MAX_SAFE_INTEGER}`);
    }
    i++;

    let caption = '';
    const rows: DatasetRow[] = [];
    for (let r = 0; r < count; r++, i++) {
      const line = i < lines.length ? lines[i].trim() : '';
      if (line === '') {
        throw formatError(i + 1, `expected ${count} records, found ${r}`);
      }

      const fields = line.split(',');
      if (fields.length !== FIELDS_PER_ROW) {
        throw formatError(i + 1, `expected ${FIELDS_PER_ROW} comma-separated fields, got ${fields.length}`);
      }
      const [rowCaption, name, region, valueField, category] = fields.map((f) => f.trim());
      if (!COUNT_RE.test(valueField)) {
        throw formatError(i + 1, `value must be a non-negative integer, got "${valueField}"`);
      }

      const value = Number(valueField);
      if (!Number.isSafeInteger(value)) {
        throw formatError(i + 1, `value ${valueField} exceeds ${Number.MAX_SAFE_INTEGER}`);
      }

      if (r === 0) caption = rowCaption;
      rows.push({ name: toLabel(name, region, labels), value, category });
    }

    frames.push({ caption, rows });
    skipBlank();
  }

  return {
    title,
    xAxisLabel,
    dataSource,
    maxBars: frames.length > 0 ? frames[0].rows.length : 0,
    frames,
  };
}
