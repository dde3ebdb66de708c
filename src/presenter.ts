/**
 * Chart documents built from aggregate rows
 *
 * Charts are written as JSON descriptions (series of x/y points); drawing
 * them is left to whatever dashboard reads the plot directory.
 */

import type { AppConfig } from './config.js';
import type { Logger } from './logger.js';
import { saveJson } from './storage.js';
import { validateChartDocument } from '../schemas/index.js';
import type { AggregateRow, ChartDocument, ChartKind, ChartSeries, HistogramBin } from '../schemas/index.js';

/** Series name used for rows without a subject */
export const ALL_SUBJECTS_SERIES = 'All';

export interface ChartLabels {
  name: string;
  title: string;
  xLabel: string;
  yLabel: string;
}

/**
 * One series per subject, in row order, points keyed by month
 */
export function rowsToSeries(rows: readonly AggregateRow[]): ChartSeries[] {
  const series = new Map<string, ChartSeries>();

  for (const row of rows) {
    const name = row.subject ?? ALL_SUBJECTS_SERIES;
    let entry = series.get(name);
    if (!entry) {
      entry = { name, points: [] };
      series.set(name, entry);
    }
    entry.points.push({ x: row.timeBucket, y: row.value });
  }

  return Array.from(series.values());
}

function buildRowChart(kind: ChartKind, labels: ChartLabels, rows: readonly AggregateRow[]): ChartDocument | null {
  if (rows.length === 0) {
    return null;
  }
  return { ...labels, kind, series: rowsToSeries(rows) };
}

/**
 * @returns null when there are no rows to draw
 */
export function buildLineChart(labels: ChartLabels, rows: readonly AggregateRow[]): ChartDocument | null {
  return buildRowChart('line', labels, rows);
}

/**
 * @returns null when there are no rows to draw
 */
export function buildBarChart(labels: ChartLabels, rows: readonly AggregateRow[]): ChartDocument | null {
  return buildRowChart('bar', labels, rows);
}

/**
 * Histogram with one series per named distribution; x is the bin's lower bound
 *
 * @returns null when every distribution is empty
 */
export function buildHistogramChart(
  labels: ChartLabels,
  distributions: readonly { name: string; bins: readonly HistogramBin[] }[]
): ChartDocument | null {
  const series = distributions
    .filter((distribution) => distribution.bins.length > 0)
    .map((distribution) => ({
      name: distribution.name,
      points: distribution.bins.map((bin) => ({ x: bin.from, y: bin.count })),
    }));

  if (series.length === 0) {
    return null;
  }
  return { ...labels, kind: 'histogram', series };
}

export interface Presenter {
  /**
   * Write a chart to the plot directory. A null chart (no data) is logged
   * and skipped.
   *
   * @returns the written path, or null when skipped
   */
  render(name: string, chart: ChartDocument | null): Promise<string | null>;
}

export interface PresenterOptions {
  config: AppConfig;
  logger: Logger;
  save?: (dir: string, fileName: string, data: unknown) => Promise<string>;
}

export function createPresenter(options: PresenterOptions): Presenter {
  const { config, logger, save = saveJson } = options;

  return {
    async render(name, chart) {
      if (!chart) {
        logger.warn('plot:no-data', { chart: name });
        return null;
      }
      const document = validateChartDocument(chart);
      const filePath = await save(config.plotDir, `${document.name}.json`, document);
      logger.info('plot:saved', { file: filePath });
      return filePath;
    },
  };
}
