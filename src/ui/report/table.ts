/**
 * Text tables of rejection regions, one line per region in enumeration order
 */

import { SizePowerTable } from '../../domain/analysis/RegionAnalyzer';
import { RegionAnalysisResult } from '../../domain/results/RegionAnalysisResult';
import { Formatters } from './formatters';

export interface TableOptions {
  /** Significant digits printed for sizes and powers (default 6) */
  precision?: number;
}

/**
 * `region, size, power, dominated?, LRT?` listing of an analysis
 */
export function formatRegionTable(result: RegionAnalysisResult, options: TableOptions = {}): string {
  const fmt = Formatters.probability(options.precision);
  const lines = ['region, size, power, dominated?, LRT?'];

  for (const row of result.getRows()) {
    lines.push(
      `${row.region}, ${fmt(row.size)}, ${fmt(row.power)}, ${row.dominated}, ${row.lrt}`
    );
  }
  return lines.join('\n');
}

/**
 * `region, size, power` listing
 */
export function formatSizePowerTable(table: SizePowerTable, options: TableOptions = {}): string {
  const fmt = Formatters.probability(options.precision);
  const lines = ['region, size, power'];

  table.regions.forEach((region, i) => {
    lines.push(`${region}, ${fmt(table.sizes[i])}, ${fmt(table.powers[i])}`);
  });
  return lines.join('\n');
}
