/**
 * Size/power scatter data
 *
 * Turns an analysis into the points a plotting layer draws. No figure is
 * created here; the caller owns whatever canvas or chart consumes the spec.
 */

import { RatioOptions } from '../../core/options';
import { Region } from '../../core/regions';
import { RegionAnalysisResult } from '../../domain/results/RegionAnalysisResult';
import { selectWithStats } from '../../inference/RegionSelector';
import { RegionEncoding } from './colors';

export interface ScatterPoint {
  region: Region;
  size: number;
  power: number;
  color: string;
  radius: number;
}

export interface ScatterSpec {
  xLabel: 'size';
  yLabel: 'power';
  opacity: number;
  points: ScatterPoint[];

  /** Vertical line at the size budget, from power 0 to 1 */
  rule?: { x: number; y1: number; y2: number; color: string };

  /** The region the budget selects */
  selected?: ScatterPoint;
}

export interface ScatterOptions extends RatioOptions {
  /** Maximum size; adds the budget rule and the selected region */
  budget?: number;
}

/**
 * Colour by dominance, marker size by LRT membership
 */
export function encodeScatter(
  result: RegionAnalysisResult,
  options: ScatterOptions = {}
): ScatterSpec {
  const { budget, ...ratioOptions } = options;

  const spec: ScatterSpec = {
    xLabel: 'size',
    yLabel: 'power',
    opacity: RegionEncoding.opacity,
    points: result.getRows().map((row) => ({
      region: row.region,
      size: row.size,
      power: row.power,
      color: row.dominated ? RegionEncoding.color.dominated : RegionEncoding.color.undominated,
      radius: row.lrt ? RegionEncoding.radius.lrt : RegionEncoding.radius.other,
    })),
  };

  if (budget !== undefined) {
    const selection = selectWithStats(result.getPair(), budget, ratioOptions);
    spec.rule = { x: budget, y1: 0, y2: 1, color: RegionEncoding.color.budget };
    spec.selected = {
      region: selection.region,
      size: selection.stats.size,
      power: selection.stats.power,
      color: RegionEncoding.color.selected,
      radius: RegionEncoding.radius.selected,
    };
  }

  return spec;
}
