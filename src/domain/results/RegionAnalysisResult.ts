/**
 * Result of analysing every rejection region of a distribution pair
 */

import { DistributionPair } from '../../core/distributions/DistributionPair';
import { Region } from '../../core/regions';
import { AnalysisResult } from './AnalysisResult';
import { ResultMetadata } from './ResultMetadata';

/**
 * One line of the region table
 */
export interface RegionRow {
  region: Region;
  size: number;
  power: number;
  dominated: boolean;
  lrt: boolean;
}

export class RegionAnalysisResult extends AnalysisResult {
  private readonly index = new Map<number, RegionRow>();

  constructor(
    private readonly pair: DistributionPair,
    private readonly rows: readonly RegionRow[],
    metadata: ResultMetadata
  ) {
    super(metadata);
    for (const row of rows) {
      this.index.set(row.region.mask, row);
    }
  }

  getPair(): DistributionPair {
    return this.pair;
  }

  /**
   * Rows in enumeration order
   */
  getRows(): readonly RegionRow[] {
    return this.rows;
  }

  getRow(region: Region): RegionRow | undefined {
    return this.index.get(region.mask);
  }

  /**
   * Likelihood-ratio test regions, in enumeration order
   */
  getLikelihoodRatioTests(): RegionRow[] {
    return this.rows.filter((row) => row.lrt);
  }

  /**
   * The Pareto frontier: regions no other region dominates
   */
  getUndominated(): RegionRow[] {
    return this.rows.filter((row) => !row.dominated);
  }

  toJSON(): object {
    return {
      distributions: this.pair.toJSON(),
      regions: this.rows.map((row) => ({
        region: row.region.toJSON(),
        size: row.size,
        power: row.power,
        dominated: row.dominated,
        lrt: row.lrt,
      })),
      metadata: this.metadata,
    };
  }

  toCSV(): string {
    const lines = ['region,size,power,dominated,lrt'];
    for (const row of this.rows) {
      lines.push(
        [`"${row.region.toString()}"`, row.size, row.power, row.dominated, row.lrt].join(',')
      );
    }
    return lines.join('\n');
  }
}
