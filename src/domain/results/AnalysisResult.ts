/**
 * Base class for all analysis results in Lemma
 */

import { ResultMetadata } from './ResultMetadata';

/**
 * Abstract base class that all analysis results extend
 * Provides common functionality for serialization and export
 */
export abstract class AnalysisResult {
  /**
   * Create a new analysis result
   * @param metadata - Metadata about the analysis
   */
  constructor(protected metadata: ResultMetadata) {}

  /**
   * Get the metadata for this result
   */
  getMetadata(): ResultMetadata {
    return this.metadata;
  }

  /**
   * Convert the result to a JSON-serializable object
   * Must be implemented by all concrete result classes
   */
  abstract toJSON(): object;

  /**
   * Tabular form of the result, header row first
   */
  abstract toCSV(): string;

  /**
   * Export the result in the specified format
   * @param format - Export format ('json' or 'csv')
   * @returns A Blob containing the exported data
   */
  async export(format: 'json' | 'csv'): Promise<Blob> {
    if (format === 'json') {
      return this.exportJSON();
    } else {
      return this.exportCSV();
    }
  }

  /**
   * Export as JSON
   */
  private async exportJSON(): Promise<Blob> {
    const data = this.toJSON();
    const jsonString = JSON.stringify(data, null, 2);
    return new Blob([jsonString], { type: 'application/json' });
  }

  /**
   * Export as CSV
   */
  private async exportCSV(): Promise<Blob> {
    return new Blob([this.toCSV()], { type: 'text/csv' });
  }
}
