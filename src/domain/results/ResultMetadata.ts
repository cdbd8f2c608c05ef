/**
 * Metadata structure for all analysis results
 */

/**
 * Metadata that accompanies all analysis results
 * Extensible to support additional fields as needed
 */
export interface ResultMetadata {
  /** When the analysis was performed */
  timestamp: Date;

  /** Algorithm used (e.g., 'exhaustive-enumeration') */
  algorithm?: string;

  /** Time taken to compute results in milliseconds */
  computeTime?: number;

  /** Size of the outcome space analysed */
  outcomeCount?: number;

  /** Any warnings generated during analysis */
  warnings?: string[];

  /** Allow additional fields for specific result types */
  [key: string]: unknown;
}
