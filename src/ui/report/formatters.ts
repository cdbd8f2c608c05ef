import * as d3 from 'd3';

/**
 * Common value formatters
 */
export const Formatters = {
  /** Significant-digit decimal, trailing zeros trimmed: 0.10400000000000001 -> "0.104" */
  probability: (precision: number = 6) => d3.format(`.${precision}~r`),
};
