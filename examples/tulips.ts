/**
 * Tulip example: how many of five bulbs flower red?
 *
 * Null: the bulbs come from the 75%-red supplier. Alternative: they come
 * from the 30%-red supplier. Prints every rejection region and the test
 * chosen under a 0.15 size budget.
 */

import { analyzeRegions, binomialPair, DistributionPair, formatRegionTable, selectWithStats } from '../src';

export function tulipExample(): void {
  console.log('=== Rounded tulip probabilities ===\n');

  const pair = DistributionPair.from(
    [0.001, 0.015, 0.088, 0.264, 0.396, 0.237],
    [0.168, 0.36, 0.309, 0.132, 0.028, 0.002]
  );
  const result = analyzeRegions(pair);
  console.log(formatRegionTable(result, { precision: 3 }));

  const { region, stats } = selectWithStats(pair, 0.15);
  console.log(`\nMost powerful test with size <= 0.15: ${region}`);
  console.log(`  size:  ${stats.size.toFixed(3)}`);
  console.log(`  power: ${stats.power.toFixed(3)}`);

  console.log('\n=== Exact binomial probabilities ===\n');
  const exact = binomialPair(5, 0.75, 0.3);
  const frontier = analyzeRegions(exact).getUndominated();
  console.log(`${frontier.length} of 64 regions are undominated`);
}

tulipExample();
