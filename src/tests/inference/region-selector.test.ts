import { describe, it, expect } from 'vitest';
import { ErrorCode, InvalidBudgetError, LemmaError } from '../../core/errors';
import { Region, enumerateRegions, evaluate } from '../../core/regions';
import { prefixRegions } from '../../inference/LikelihoodRatioClassifier';
import { select, selectWithStats } from '../../inference/RegionSelector';
import { TestScenarios } from '../scenarios/TestScenarios';

describe('select', () => {
  it('should pick the most powerful tulip test within a 0.15 budget', () => {
    const pair = TestScenarios.tulips.pair();
    const { region, stats } = selectWithStats(pair, 0.15);

    expect(region.equals(Region.of(0, 1, 2))).toBe(true);
    expect(stats.size).toBeCloseTo(0.104, 12);
    expect(stats.power).toBeCloseTo(0.837, 12);
    expect(select(pair, 0.15).equals(region)).toBe(true);
  });

  it('should match a brute-force search for the tulip budget', () => {
    const pair = TestScenarios.tulips.pair();
    let bestPower = -1;
    for (const region of enumerateRegions(pair)) {
      const stats = evaluate(region, pair);
      if (stats.size <= 0.15) {
        bestPower = Math.max(bestPower, stats.power);
      }
    }

    expect(selectWithStats(pair, 0.15).stats.power).toBe(bestPower);
  });

  it('should return the empty region for a zero budget', () => {
    expect(select(TestScenarios.tulips.pair(), 0).equals(Region.empty())).toBe(true);
  });

  it('should return the full region for a budget of 1 or more', () => {
    const pair = TestScenarios.fullSupport[3].pair();
    expect(select(pair, 2).equals(Region.full(5))).toBe(true);
  });

  it('should accept a region whose size equals the budget', () => {
    // Prefix sizes are exactly 0, 0.25, 0.75 and 1
    const pair = TestScenarios.zeroRatio.pair();
    expect(select(pair, 0.25).equals(Region.of(1))).toBe(true);
  });

  it('should break power ties toward the smaller size', () => {
    // (0, 1) and (0, 1, 2) both have power 1; sizes 0.75 and 1
    const selection = selectWithStats(TestScenarios.zeroRatio.pair(), 1);

    expect(selection.region.equals(Region.of(0, 1))).toBe(true);
    expect(selection.stats).toEqual({ size: 0.75, power: 1 });
  });

  it('should beat every other likelihood-ratio test within budget', () => {
    for (const scenario of TestScenarios.fullSupport) {
      const pair = scenario.pair();
      for (const budget of [0, 0.01, 0.05, 0.1, 0.2, 0.5, 0.9, 1]) {
        const chosen = selectWithStats(pair, budget);
        expect(chosen.stats.size).toBeLessThanOrEqual(budget);

        for (const prefix of prefixRegions(pair)) {
          const stats = evaluate(prefix, pair);
          if (stats.size <= budget) {
            expect(chosen.stats.power).toBeGreaterThanOrEqual(stats.power);
          }
        }
      }
    }
  });

  it('should reject negative and undefined budgets', () => {
    const pair = TestScenarios.tulips.pair();

    expect(() => select(pair, -0.01)).toThrow(InvalidBudgetError);
    expect(() => select(pair, NaN)).toThrow(InvalidBudgetError);

    try {
      select(pair, -1);
    } catch (error) {
      expect(error).toBeInstanceOf(LemmaError);
      expect(error instanceof LemmaError && error.code).toBe(ErrorCode.INVALID_BUDGET);
      expect(error instanceof LemmaError && error.context).toEqual({ maxSize: -1 });
    }
  });
});
