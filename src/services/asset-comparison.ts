/**
 * Asset Comparison Service - relates two price series
 *
 * Series are inner-joined on date and compared through daily close-to-close
 * returns. With fewer than two common dates every field is 0. Results are
 * rounded to two decimals.
 */

import { AssetComparison, IndexComparison, Series } from '../types/market-data';

interface JoinedCloses {
  left: number[];
  right: number[];
}

function round2(value: number): number {
  // `|| 0` folds -0 into 0
  return Math.round(value * 100) / 100 || 0;
}

function finiteOrZero(value: number): number {
  return Number.isFinite(value) ? value : 0;
}

function mean(values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Sample covariance (n - 1 denominator)
 */
function covariance(a: number[], b: number[]): number {
  if (a.length < 2) return 0;
  const meanA = mean(a);
  const meanB = mean(b);
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += (a[i] - meanA) * (b[i] - meanB);
  }
  return sum / (a.length - 1);
}

function sampleStdDev(values: number[]): number {
  return Math.sqrt(covariance(values, values));
}

export const AssetComparisonService = {
  /**
   * Closes of both series on the dates they share, oldest first
   */
  joinOnDate(left: Series, right: Series): JoinedCloses {
    const rightCloses = new Map<string, number>(right.points.map((point): [string, number] => [point.date, point.close]));
    const joined: JoinedCloses = { left: [], right: [] };

    const leftPoints = [...left.points].sort((a, b) => a.date.localeCompare(b.date));
    for (const point of leftPoints) {
      const rightClose = rightCloses.get(point.date);
      if (rightClose !== undefined) {
        joined.left.push(point.close);
        joined.right.push(rightClose);
      }
    }
    return joined;
  },

  /**
   * Simple returns: (p[i] - p[i-1]) / p[i-1]. A zero previous price yields 0.
   */
  dailyReturns(closes: number[]): number[] {
    const returns: number[] = [];
    for (let i = 1; i < closes.length; i++) {
      const previous = closes[i - 1];
      returns.push(previous === 0 ? 0 : (closes[i] - previous) / previous);
    }
    return returns;
  },

  /**
   * Pearson correlation, 0 when either side has no variance
   */
  correlation(a: number[], b: number[]): number {
    const denominator = sampleStdDev(a) * sampleStdDev(b);
    if (denominator === 0) return 0;
    return finiteOrZero(covariance(a, b) / denominator);
  },

  compareAssets(left: Series, right: Series): AssetComparison {
    const joined = this.joinOnDate(left, right);
    if (joined.left.length < 2) {
      return { correlation: 0, relativePerformance: 0, volatilityRatio: 0 };
    }

    const leftReturns = this.dailyReturns(joined.left);
    const rightReturns = this.dailyReturns(joined.right);

    const firstRatio = joined.left[0] / joined.right[0];
    const lastRatio = joined.left[joined.left.length - 1] / joined.right[joined.right.length - 1];
    const relativePerformance = finiteOrZero((lastRatio / firstRatio - 1) * 100);

    const rightVolatility = sampleStdDev(rightReturns);
    const volatilityRatio = rightVolatility === 0 ? 0 : sampleStdDev(leftReturns) / rightVolatility;

    return {
      correlation: round2(this.correlation(leftReturns, rightReturns)),
      relativePerformance: round2(relativePerformance),
      volatilityRatio: round2(finiteOrZero(volatilityRatio))
    };
  },

  /**
   * Beta is cov(asset, index) / var(index); alpha is the asset's total return
   * in excess of beta times the index's, in percent
   */
  compareToIndex(asset: Series, index: Series): IndexComparison {
    const joined = this.joinOnDate(asset, index);
    if (joined.left.length < 2) {
      return { correlation: 0, alpha: 0, beta: 0 };
    }

    const assetReturns = this.dailyReturns(joined.left);
    const indexReturns = this.dailyReturns(joined.right);

    const indexVariance = covariance(indexReturns, indexReturns);
    const beta = indexVariance === 0 ? 0 : covariance(assetReturns, indexReturns) / indexVariance;

    const totalReturn = (closes: number[]) =>
      closes[0] === 0 ? 0 : closes[closes.length - 1] / closes[0] - 1;
    const alpha = (totalReturn(joined.left) - beta * totalReturn(joined.right)) * 100;

    return {
      correlation: round2(this.correlation(assetReturns, indexReturns)),
      alpha: round2(finiteOrZero(alpha)),
      beta: round2(finiteOrZero(beta))
    };
  }
};
