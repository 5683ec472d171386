/**
 * Translation from "expected items + target error rate" to m and k.
 * Filters never size themselves; build one from the returned plan.
 */

import { FilterParams, SizingOptions, resolveSizingOptions, validateFilterParams } from '../common/Config';
import { FilterPlan } from '../common/Types';

export function calculateOptimalParams(
  expectedItems: number,
  falsePositiveRate: number
): FilterParams {
  const { expectedItems: n, falsePositiveRate: p } = resolveSizingOptions({
    expectedItems,
    falsePositiveRate,
  });

  const numBits = Math.ceil(-(n * Math.log(p)) / (Math.LN2 * Math.LN2));
  const numHashFunctions = Math.max(1, Math.round((numBits / n) * Math.LN2));

  return validateFilterParams({ numBits, numHashFunctions });
}

/**
 * Standard approximation (1 - e^(-kn/m))^k.
 */
export function estimateFalsePositiveRate(
  numBits: number,
  numHashFunctions: number,
  insertedItems: number
): number {
  if (insertedItems <= 0) {
    return 0;
  }
  const unsetProbability = Math.exp((-numHashFunctions * insertedItems) / numBits);
  return Math.pow(1 - unsetProbability, numHashFunctions);
}

export function planFilter(options?: Partial<SizingOptions>): FilterPlan {
  const { expectedItems, falsePositiveRate } = resolveSizingOptions(options);
  const { numBits, numHashFunctions } = calculateOptimalParams(expectedItems, falsePositiveRate);

  return {
    expectedItems,
    falsePositiveRate,
    numBits,
    numHashFunctions,
    byteSize: Math.ceil(numBits / 8),
    estimatedFalsePositiveRate: estimateFalsePositiveRate(numBits, numHashFunctions, expectedItems),
  };
}

export function formatPlan(plan: FilterPlan): string {
  const lines = [`expected items:        ${plan.expectedItems}`];
  if (plan.falsePositiveRate !== undefined) {
    lines.push(`target error rate:     ${plan.falsePositiveRate}`);
  }
  lines.push(
    `bits (m):              ${plan.numBits}`,
    `hash rounds (k):       ${plan.numHashFunctions}`,
    `size:                  ${plan.byteSize} bytes`,
    `estimated error rate:  ${plan.estimatedFalsePositiveRate.toFixed(6)}`
  );
  return lines.join('\n');
}
