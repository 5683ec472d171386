import * as fs from 'fs/promises';
import { DEFAULT_SIZING_OPTIONS } from '../common/Config';
import { FilterPlan } from '../common/Types';
import { MembershipFilter } from '../filter/MembershipFilter';
import { formatPlan, planFilter, estimateFalsePositiveRate } from '../sizing/FilterSizing';
import { loadWordList } from '../words/WordList';
import { CLIOptions } from './CLIParser';

export type OutputSink = (line: string) => void;

export interface LoadedFilter {
  readonly filter: MembershipFilter;
  readonly plan?: FilterPlan;
}

function explicitPlan(
  numBits: number,
  numHashFunctions: number,
  expectedItems: number
): FilterPlan {
  const estimatedFalsePositiveRate = estimateFalsePositiveRate(numBits, numHashFunctions, expectedItems);
  return {
    expectedItems,
    numBits,
    numHashFunctions,
    byteSize: Math.ceil(numBits / 8),
    estimatedFalsePositiveRate,
  };
}

export async function buildFromWords(options: CLIOptions, wordsFile: string): Promise<LoadedFilter> {
  const words = await loadWordList(wordsFile);
  const expectedItems = options.expectedItems ?? Math.max(words.length, 1);

  const plan = options.numBits !== undefined && options.numHashFunctions !== undefined
    ? explicitPlan(options.numBits, options.numHashFunctions, expectedItems)
    : planFilter({
        expectedItems,
        falsePositiveRate: options.falsePositiveRate ?? DEFAULT_SIZING_OPTIONS.falsePositiveRate,
      });

  const filter = MembershipFilter.fromPlan(plan);
  filter.addAll(words);
  return { filter, plan };
}

export async function loadFilter(options: CLIOptions): Promise<LoadedFilter> {
  if (options.wordsFile) {
    return buildFromWords(options, options.wordsFile);
  }
  if (options.loadFile) {
    const buffer = await fs.readFile(options.loadFile);
    return { filter: MembershipFilter.fromBuffer(buffer) };
  }
  throw new Error('One of --words or --load is required');
}

export async function runCli(options: CLIOptions, output: OutputSink = console.log): Promise<void> {
  const { filter, plan } = await loadFilter(options);

  if (plan) {
    for (const line of formatPlan(plan).split('\n')) {
      output(line);
    }
  }
  const stats = filter.getStats();
  output(`items inserted:        ${stats.insertedCount}`);
  output(`bits set:              ${stats.setBits}/${stats.numBits}`);

  if (options.saveFile) {
    await fs.writeFile(options.saveFile, filter.serialize());
    output(`saved filter to ${options.saveFile}`);
  }

  for (const query of options.queries) {
    const verdict = filter.mightContain(query) ? 'possibly present' : 'definitely not present';
    output(`${query}: ${verdict}`);
  }
}
