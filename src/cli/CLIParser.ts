import { DEFAULT_SIZING_OPTIONS } from '../common/Config';

export interface CLIOptions {
  readonly wordsFile?: string;
  readonly loadFile?: string;
  readonly saveFile?: string;
  readonly numBits?: number;
  readonly numHashFunctions?: number;
  readonly expectedItems?: number;
  readonly falsePositiveRate?: number;
  readonly queries: string[];
  readonly help: boolean;
}

const SIZING_FLAGS = ['--bits', '--hashes', '--expected-items', '--error-rate'];

const VALUE_FLAGS = new Set([
  '--words',
  '--load',
  '--save',
  '--bits',
  '--hashes',
  '--expected-items',
  '--error-rate',
]);

export class CLIParser {
  private readonly args: string[];

  constructor(args: string[] = process.argv.slice(2)) {
    this.args = args;
  }

  public parse(): CLIOptions {
    if (this.hasFlag('--help') || this.hasFlag('-h')) {
      return { queries: [], help: true };
    }

    this.rejectUnknownFlags();

    const wordsFile = this.getString('--words');
    const loadFile = this.getString('--load');

    if (wordsFile && loadFile) {
      throw new Error('--words and --load cannot be used together');
    }
    if (!wordsFile && !loadFile) {
      throw new Error('One of --words or --load is required');
    }
    if (loadFile) {
      const sizingFlag = SIZING_FLAGS.find((flag) => this.getString(flag) !== undefined);
      if (sizingFlag) {
        throw new Error(`${sizingFlag} cannot be used with --load`);
      }
    }

    const numBits = this.getInteger('--bits');
    const numHashFunctions = this.getInteger('--hashes');
    if ((numBits === undefined) !== (numHashFunctions === undefined)) {
      throw new Error('--bits and --hashes must be given together');
    }

    return {
      wordsFile,
      loadFile,
      saveFile: this.getString('--save'),
      numBits,
      numHashFunctions,
      expectedItems: this.getInteger('--expected-items'),
      falsePositiveRate: this.getFloat('--error-rate'),
      queries: this.getPositionals(),
      help: false,
    };
  }

  private rejectUnknownFlags(): void {
    for (const arg of this.args) {
      if (!arg.startsWith('--')) continue;
      const flag = arg.split('=')[0];
      if (!VALUE_FLAGS.has(flag)) {
        throw new Error(`Unknown option: ${flag}`);
      }
    }
  }

  private getPositionals(): string[] {
    const positionals: string[] = [];
    for (let i = 0; i < this.args.length; i++) {
      const arg = this.args[i];
      if (arg.startsWith('--')) {
        if (!arg.includes('=')) i++;
        continue;
      }
      positionals.push(arg);
    }
    return positionals;
  }

  private getString(flag: string): string | undefined {
    const prefixed = this.args.find(arg => arg.startsWith(`${flag}=`));
    if (prefixed !== undefined) {
      const value = prefixed.slice(flag.length + 1);
      if (value.length === 0) {
        throw new Error(`Missing value for ${flag}`);
      }
      return value;
    }

    const flagIndex = this.args.indexOf(flag);
    if (flagIndex === -1) {
      return undefined;
    }

    if (flagIndex + 1 >= this.args.length || this.args[flagIndex + 1].startsWith('--')) {
      throw new Error(`Missing value for ${flag}`);
    }
    return this.args[flagIndex + 1];
  }

  private getInteger(flag: string): number | undefined {
    const str = this.getString(flag);
    if (!str) return undefined;

    const num = Number(str);
    if (!Number.isInteger(num)) {
      throw new Error(`Invalid integer for ${flag}: ${str}`);
    }
    return num;
  }

  private getFloat(flag: string): number | undefined {
    const str = this.getString(flag);
    if (!str) return undefined;

    const num = Number(str);
    if (isNaN(num)) {
      throw new Error(`Invalid number for ${flag}: ${str}`);
    }
    return num;
  }

  private hasFlag(flag: string): boolean {
    return this.args.includes(flag);
  }

  public static printHelp(): void {
    console.log(`
Membership Filter

Usage: membership-filter [options] [item...]

Options:
  --help, -h              Show this help message

Source (one required):
  --words=FILE            Build a filter from a word list (one item per line)
  --load=FILE             Load a filter previously written with --save

Sizing (with --words):
  --expected-items=N      Expected item count (default: number of words)
  --error-rate=P          Target false-positive rate (default: ${DEFAULT_SIZING_OPTIONS.falsePositiveRate})
  --bits=M --hashes=K     Use explicit bit count and hash rounds instead

Output:
  --save=FILE             Write the filter snapshot to FILE

Examples:
  membership-filter --words=blocked.txt --error-rate=0.02 spam eggs
  membership-filter --words=blocked.txt --save=blocked.mflt
  membership-filter --load=blocked.mflt spam
`);
  }
}
