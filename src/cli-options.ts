/**
 * CLI Options Parser
 * Turns argv into a command, a source and the flags that go with it
 */

import type { CliCommand, CliOptionsData, TokenUnit } from './types.js';

const COMMANDS: readonly CliCommand[] = ['stats', 'summary', 'ngrams'];

function isCommand(value: string): value is CliCommand {
  return COMMANDS.some((c) => c === value);
}

export class CliOptions implements CliOptionsData {
  command: CliCommand | null = null;
  source: string | null = null;
  n: number = 2;
  unit: TokenUnit = 'word';
  smoothing: number = 0;
  probabilities: boolean = false;
  out: string | null = null;
  sentences: number = 3;
  raw: boolean = false;
  errors: string[] = [];

  constructor(argv: string[] = process.argv.slice(2)) {
    this._parse(argv);
  }

  private _parse(argv: string[]): void {
    const args: string[] = [];

    for (let i = 0; i < argv.length; i++) {
      const arg = argv[i];
      if (arg === '-n' || arg === '--n') {
        this.n = this._intValue(arg, argv[++i], this.n);
      } else if (arg === '--sentences') {
        this.sentences = this._intValue(arg, argv[++i], this.sentences);
      } else if (arg === '--smoothing') {
        const value = parseFloat(argv[++i] ?? '');
        if (isNaN(value)) {
          this.errors.push('Smoothing must be a number');
        } else {
          this.smoothing = value;
        }
      } else if (arg === '--out') {
        const value = argv[++i];
        if (!value) {
          this.errors.push('--out requires a file name');
        } else {
          this.out = value;
        }
      } else if (arg === '--chars') {
        this.unit = 'char';
      } else if (arg === '--probabilities') {
        this.probabilities = true;
      } else if (arg === '--raw') {
        this.raw = true;
      } else if (arg === '--help' || arg === '-h') {
        // Handled by wrapper, ignore here
      } else if (arg.startsWith('-')) {
        this.errors.push(`Unknown flag: ${arg}`);
      } else {
        args.push(arg);
      }
    }

    if (args.length !== 2) {
      this.errors.push('Expected 2 positional arguments: <command> <url|file>');
      return;
    }

    const [command, source] = args;
    if (!isCommand(command)) {
      this.errors.push(`Unknown command: ${command} (expected ${COMMANDS.join(', ')})`);
      return;
    }

    this.command = command;
    this.source = source;

    if (this.n < 1) {
      this.errors.push('N-gram size must be at least 1');
    }

    if (this.sentences < 0) {
      this.errors.push('Sentence count cannot be negative');
    }

    if (this.smoothing < 0) {
      this.errors.push('Smoothing cannot be negative');
    }

    if (command !== 'ngrams' && (this.out || this.probabilities || this.unit === 'char')) {
      this.errors.push('--out, --probabilities and --chars only apply to ngrams');
    }
  }

  private _intValue(flag: string, value: string | undefined, fallback: number): number {
    const parsed = parseInt(value ?? '', 10);
    if (isNaN(parsed)) {
      this.errors.push(`${flag} requires a number`);
      return fallback;
    }
    return parsed;
  }

  isValid(): boolean {
    return this.errors.length === 0;
  }

  getErrorMessage(): string | null {
    if (this.errors.length === 0) {
      return null;
    }

    return '\n❌ ' + this.errors.join('\n❌ ') + '\n';
  }

  getUsageMessage(): string {
    return `
Usage: textlens <stats|summary|ngrams> [options] <url|file>

Run 'textlens --help' for full usage information.

Quick examples:
  textlens stats https://www.gutenberg.org/cache/epub/1342/pg1342.txt
  textlens summary book.txt --sentences 5
  textlens ngrams book.txt -n 3 --out trigrams.json
`;
  }
}
