#!/usr/bin/env node

import fs from 'fs';
import { fileURLToPath } from 'url';
import { CliOptions } from './cli-options.js';
import { isTextProcessingError } from './errors.js';
import { saveFrequencies } from './frequency-store.js';
import { formatKey } from './ngrams.js';
import { TextProcessor } from './processor.js';
import { toStatisticsPayload } from './statistics.js';

const HELP = `
textlens - Statistics, summaries and n-grams for plain-text books

Usage:
  textlens stats <url|file> [--raw]
  textlens summary <url|file> [--sentences N] [--raw]
  textlens ngrams <url|file> [-n N] [--chars] [--probabilities] [--smoothing S] [--out FILE] [--raw]

Sources:
  http(s) URLs ending in .txt are downloaded; anything else is read from disk.
  Project Gutenberg header and footer are stripped unless --raw is given.

Options:
  --help, -h          Show this help
  --sentences N       Sentences in the summary (default: 3)
  -n N                N-gram size (default: 2)
  --chars             Count character n-grams instead of word n-grams
  --probabilities     Convert counts to probabilities
  --smoothing S       Add-S smoothing for --probabilities (default: 0)
  --out FILE          Save the full table as JSON instead of printing the top 20
  --raw               Skip boilerplate stripping

Examples:
  textlens stats https://www.gutenberg.org/cache/epub/1342/pg1342.txt
  textlens summary pg84.txt --sentences 5
  textlens ngrams pg84.txt -n 2 --probabilities --smoothing 1 --out bigrams.json
`;

const TOP_NGRAMS = 20;

// Every http(s) source goes to the fetcher, which rejects URLs not ending in .txt
function isRemote(source: string): boolean {
  return /^https?:\/\//i.test(source);
}

export async function run(argv: string[]): Promise<number> {
  if (argv.includes('--help') || argv.includes('-h')) {
    console.log(HELP);
    return 0;
  }

  const options = new CliOptions(argv);
  if (!options.isValid() || !options.command || !options.source) {
    console.error(options.getErrorMessage() ?? '');
    console.error(options.getUsageMessage());
    return 1;
  }

  const processor = new TextProcessor({
    summarySentences: options.sentences,
    debug: process.env.DEBUG === '1'
  });

  try {
    const raw = isRemote(options.source)
      ? await processor.fetch(options.source)
      : fs.readFileSync(options.source, 'utf-8');

    if (options.command === 'ngrams') {
      const document = await processor.processRaw(raw, !options.raw);
      const table = await processor.buildNgrams(document.cleanedText, {
        n: options.n,
        unit: options.unit,
        probabilities: options.probabilities,
        smoothing: options.smoothing
      });

      if (options.out) {
        saveFrequencies(table, options.out);
        console.log(`Saved ${table.size} ${options.unit} ${options.n}-grams to ${options.out}`);
        return 0;
      }

      for (const { key, value } of table.top(TOP_NGRAMS)) {
        console.log(`${value}\t${formatKey(key)}`);
      }
      return 0;
    }

    const result = await processor.processRaw(raw, !options.raw);
    if (options.command === 'summary') {
      console.log(result.summary);
    } else {
      console.log(JSON.stringify(toStatisticsPayload(result.statistics), null, 2));
    }
    return 0;
  } catch (err) {
    const message = isTextProcessingError(err)
      ? err.publicMessage
      : err instanceof Error ? err.message : String(err);
    console.error(`\n❌ Error: ${message}\n`);
    return 1;
  }
}

// Main execution check
const modulePath = fileURLToPath(import.meta.url);
const scriptPath = process.argv[1];

if (scriptPath && (modulePath === scriptPath || scriptPath.endsWith('textlens') || scriptPath.endsWith('cli.js'))) {
  run(process.argv.slice(2))
    .then((code) => process.exit(code))
    .catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`\n❌ Fatal error: ${message}\n`);
      if (process.env.DEBUG === '1' && err instanceof Error) {
        console.error(err.stack);
      }
      process.exit(1);
    });
}
