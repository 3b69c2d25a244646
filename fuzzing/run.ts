/**
 * Standalone continuous fuzzer for the segmenting codecs.
 *
 * Generates random text and payloads in a loop, checks split and decode
 * behaviour, and reports any input that breaks it.
 *
 * Usage:
 *   npx tsx fuzzing/run.ts [--iterations N]
 */

import type { EncDec, SplittingEncDec } from '../src/codecs/Codec';
import { Gsm7BitPackedCodec } from '../src/codecs/Gsm7BitPackedCodec';
import { codingNames, fromName, GSM7BIT, UCS2 } from '../src/codings';
import { isCodingError } from '../src/errors';
import { toHex } from '../src/helpers';
import { Rng, generateBytes, generateGsmText, generateUnicodeText } from './generators/text-generator';

interface FuzzIssue {
  seed: number;
  strategy: string;
  input: string;
  problem: string;
}

interface SplitTarget {
  codec: SplittingEncDec;
  decodeSegment: (segment: Uint8Array) => string;
  generate: (rng: Rng) => string;
  /** Undo what the codec adds to segments. */
  normalize: (text: string) => string;
}

const PACKED = new Gsm7BitPackedCodec();

const SPLIT_TARGETS: SplitTarget[] = [
  {
    codec: GSM7BIT,
    decodeSegment: s => GSM7BIT.decode(s),
    generate: rng => generateGsmText(rng),
    normalize: text => text,
  },
  {
    codec: PACKED,
    decodeSegment: s => PACKED.decodeSegment(s),
    generate: rng => generateGsmText(rng).replace(/\r/g, ''),
    normalize: text => text.replace(/\r/g, ''),
  },
  {
    codec: UCS2,
    decodeSegment: s => UCS2.decode(s),
    generate: rng => generateUnicodeText(rng),
    normalize: text => text,
  },
];

function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

function fuzzSplit(target: SplitTarget, seed: number): FuzzIssue | undefined {
  const rng = new Rng(seed);
  const text = target.generate(rng);
  const limit = rng.int(4, 160);
  const issue = (problem: string): FuzzIssue => ({
    seed,
    strategy: `split/${target.codec.constructor.name}@${limit}`,
    input: text,
    problem,
  });

  try {
    const segments = target.codec.encodeSplit(text, limit);
    const joined = target.normalize(segments.map(target.decodeSegment).join(''));
    if (joined !== text) {
      return issue('segments do not reassemble to the input');
    }
  } catch (error) {
    return issue(describeError(error));
  }
  return undefined;
}

function fuzzDecode(codec: EncDec, name: string, seed: number): FuzzIssue | undefined {
  const data = generateBytes(new Rng(seed));
  try {
    codec.decode(data);
  } catch (error) {
    if (!isCodingError(error)) {
      return { seed, strategy: `decode/${name}`, input: toHex(data), problem: describeError(error) };
    }
  }
  return undefined;
}

function main() {
  const args = process.argv.slice(2);
  let maxIterations = Infinity;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--iterations' && args[i + 1]) {
      maxIterations = parseInt(args[i + 1], 10);
      i++;
    }
  }

  const names = codingNames();
  console.log('SMS Codings Fuzzer');
  console.log(`Max iterations: ${maxIterations === Infinity ? 'unlimited' : maxIterations}`);
  console.log('');

  let iteration = 0;
  let splits = 0;
  let decodes = 0;
  const issues: FuzzIssue[] = [];
  const startTime = Date.now();

  while (iteration < maxIterations) {
    let issue: FuzzIssue | undefined;

    if (iteration % 2 === 0) {
      const target = SPLIT_TARGETS[(iteration / 2) % SPLIT_TARGETS.length];
      issue = fuzzSplit(target, iteration + 1);
      splits++;
    } else {
      const name = names[iteration % names.length];
      const codec = fromName(name);
      if (codec !== undefined) {
        issue = fuzzDecode(codec, name, iteration + 1);
      }
      decodes++;
    }

    if (issue !== undefined) {
      issues.push(issue);
      console.error(`\n[!] ISSUE at iteration ${iteration} (${issue.strategy}): ${issue.problem}`);
      console.error(`    Input: ${issue.input.slice(0, 200)}`);
    }

    iteration++;

    if (iteration % 1000 === 0) {
      const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
      const rate = (iteration / ((Date.now() - startTime) / 1000)).toFixed(0);
      console.log(
        `[${elapsed}s] iteration=${iteration} rate=${rate}/s ` +
        `splits=${splits} decodes=${decodes} issues=${issues.length}`
      );
    }
  }

  const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log('');
  console.log('=== Final Report ===');
  console.log(`Total iterations: ${iteration}`);
  console.log(`Elapsed: ${elapsed}s`);
  console.log(`Splits: ${splits}`);
  console.log(`Decodes: ${decodes}`);

  if (issues.length > 0) {
    console.log('');
    console.log(`=== ${issues.length} issue(s) found ===`);
    for (const issue of issues) {
      console.log(`  Seed: ${issue.seed}, Strategy: ${issue.strategy}`);
      console.log(`  Problem: ${issue.problem}`);
      console.log(`  Input: ${issue.input.slice(0, 300)}`);
      console.log('');
    }
    process.exit(1);
  } else {
    console.log('\nNo issues found.');
    process.exit(0);
  }
}

main();
