#!/usr/bin/env npx tsx
/**
 * CLI for encoding, decoding and segmenting short-message text.
 *
 * Usage:
 *   npx tsx cli/sms-codings.ts encode <coding> <text>
 *   npx tsx cli/sms-codings.ts decode <coding> <hex>
 *   npx tsx cli/sms-codings.ts decode-segment <hex>
 *   npx tsx cli/sms-codings.ts split <coding> <octet-limit> <text>
 *   npx tsx cli/sms-codings.ts should-split <coding> <octet-limit> <text>
 *
 * <coding> is a data_coding number (0, 1, 3, 6, 7, 8) or a codec name.
 * Encoded output is printed as hex, one segment per line for split.
 */

import { isSplitter } from '../src/codecs/Codec';
import type { EncDec } from '../src/codecs/Codec';
import { GSM7BITPACKED, codingNames, fromDataCoding, fromName } from '../src/codings';
import { isCodingError } from '../src/errors';
import { fromHex, toHex } from '../src/helpers';

const USAGE = [
  'Usage: npx tsx cli/sms-codings.ts <command> ...',
  '  encode <coding> <text>',
  '  decode <coding> <hex>',
  '  decode-segment <hex>                      (gsm7bit-packed segment)',
  '  split <coding> <octet-limit> <text>',
  '  should-split <coding> <octet-limit> <text>',
  `Codings: 0, 1, 3, 6, 7, 8 or ${codingNames().join(', ')}`,
].join('\n');

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

function resolveCoding(arg: string): EncDec {
  const codec = /^\d+$/.test(arg) ? fromDataCoding(parseInt(arg, 10)) : fromName(arg);
  if (!codec) {
    fail(`Error: unknown coding '${arg}'\n${USAGE}`);
  }
  return codec;
}

function parseLimit(arg: string): number {
  if (!/^\d+$/.test(arg)) {
    fail(`Error: octet limit must be a non-negative integer, got '${arg}'`);
  }
  return parseInt(arg, 10);
}

function run(args: string[]): void {
  const [command, ...rest] = args;

  switch (command) {
    case 'encode': {
      if (rest.length !== 2) fail(USAGE);
      console.log(toHex(resolveCoding(rest[0]).encode(rest[1])));
      return;
    }
    case 'decode': {
      if (rest.length !== 2) fail(USAGE);
      process.stdout.write(resolveCoding(rest[0]).decode(fromHex(rest[1])) + '\n');
      return;
    }
    case 'decode-segment': {
      if (rest.length !== 1) fail(USAGE);
      process.stdout.write(GSM7BITPACKED.decodeSegment(fromHex(rest[0])) + '\n');
      return;
    }
    case 'split':
    case 'should-split': {
      if (rest.length !== 3) fail(USAGE);
      const codec = resolveCoding(rest[0]);
      if (!isSplitter(codec)) {
        fail(`Error: coding '${rest[0]}' does not support segmentation`);
      }
      const limit = parseLimit(rest[1]);
      if (command === 'should-split') {
        console.log(String(codec.shouldSplit(rest[2], limit)));
        return;
      }
      for (const segment of codec.encodeSplit(rest[2], limit)) {
        console.log(toHex(segment));
      }
      return;
    }
    default:
      fail(USAGE);
  }
}

function main(): void {
  try {
    run(process.argv.slice(2));
  } catch (err) {
    if (isCodingError(err)) {
      fail(`Error [${err.code}]: ${err.message}`);
    }
    if (err instanceof RangeError || err instanceof TypeError) {
      fail(`Error: ${err.message}`);
    }
    throw err;
  }
}

main();
