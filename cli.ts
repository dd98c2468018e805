#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { analyze } from 'src/generators/report-generator';

const USAGE = `
Usage: isomass <formula> [options]

Print masses, elemental composition and mass distribution of a formula.

Options:
  --max-atoms <n>         Skip the mass distribution from n atoms on (default 250)
  --min-fraction <x>      Drop distribution bins below this fraction (default 1e-9)
  --min-intensity <x>     Drop distribution bins below this intensity in percent
  --debug                 Print all sections
  --help                  Show this help
`;

function readNumberOption(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const number = Number(value);
  if (value.trim() === '' || Number.isNaN(number)) {
    console.error(`--${name}: expected a number, got '${value}'`);
    process.exit(2);
  }
  return number;
}

const { values, positionals } = parseArgs({
  args: process.argv.slice(2),
  options: {
    'max-atoms': { type: 'string' },
    'min-fraction': { type: 'string' },
    'min-intensity': { type: 'string' },
    debug: { type: 'boolean', default: false },
    help: { type: 'boolean', default: false },
  },
  allowPositionals: true,
});

if (values.help || positionals.length === 0) {
  console.log(USAGE);
  process.exit(values.help ? 0 : 1);
}

console.log(
  analyze(positionals.join(' '), {
    maxAtoms: readNumberOption('max-atoms', values['max-atoms']),
    minFraction: readNumberOption('min-fraction', values['min-fraction']),
    minIntensity: readNumberOption('min-intensity', values['min-intensity']),
    debug: values.debug,
  }),
);
