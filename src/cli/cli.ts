#!/usr/bin/env node

import { readFileSync } from 'fs';
import { Command } from 'commander';
import { registerGenerateCommand } from './commands/generate/index.js';
import { CLI_CONSTANTS, normalizeFlags } from './utils.js';

const packageJson: { version: string } = JSON.parse(
  readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')
);

const program = new Command();

program
  .name(CLI_CONSTANTS.PROGRAM_NAME)
  .description(
    'Generate static go-import/go-source pages for vanity import paths.\n\n' +
      'Example:\n' +
      '  go list vanity.example.com/... | go-vanity-html -replace vanity.example.com=github.com/actual-user -o .'
  )
  .version(packageJson.version);

registerGenerateCommand(program);

await program.parseAsync(normalizeFlags(process.argv.slice(2)), { from: 'user' });
