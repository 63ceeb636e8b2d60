#!/usr/bin/env node
/**
 * nixpkgs-pypi-updates CLI
 *
 * Examples:
 *   nixpkgs-pypi-updates pkgs/development/python-modules/* > updates.txt
 *   grep -rl ./nixpkgs -e buildPython | grep default | nixpkgs-pypi-updates --target minor
 */

import chalk from 'chalk';
import { createProgram, runCli } from '../src/cli/program.js';
import { readStream } from '../src/utils/package-list.js';

const program = createProgram(async (packages, options) => {
  process.exitCode = await runCli(packages, options, {
    readStdin: async () => (process.stdin.isTTY ? null : readStream(process.stdin)),
    writeReport: (text) => {
      process.stdout.write(`${text}\n`);
    },
    env: process.env,
    cwd: process.cwd(),
  });
});

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(chalk.red(err instanceof Error ? err.message : String(err)));
  process.exitCode = 1;
});
