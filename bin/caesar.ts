#!/usr/bin/env node

/**
 * CLI entry point for caesar
 */

import { hideBin } from 'yargs/helpers';
import { runCli } from '../src/cli/program.js';
import { getConfig } from '../src/config/index.js';
import { getSystemStdio } from '../src/infra/environment.js';

process.exitCode = await runCli(hideBin(process.argv), getSystemStdio(), getConfig());
