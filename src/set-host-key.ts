#!/usr/bin/env node

/**
 * Set Host Key
 *
 * Creates or updates a Function App host key from flags or a
 * Set-FunctionHostKey.<name>.json config file.
 */

import dotenv from 'dotenv';
import { runScript } from './cli/run-script.js';
import { parseSetHostKeyArgs, printSetHostKeyHelp, runSetHostKey } from './commands/set-host-key-command.js';

dotenv.config();

runScript({
  name: 'set-host-key',
  parseArgs: parseSetHostKeyArgs,
  printHelp: printSetHostKeyHelp,
  run: options => runSetHostKey(options),
});
