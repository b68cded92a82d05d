#!/usr/bin/env node

/**
 * Connect
 *
 * Signs in and selects the subscription named by flags or a
 * Connect-AzToolkit.<name>.json config file, then prints the active context.
 */

import dotenv from 'dotenv';
import { runScript } from './cli/run-script.js';
import { parseConnectArgs, printConnectHelp, runConnect } from './commands/connect-command.js';

dotenv.config();

runScript({
  name: 'connect',
  parseArgs: parseConnectArgs,
  printHelp: printConnectHelp,
  run: options => runConnect(options),
});
