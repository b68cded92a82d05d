#!/usr/bin/env node

/**
 * Get Role Assignments
 *
 * Usage:
 *   npm run get-role-assignments -- --config-name prod
 *   npm run get-role-assignments -- --subscription-id <id> --resource-name my-func --upn user@contoso.com
 */

import dotenv from 'dotenv';
import { runScript } from './cli/run-script.js';
import {
  parseRoleAssignmentsArgs,
  printRoleAssignmentsHelp,
  runRoleAssignments,
} from './commands/role-assignments-command.js';

dotenv.config();

runScript({
  name: 'get-role-assignments',
  parseArgs: parseRoleAssignmentsArgs,
  printHelp: printRoleAssignmentsHelp,
  run: options => runRoleAssignments(options),
});
