#!/usr/bin/env node

/**
 * stealthflow CLI entry point.
 * All logic is delegated to core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import {
  registerDelayCommand,
  registerIdentityCommand,
  registerListCommand,
  registerProxyCommand,
  registerRunCommand,
  registerSelectorCommand,
} from './index.js';

const program = new Command();

program
  .name('stealthflow')
  .description(
    'Run scripted browser workflows with multi-grammar selectors, human-paced requests and rotated identities.',
  )
  .version('0.1.0');

registerRunCommand(program);
registerListCommand(program);
registerSelectorCommand(program);
registerIdentityCommand(program);
registerDelayCommand(program);
registerProxyCommand(program);

await program.parseAsync();
