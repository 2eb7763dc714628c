#!/usr/bin/env node

import { Command } from 'commander';
import { resolveConfig } from './config.js';
import type { ConfigFlags } from './config.js';
import { createSession, runInteractive, runScriptFile } from './session.js';

const program = new Command()
  .name('taskreg')
  .description('Single-owner task registry, held in memory for one session')
  .version('1.0.0')
  .argument('[script]', 'File of commands to run instead of reading stdin')
  .option('--owner <principal>', 'Registry owner (default: $TASKREG_OWNER, then "owner")')
  .option('--as <principal>', 'Initial caller (default: $TASKREG_CALLER, then the owner)')
  .option('-v, --verbose', 'Print each notification as it is published')
  .action(async (script: string | undefined, flags: ConfigFlags) => {
    const session = createSession(resolveConfig(flags));

    if (script != null) {
      runScriptFile(session, script);
      if (session.failures > 0) process.exitCode = 1;
      return;
    }

    await runInteractive(session, process.stdin, process.stdout, process.stdin.isTTY === true);
  });

await program.parseAsync();
