/**
 * A CLI session: one in-memory registry, the current caller and the
 * notification history, driven line by line.
 */

import { readFileSync } from 'node:fs';
import { createInterface } from 'node:readline';
import { Command, CommanderError } from 'commander';
import { createRegistry } from '@task-registry/core';
import type { CallContext, Principal, Registry, Timestamp } from '@task-registry/core';
import type { SessionConfig } from './config.js';
import { EventLog } from './event-log.js';
import { splitArgs } from './helpers.js';
import * as out from './output.js';

import { createAddCommand } from './commands/add.js';
import { createCheckCommand } from './commands/check.js';
import { createDeleteCommand, createOwnerDeleteCommand } from './commands/delete.js';
import { createReassignCommand } from './commands/reassign.js';
import { createRenameCommand } from './commands/rename.js';
import { createDueCommand } from './commands/due.js';
import { createPriorityCommand } from './commands/priority.js';
import { createPauseCommand, createResumeCommand } from './commands/pause.js';
import { createGetCommand } from './commands/get.js';
import { createMineCommand, createListCommand, createDumpCommand } from './commands/list.js';
import { createCountCommand, createStatusCommand } from './commands/status.js';
import { createEventsCommand } from './commands/events.js';
import { createUseCommand, createWhoamiCommand, createExitCommand } from './commands/identity.js';

export interface Session {
  readonly registry: Registry;
  readonly log: EventLog;
  readonly clock: () => Timestamp;
  caller: Principal;
  /** Commands that ended in an error */
  failures: number;
  /** Set by exit/quit */
  closed: boolean;
}

export interface SessionOptions {
  clock?: () => Timestamp;
}

function systemClock(): Timestamp {
  return Math.floor(Date.now() / 1000);
}

export function createSession(config: SessionConfig, options: SessionOptions = {}): Session {
  const registry = createRegistry(config.owner);
  const log = new EventLog();
  registry.events.subscribeToAll((e) => {
    log.push(e);
    if (config.verbose) out.event(e);
  });

  return {
    registry,
    log,
    clock: options.clock ?? systemClock,
    caller: config.caller,
    failures: 0,
    closed: false,
  };
}

/** Caller and time for one command; `--as` overrides the session caller */
export function callContext(session: Session, cmd: Command): CallContext {
  const g = cmd.optsWithGlobals<{ as?: string }>();
  return { caller: g.as ?? session.caller, timestamp: session.clock() };
}

/** Build the command set for one line */
export function createSessionProgram(session: Session): Command {
  const program = new Command()
    .name('taskreg')
    .description('Single-owner task registry')
    .option('--as <principal>', 'Run this command as another principal')
    .exitOverride()
    .configureOutput({
      writeOut: (s) => out.info(s.trimEnd()),
      writeErr: (s) => out.error(s.trimEnd()),
    });

  program.addCommand(createAddCommand(session));
  program.addCommand(createCheckCommand(session));
  program.addCommand(createDeleteCommand(session));
  program.addCommand(createOwnerDeleteCommand(session));
  program.addCommand(createReassignCommand(session));
  program.addCommand(createRenameCommand(session));
  program.addCommand(createDueCommand(session));
  program.addCommand(createPriorityCommand(session));
  program.addCommand(createPauseCommand(session));
  program.addCommand(createResumeCommand(session));
  program.addCommand(createGetCommand(session));
  program.addCommand(createMineCommand(session));
  program.addCommand(createListCommand(session));
  program.addCommand(createDumpCommand(session));
  program.addCommand(createCountCommand(session));
  program.addCommand(createStatusCommand(session));
  program.addCommand(createEventsCommand(session));
  program.addCommand(createUseCommand(session));
  program.addCommand(createWhoamiCommand(session));
  program.addCommand(createExitCommand(session, 'exit'));
  program.addCommand(createExitCommand(session, 'quit'));

  // addCommand does not pass exitOverride/output settings down
  for (const sub of program.commands) sub.copyInheritedSettings(program);

  return program;
}

const QUIET_CODES = new Set(['commander.helpDisplayed', 'commander.help', 'commander.version']);

/** Run one line. Blank lines and `#` comments are skipped */
export function runLine(session: Session, line: string): void {
  const trimmed = line.trim();
  if (trimmed === '' || trimmed.startsWith('#')) return;

  let args: string[];
  try {
    args = splitArgs(trimmed);
  } catch (err: unknown) {
    session.failures += 1;
    out.error(out.formatError(err));
    return;
  }

  try {
    createSessionProgram(session).parse(args, { from: 'user' });
  } catch (err: unknown) {
    if (!(err instanceof CommanderError)) throw err;
    // commander has already printed the message
    if (!QUIET_CODES.has(err.code)) session.failures += 1;
  }
}

/** Run every line of a script until it ends or a line closes the session */
export function runScript(session: Session, script: string): void {
  for (const line of script.split(/\r?\n/)) {
    runLine(session, line);
    if (session.closed) break;
  }
}

/** Run a script file. An unreadable file counts as a failure */
export function runScriptFile(session: Session, path: string): void {
  let script: string;
  try {
    script = readFileSync(path, 'utf8');
  } catch (err: unknown) {
    session.failures += 1;
    out.error(`Cannot read script '${path}': ${out.formatError(err)}`);
    return;
  }
  runScript(session, script);
}

/** Read lines from `input` until it ends or the session is closed */
export function runInteractive(
  session: Session,
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
  prompt = false,
): Promise<void> {
  const rl = createInterface({ input, output, terminal: prompt, crlfDelay: Infinity });
  rl.setPrompt('taskreg> ');

  return new Promise((resolve) => {
    rl.on('line', (line) => {
      // readline may still emit lines it buffered before close()
      if (session.closed) return;
      runLine(session, line);
      if (session.closed) {
        rl.close();
        return;
      }
      if (prompt) rl.prompt();
    });
    rl.on('close', () => resolve());
    if (prompt) rl.prompt();
  });
}
