import { Command } from 'commander';
import { getOwner } from '@task-registry/core';
import type { Session } from '../session.js';
import { callContext } from '../session.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createUseCommand(session: Session): Command {
  return new Command('use')
    .description('Act as another principal from now on')
    .argument('<principal>', 'The principal to act as')
    .action((principal: string) => $try(session, () => {
      if (principal.trim() === '') throw new Error('Principal must not be empty');
      session.caller = principal;
      out.success(`Now acting as ${principal}`);
    }));
}

export function createWhoamiCommand(session: Session): Command {
  return new Command('whoami')
    .description('Show the current caller')
    .action((_opts: unknown, cmd: Command) => $try(session, () => {
      const { caller } = callContext(session, cmd);
      const isOwner = getOwner(session.registry.db) === caller;
      out.info(isOwner ? `${caller} (owner)` : caller);
    }));
}

export function createExitCommand(session: Session, name: 'exit' | 'quit'): Command {
  return new Command(name)
    .description('End the session')
    .action(() => {
      session.closed = true;
    });
}
