import { Command } from 'commander';
import { pauseRegistry, resumeRegistry } from '@task-registry/core';
import type { Session } from '../session.js';
import { callContext } from '../session.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createPauseCommand(session: Session): Command {
  return new Command('pause')
    .description('Block all task changes (registry owner only)')
    .action((_opts: unknown, cmd: Command) => $try(session, () => {
      pauseRegistry(session.registry, callContext(session, cmd));
      out.warning('Registry paused');
    }));
}

export function createResumeCommand(session: Session): Command {
  return new Command('resume')
    .description('Allow task changes again (registry owner only)')
    .action((_opts: unknown, cmd: Command) => $try(session, () => {
      resumeRegistry(session.registry, callContext(session, cmd));
      out.success('Registry resumed');
    }));
}
