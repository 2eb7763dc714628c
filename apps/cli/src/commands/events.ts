import { Command } from 'commander';
import type { Session } from '../session.js';
import * as out from '../output.js';
import { $try, parseCount } from '../helpers.js';

export function createEventsCommand(session: Session): Command {
  return new Command('events')
    .description('Show recent notifications')
    .option('-n, --limit <n>', 'How many to show', '20')
    .action((opts: { limit: string }) => $try(session, () => {
      const limit = parseCount(opts.limit);
      if (session.log.size === 0) {
        out.info('No notifications yet');
        return;
      }
      for (const e of session.log.history(limit)) out.event(e);
    }));
}
