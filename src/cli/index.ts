import { Command } from 'commander';
import { autosyncCommand } from './commands/autosync.js';
import { calendarCommand } from './commands/calendar.js';
import { queraCommand } from './commands/quera.js';
import { resetCommand } from './commands/reset.js';
import { serveCommand } from './commands/serve.js';
import { statusCommand } from './commands/status.js';
import { syncCommand } from './commands/sync.js';
import { OpenRuntime } from './shared.js';

export function createCLI(open: OpenRuntime): Command {
  const program = new Command();

  program
    .name('quera-calendar-sync')
    .description('Sync Quera assignment deadlines to Google Calendar')
    .version('1.0.0');

  program.addCommand(serveCommand(open));
  program.addCommand(calendarCommand(open));
  program.addCommand(queraCommand(open));
  program.addCommand(syncCommand(open));
  program.addCommand(autosyncCommand(open));
  program.addCommand(statusCommand(open));
  program.addCommand(resetCommand(open));

  return program;
}
