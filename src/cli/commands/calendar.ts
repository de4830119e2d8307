import { Command } from 'commander';
import { exitCodeFor, OpenRuntime, withRuntime } from '../shared.js';

export function calendarCommand(open: OpenRuntime): Command {
  return new Command('calendar')
    .description('Connect Google Calendar for a tenant')
    .argument('<tenant>', 'tenant identifier')
    .option('--code <code>', 'Finish authorization with the code Google showed')
    .option('--disconnect', 'Remove the stored Google Calendar authorization')
    .action(async (tenantId: string, options: { code?: string; disconnect?: boolean }) => {
      await withRuntime(open, async ({ service }) => {
        if (options.disconnect) {
          await service.disconnect(tenantId, 'calendar');
          console.log('Google Calendar has been disconnected.');
          return;
        }

        if (options.code) {
          const completed = await service.completeAuth(tenantId, options.code);
          if (!completed.ok) {
            console.error(`Authorization failed: ${completed.error.message}`);
            process.exitCode = exitCodeFor(completed.error);
            return;
          }
          console.log('Google Calendar connected successfully!');
          return;
        }

        const started = await service.startAuth(tenantId);
        if (!started.ok) {
          console.error(`Failed to start Google Calendar authentication: ${started.error.message}`);
          process.exitCode = 1;
          return;
        }

        console.log('\nTo connect Google Calendar:');
        console.log(`1. Visit this URL: ${started.value}`);
        console.log('2. Sign in with your Google account and authorize the app');
        console.log(`3. Run "npm run cli -- calendar ${tenantId} --code <code>" with the code you receive\n`);
      });
    });
}
