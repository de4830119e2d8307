import { Command } from 'commander';
import dayjs from 'dayjs';
import { withRuntime, OpenRuntime } from '../shared.js';

export function statusCommand(open: OpenRuntime): Command {
  return new Command('status')
    .description('Show connection and auto-sync status')
    .argument('<tenant>', 'tenant identifier')
    .action(async (tenantId: string) => {
      await withRuntime(open, async ({ service }) => {
        const status = await service.status(tenantId);

        console.log('\n=== Connections ===');
        console.log(`Quera: ${status.sourceConnected ? 'Connected' : 'Not connected'}`);
        if (status.calendarConnected) {
          const expiry = status.calendarExpiry
            ? ` (token expires ${dayjs(status.calendarExpiry).format('MMM D, YYYY HH:mm')})`
            : '';
          console.log(`Google Calendar: Connected${expiry}`);
        } else if (status.calendarRevoked) {
          console.log(`Google Calendar: Authorization revoked (run "npm run cli -- calendar ${tenantId}" to reconnect)`);
        } else {
          console.log('Google Calendar: Not connected');
        }

        console.log('\n=== Auto-sync ===');
        console.log(`Enabled: ${status.autoSync ? 'Yes' : 'No'}`);
        console.log('');
      });
    });
}
