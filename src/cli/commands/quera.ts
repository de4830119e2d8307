import { Command } from 'commander';
import { exitCodeFor, OpenRuntime, withRuntime } from '../shared.js';

export function queraCommand(open: OpenRuntime): Command {
  return new Command('quera')
    .description('Connect a Quera session for a tenant')
    .argument('<tenant>', 'tenant identifier')
    .argument('[session-id]', "value of the 'session_id' cookie on quera.org")
    .option('--disconnect', 'Remove the stored Quera session')
    .action(async (tenantId: string, sessionId: string | undefined, options: { disconnect?: boolean }) => {
      await withRuntime(open, async ({ service }) => {
        if (options.disconnect) {
          await service.disconnect(tenantId, 'source');
          console.log('Quera account has been disconnected.');
          return;
        }

        if (!sessionId) {
          console.log('I need your Quera session ID. To get it:');
          console.log('1. Go to quera.org and log in');
          console.log("2. Open the browser's developer tools (F12)");
          console.log('3. Go to Application/Storage > Cookies');
          console.log("4. Copy the value of 'session_id'");
          process.exitCode = 1;
          return;
        }

        const connected = await service.connectSource(tenantId, sessionId);
        if (!connected.ok) {
          console.error(`Invalid or expired Quera session ID: ${connected.error.message}`);
          process.exitCode = exitCodeFor(connected.error);
          return;
        }
        console.log('Quera account connected successfully!');
      });
    });
}
