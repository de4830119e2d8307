import { Command } from 'commander';
import * as readline from 'readline';
import { OpenRuntime, withRuntime } from '../shared.js';

async function confirmReset(): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question('Type "RESET" to confirm: ', (answer) => {
      rl.close();
      resolve(answer === 'RESET');
    });
  });
}

export function resetCommand(open: OpenRuntime): Command {
  return new Command('reset')
    .description('Delete everything stored for a tenant (DESTRUCTIVE)')
    .argument('<tenant>', 'tenant identifier')
    .option('--force', 'Skip confirmation prompt')
    .action(async (tenantId: string, options: { force?: boolean }) => {
      console.log('\n========================================');
      console.log('         WARNING: DESTRUCTIVE ACTION');
      console.log('========================================\n');
      console.log(`This removes the Quera session, the Google authorization and auto-sync for "${tenantId}".`);
      console.log('Events already in Google Calendar are NOT deleted; a later sync finds and reuses them.\n');

      if (!options.force) {
        const confirmed = await confirmReset();
        if (!confirmed) {
          console.log('\nReset cancelled.');
          return;
        }
      }

      await withRuntime(open, async ({ service, context }) => {
        await service.disconnect(tenantId, 'all');
        context.logger.info(`Tenant ${tenantId} reset`);
        console.log('\nAll data for this tenant has been deleted.');
      });
    });
}
