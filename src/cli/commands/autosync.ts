import { Command, InvalidArgumentError } from 'commander';
import { exitCodeFor, OpenRuntime, withRuntime } from '../shared.js';

function parseSwitch(value: string): boolean {
  if (value === 'on') return true;
  if (value === 'off') return false;
  throw new InvalidArgumentError('Expected "on" or "off".');
}

export function autosyncCommand(open: OpenRuntime): Command {
  return new Command('autosync')
    .description('Turn the recurring sync on or off (picked up by a running "serve")')
    .argument('<tenant>', 'tenant identifier')
    .argument('<state>', 'on | off', parseSwitch)
    .action(async (tenantId: string, enabled: boolean) => {
      await withRuntime(open, async ({ service, context }) => {
        const result = await service.setAutoSync(tenantId, enabled);
        if (!result.ok) {
          console.error(`Could not change auto-sync: ${result.error.message}`);
          process.exitCode = exitCodeFor(result.error);
          return;
        }

        const hours = context.config.sync.intervalMs / (60 * 60 * 1000);
        console.log(enabled ? `Auto-sync enabled. Assignments will be synced every ${hours} hours.` : 'Auto-sync disabled.');
      });
    });
}
