import { Command } from 'commander';
import dayjs from 'dayjs';
import { exitCodeFor, formatSummary, OpenRuntime, reconnectHint, withRuntime } from '../shared.js';

export function syncCommand(open: OpenRuntime): Command {
  return new Command('sync')
    .description('Sync Quera deadlines to Google Calendar')
    .argument('<tenant>', 'tenant identifier')
    .option('--dry-run', 'Show what would be synced without touching the calendar')
    .action(async (tenantId: string, options: { dryRun?: boolean }) => {
      await withRuntime(open, async ({ service }) => {
        console.log('Starting sync...\n');

        if (options.dryRun) {
          const preview = await service.preview(tenantId);
          if (!preview.ok) {
            console.error(`Sync failed: ${preview.error.message}`);
            const hint = reconnectHint(preview.error);
            if (hint) console.error(hint);
            process.exitCode = exitCodeFor(preview.error);
            return;
          }

          console.log('DRY RUN - Would sync these assignments:\n');
          for (const record of preview.value.records) {
            console.log(`  ${record.title}`);
            console.log(`    Due: ${dayjs(record.dueInstant).format('YYYY-MM-DD HH:mm')} (assignment ${record.stableId})`);
          }
          for (const failure of preview.value.failures) {
            console.log(`  [SKIP] ${failure.title}: ${failure.error.message}`);
          }
          console.log(`\nTotal: ${preview.value.records.length} assignments`);
          return;
        }

        const result = await service.syncNow(tenantId);
        if (!result.ok) {
          console.error(`Sync failed: ${result.error.message}`);
          const hint = reconnectHint(result.error);
          if (hint) console.error(hint);
          process.exitCode = exitCodeFor(result.error);
          return;
        }

        console.log(formatSummary(result.value));
        if (result.value.failed > 0) process.exitCode = 1;
      });
    });
}
