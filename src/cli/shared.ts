import { Runtime } from '../runtime.js';
import { SyncBatchResult } from '../types/index.js';
import { isRetryable, SyncError } from '../utils/errors.js';

export type OpenRuntime = () => Promise<Runtime>;

export const EXIT_FAILURE = 1;
export const EXIT_RECONNECT = 2;

export async function withRuntime<T>(open: OpenRuntime, task: (runtime: Runtime) => Promise<T>): Promise<T> {
  const runtime = await open();
  try {
    return await task(runtime);
  } finally {
    await runtime.close();
  }
}

/** Exit code for a failed command: 2 when the tenant has to reconnect something. */
export function exitCodeFor(error: SyncError): number {
  return (error.code === 'AuthError' || error.code === 'SourceError') && !isRetryable(error)
    ? EXIT_RECONNECT
    : EXIT_FAILURE;
}

export function reconnectHint(error: SyncError): string | null {
  if (isRetryable(error)) return null;
  if (error.code === 'AuthError') return 'Run "npm run cli -- calendar <tenant>" to reconnect Google Calendar.';
  if (error.code === 'SourceError') {
    return 'Run "npm run cli -- quera <tenant> <session-id>" to reconnect Quera.';
  }
  return null;
}

export function formatSummary(result: SyncBatchResult): string {
  const succeeded = result.created + result.updated + result.unchanged;
  const total = succeeded + result.failed;
  const lines = [
    `${result.failed === 0 ? 'Sync completed!' : 'Sync completed with failures.'}`,
    '',
    `  ${result.created} new assignments added`,
    `  ${result.updated} assignments updated`,
    `  ${result.unchanged} already synced`,
    `  ${result.failed} failed to sync`,
  ];
  if (result.duplicatesRemoved > 0) {
    lines.push(`  ${result.duplicatesRemoved} duplicate events removed`);
  }
  lines.push('', `Total: ${succeeded}/${total} assignments synced successfully.`);

  for (const failure of result.failures) {
    const retry = isRetryable(failure.error) ? 'retryable' : 'not retryable';
    lines.push(`  - ${failure.title}: ${failure.error.message} (${failure.error.code}, ${retry})`);
  }
  return lines.join('\n');
}
