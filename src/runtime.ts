import { Reconciler } from './calendar/reconciler.js';
import { GoogleAuth } from './google/auth.js';
import { GoogleCalendarGateway } from './google/calendar.js';
import { QueraScraper } from './scraper/quera.js';
import { CredentialStore } from './storage/credentials.js';
import { SqlKeyValueStore } from './storage/database.js';
import { SyncLeaseStore } from './storage/leases.js';
import { TenantStateStore } from './storage/tenants.js';
import { SyncOrchestrator } from './sync/orchestrator.js';
import { Scheduler } from './sync/scheduler.js';
import { DeadlineSyncService } from './sync/service.js';
import { AppContext, componentLogger } from './utils/context.js';

export interface Runtime {
  context: AppContext;
  service: DeadlineSyncService;
  scheduler: Scheduler;
  close(): Promise<void>;
}

/**
 * Wires the engine in dependency order: storage, credentials, collaborators,
 * reconciler, orchestrator, scheduler, command surface.
 */
export async function createRuntime(context: AppContext): Promise<Runtime> {
  const { config } = context;

  const store = await SqlKeyValueStore.open(config.paths.database);
  const googleAuth = new GoogleAuth(config.google);
  const credentials = new CredentialStore(store, googleAuth, componentLogger(context, 'credentials'));
  const tenants = new TenantStateStore(store, componentLogger(context, 'tenants'));
  const leases = new SyncLeaseStore(store, componentLogger(context, 'leases'));

  const source = new QueraScraper(config.quera.baseUrl, config.sync.requestTimeoutMs, componentLogger(context, 'quera'));
  const gateway = new GoogleCalendarGateway(googleAuth, {
    calendarId: config.google.calendarId,
    timeZone: config.sync.timeZone,
    requestTimeoutMs: config.sync.requestTimeoutMs,
  });

  const reconciler = new Reconciler(
    gateway,
    { utcOffsetMinutes: config.sync.utcOffsetMinutes, lookaroundDays: config.sync.lookaroundDays },
    componentLogger(context, 'reconciler')
  );
  const orchestrator = new SyncOrchestrator(
    { credentials, tenants, source, reconciler, leases },
    { utcOffsetMinutes: config.sync.utcOffsetMinutes, leaseMs: config.sync.leaseMs },
    componentLogger(context, 'sync')
  );
  const scheduler = new Scheduler(
    orchestrator,
    tenants,
    { intervalMs: config.sync.intervalMs, initialDelayMs: config.sync.initialDelayMs },
    componentLogger(context, 'scheduler')
  );
  const service = new DeadlineSyncService(
    { auth: googleAuth, credentials, tenants, source, orchestrator, scheduler },
    componentLogger(context, 'commands')
  );

  return {
    context,
    service,
    scheduler,
    async close() {
      scheduler.stopAll();
      await store.close();
    },
  };
}
