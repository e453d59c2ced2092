import type { NodeSDK } from '@opentelemetry/sdk-node';
import type { LedgerStore } from './domains/ledger';

export type ShutdownTargets = {
  server: { close(callback: (error?: Error) => void): unknown };
  store: Pick<LedgerStore, 'close'>;
  telemetry: Pick<NodeSDK, 'shutdown'> | null;
  stopScheduler: () => void;
};

/**
 * Stops accepting work, then releases resources in order: scheduler, HTTP
 * server, ledger store, telemetry. Telemetry goes last so spans from the
 * final requests are flushed.
 */
export async function gracefulShutdown({ server, store, telemetry, stopScheduler }: ShutdownTargets): Promise<void> {
  stopScheduler();
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
  await store.close();
  if (telemetry) {
    await telemetry.shutdown();
  }
}
