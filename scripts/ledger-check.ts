import { config } from 'dotenv';
import { loadAppConfig } from '../src/config/appConfig';
import { createLedgerStore } from '../src/domains/ledger';
import { LedgerService } from '../src/services/ledger.service';

config();

async function run() {
  const { store } = createLedgerStore({ ...loadAppConfig(), ledgerStore: 'postgres' });
  try {
    const report = await new LedgerService(store).reconcile();
    console.log(JSON.stringify(report, null, 2));
    return report.discrepancies.length > 0 ? 2 : 0;
  } finally {
    await store.close();
  }
}

run()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
