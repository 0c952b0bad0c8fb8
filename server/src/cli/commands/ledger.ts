import { Command } from 'commander';
import { loadConsolidationConfig } from '../../config/index.js';
import { FileLedgerStore, FingerprintLedger } from '../../services/consolidation/ledger.js';
import { heading, field, table } from '../format.js';

export function registerLedgerCommands(program: Command): void {
  program
    .command('ledger')
    .description('Show how many fingerprints the ledger holds per source')
    .option('-f, --file <path>', 'Ledger file (defaults to LEDGER_PATH)')
    .action(async (opts: { file?: string }) => {
      const filePath = opts.file ?? loadConsolidationConfig().ledgerPath;
      const store = new FileLedgerStore(filePath);
      const ledger = FingerprintLedger.fromSnapshot(await store.load());

      heading('Ledger');
      field('File', store.getFilePath());
      field('Sources', ledger.sourceKeys().length);
      field('Fingerprints', ledger.totalCount());
      console.log();

      table(
        ledger.sourceKeys().map((key) => ({ source: key, rows: ledger.count(key) })),
        ['source', 'rows']
      );
      console.log();
    });
}
