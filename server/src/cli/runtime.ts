/**
 * Wires the engine to the real Google Sheets service and the ledger file.
 */

import { loadConsolidationConfig, type ConsolidationConfig } from '../config/index.js';
import { ConsolidationEngine } from '../services/consolidation/consolidationEngine.js';
import { FileLedgerStore } from '../services/consolidation/ledger.js';
import { GoogleSheetsService } from '../services/googleSheetsClient.js';

export interface Runtime {
  config: ConsolidationConfig;
  service: GoogleSheetsService;
  ledgerStore: FileLedgerStore;
  engine: ConsolidationEngine;
}

/**
 * @throws ConfigurationError when required settings are missing
 */
export function createRuntime(): Runtime {
  const config = loadConsolidationConfig();
  const service = new GoogleSheetsService(config.credentials);
  const ledgerStore = new FileLedgerStore(config.ledgerPath);
  const engine = new ConsolidationEngine({ config, service, ledgerStore });
  return { config, service, ledgerStore, engine };
}
