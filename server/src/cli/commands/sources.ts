import { Command } from 'commander';
import { resolveSource } from '../../services/consolidation/addressResolver.js';
import { sourceKeyOf } from '../../services/consolidation/fingerprint.js';
import { loadSourceCatalog } from '../../services/consolidation/sourceCatalog.js';
import { createRuntime } from '../runtime.js';
import { heading, table, warn } from '../format.js';

export function registerSourceCommands(program: Command): void {
  program
    .command('sources')
    .description('List the sources in the master catalog and the tabs they resolve to')
    .action(async () => {
      const { config, service } = createRuntime();
      const seeds = await loadSourceCatalog(service, config);

      heading(`Sources (${seeds.length})`);
      if (seeds.length === 0) {
        warn(`No appointment URLs found in '${config.master.sheetName}'`);
        return;
      }

      const rows: Record<string, string | number>[] = [];
      for (const [i, seed] of seeds.entries()) {
        const source = await resolveSource(service, seed);
        rows.push({
          '#': i + 1,
          company: seed.displayName,
          key: source ? sourceKeyOf(source) : '—',
          tab: source ? source.tabName : 'unresolved',
        });
      }

      table(rows, ['#', 'company', 'key', 'tab']);
      console.log();
    });
}
