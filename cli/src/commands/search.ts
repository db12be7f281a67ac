/**
 * Provision CLI — Search Command
 *
 * Searches every bundled manifest for packages matching a query.
 *
 * Usage:
 *   provision search <query>     Match package ids, labels and group names
 */

import { Command } from 'commander';
import { getCatalog } from '../catalog';
import { printInfo, printTable, colors } from '../output';

export function registerSearchCommand(program: Command): void {
  program
    .command('search <query>')
    .description('Search bundled manifests for a package')
    .action((query: string) => {
      const entries = getCatalog().search(query);

      if (entries.length === 0) {
        printInfo(`No packages found matching "${query}".`);
        return;
      }

      printInfo(`Found ${entries.length} package(s) matching "${query}":\n`);

      printTable({
        head: ['Package', 'Manager', 'Group', 'Manifest'],
        rows: entries.map((e) => [
          colors.pkg(e.label ? `${e.id} (${e.label})` : e.id),
          colors.manager(e.manager),
          e.group,
          colors.dim(e.manifest),
        ]),
      });
    });
}
