/**
 * CLI command: `intent-router validate`
 *
 * Loads and builds the catalog and lists its intents in precedence
 * order, or reports the first problem found.
 *
 * @module cli/commands/validate
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { loadCatalogRuntime, reportError } from '../options.js';
import type { CatalogRuntime } from '../options.js';

/**
 * Execute the validate command.
 *
 * @returns Exit code (0 = valid, 1 = invalid)
 */
export async function validateCommand(args: string[]): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    showHelp();
    return 0;
  }

  const jsonMode = args.includes('--json');

  let runtime: CatalogRuntime;
  try {
    runtime = await loadCatalogRuntime(args);
  } catch (err) {
    if (jsonMode) {
      const message = err instanceof Error ? err.message : String(err);
      console.log(JSON.stringify({ valid: false, error: message }, null, 2));
    } else {
      reportError(err, false);
    }
    return 1;
  }

  const { catalog, catalogPath, threshold } = runtime;

  if (jsonMode) {
    console.log(JSON.stringify({
      valid: true,
      catalog: catalogPath,
      threshold,
      intents: catalog.definitions.map((d) => ({
        name: d.name,
        entityKeys: d.entityKeys,
        keywords: d.keywords.length,
      })),
    }, null, 2));
    return 0;
  }

  p.intro(pc.bgCyan(pc.black(' Catalog Validation ')));
  p.log.message(`Source: ${catalogPath}`);
  p.log.message(`Keyword threshold: ${threshold}`);
  for (const [index, d] of catalog.definitions.entries()) {
    const keys = d.entityKeys.length > 0 ? d.entityKeys.join(', ') : pc.dim('no parameters');
    const keywords = d.keywords.length > 0 ? `${d.keywords.length} keyword(s)` : pc.dim('no keywords');
    p.log.message(`  ${pc.dim(`${index + 1}.`)} ${pc.bold(d.name)}  ${keys}  ${keywords}`);
  }
  p.outro(pc.green(`${catalog.size} intent(s) valid`));
  return 0;
}

function showHelp(): void {
  console.log(`
intent-router validate - Check an intent catalog

Usage:
  intent-router validate [options]

Options:
  --catalog=PATH    Intent definitions file (default: bundled catalog)
  --threshold=N     Keyword confirmation threshold to validate with
  --config=PATH     Config file (default: .intent-router.json)
  --json            Output as JSON
  --help, -h        Show this help
`);
}
