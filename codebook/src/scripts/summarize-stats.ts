/**
 * Print stats summaries with codes resolved to their meanings.
 *
 * Usage:
 *   npm run summarize -- \
 *     --base data/13100_tokyo23-ku_2023 \
 *     --stats data/13100_tokyo23-ku_2023/udx \
 *     [--layer Building --field usage]
 *
 * Without --layer/--field, prints every file's layer summary as JSON.
 * With both, prints the field's resolved frequencies summed over all files.
 */
import { loadConfig } from '../config.js';
import { loadReferenceData } from '../reference-data.js';
import { StatsCatalog } from '../stats/stats-catalog.js';

interface CliArgs {
  base?: string;
  stats: string;
  layer?: string;
  field?: string;
}

function parseArgs(): CliArgs {
  const args = process.argv.slice(2);
  const result: Partial<CliArgs> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--base':
        result.base = args[++i];
        break;
      case '--stats':
        result.stats = args[++i];
        break;
      case '--layer':
        result.layer = args[++i];
        break;
      case '--field':
        result.field = args[++i];
        break;
      default:
        console.warn(`Unknown argument: ${arg}`);
    }
  }

  if (!result.stats) {
    console.error('Usage: summarize-stats --stats <dir> [--base <dir>] [--layer <name> --field <name>]');
    process.exit(1);
  }
  if ((result.layer === undefined) !== (result.field === undefined)) {
    console.error('--layer and --field must be given together');
    process.exit(1);
  }

  return { ...result, stats: result.stats };
}

async function main(): Promise<void> {
  const args = parseArgs();
  const config = loadConfig(args.base ? { baseDir: args.base } : {});
  const reference = await loadReferenceData(config);
  const catalog = await StatsCatalog.open(args.stats, reference);

  if (args.layer !== undefined && args.field !== undefined) {
    const description = catalog.describeField(args.layer, args.field);
    console.log(`${args.layer}.${args.field}${description ? ` (${description})` : ''}`);
    console.log(JSON.stringify(catalog.layerFrequencies(args.layer, args.field), null, 2));
    return;
  }

  console.log(JSON.stringify(catalog.summarize(), null, 2));
}

main().catch((error) => {
  console.error('Error:', error);
  process.exit(1);
});
