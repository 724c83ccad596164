import dotenv from 'dotenv';
dotenv.config();

import { parseCliArgs, type CliInvocation } from './cliOptions';
import { loadAppConfig, type AppConfig } from './config';
import { RunHistory } from './db';
import { ConfigurationError, errorMessage } from './errors';
import { QueryCatalog } from './queries';
import { renderReport } from './report';
import { createSearchRuntime, type JobSearchService } from './search';
import { SOURCE_IDS, type AggregatedResult } from './scrapers/types';

const USAGE = `
Usage:
  tsx src/cli.ts search <query>           Search every enabled source for one query
  tsx src/cli.ts random [category]        Search a random query, optionally from one category
  tsx src/cli.ts category <name>          Search the first queries of a category
  tsx src/cli.ts batch <query> <query>... Search several queries as one report
  tsx src/cli.ts comprehensive            Search one query from every category
  tsx src/cli.ts categories               List query categories
  tsx src/cli.ts runs [limit]             Show recorded search runs

Options:
  -l, --location <text>     Location to search in (default: any)
  -s, --sources <a,b>       Only these sources (${SOURCE_IDS.join(', ')})
  --max-pages <n>           Pages per source
  --max-results <n>         Accepted listings to keep per source (search, random, batch)
  --max-jobs <n>            Per query (category) or per category (comprehensive), default 10
  --seniority <level>       senior, staff, principal, lead
  --strict                  Use strict filter thresholds
  --brief | --full          Listing detail (default: brief)
  --counts-only             Only totals and per-source status
  --json                    Print the result as JSON
`;

function print(result: AggregatedResult, invocation: CliInvocation): void {
  if (invocation.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    console.log(`\n${renderReport(result, invocation.format)}`);
  }
}

async function runSearch(
  config: AppConfig,
  invocation: CliInvocation,
  search: (service: JobSearchService) => Promise<AggregatedResult>,
): Promise<void> {
  const runtime = createSearchRuntime(config);
  try {
    print(await search(runtime.service), invocation);
  } finally {
    await runtime.close();
  }
}

async function main(): Promise<void> {
  const invocation = parseCliArgs(process.argv.slice(2));
  const { command, args, defaults } = invocation;

  switch (command) {
    case 'search': {
      const text = args.join(' ').trim();
      if (!text) throw new ConfigurationError('search needs a query, e.g. search "LLM engineer"');
      await runSearch(loadAppConfig(), invocation, service =>
        service.search({ ...defaults, text, ...(invocation.maxResults ? { maxResults: invocation.maxResults } : {}) }),
      );
      break;
    }

    case 'random': {
      const config = loadAppConfig();
      const text = QueryCatalog.fromFile(config.querySetsPath).randomQuery(Math.random, args[0]);
      console.log(`[CLI] Random query: "${text}"`);
      await runSearch(config, invocation, service =>
        service.search({ ...defaults, text, ...(invocation.maxResults ? { maxResults: invocation.maxResults } : {}) }),
      );
      break;
    }

    case 'category': {
      const name = args.join(' ').trim();
      if (!name) throw new ConfigurationError('category needs a category name; see "categories"');
      await runSearch(loadAppConfig(), invocation, service =>
        service.searchCategory(name, invocation.maxJobs, defaults),
      );
      break;
    }

    case 'batch': {
      await runSearch(loadAppConfig(), invocation, service =>
        service.searchMany(args, defaults, invocation.maxResults),
      );
      break;
    }

    case 'comprehensive': {
      await runSearch(loadAppConfig(), invocation, service =>
        service.searchComprehensive(invocation.maxJobs, defaults),
      );
      break;
    }

    case 'categories': {
      const catalog = QueryCatalog.fromFile(loadAppConfig().querySetsPath);
      for (const category of catalog.list()) {
        console.log(`\n${category.slug} - ${category.name}`);
        if (category.description) console.log(`  ${category.description}`);
        for (const query of category.queries) console.log(`    ${query}`);
      }
      break;
    }

    case 'runs': {
      const config = loadAppConfig();
      const limit = args[0] ? parseInt(args[0], 10) : 20;
      if (!Number.isInteger(limit) || limit < 1) throw new ConfigurationError(`Invalid limit: ${args[0]}`);
      const history = RunHistory.open(config.databasePath);
      try {
        console.log('\nRuns:', JSON.stringify(history.recentRuns(limit), null, 2));
      } finally {
        history.close();
      }
      break;
    }

    default:
      console.log(USAGE);
  }
}

main().catch(err => {
  if (err instanceof ConfigurationError) {
    console.error('Configuration error:', err.message);
    process.exit(2);
  }
  console.error('Error:', errorMessage(err));
  process.exit(1);
});
