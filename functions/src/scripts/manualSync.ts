import { CAMPUS_DOMAINS, isCampusDomain, type CampusDomain } from '../workers/invocation';
import { buildPipelines } from '../workers/pipelines';

function parseDomains(args: string[]): CampusDomain[] {
  if (args.length === 0 || args.includes('--all')) {
    return [...CAMPUS_DOMAINS];
  }

  return args.map(arg => {
    if (!isCampusDomain(arg)) {
      throw new Error(`Unknown domain "${arg}". Expected one of: ${CAMPUS_DOMAINS.join(', ')}`);
    }
    return arg;
  });
}

async function run(): Promise<void> {
  const domains = parseDomains(process.argv.slice(2));
  const pipelines = buildPipelines();

  for (const domain of domains) {
    console.log(`Running ${domain} sync`);
    const summary = await pipelines[domain]();
    console.log(`${domain} complete:`, summary);
  }
}

run().then(
  () => process.exit(0),
  error => {
    console.error('Manual sync failed', error);
    process.exit(1);
  },
);
