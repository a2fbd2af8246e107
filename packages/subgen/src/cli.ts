// subgen/src/cli.ts — command-line entry
//
//   subgen --input sources --output output --dnsMode redir-host --ipv6Enabled

import { argvToRecord, parseArgs } from './lib/helpers.js';
import { createLogger } from './lib/logger.js';
import { run } from './app.js';

async function main(argv: string[]): Promise<void> {
    const logger = createLogger();
    try {
        const args = parseArgs(argvToRecord(argv));
        const summaries = await run(args, { logger });
        logger.info({ profiles: summaries.length }, 'done');
    } catch (err) {
        logger.error({ err }, 'subgen failed');
        process.exitCode = 1;
    }
}

await main(process.argv.slice(2));
