import { CommanderError } from 'commander';
import dotenv from 'dotenv';
import { closePool, withRetryingTransaction } from '@stockroom/shared/src/db/client';
import { ExpiryScanService } from '@stockroom/shared/src/services/expiry-scan-service';
import { logger } from '@stockroom/shared/src/utils/logger';
import { parseScannerArgs } from './args';

dotenv.config();

// One-shot run; scheduling belongs to the platform (cron, k8s CronJob)
async function main() {
     const options = parseScannerArgs(process.argv.slice(2));
     const scanner = new ExpiryScanService();

     try {
          const result = await withRetryingTransaction((client) => scanner.scan(client, options));

          logger.info(
               {
                    dryRun: result.dryRun,
                    expired: result.expired.map((b) => b.lotNo),
                    nearExpiry: result.nearExpiry.map((b) => b.lotNo),
               },
               result.dryRun ? 'Dry run: no batches were changed' : 'Expired batches updated'
          );
     } finally {
          await closePool();
     }
}

main().catch((err) => {
     // --help and --version end the run through the same path
     if (err instanceof CommanderError && err.exitCode === 0) {
          process.exit(0);
     }
     logger.error({ err }, 'Expiry scan failed');
     process.exit(1);
});
