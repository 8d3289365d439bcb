import { Command, InvalidArgumentError } from 'commander';
import { ExpiryScanOptions } from '@stockroom/shared/src/services/expiry-scan-service';
import { logger } from '@stockroom/shared/src/utils/logger';

function parseWarningDays(value: string): number {
     const days = Number(value);
     if (value.trim() === '' || !Number.isInteger(days) || days < 0) {
          throw new InvalidArgumentError(`Expected a non-negative integer, got ${value}`);
     }
     return days;
}

export function buildScannerProgram(): Command {
     return new Command()
          .name('expiry-scan')
          .description('Expire out-of-date batches and report the ones expiring soon')
          .option('--dry-run', 'report without changing any batch', false)
          .option('--warning-days <days>', 'near-expiry window in days', parseWarningDays)
          .allowExcessArguments(false)
          .exitOverride()
          .configureOutput({ outputError: (message) => logger.warn(message.trim()) });
}

/**
 * Reads `--dry-run` and `--warning-days <n>` (or `--warning-days=<n>`).
 * Unknown flags throw a CommanderError.
 */
export function parseScannerArgs(argv: string[]): ExpiryScanOptions {
     const program = buildScannerProgram();
     program.parse(argv, { from: 'user' });

     const { dryRun, warningDays } = program.opts<{ dryRun: boolean; warningDays?: number }>();
     return warningDays === undefined ? { dryRun } : { dryRun, warningDays };
}
