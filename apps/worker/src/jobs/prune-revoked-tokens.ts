import { type RevokedTokenRepository, type TransactionRunner } from '@tollgate/domain';
import { type SafeLogger } from '@tollgate/shared';

export interface PruneJobDeps<TTx> {
  revokedTokenRepo: RevokedTokenRepository<TTx>;
  withTransaction: TransactionRunner<TTx>;
  logger: Pick<SafeLogger, 'info'>;
  now?: () => Date;
}

/**
 * Deletes revocation rows whose token has expired. Validation rejects those
 * tokens on expiry alone, so the rows are no longer needed.
 */
export async function runPruneRevokedTokensJob<TTx>(deps: PruneJobDeps<TTx>): Promise<number> {
  const now = deps.now ? deps.now() : new Date();
  const count = await deps.withTransaction((tx) => deps.revokedTokenRepo.deleteExpired(tx, now));
  if (count > 0) {
    deps.logger.info({ count }, 'Pruned expired revocations');
  }
  return count;
}
