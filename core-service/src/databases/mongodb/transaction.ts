/**
 * Transaction helper
 *
 * Runs `fn` inside a MongoDB transaction. The driver retries the whole
 * callback on TransientTransactionError and the commit on
 * UnknownTransactionCommitResult; any other error aborts and propagates.
 */

import type { ClientSession, MongoClient, TransactionOptions as DriverTransactionOptions } from 'mongodb';

export const DEFAULT_TRANSACTION_OPTIONS: DriverTransactionOptions = {
  readConcern: { level: 'snapshot' },
  writeConcern: { w: 'majority' },
  readPreference: 'primary',
};

export interface TransactionOptions {
  client: MongoClient;
  /** Join an existing session; the caller then owns commit/abort */
  session?: ClientSession;
  transactionOptions?: DriverTransactionOptions;
}

export async function withTransaction<T>(
  options: TransactionOptions,
  fn: (session: ClientSession) => Promise<T>
): Promise<T> {
  if (options.session) {
    return fn(options.session);
  }

  const session = options.client.startSession();
  try {
    return await session.withTransaction(
      () => fn(session),
      options.transactionOptions ?? DEFAULT_TRANSACTION_OPTIONS
    );
  } finally {
    await session.endSession();
  }
}
