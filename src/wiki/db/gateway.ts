import { OperationFailure, ResourceAcquisitionFailure } from '../../shared/errors';
import { Connection, ConnectionPool } from './connectionPool';

/**
 * Runs one logical operation on a pooled connection.
 *
 * The connection is released exactly once, whether the operation resolves,
 * rejects or throws synchronously, and also when the client that triggered
 * it has already gone away. A failed acquisition surfaces as
 * ResourceAcquisitionFailure; anything the operation raises surfaces as
 * OperationFailure.
 *
 * Knows nothing about principals: call it only after the guard chain has
 * let the request through.
 */
export async function withConnection<C extends Connection, T>(
  pool: ConnectionPool<C>,
  operation: (connection: C) => Promise<T>
): Promise<T> {
  let connection: C;
  try {
    connection = await pool.acquire();
  } catch (error) {
    if (error instanceof ResourceAcquisitionFailure) throw error;
    throw new ResourceAcquisitionFailure('Could not acquire a database connection', { cause: error });
  }

  try {
    return await operation(connection);
  } catch (error) {
    if (error instanceof OperationFailure) throw error;
    throw new OperationFailure('Database operation failed', 500, { cause: error });
  } finally {
    pool.release(connection);
  }
}
