import Redis from 'ioredis';
import { config } from '../../shared/config';
import { ResourceAcquisitionFailure } from '../../shared/errors';
import { createLogger } from '../../shared/logger';

const log = createLogger('db');

export type StatementParam = string | number;

/**
 * A checked-out connection. Statements and parameters are opaque here: the
 * Redis pool sends them as a command, the in-memory pool interprets a subset.
 */
export interface Connection {
  execute(statement: string, params?: readonly StatementParam[]): Promise<unknown>;
}

export interface ConnectionPool<C extends Connection = Connection> {
  acquire(): Promise<C>;
  release(connection: C): void;
  close(): Promise<void>;
}

export interface ConnectionFactory<C> {
  create(): Promise<C>;
  destroy(connection: C): Promise<void>;
  /** False once the connection can no longer run statements; the pool evicts it. */
  validate?(connection: C): boolean;
}

export interface PoolOptions {
  maxSize: number;
  acquireTimeoutMs: number;
}

export interface PoolStats {
  size: number;
  idle: number;
  leased: number;
  waiting: number;
  acquired: number;
  released: number;
}

interface Waiter<C> {
  resolve(connection: C): void;
  reject(error: Error): void;
  timer: NodeJS.Timeout;
}

/**
 * Fixed-capacity pool. Callers past `maxSize` queue FIFO and give up after
 * `acquireTimeoutMs`.
 */
export class BoundedPool<C extends Connection> implements ConnectionPool<C> {
  private idle: C[] = [];
  private leased: Set<C> = new Set();
  private waiters: Waiter<C>[] = [];
  private size = 0;
  private closed = false;
  private acquired = 0;
  private released = 0;

  constructor(
    private readonly factory: ConnectionFactory<C>,
    private readonly options: PoolOptions
  ) {}

  async acquire(): Promise<C> {
    if (this.closed) {
      throw new ResourceAcquisitionFailure('Connection pool is closed');
    }

    let idle = this.idle.pop();
    while (idle !== undefined && !this.isAlive(idle)) {
      this.evict(idle);
      idle = this.idle.pop();
    }
    if (idle !== undefined) {
      return this.lease(idle);
    }

    if (this.size < this.options.maxSize) {
      return this.lease(await this.open());
    }

    return new Promise<C>((resolve, reject) => {
      const waiter: Waiter<C> = {
        resolve,
        reject,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          log.warn('Timed out waiting for a database connection', {
            timeoutMs: this.options.acquireTimeoutMs,
            maxSize: this.options.maxSize,
          });
          reject(
            new ResourceAcquisitionFailure(
              `No database connection available after ${this.options.acquireTimeoutMs}ms`
            )
          );
        }, this.options.acquireTimeoutMs),
      };
      waiter.timer.unref();
      this.waiters.push(waiter);
    });
  }

  release(connection: C): void {
    if (!this.leased.delete(connection)) {
      log.warn('Ignoring release of a connection that is not checked out');
      return;
    }
    this.released++;

    if (this.closed) {
      this.size--;
      this.destroy(connection);
      return;
    }

    const alive = this.isAlive(connection);
    if (!alive) {
      this.evict(connection);
    }

    const waiter = this.waiters.shift();
    if (!waiter) {
      if (alive) this.idle.push(connection);
      return;
    }
    clearTimeout(waiter.timer);

    if (alive) {
      waiter.resolve(this.lease(connection));
      return;
    }
    // The evicted slot is free again: open a replacement for the next caller
    this.open().then(
      (replacement) => waiter.resolve(this.lease(replacement)),
      (error: Error) => waiter.reject(error)
    );
  }

  async close(): Promise<void> {
    this.closed = true;

    for (const waiter of this.waiters) {
      clearTimeout(waiter.timer);
      waiter.reject(new ResourceAcquisitionFailure('Connection pool is closed'));
    }
    this.waiters = [];

    const idle = this.idle;
    this.idle = [];
    this.size -= idle.length;
    await Promise.all(idle.map((connection) => this.factory.destroy(connection)));
  }

  stats(): PoolStats {
    return {
      size: this.size,
      idle: this.idle.length,
      leased: this.leased.size,
      waiting: this.waiters.length,
      acquired: this.acquired,
      released: this.released,
    };
  }

  private async open(): Promise<C> {
    this.size++;
    try {
      return await this.factory.create();
    } catch (error) {
      this.size--;
      throw new ResourceAcquisitionFailure('Could not open a database connection', { cause: error });
    }
  }

  private isAlive(connection: C): boolean {
    return this.factory.validate ? this.factory.validate(connection) : true;
  }

  private evict(connection: C): void {
    log.warn('Evicting a dead database connection', { size: this.size - 1 });
    this.size--;
    this.destroy(connection);
  }

  private lease(connection: C): C {
    this.leased.add(connection);
    this.acquired++;
    return connection;
  }

  private destroy(connection: C): void {
    this.factory.destroy(connection).catch((error: unknown) => {
      log.warn('Failed to close a database connection', {}, error instanceof Error ? error : undefined);
    });
  }
}

export class RedisConnection implements Connection {
  constructor(readonly client: Redis) {}

  execute(statement: string, params: readonly StatementParam[] = []): Promise<unknown> {
    return this.client.call(statement, [...params]);
  }
}

export class RedisConnectionPool extends BoundedPool<RedisConnection> {
  constructor(
    redisUrl: string = config.db.redisUrl,
    options: PoolOptions = { maxSize: config.db.poolSize, acquireTimeoutMs: config.db.acquireTimeoutMs }
  ) {
    super(
      {
        async create() {
          const client = new Redis(redisUrl, {
            lazyConnect: true,
            maxRetriesPerRequest: 3,
            retryStrategy: (times) => {
              if (times > 3) return null;
              return Math.min(times * 100, 1000);
            },
          });
          await client.connect();
          return new RedisConnection(client);
        },
        async destroy(connection) {
          if (connection.client.status === 'ready') {
            await connection.client.quit();
          } else {
            connection.client.disconnect();
          }
        },
        validate(connection) {
          return connection.client.status === 'ready';
        },
      },
      options
    );
  }
}

/** Backing data for the in-memory pool, shared by all of its connections. */
export class MemoryKeyspace {
  readonly hashes: Map<string, Map<string, string>> = new Map();
  readonly strings: Map<string, string> = new Map();

  hash(key: string): Map<string, string> {
    let hash = this.hashes.get(key);
    if (!hash) {
      hash = new Map();
      this.hashes.set(key, hash);
    }
    return hash;
  }

  clear(): void {
    this.hashes.clear();
    this.strings.clear();
  }
}

function arg(params: readonly StatementParam[], index: number, statement: string): string {
  const value = params[index];
  if (value === undefined) {
    throw new Error(`ERR wrong number of arguments for '${statement.toLowerCase()}' command`);
  }
  return String(value);
}

/** Understands the Redis hash and counter commands the page store issues. */
export class InMemoryConnection implements Connection {
  constructor(private readonly keyspace: MemoryKeyspace) {}

  async execute(statement: string, params: readonly StatementParam[] = []): Promise<unknown> {
    const command = statement.toUpperCase();
    const p = (index: number) => arg(params, index, statement);

    switch (command) {
      case 'PING':
        return 'PONG';
      case 'HGET':
        return this.keyspace.hashes.get(p(0))?.get(p(1)) ?? null;
      case 'HEXISTS':
        return this.keyspace.hashes.get(p(0))?.has(p(1)) ? 1 : 0;
      case 'HKEYS':
        return [...(this.keyspace.hashes.get(p(0))?.keys() ?? [])];
      case 'HSET': {
        const hash = this.keyspace.hash(p(0));
        const created = hash.has(p(1)) ? 0 : 1;
        hash.set(p(1), p(2));
        return created;
      }
      case 'HSETNX': {
        const hash = this.keyspace.hash(p(0));
        if (hash.has(p(1))) return 0;
        hash.set(p(1), p(2));
        return 1;
      }
      case 'HDEL':
        return this.keyspace.hashes.get(p(0))?.delete(p(1)) ? 1 : 0;
      case 'INCR': {
        const next = parseInt(this.keyspace.strings.get(p(0)) ?? '0', 10) + 1;
        this.keyspace.strings.set(p(0), String(next));
        return next;
      }
      default:
        throw new Error(`ERR unknown command '${statement}'`);
    }
  }
}

export class InMemoryConnectionPool extends BoundedPool<InMemoryConnection> {
  constructor(
    readonly keyspace: MemoryKeyspace = new MemoryKeyspace(),
    options: PoolOptions = { maxSize: config.db.poolSize, acquireTimeoutMs: config.db.acquireTimeoutMs }
  ) {
    super(
      {
        async create() {
          return new InMemoryConnection(keyspace);
        },
        async destroy() {
          // Nothing to close
        },
      },
      options
    );
  }
}

// In-memory for tests, Redis otherwise
export function createConnectionPool(): ConnectionPool {
  if (config.isTest) {
    return new InMemoryConnectionPool();
  }
  return new RedisConnectionPool();
}
