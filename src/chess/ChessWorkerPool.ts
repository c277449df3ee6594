/**
 * ChessWorkerPool - Root move search on worker threads
 *
 * A fixed number of workers, created on demand. Each task carries the game's
 * starting FEN and its moves, so workers never share a position. `run` resolves only once
 * every task has reported back.
 */

import type { EventEmitter } from 'node:events';
import { Worker } from 'node:worker_threads';
import type { Chess, Move } from 'chess.js';
import { SearchResponseSchema, type SearchRequest, type SearchTask } from './workers/protocol.js';
import type {
  RootSearchExecutor,
  RootSearchRequest,
  RootSearchResult,
  SearchStats,
} from './types.js';

/** The part of a worker thread the pool relies on */
export interface PoolWorker extends EventEmitter {
  postMessage(message: SearchRequest): void;
  terminate(): Promise<number>;
}

export type WorkerFactory = () => PoolWorker;

export interface TaskResult {
  score: number;
  stats: SearchStats;
}

interface Job {
  request: SearchRequest;
  resolve: (result: TaskResult) => void;
  reject: (error: Error) => void;
}

/**
 * Spawn a search worker. Under a TypeScript loader the worker runs from
 * source through tsx; a compiled build loads the emitted JavaScript.
 */
export function createSearchWorker(): PoolWorker {
  if (import.meta.url.endsWith('.ts')) {
    return new Worker(new URL('./workers/ai.worker.ts', import.meta.url), {
      execArgv: ['--import', 'tsx'],
    });
  }
  return new Worker(new URL('./workers/ai.worker.js', import.meta.url));
}

// =============================================================================
// ChessWorkerPool Class
// =============================================================================

export class ChessWorkerPool {
  private readonly size: number;
  private readonly createWorker: WorkerFactory;
  private readonly workers = new Set<PoolWorker>();
  private readonly idle: PoolWorker[] = [];
  private readonly busy = new Map<PoolWorker, Job>();
  private readonly queue: Job[] = [];
  private nextId = 1;
  private closed = false;

  constructor(size: number, createWorker: WorkerFactory = createSearchWorker) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${size}`);
    }
    this.size = size;
    this.createWorker = createWorker;
  }

  /** Workers currently alive */
  get workerCount(): number {
    return this.workers.size;
  }

  /**
   * Run every task and wait for all of them
   * @returns Results in task order
   */
  run(tasks: readonly SearchTask[]): Promise<TaskResult[]> {
    return Promise.all(tasks.map(task => this.submit(task)));
  }

  submit(task: SearchTask): Promise<TaskResult> {
    if (this.closed) {
      return Promise.reject(new Error('Worker pool is closed'));
    }

    return new Promise<TaskResult>((resolve, reject) => {
      this.queue.push({
        request: { type: 'SEARCH', id: this.nextId++, ...task },
        resolve,
        reject,
      });
      this.dispatch();
    });
  }

  /**
   * Terminate all workers; queued tasks are rejected
   */
  async close(): Promise<void> {
    this.closed = true;

    const closedError = new Error('Worker pool is closed');
    for (const job of this.queue.splice(0)) {
      job.reject(closedError);
    }
    for (const job of this.busy.values()) {
      job.reject(closedError);
    }
    this.busy.clear();
    this.idle.length = 0;

    const workers = [...this.workers];
    this.workers.clear();
    await Promise.all(workers.map(worker => worker.terminate()));
  }

  private dispatch(): void {
    while (this.queue.length > 0) {
      const worker = this.acquire();
      if (!worker) return;

      const job = this.queue.shift();
      if (!job) {
        this.idle.push(worker);
        return;
      }

      this.busy.set(worker, job);
      worker.postMessage(job.request);
    }
  }

  private acquire(): PoolWorker | null {
    const idle = this.idle.pop();
    if (idle) return idle;
    if (this.workers.size < this.size) return this.spawn();
    return null;
  }

  private spawn(): PoolWorker {
    const worker = this.createWorker();
    this.workers.add(worker);

    worker.on('message', (message: unknown) => this.handleMessage(worker, message));
    worker.on('error', (error: Error) => this.handleFailure(worker, error, true));
    worker.on('exit', (code: number) => {
      this.handleFailure(worker, new Error(`Search worker stopped with exit code ${code}`), false);
    });

    return worker;
  }

  private handleMessage(worker: PoolWorker, message: unknown): void {
    const job = this.busy.get(worker);
    if (!job) {
      console.warn('[Pool] Ignoring message from a worker with no task');
      return;
    }
    this.busy.delete(worker);

    const parsed = SearchResponseSchema.safeParse(message);
    if (!parsed.success) {
      job.reject(new Error(`Malformed worker response: ${parsed.error.message}`));
    } else if (parsed.data.id !== job.request.id) {
      job.reject(new Error(`Worker answered task ${parsed.data.id}, expected ${job.request.id}`));
    } else if (parsed.data.type === 'ERROR') {
      job.reject(new Error(parsed.data.error));
    } else {
      job.resolve({ score: parsed.data.score, stats: parsed.data.stats });
    }

    if (!this.closed) {
      this.idle.push(worker);
      this.dispatch();
    }
  }

  private handleFailure(worker: PoolWorker, error: Error, terminate: boolean): void {
    // An error is followed by an exit; only the first one counts
    if (!this.workers.delete(worker)) return;

    console.error(`[Pool] Search worker failed: ${error.message}`);

    const idleIndex = this.idle.indexOf(worker);
    if (idleIndex >= 0) {
      this.idle.splice(idleIndex, 1);
    }

    const job = this.busy.get(worker);
    if (job) {
      this.busy.delete(worker);
      job.reject(error);
    }

    if (terminate) {
      worker.terminate().catch((terminateError: unknown) => {
        console.error('[Pool] Failed to terminate worker:', terminateError);
      });
    }

    if (!this.closed) {
      this.dispatch();
    }
  }
}

// =============================================================================
// Root Search Executor
// =============================================================================

/**
 * Sum node counters across workers; selective depth is the deepest seen
 */
export function mergeStats(all: readonly SearchStats[]): SearchStats {
  return all.reduce<SearchStats>(
    (total, stats) => ({
      nodes: total.nodes + stats.nodes,
      qNodes: total.qNodes + stats.qNodes,
      betaCutoffs: total.betaCutoffs + stats.betaCutoffs,
      seldepth: Math.max(total.seldepth, stats.seldepth),
    }),
    { nodes: 0, qNodes: 0, betaCutoffs: 0, seldepth: 0 }
  );
}

export interface WorkerRootSearchOptions {
  maxQuiescenceDepth?: number;
}

/**
 * Scores each root move in its own worker task
 */
export class WorkerRootSearch implements RootSearchExecutor<Chess, Move> {
  private readonly pool: ChessWorkerPool;
  private readonly maxQuiescenceDepth: number | undefined;

  constructor(pool: ChessWorkerPool, options: WorkerRootSearchOptions = {}) {
    this.pool = pool;
    this.maxQuiescenceDepth = options.maxQuiescenceDepth;
  }

  async scoreCandidates({ position, moves, depth }: RootSearchRequest<Chess, Move>): Promise<RootSearchResult<Move>> {
    const played = position.history({ verbose: true });
    const fen = played.length > 0 ? played[0].before : position.fen();
    const history = played.map(move => move.lan);

    const results = await this.pool.run(
      moves.map(move => ({
        fen,
        history,
        move: move.lan,
        depth,
        maxQuiescenceDepth: this.maxQuiescenceDepth,
      }))
    );

    return {
      candidates: moves.map((move, index) => ({ move, score: results[index].score })),
      stats: mergeStats(results.map(result => result.stats)),
    };
  }

  close(): Promise<void> {
    return this.pool.close();
  }
}
