// completion_cache.ts — memoized oracle completions
//
// GUARANTEES:
// - Only deterministic requests (temperature 0) are cached
// - Only successful completions are cached; failures always reach the oracle
// - Key = SHA-256 over the canonical request (namespace, prompt, params)
// - Memory-bounded LRU in front of an optional SQLite store
// - Forward-compatible schema migrations (schema_version)
//
// CONTRACT: Synchronous store API (better-sqlite3 blocks by design)

import Database from 'better-sqlite3';
import crypto from 'crypto';
import { LRUCache } from 'lru-cache';
import { createLogger } from './logger';
import { CompletionOracle, CompletionParams, CompletionResult } from './oracle_client';
import { Prompt } from './prompt_builder';

const log = createLogger('cache');

/* -------------------------------------------------------------------------- */
/* Constants                                                                  */
/* -------------------------------------------------------------------------- */

/** Characters of completion text held in memory. */
export const CACHE_MAX_CHARS = 8 * 1024 * 1024;

const SCHEMA_VERSION = 1;

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

function sha256Hex(s: string): string {
  return crypto.createHash('sha256').update(s).digest('hex');
}

function canonicalize(value: unknown): string {
  const stable = (v: unknown): unknown => {
    if (Array.isArray(v)) return v.map(stable);
    if (typeof v === 'object' && v !== null) {
      const out: Record<string, unknown> = {};
      for (const [k, child] of Object.entries(v).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
        out[k] = stable(child);
      }
      return out;
    }
    return v;
  };
  return JSON.stringify(stable(value));
}

export function cacheKey(namespace: string, prompt: Prompt, params: CompletionParams): string {
  return sha256Hex(
    canonicalize({
      namespace,
      prompt: prompt.text,
      stop: params.stopSequence,
      max_tokens: params.maxTokens,
      temperature: params.temperature,
    })
  );
}

/* -------------------------------------------------------------------------- */
/* CompletionStore                                                            */
/* -------------------------------------------------------------------------- */

export class CompletionStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.configureDatabase();
    this.runMigrations();
  }

  private configureDatabase(): void {
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('busy_timeout = 5000');
  }

  private runMigrations(): void {
    const tx = this.db.transaction(() => {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS schema_version (
          version INTEGER PRIMARY KEY,
          applied_at TEXT DEFAULT CURRENT_TIMESTAMP
        ) STRICT
      `);

      const row = this.db
        .prepare<[], { version: number }>(`SELECT version FROM schema_version ORDER BY version DESC LIMIT 1`)
        .get();

      const current = row?.version ?? 0;

      if (current < 1) {
        this.db.exec(`
          CREATE TABLE IF NOT EXISTS completions (
            cache_key TEXT PRIMARY KEY,
            completion TEXT NOT NULL,
            created_at TEXT DEFAULT CURRENT_TIMESTAMP,
            CHECK(length(cache_key) = 64)
          ) STRICT
        `);
        this.db.prepare(`INSERT INTO schema_version (version) VALUES (?)`).run(SCHEMA_VERSION);
      }
    });
    tx();
  }

  get(key: string): string | undefined {
    const row = this.db
      .prepare<[string], { completion: string }>(`SELECT completion FROM completions WHERE cache_key = ?`)
      .get(key);
    return row?.completion;
  }

  put(key: string, completion: string): void {
    this.db
      .prepare(`INSERT OR REPLACE INTO completions (cache_key, completion) VALUES (?, ?)`)
      .run(key, completion);
  }

  count(): number {
    const row = this.db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM completions`).get();
    return row?.n ?? 0;
  }

  close(): void {
    this.db.close();
  }
}

/* -------------------------------------------------------------------------- */
/* CachingOracle                                                              */
/* -------------------------------------------------------------------------- */

export interface CachingOracleOptions {
  store?: CompletionStore;
  /** Separates entries for different endpoints or models. */
  namespace: string;
  maxChars?: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
}

export class CachingOracle implements CompletionOracle {
  private readonly memory: LRUCache<string, string>;
  private readonly stats: CacheStats = { hits: 0, misses: 0 };

  constructor(private readonly inner: CompletionOracle, private readonly options: CachingOracleOptions) {
    this.memory = new LRUCache<string, string>({
      maxSize: options.maxChars ?? CACHE_MAX_CHARS,
      sizeCalculation: (s: string) => Math.max(1, s.length),
    });
  }

  async complete(prompt: Prompt, params: CompletionParams): Promise<CompletionResult> {
    if (params.temperature !== 0) {
      return this.inner.complete(prompt, params);
    }

    const key = cacheKey(this.options.namespace, prompt, params);
    const cached = this.memory.get(key) ?? this.options.store?.get(key);
    if (cached !== undefined) {
      this.stats.hits++;
      this.memory.set(key, cached);
      log.debug(`Cache hit ${key.slice(0, 12)}`);
      return { ok: true, text: cached };
    }

    this.stats.misses++;
    const result = await this.inner.complete(prompt, params);
    if (result.ok) {
      this.memory.set(key, result.text);
      this.options.store?.put(key, result.text);
    }
    return result;
  }

  getStats(): CacheStats {
    return { ...this.stats };
  }
}
