//src/database/database.service.ts
import { Logger, OnModuleDestroy } from '@nestjs/common';
import initSqlJs from 'sql.js';
import type { Database, SqlJsStatic } from 'sql.js';
import { drizzle } from 'drizzle-orm/sql-js';
import type { SQLJsDatabase } from 'drizzle-orm/sql-js';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import { existsSync, readdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import * as schema from './schema';

export interface DatabaseOptions {
  /** SQLite file path, or `:memory:`. */
  url: string;
  migrationsDir: string;
}

export type DrizzleDatabase = SQLJsDatabase<typeof schema>;

/** Either the root database handle or an open transaction on it. */
export type SqliteExecutor = BaseSQLiteDatabase<'sync', void, typeof schema>;

const IN_MEMORY = ':memory:';

// The WebAssembly module is compiled once per process.
let engine: Promise<SqlJsStatic> | undefined;

/**
 * SQLite running in-process. A file-backed database is loaded into memory
 * when opened and written back after every committed write.
 */
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private closed = false;
  readonly db: DrizzleDatabase;

  private constructor(
    private readonly connection: Database,
    private readonly url: string,
  ) {
    this.enableForeignKeys();
    this.db = drizzle(connection, { schema });
  }

  static async open(options: DatabaseOptions): Promise<DatabaseService> {
    engine ??= initSqlJs();
    const SQL = await engine;

    const persisted =
      options.url !== IN_MEMORY && existsSync(options.url)
        ? readFileSync(options.url)
        : undefined;
    const service = new DatabaseService(
      new SQL.Database(persisted),
      options.url,
    );
    service.applySchema(options.migrationsDir);
    return service;
  }

  ping(): boolean {
    if (this.closed) {
      return false;
    }
    const [result] = this.connection.exec('SELECT 1 AS ok');
    return result?.values[0]?.[0] === 1;
  }

  /** Writes the database file. A no-op for `:memory:`. */
  save() {
    if (this.url === IN_MEMORY || this.closed) {
      return;
    }
    writeFileSync(this.url, this.connection.export());
    // export() reopens the connection, which resets pragmas.
    this.enableForeignKeys();
  }

  // Called by NestJS on shutdown.
  onModuleDestroy() {
    if (this.closed) {
      return;
    }
    this.save();
    this.connection.close();
    this.closed = true;
  }

  private enableForeignKeys() {
    this.connection.run('PRAGMA foreign_keys = ON');
  }

  private applySchema(migrationsDir: string) {
    const files = readdirSync(migrationsDir)
      .filter((file) => file.endsWith('.sql'))
      .sort();

    for (const file of files) {
      this.connection.exec(readFileSync(join(migrationsDir, file), 'utf8'));
      this.logger.log(`Applied schema file ${file}`);
    }
  }
}
