import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as path from 'path';
import * as fs from 'fs';
import * as sqlite3 from 'sqlite3';

export const DEFAULT_DB_PATH = 'data/insights.sqlite';

@Injectable()
export class SqliteService implements OnModuleDestroy {
  private readonly logger = new Logger(SqliteService.name);
  private db: sqlite3.Database;
  constructor(private cfg: ConfigService) {
    const envPath = this.cfg.get<string>('INSIGHTS_DB_PATH') || DEFAULT_DB_PATH;
    const projectRoot = path.resolve(__dirname, '..', '..');
    const abs = path.isAbsolute(envPath)
      ? envPath
      : path.resolve(projectRoot, envPath);

    const dir = path.dirname(abs);
    try {
      if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    } catch (err) {
      this.logger.error(`Cannot create DB directory ${dir}`, err);
      throw err;
    }

    this.db = new sqlite3.Database(abs, (err) => {
      if (err) {
        this.logger.error(`Failed to open SQLite DB at ${abs}`, err);
      } else {
        this.logger.log(`SQLite DB ready at ${abs}`);
      }
    });

    this.db.exec('PRAGMA busy_timeout=5000');
    this.db.exec('PRAGMA journal_mode=WAL');
    this.db.serialize(() => {
      this.db.run(`create table if not exists page_visits(
        id text primary key,
        user_id text not null,
        url text not null,
        title text,
        domain text,
        visited_at integer not null,
        opened_at integer,
        duration_seconds real,
        active_duration_seconds real,
        engagement_rate real,
        category text,
        metadata text
      )`);
      this.db.run(
        `create index if not exists idx_page_visits_user_time on page_visits(user_id, visited_at)`,
      );
      this.db.run(
        `create index if not exists idx_page_visits_user_url on page_visits(user_id, url)`,
      );
      this.db.run(`create table if not exists tab_aggregates(
        id text primary key,
        page_visit_id text not null,
        closed_at integer not null,
        total_time_seconds real,
        active_time_seconds real,
        scroll_depth_percent real
      )`);
      this.db.run(
        `create index if not exists idx_tab_aggregates_visit on tab_aggregates(page_visit_id)`,
      );
    });
  }
  run(sql: string, params: unknown[] = []) {
    return new Promise<void>((resolve, reject) => {
      this.db.run(sql, params, (err) => (err ? reject(err) : resolve()));
    });
  }
  get<T = unknown>(sql: string, params: unknown[] = []) {
    return new Promise<T | null>((resolve, reject) => {
      this.db.get(sql, params, (err, row) =>
        err ? reject(err) : resolve((row as T) ?? null),
      );
    });
  }
  all<T = unknown>(sql: string, params: unknown[] = []) {
    return new Promise<T[]>((resolve, reject) => {
      this.db.all(sql, params, (err, rows) =>
        err ? reject(err) : resolve((rows as T[]) ?? []),
      );
    });
  }
  onModuleDestroy() {
    return new Promise<void>((resolve, reject) => {
      this.db.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
