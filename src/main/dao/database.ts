import Database from 'better-sqlite3'
import { dirname } from 'node:path'
import { existsSync, mkdirSync } from 'node:fs'
import { StoreBusyError } from '../errors'

export interface DatabaseOptions {
  /** 数据库被锁定时的等待时长（毫秒），超时后抛 StoreBusyError */
  busyTimeoutMs?: number
}

export const MEMORY_DB = ':memory:'

/** SQLite 锁冲突（另一个 keepalive 进程正在写） */
export function isBusyError(err: unknown): boolean {
  return (
    err instanceof Database.SqliteError &&
    (err.code.startsWith('SQLITE_BUSY') || err.code.startsWith('SQLITE_LOCKED'))
  )
}

/** 唯一约束冲突 */
export function isUniqueViolation(err: unknown): boolean {
  return err instanceof Database.SqliteError && err.code === 'SQLITE_CONSTRAINT_UNIQUE'
}

/**
 * 数据库连接管理
 * 负责 SQLite 连接初始化和表结构创建；由调用方显式创建并注入，不做全局单例
 */
export class DatabaseManager {
  private db: Database.Database

  constructor(readonly dbPath: string, options: DatabaseOptions = {}) {
    // 确保数据目录存在
    if (dbPath !== MEMORY_DB) {
      const dbDir = dirname(dbPath)
      if (!existsSync(dbDir)) {
        mkdirSync(dbDir, { recursive: true })
      }
    }

    try {
      this.db = new Database(dbPath, { timeout: options.busyTimeoutMs ?? 2000 })
      // 启用 WAL 模式，cron 运行与 dashboard 读互不阻塞
      if (dbPath !== MEMORY_DB) {
        this.db.pragma('journal_mode = WAL')
      }
      this.initTables()
    } catch (err) {
      if (isBusyError(err)) throw new StoreBusyError({ cause: err })
      throw err
    }
  }

  /** 初始化数据库表 */
  private initTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS projects (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE,
        endpointUrl TEXT NOT NULL,
        credential TEXT NOT NULL,
        checkMethod TEXT NOT NULL DEFAULT 'rpc' CHECK (checkMethod IN ('rpc', 'table')),
        tableName TEXT DEFAULT NULL,
        enabled INTEGER NOT NULL DEFAULT 1,
        lastStatus TEXT DEFAULT NULL CHECK (lastStatus IN ('success', 'failed', 'unknown')),
        lastStatusDetail TEXT DEFAULT NULL,
        lastCheckedAt INTEGER DEFAULT NULL,
        createdAt INTEGER NOT NULL,
        updatedAt INTEGER NOT NULL,
        CHECK (checkMethod <> 'table' OR tableName IS NOT NULL)
      );

      CREATE INDEX IF NOT EXISTS idx_projects_enabled ON projects(enabled);
      CREATE INDEX IF NOT EXISTS idx_projects_name ON projects(name);
    `)
  }

  /** 获取数据库连接实例 */
  getDb(): Database.Database {
    return this.db
  }

  /** 连接是否可用 */
  get isOpen(): boolean {
    return this.db.open
  }

  /** 关闭数据库连接 */
  close(): void {
    if (this.db.open) this.db.close()
  }
}
