import type { DatabaseManager } from './database'
import type { ProjectRow, ProjectStatus } from './types'

/** 插入时由调用方提供的列 */
export type ProjectInsert = Omit<
  ProjectRow,
  'id' | 'lastStatus' | 'lastStatusDetail' | 'lastCheckedAt'
>

/** 可更新的列 */
export type ProjectRowUpdate = Partial<
  Pick<
    ProjectRow,
    'name' | 'endpointUrl' | 'credential' | 'checkMethod' | 'tableName' | 'enabled' | 'lastStatus' | 'lastStatusDetail'
  >
>

/**
 * Project DAO — projects 表的纯数据访问操作
 * 不做业务校验，约束冲突以 SqliteError 原样抛出
 */
export class ProjectDao {
  constructor(private readonly manager: DatabaseManager) {}

  private get db() {
    return this.manager.getDb()
  }

  /** 获取项目，按 ID 升序 */
  findAll(enabledOnly = false): ProjectRow[] {
    const sql = enabledOnly
      ? 'SELECT * FROM projects WHERE enabled = 1 ORDER BY id ASC'
      : 'SELECT * FROM projects ORDER BY id ASC'
    return this.db.prepare(sql).all() as ProjectRow[]
  }

  /** 根据 ID 获取单个项目 */
  findById(id: number): ProjectRow | undefined {
    return this.db
      .prepare('SELECT * FROM projects WHERE id = ?')
      .get(id) as ProjectRow | undefined
  }

  /** 根据名称获取单个项目 */
  findByName(name: string): ProjectRow | undefined {
    return this.db
      .prepare('SELECT * FROM projects WHERE name = ?')
      .get(name) as ProjectRow | undefined
  }

  /** 项目总数 */
  count(): number {
    const row = this.db.prepare('SELECT COUNT(*) AS total FROM projects').get() as { total: number }
    return row.total
  }

  /** 插入项目，返回自增 ID */
  insert(project: ProjectInsert): number {
    const result = this.db
      .prepare(
        'INSERT INTO projects (name, endpointUrl, credential, checkMethod, tableName, enabled, createdAt, updatedAt) VALUES (?, ?, ?, ?, ?, ?, ?, ?)'
      )
      .run(
        project.name,
        project.endpointUrl,
        project.credential,
        project.checkMethod,
        project.tableName,
        project.enabled,
        project.createdAt,
        project.updatedAt
      )
    return Number(result.lastInsertRowid)
  }

  /** 更新项目，返回受影响行数 */
  update(id: number, fields: ProjectRowUpdate, now: number): number {
    const sets: string[] = []
    const values: Array<string | number | null> = []
    if (fields.name !== undefined) { sets.push('name = ?'); values.push(fields.name) }
    if (fields.endpointUrl !== undefined) { sets.push('endpointUrl = ?'); values.push(fields.endpointUrl) }
    if (fields.credential !== undefined) { sets.push('credential = ?'); values.push(fields.credential) }
    if (fields.checkMethod !== undefined) { sets.push('checkMethod = ?'); values.push(fields.checkMethod) }
    if (fields.tableName !== undefined) { sets.push('tableName = ?'); values.push(fields.tableName) }
    if (fields.enabled !== undefined) { sets.push('enabled = ?'); values.push(fields.enabled) }
    if (fields.lastStatus !== undefined) { sets.push('lastStatus = ?'); values.push(fields.lastStatus) }
    if (fields.lastStatusDetail !== undefined) { sets.push('lastStatusDetail = ?'); values.push(fields.lastStatusDetail) }
    sets.push('updatedAt = ?')
    values.push(now)
    values.push(id)
    return this.db.prepare(`UPDATE projects SET ${sets.join(', ')} WHERE id = ?`).run(...values).changes
  }

  /** 写入探测结果（单条 UPDATE，天然原子），返回受影响行数 */
  updateStatus(id: number, status: ProjectStatus, detail: string, checkedAt: number, now: number): number {
    return this.db
      .prepare(
        'UPDATE projects SET lastStatus = ?, lastStatusDetail = ?, lastCheckedAt = ?, updatedAt = ? WHERE id = ?'
      )
      .run(status, detail, checkedAt, now, id).changes
  }

  /** 删除项目，返回受影响行数 */
  deleteById(id: number): number {
    return this.db.prepare('DELETE FROM projects WHERE id = ?').run(id).changes
  }
}
