import { Type, type TSchema } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'
import { ProjectDao, type ProjectRowUpdate } from '../dao/projectDao'
import { isBusyError, isUniqueViolation, type DatabaseManager } from '../dao/database'
import type { ProjectRow } from '../dao/types'
import {
  DuplicateNameError,
  NotFoundError,
  StoreBusyError,
  ValidationError,
  type ValidationIssue
} from '../errors'
import type {
  CheckConfig,
  CheckMethod,
  CheckOutcome,
  Project,
  ProjectCreateParams,
  ProjectUpdateParams
} from '../types'
import { createLogger } from '../logger'

const log = createLogger('ProjectStore')

// ---------- 参数 schema ----------

const CheckMethodSchema = Type.Union([Type.Literal('rpc'), Type.Literal('table')])

const NonEmpty = Type.String({ minLength: 1 })

const ProjectCreateSchema = Type.Object({
  name: NonEmpty,
  endpointUrl: NonEmpty,
  credential: NonEmpty,
  checkMethod: Type.Optional(CheckMethodSchema),
  tableName: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  enabled: Type.Optional(Type.Boolean())
})

const ProjectUpdateSchema = Type.Object({
  name: Type.Optional(NonEmpty),
  endpointUrl: Type.Optional(NonEmpty),
  credential: Type.Optional(NonEmpty),
  checkMethod: Type.Optional(CheckMethodSchema),
  tableName: Type.Optional(Type.Union([Type.String(), Type.Null()]))
})

/** 按 schema 收集字段错误（/name → name） */
export function collectIssues(schema: TSchema, value: unknown): ValidationIssue[] {
  return [...Value.Errors(schema, value)].map((e) => ({
    field: e.path.replace(/^\//, '') || '(root)',
    message: e.message
  }))
}

/** 去掉首尾空白；空串视为未填写 */
function clean(value: string | null | undefined): string | undefined {
  if (value === null || value === undefined) return undefined
  const trimmed = value.trim()
  return trimmed === '' ? undefined : trimmed
}

/** 字符串字段去空白（空串保留，交给 schema 报 minLength） */
function trimField(value: unknown): unknown {
  return typeof value === 'string' ? value.trim() : value
}

/**
 * 校验探测方式与表名的配对：table 方式必须有表名，rpc 方式不得有表名
 */
function toCheckConfig(
  checkMethod: CheckMethod,
  tableName: string | undefined
): CheckConfig | ValidationIssue {
  switch (checkMethod) {
    case 'rpc':
      if (tableName !== undefined) {
        return { field: 'tableName', message: 'only allowed when checkMethod is "table"' }
      }
      return { checkMethod: 'rpc', tableName: null }
    case 'table':
      if (tableName === undefined) {
        return { field: 'tableName', message: 'required when checkMethod is "table"' }
      }
      return { checkMethod: 'table', tableName }
  }
}

function isIssue(value: CheckConfig | ValidationIssue): value is ValidationIssue {
  return 'field' in value
}

/** DB 行 → 领域对象 */
function toProject(row: ProjectRow): Project {
  const base = {
    id: row.id,
    name: row.name,
    endpointUrl: row.endpointUrl,
    credential: row.credential,
    enabled: row.enabled === 1,
    lastStatus: row.lastStatus,
    lastStatusDetail: row.lastStatusDetail,
    lastCheckedAt: row.lastCheckedAt,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt
  }
  switch (row.checkMethod) {
    case 'rpc':
      return { ...base, checkMethod: 'rpc', tableName: null }
    case 'table':
      if (row.tableName === null) {
        throw new Error(`Project ${row.id} uses the table method without a table name`)
      }
      return { ...base, checkMethod: 'table', tableName: row.tableName }
  }
}

export interface ProjectStoreOptions {
  /** 时钟（测试注入） */
  now?: () => number
}

// ---------- 项目存储 ----------

/**
 * 项目存储 — 项目状态的唯一读写入口
 * 负责校验、唯一性与错误转换，SQL 细节交给 ProjectDao
 */
export class ProjectStore {
  private readonly dao: ProjectDao
  private readonly now: () => number

  constructor(manager: DatabaseManager, options: ProjectStoreOptions = {}) {
    this.dao = new ProjectDao(manager)
    this.now = options.now ?? Date.now
  }

  /** 执行 DAO 操作，锁冲突统一转为 StoreBusyError */
  private guard<T>(fn: () => T): T {
    try {
      return fn()
    } catch (err) {
      if (isBusyError(err)) throw new StoreBusyError({ cause: err })
      throw err
    }
  }

  /** 创建项目 */
  create(params: ProjectCreateParams): Project {
    const input = {
      ...params,
      name: trimField(params.name),
      endpointUrl: trimField(params.endpointUrl),
      credential: trimField(params.credential)
    }
    const issues = collectIssues(ProjectCreateSchema, input)
    if (issues.length > 0) throw new ValidationError(issues)

    const config = toCheckConfig(params.checkMethod ?? 'rpc', clean(params.tableName))
    if (isIssue(config)) throw new ValidationError([config])

    const name = params.name.trim()
    const now = this.now()
    let id: number
    try {
      id = this.guard(() =>
        this.dao.insert({
          name,
          endpointUrl: params.endpointUrl.trim(),
          credential: params.credential.trim(),
          checkMethod: config.checkMethod,
          tableName: config.tableName,
          enabled: params.enabled === false ? 0 : 1,
          createdAt: now,
          updatedAt: now
        })
      )
    } catch (err) {
      if (isUniqueViolation(err)) throw new DuplicateNameError(name, { cause: err })
      throw err
    }
    log.info(`Project created: ${name} (#${id}, ${config.checkMethod})`)
    return this.get(id)
  }

  /** 获取单个项目 */
  get(id: number): Project {
    const row = this.guard(() => this.dao.findById(id))
    if (!row) throw new NotFoundError(id)
    return toProject(row)
  }

  /** 根据名称查找项目 */
  findByName(name: string): Project | undefined {
    const row = this.guard(() => this.dao.findByName(name))
    return row ? toProject(row) : undefined
  }

  /** 获取项目列表，按 ID 升序 */
  list(enabledOnly = false): Project[] {
    return this.guard(() => this.dao.findAll(enabledOnly)).map(toProject)
  }

  /** 项目总数 */
  count(): number {
    return this.guard(() => this.dao.count())
  }

  /** 启用 / 禁用项目 */
  setEnabled(id: number, enabled: boolean): Project {
    const changes = this.guard(() => this.dao.update(id, { enabled: enabled ? 1 : 0 }, this.now()))
    if (changes === 0) throw new NotFoundError(id)
    log.info(`Project #${id} ${enabled ? 'enabled' : 'disabled'}`)
    return this.get(id)
  }

  /**
   * 更新连接相关字段
   * 合并后重新校验方式/表名配对；连接配置变化时上次结果不再可信，状态重置为 unknown
   */
  update(id: number, params: ProjectUpdateParams): Project {
    const existing = this.get(id)
    const input = {
      ...params,
      name: trimField(params.name),
      endpointUrl: trimField(params.endpointUrl),
      credential: trimField(params.credential)
    }
    const issues = collectIssues(ProjectUpdateSchema, input)
    if (issues.length > 0) throw new ValidationError(issues)

    const checkMethod = params.checkMethod ?? existing.checkMethod
    let tableName: string | undefined
    if (params.tableName !== undefined) {
      tableName = clean(params.tableName)
    } else if (checkMethod === 'table') {
      tableName = existing.tableName ?? undefined
    }
    const config = toCheckConfig(checkMethod, tableName)
    if (isIssue(config)) throw new ValidationError([config])

    const fields: ProjectRowUpdate = {}
    const name = params.name?.trim()
    const endpointUrl = params.endpointUrl?.trim()
    const credential = params.credential?.trim()
    if (name !== undefined && name !== existing.name) fields.name = name
    if (endpointUrl !== undefined && endpointUrl !== existing.endpointUrl) fields.endpointUrl = endpointUrl
    if (credential !== undefined && credential !== existing.credential) fields.credential = credential
    if (config.checkMethod !== existing.checkMethod) fields.checkMethod = config.checkMethod
    if (config.tableName !== existing.tableName) fields.tableName = config.tableName

    if (Object.keys(fields).length === 0) return existing

    const connectionChanged =
      fields.endpointUrl !== undefined ||
      fields.credential !== undefined ||
      fields.checkMethod !== undefined ||
      fields.tableName !== undefined
    if (connectionChanged && existing.lastStatus !== null) {
      fields.lastStatus = 'unknown'
      fields.lastStatusDetail = null
    }

    try {
      this.guard(() => this.dao.update(id, fields, this.now()))
    } catch (err) {
      if (isUniqueViolation(err) && name !== undefined) throw new DuplicateNameError(name, { cause: err })
      throw err
    }
    log.info(`Project #${id} updated: ${Object.keys(fields).join(', ')}`)
    return this.get(id)
  }

  /** 写入一次检查结果（引擎唯一使用的写路径） */
  recordCheckResult(id: number, outcome: CheckOutcome): void {
    const status = outcome.succeeded ? 'success' : 'failed'
    const changes = this.guard(() =>
      this.dao.updateStatus(id, status, outcome.detail, outcome.checkedAt, this.now())
    )
    if (changes === 0) throw new NotFoundError(id)
  }

  /** 永久删除项目 */
  delete(id: number): void {
    const changes = this.guard(() => this.dao.deleteById(id))
    if (changes === 0) throw new NotFoundError(id)
    log.info(`Project #${id} deleted`)
  }
}
