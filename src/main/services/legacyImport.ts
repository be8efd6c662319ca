import { readFileSync } from 'node:fs'
import { Type, type Static } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'
import { collectIssues, type ProjectStore } from './projectStore'
import { DuplicateNameError, ValidationError, errorMessage } from '../errors'
import { createLogger } from '../logger'

const log = createLogger('LegacyImport')

/** 旧版平面配置文件中的一个项目 */
const LegacyProjectSchema = Type.Object({
  name: Type.Optional(Type.String()),
  url: Type.Optional(Type.String()),
  key: Type.Optional(Type.String()),
  method: Type.Optional(Type.Union([Type.Literal('rpc'), Type.Literal('table')])),
  table: Type.Optional(Type.String())
})

export const LegacyFileSchema = Type.Array(LegacyProjectSchema)

export type LegacyProject = Static<typeof LegacyProjectSchema>

export interface ImportEntry {
  name: string
  /** 新建项目的 ID（仅 created） */
  id?: number
  reason?: string
}

/** 导入结果：新建 / 重名跳过 / 缺字段 / 其他错误 分开统计 */
export interface ImportSummary {
  created: ImportEntry[]
  skipped: ImportEntry[]
  invalid: ImportEntry[]
  errors: ImportEntry[]
}

/**
 * 批量导入旧版项目定义
 * 只走 ProjectStore.create；重名项目跳过而不是覆盖
 */
export function importLegacyProjects(store: ProjectStore, entries: LegacyProject[]): ImportSummary {
  const summary: ImportSummary = { created: [], skipped: [], invalid: [], errors: [] }

  entries.forEach((entry, index) => {
    const name = entry.name?.trim() || `project-${index + 1}`
    if (!entry.url?.trim() || !entry.key?.trim()) {
      log.warn(`Skipping '${name}' - missing URL or API key`)
      summary.invalid.push({ name, reason: 'missing URL or API key' })
      return
    }

    try {
      const project = store.create({
        name,
        endpointUrl: entry.url,
        credential: entry.key,
        checkMethod: entry.method ?? 'rpc',
        tableName: entry.method === 'table' ? entry.table : null
      })
      summary.created.push({ name, id: project.id })
    } catch (err) {
      if (err instanceof DuplicateNameError) {
        log.warn(`Skipping '${name}' - already exists`)
        summary.skipped.push({ name, reason: 'already exists' })
      } else if (err instanceof ValidationError) {
        log.warn(`Skipping '${name}' - ${err.message}`)
        summary.invalid.push({ name, reason: err.message })
      } else {
        log.error(`Error importing '${name}': ${errorMessage(err)}`)
        summary.errors.push({ name, reason: errorMessage(err) })
      }
    }
  })

  log.info(
    `Import finished: ${summary.created.length} created, ${summary.skipped.length} skipped, ` +
      `${summary.invalid.length} invalid, ${summary.errors.length} errors`
  )
  return summary
}

/** 读取并校验旧版 JSON 文件 */
export function readLegacyFile(filePath: string): LegacyProject[] {
  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'))
  } catch (err) {
    throw new ValidationError([{ field: filePath, message: `cannot read legacy file: ${errorMessage(err)}` }])
  }
  if (!Value.Check(LegacyFileSchema, raw)) {
    throw new ValidationError(collectIssues(LegacyFileSchema, raw))
  }
  return raw
}
