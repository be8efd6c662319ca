import { existsSync } from 'node:fs'
import { t } from '../i18n'
import {
  DuplicateNameError,
  KeepaliveError,
  NotFoundError,
  ValidationError
} from '../errors'
import type { KeepaliveEngine } from '../services/keepaliveEngine'
import type { ProjectStore } from '../services/projectStore'
import { importLegacyProjects, readLegacyFile } from '../services/legacyImport'
import { buildRunReport } from '../services/runReport'
import { getRunContext } from '../context/RunContext'
import type { CheckMethod } from '../types'
import type { Prompter } from './prompt'
import {
  renderImportSummary,
  renderProjectDetails,
  renderProjectTable,
  renderRunReport
} from './dashboard'

/** 旧版配置文件默认路径 */
export const DEFAULT_LEGACY_FILE = 'projects.json'

/** 命令行选项（parseArgs 结果） */
export interface CommandOptions {
  enabled?: boolean
  force?: boolean
  name?: string
  url?: string
  key?: string
  method?: string
  table?: string
  disabled?: boolean
}

export interface CommandContext {
  store: ProjectStore
  engine: KeepaliveEngine
  prompter: Prompter
  /** 输出一行 */
  out: (line: string) => void
  now: () => number
  version: string
}

/** 命令处理器，返回进程退出码 */
export type CommandHandler = (
  ctx: CommandContext,
  args: string[],
  options: CommandOptions
) => Promise<number>

function isCheckMethod(value: string | undefined): value is CheckMethod {
  return value === 'rpc' || value === 'table'
}

/** 解析位置参数中的项目 ID */
export function parseId(value: string | undefined): number {
  const id = Number(value)
  if (value === undefined || !Number.isInteger(id) || id <= 0) {
    throw new ValidationError([{ field: 'id', message: t('cli.invalidId', { value: value ?? '' }) }])
  }
  return id
}

/** 错误 → 本地化的一行提示 */
export function describeError(err: KeepaliveError): string {
  if (err instanceof ValidationError) return t('errors.validation', { message: err.message })
  if (err instanceof DuplicateNameError) return t('errors.duplicateName', { name: err.projectName })
  if (err instanceof NotFoundError) return t('errors.notFound', { id: err.projectId })
  return t(`errors.${err.code}`, { message: err.message })
}

const print = (ctx: CommandContext, lines: string[]): void => lines.forEach((l) => ctx.out(l))

const dashboard: CommandHandler = async (ctx, _args, options) => {
  const enabledOnly = options.enabled ?? false
  print(ctx, renderProjectTable(ctx.store.list(enabledOnly), { enabledOnly, now: ctx.now() }))
  return 0
}

const run: CommandHandler = async (ctx) => {
  const report = await ctx.engine.run({ enabledOnly: true })
  print(ctx, renderRunReport(report))
  return report.failedCount > 0 ? 1 : 0
}

const check: CommandHandler = async (ctx, args) => {
  const project = ctx.store.get(parseId(args[0]))
  const outcome = await ctx.engine.checkProject(project)
  const runId = getRunContext()?.runId ?? ''
  print(ctx, renderRunReport(buildRunReport(runId, [outcome], outcome.checkedAt, outcome.checkedAt + outcome.durationMs)))
  return outcome.succeeded ? 0 : 1
}

/** 方式参数缺失或不合法时反复询问 */
async function askMethod(ctx: CommandContext, initial: string | undefined): Promise<CheckMethod> {
  let candidate = initial
  for (;;) {
    if (isCheckMethod(candidate)) return candidate
    candidate = (await ctx.prompter.ask(t('cli.promptMethod'), 'rpc')).toLowerCase()
  }
}

const add: CommandHandler = async (ctx, _args, options) => {
  const name = options.name ?? (await ctx.prompter.ask(t('cli.promptName'), 'my-project'))
  const url = options.url ?? (await ctx.prompter.ask(t('cli.promptUrl'), 'https://xxxxx.supabase.co'))
  const key = options.key ?? (await ctx.prompter.ask(t('cli.promptKey')))

  const method = await askMethod(ctx, options.method)
  let table = options.table
  if (method === 'table' && table === undefined) {
    table = await ctx.prompter.ask(t('cli.promptTable'), 'users')
  }

  if (!url.trim().startsWith('https://')) ctx.out(t('cli.httpsWarning'))

  const project = ctx.store.create({
    name,
    endpointUrl: url,
    credential: key,
    checkMethod: method,
    tableName: method === 'table' ? table : null,
    enabled: !options.disabled
  })
  ctx.out(t('cli.added', { id: project.id }))
  return 0
}

const update: CommandHandler = async (ctx, args, options) => {
  const id = parseId(args[0])
  const method = options.method
  if (method !== undefined && !isCheckMethod(method)) {
    throw new ValidationError([{ field: 'checkMethod', message: `expected rpc or table, got "${method}"` }])
  }
  const project = ctx.store.update(id, {
    name: options.name,
    endpointUrl: options.url,
    credential: options.key,
    checkMethod: method,
    tableName: options.table
  })
  ctx.out(t('cli.updated', { name: project.name }))
  return 0
}

const setEnabled = (enabled: boolean): CommandHandler => async (ctx, args) => {
  const project = ctx.store.setEnabled(parseId(args[0]), enabled)
  ctx.out(t(enabled ? 'cli.enabled' : 'cli.disabled', { name: project.name }))
  return 0
}

const remove: CommandHandler = async (ctx, args, options) => {
  const project = ctx.store.get(parseId(args[0]))
  if (!options.force) {
    const confirmed = await ctx.prompter.confirm(t('cli.confirmDelete', { name: project.name, id: project.id }))
    if (!confirmed) {
      ctx.out(t('cli.cancelled'))
      return 0
    }
  }
  ctx.store.delete(project.id)
  ctx.out(t('cli.deleted', { name: project.name }))
  return 0
}

const show: CommandHandler = async (ctx, args) => {
  print(ctx, renderProjectDetails(ctx.store.get(parseId(args[0]))))
  return 0
}

const importLegacy: CommandHandler = async (ctx, args) => {
  const file = args[0] ?? DEFAULT_LEGACY_FILE
  if (!existsSync(file)) {
    ctx.out(t('import.missingFile', { file }))
    return 0
  }
  ctx.out(t('import.title', { file }))
  const summary = importLegacyProjects(ctx.store, readLegacyFile(file))
  print(ctx, renderImportSummary(summary))
  return summary.errors.length > 0 ? 1 : 0
}

const version: CommandHandler = async (ctx) => {
  ctx.out(t('app.version', { version: ctx.version }))
  return 0
}

/** 命令注册表 */
export const COMMANDS: Record<string, CommandHandler> = {
  dashboard,
  list: dashboard,
  run,
  check,
  add,
  update,
  enable: setEnabled(true),
  disable: setEnabled(false),
  delete: remove,
  show,
  import: importLegacy,
  version
}

/** 执行命令；业务错误输出提示并返回 1，其余异常继续上抛 */
export async function runCommand(
  ctx: CommandContext,
  command: string,
  args: string[],
  options: CommandOptions
): Promise<number> {
  if (!Object.hasOwn(COMMANDS, command)) {
    ctx.out(t('cli.unknownCommand', { command }))
    return 2
  }
  try {
    return await COMMANDS[command](ctx, args, options)
  } catch (err) {
    if (err instanceof KeepaliveError) {
      ctx.out(describeError(err))
      return 1
    }
    throw err
  }
}
