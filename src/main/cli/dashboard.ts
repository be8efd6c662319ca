import stringWidth from 'string-width'
import { t } from '../i18n'
import { FALLBACK_DETAIL_PREFIX } from '../services/keepaliveEngine'
import type { ImportSummary } from '../services/legacyImport'
import type { Project, RunReport } from '../types'

/** 失败信息在表格中的最大显示长度 */
const MAX_STATUS_LENGTH = 40

const MINUTE = 60 * 1000
const HOUR = 60 * MINUTE
const DAY = 24 * HOUR

/** API key 脱敏：只显示首尾各 4 个字符 */
export function maskCredential(credential: string): string {
  if (credential.length <= 8) return '***'
  return `${credential.slice(0, 4)}...${credential.slice(-4)}`
}

/** 超长文本截断，保留 max 个字符（含省略号） */
export function truncate(text: string, max = MAX_STATUS_LENGTH): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text
}

/** 相对时间：just now / 5m ago / 3h ago / 2 days ago */
export function formatRelativeTime(timestamp: number, now: number): string {
  const delta = Math.max(0, now - timestamp)
  if (delta >= DAY) return t('time.daysAgo', { count: Math.floor(delta / DAY) })
  if (delta >= HOUR) return t('time.hoursAgo', { count: Math.floor(delta / HOUR) })
  if (delta >= MINUTE) return t('time.minutesAgo', { count: Math.floor(delta / MINUTE) })
  return t('time.justNow')
}

/** 方式列：RPC / Table:users */
function formatMethod(project: Project): string {
  return project.checkMethod === 'table'
    ? t('dashboard.methodTable', { table: project.tableName })
    : t('dashboard.methodRpc')
}

/** 状态列 */
export function formatStatus(project: Project): string {
  switch (project.lastStatus) {
    case null:
      return t('dashboard.neverRun')
    case 'success':
      return project.lastStatusDetail?.startsWith(FALLBACK_DETAIL_PREFIX)
        ? t('dashboard.fallback')
        : t('dashboard.success')
    case 'unknown':
      return t('dashboard.unknown')
    case 'failed':
      return truncate(t('dashboard.failed', { detail: project.lastStatusDetail ?? '' }))
  }
}

/** 按终端显示宽度补齐（中文字符占两列） */
function pad(cell: string, width: number, alignRight: boolean): string {
  const gap = ' '.repeat(Math.max(0, width - stringWidth(cell)))
  return alignRight ? `${gap}${cell}` : `${cell}${gap}`
}

/**
 * 渲染对齐的文本表格
 * @param rightAligned 右对齐的列下标
 */
function renderTable(headers: string[], rows: string[][], rightAligned: number[] = []): string[] {
  const widths = headers.map((h, i) => Math.max(stringWidth(h), ...rows.map((r) => stringWidth(r[i]))))
  const line = (cells: string[]): string =>
    cells
      .map((cell, i) => pad(cell, widths[i], rightAligned.includes(i)))
      .join('  ')
      .trimEnd()
  return [line(headers), widths.map((w) => '-'.repeat(w)).join('  '), ...rows.map(line)]
}

/** 项目总览表格 */
export function renderProjectTable(
  projects: Project[],
  options: { enabledOnly?: boolean; now: number }
): string[] {
  if (projects.length === 0) return [t('dashboard.empty')]

  const headers = [
    t('dashboard.colId'),
    t('dashboard.colName'),
    t('dashboard.colEnabled'),
    t('dashboard.colMethod'),
    t('dashboard.colStatus'),
    t('dashboard.colChecked')
  ]
  const rows = projects.map((p) => [
    String(p.id),
    p.name,
    p.enabled ? t('dashboard.yes') : t('dashboard.no'),
    formatMethod(p),
    formatStatus(p),
    p.lastCheckedAt === null ? t('dashboard.never') : formatRelativeTime(p.lastCheckedAt, options.now)
  ])

  const total = projects.length
  const enabled = projects.filter((p) => p.enabled).length
  const summary = options.enabledOnly
    ? t('dashboard.summaryEnabled', { total, enabled })
    : t('dashboard.summaryAll', { total, enabled, disabled: total - enabled })

  return [t('dashboard.title'), '', ...renderTable(headers, rows, [0]), '', summary]
}

function iso(timestamp: number): string {
  return new Date(timestamp).toISOString()
}

/** 单个项目详情（API key 脱敏） */
export function renderProjectDetails(project: Project): string[] {
  const fields: Array<[string, string]> = [
    [t('details.id'), String(project.id)],
    [t('details.name'), project.name],
    [t('details.url'), project.endpointUrl],
    [t('details.credential'), maskCredential(project.credential)],
    [t('details.method'), project.checkMethod]
  ]
  if (project.tableName !== null) fields.push([t('details.table'), project.tableName])
  fields.push([t('details.enabled'), project.enabled ? t('details.yes') : t('details.no')])
  if (project.lastStatus !== null) {
    const detail = project.lastStatusDetail ? `: ${project.lastStatusDetail}` : ''
    fields.push([t('details.lastStatus'), `${project.lastStatus}${detail}`])
  }
  if (project.lastCheckedAt !== null) fields.push([t('details.lastChecked'), iso(project.lastCheckedAt)])
  fields.push([t('details.createdAt'), iso(project.createdAt)])
  fields.push([t('details.updatedAt'), iso(project.updatedAt)])

  return [
    t('details.title', { name: project.name }),
    '',
    ...fields.map(([label, value]) => `  ${label.padEnd(20)}${value}`)
  ]
}

/** 一轮运行的逐项结果 + 汇总 */
export function renderRunReport(report: RunReport): string[] {
  if (report.outcomes.length === 0) return [t('run.empty')]

  const lines = report.outcomes.map((o) => {
    const mark = o.succeeded ? (o.degraded ? '⚠' : '✓') : '✗'
    return `${mark} ${o.projectName}: ${o.detail} (${o.durationMs}ms)`
  })
  const total = report.outcomes.length
  return [
    ...lines,
    '',
    t('run.summary', { succeeded: report.succeededCount, failed: report.failedCount, total }),
    t('run.finished', { ms: report.durationMs })
  ]
}

/** 导入结果 */
export function renderImportSummary(summary: ImportSummary): string[] {
  return [
    ...summary.created.map((e) => t('import.created', { name: e.name, id: e.id })),
    ...summary.skipped.map((e) => t('import.skipped', { name: e.name })),
    ...summary.invalid.map((e) => t('import.invalid', { name: e.name, reason: e.reason })),
    ...summary.errors.map((e) => t('import.error', { name: e.name, reason: e.reason })),
    '',
    t('import.summary', {
      created: summary.created.length,
      skipped: summary.skipped.length,
      invalid: summary.invalid.length,
      errors: summary.errors.length
    })
  ]
}
