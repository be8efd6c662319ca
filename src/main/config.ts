import { join } from 'node:path'
import { ValidationError } from './errors'
import { SUPPORTED_LANGUAGES, resolveLocale, type SupportedLanguage } from './i18n'

// ---------- 配置元数据注册表 ----------

export interface SettingMeta {
  /** 对应的环境变量 */
  env: string
  /** 对应的 CLI 参数（无则为 undefined） */
  flag?: string
  desc: string
}

/**
 * 所有已知配置项的元数据注册表
 * 新增配置时在此追加一行，--help 输出自动同步
 */
export const KNOWN_SETTINGS = {
  dbPath: { env: 'KEEPALIVE_DB_PATH', flag: '--db', desc: 'SQLite database file' },
  timeoutMs: { env: 'KEEPALIVE_TIMEOUT_MS', flag: '--timeout', desc: 'Per-project check budget in milliseconds' },
  busyTimeoutMs: { env: 'KEEPALIVE_BUSY_TIMEOUT_MS', desc: 'How long to wait on a locked database before giving up' },
  logDir: { env: 'KEEPALIVE_LOG_DIR', desc: 'Directory for keepalive.log' },
  language: { env: 'KEEPALIVE_LANG', flag: '--lang', desc: SUPPORTED_LANGUAGES.join(' | ') }
} satisfies Record<string, SettingMeta>

export type SettingKey = keyof typeof KNOWN_SETTINGS

export interface AppConfig {
  dbPath: string
  timeoutMs: number
  busyTimeoutMs: number
  logDir: string
  language: SupportedLanguage
}

export const DEFAULT_DATA_DIR = 'data'

export const DEFAULT_CONFIG: AppConfig = {
  dbPath: join(DEFAULT_DATA_DIR, 'keepalive.db'),
  timeoutMs: 12_000,
  busyTimeoutMs: 2_000,
  logDir: join(DEFAULT_DATA_DIR, 'logs'),
  language: 'en'
}

/** 所有已知配置描述列表（供 --help 使用） */
export function getSettingDescriptions(): string[] {
  return Object.values(KNOWN_SETTINGS).map((s: SettingMeta) =>
    `  ${s.flag ? `${s.flag}, ` : ''}${s.env}  ${s.desc}`
  )
}

function parsePositiveInt(field: SettingKey, raw: string): number {
  const value = Number(raw)
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError([{ field, message: `expected a positive integer, got "${raw}"` }])
  }
  return value
}

/**
 * 解析配置：CLI 参数 > 环境变量 > 默认值
 * @param overrides CLI 参数中解析出的原始字符串
 */
export function loadConfig(
  overrides: Partial<Record<SettingKey, string>> = {},
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  const pick = (key: SettingKey): string | undefined => {
    const value = overrides[key] ?? env[KNOWN_SETTINGS[key].env]
    return value !== undefined && value.trim() !== '' ? value.trim() : undefined
  }

  const timeout = pick('timeoutMs')
  const busy = pick('busyTimeoutMs')
  const lang = pick('language') ?? env.LANG

  return {
    dbPath: pick('dbPath') ?? DEFAULT_CONFIG.dbPath,
    timeoutMs: timeout ? parsePositiveInt('timeoutMs', timeout) : DEFAULT_CONFIG.timeoutMs,
    busyTimeoutMs: busy ? parsePositiveInt('busyTimeoutMs', busy) : DEFAULT_CONFIG.busyTimeoutMs,
    logDir: pick('logDir') ?? DEFAULT_CONFIG.logDir,
    language: lang ? resolveLocale(lang) : DEFAULT_CONFIG.language
  }
}
