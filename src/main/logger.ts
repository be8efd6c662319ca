import log from 'electron-log'
import { join } from 'node:path'
import { getRunContext } from './context/RunContext'

// 日志文件轮转：单文件 5MB
log.transports.file.maxSize = 5 * 1024 * 1024

// 日志格式
log.transports.file.format = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}]{scope} {text}'
log.transports.console.format = '[{h}:{i}:{s}] [{level}]{scope} {text}'

// 生产环境控制台只输出 warn 及以上
if (process.env.NODE_ENV === 'production') {
  log.transports.console.level = 'warn'
}

// 测试时不落盘
if (process.env.VITEST) {
  log.transports.file.level = false
}

// 自动注入 RunContext 前缀（runId:command）
log.hooks.push((message) => {
  const ctx = getRunContext()
  if (ctx && message.data?.length > 0 && typeof message.data[0] === 'string') {
    const rid = ctx.runId.slice(0, 8)
    message.data[0] = `[${rid}:${ctx.command}] ${message.data[0]}`
  }
  return message
})

/** 日志文件写入指定目录下的 keepalive.log */
export function setLogDirectory(dir: string): void {
  log.transports.file.resolvePathFn = () => join(dir, 'keepalive.log')
}

/** 静默模式：控制台只输出 warn 及以上 */
export function setQuiet(quiet: boolean): void {
  log.transports.console.level = quiet ? 'warn' : 'info'
}

/** 创建带模块标签的 logger（使用 electron-log scope） */
export function createLogger(tag: string): ReturnType<typeof log.scope> {
  return log.scope(tag)
}

export default log
