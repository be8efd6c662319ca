import { AsyncLocalStorage } from 'node:async_hooks'
import { v4 as uuid } from 'uuid'

/** 运行上下文 — 每次 CLI 命令 / keepalive 运行一个实例 */
export interface RunContext {
  runId: string
  /** 触发本次运行的命令，如 run / check */
  command: string
  timestamp: number
}

/** 全局 AsyncLocalStorage 实例 */
export const runContext = new AsyncLocalStorage<RunContext>()

/** 读取当前上下文（run() 外返回 undefined） */
export function getRunContext(): RunContext | undefined {
  return runContext.getStore()
}

/** 工厂：新建运行上下文 */
export function createRunContext(command: string): RunContext {
  return { runId: uuid(), command, timestamp: Date.now() }
}

/** 在上下文中执行；已处于上下文中时复用外层 runId */
export function withRunContext<T>(command: string, fn: (ctx: RunContext) => T): T {
  const existing = getRunContext()
  if (existing) return fn(existing)
  const ctx = createRunContext(command)
  return runContext.run(ctx, () => fn(ctx))
}
