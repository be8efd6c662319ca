import type { EndpointClient } from './endpointClient'
import type { ProjectStore } from './projectStore'
import { resolveCheckPlan } from './checkPlan'
import { buildRunReport, formatRunSummary } from './runReport'
import { withRunContext } from '../context/RunContext'
import { CheckFailure, NotFoundError, RunFatalError, errorMessage } from '../errors'
import type {
  CheckOutcome,
  CheckStep,
  MethodUsed,
  ProbeResult,
  ProbeTarget,
  Project,
  RunOptions,
  RunReport
} from '../types'
import { createLogger } from '../logger'

const log = createLogger('Keepalive')

/** 单个项目整套计划的默认时间预算 */
export const DEFAULT_TIMEOUT_MS = 12_000

/** 兜底成功时 detail 的前缀，dashboard 据此区分降级成功 */
export const FALLBACK_DETAIL_PREFIX = 'fallback used'

export interface KeepaliveEngineOptions {
  timeoutMs?: number
  /** 时钟（测试注入） */
  now?: () => number
}

/** 等待 signal 中止，返回以中止原因为错误的失败结果 */
function whenAborted(signal: AbortSignal): { promise: Promise<ProbeResult>; dispose: () => void } {
  let onAbort: () => void = () => {}
  const promise = new Promise<ProbeResult>((resolve) => {
    onAbort = () => resolve({ ok: false, error: errorMessage(signal.reason) })
    if (signal.aborted) onAbort()
    else signal.addEventListener('abort', onAbort, { once: true })
  })
  return { promise, dispose: () => signal.removeEventListener('abort', onAbort) }
}

/**
 * Keepalive 引擎 — 顺序遍历项目，按检查计划逐步探测并写回结果
 * 单个项目失败只影响该项目；Store 不可用时整轮中止
 */
export class KeepaliveEngine {
  private readonly timeoutMs: number
  private readonly now: () => number

  constructor(
    private readonly store: ProjectStore,
    private readonly client: EndpointClient,
    options: KeepaliveEngineOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.now = options.now ?? Date.now
  }

  /** 执行一轮 keepalive */
  async run(options: RunOptions = {}): Promise<RunReport> {
    const enabledOnly = options.enabledOnly ?? true

    return withRunContext('run', async (ctx) => {
      const startedAt = this.now()
      log.info('Keepalive run starting')

      let projects: Project[]
      try {
        projects = this.store.list(enabledOnly)
      } catch (err) {
        throw new RunFatalError(`cannot load projects: ${errorMessage(err)}`, { cause: err })
      }

      if (projects.length === 0) {
        log.warn(enabledOnly ? 'No enabled projects found' : 'No projects found')
      }

      const outcomes: CheckOutcome[] = []
      // 逐个执行，不并发
      for (const project of projects) {
        log.info(`Processing: ${project.name}`)
        outcomes.push(await this.checkProject(project))
      }

      const report = buildRunReport(ctx.runId, outcomes, startedAt, this.now())
      log.info(formatRunSummary(report))
      return report
    })
  }

  /** 检查单个项目并写回结果（每个项目恰好写一次） */
  async checkProject(project: Project): Promise<CheckOutcome> {
    const outcome = await this.executePlan(project)
    this.record(outcome)
    return outcome
  }

  /** 写回结果；项目在运行中被删除时跳过，其他 Store 错误中止整轮 */
  private record(outcome: CheckOutcome): void {
    try {
      this.store.recordCheckResult(outcome.projectId, outcome)
    } catch (err) {
      if (err instanceof NotFoundError) {
        log.warn(`${outcome.projectName}: removed during the run, result not recorded`)
        return
      }
      throw new RunFatalError(`cannot record result for ${outcome.projectName}: ${errorMessage(err)}`, {
        cause: err
      })
    }
  }

  /** 按计划顺序尝试，首个成功即停止；整套计划受 timeoutMs 约束 */
  private async executePlan(project: Project): Promise<CheckOutcome> {
    const plan = resolveCheckPlan(project)
    const target: ProbeTarget = { endpointUrl: project.endpointUrl, credential: project.credential }
    const checkedAt = this.now()
    const controller = new AbortController()
    const timer = setTimeout(
      () => controller.abort(new CheckFailure(`timed out after ${this.timeoutMs}ms`)),
      this.timeoutMs
    )

    const finish = (methodUsed: MethodUsed, succeeded: boolean, degraded: boolean, detail: string): CheckOutcome => ({
      projectId: project.id,
      projectName: project.name,
      methodUsed,
      succeeded,
      degraded,
      detail,
      durationMs: Math.max(0, this.now() - checkedAt),
      checkedAt
    })

    let primaryFailure: string | undefined
    let lastFailure = 'no check steps'
    let lastMethod: MethodUsed = project.checkMethod

    try {
      for (const step of plan) {
        const result = await this.attempt(step, target, controller.signal)
        if (result.ok) {
          if (step.fallback) {
            log.info(`${project.name}: SUCCESS (fallback)`)
            const reason = primaryFailure ? ` after ${primaryFailure}` : ''
            return finish(step.method, true, true, `${FALLBACK_DETAIL_PREFIX}: ${step.description} succeeded${reason}`)
          }
          log.info(`${project.name}: SUCCESS (${step.method})`)
          return finish(step.method, true, false, `${step.description} succeeded`)
        }

        lastFailure = `${step.description} failed: ${result.error}`
        lastMethod = step.method
        primaryFailure ??= lastFailure
        log.warn(`${project.name}: ${lastFailure}`)
      }
    } finally {
      clearTimeout(timer)
    }

    log.error(`${project.name}: FAILED (all methods) - ${lastFailure}`)
    return finish(lastMethod, false, false, lastFailure)
  }

  /** 执行单步探测；客户端抛出的异常也折叠为失败结果 */
  private async attempt(step: CheckStep, target: ProbeTarget, signal: AbortSignal): Promise<ProbeResult> {
    const aborted = whenAborted(signal)
    try {
      return await Promise.race([this.client.invoke(step.request, target, signal), aborted.promise])
    } catch (err) {
      return { ok: false, error: errorMessage(err) }
    } finally {
      aborted.dispose()
    }
  }
}
