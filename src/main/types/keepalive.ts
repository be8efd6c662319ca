import type { CheckConfig, CheckMethod } from './project'

/** 实际生效的探测方式（fallback 为兜底连通性探测） */
export type MethodUsed = CheckMethod | 'fallback'

/** 发往远端的一次探测请求 */
export type ProbeRequest =
  | { kind: 'rpc'; functionName: string }
  | { kind: 'table'; table: string; column: string }
  | { kind: 'health' }

/** 探测目标：地址 + 凭据 */
export interface ProbeTarget {
  endpointUrl: string
  credential: string
}

/** 探测结果：远端失败不抛异常，统一用 ok 区分 */
export type ProbeResult = { ok: true; payload: unknown } | { ok: false; error: string }

/** 检查计划中的一步 */
export interface CheckStep {
  method: MethodUsed
  /** 日志和结果 detail 中使用的描述 */
  description: string
  request: ProbeRequest
  /** 兜底步骤：成功也只算降级成功 */
  fallback: boolean
}

/** 单个项目一次检查的结果 */
export interface CheckOutcome {
  projectId: number
  projectName: string
  methodUsed: MethodUsed
  succeeded: boolean
  /** 由兜底步骤成功时为 true */
  degraded: boolean
  detail: string
  durationMs: number
  checkedAt: number
}

/** 一轮运行的汇总 */
export interface RunReport {
  runId: string
  startedAt: number
  finishedAt: number
  durationMs: number
  /** 按项目 ID 升序 */
  outcomes: CheckOutcome[]
  succeededCount: number
  failedCount: number
}

/** 引擎参数 */
export interface RunOptions {
  /** 默认 true：只检查已启用项目 */
  enabledOnly?: boolean
}

export type { CheckConfig }
