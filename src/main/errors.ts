/**
 * 错误分类
 * Store 层错误直接抛给调用方；CheckFailure 只在引擎内部流转，最终折叠为 failed 结果
 */

export abstract class KeepaliveError extends Error {
  /** 稳定的错误码，CLI 用它选择 i18n 文案 */
  abstract readonly code: string

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export interface ValidationIssue {
  field: string
  message: string
}

/** 创建/更新参数不合法（不会落库） */
export class ValidationError extends KeepaliveError {
  readonly code = 'validation'

  constructor(readonly issues: ValidationIssue[]) {
    super(issues.map((i) => `${i.field}: ${i.message}`).join('; '))
  }
}

/** 项目名称已存在 */
export class DuplicateNameError extends KeepaliveError {
  readonly code = 'duplicateName'

  constructor(readonly projectName: string, options?: { cause?: unknown }) {
    super(`Project name "${projectName}" already exists`, options)
  }
}

/** 引用的项目 ID 不存在 */
export class NotFoundError extends KeepaliveError {
  readonly code = 'notFound'

  constructor(readonly projectId: number) {
    super(`Project ${projectId} not found`)
  }
}

/** SQLite 被其他进程锁定 */
export class StoreBusyError extends KeepaliveError {
  readonly code = 'storeBusy'

  constructor(options?: { cause?: unknown }) {
    super('Project store is busy (another run may be in progress)', options)
  }
}

/** 单次探测失败 */
export class CheckFailure extends KeepaliveError {
  readonly code = 'checkFailure'
}

/** Store 不可用，整轮运行中止 */
export class RunFatalError extends KeepaliveError {
  readonly code = 'runFatal'

  constructor(message: string, options?: { cause?: unknown }) {
    super(`Keepalive run aborted: ${message}`, options)
  }
}

/** 提取错误消息（非 Error 值也能安全转换） */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
