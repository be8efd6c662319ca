import type { CheckConfig, CheckStep } from '../types'

/** rpc 方式调用的远端函数名 */
export const KEEPALIVE_FUNCTION = 'keepalive'

/** table 方式读取的列 */
export const TABLE_PROBE_COLUMN = 'id'

/** 兜底步骤：只证明地址可达且 key 被接受 */
export const FALLBACK_STEP: CheckStep = {
  method: 'fallback',
  description: 'connectivity check',
  request: { kind: 'health' },
  fallback: true
}

/** 主探测步骤（由项目配置决定） */
function primaryStep(config: CheckConfig): CheckStep {
  switch (config.checkMethod) {
    case 'rpc':
      return {
        method: 'rpc',
        description: `RPC ${KEEPALIVE_FUNCTION}()`,
        request: { kind: 'rpc', functionName: KEEPALIVE_FUNCTION },
        fallback: false
      }
    case 'table':
      return {
        method: 'table',
        description: `table query on '${config.tableName}'`,
        request: { kind: 'table', table: config.tableName, column: TABLE_PROBE_COLUMN },
        fallback: false
      }
  }
}

/**
 * 生成检查计划：主探测 + 兜底连通性探测
 * 纯函数，不做任何 I/O
 */
export function resolveCheckPlan(config: CheckConfig): CheckStep[] {
  return [primaryStep(config), FALLBACK_STEP]
}
