/** 探测方式（对应 projects.checkMethod 列） */
export type CheckMethod = 'rpc' | 'table'

/** 最近一次探测状态（对应 projects.lastStatus 列） */
export type ProjectStatus = 'success' | 'failed' | 'unknown'

/** 项目行数据结构（对应 DB 表 projects） */
export interface ProjectRow {
  id: number
  /** 唯一名称（区分大小写） */
  name: string
  /** 项目根 URL，如 https://xxxx.supabase.co */
  endpointUrl: string
  /** anon / service_role key，仅在展示层脱敏 */
  credential: string
  checkMethod: CheckMethod
  /** checkMethod = 'table' 时必填，否则为 NULL */
  tableName: string | null
  enabled: number        // 0=禁用, 1=启用
  lastStatus: ProjectStatus | null
  /** 成功标记或失败原因 */
  lastStatusDetail: string | null
  lastCheckedAt: number | null
  createdAt: number
  updatedAt: number
}
