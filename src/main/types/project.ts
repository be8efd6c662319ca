import type { CheckMethod, ProjectStatus } from '../dao/types'

export type { CheckMethod, ProjectStatus }

/** 探测配置：table 方式必须带表名，rpc 方式表名恒为 null */
export type CheckConfig =
  | { checkMethod: 'rpc'; tableName: null }
  | { checkMethod: 'table'; tableName: string }

/** 项目数据结构（DAO 行映射后的领域对象） */
export type Project = CheckConfig & {
  id: number
  name: string
  endpointUrl: string
  credential: string
  enabled: boolean
  /** 未探测过时为 null */
  lastStatus: ProjectStatus | null
  lastStatusDetail: string | null
  lastCheckedAt: number | null
  createdAt: number
  updatedAt: number
}

/** 创建项目参数 */
export interface ProjectCreateParams {
  name: string
  endpointUrl: string
  credential: string
  checkMethod?: CheckMethod
  tableName?: string | null
  enabled?: boolean
}

/** 更新项目参数（仅连接相关字段） */
export interface ProjectUpdateParams {
  name?: string
  endpointUrl?: string
  credential?: string
  checkMethod?: CheckMethod
  tableName?: string | null
}
