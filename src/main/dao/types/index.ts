/**
 * DAO 层类型统一出口
 * 仅包含与数据库表直接对应的行类型和列值枚举
 */
export * from './project'
