export * from './project'
export * from './keepalive'
