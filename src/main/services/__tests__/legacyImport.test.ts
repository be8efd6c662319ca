/**
 * 旧版项目导入测试
 * 使用临时文件 + 内存 SQLite
 */

import { describe, it, expect, beforeEach, afterEach, afterAll } from 'vitest'
import { mkdirSync, writeFileSync, rmSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { DatabaseManager, MEMORY_DB } from '../../dao/database'
import { ProjectStore } from '../projectStore'
import { importLegacyProjects, readLegacyFile } from '../legacyImport'
import { ValidationError } from '../../errors'

const TEST_DIR = join(tmpdir(), 'keepalive-import-test-' + Date.now())

let manager: DatabaseManager
let store: ProjectStore

beforeEach(() => {
  mkdirSync(TEST_DIR, { recursive: true })
  manager = new DatabaseManager(MEMORY_DB)
  store = new ProjectStore(manager)
})

afterEach(() => {
  manager.close()
})

afterAll(() => {
  rmSync(TEST_DIR, { recursive: true, force: true })
})

describe('importLegacyProjects', () => {
  it('新建、重名跳过、缺字段分别统计', () => {
    store.create({ name: 'existing', endpointUrl: 'https://old.co', credential: 'test-secret' })

    const summary = importLegacyProjects(store, [
      { name: 'first', url: 'https://first.co', key: 'test-secret' },
      { name: 'existing', url: 'https://new.co', key: 'test-secret' },
      { name: 'no-key', url: 'https://nokey.co' },
      { url: 'https://unnamed.co', key: 'test-secret' }
    ])

    expect(summary.created).toEqual([
      { name: 'first', id: 2 },
      { name: 'project-4', id: 3 }
    ])
    expect(summary.skipped).toEqual([{ name: 'existing', reason: 'already exists' }])
    expect(summary.invalid).toEqual([{ name: 'no-key', reason: 'missing URL or API key' }])
    expect(summary.errors).toEqual([])
    // 重名项目未被覆盖
    expect(store.findByName('existing')?.endpointUrl).toBe('https://old.co')
    expect(store.count()).toBe(3)
  })

  it('导入的项目默认 rpc 且启用', () => {
    importLegacyProjects(store, [{ name: 'a', url: 'https://a.co', key: 'test-secret' }])
    const project = store.get(1)
    expect(project.checkMethod).toBe('rpc')
    expect(project.enabled).toBe(true)
  })

  it('table 方式缺表名时记为 invalid', () => {
    const summary = importLegacyProjects(store, [
      { name: 't', url: 'https://t.co', key: 'test-secret', method: 'table' }
    ])
    expect(summary.invalid).toEqual([
      { name: 't', reason: 'tableName: required when checkMethod is "table"' }
    ])
    expect(store.count()).toBe(0)
  })
})

describe('readLegacyFile', () => {
  it('读取合法文件', () => {
    const file = join(TEST_DIR, 'projects.json')
    writeFileSync(file, JSON.stringify([{ name: 'a', url: 'https://a.co', key: 'test-secret', method: 'table', table: 'users' }]))
    expect(readLegacyFile(file)).toEqual([
      { name: 'a', url: 'https://a.co', key: 'test-secret', method: 'table', table: 'users' }
    ])
  })

  it('结构不对时抛 ValidationError', () => {
    const file = join(TEST_DIR, 'bad-shape.json')
    writeFileSync(file, JSON.stringify({ projects: [] }))
    expect(() => readLegacyFile(file)).toThrow(ValidationError)
  })

  it('不是 JSON 时抛 ValidationError', () => {
    const file = join(TEST_DIR, 'broken.json')
    writeFileSync(file, 'PROJECTS = [')
    expect(() => readLegacyFile(file)).toThrow(ValidationError)
  })
})
