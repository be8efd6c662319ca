/**
 * CLI 命令测试
 * 内存 SQLite + 假客户端 + 固定答案的 Prompter
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach, afterAll } from 'vitest'
import { mkdirSync, rmSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { changeLanguage, initI18n } from '../../i18n'
import { DatabaseManager, MEMORY_DB } from '../../dao/database'
import { ProjectStore } from '../../services/projectStore'
import { KeepaliveEngine } from '../../services/keepaliveEngine'
import type { EndpointClient } from '../../services/endpointClient'
import { parseId, runCommand, type CommandContext, type CommandOptions } from '../commands'
import type { Prompter } from '../prompt'
import { ValidationError } from '../../errors'
import type { ProbeResult } from '../../types'

const T0 = Date.UTC(2026, 0, 1, 12, 0, 0)
const TEST_DIR = join(tmpdir(), 'keepalive-cli-test-' + Date.now())

/** 按顺序返回预设答案；答案为空时取默认值 */
class ScriptedPrompter implements Prompter {
  readonly questions: string[] = []

  constructor(
    private readonly answers: string[] = [],
    private readonly confirmAnswer = false
  ) {}

  async ask(question: string, defaultValue?: string): Promise<string> {
    this.questions.push(question)
    const answer = this.answers.shift()
    return answer || defaultValue || ''
  }

  async confirm(question: string): Promise<boolean> {
    this.questions.push(question)
    return this.confirmAnswer
  }

  close(): void {}
}

class StaticClient implements EndpointClient {
  constructor(private readonly result: ProbeResult) {}

  async invoke(): Promise<ProbeResult> {
    return this.result
  }
}

let manager: DatabaseManager
let store: ProjectStore
let output: string[]

function makeContext(prompter: Prompter = new ScriptedPrompter(), result: ProbeResult = { ok: true, payload: null }): CommandContext {
  return {
    store,
    engine: new KeepaliveEngine(store, new StaticClient(result), { now: () => T0 }),
    prompter,
    out: (line) => output.push(line),
    now: () => T0,
    version: '2.0.0'
  }
}

function exec(command: string, args: string[] = [], options: CommandOptions = {}, ctx = makeContext()): Promise<number> {
  return runCommand(ctx, command, args, options)
}

beforeAll(async () => {
  initI18n('en')
  await changeLanguage('en')
  mkdirSync(TEST_DIR, { recursive: true })
})

afterAll(() => {
  rmSync(TEST_DIR, { recursive: true, force: true })
})

beforeEach(() => {
  output = []
  manager = new DatabaseManager(MEMORY_DB)
  store = new ProjectStore(manager, { now: () => T0 })
})

afterEach(() => {
  manager.close()
})

describe('parseId', () => {
  it('接受正整数', () => {
    expect(parseId('7')).toBe(7)
  })

  it('拒绝非法值', () => {
    expect(() => parseId('abc')).toThrow(ValidationError)
    expect(() => parseId('0')).toThrow(ValidationError)
    expect(() => parseId('1.5')).toThrow(ValidationError)
    expect(() => parseId(undefined)).toThrow(ValidationError)
  })
})

describe('runCommand', () => {
  it('未知命令返回 2', async () => {
    expect(await exec('nope')).toBe(2)
    expect(output).toEqual(['Unknown command: nope'])
  })

  it('原型链上的名字不算命令', async () => {
    expect(await exec('toString')).toBe(2)
  })

  it('业务错误输出提示并返回 1', async () => {
    expect(await exec('show', ['9'])).toBe(1)
    expect(output).toEqual(['Project 9 not found.'])
  })

  it('非法 ID', async () => {
    expect(await exec('enable', ['abc'])).toBe(1)
    expect(output).toEqual(['Invalid input: id: Invalid project ID: abc'])
  })

  it('version', async () => {
    expect(await exec('version')).toBe(0)
    expect(output).toEqual(['Supabase Keepalive v2.0.0'])
  })
})

describe('add', () => {
  it('参数齐全时不提问', async () => {
    const prompter = new ScriptedPrompter()
    const code = await exec(
      'add',
      [],
      { name: 'a', url: 'https://a.supabase.co', key: 'test-secret', method: 'rpc' },
      makeContext(prompter)
    )

    expect(code).toBe(0)
    expect(prompter.questions).toEqual([])
    expect(output).toEqual(['✓ Project added successfully (ID: 1)'])
    expect(store.get(1).checkMethod).toBe('rpc')
  })

  it('交互式添加：方式输错时重新询问，表名取默认值', async () => {
    const prompter = new ScriptedPrompter(['demo', 'http://demo.co', 'test-secret', 'bogus', 'TABLE', ''])
    const code = await exec('add', [], {}, makeContext(prompter))

    expect(code).toBe(0)
    expect(prompter.questions).toEqual([
      'Project name',
      'Supabase URL',
      'API key (anon or service_role)',
      'Keepalive method (rpc/table)',
      'Keepalive method (rpc/table)',
      'Table name'
    ])
    expect(output).toEqual(['Warning: URL should start with https://', '✓ Project added successfully (ID: 1)'])
    const project = store.get(1)
    expect(project.name).toBe('demo')
    expect(project.checkMethod).toBe('table')
    expect(project.tableName).toBe('users')
  })

  it('--disabled 创建禁用项目', async () => {
    await exec('add', [], { name: 'a', url: 'https://a.co', key: 'test-secret', method: 'rpc', disabled: true })
    expect(store.get(1).enabled).toBe(false)
  })

  it('重名时返回 1', async () => {
    store.create({ name: 'a', endpointUrl: 'https://a.co', credential: 'test-secret' })
    const code = await exec('add', [], { name: 'a', url: 'https://b.co', key: 'test-secret', method: 'rpc' })
    expect(code).toBe(1)
    expect(output).toEqual(["A project named 'a' already exists."])
  })
})

describe('update / enable / disable', () => {
  beforeEach(() => {
    store.create({ name: 'a', endpointUrl: 'https://a.co', credential: 'test-secret' })
  })

  it('更新字段', async () => {
    expect(await exec('update', ['1'], { method: 'table', table: 'profiles' })).toBe(0)
    expect(output).toEqual(["✓ Project 'a' updated"])
    expect(store.get(1).tableName).toBe('profiles')
  })

  it('非法方式', async () => {
    expect(await exec('update', ['1'], { method: 'graphql' })).toBe(1)
    expect(output).toEqual(['Invalid input: checkMethod: expected rpc or table, got "graphql"'])
  })

  it('禁用后再启用', async () => {
    await exec('disable', ['1'])
    expect(store.get(1).enabled).toBe(false)
    await exec('enable', ['1'])
    expect(store.get(1).enabled).toBe(true)
    expect(output).toEqual(["✓ Project 'a' disabled", "✓ Project 'a' enabled"])
  })
})

describe('delete', () => {
  beforeEach(() => {
    store.create({ name: 'a', endpointUrl: 'https://a.co', credential: 'test-secret' })
  })

  it('确认取消时不删除', async () => {
    const prompter = new ScriptedPrompter([], false)
    expect(await exec('delete', ['1'], {}, makeContext(prompter))).toBe(0)
    expect(prompter.questions).toEqual(["Delete project 'a' (ID: 1)?"])
    expect(output).toEqual(['Cancelled.'])
    expect(store.count()).toBe(1)
  })

  it('确认后删除', async () => {
    await exec('delete', ['1'], {}, makeContext(new ScriptedPrompter([], true)))
    expect(output).toEqual(["✓ Project 'a' deleted"])
    expect(store.count()).toBe(0)
  })

  it('--force 不询问', async () => {
    const prompter = new ScriptedPrompter()
    await exec('delete', ['1'], { force: true }, makeContext(prompter))
    expect(prompter.questions).toEqual([])
    expect(store.count()).toBe(0)
  })
})

describe('run / check', () => {
  beforeEach(() => {
    store.create({ name: 'a', endpointUrl: 'https://a.co', credential: 'test-secret' })
  })

  it('全部成功返回 0', async () => {
    expect(await exec('run')).toBe(0)
    expect(output).toEqual([
      '✓ a: RPC keepalive() succeeded (0ms)',
      '',
      'Summary: 1/1 succeeded, 0/1 failed',
      'Finished in 0ms'
    ])
  })

  it('有失败时返回 1', async () => {
    const code = await exec('run', [], {}, makeContext(new ScriptedPrompter(), { ok: false, error: 'HTTP 503' }))
    expect(code).toBe(1)
    expect(output[0]).toBe('✗ a: connectivity check failed: HTTP 503 (0ms)')
  })

  it('check 检查单个项目（包括禁用的）', async () => {
    store.setEnabled(1, false)
    expect(await exec('check', ['1'])).toBe(0)
    expect(output[0]).toBe('✓ a: RPC keepalive() succeeded (0ms)')
    expect(store.get(1).lastStatus).toBe('success')
  })
})

describe('dashboard / show', () => {
  it('空库提示', async () => {
    expect(await exec('dashboard')).toBe(0)
    expect(output).toEqual(["No projects found. Use 'add' command to add projects."])
  })

  it('list 是 dashboard 的别名', async () => {
    store.create({ name: 'a', endpointUrl: 'https://a.co', credential: 'test-secret' })
    await exec('list', [], { enabled: true })
    expect(output[output.length - 1]).toBe('Total: 1 projects (showing 1 enabled)')
  })

  it('show 输出详情', async () => {
    store.create({ name: 'a', endpointUrl: 'https://a.co', credential: 'test-secret' })
    await exec('show', ['1'])
    expect(output[0]).toBe('Project Details: a')
  })
})

describe('import', () => {
  it('文件不存在时返回 0', async () => {
    const file = join(TEST_DIR, 'missing.json')
    expect(await exec('import', [file])).toBe(0)
    expect(output).toEqual([`No legacy file found at ${file}.`])
  })

  it('导入文件中的项目', async () => {
    const file = join(TEST_DIR, 'projects.json')
    writeFileSync(
      file,
      JSON.stringify([
        { name: 'a', url: 'https://a.co', key: 'test-secret' },
        { name: 'b', url: 'https://b.co' }
      ])
    )

    expect(await exec('import', [file])).toBe(0)
    expect(output).toEqual([
      `Migrating legacy projects from ${file}`,
      '✓ Migrated: a (ID: 1)',
      "⚠ Skipping 'b' - missing URL or API key",
      '',
      'Migrated: 1, Skipped: 0, Invalid: 1, Errors: 0'
    ])
  })
})
