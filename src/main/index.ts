#!/usr/bin/env node
import { readFileSync } from 'node:fs'
import { join } from 'node:path'
import { parseArgs } from 'node:util'
import { loadConfig, getSettingDescriptions } from './config'
import { changeLanguage, initI18n, t } from './i18n'
import { createLogger, setLogDirectory, setQuiet } from './logger'
import { withRunContext } from './context/RunContext'
import { DatabaseManager } from './dao/database'
import { ProjectStore } from './services/projectStore'
import { SupabaseEndpointClient } from './services/endpointClient'
import { KeepaliveEngine } from './services/keepaliveEngine'
import { TerminalPrompter } from './cli/prompt'
import { describeError, runCommand, type CommandContext } from './cli/commands'
import { KeepaliveError, errorMessage } from './errors'

const log = createLogger('App')

const USAGE_OPTIONS = {
  db: { type: 'string' },
  timeout: { type: 'string' },
  lang: { type: 'string' },
  enabled: { type: 'boolean', short: 'e' },
  quiet: { type: 'boolean', short: 'q' },
  force: { type: 'boolean', short: 'f' },
  name: { type: 'string', short: 'n' },
  url: { type: 'string', short: 'u' },
  key: { type: 'string', short: 'k' },
  method: { type: 'string', short: 'm' },
  table: { type: 'string', short: 't' },
  disabled: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' }
} as const

/** 读取 package.json 中的版本号（src/main 与 dist/main 到根目录的层级相同） */
function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(join(__dirname, '..', '..', 'package.json'), 'utf-8'))
  if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
    return raw.version
  }
  return '0.0.0'
}

function printUsage(out: (line: string) => void): void {
  out(t('cli.usage'))
  out(t('cli.commands'))
  out(t('cli.options'))
  getSettingDescriptions().forEach(out)
}

/** CLI 入口，返回退出码 */
export async function main(argv: string[]): Promise<number> {
  const out = (line: string): void => {
    process.stdout.write(`${line}\n`)
  }

  // 先以英文初始化，配置解析出错时也能输出提示
  initI18n('en')

  const { values, positionals } = parseArgs({
    args: argv,
    options: USAGE_OPTIONS,
    allowPositionals: true,
    strict: true
  })

  const config = loadConfig({ dbPath: values.db, timeoutMs: values.timeout, language: values.lang })
  await changeLanguage(config.language)
  setLogDirectory(config.logDir)
  if (values.quiet) setQuiet(true)

  const [command = 'dashboard', ...args] = positionals
  if (values.help || command === 'help') {
    printUsage(out)
    return 0
  }

  const manager = new DatabaseManager(config.dbPath, { busyTimeoutMs: config.busyTimeoutMs })
  const prompter = new TerminalPrompter()
  try {
    const store = new ProjectStore(manager)
    const engine = new KeepaliveEngine(store, new SupabaseEndpointClient(), { timeoutMs: config.timeoutMs })
    const ctx: CommandContext = {
      store,
      engine,
      prompter,
      out,
      now: Date.now,
      version: readVersion()
    }
    return await withRunContext(command, () => runCommand(ctx, command, args, values))
  } finally {
    prompter.close()
    manager.close()
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code
    })
    .catch((err: unknown) => {
      if (err instanceof KeepaliveError) {
        process.stderr.write(`${describeError(err)}\n`)
      } else {
        log.error(`Unexpected error: ${errorMessage(err)}`)
        process.stderr.write(`${errorMessage(err)}\n`)
      }
      process.exitCode = 1
    })
}
