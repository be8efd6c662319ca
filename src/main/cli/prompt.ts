import { createInterface, type Interface } from 'node:readline/promises'

/** 交互式输入（测试中替换为固定答案） */
export interface Prompter {
  /** 提问；直接回车时返回默认值 */
  ask(question: string, defaultValue?: string): Promise<string>
  confirm(question: string): Promise<boolean>
  close(): void
}

/** 基于 readline 的终端输入，首次提问时才创建接口 */
export class TerminalPrompter implements Prompter {
  private rl: Interface | null = null

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  private get interface(): Interface {
    this.rl ??= createInterface({ input: this.input, output: this.output })
    return this.rl
  }

  async ask(question: string, defaultValue?: string): Promise<string> {
    const suffix = defaultValue ? ` (${defaultValue})` : ''
    const answer = (await this.interface.question(`${question}${suffix}: `)).trim()
    return answer || defaultValue || ''
  }

  async confirm(question: string): Promise<boolean> {
    const answer = (await this.interface.question(`${question} [y/N]: `)).trim().toLowerCase()
    return answer === 'y' || answer === 'yes'
  }

  close(): void {
    this.rl?.close()
    this.rl = null
  }
}
