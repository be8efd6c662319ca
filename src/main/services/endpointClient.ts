import { createClient, type SupabaseClient } from '@supabase/supabase-js'
import type { ProbeRequest, ProbeResult, ProbeTarget } from '../types'
import { errorMessage } from '../errors'

/**
 * 远端探测能力
 * 远端失败（网络错误、非 2xx、超时）一律返回 ok: false，不抛异常
 */
export interface EndpointClient {
  invoke(request: ProbeRequest, target: ProbeTarget, signal: AbortSignal): Promise<ProbeResult>
}

/** 项目 URL 去掉末尾斜杠 */
function baseUrl(target: ProbeTarget): string {
  return target.endpointUrl.trim().replace(/\/+$/, '')
}

/** 连通性检查地址：PostgREST 根路径（只读，校验 key） */
export function healthUrl(target: ProbeTarget): string {
  return `${baseUrl(target)}/rest/v1/`
}

/** 为单个项目创建 Supabase 客户端（CLI 进程内不保存会话） */
function createProjectClient(target: ProbeTarget, fetchImpl: typeof fetch = fetch): SupabaseClient {
  return createClient(baseUrl(target), target.credential, {
    auth: { persistSession: false, autoRefreshToken: false, detectSessionInUrl: false },
    global: { fetch: fetchImpl }
  })
}

/**
 * 基于 supabase-js 的探测客户端
 * - rpc    → client.rpc(fn)
 * - table  → client.from(table).select(column).limit(1)
 * - health → GET /rest/v1/
 */
export class SupabaseEndpointClient implements EndpointClient {
  constructor(private readonly fetchImpl: typeof fetch = fetch) {}

  async invoke(request: ProbeRequest, target: ProbeTarget, signal: AbortSignal): Promise<ProbeResult> {
    try {
      const result = await this.send(request, target, signal)
      if (!result.ok && signal.aborted) return { ok: false, error: errorMessage(signal.reason) }
      return result
    } catch (err) {
      if (signal.aborted) return { ok: false, error: errorMessage(signal.reason) }
      return { ok: false, error: errorMessage(err) }
    }
  }

  private async send(request: ProbeRequest, target: ProbeTarget, signal: AbortSignal): Promise<ProbeResult> {
    switch (request.kind) {
      case 'rpc': {
        const { data, error } = await createProjectClient(target, this.fetchImpl)
          .rpc(request.functionName)
          .abortSignal(signal)
        return error ? { ok: false, error: error.message } : { ok: true, payload: data }
      }
      case 'table': {
        const { data, error } = await createProjectClient(target, this.fetchImpl)
          .from(request.table)
          .select(request.column)
          .limit(1)
          .abortSignal(signal)
        return error ? { ok: false, error: error.message } : { ok: true, payload: data }
      }
      case 'health': {
        const response = await this.fetchImpl(healthUrl(target), {
          method: 'GET',
          headers: { apikey: target.credential, Authorization: `Bearer ${target.credential}` },
          signal
        })
        // 只关心可达性，响应体不解析
        await response.body?.cancel()
        return response.ok ? { ok: true, payload: null } : { ok: false, error: `HTTP ${response.status}` }
      }
    }
  }
}
