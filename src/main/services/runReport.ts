import type { CheckOutcome, RunReport } from '../types'

/** 汇总一轮运行的结果（降级成功也计入成功） */
export function buildRunReport(
  runId: string,
  outcomes: CheckOutcome[],
  startedAt: number,
  finishedAt: number
): RunReport {
  const succeededCount = outcomes.filter((o) => o.succeeded).length
  return {
    runId,
    startedAt,
    finishedAt,
    durationMs: Math.max(0, finishedAt - startedAt),
    outcomes: [...outcomes].sort((a, b) => a.projectId - b.projectId),
    succeededCount,
    failedCount: outcomes.length - succeededCount
  }
}

/** 单行汇总，如 "Summary: 2/3 succeeded, 1/3 failed" */
export function formatRunSummary(report: RunReport): string {
  const total = report.outcomes.length
  return `Summary: ${report.succeededCount}/${total} succeeded, ${report.failedCount}/${total} failed`
}
