import type { AggregatePhase, PackageReport } from '../types.ts'
import * as p from '@clack/prompts'

export function formatDuration(ms: number): string {
  if (ms < 1000)
    return `${Math.round(ms)}ms`
  return `${(ms / 1000).toFixed(1)}s`
}

/** Spinner wrapper that appends elapsed time in dim text on stop */
export function timedSpinner() {
  const spin = p.spinner()
  let startTime = 0
  return {
    start(msg: string) {
      startTime = performance.now()
      spin.start(msg)
    },
    message(msg: string) {
      spin.message(msg)
    },
    stop(msg: string) {
      const elapsed = performance.now() - startTime
      spin.stop(`${msg} \x1B[90m(${formatDuration(elapsed)})\x1B[0m`)
    },
  }
}

const PHASE_LABELS: Record<AggregatePhase, string> = {
  resolve: 'resolving version',
  docs: 'crawling docs.rs',
  repository: 'fetching README and examples',
  done: 'done',
}

export function formatPhase(name: string, phase: AggregatePhase): string {
  return `${name}: ${PHASE_LABELS[phase]}`
}

/** One-line summary of a crate report */
export function formatReportLine(report: PackageReport): string {
  if (!report.resolved)
    return `${report.name} \x1B[31mnot resolved\x1B[0m`

  const parts = [
    `${report.docsPagesCount} pages`,
    `${report.codeSnippets.length} snippets`,
    `${report.examples.length} examples`,
  ]
  if (report.readme !== undefined)
    parts.push('README')
  return `\x1B[1m${report.dependencyLine}\x1B[0m \x1B[90m${parts.join(' · ')}\x1B[0m`
}
