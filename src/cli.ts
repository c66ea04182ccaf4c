#!/usr/bin/env node
import { writeFileSync } from 'node:fs'
import * as p from '@clack/prompts'
import { defineCommand, runMain } from 'citty'
import { resolve } from 'pathe'
import { aggregateCrateDocs, EMPTY_REQUEST_GUIDANCE, isEmptyRequestGuidance } from './aggregate.ts'
import { introLine, isInteractive, parseCountFlag, parseCrateNames } from './cli-helpers.ts'
import { resolveConfig } from './core/config.ts'
import { formatPhase, formatReportLine, timedSpinner } from './core/formatting.ts'
import { version } from './version.ts'

const main = defineCommand({
  meta: {
    name: 'crate-scout',
    version,
    description: 'Collect up-to-date docs, snippets and examples for Rust crates',
  },
  args: {
    crates: {
      type: 'positional',
      description: 'Crate(s) to look up (space or comma-separated, e.g., tokio serde)',
      required: false,
    },
    context: {
      type: 'string',
      alias: 'c',
      description: 'Free-text context echoed back in the report',
    },
    pages: {
      type: 'string',
      description: 'Max docs.rs pages per crate',
      valueHint: 'n',
    },
    examples: {
      type: 'string',
      description: 'Max example files per crate',
      valueHint: 'n',
    },
    concurrency: {
      type: 'string',
      description: 'Crates processed at once (default: all)',
      valueHint: 'n',
    },
    config: {
      type: 'string',
      description: 'Config file (default: ~/.crate-scout/config.yaml)',
      valueHint: 'path',
    },
    out: {
      type: 'string',
      alias: 'o',
      description: 'Also write the JSON report to this file',
      valueHint: 'path',
    },
    json: {
      type: 'boolean',
      description: 'Print the JSON report instead of a summary',
      default: false,
    },
  },
  async run({ args }) {
    const crates = parseCrateNames([args.crates, ...args._])
    const config = resolveConfig({
      maxDocPages: parseCountFlag(args.pages, '--pages'),
      maxExampleFiles: parseCountFlag(args.examples, '--examples'),
      concurrency: parseCountFlag(args.concurrency, '--concurrency', 1),
    }, args.config)

    const request = {
      crates,
      context: args.context,
      maxDocPages: config.maxDocPages,
      maxExampleFiles: config.maxExampleFiles,
    }

    if (args.json || !isInteractive()) {
      const result = await aggregateCrateDocs(request, config)
      const json = JSON.stringify(result, null, 2)
      if (args.out)
        writeFileSync(resolve(args.out), `${json}\n`)
      process.stdout.write(`${json}\n`)
      return
    }

    p.intro(introLine(crates.length))

    if (crates.length === 0) {
      p.log.warn(`${EMPTY_REQUEST_GUIDANCE.error}\n${EMPTY_REQUEST_GUIDANCE.message}`)
      p.outro('Usage: crate-scout <crate...>')
      process.exitCode = 1
      return
    }

    const spin = timedSpinner()
    spin.start(`Aggregating docs for ${crates.join(', ')}`)
    const result = await aggregateCrateDocs(request, {
      ...config,
      onProgress: ({ name, phase }) => spin.message(formatPhase(name, phase)),
    })
    spin.stop(`Aggregated ${crates.length} crate${crates.length === 1 ? '' : 's'}`)

    if (isEmptyRequestGuidance(result))
      return

    for (const report of result.reports) {
      if (report.resolved)
        p.log.success(formatReportLine(report))
      else
        p.log.error(formatReportLine(report))
    }
    for (const warning of result.warnings)
      p.log.warn(warning)

    if (args.out) {
      const outPath = resolve(args.out)
      writeFileSync(outPath, `${JSON.stringify(result, null, 2)}\n`)
      p.outro(`Report written to ${outPath}`)
    }
    else {
      p.outro('Pass --json or --out <path> for the full report')
    }
  },
})

runMain(main)
